/**
 * Random and identifier utilities
 *
 * Uses the Web Crypto API (globalThis.crypto, available in Node.js >= 18).
 * Never use Math.random() for identifier generation.
 *
 * @module utils/random
 */

/**
 * Generate cryptographically secure random bytes
 */
export function getRandomBytes(length: number): Uint8Array {
  const bytes = new Uint8Array(length)
  crypto.getRandomValues(bytes)
  return bytes
}

function toHex(bytes: Uint8Array): string {
  let result = ''
  for (const byte of bytes) {
    result += byte.toString(16).padStart(2, '0')
  }
  return result
}

/**
 * Per-process random component, fixed for the lifetime of the process
 */
const processUnique = toHex(getRandomBytes(5))

/**
 * Counter for ids generated within the same second
 */
let idCounter = parseInt(toHex(getRandomBytes(3)), 16)

/**
 * Generate a 24-character hex identifier in the layout document stores use
 * for their native ids: 4-byte seconds timestamp, 5-byte process-unique
 * value, 3-byte incrementing counter. Ids sort by creation second.
 *
 * @example
 * generateId() // '66f1c2a9b4e01d9a7c00a3f1'
 */
export function generateId(): string {
  const seconds = Math.floor(Date.now() / 1000)
  idCounter = (idCounter + 1) % 0x1000000
  return (
    seconds.toString(16).padStart(8, '0') +
    processUnique +
    idCounter.toString(16).padStart(6, '0')
  )
}
