/**
 * Codec Registry
 *
 * Maps codec names to codecs so model definitions can refer to field types by
 * name. Custom value types register here alongside the built-ins.
 *
 * Usage:
 *   const codecs = createDefaultCodecRegistry()
 *   codecs.register(moneyCodec)
 *   codecs.get('measurement')
 */

import type { AnyCodec } from './types'
import {
  arrayCodec,
  booleanCodec,
  dateCodec,
  integerCodec,
  listCodec,
  numberCodec,
  objectCodec,
  stringCodec,
} from './builtin'
import { measurementCodec } from './measurement'
import { pointCodec } from './point'
import { ConfigurationError, ErrorCode } from '../errors'

// =============================================================================
// Codec Registry
// =============================================================================

export class CodecRegistry {
  private codecs = new Map<string, AnyCodec>()

  /**
   * Register a codec
   *
   * @throws ConfigurationError if the name is already taken
   */
  register(codec: AnyCodec): this {
    if (this.codecs.has(codec.name)) {
      throw new ConfigurationError(
        `Codec "${codec.name}" is already registered`,
        ErrorCode.INVALID_CONFIG,
        { configKey: 'codecs', actualValue: codec.name }
      )
    }
    this.codecs.set(codec.name, codec)
    return this
  }

  /**
   * Get a codec by name
   *
   * @throws ConfigurationError if no codec has that name
   */
  get(name: string): AnyCodec {
    const codec = this.codecs.get(name)
    if (!codec) {
      throw new ConfigurationError(
        `Unknown codec "${name}". Registered: ${this.names().join(', ')}`,
        ErrorCode.UNKNOWN_CODEC,
        { configKey: 'codecs', actualValue: name }
      )
    }
    return codec
  }

  has(name: string): boolean {
    return this.codecs.has(name)
  }

  /**
   * Accept either a codec or the name of a registered one
   */
  resolve(nameOrCodec: string | AnyCodec): AnyCodec {
    return typeof nameOrCodec === 'string' ? this.get(nameOrCodec) : nameOrCodec
  }

  names(): string[] {
    return Array.from(this.codecs.keys()).sort()
  }
}

/** Codecs available in every registry */
export const BUILTIN_CODECS: readonly AnyCodec[] = [
  stringCodec,
  integerCodec,
  numberCodec,
  booleanCodec,
  dateCodec,
  arrayCodec,
  listCodec,
  objectCodec,
  measurementCodec,
  pointCodec,
]

/**
 * Create a registry holding the built-in codecs
 */
export function createDefaultCodecRegistry(): CodecRegistry {
  const registry = new CodecRegistry()
  for (const codec of BUILTIN_CODECS) {
    registry.register(codec)
  }
  return registry
}
