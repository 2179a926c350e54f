/**
 * Consistency repair
 */

export {
  Reconciler,
  type ModelRef,
  type OneSidedLink,
  type DanglingReference,
  type RepairOptions,
  type RepairResult,
} from './reconciler'
