/**
 * @loopwatch/run-store — Public API
 */

export {
  FileRunStore,
  PersistenceError,
  RunFileFormatError,
  RUN_FILE_FORMAT_VERSION,
  runFileName,
  decodeRunFile,
} from './file-run-store'
export type { RunStore, StoredRun } from './file-run-store'
export { MemoryRunStore } from './memory-run-store'
export {
  ValidationError,
  assertFinite,
  assertString,
  assertBoolean,
  assertOneOf,
  isRecord,
  parseRunRecord,
  parseDetection,
} from './validate'
