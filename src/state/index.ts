export {
  StateStoreError,
  FatalSetupError,
  type StateStoreErrorCode,
} from "./errors.ts";

export { generateMessageId, generateRunId } from "./id.ts";

export {
  TEMP_PREFIX,
  writeFileAtomic,
  writeJsonAtomic,
  readJsonFile,
} from "./atomic.ts";

export { validateRunRecord, validateNotificationMessage } from "./validation.ts";

export { type StatePaths, createStatePaths } from "./paths.ts";

export { type StateRootOptions, ensureStateRoot } from "./state-root.ts";

export {
  type RunRecordStore,
  FileRunRecordStore,
  InMemoryRunRecordStore,
} from "./run-record-store.ts";
