export { ObjectStore } from "./storage/object-store.js";
export { DurableWriter, removeStorageFiles } from "./storage/durable-writer.js";
export { createJsonCodec, type Codec, type JsonCodecOptions, type VersionedFile } from "./storage/codec.js";
export {
  StorageError,
  SchemaIncompatibleError,
  CorruptPayloadError,
  StoreMisuseError,
  type StorageErrorCode,
} from "./storage/errors.js";
export { createLogReporter, type ErrorReporter, type StorageFault, type FaultKind } from "./storage/reporter.js";
export { flushAllStores, flushAllStoresSync, destroyAllStores, liveStorePaths } from "./storage/registry.js";
export { resolvePaths, BACKUP_DIR, QUARANTINE_DIR, type StoragePaths } from "./storage/paths.js";
export { createLogger, setLogLevel, type Logger } from "./lib/logger.js";
export { installShutdownHandlers, type ShutdownTarget, type ShutdownOptions } from "./lib/shutdown.js";
export { config, type AppConfig, type LogLevel } from "./config/env.js";
export type { ObjectStoreOptions, WriterOptions, WriterState, WriterStats, ReadOutcome } from "./types/index.js";
