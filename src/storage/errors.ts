/**
 * Storage error taxonomy.
 *
 * Read-path failures are classified and reported, never thrown. Only
 * `StoreMisuseError` reaches callers as an exception.
 */

export type StorageErrorCode = "SCHEMA_INCOMPATIBLE" | "CORRUPT_PAYLOAD" | "QUARANTINE_FAILED" | "STORE_MISUSE";

export class StorageError extends Error {
  public readonly code: StorageErrorCode;

  constructor(code: StorageErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
    this.code = code;
  }
}

/** Payload exists but was written under a format version this build cannot read. */
export class SchemaIncompatibleError extends StorageError {
  public readonly foundVersion: number | null;
  public readonly expectedVersion: number;

  constructor(message: string, foundVersion: number | null, expectedVersion: number, options?: { cause?: unknown }) {
    super("SCHEMA_INCOMPATIBLE", message, options);
    this.name = "SchemaIncompatibleError";
    this.foundVersion = foundVersion;
    this.expectedVersion = expectedVersion;
  }
}

/** Bytes could not be parsed at all (truncated or garbled write). */
export class CorruptPayloadError extends StorageError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CORRUPT_PAYLOAD", message, options);
    this.name = "CorruptPayloadError";
  }
}

/** Caller broke the store's contract: save before init, a second writer on one path, a bad name. */
export class StoreMisuseError extends StorageError {
  constructor(message: string) {
    super("STORE_MISUSE", message);
    this.name = "StoreMisuseError";
  }
}

export function errorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  const { code } = err;
  return typeof code === "string" ? code : undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
