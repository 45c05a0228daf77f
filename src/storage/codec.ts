import { CorruptPayloadError, SchemaIncompatibleError, errorMessage } from "./errors.js";

/**
 * Encode/decode capability a store is bound to.
 *
 * `decode` must throw `SchemaIncompatibleError` when the bytes are a
 * well-formed payload of another format version; any other throw is treated
 * as a possibly transient read failure and the file is left alone.
 */
export interface Codec<T> {
  encode(value: T): Buffer;
  decode(raw: Buffer): T;
}

export interface VersionedFile<T> {
  version: number;
  data: T;
}

export interface JsonCodecOptions<T> {
  version?: number;                // default 1
  validate?: (raw: unknown) => T;  // throw to reject the payload
  pretty?: boolean;                // default true
}

function isEnvelope(raw: unknown): raw is { version: unknown; data: unknown } {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw) && "version" in raw && "data" in raw;
}

/** Versioned JSON envelope: `{ "version": n, "data": … }`. */
export function createJsonCodec<T>(opts: JsonCodecOptions<T> = {}): Codec<T> {
  const { version = 1, validate, pretty = true } = opts;

  return {
    encode(value: T): Buffer {
      const versioned: VersionedFile<T> = { version, data: value };
      const text = pretty ? JSON.stringify(versioned, null, 2) : JSON.stringify(versioned);
      return Buffer.from(text, "utf-8");
    },

    decode(raw: Buffer): T {
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw.toString("utf-8"));
      } catch (err) {
        throw new CorruptPayloadError(`payload is not valid JSON: ${errorMessage(err)}`, { cause: err });
      }

      if (!isEnvelope(parsed)) {
        throw new SchemaIncompatibleError("payload has no version envelope", null, version);
      }
      if (typeof parsed.version !== "number" || parsed.version !== version) {
        const found = typeof parsed.version === "number" ? parsed.version : null;
        throw new SchemaIncompatibleError(
          `payload version ${String(parsed.version)} does not match expected ${version}`,
          found,
          version,
        );
      }

      if (!validate) return parsed.data as T;
      try {
        return validate(parsed.data);
      } catch (err) {
        throw new SchemaIncompatibleError(`payload rejected by validator: ${errorMessage(err)}`, version, version, { cause: err });
      }
    },
  };
}
