import { describe, expect, it } from "vitest";
import { createJsonCodec } from "../../src/storage/codec.js";
import { CorruptPayloadError, SchemaIncompatibleError } from "../../src/storage/errors.js";

interface DataRequest {
  nonce: number;
  excludedKeys: string[];
  capabilities: number[];
}

function isDataRequest(raw: unknown): raw is DataRequest {
  return typeof raw === "object" && raw !== null
    && "nonce" in raw && typeof raw.nonce === "number"
    && "excludedKeys" in raw && Array.isArray(raw.excludedKeys)
    && "capabilities" in raw && Array.isArray(raw.capabilities);
}

describe("createJsonCodec", () => {
  it("wraps the value in a version envelope", () => {
    const codec = createJsonCodec<{ theme: string }>({ version: 3, pretty: false });

    expect(codec.encode({ theme: "dark" }).toString("utf-8")).toBe('{"version":3,"data":{"theme":"dark"}}');
  });

  it("pretty-prints by default", () => {
    const codec = createJsonCodec<number[]>();

    expect(codec.encode([1]).toString("utf-8")).toBe('{\n  "version": 1,\n  "data": [\n    1\n  ]\n}');
  });

  it("decodes what it encodes", () => {
    const codec = createJsonCodec<DataRequest>();
    const request: DataRequest = { nonce: 42, excludedKeys: ["a1", "b2"], capabilities: [0, 1, 4] };

    expect(codec.decode(codec.encode(request))).toEqual(request);
  });

  it("rejects another format version as schema-incompatible", () => {
    const codec = createJsonCodec<unknown>({ version: 2 });

    try {
      codec.decode(Buffer.from('{"version":1,"data":{}}'));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaIncompatibleError);
      if (!(err instanceof SchemaIncompatibleError)) return;
      expect(err.code).toBe("SCHEMA_INCOMPATIBLE");
      expect(err.foundVersion).toBe(1);
      expect(err.expectedVersion).toBe(2);
    }
  });

  it("treats a payload without envelope as schema-incompatible", () => {
    const codec = createJsonCodec<unknown>();

    expect(() => codec.decode(Buffer.from('{"theme":"dark"}'))).toThrow(SchemaIncompatibleError);
    expect(() => codec.decode(Buffer.from("[1,2]"))).toThrow(SchemaIncompatibleError);
  });

  it("treats a non-numeric version as schema-incompatible", () => {
    const codec = createJsonCodec<unknown>();

    expect(() => codec.decode(Buffer.from('{"version":"1","data":null}'))).toThrow(/does not match expected 1/);
  });

  it("reports truncated JSON as a corrupt payload, not a schema change", () => {
    const codec = createJsonCodec<unknown>();

    expect(() => codec.decode(Buffer.from('{"version":1,"data":{"the'))).toThrow(CorruptPayloadError);
  });

  it("turns a validator rejection into schema-incompatible", () => {
    const codec = createJsonCodec<DataRequest>({
      validate: raw => {
        if (!isDataRequest(raw)) throw new Error("not a data request");
        return raw;
      },
    });

    expect(() => codec.decode(Buffer.from('{"version":1,"data":{"nonce":"x"}}')))
      .toThrow("payload rejected by validator: not a data request");
  });

  it("returns the validator's result", () => {
    const codec = createJsonCodec<{ count: number }>({
      validate: raw => ({ count: typeof raw === "number" ? raw : 0 }),
    });

    expect(codec.decode(Buffer.from('{"version":1,"data":7}'))).toEqual({ count: 7 });
  });
});
