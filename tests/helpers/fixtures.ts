import { mkdtempSync, readFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import type { ErrorReporter, StorageFault } from "../../src/storage/reporter.js";

export function makeTempDir(prefix = "object-store-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export interface RecordingReporter extends ErrorReporter {
  faults: StorageFault[];
}

export function recordingReporter(): RecordingReporter {
  const faults: StorageFault[] = [];
  return {
    faults,
    report(fault) {
      faults.push(fault);
    },
  };
}

/** Parse a file written by the default JSON codec and return its `data`. */
export function readEnvelopeData(path: string): unknown {
  const parsed: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (typeof parsed !== "object" || parsed === null || !("data" in parsed)) {
    throw new Error(`not an envelope: ${path}`);
  }
  return parsed.data;
}

export function envelope(version: number, data: unknown): string {
  return JSON.stringify({ version, data }, null, 2);
}

export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
