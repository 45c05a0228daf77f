import type { Codec } from "../storage/codec.js";
import type { ErrorReporter } from "../storage/reporter.js";

// ─── Writer State ───────────────────────────────────────────────────────────

/** unwritten: no file · clean: file matches last flush · dirty: a write is pending. */
export type WriterState = "unwritten" | "clean" | "dirty";

export type ReadOutcome<T> =
  | { kind: "loaded"; value: T }
  | { kind: "absent" }
  | { kind: "quarantined"; rescuePath: string | null }
  | { kind: "failed" };

export interface WriterStats {
  commits: number;       // snapshots renamed into place
  failures: number;      // commits that threw
  skipped: number;       // stale snapshots dropped before rename
  maxInFlight: number;   // 1 on the debounced path; 2 when flushSync overlaps a queued commit
}

// ─── Options ────────────────────────────────────────────────────────────────

export interface WriterOptions<T> {
  baseDir: string;
  name: string;
  codec: Codec<T>;
  debounceMs: number;
  reporter: ErrorReporter;
}

export interface ObjectStoreOptions<T> {
  baseDir?: string;              // default config.store.dataDir
  debounceMs?: number;           // default config.store.debounceMs
  codec?: Codec<T>;              // default versioned JSON
  reporter?: ErrorReporter;      // default logs through createLogger("store")
}
