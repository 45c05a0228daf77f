import { config } from "../config/env.js";
import { createLogger } from "../lib/logger.js";
import { createJsonCodec, type Codec } from "./codec.js";
import { DurableWriter, removeStorageFiles } from "./durable-writer.js";
import { StoreMisuseError } from "./errors.js";
import { resolvePaths } from "./paths.js";
import { findWriter } from "./registry.js";
import { createLogReporter, type ErrorReporter } from "./reporter.js";
import type { ObjectStoreOptions, WriterState, WriterStats } from "../types/index.js";

const log = createLogger("store");

/** Constructor name of a class instance; plain objects and primitives have none worth using. */
function inferName(value: unknown): string {
  if (typeof value === "object" && value !== null) {
    const proto: unknown = Object.getPrototypeOf(value);
    if (typeof proto === "object" && proto !== null && "constructor" in proto && typeof proto.constructor === "function") {
      const ctorName = proto.constructor.name;
      if (ctorName && ctorName !== "Object" && ctorName !== "Array") return ctorName;
    }
  }
  throw new StoreMisuseError("init needs an explicit name unless the value is a class instance");
}

/**
 * Binds one named value to durable storage.
 *
 * ```ts
 * const store = new ObjectStore<Prefs>({ baseDir: "/data" });
 * const persisted = store.init(prefs, "Prefs");
 * if (persisted) Object.assign(prefs, persisted);
 * prefs.theme = "light";
 * store.save();
 * ```
 */
export class ObjectStore<T> {
  private readonly baseDir: string;
  private readonly debounceMs: number;
  private readonly codec: Codec<T>;
  private readonly reporter: ErrorReporter;
  private writer: DurableWriter<T> | null = null;
  private bound: { value: T } | null = null;

  constructor(opts: ObjectStoreOptions<T> = {}) {
    this.baseDir = opts.baseDir ?? config.store.dataDir;
    this.debounceMs = opts.debounceMs ?? config.store.debounceMs;
    this.codec = opts.codec ?? createJsonCodec<T>();
    this.reporter = opts.reporter ?? createLogReporter();
  }

  /**
   * Bind `defaultValue` under `name` and read the file once, synchronously.
   * Returns the persisted value, or null on first run or after a recoverable
   * read failure (which is reported, not thrown).
   */
  init(defaultValue: T, name?: string): T | null {
    if (this.writer) throw new StoreMisuseError(`store '${this.writer.name}' is already initialised`);

    const writer = new DurableWriter<T>({
      baseDir: this.baseDir,
      name: name ?? inferName(defaultValue),
      codec: this.codec,
      debounceMs: this.debounceMs,
      reporter: this.reporter,
    });
    this.writer = writer;
    this.bound = { value: defaultValue };

    const outcome = writer.read();
    if (outcome.kind !== "loaded") {
      log.info("store starts from default", { file: writer.name, outcome: outcome.kind });
      return null;
    }
    return outcome.value;
  }

  /**
   * Queue a debounced write of the bound value, or of `value` after rebinding
   * to it. Returns immediately; the write lands after the quiet interval.
   */
  save(...next: [] | [T]): void {
    const writer = this.requireWriter("save");
    if (!this.bound) throw new StoreMisuseError("store has no bound value");
    if (next.length === 1) this.bound = { value: next[0] };
    writer.schedule(this.bound.value);
  }

  /** Delete the file (and its backup) stored under `name`, cancelling that store's pending write. */
  remove(name: string): void {
    const paths = resolvePaths(this.baseDir, name);
    const live = findWriter(paths.file);
    if (live) {
      live.remove();
      return;
    }
    removeStorageFiles(paths, name, this.reporter);
  }

  /** Write any pending snapshot now; resolves when it is on disk (or reported as failed). */
  flush(): Promise<void> {
    return this.writer ? this.writer.flush() : Promise.resolve();
  }

  flushSync(): void {
    this.writer?.flushSync();
  }

  /** Release the file. A pending write is dropped; call flush() first to keep it. */
  destroy(): void {
    this.writer?.destroy();
  }

  get name(): string {
    return this.requireWriter("name").name;
  }

  get path(): string {
    return this.requireWriter("path").path;
  }

  get value(): T {
    this.requireWriter("value");
    if (!this.bound) throw new StoreMisuseError("store has no bound value");
    return this.bound.value;
  }

  get state(): WriterState {
    return this.writer?.state ?? "unwritten";
  }

  get stats(): WriterStats {
    return this.requireWriter("stats").stats;
  }

  /** Resolves once writes already handed to the background chain have settled. */
  idle(): Promise<void> {
    return this.writer ? this.writer.idle() : Promise.resolve();
  }

  private requireWriter(op: string): DurableWriter<T> {
    if (!this.writer) throw new StoreMisuseError(`${op} called before init`);
    return this.writer;
  }
}
