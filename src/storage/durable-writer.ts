/**
 * Owns one storage file: the single startup read, backup and quarantine, and
 * the debounced background write path.
 *
 * - Read: synchronous, once. Backups are written from bytes that decoded.
 * - Quarantine: an incompatible file is moved (or copied) aside; if neither
 *   works, writes are refused so the file is never overwritten unrescued.
 * - Write: save() replaces the pending snapshot and restarts an unref'd
 *   timer; on fire the snapshot joins a promise chain, so at most one commit
 *   is in flight. Commit = write `<file>.<gen>.tmp`, then rename over target.
 * - Generations: every snapshot is numbered. A commit whose generation is not
 *   newer than the last committed (or removed) one is dropped before the
 *   rename, which runs synchronously right after that check.
 */

import { readFileSync, writeFileSync, renameSync, copyFileSync, mkdirSync, rmSync, existsSync } from "fs";
import { mkdir, writeFile, rm } from "fs/promises";
import { createLogger } from "../lib/logger.js";
import type { Codec } from "./codec.js";
import { SchemaIncompatibleError, StorageError, StoreMisuseError, errorCode, errorMessage } from "./errors.js";
import { resolvePaths, quarantinePath, type StoragePaths } from "./paths.js";
import { registerWriter, unregisterWriter, type RegisteredWriter } from "./registry.js";
import { safeReport, type ErrorReporter, type FaultKind } from "./reporter.js";
import type { ReadOutcome, WriterOptions, WriterState, WriterStats } from "../types/index.js";

const log = createLogger("durable-writer");

interface PendingWrite {
  bytes: Buffer;
  generation: number;
}

export class DurableWriter<T> implements RegisteredWriter {
  readonly name: string;
  readonly paths: StoragePaths;
  private readonly codec: Codec<T>;
  private readonly debounceMs: number;
  private readonly reporter: ErrorReporter;

  private pending: PendingWrite | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private tail: Promise<void> = Promise.resolve();
  private generation = 0;
  private committedGeneration = 0;
  private inFlight = 0;
  private hasRead = false;
  private destroyed = false;
  private writeBlocked: StorageError | null = null;
  private current: WriterState = "unwritten";
  private readonly counters: WriterStats = { commits: 0, failures: 0, skipped: 0, maxInFlight: 0 };

  constructor(opts: WriterOptions<T>) {
    this.name = opts.name;
    this.paths = resolvePaths(opts.baseDir, opts.name);
    this.codec = opts.codec;
    this.debounceMs = opts.debounceMs;
    this.reporter = opts.reporter;
    registerWriter(this);
  }

  get path(): string {
    return this.paths.file;
  }

  get state(): WriterState {
    return this.current;
  }

  get stats(): WriterStats {
    return { ...this.counters };
  }

  // ─── Read ─────────────────────────────────────────────────────────────────

  read(): ReadOutcome<T> {
    this.assertOpen();
    if (this.hasRead) throw new StoreMisuseError(`store '${this.name}' was already read`);
    if (this.generation > 0) throw new StoreMisuseError(`store '${this.name}' must be read before the first save`);
    this.hasRead = true;

    let started = Date.now();
    let raw: Buffer;
    try {
      raw = readFileSync(this.paths.file);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        log.info("file not available, first run", { file: this.name });
        return { kind: "absent" };
      }
      this.current = "clean";
      this.fault("io-failure", err);
      return { kind: "failed" };
    }

    // From here on a file exists on disk
    this.current = "clean";

    let value: T;
    try {
      value = this.codec.decode(raw);
    } catch (err) {
      if (err instanceof SchemaIncompatibleError) return this.quarantine(err);
      this.fault("io-failure", err);
      return { kind: "failed" };
    }
    log.info("read completed", { file: this.name, bytes: raw.length, ms: Date.now() - started });

    // Decoded cleanly, so these bytes are safe to keep as the backup
    started = Date.now();
    const backupTmp = `${this.paths.backup}.tmp`;
    try {
      mkdirSync(this.paths.backupDir, { recursive: true });
      writeFileSync(backupTmp, raw);
      renameSync(backupTmp, this.paths.backup);
      log.info("backup completed", { file: this.name, ms: Date.now() - started });
    } catch (err) {
      this.fault("backup-failure", err, { path: this.paths.backup });
      this.discardTmp(backupTmp);
    }

    return { kind: "loaded", value };
  }

  private quarantine(cause: SchemaIncompatibleError): ReadOutcome<T> {
    const rescuePath = this.moveToQuarantine();
    if (rescuePath) {
      this.current = existsSync(this.paths.file) ? "clean" : "unwritten";
    } else {
      // No rescue copy exists, so the primary must not be overwritten
      this.writeBlocked = new StorageError(
        "QUARANTINE_FAILED",
        `'${this.name}' holds an incompatible file that could not be quarantined; writes are blocked until it is removed`,
        { cause },
      );
    }

    this.fault("schema-incompatible", cause, rescuePath ? { rescuePath } : {});
    return { kind: "quarantined", rescuePath };
  }

  /** Rename into quarantine, falling back to copy + delete. Returns the rescue path, or null if nothing was saved. */
  private moveToQuarantine(): string | null {
    let target: string;
    try {
      mkdirSync(this.paths.quarantineDir, { recursive: true });
      target = quarantinePath(this.paths, this.name);
    } catch (err) {
      log.error("quarantine directory unavailable", { file: this.name, error: errorMessage(err) });
      return null;
    }

    try {
      renameSync(this.paths.file, target);
      return target;
    } catch (err) {
      log.warn("quarantine move failed, copying instead", { file: this.name, error: errorMessage(err) });
    }

    try {
      copyFileSync(this.paths.file, target);
    } catch (err) {
      log.error("quarantine copy failed", { file: this.name, error: errorMessage(err) });
      return null;
    }
    try {
      rmSync(this.paths.file, { force: true });
    } catch (err) {
      log.warn("incompatible file left at primary path", { file: this.name, error: errorMessage(err) });
    }
    return target;
  }

  // ─── Write ────────────────────────────────────────────────────────────────

  /** Snapshot `value` now and (re)start the quiet-interval timer. */
  schedule(value: T): void {
    this.assertOpen();

    let bytes: Buffer;
    try {
      bytes = this.codec.encode(value);
    } catch (err) {
      this.fault("write-failure", err);
      return;
    }

    this.generation++;
    this.pending = { bytes, generation: this.generation };
    this.current = "dirty";

    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.enqueuePending();
    }, this.debounceMs);
    this.timer.unref();
  }

  /** Write the pending snapshot now and wait for every queued commit. */
  flush(): Promise<void> {
    this.clearTimer();
    return this.enqueuePending();
  }

  /** Resolves once the commits queued so far have settled. Does not flush. */
  idle(): Promise<void> {
    return this.tail;
  }

  /** Blocking variant of flush() for exit and signal handlers. */
  flushSync(): void {
    this.clearTimer();
    const snap = this.pending;
    if (!snap) return;
    this.pending = null;
    if (this.rejectBlocked()) return;

    const tmpPath = this.tmpPath(snap);
    this.enterWrite();
    try {
      mkdirSync(this.paths.baseDir, { recursive: true });
      writeFileSync(tmpPath, snap.bytes);
      renameSync(tmpPath, this.paths.file);
      this.committed(snap);
    } catch (err) {
      this.counters.failures++;
      this.fault("write-failure", err);
      this.discardTmp(tmpPath);
    } finally {
      this.inFlight--;
    }
  }

  private enqueuePending(): Promise<void> {
    const snap = this.pending;
    this.pending = null;
    if (snap) this.tail = this.tail.then(() => this.commit(snap));
    return this.tail;
  }

  private async commit(snap: PendingWrite): Promise<void> {
    if (this.isStale(snap)) return;
    if (this.rejectBlocked()) return;

    const tmpPath = this.tmpPath(snap);
    this.enterWrite();
    try {
      await mkdir(this.paths.baseDir, { recursive: true });
      await writeFile(tmpPath, snap.bytes);
      if (this.isStale(snap)) {
        await rm(tmpPath, { force: true });
        return;
      }
      renameSync(tmpPath, this.paths.file);
      this.committed(snap);
    } catch (err) {
      this.counters.failures++;
      this.fault("write-failure", err);
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        log.warn("temp file cleanup failed", { file: this.name, error: errorMessage(cleanupErr) });
      });
    } finally {
      this.inFlight--;
    }
  }

  private enterWrite(): void {
    this.inFlight++;
    this.counters.maxInFlight = Math.max(this.counters.maxInFlight, this.inFlight);
  }

  private rejectBlocked(): boolean {
    if (!this.writeBlocked) return false;
    this.counters.failures++;
    this.fault("write-failure", this.writeBlocked);
    return true;
  }

  private discardTmp(tmpPath: string): void {
    try {
      rmSync(tmpPath, { force: true });
    } catch (cleanupErr) {
      log.warn("temp file cleanup failed", { file: this.name, error: errorMessage(cleanupErr) });
    }
  }

  private isStale(snap: PendingWrite): boolean {
    if (snap.generation > this.committedGeneration) return false;
    this.counters.skipped++;
    log.debug("dropped stale snapshot", { file: this.name, generation: snap.generation });
    return true;
  }

  private committed(snap: PendingWrite): void {
    this.committedGeneration = snap.generation;
    this.counters.commits++;
    if (!this.pending) this.current = "clean";
    log.debug("write committed", { file: this.name, generation: snap.generation, bytes: snap.bytes.length });
  }

  private tmpPath(snap: PendingWrite): string {
    return `${this.paths.file}.${snap.generation}.tmp`;
  }

  // ─── Remove / lifecycle ───────────────────────────────────────────────────

  /** Cancel any pending write, invalidate in-flight ones, delete file and backup. */
  remove(): void {
    this.clearTimer();
    this.pending = null;
    this.committedGeneration = this.generation;
    this.writeBlocked = null;
    this.current = "unwritten";
    removeStorageFiles(this.paths, this.name, this.reporter);
  }

  /**
   * Stop the timer and release the path. Pending data is dropped, not flushed,
   * and commits still queued are invalidated so they cannot land over a
   * successor store on the same path.
   */
  destroy(): void {
    if (this.destroyed) return;
    this.clearTimer();
    if (this.pending) log.warn("destroyed with unflushed write", { file: this.name });
    this.pending = null;
    this.committedGeneration = this.generation;
    this.destroyed = true;
    unregisterWriter(this);
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private assertOpen(): void {
    if (this.destroyed) throw new StoreMisuseError(`store '${this.name}' has been destroyed`);
  }

  private fault(kind: FaultKind, error: unknown, extra: { path?: string; rescuePath?: string } = {}): void {
    safeReport(this.reporter, {
      kind,
      name: this.name,
      path: extra.path ?? this.paths.file,
      error,
      ...(extra.rescuePath ? { rescuePath: extra.rescuePath } : {}),
    }, log);
  }
}

/** Delete `<base>/<name>` and `<base>/backup/<name>`; quarantine copies stay. */
export function removeStorageFiles(paths: StoragePaths, name: string, reporter: ErrorReporter): void {
  for (const path of [paths.file, paths.backup]) {
    try {
      rmSync(path, { force: true });
    } catch (err) {
      safeReport(reporter, { kind: "io-failure", name, path, error: err }, log);
    }
  }
  log.info("store file removed", { file: name });
}
