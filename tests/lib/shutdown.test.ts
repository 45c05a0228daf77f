import { EventEmitter } from "events";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { rmSync } from "fs";
import { join } from "path";
import { installShutdownHandlers } from "../../src/lib/shutdown.js";
import { ObjectStore } from "../../src/storage/object-store.js";
import { destroyAllStores, liveStorePaths } from "../../src/storage/registry.js";
import { makeTempDir, readEnvelopeData, recordingReporter } from "../helpers/fixtures.js";

class FakeProcess extends EventEmitter {
  exit = vi.fn();
}

describe("installShutdownHandlers", () => {
  let tempDir: string;
  let store: ObjectStore<{ open: number }>;

  beforeEach(() => {
    tempDir = makeTempDir();
    store = new ObjectStore<{ open: number }>({ baseDir: tempDir, debounceMs: 60_000, reporter: recordingReporter() });
    store.init({ open: 1 }, "Session");
  });

  afterEach(() => {
    destroyAllStores();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("flushes pending writes and exits on SIGTERM", () => {
    const proc = new FakeProcess();
    installShutdownHandlers(proc);
    store.save({ open: 2 });

    proc.emit("SIGTERM");

    expect(readEnvelopeData(join(tempDir, "Session"))).toEqual({ open: 2 });
    expect(liveStorePaths()).toEqual([]);
    expect(proc.exit).toHaveBeenCalledWith(0);
  });

  it("flushes on beforeExit without exiting", () => {
    const proc = new FakeProcess();
    installShutdownHandlers(proc);
    store.save();

    proc.emit("beforeExit");

    expect(readEnvelopeData(join(tempDir, "Session"))).toEqual({ open: 1 });
    expect(proc.exit).not.toHaveBeenCalled();
  });

  it("runs once even when several signals arrive", () => {
    const proc = new FakeProcess();
    installShutdownHandlers(proc, { exitOnSignal: false });
    store.save();

    proc.emit("SIGINT");
    proc.emit("SIGTERM");

    expect(store.stats.commits).toBe(1);
    expect(proc.exit).not.toHaveBeenCalled();
  });

  it("returns an uninstaller", () => {
    const proc = new FakeProcess();
    const uninstall = installShutdownHandlers(proc);

    uninstall();

    expect(proc.listenerCount("SIGTERM")).toBe(0);
    expect(proc.listenerCount("SIGINT")).toBe(0);
    expect(proc.listenerCount("beforeExit")).toBe(0);
  });
});
