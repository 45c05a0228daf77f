/**
 * Process-wide registry of live durable writers.
 *
 * - One writer per physical path: a second registration throws
 * - flushAllStores() / flushAllStoresSync() / destroyAllStores() for shutdown
 */

import { StoreMisuseError } from "./errors.js";

export interface RegisteredWriter {
  readonly path: string;
  remove(): void;
  flush(): Promise<void>;
  flushSync(): void;
  destroy(): void;
}

const live = new Map<string, RegisteredWriter>();

export function registerWriter(writer: RegisteredWriter): void {
  const existing = live.get(writer.path);
  if (existing && existing !== writer) {
    throw new StoreMisuseError(`a store is already open on ${writer.path}`);
  }
  live.set(writer.path, writer);
}

export function unregisterWriter(writer: RegisteredWriter): void {
  if (live.get(writer.path) === writer) live.delete(writer.path);
}

export function findWriter(path: string): RegisteredWriter | undefined {
  return live.get(path);
}

export function liveStorePaths(): string[] {
  return [...live.keys()];
}

/** Write every pending snapshot and wait for all queued writes. */
export async function flushAllStores(): Promise<void> {
  await Promise.all([...live.values()].map(w => w.flush()));
}

/** Synchronously flush every dirty store. Safe to call during SIGTERM. */
export function flushAllStoresSync(): void {
  for (const w of live.values()) w.flushSync();
}

/** Clear all debounce timers and release every path. Call after a flush during shutdown. */
export function destroyAllStores(): void {
  for (const w of [...live.values()]) w.destroy();
}
