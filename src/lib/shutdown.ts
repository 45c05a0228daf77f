import { createLogger } from "./logger.js";
import { flushAllStoresSync, destroyAllStores } from "../storage/registry.js";

const log = createLogger("shutdown");

type Signal = "SIGTERM" | "SIGINT";

export interface ShutdownTarget {
  on(event: Signal | "beforeExit", listener: () => void): unknown;
  off(event: Signal | "beforeExit", listener: () => void): unknown;
  exit(code?: number): unknown;
}

export interface ShutdownOptions {
  exitOnSignal?: boolean;   // default true: exit(0) after flushing on SIGTERM/SIGINT
}

/**
 * Flush every live store synchronously on SIGTERM, SIGINT and beforeExit.
 * Returns an uninstall function.
 */
export function installShutdownHandlers(target: ShutdownTarget = process, opts: ShutdownOptions = {}): () => void {
  const { exitOnSignal = true } = opts;

  // Graceful shutdown (idempotent)
  let shutdownCalled = false;
  const shutdown = (reason: string): void => {
    if (shutdownCalled) return;
    shutdownCalled = true;
    log.info(`${reason}, flushing stores`);
    flushAllStoresSync();
    destroyAllStores();
    log.info("all stores flushed");
  };

  const onTerm = (): void => { shutdown("SIGTERM received"); if (exitOnSignal) target.exit(0); };
  const onInt = (): void => { shutdown("SIGINT received"); if (exitOnSignal) target.exit(0); };
  const onBeforeExit = (): void => shutdown("process exiting");

  target.on("SIGTERM", onTerm);
  target.on("SIGINT", onInt);
  target.on("beforeExit", onBeforeExit);

  return () => {
    target.off("SIGTERM", onTerm);
    target.off("SIGINT", onInt);
    target.off("beforeExit", onBeforeExit);
  };
}
