import { createLogger, type Logger } from "../lib/logger.js";
import { errorCode, errorMessage } from "./errors.js";

export type FaultKind = "schema-incompatible" | "io-failure" | "backup-failure" | "write-failure";

export interface StorageFault {
  kind: FaultKind;
  name: string;
  path: string;
  error: unknown;
  rescuePath?: string;   // set for schema-incompatible when the quarantine move succeeded
}

/** Host-supplied sink for classified storage failures (log, UI, metric). */
export interface ErrorReporter {
  report(fault: StorageFault): void;
}

const WARN_KINDS: ReadonlySet<FaultKind> = new Set(["schema-incompatible", "backup-failure"]);

export function createLogReporter(log: Logger = createLogger("store")): ErrorReporter {
  return {
    report(fault) {
      const meta: Record<string, unknown> = {
        kind: fault.kind,
        file: fault.name,
        path: fault.path,
        error: errorMessage(fault.error),
      };
      const code = errorCode(fault.error);
      if (code) meta["code"] = code;
      if (fault.rescuePath) meta["rescuePath"] = fault.rescuePath;

      if (WARN_KINDS.has(fault.kind)) {
        log.warn(`store ${fault.kind}`, meta);
      } else {
        log.error(`store ${fault.kind}`, meta);
      }
    },
  };
}

/** Deliver a fault without letting a faulty reporter break the store. */
export function safeReport(reporter: ErrorReporter, fault: StorageFault, log: Logger): void {
  try {
    reporter.report(fault);
  } catch (err) {
    log.error("error reporter threw", { file: fault.name, kind: fault.kind, error: errorMessage(err) });
  }
}
