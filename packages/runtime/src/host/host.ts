/**
 * Host sink: where the runtime writes diagnostics and log lines, and how it
 * defers non-essential work to an idle tick.
 */

import {
  formatDiagnostic,
  type Diagnostic,
  type DiagnosticSeverity,
} from "../types/diagnostic.js";
import { describeError } from "./errors.js";

export type LogLevel = "silent" | "error" | "warning" | "info" | "debug";

export type Host = {
  readonly report: (diagnostic: Diagnostic) => void;
  readonly writeLine: (message: string) => void;
  readonly runLater: (action: () => void) => void;
};

export const LOG_LEVELS: readonly LogLevel[] = [
  "silent",
  "error",
  "warning",
  "info",
  "debug",
];

export const isLogLevel = (value: unknown): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

const severityLevel = (severity: DiagnosticSeverity): LogLevel =>
  severity === "error" ? "error" : severity === "warning" ? "warning" : "info";

export const shouldLog = (configured: LogLevel, wanted: LogLevel): boolean =>
  wanted !== "silent" &&
  LOG_LEVELS.indexOf(wanted) <= LOG_LEVELS.indexOf(configured);

/**
 * Drain a queue of deferred actions. A failing action is logged and does not
 * stop the rest, since nothing deferred is required for correctness.
 */
const drain = (
  queue: (() => void)[],
  onFailure: (failure: unknown) => void
): number => {
  let count = 0;
  while (queue.length > 0) {
    const action = queue.shift();
    if (!action) continue;
    count++;
    try {
      action();
    } catch (failure) {
      onFailure(failure);
    }
  }
  return count;
};

export const createConsoleHost = (level: LogLevel = "warning"): Host => {
  const queue: (() => void)[] = [];
  let scheduled = false;

  const writeLine = (message: string): void => {
    if (shouldLog(level, "info")) {
      console.log(message);
    }
  };

  return {
    report: (diagnostic) => {
      if (!shouldLog(level, severityLevel(diagnostic.severity))) return;
      const text = formatDiagnostic(diagnostic);
      if (diagnostic.severity === "error") {
        console.error(text);
      } else if (diagnostic.severity === "warning") {
        console.warn(text);
      } else {
        console.log(text);
      }
    },
    writeLine,
    runLater: (action) => {
      queue.push(action);
      if (scheduled) return;
      scheduled = true;
      const timer = setTimeout(() => {
        scheduled = false;
        drain(queue, (failure) => {
          console.error(`Deferred action failed: ${describeError(failure)}`);
        });
      }, 0);
      timer.unref();
    },
  };
};

export type RecordingHost = Host & {
  readonly diagnostics: readonly Diagnostic[];
  readonly lines: readonly string[];
  /** Run every deferred action now; returns how many ran. */
  readonly flush: () => number;
  readonly pending: () => number;
};

/**
 * In-memory host: keeps everything it is given and runs deferred actions only
 * when flushed.
 */
export const createRecordingHost = (): RecordingHost => {
  const diagnostics: Diagnostic[] = [];
  const lines: string[] = [];
  const queue: (() => void)[] = [];

  return {
    diagnostics,
    lines,
    report: (diagnostic) => {
      diagnostics.push(diagnostic);
    },
    writeLine: (message) => {
      lines.push(message);
    },
    runLater: (action) => {
      queue.push(action);
    },
    flush: () =>
      drain(queue, (failure) => {
        lines.push(`Deferred action failed: ${describeError(failure)}`);
      }),
    pending: () => queue.length,
  };
};
