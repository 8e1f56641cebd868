/**
 * Structured Logging
 *
 * One JSON object per line on the console. Warnings and errors are also
 * forwarded to the observability provider.
 *
 * Decision functions never log. Denials are logged where they are enforced
 * (reporter, REST adapter) through logDecision().
 */

import type { DenialReason, GrantSource, Logger, ModelAction } from "@arbor/contracts";
import { captureMessage } from "../observability/index.js";

/**
 * Creates a logger that prefixes every line with a context identifier.
 */
export function createLogger(context: string): Logger {
  return {
    info(message, data) {
      console.log(JSON.stringify({ level: "info", context, message, ...data }));
    },
    warn(message, data) {
      console.warn(JSON.stringify({ level: "warn", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "warning", data);
    },
    error(message, data) {
      console.error(JSON.stringify({ level: "error", context, message, ...data }));
      captureMessage(`[${context}] ${message}`, "error", data);
    },
    debug(message, data) {
      if (process.env.NODE_ENV !== "production") {
        console.debug(JSON.stringify({ level: "debug", context, message, ...data }));
      }
    },
  };
}

export interface DecisionLogEntry {
  instanceId: string;
  userId: string | null;
  action: ModelAction;
  modelType: string;
  objectId?: string;
  allowed: boolean;
  via?: GrantSource;
  reason?: DenialReason;
}

/**
 * Logs one enforced decision. Denials go to stderr.
 */
export function logDecision(entry: DecisionLogEntry): void {
  const line = JSON.stringify({
    level: entry.allowed ? "info" : "warn",
    context: "authz",
    event: "authz.decision",
    ...entry,
  });

  if (entry.allowed) {
    console.log(line);
  } else {
    console.warn(line);
  }
}
