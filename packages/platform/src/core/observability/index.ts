/**
 * Observability Module
 *
 * Captures unexpected errors and operational messages.
 * Follows the provider pattern: a pluggable backend behind two functions,
 * with a structured console provider as the default.
 *
 * Usage:
 *   captureException(error, { userId: "u1", instanceId: "i1" });
 *   captureMessage("Role snapshot reload failed", "warning", { instanceId });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Tags attached to every event for filtering */
export interface ObservabilityContext {
  userId?: string | null;
  instanceId?: string;
  [key: string]: unknown;
}

export interface ObservabilityProvider {
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        message: error.message,
        errorName: error.name,
        stack: error.stack,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    // warn/error lines are already written by the logger that forwarded them
    if (level !== "fatal") return;
    console.error(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  async flush(): Promise<void> {
    // console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(
  error: Error,
  context?: ObservabilityContext
): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

/** Override the provider (for testing or a hosted backend) */
export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Reset to the console provider (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
