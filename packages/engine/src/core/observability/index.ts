/**
 * Observability Module
 *
 * Captures errors and warnings that should reach an operator.
 * Follows the provider pattern — pluggable backends with a console default.
 *
 * Usage:
 *   captureException(error, { operation: "mkdir" });
 *   captureMessage("Permission denied", "warning", { folderPath: "/a" });
 *
 * Embedders route events to their own backend with setObservabilityProvider().
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Flush pending events to the backend (for graceful shutdown) */
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
    // Warnings and errors are already printed by the logger; only
    // fatal events are echoed here.
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

export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
