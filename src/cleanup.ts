/**
 * Structured cleanup for transient resources (port-forwards, sessions).
 */

import type { LoggerService } from "@backstage/backend-plugin-api";

export type CleanupAction = () => Promise<void> | void;

export class CleanupScope {
  private readonly actions: { label: string; action: CleanupAction }[] = [];
  private closing?: Promise<void>;

  constructor(private readonly logger: LoggerService) {}

  register(label: string, action: CleanupAction): void {
    if (this.closing) {
      throw new Error(`Cannot register "${label}": cleanup already started`);
    }
    this.actions.push({ label, action });
  }

  get size(): number {
    return this.actions.length;
  }

  /**
   * Run every registered action, newest first. A failing action is logged
   * and does not stop the others. Safe to call more than once.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.runAll();
    }
    return this.closing;
  }

  private async runAll(): Promise<void> {
    while (this.actions.length > 0) {
      const entry = this.actions.pop();
      if (!entry) {
        break;
      }
      try {
        await entry.action();
        this.logger.debug(`Closed ${entry.label}`);
      } catch (error) {
        this.logger.warn(`Failed to close ${entry.label}: ${error}`);
      }
    }
  }
}

/**
 * Run `fn` with a fresh scope that is closed on every exit path.
 */
export async function withCleanup<T>(
  logger: LoggerService,
  fn: (scope: CleanupScope) => Promise<T>,
): Promise<T> {
  const scope = new CleanupScope(logger);
  try {
    return await fn(scope);
  } finally {
    await scope.close();
  }
}

// ============================================================================
// Signals
// ============================================================================

export const INTERRUPTED_EXIT_CODE = 130;

type SignalListener = (signal: NodeJS.Signals) => void;

interface SignalTarget {
  once(event: NodeJS.Signals, listener: SignalListener): unknown;
  removeListener(event: NodeJS.Signals, listener: SignalListener): unknown;
}

/**
 * Close `scope` when the process is interrupted, then exit. Returns a
 * function that removes the handlers.
 */
export function closeOnSignals(
  scope: CleanupScope,
  logger: LoggerService,
  exit: (code: number) => void = (code) => process.exit(code),
  target: SignalTarget = process,
): () => void {
  const handler: SignalListener = (signal) => {
    logger.warn(`Received ${signal}, closing open channels`);
    scope.close().then(
      () => exit(INTERRUPTED_EXIT_CODE),
      (error: unknown) => {
        logger.error(`Cleanup failed: ${error}`);
        exit(INTERRUPTED_EXIT_CODE);
      },
    );
  };

  target.once("SIGINT", handler);
  target.once("SIGTERM", handler);
  return () => {
    target.removeListener("SIGINT", handler);
    target.removeListener("SIGTERM", handler);
  };
}
