/**
 * Bounded readiness waits.
 */

import { ProvisioningTimeout } from "./errors";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface WaitOptions {
  description: string;
  timeoutMs: number;
  intervalMs: number;
  clock?: Clock;
}

/**
 * Poll `check` until it returns true. The last check happens at the deadline
 * at the latest; after that the wait fails with {@link ProvisioningTimeout}.
 * Errors thrown by `check` propagate.
 */
export async function waitFor(
  check: () => Promise<boolean>,
  options: WaitOptions,
): Promise<void> {
  const clock = options.clock ?? systemClock;
  const deadline = clock.now() + options.timeoutMs;

  for (;;) {
    if (await check()) {
      return;
    }

    const remaining = deadline - clock.now();
    if (remaining <= 0) {
      throw new ProvisioningTimeout(options.description, options.timeoutMs);
    }
    await clock.sleep(Math.min(options.intervalMs, remaining));
  }
}

/** Race a promise against a timer; used to bound individual probes. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  description: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ProvisioningTimeout(description, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
