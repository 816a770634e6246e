export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface PollOptions {
  timeoutMs?: number;     // undefined waits forever
  pollMs: number;
}

/**
 * Re-evaluate `check` every `pollMs` until it returns true or the timeout elapses.
 * Resolves false on timeout; errors thrown by `check` propagate.
 */
export async function pollUntil(check: () => Promise<boolean> | boolean, options: PollOptions): Promise<boolean> {
  const start = Date.now();
  for (;;) {
    if (await check()) {
      return true;
    }
    if (options.timeoutMs !== undefined && Date.now() - start >= options.timeoutMs) {
      return false;
    }
    await sleep(options.pollMs);
  }
}
