import type { StopToken } from "./stop-token.js";

export type RetryOptions = {
  /** Fixed pause between attempts. */
  delayMs: number;
  token: StopToken;
};

/** Sleep for `ms`, waking early if `token` is stopped. */
export function sleep(ms: number, token?: StopToken): Promise<void> {
  return new Promise((resolve) => {
    let unsubscribe = () => {};
    const timer = setTimeout(() => {
      unsubscribe();
      resolve();
    }, ms);
    if (token) {
      unsubscribe = token.onStop(() => {
        clearTimeout(timer);
        resolve();
      });
    }
  });
}

/**
 * Run `fn` again and again until the token is stopped, pausing `delayMs`
 * between attempts. Errors thrown by `fn` propagate. Resolves with the number
 * of attempts made.
 */
export async function retryUntilStopped(
  fn: (attempt: number) => Promise<void>,
  opts: RetryOptions,
): Promise<number> {
  let attempt = 0;
  while (!opts.token.stopped) {
    attempt++;
    await fn(attempt);
    if (opts.token.stopped) break;
    await sleep(opts.delayMs, opts.token);
  }
  return attempt;
}
