import { sleep } from "./misc.js";
import type { Result, RetryPolicy } from "./result.js";

/**
 * Run `attempt` until it succeeds or the policy's attempts are used up.
 *
 * States: attempt n → ok (return) | failed and n < max (report, sleep, n + 1)
 * | failed and n = max (report, return the last failure).
 *
 * @param attempt - One try; receives the 1-based attempt number
 * @param onFailure - Called once per failed attempt, including the last one
 * @returns The first success, or the failure of the final attempt
 */
export const retryAttempts = async <T, E>(
    attempt: (tries: number) => Promise<Result<T, E>>,
    policy: RetryPolicy,
    onFailure?: (error: E, tries: number, maxAttempts: number) => void,
): Promise<Result<T, E>> => {
    const maxAttempts = Math.max(1, Math.floor(policy.retries));
    let tries = 1;
    for (;;) {
        const result = await attempt(tries);
        if (result.ok) {
            return result;
        }
        onFailure?.(result.error, tries, maxAttempts);
        if (tries >= maxAttempts) {
            return result;
        }
        tries++;
        await sleep(policy.retrySleep);
    }
};
