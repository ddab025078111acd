/**
 * Core Utility Functions
 *
 * Async helpers shared by the oracle client and the retry loops.
 */

/**
 * Sleep for a specified duration
 *
 * @param ms - Duration to sleep in milliseconds; 0 or less resolves on the next tick
 * @returns Promise that resolves to true after the delay
 *
 * @example
 * await sleep(1000); // Wait for 1 second
 */
export const sleep = (ms: number) =>
    new Promise<true>((resolve) => {
        const timeout = setTimeout(
            () => {
                clearTimeout(timeout);
                resolve(true);
            },
            Math.max(0, ms),
        );
    });

/**
 * Race a promise against a timeout
 *
 * The timer is always cleared, so a settled race leaves nothing pending.
 *
 * @param promise - Promise to race against timeout
 * @param time - Timeout duration in milliseconds
 * @param timeoutError - Error to throw on timeout
 * @returns Promise result if it completes in time
 * @throws {Error} timeoutError if timeout is exceeded
 */
export const promiseWithTimeout = async <T>(
    promise: Promise<T>,
    time: number,
    timeoutError = new Error(`Timed out after ${time}ms`),
) => {
    let pid: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        pid = setTimeout(() => {
            reject(timeoutError);
        }, time);
    });
    try {
        return await Promise.race<T>([promise, timeout]);
    } finally {
        clearTimeout(pid);
    }
};

/** Describe an unknown thrown value in one line. */
export const describeError = (error: unknown) =>
    error instanceof Error
        ? `${error.name}: ${error.message}`
        : typeof error === "string"
          ? error
          : (JSON.stringify(error) ?? String(error));
