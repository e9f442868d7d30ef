export class TimeoutError extends Error {
    public readonly name = 'TimeoutError';

    constructor(public readonly ms: number) {
        super(`Timed out after ${ms}ms`);
    }
}

/**
 * Settles with the promise, or rejects with a TimeoutError after `ms`.
 * The timer never outlives the race.
 */
export function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(ms)), ms);
    });
    return Promise.race([promise, deadline]).finally(() => clearTimeout(timer));
}
