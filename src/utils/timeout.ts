/**
 * Raised by withTimeout when the wrapped promise does not settle in time
 */
export class TimeoutError extends Error {
    public readonly timeoutMs: number;

    constructor(message: string, timeoutMs: number) {
        super(message);
        this.name = 'TimeoutError';
        this.timeoutMs = timeoutMs;
    }
}

/**
 * Race a promise against a timer.
 * The timer is cleared once the promise settles so nothing is left pending.
 */
export async function withTimeout<T>(
    promise: Promise<T>,
    timeoutMs: number,
    label: string = 'operation'
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            reject(new TimeoutError(`${label} timed out after ${timeoutMs}ms`, timeoutMs));
        }, timeoutMs);
    });

    try {
        return await Promise.race([promise, timeout]);
    } finally {
        clearTimeout(timer);
    }
}
