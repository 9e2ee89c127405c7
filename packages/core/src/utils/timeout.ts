import { LatchkeyError } from "../errors";

/**
 * Races `task` against a timer. A timeout surfaces as `BACKEND_UNAVAILABLE`;
 * the underlying operation is not cancelled.
 */
export async function withTimeout<T>(task: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
        return task;
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<never>((_resolve, reject) => {
        timer = setTimeout(() => {
            reject(
                new LatchkeyError("BACKEND_UNAVAILABLE", "Session store timed out.", undefined, {
                    operation,
                    timeoutMs,
                })
            );
        }, timeoutMs);
    });

    try {
        return await Promise.race([task, timeout]);
    } finally {
        if (timer !== undefined) clearTimeout(timer);
    }
}
