import { UpstreamTimeoutError } from './errors';

/**
 * Races `work` against a timer. `onTimeout` runs before the rejection so the
 * caller can abort the upstream request that is still in flight.
 */
export async function withTimeout<T>(
    work: Promise<T>,
    timeoutMs: number,
    stage: 'embedding' | 'generation',
    onTimeout?: () => void,
): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
        timer = setTimeout(() => {
            onTimeout?.();
            reject(new UpstreamTimeoutError(stage, timeoutMs));
        }, timeoutMs);
    });
    try {
        return await Promise.race([work, timeout]);
    } finally {
        clearTimeout(timer);
    }
}

/**
 * Runs tasks one at a time per key, in submission order. Tasks under
 * different keys run concurrently.
 */
export class KeyedSerialQueue {
    private readonly tails = new Map<string, Promise<void>>();

    run<T>(key: string, task: () => Promise<T>): Promise<T> {
        const previous = this.tails.get(key) ?? Promise.resolve();
        const result = previous.then(task);
        // the tail only tracks completion; the task's own error reaches the caller through `result`
        const tail = result.then(
            () => undefined,
            () => undefined,
        );
        this.tails.set(key, tail);
        void tail.then(() => {
            if (this.tails.get(key) === tail) this.tails.delete(key);
        });
        return result;
    }
}
