import { ReentrantCallError } from '../errors';

/**
 * In-progress flag per entry point. The flag is set before the first read and cleared on every
 * exit path, so a nested call to the same entry point fails instead of interleaving.
 */
export class ReentrancyGuard {
    private readonly active = new Set<string>();

    async run<T>(entryPoint: string, fn: () => Promise<T>): Promise<T> {
        if (this.active.has(entryPoint)) throw new ReentrantCallError(entryPoint);
        this.active.add(entryPoint);
        try {
            return await fn();
        } finally {
            this.active.delete(entryPoint);
        }
    }
}
