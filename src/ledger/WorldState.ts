import { z } from 'zod';

/**
 * The part of Fabric's ChaincodeStub the ledger relies on. `ctx.stub` satisfies it directly;
 * MemoryWorldState provides it in process.
 */
export interface WorldState {
    getState(key: string): Promise<Uint8Array>;
    putState(key: string, value: Uint8Array): Promise<void>;
    setEvent(name: string, payload: Uint8Array): void;
    createCompositeKey(objectType: string, attributes: string[]): string;
    getTxID(): string;
    getDateTimestamp(): Date;
}

export function printableKey(key: string): string {
    return key.split('\u0000').filter((part) => part.length > 0).join('/');
}

/**
 * JSON view of the world state for a single transaction.
 *
 * Fabric does not return a transaction's own writes from getState, so values written here are
 * remembered and served back to later reads in the same transaction.
 */
export class LedgerState {
    private readonly written = new Map<string, Uint8Array>();

    constructor(private readonly world: WorldState) {}

    key(objectType: string, ...attributes: Array<string | number>): string {
        return this.world.createCompositeKey(objectType, attributes.map(String));
    }

    async read<T>(key: string, schema: z.ZodType<T>): Promise<T | undefined> {
        const data = this.written.get(key) ?? await this.world.getState(key);
        if (!data || data.length === 0) return undefined;

        const value: unknown = JSON.parse(Buffer.from(data).toString('utf8'));
        const parsed = schema.safeParse(value);
        if (!parsed.success) {
            throw new Error(`State at ${printableKey(key)} does not match its schema: ${parsed.error.message}`);
        }
        return parsed.data;
    }

    async write(key: string, value: unknown): Promise<void> {
        const data = Buffer.from(JSON.stringify(value));
        this.written.set(key, data);
        await this.world.putState(key, data);
    }

    publish(name: string, payload: unknown): void {
        this.world.setEvent(name, Buffer.from(JSON.stringify(payload)));
    }

    txId(): string {
        return this.world.getTxID();
    }

    timestamp(): string {
        return this.world.getDateTimestamp().toISOString();
    }
}
