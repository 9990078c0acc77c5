import { WorldState } from './WorldState';

export interface ChaincodeEvent {
    txId: string;
    name: string;
    payload: string;
}

interface PendingTransaction {
    txId: string;
    timestamp: Date;
    writes: Map<string, Uint8Array>;
    event?: { name: string; payload: Uint8Array };
}

/**
 * In-process world state with the peer's commit semantics: writes are staged per transaction,
 * invisible to reads until commit, and dropped if the transaction fails. Like a peer, only the
 * last event set by a transaction is delivered.
 */
export class MemoryWorldState implements WorldState {
    private readonly committed = new Map<string, Uint8Array>();
    private readonly delivered: ChaincodeEvent[] = [];
    private pending?: PendingTransaction;

    async transact<T>(txId: string, timestamp: Date, fn: (state: WorldState) => Promise<T>): Promise<T> {
        if (this.pending) {
            throw new Error(`Transaction ${this.pending.txId} is still in progress`);
        }
        const tx: PendingTransaction = { txId, timestamp, writes: new Map() };
        this.pending = tx;
        try {
            const result = await fn(this);
            for (const [key, value] of tx.writes) this.committed.set(key, value);
            if (tx.event) {
                this.delivered.push({
                    txId,
                    name: tx.event.name,
                    payload: Buffer.from(tx.event.payload).toString('utf8')
                });
            }
            return result;
        } finally {
            this.pending = undefined;
        }
    }

    async getState(key: string): Promise<Uint8Array> {
        const value = this.committed.get(key);
        return value ? Uint8Array.from(value) : new Uint8Array(0);
    }

    async putState(key: string, value: Uint8Array): Promise<void> {
        this.current('putState').writes.set(key, Uint8Array.from(value));
    }

    setEvent(name: string, payload: Uint8Array): void {
        this.current('setEvent').event = { name, payload: Uint8Array.from(payload) };
    }

    createCompositeKey(objectType: string, attributes: string[]): string {
        return `\u0000${objectType}\u0000${attributes.map((attribute) => `${attribute}\u0000`).join('')}`;
    }

    getTxID(): string {
        return this.current('getTxID').txId;
    }

    getDateTimestamp(): Date {
        return this.current('getDateTimestamp').timestamp;
    }

    get size(): number {
        return this.committed.size;
    }

    chaincodeEvents(): readonly ChaincodeEvent[] {
        return this.delivered;
    }

    private current(operation: string): PendingTransaction {
        if (!this.pending) throw new Error(`${operation} called outside a transaction`);
        return this.pending;
    }
}
