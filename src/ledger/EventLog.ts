import { LedgerEvent, LedgerEventBody } from '../models/LedgerEvent';
import { LedgerLogger } from './LedgerLogger';
import { LedgerState } from './WorldState';
import { LedgerEventSchema } from './schemas';
import { Sequence } from './Sequence';

export type EventListener = (event: LedgerEvent) => void | Promise<void>;

export class EventLog {
    private readonly sequence: Sequence;
    private readonly listeners: EventListener[] = [];

    constructor(private readonly state: LedgerState, private readonly logger: LedgerLogger) {
        this.sequence = new Sequence(state, 'event');
    }

    // Listeners run inside the emitting operation; an error they throw fails that operation.
    subscribe(listener: EventListener): () => void {
        this.listeners.push(listener);
        return () => {
            const index = this.listeners.indexOf(listener);
            if (index >= 0) this.listeners.splice(index, 1);
        };
    }

    async emit(body: LedgerEventBody): Promise<LedgerEvent> {
        const seq = await this.sequence.next();
        const event: LedgerEvent = { seq, txId: this.state.txId(), timestamp: this.state.timestamp(), ...body };

        await this.state.write(this.state.key('event', seq), event);
        this.state.publish(body.type, event);

        for (const listener of [...this.listeners]) {
            await listener(event);
        }
        return event;
    }

    async get(seq: number): Promise<LedgerEvent | undefined> {
        return this.state.read(this.state.key('event', seq), LedgerEventSchema);
    }

    count(): Promise<number> {
        return this.sequence.current();
    }

    async list(fromSeq: number, limit: number): Promise<LedgerEvent[]> {
        const last = Math.min(await this.count(), fromSeq + limit - 1);
        const events: LedgerEvent[] = [];
        for (let seq = Math.max(fromSeq, 1); seq <= last; seq++) {
            const event = await this.get(seq);
            if (event) events.push(event);
        }
        this.logger.debug('Listed ledger events', { fromSeq, limit, count: events.length });
        return events;
    }
}
