import { Transaction, Info, Returns } from 'fabric-contract-api';
import { InvalidInputError } from '../errors';
import { parseId, parseUint } from '../validation';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

const MAX_PAGE = 100;

@Info({ title: 'LedgerEventsContract', description: 'Read the ordered log of state changes' })
export class LedgerEventsContract extends BaseContract {

    constructor() {
        super('LedgerEventsContract');
    }

    @Transaction(false)
    @Returns('string')
    async GetEvent(ctx: LedgerContext, seq: string): Promise<string> {
        const id = parseId('seq', seq);
        const event = await this.openLedger(ctx).events.get(id);
        if (!event) throw new InvalidInputError(`Event ${id} does not exist`);
        return JSON.stringify(event);
    }

    @Transaction(false)
    @Returns('string')
    async GetEvents(ctx: LedgerContext, fromSeq: string, limit: string): Promise<string> {
        const events = await this.openLedger(ctx).events.list(
            parseId('fromSeq', fromSeq),
            parseUint('limit', limit, MAX_PAGE)
        );
        return JSON.stringify(events);
    }

    @Transaction(false)
    @Returns('string')
    async GetEventCount(ctx: LedgerContext): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).events.count());
    }
}
