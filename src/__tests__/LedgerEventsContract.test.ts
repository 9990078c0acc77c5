import 'reflect-metadata';
import { describe, test, expect, beforeEach } from '@jest/globals';
import { LedgerEventsContract } from '../contracts/LedgerEventsContract';
import { bootstrapContracts, ContractHarness } from './support/ContractHarness';
import { ADMIN, OUTSIDER, SENSOR, timestampOf } from './support/LedgerHarness';

describe('LedgerEventsContract', () => {
    const events = new LedgerEventsContract();
    let harness: ContractHarness;

    beforeEach(async () => {
        harness = await bootstrapContracts();
    });

    test('GetEvent returns one event by sequence number', async () => {
        expect(JSON.parse(await harness.evaluate(OUTSIDER, (ctx) => events.GetEvent(ctx, '6')))).toEqual({
            seq: 6,
            txId: 'tx-4',
            timestamp: timestampOf(4),
            type: 'RoleChanged',
            role: 'sensor',
            subject: SENSOR,
            caller: ADMIN,
            granted: true
        });
        await expect(harness.evaluate(OUTSIDER, (ctx) => events.GetEvent(ctx, '7')))
            .rejects.toThrow('InvalidInput: Event 7 does not exist');
    });

    test('GetEvents pages from a sequence number', async () => {
        const page = JSON.parse(await harness.evaluate(OUTSIDER, (ctx) => events.GetEvents(ctx, '2', '2')));
        expect(page.map((event: { seq: number; type: string }) => [event.seq, event.type])).toEqual([
            [2, 'PricingRulesUpdated'],
            [3, 'GradeThresholdsUpdated']
        ]);

        expect(await harness.evaluate(OUTSIDER, (ctx) => events.GetEvents(ctx, '7', '10'))).toBe('[]');
        expect(harness.logs).toContainEqual({
            logger: 'LedgerEventsContract',
            level: 'debug',
            message: 'Listed ledger events',
            meta: { fromSeq: 2, limit: 2, count: 2 }
        });
    });

    test('GetEvents caps the page size', async () => {
        const page = JSON.parse(await harness.evaluate(OUTSIDER, (ctx) => events.GetEvents(ctx, '5', '100')));
        expect(page).toHaveLength(2);
        await expect(harness.evaluate(OUTSIDER, (ctx) => events.GetEvents(ctx, '1', '101')))
            .rejects.toThrow('InvalidInput: limit must not exceed 100, got 101');
    });

    test('GetEventCount counts every event written', async () => {
        expect(await harness.evaluate(OUTSIDER, (ctx) => events.GetEventCount(ctx))).toBe('6');
    });
});
