import { describe, test, expect, beforeEach } from '@jest/globals';
import { LedgerEvent, LedgerEventType } from '../models/LedgerEvent';
import { Role } from '../models/Role';
import { ADMIN, bootstrap, LedgerHarness, OUTSIDER } from './support/LedgerHarness';

describe('EventLog', () => {
    let harness: LedgerHarness;

    beforeEach(async () => {
        harness = await bootstrap();
    });

    test('listeners see every event emitted while subscribed', async () => {
        const seen: LedgerEvent[] = [];
        await harness.submit(async (ledger) => {
            ledger.events.subscribe((event) => {
                seen.push(event);
            });
            await ledger.roles.grant(ADMIN, Role.ORACLE, OUTSIDER);
            await ledger.roles.revoke(ADMIN, Role.ORACLE, OUTSIDER);
        });

        expect(seen.map((event) => [event.seq, event.type])).toEqual([
            [7, LedgerEventType.ROLE_CHANGED],
            [8, LedgerEventType.ROLE_CHANGED]
        ]);
    });

    test('the returned function unsubscribes the listener', async () => {
        const seen: number[] = [];
        await harness.submit(async (ledger) => {
            const unsubscribe = ledger.events.subscribe((event) => {
                seen.push(event.seq);
            });
            await ledger.roles.grant(ADMIN, Role.ORACLE, OUTSIDER);
            unsubscribe();
            unsubscribe();
            await ledger.roles.revoke(ADMIN, Role.ORACLE, OUTSIDER);
        });

        expect(seen).toEqual([7]);
        expect(await harness.read().events.count()).toBe(8);
    });

    test('list clamps to the written range', async () => {
        const ledger = harness.read();
        expect((await ledger.events.list(0, 2)).map((event) => event.seq)).toEqual([1]);
        expect((await ledger.events.list(5, 10)).map((event) => event.seq)).toEqual([5, 6]);
        expect(await ledger.events.list(7, 10)).toEqual([]);
    });
});
