import { describe, test, expect, beforeEach } from '@jest/globals';
import { InvalidInputError, NotAuthorizedError, ReentrantCallError, ReportNotFoundError } from '../errors';
import { assess } from '../engine/QualityEngine';
import { LedgerEventType } from '../models/LedgerEvent';
import { Grade } from '../models/TestReport';
import { bootstrap, DEFAULTS, FARMER, LAB, LedgerHarness, OUTSIDER, SAMPLE, timestampOf, VERIFIER, ADMIN } from './support/LedgerHarness';

describe('ReportLedger', () => {
    let harness: LedgerHarness;

    beforeEach(async () => {
        harness = await bootstrap();
    });

    test('records a priced and graded report', async () => {
        const report = await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));

        expect(report).toEqual({
            reportId: 1,
            docType: 'testReport',
            farmer: FARMER,
            cropType: 'WHEAT',
            region: 'north',
            contentRef: 'test-cert-1',
            moisture: 15,
            impurity: 250,
            grainSize: 420,
            lab: LAB,
            createdAt: timestampOf(5),
            suggestedPrice: 994,
            classification: Grade.B,
            disputed: false,
            pricing: {
                rules: DEFAULTS.pricing,
                thresholds: DEFAULTS.thresholds,
                regionMultiplier: 0,
                regionBasePrice: 0
            }
        });
        expect(await harness.read().reports.getReport(1)).toEqual({ exists: true, report });
    });

    test('emits ReportRecorded with the measurements, price and grade', async () => {
        await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));

        expect(await harness.read().events.get(7)).toEqual({
            seq: 7,
            txId: 'tx-5',
            timestamp: timestampOf(5),
            type: LedgerEventType.REPORT_RECORDED,
            reportId: 1,
            farmer: FARMER,
            lab: LAB,
            contentRef: 'test-cert-1',
            suggestedPrice: 994,
            moisture: 15,
            impurity: 250,
            grainSize: 420,
            classification: Grade.B
        });
        const delivered = harness.world.chaincodeEvents();
        expect(delivered[delivered.length - 1].name).toBe('ReportRecorded');
    });

    test('assigns increasing ids and indexes them per farmer in order', async () => {
        const other = 'farmer-002';
        const first = await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));
        const second = await harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...SAMPLE, farmer: other }));
        const third = await harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...SAMPLE, moisture: 10 }));

        expect([first.reportId, second.reportId, third.reportId]).toEqual([1, 2, 3]);

        const ledger = harness.read();
        expect(await ledger.reports.count()).toBe(3);
        expect(await ledger.reports.reportIdsOf(FARMER)).toEqual([1, 3]);
        expect(await ledger.reports.reportIdsOf(other)).toEqual([2]);
        expect((await ledger.reports.reportsOf(FARMER)).map((report) => report.moisture)).toEqual([15, 10]);
        expect(await ledger.reports.reportIdsOf('farmer-unknown')).toEqual([]);
    });

    test('several reports in one transaction read their own sequence writes', async () => {
        const ids = await harness.submit(async (ledger) => {
            const a = await ledger.reports.recordReport(LAB, SAMPLE);
            const b = await ledger.reports.recordReport(LAB, SAMPLE);
            return [a.reportId, b.reportId];
        });
        expect(ids).toEqual([1, 2]);
        expect(await harness.read().reports.reportIdsOf(FARMER)).toEqual([1, 2]);
    });

    test('rejects callers without the lab role before allocating an id', async () => {
        const result = await harness.submit(async (ledger) => {
            await expect(ledger.reports.recordReport(OUTSIDER, SAMPLE)).rejects.toThrow(NotAuthorizedError);
            await expect(ledger.reports.recordReport(ADMIN, SAMPLE)).rejects.toThrow(NotAuthorizedError);
            const countAfterRejection = await ledger.reports.count();
            const report = await ledger.reports.recordReport(LAB, SAMPLE);
            return { countAfterRejection, reportId: report.reportId };
        });
        expect(result).toEqual({ countAfterRejection: 0, reportId: 1 });
    });

    test('rejects a missing farmer before allocating an id', async () => {
        const result = await harness.submit(async (ledger) => {
            await expect(ledger.reports.recordReport(LAB, { ...SAMPLE, farmer: '' }))
                .rejects.toThrow('InvalidInput: farmer must not be empty');
            await expect(ledger.reports.recordReport(LAB, { ...SAMPLE, farmer: '   ' }))
                .rejects.toThrow(InvalidInputError);
            const countAfterRejection = await ledger.reports.count();
            const report = await ledger.reports.recordReport(LAB, SAMPLE);
            return { countAfterRejection, reportId: report.reportId };
        });
        expect(result).toEqual({ countAfterRejection: 0, reportId: 1 });
    });

    test('rejects measurements outside their integer ranges', async () => {
        await expect(harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...SAMPLE, moisture: 256 })))
            .rejects.toThrow(InvalidInputError);
        await expect(harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...SAMPLE, impurity: -1 })))
            .rejects.toThrow(InvalidInputError);
        await expect(harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...SAMPLE, grainSize: 420.5 })))
            .rejects.toThrow(InvalidInputError);
        expect(await harness.read().reports.count()).toBe(0);
    });

    test('keeps the price it was created with after the rules change', async () => {
        await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));
        await harness.submit((ledger) => ledger.pricing.setRules(ADMIN, { ...DEFAULTS.pricing, basePrice: 2000 }));
        const later = await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));

        const lookup = await harness.read().reports.getReport(1);
        if (!lookup.exists) throw new Error('report 1 should exist');
        const original = lookup.report;

        expect(original.suggestedPrice).toBe(994);
        expect(assess(original, original.pricing)).toEqual({
            suggestedPrice: original.suggestedPrice,
            classification: original.classification
        });
        expect(later.suggestedPrice).toBe(1994);
        expect(later.pricing.rules.basePrice).toBe(2000);
    });

    test('applies the region multiplier and base price active at submission', async () => {
        await harness.submit((ledger) => ledger.pricing.setRegionMultiplier(ADMIN, 'south', 150));
        await harness.submit((ledger) => ledger.pricing.setRegionBasePrice(ADMIN, 'east', 1200));
        const clean = { ...SAMPLE, moisture: 12, impurity: 0, grainSize: 400 };

        const south = await harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...clean, region: 'south' }));
        const east = await harness.submit((ledger) => ledger.reports.recordReport(LAB, { ...clean, region: 'east' }));

        expect(south.suggestedPrice).toBe(1500);
        expect(south.classification).toBe(Grade.A);
        expect(south.pricing.regionMultiplier).toBe(150);
        expect(east.suggestedPrice).toBe(1200);
        expect(east.pricing.regionBasePrice).toBe(1200);
    });

    test('stores the trimmed region it was priced under', async () => {
        await harness.submit((ledger) => ledger.pricing.setRegionMultiplier(ADMIN, 'south', 150));
        const report = await harness.submit((ledger) =>
            ledger.reports.recordReport(LAB, { ...SAMPLE, region: ' south ', moisture: 12, impurity: 0, grainSize: 400 })
        );

        expect(report.region).toBe('south');
        expect(report.suggestedPrice).toBe(1500);
        expect((await harness.read().reports.requireReport(1)).region).toBe('south');
    });

    test('returns an explicit not-found result for unknown ids', async () => {
        expect(await harness.read().reports.getReport(99)).toEqual({ exists: false, reportId: 99 });
        await expect(harness.read().reports.requireReport(99)).rejects.toThrow(ReportNotFoundError);
    });

    test('a failed transaction leaves no report behind and its id is handed out again', async () => {
        await expect(harness.submit(async (ledger) => {
            ledger.events.subscribe(() => {
                throw new Error('observer failed');
            });
            return ledger.reports.recordReport(LAB, SAMPLE);
        })).rejects.toThrow('observer failed');

        expect(await harness.read().reports.count()).toBe(0);
        expect(await harness.read().reports.getReport(1)).toEqual({ exists: false, reportId: 1 });

        const report = await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));
        expect(report.reportId).toBe(1);
    });

    test('rejects a recordReport re-entered from an event observer', async () => {
        const rejections: unknown[] = [];
        const report = await harness.submit(async (ledger) => {
            ledger.events.subscribe(async (event) => {
                if (event.type !== LedgerEventType.REPORT_RECORDED) return;
                try {
                    await ledger.reports.recordReport(LAB, SAMPLE);
                } catch (err) {
                    rejections.push(err);
                }
            });
            return ledger.reports.recordReport(LAB, SAMPLE);
        });

        expect(report.reportId).toBe(1);
        expect(rejections).toHaveLength(1);
        expect(rejections[0]).toBeInstanceOf(ReentrantCallError);
        expect(await harness.read().reports.count()).toBe(1);
    });

    describe('markDisputed', () => {
        beforeEach(async () => {
            await harness.submit((ledger) => ledger.reports.recordReport(LAB, SAMPLE));
        });

        test('lets a verifier flag a report without touching other fields', async () => {
            const before = await harness.read().reports.requireReport(1);
            await harness.submit((ledger) => ledger.reports.markDisputed(VERIFIER, 1));
            const after = await harness.read().reports.requireReport(1);

            expect(after).toEqual({ ...before, disputed: true });
            expect(await harness.read().events.get(8)).toMatchObject({
                type: LedgerEventType.REPORT_DISPUTED,
                reportId: 1,
                caller: VERIFIER,
                disputed: true
            });
        });

        test('can clear the flag again', async () => {
            await harness.submit((ledger) => ledger.reports.markDisputed(VERIFIER, 1, true));
            await harness.submit((ledger) => ledger.reports.markDisputed(VERIFIER, 1, false));
            expect((await harness.read().reports.requireReport(1)).disputed).toBe(false);
        });

        test('is limited to verifiers', async () => {
            await expect(harness.submit((ledger) => ledger.reports.markDisputed(LAB, 1)))
                .rejects.toThrow(NotAuthorizedError);
            expect((await harness.read().reports.requireReport(1)).disputed).toBe(false);
        });

        test('fails for unknown reports', async () => {
            await expect(harness.submit((ledger) => ledger.reports.markDisputed(VERIFIER, 2)))
                .rejects.toThrow('ReportNotFound: Report 2 does not exist');
        });
    });
});
