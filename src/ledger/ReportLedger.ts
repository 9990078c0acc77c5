import { ReportNotFoundError } from '../errors';
import { assess } from '../engine/QualityEngine';
import { LedgerEventType } from '../models/LedgerEvent';
import { Role } from '../models/Role';
import { ReportLookup, ReportSubmission, TestReport } from '../models/TestReport';
import { MeasurementsSchema, requireText, validate } from '../validation';
import { LedgerServices } from './LedgerServices';
import { PricingStore } from './PricingStore';
import { RoleRegistry } from './RoleRegistry';
import { IdListSchema, TestReportSchema } from './schemas';
import { Sequence } from './Sequence';

/**
 * Append-only store of test reports, keyed by a sequential id and indexed by farmer in
 * submission order. Reports are never deleted; only `disputed` changes after creation.
 */
export class ReportLedger {
    private readonly sequence: Sequence;

    constructor(
        private readonly services: LedgerServices,
        private readonly roles: RoleRegistry,
        private readonly pricing: PricingStore
    ) {
        this.sequence = new Sequence(services.state, 'report');
    }

    async recordReport(caller: string, submission: ReportSubmission): Promise<TestReport> {
        return this.services.guard.run('recordReport', async () => {
            await this.roles.requireRole(Role.LAB, caller);
            const farmer = requireText('farmer', submission.farmer);
            const measurements = validate('measurements', submission, MeasurementsSchema);
            const region = submission.region.trim();

            const pricing = await this.pricing.snapshot(region);
            const { suggestedPrice, classification } = assess(measurements, pricing);

            // Every check is done; from here on the transaction only writes.
            const { state, events, logger } = this.services;
            const reportId = await this.sequence.next();
            const report: TestReport = {
                reportId,
                docType: 'testReport',
                farmer,
                cropType: submission.cropType,
                region,
                contentRef: submission.contentRef,
                moisture: measurements.moisture,
                impurity: measurements.impurity,
                grainSize: measurements.grainSize,
                lab: caller,
                createdAt: state.timestamp(),
                suggestedPrice,
                classification,
                disputed: false,
                pricing
            };

            await state.write(state.key('report', reportId), report);
            const farmerReports = await this.reportIdsOf(farmer);
            await state.write(state.key('farmerReports', farmer), [...farmerReports, reportId]);

            logger.info('Recorded test report', { reportId, farmer, lab: caller, suggestedPrice, classification });
            await events.emit({
                type: LedgerEventType.REPORT_RECORDED,
                reportId,
                farmer,
                lab: caller,
                contentRef: report.contentRef,
                suggestedPrice,
                moisture: report.moisture,
                impurity: report.impurity,
                grainSize: report.grainSize,
                classification
            });
            return report;
        });
    }

    async getReport(reportId: number): Promise<ReportLookup> {
        const { state } = this.services;
        const report = await state.read(state.key('report', reportId), TestReportSchema);
        this.services.logger.debug('Read test report', { reportId, exists: report !== undefined });
        return report ? { exists: true, report } : { exists: false, reportId };
    }

    async requireReport(reportId: number): Promise<TestReport> {
        const lookup = await this.getReport(reportId);
        if (!lookup.exists) throw new ReportNotFoundError(reportId);
        return lookup.report;
    }

    async reportIdsOf(farmer: string): Promise<number[]> {
        const { state } = this.services;
        return (await state.read(state.key('farmerReports', farmer.trim()), IdListSchema)) ?? [];
    }

    async reportsOf(farmer: string): Promise<TestReport[]> {
        const reports: TestReport[] = [];
        for (const reportId of await this.reportIdsOf(farmer)) {
            reports.push(await this.requireReport(reportId));
        }
        this.services.logger.debug('Listed farmer reports', { farmer: farmer.trim(), count: reports.length });
        return reports;
    }

    count(): Promise<number> {
        return this.sequence.current();
    }

    async markDisputed(caller: string, reportId: number, disputed = true): Promise<TestReport> {
        return this.services.guard.run('markDisputed', async () => {
            await this.roles.requireRole(Role.VERIFIER, caller);
            const report = await this.requireReport(reportId);
            const { state, events, logger } = this.services;

            const updated: TestReport = { ...report, disputed };
            await state.write(state.key('report', reportId), updated);

            logger.info('Updated dispute flag', { reportId, disputed, caller });
            await events.emit({ type: LedgerEventType.REPORT_DISPUTED, reportId, caller, disputed });
            return updated;
        });
    }
}
