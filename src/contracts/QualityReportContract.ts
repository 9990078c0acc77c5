import { Transaction, Info, Returns } from 'fabric-contract-api';
import { parseFlag, parseId, parseUint, UINT16_MAX, UINT8_MAX } from '../validation';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'QualityReportContract', description: 'Record and query crop quality test reports' })
export class QualityReportContract extends BaseContract {

    constructor() {
        super('QualityReportContract');
    }

    // Lab only. Returns the new report id.
    @Transaction()
    @Returns('string')
    async RecordReport(
        ctx: LedgerContext,
        farmer: string,
        cropType: string,
        region: string,
        contentRef: string,
        moisture: string,
        impurity: string,
        grainSize: string
    ): Promise<string> {
        const client = ctx.getClient();
        const report = await this.openLedger(ctx).reports.recordReport(client.id, {
            farmer,
            cropType,
            region,
            contentRef,
            moisture: parseUint('moisture', moisture, UINT8_MAX),
            impurity: parseUint('impurity', impurity, UINT16_MAX),
            grainSize: parseUint('grainSize', grainSize, UINT16_MAX)
        });
        return report.reportId.toString();
    }

    // Unknown ids, 0 included, return {"exists":false,...} instead of failing.
    @Transaction(false)
    @Returns('string')
    async GetReport(ctx: LedgerContext, reportId: string): Promise<string> {
        const id = parseUint('reportId', reportId, Number.MAX_SAFE_INTEGER);
        const lookup = await this.openLedger(ctx).reports.getReport(id);
        return JSON.stringify(lookup);
    }

    @Transaction(false)
    @Returns('string')
    async GetReportsByFarmer(ctx: LedgerContext, farmer: string): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).reports.reportsOf(farmer));
    }

    @Transaction(false)
    @Returns('string')
    async GetFarmerReportIds(ctx: LedgerContext, farmer: string): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).reports.reportIdsOf(farmer));
    }

    @Transaction(false)
    @Returns('string')
    async GetReportCount(ctx: LedgerContext): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).reports.count());
    }

    // Verifier only
    @Transaction()
    async MarkDisputed(ctx: LedgerContext, reportId: string, disputed: string): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).reports.markDisputed(
            client.id,
            parseId('reportId', reportId),
            parseFlag('disputed', disputed)
        );
    }
}
