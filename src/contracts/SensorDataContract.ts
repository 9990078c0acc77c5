import { Transaction, Info, Returns } from 'fabric-contract-api';
import { parseUint } from '../validation';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'SensorDataContract', description: 'Append raw IoT sensor readings' })
export class SensorDataContract extends BaseContract {

    constructor() {
        super('SensorDataContract');
    }

    // Sensor role only. Returns the new record id.
    @Transaction()
    @Returns('string')
    async RecordSensorData(ctx: LedgerContext, sensorId: string, region: string, contentRef: string): Promise<string> {
        const client = ctx.getClient();
        const record = await this.openLedger(ctx).sensors.recordSensorData(client.id, { sensorId, region, contentRef });
        return record.recordId.toString();
    }

    @Transaction(false)
    @Returns('string')
    async GetSensorRecord(ctx: LedgerContext, recordId: string): Promise<string> {
        // 0 is a valid query; no record ever takes it
        const id = parseUint('recordId', recordId, Number.MAX_SAFE_INTEGER);
        return JSON.stringify(await this.openLedger(ctx).sensors.getRecord(id));
    }

    @Transaction(false)
    @Returns('string')
    async GetSensorRecordsByRegion(ctx: LedgerContext, region: string): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).sensors.recordsIn(region));
    }

    @Transaction(false)
    @Returns('string')
    async GetSensorRecordCount(ctx: LedgerContext): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).sensors.count());
    }
}
