import { LedgerEventType } from '../models/LedgerEvent';
import { Role } from '../models/Role';
import { SensorRecord, SensorRecordLookup, SensorSubmission } from '../models/SensorRecord';
import { requireText } from '../validation';
import { LedgerServices } from './LedgerServices';
import { RoleRegistry } from './RoleRegistry';
import { IdListSchema, SensorRecordSchema } from './schemas';
import { Sequence } from './Sequence';

// Raw IoT readings. Same append-only layout as reports, with its own id sequence.
export class SensorLedger {
    private readonly sequence: Sequence;

    constructor(
        private readonly services: LedgerServices,
        private readonly roles: RoleRegistry
    ) {
        this.sequence = new Sequence(services.state, 'sensorRecord');
    }

    async recordSensorData(caller: string, submission: SensorSubmission): Promise<SensorRecord> {
        return this.services.guard.run('recordSensorData', async () => {
            await this.roles.requireRole(Role.SENSOR, caller);
            const sensorId = requireText('sensorId', submission.sensorId);
            const region = requireText('region', submission.region);

            const { state, events, logger } = this.services;
            const recordId = await this.sequence.next();
            const record: SensorRecord = {
                recordId,
                docType: 'sensorRecord',
                sensorId,
                region,
                contentRef: submission.contentRef,
                submitter: caller,
                recordedAt: state.timestamp()
            };

            await state.write(state.key('sensorRecord', recordId), record);
            const regionRecords = await this.recordIdsIn(region);
            await state.write(state.key('regionSensorRecords', region), [...regionRecords, recordId]);

            logger.info('Recorded sensor data', { recordId, sensorId, region, submitter: caller });
            await events.emit({
                type: LedgerEventType.SENSOR_DATA_RECORDED,
                recordId,
                sensorId,
                region,
                contentRef: record.contentRef,
                submitter: caller
            });
            return record;
        });
    }

    async getRecord(recordId: number): Promise<SensorRecordLookup> {
        const { state } = this.services;
        const record = await state.read(state.key('sensorRecord', recordId), SensorRecordSchema);
        this.services.logger.debug('Read sensor record', { recordId, exists: record !== undefined });
        return record ? { exists: true, record } : { exists: false, recordId };
    }

    async recordIdsIn(region: string): Promise<number[]> {
        const { state } = this.services;
        return (await state.read(state.key('regionSensorRecords', region.trim()), IdListSchema)) ?? [];
    }

    async recordsIn(region: string): Promise<SensorRecord[]> {
        const records: SensorRecord[] = [];
        for (const recordId of await this.recordIdsIn(region)) {
            const lookup = await this.getRecord(recordId);
            if (lookup.exists) records.push(lookup.record);
        }
        this.services.logger.debug('Listed region sensor records', { region: region.trim(), count: records.length });
        return records;
    }

    count(): Promise<number> {
        return this.sequence.current();
    }
}
