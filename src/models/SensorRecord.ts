export interface SensorSubmission {
    sensorId: string;
    region: string;
    contentRef: string;
}

export interface SensorRecord extends SensorSubmission {
    recordId: number;
    docType: 'sensorRecord';
    submitter: string;
    recordedAt: string;
}

export type SensorRecordLookup =
    | { exists: true; record: SensorRecord }
    | { exists: false; recordId: number };
