import { PricingSnapshot } from './PricingRules';

export enum Grade {
    A = 'A',
    B = 'B',
    C = 'C'
}

export interface Measurements {
    moisture: number;       // uint8
    impurity: number;       // uint16
    grainSize: number;      // uint16
}

export interface ReportSubmission extends Measurements {
    farmer: string;
    cropType: string;       // e.g. "WHEAT_DURUM"
    region: string;
    contentRef: string;     // Off-ledger certificate pointer, never interpreted
}

export interface TestReport extends ReportSubmission {
    reportId: number;
    docType: 'testReport';
    lab: string;            // Client identity that submitted the report
    createdAt: string;
    suggestedPrice: number;
    classification: Grade;
    disputed: boolean;      // The only field that may change after creation
    pricing: PricingSnapshot;
}

export type ReportLookup =
    | { exists: true; report: TestReport }
    | { exists: false; reportId: number };
