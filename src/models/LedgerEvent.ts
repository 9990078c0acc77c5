import { Role } from './Role';
import { Grade } from './TestReport';
import { GradeThresholds, PricingRules } from './PricingRules';

export enum LedgerEventType {
    ROLE_CHANGED = 'RoleChanged',
    REPORT_RECORDED = 'ReportRecorded',
    REPORT_DISPUTED = 'ReportDisputed',
    SENSOR_DATA_RECORDED = 'SensorDataRecorded',
    PRICING_RULES_UPDATED = 'PricingRulesUpdated',
    GRADE_THRESHOLDS_UPDATED = 'GradeThresholdsUpdated',
    REGION_MULTIPLIER_UPDATED = 'RegionMultiplierUpdated',
    REGION_BASE_PRICE_UPDATED = 'RegionBasePriceUpdated'
}

export interface RoleChanged {
    type: LedgerEventType.ROLE_CHANGED;
    role: Role;
    subject: string;
    caller: string;
    granted: boolean;
}

export interface ReportRecorded {
    type: LedgerEventType.REPORT_RECORDED;
    reportId: number;
    farmer: string;
    lab: string;
    contentRef: string;
    suggestedPrice: number;
    moisture: number;
    impurity: number;
    grainSize: number;
    classification: Grade;
}

export interface ReportDisputed {
    type: LedgerEventType.REPORT_DISPUTED;
    reportId: number;
    caller: string;
    disputed: boolean;
}

export interface SensorDataRecorded {
    type: LedgerEventType.SENSOR_DATA_RECORDED;
    recordId: number;
    sensorId: string;
    region: string;
    contentRef: string;
    submitter: string;
}

export interface PricingRulesUpdated {
    type: LedgerEventType.PRICING_RULES_UPDATED;
    caller: string;
    rules: PricingRules;
}

export interface GradeThresholdsUpdated {
    type: LedgerEventType.GRADE_THRESHOLDS_UPDATED;
    caller: string;
    thresholds: GradeThresholds;
}

export interface RegionMultiplierUpdated {
    type: LedgerEventType.REGION_MULTIPLIER_UPDATED;
    caller: string;
    region: string;
    multiplier: number;
}

export interface RegionBasePriceUpdated {
    type: LedgerEventType.REGION_BASE_PRICE_UPDATED;
    caller: string;
    region: string;
    basePrice: number;
}

export type LedgerEventBody =
    | RoleChanged
    | ReportRecorded
    | ReportDisputed
    | SensorDataRecorded
    | PricingRulesUpdated
    | GradeThresholdsUpdated
    | RegionMultiplierUpdated
    | RegionBasePriceUpdated;

export interface EventEnvelope {
    seq: number;
    txId: string;
    timestamp: string;
}

export type LedgerEvent = EventEnvelope & LedgerEventBody;
