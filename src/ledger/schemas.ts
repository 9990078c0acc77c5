import { z } from 'zod';
import { PricingSnapshot } from '../models/PricingRules';
import { Grade, TestReport } from '../models/TestReport';
import { SensorRecord } from '../models/SensorRecord';
import { LedgerEvent, LedgerEventType } from '../models/LedgerEvent';
import { Role } from '../models/Role';
import {
    GradeThresholdsSchema,
    PricingRulesSchema,
    RegionBasePriceSchema,
    RegionMultiplierSchema
} from '../validation';

// Shapes of the values kept in world state, checked on every read.

export const CounterSchema = z.number().int().min(0);
export const IdListSchema = z.array(z.number().int().positive());
export const MemberListSchema = z.array(z.string());

export const PricingSnapshotSchema: z.ZodType<PricingSnapshot> = z.object({
    rules: PricingRulesSchema,
    thresholds: GradeThresholdsSchema,
    regionMultiplier: RegionMultiplierSchema,
    regionBasePrice: RegionBasePriceSchema
});

export const TestReportSchema: z.ZodType<TestReport> = z.object({
    reportId: z.number().int().positive(),
    docType: z.literal('testReport'),
    farmer: z.string(),
    cropType: z.string(),
    region: z.string(),
    contentRef: z.string(),
    moisture: z.number().int(),
    impurity: z.number().int(),
    grainSize: z.number().int(),
    lab: z.string(),
    createdAt: z.string(),
    suggestedPrice: z.number().int().min(0),
    classification: z.nativeEnum(Grade),
    disputed: z.boolean(),
    pricing: PricingSnapshotSchema
});

export const SensorRecordSchema: z.ZodType<SensorRecord> = z.object({
    recordId: z.number().int().positive(),
    docType: z.literal('sensorRecord'),
    sensorId: z.string(),
    region: z.string(),
    contentRef: z.string(),
    submitter: z.string(),
    recordedAt: z.string()
});

const envelope = {
    seq: z.number().int().positive(),
    txId: z.string(),
    timestamp: z.string()
};

export const LedgerEventSchema: z.ZodType<LedgerEvent> = z.discriminatedUnion('type', [
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.ROLE_CHANGED),
        role: z.nativeEnum(Role),
        subject: z.string(),
        caller: z.string(),
        granted: z.boolean()
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.REPORT_RECORDED),
        reportId: z.number().int().positive(),
        farmer: z.string(),
        lab: z.string(),
        contentRef: z.string(),
        suggestedPrice: z.number().int(),
        moisture: z.number().int(),
        impurity: z.number().int(),
        grainSize: z.number().int(),
        classification: z.nativeEnum(Grade)
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.REPORT_DISPUTED),
        reportId: z.number().int().positive(),
        caller: z.string(),
        disputed: z.boolean()
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.SENSOR_DATA_RECORDED),
        recordId: z.number().int().positive(),
        sensorId: z.string(),
        region: z.string(),
        contentRef: z.string(),
        submitter: z.string()
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.PRICING_RULES_UPDATED),
        caller: z.string(),
        rules: PricingRulesSchema
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.GRADE_THRESHOLDS_UPDATED),
        caller: z.string(),
        thresholds: GradeThresholdsSchema
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.REGION_MULTIPLIER_UPDATED),
        caller: z.string(),
        region: z.string(),
        multiplier: RegionMultiplierSchema
    }),
    z.object({
        ...envelope,
        type: z.literal(LedgerEventType.REGION_BASE_PRICE_UPDATED),
        caller: z.string(),
        region: z.string(),
        basePrice: RegionBasePriceSchema
    })
]);
