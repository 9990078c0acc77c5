import { z } from 'zod';
import { InvalidInputError } from './errors';
import { GradeThresholds, PricingRules } from './models/PricingRules';
import { Measurements } from './models/TestReport';
import { isRole, Role } from './models/Role';

export const UINT8_MAX = 0xff;
export const UINT16_MAX = 0xffff;
export const UINT32_MAX = 0xffffffff;

const uint = (max: number) => z.number().int().min(0).max(max);

// Bounds keep every intermediate price product below Number.MAX_SAFE_INTEGER.
export const PricingRulesSchema: z.ZodType<PricingRules> = z.object({
    basePrice: uint(UINT32_MAX),
    moisturePenalty: uint(UINT32_MAX),
    moistureThreshold: uint(UINT8_MAX),
    impurityPenalty: uint(UINT32_MAX),
    impurityDivisor: uint(UINT32_MAX).min(1),
    grainBonusDiv: uint(UINT32_MAX).min(1),
    regionMultiplierScale: uint(UINT16_MAX).min(1)
}).strict();

export const GradeThresholdsSchema: z.ZodType<GradeThresholds> = z.object({
    maxMoistureA: uint(UINT8_MAX),
    maxImpurityA: uint(UINT16_MAX),
    minGrainSizeA: uint(UINT16_MAX),
    maxMoistureB: uint(UINT8_MAX),
    maxImpurityB: uint(UINT16_MAX),
    minGrainSizeB: uint(UINT16_MAX)
}).strict();

export const RegionMultiplierSchema = uint(UINT16_MAX);
export const RegionBasePriceSchema = uint(UINT32_MAX);

export const MeasurementsSchema: z.ZodType<Measurements> = z.object({
    moisture: uint(UINT8_MAX),
    impurity: uint(UINT16_MAX),
    grainSize: uint(UINT16_MAX)
});

function describeIssues(error: z.ZodError): string {
    return error.issues
        .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
        .join('; ');
}

export function validate<T>(name: string, value: unknown, schema: z.ZodType<T>): T {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new InvalidInputError(`${name} is invalid (${describeIssues(result.error)})`);
    }
    return result.data;
}

export function parseJsonArgument<T>(name: string, raw: string, schema: z.ZodType<T>): T {
    let value: unknown;
    try {
        value = JSON.parse(raw);
    } catch (e) {
        throw new InvalidInputError(`${name} is not valid JSON`);
    }
    return validate(name, value, schema);
}

export function parseUint(name: string, raw: string, max: number): number {
    const text = raw.trim();
    if (!/^\d+$/.test(text)) {
        throw new InvalidInputError(`${name} must be an unsigned integer, got "${raw}"`);
    }
    const value = Number(text);
    if (value > max) {
        throw new InvalidInputError(`${name} must not exceed ${max}, got ${text}`);
    }
    return value;
}

export function parseId(name: string, raw: string): number {
    const id = parseUint(name, raw, Number.MAX_SAFE_INTEGER);
    if (id === 0) throw new InvalidInputError(`${name} must be at least 1`);
    return id;
}

export function parseFlag(name: string, raw: string): boolean {
    const text = raw.trim().toLowerCase();
    if (text === 'true') return true;
    if (text === 'false') return false;
    throw new InvalidInputError(`${name} must be "true" or "false", got "${raw}"`);
}

export function parseRole(raw: string): Role {
    const text = raw.trim().toLowerCase();
    if (!isRole(text)) throw new InvalidInputError(`Unknown role "${raw}"`);
    return text;
}

export function requireText(name: string, value: string | null | undefined): string {
    const text = value?.trim() ?? '';
    if (text.length === 0) throw new InvalidInputError(`${name} must not be empty`);
    return text;
}
