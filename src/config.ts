import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { GradeThresholds, PricingRules } from './models/PricingRules';
import { GradeThresholdsSchema, PricingRulesSchema } from './validation';

const EnvSchema = z.object({
    CROP_LEDGER_LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
    CROP_LEDGER_RULES_FILE: z.string().min(1).optional()
});

const DefaultRulesSchema = z.object({
    pricing: PricingRulesSchema,
    thresholds: GradeThresholdsSchema
});

export type LogLevel = z.infer<typeof EnvSchema>['CROP_LEDGER_LOG_LEVEL'];

export interface DefaultRules {
    pricing: PricingRules;
    thresholds: GradeThresholds;
}

export interface LedgerConfig {
    logLevel: LogLevel;
    rulesFile: string;
}

export const DEFAULT_RULES_FILE = path.join(__dirname, '..', 'config', 'default-rules.json');

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
        throw new Error(`Invalid chaincode environment: ${detail}`);
    }
    return {
        logLevel: parsed.data.CROP_LEDGER_LOG_LEVEL,
        rulesFile: parsed.data.CROP_LEDGER_RULES_FILE ?? DEFAULT_RULES_FILE
    };
}

export function loadDefaultRules(file: string = DEFAULT_RULES_FILE): DefaultRules {
    const raw: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    const parsed = DefaultRulesSchema.safeParse(raw);
    if (!parsed.success) {
        throw new Error(`Default rules in ${file} are invalid: ${parsed.error.message}`);
    }
    return parsed.data;
}
