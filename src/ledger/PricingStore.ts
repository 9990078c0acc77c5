import { DefaultRules } from '../config';
import { assess, Assessment, thresholdsAreNested } from '../engine/QualityEngine';
import { LedgerEventType } from '../models/LedgerEvent';
import { GradeThresholds, PricingRules, PricingSnapshot } from '../models/PricingRules';
import { Role } from '../models/Role';
import { Measurements } from '../models/TestReport';
import {
    GradeThresholdsSchema,
    MeasurementsSchema,
    PricingRulesSchema,
    RegionBasePriceSchema,
    RegionMultiplierSchema,
    requireText,
    validate
} from '../validation';
import { LedgerServices } from './LedgerServices';
import { RoleRegistry } from './RoleRegistry';

/**
 * Current pricing parameters, grade thresholds and per-region tables. Changes apply to reports
 * recorded afterwards; stored reports keep the snapshot they were priced with.
 */
export class PricingStore {
    constructor(
        private readonly services: LedgerServices,
        private readonly roles: RoleRegistry,
        private readonly defaults: DefaultRules
    ) {}

    async rules(): Promise<PricingRules> {
        const { state } = this.services;
        return (await state.read(state.key('config', 'pricing'), PricingRulesSchema)) ?? this.defaults.pricing;
    }

    async thresholds(): Promise<GradeThresholds> {
        const { state } = this.services;
        return (await state.read(state.key('config', 'thresholds'), GradeThresholdsSchema)) ?? this.defaults.thresholds;
    }

    async regionMultiplier(region: string): Promise<number> {
        const { state } = this.services;
        return (await state.read(state.key('regionMultiplier', region.trim()), RegionMultiplierSchema)) ?? 0;
    }

    async regionBasePrice(region: string): Promise<number> {
        const { state } = this.services;
        return (await state.read(state.key('regionBasePrice', region.trim()), RegionBasePriceSchema)) ?? 0;
    }

    async snapshot(region: string): Promise<PricingSnapshot> {
        return {
            rules: await this.rules(),
            thresholds: await this.thresholds(),
            regionMultiplier: await this.regionMultiplier(region),
            regionBasePrice: await this.regionBasePrice(region)
        };
    }

    async quote(measurements: Measurements, region: string): Promise<Assessment> {
        const checked = validate('measurements', measurements, MeasurementsSchema);
        return assess(checked, await this.snapshot(region));
    }

    async setRules(caller: string, rules: PricingRules): Promise<PricingRules> {
        return this.services.guard.run('setPricingRules', async () => {
            await this.roles.requireRole(Role.ADMIN, caller);
            const checked = validate('pricing rules', rules, PricingRulesSchema);
            const { state, events, logger } = this.services;

            await state.write(state.key('config', 'pricing'), checked);
            logger.info('Updated pricing rules', { caller, ...checked });
            await events.emit({ type: LedgerEventType.PRICING_RULES_UPDATED, caller, rules: checked });
            return checked;
        });
    }

    async setThresholds(caller: string, thresholds: GradeThresholds): Promise<GradeThresholds> {
        return this.services.guard.run('setGradeThresholds', async () => {
            await this.roles.requireRole(Role.ADMIN, caller);
            const checked = validate('grade thresholds', thresholds, GradeThresholdsSchema);
            const { state, events, logger } = this.services;

            if (!thresholdsAreNested(checked)) {
                logger.warn('Grade A thresholds are looser than grade B on at least one measurement', { ...checked });
            }
            await state.write(state.key('config', 'thresholds'), checked);
            logger.info('Updated grade thresholds', { caller, ...checked });
            await events.emit({ type: LedgerEventType.GRADE_THRESHOLDS_UPDATED, caller, thresholds: checked });
            return checked;
        });
    }

    async setRegionMultiplier(caller: string, region: string, multiplier: number): Promise<void> {
        await this.services.guard.run('setRegionMultiplier', async () => {
            await this.roles.requireRole(Role.ADMIN, caller);
            const name = requireText('region', region);
            const checked = validate('region multiplier', multiplier, RegionMultiplierSchema);
            const { state, events, logger } = this.services;

            await state.write(state.key('regionMultiplier', name), checked);
            logger.info('Updated region multiplier', { caller, region: name, multiplier: checked });
            await events.emit({
                type: LedgerEventType.REGION_MULTIPLIER_UPDATED,
                caller,
                region: name,
                multiplier: checked
            });
        });
    }

    async setRegionBasePrice(caller: string, region: string, basePrice: number): Promise<void> {
        await this.services.guard.run('setRegionBasePrice', async () => {
            await this.roles.requireRole(Role.ADMIN, caller);
            const name = requireText('region', region);
            const checked = validate('region base price', basePrice, RegionBasePriceSchema);
            const { state, events, logger } = this.services;

            await state.write(state.key('regionBasePrice', name), checked);
            logger.info('Updated region base price', { caller, region: name, basePrice: checked });
            await events.emit({
                type: LedgerEventType.REGION_BASE_PRICE_UPDATED,
                caller,
                region: name,
                basePrice: checked
            });
        });
    }
}
