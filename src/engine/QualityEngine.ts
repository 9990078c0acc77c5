import { GradeThresholds, PricingRules, PricingSnapshot } from '../models/PricingRules';
import { Grade, Measurements } from '../models/TestReport';

// Grain sizes above this earn a bonus.
export const GRAIN_BONUS_FLOOR = 400;

export interface Assessment {
    suggestedPrice: number;
    classification: Grade;
}

/**
 * Suggested price for a lot. Penalties may push the running total below zero; it is clamped
 * before the region multiplier is applied, so the result is always a non-negative integer.
 *
 * `regionMultiplier` of 0 leaves the price unscaled. `regionBasePrice` of 0 starts from
 * `rules.basePrice`.
 */
export function computePrice(
    measurements: Measurements,
    rules: PricingRules,
    regionMultiplier = 0,
    regionBasePrice = 0
): number {
    const { moisture, impurity, grainSize } = measurements;
    let price = regionBasePrice > 0 ? regionBasePrice : rules.basePrice;

    if (moisture > rules.moistureThreshold) {
        price -= (moisture - rules.moistureThreshold) * rules.moisturePenalty;
    }
    if (impurity > 0) {
        price -= Math.floor(impurity / rules.impurityDivisor) * rules.impurityPenalty;
    }
    if (grainSize > GRAIN_BONUS_FLOOR) {
        price += Math.floor((grainSize - GRAIN_BONUS_FLOOR) / rules.grainBonusDiv);
    }

    if (price < 0) price = 0;

    if (regionMultiplier !== 0) {
        price = Math.floor((price * regionMultiplier) / rules.regionMultiplierScale);
    }
    return price;
}

// First match wins: A, then B, otherwise C.
export function computeGrade(measurements: Measurements, thresholds: GradeThresholds): Grade {
    const { moisture, impurity, grainSize } = measurements;

    if (
        moisture <= thresholds.maxMoistureA &&
        impurity <= thresholds.maxImpurityA &&
        grainSize >= thresholds.minGrainSizeA
    ) {
        return Grade.A;
    }
    if (
        moisture <= thresholds.maxMoistureB &&
        impurity <= thresholds.maxImpurityB &&
        grainSize >= thresholds.minGrainSizeB
    ) {
        return Grade.B;
    }
    return Grade.C;
}

export function assess(measurements: Measurements, snapshot: PricingSnapshot): Assessment {
    return {
        suggestedPrice: computePrice(
            measurements,
            snapshot.rules,
            snapshot.regionMultiplier,
            snapshot.regionBasePrice
        ),
        classification: computeGrade(measurements, snapshot.thresholds)
    };
}

/**
 * True when every input graded A also satisfies the B thresholds. Configurations that break
 * this are accepted; callers only warn about them.
 */
export function thresholdsAreNested(thresholds: GradeThresholds): boolean {
    return (
        thresholds.maxMoistureA <= thresholds.maxMoistureB &&
        thresholds.maxImpurityA <= thresholds.maxImpurityB &&
        thresholds.minGrainSizeA >= thresholds.minGrainSizeB
    );
}
