export interface PricingRules {
    basePrice: number;
    moisturePenalty: number;        // Per point of moisture above the threshold
    moistureThreshold: number;
    impurityPenalty: number;        // Per full impurityDivisor of impurity
    impurityDivisor: number;
    grainBonusDiv: number;          // Bonus = (grainSize - 400) / grainBonusDiv
    regionMultiplierScale: number;  // A multiplier equal to the scale leaves the price unchanged
}

export interface GradeThresholds {
    maxMoistureA: number;
    maxImpurityA: number;
    minGrainSizeA: number;
    maxMoistureB: number;
    maxImpurityB: number;
    minGrainSizeB: number;
}

// Values a report was priced and graded with, frozen at creation time.
export interface PricingSnapshot {
    rules: PricingRules;
    thresholds: GradeThresholds;
    regionMultiplier: number;       // 0 = no override
    regionBasePrice: number;        // 0 = use rules.basePrice
}
