import { Transaction, Info, Returns } from 'fabric-contract-api';
import {
    GradeThresholdsSchema,
    parseJsonArgument,
    parseUint,
    PricingRulesSchema,
    UINT16_MAX,
    UINT32_MAX,
    UINT8_MAX
} from '../validation';
import { BaseContract } from './BaseContract';
import { LedgerContext } from './LedgerContext';

@Info({ title: 'PricingContract', description: 'Pricing rules, grade thresholds and region tables' })
export class PricingContract extends BaseContract {

    constructor() {
        super('PricingContract');
    }

    // rulesJson: '{"basePrice":1000,"moisturePenalty":2,...}'
    @Transaction()
    async SetPricingRules(ctx: LedgerContext, rulesJson: string): Promise<void> {
        const client = ctx.getClient();
        const rules = parseJsonArgument('pricing rules', rulesJson, PricingRulesSchema);
        await this.openLedger(ctx).pricing.setRules(client.id, rules);
    }

    @Transaction(false)
    @Returns('string')
    async GetPricingRules(ctx: LedgerContext): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).pricing.rules());
    }

    @Transaction()
    async SetGradeThresholds(ctx: LedgerContext, thresholdsJson: string): Promise<void> {
        const client = ctx.getClient();
        const thresholds = parseJsonArgument('grade thresholds', thresholdsJson, GradeThresholdsSchema);
        await this.openLedger(ctx).pricing.setThresholds(client.id, thresholds);
    }

    @Transaction(false)
    @Returns('string')
    async GetGradeThresholds(ctx: LedgerContext): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).pricing.thresholds());
    }

    // multiplier "0" clears the override
    @Transaction()
    async SetRegionMultiplier(ctx: LedgerContext, region: string, multiplier: string): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).pricing.setRegionMultiplier(
            client.id,
            region,
            parseUint('multiplier', multiplier, UINT16_MAX)
        );
    }

    @Transaction(false)
    @Returns('string')
    async GetRegionMultiplier(ctx: LedgerContext, region: string): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).pricing.regionMultiplier(region));
    }

    @Transaction()
    async SetRegionBasePrice(ctx: LedgerContext, region: string, basePrice: string): Promise<void> {
        const client = ctx.getClient();
        await this.openLedger(ctx).pricing.setRegionBasePrice(
            client.id,
            region,
            parseUint('basePrice', basePrice, UINT32_MAX)
        );
    }

    @Transaction(false)
    @Returns('string')
    async GetRegionBasePrice(ctx: LedgerContext, region: string): Promise<string> {
        return JSON.stringify(await this.openLedger(ctx).pricing.regionBasePrice(region));
    }

    // Price and grade under the current rules, without recording anything
    @Transaction(false)
    @Returns('string')
    async QuotePrice(ctx: LedgerContext, moisture: string, impurity: string, grainSize: string, region: string): Promise<string> {
        const quote = await this.openLedger(ctx).pricing.quote(
            {
                moisture: parseUint('moisture', moisture, UINT8_MAX),
                impurity: parseUint('impurity', impurity, UINT16_MAX),
                grainSize: parseUint('grainSize', grainSize, UINT16_MAX)
            },
            region
        );
        return JSON.stringify(quote);
    }
}
