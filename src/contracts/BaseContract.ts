import { Contract } from 'fabric-contract-api';
import { DefaultRules, LedgerConfig, loadConfig, loadDefaultRules } from '../config';
import { CropQualityLedger } from '../ledger/CropQualityLedger';
import { LedgerLogger } from '../ledger/LedgerLogger';
import { LedgerContext } from './LedgerContext';

export abstract class BaseContract extends Contract {
    private static config?: LedgerConfig;
    private static defaults?: DefaultRules;

    constructor(name: string) {
        super(name);
    }

    createContext(): LedgerContext {
        return new LedgerContext();
    }

    async beforeTransaction(ctx: LedgerContext): Promise<void> {
        ctx.setLogLevel(BaseContract.settings().logLevel);
        this.logger(ctx).debug('Invoking transaction', { fcn: ctx.functionName(), txId: ctx.txId() });
    }

    protected logger(ctx: LedgerContext): LedgerLogger {
        return ctx.logger(this.getName());
    }

    // Helper: Ledger bound to this transaction
    protected openLedger(ctx: LedgerContext): CropQualityLedger {
        return new CropQualityLedger(ctx.worldState(), {
            logger: this.logger(ctx),
            defaults: BaseContract.defaultRules()
        });
    }

    private static settings(): LedgerConfig {
        if (!BaseContract.config) BaseContract.config = loadConfig();
        return BaseContract.config;
    }

    private static defaultRules(): DefaultRules {
        if (!BaseContract.defaults) BaseContract.defaults = loadDefaultRules(BaseContract.settings().rulesFile);
        return BaseContract.defaults;
    }
}
