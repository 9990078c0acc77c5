import { DefaultRules } from '../config';
import { EventLog } from './EventLog';
import { LedgerLogger } from './LedgerLogger';
import { LedgerServices } from './LedgerServices';
import { PricingStore } from './PricingStore';
import { ReentrancyGuard } from './ReentrancyGuard';
import { ReportLedger } from './ReportLedger';
import { RoleRegistry } from './RoleRegistry';
import { SensorLedger } from './SensorLedger';
import { LedgerState, WorldState } from './WorldState';

export interface LedgerOptions {
    logger: LedgerLogger;
    defaults: DefaultRules;
}

/**
 * All ledger components bound to one transaction's world state. Build a new instance per
 * transaction so the read overlay and re-entrancy flags never outlive it.
 */
export class CropQualityLedger {
    readonly events: EventLog;
    readonly roles: RoleRegistry;
    readonly pricing: PricingStore;
    readonly reports: ReportLedger;
    readonly sensors: SensorLedger;

    private readonly services: LedgerServices;

    constructor(world: WorldState, private readonly options: LedgerOptions) {
        const state = new LedgerState(world);
        this.events = new EventLog(state, options.logger);
        this.services = { state, events: this.events, guard: new ReentrancyGuard(), logger: options.logger };

        this.roles = new RoleRegistry(this.services);
        this.pricing = new PricingStore(this.services, this.roles, options.defaults);
        this.reports = new ReportLedger(this.services, this.roles, this.pricing);
        this.sensors = new SensorLedger(this.services, this.roles);
    }

    // Makes the caller the first admin and writes the default rules in the same transaction.
    async initialize(caller: string): Promise<void> {
        await this.services.guard.run('initialize', async () => {
            await this.roles.initialize(caller);
            await this.pricing.setRules(caller, this.options.defaults.pricing);
            await this.pricing.setThresholds(caller, this.options.defaults.thresholds);
        });
    }
}
