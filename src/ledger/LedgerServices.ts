import { EventLog } from './EventLog';
import { LedgerLogger } from './LedgerLogger';
import { ReentrancyGuard } from './ReentrancyGuard';
import { LedgerState } from './WorldState';

// Shared per-transaction plumbing handed to every ledger component.
export interface LedgerServices {
    state: LedgerState;
    events: EventLog;
    guard: ReentrancyGuard;
    logger: LedgerLogger;
}
