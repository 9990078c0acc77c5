import { Context } from 'fabric-contract-api';
import { LogLevel } from '../config';
import { LedgerLogger } from '../ledger/LedgerLogger';
import { WorldState } from '../ledger/WorldState';

export interface ClientInfo {
    id: string;
    mspId: string;
}

/**
 * Transaction context returned by `createContext()` for every contract. Contracts reach the
 * stub, the client identity and the shim's logging only through these methods.
 */
export class LedgerContext extends Context {

    worldState(): WorldState {
        return this.stub;
    }

    getClient(): ClientInfo {
        return {
            id: this.clientIdentity.getID(),
            mspId: this.clientIdentity.getMSPID()
        };
    }

    functionName(): string {
        return this.stub.getFunctionAndParameters().fcn;
    }

    txId(): string {
        return this.worldState().getTxID();
    }

    setLogLevel(level: LogLevel): void {
        this.logging.setLevel(level);
    }

    logger(name: string): LedgerLogger {
        return this.logging.getLogger(name);
    }
}
