import { Role } from './models/Role';

export enum LedgerErrorKind {
    NOT_AUTHORIZED = 'NotAuthorized',
    INVALID_INPUT = 'InvalidInput',
    REPORT_NOT_FOUND = 'ReportNotFound',
    REENTRANT_CALL = 'ReentrantCall'
}

/**
 * Base class for every rejection raised by the ledger. The kind is repeated at the start of
 * the message because Fabric clients only receive the message string.
 */
export class LedgerError extends Error {
    constructor(readonly kind: LedgerErrorKind, detail: string) {
        super(`${kind}: ${detail}`);
        this.name = kind;
    }
}

export class NotAuthorizedError extends LedgerError {
    constructor(readonly role: Role, readonly identity: string) {
        super(LedgerErrorKind.NOT_AUTHORIZED, `${identity} does not hold the ${role} role`);
    }
}

export class InvalidInputError extends LedgerError {
    constructor(detail: string) {
        super(LedgerErrorKind.INVALID_INPUT, detail);
    }
}

export class ReportNotFoundError extends LedgerError {
    constructor(readonly reportId: number) {
        super(LedgerErrorKind.REPORT_NOT_FOUND, `Report ${reportId} does not exist`);
    }
}

export class ReentrantCallError extends LedgerError {
    constructor(readonly entryPoint: string) {
        super(LedgerErrorKind.REENTRANT_CALL, `${entryPoint} is already in progress`);
    }
}
