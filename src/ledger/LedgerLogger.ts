/**
 * The subset of the shim's winston logger the ledger writes to. Contracts pass
 * `ctx.logging.getLogger()`; tests pass a silent winston logger.
 */
export interface LedgerLogger {
    debug(message: string, meta?: Record<string, unknown>): unknown;
    info(message: string, meta?: Record<string, unknown>): unknown;
    warn(message: string, meta?: Record<string, unknown>): unknown;
    error(message: string, meta?: Record<string, unknown>): unknown;
}
