/**
 * Ledger Error Taxonomy
 * Centralized error codes for rejected calls and terminal failures.
 */

export enum ErrorCode {
    // I. Authorization
    NOT_OWNER = 'NOT_OWNER',
    NOT_CREATOR = 'NOT_CREATOR',

    // II. Entity Lifecycle
    INACTIVE = 'INACTIVE',
    NOT_FOUND = 'NOT_FOUND',
    KEY_NOT_FOUND = 'KEY_NOT_FOUND',
    KEY_EXISTS = 'KEY_EXISTS',
    EVOLUTION_NOT_READY = 'EVOLUTION_NOT_READY',
    SELF_MERGE = 'SELF_MERGE',

    // III. Value & Balances
    INSUFFICIENT_PAYMENT = 'INSUFFICIENT_PAYMENT',
    INSUFFICIENT_BALANCE = 'INSUFFICIENT_BALANCE',
    ALLOWANCE_EXCEEDED = 'ALLOWANCE_EXCEEDED',

    // IV. Input
    ZERO_ADDRESS = 'ZERO_ADDRESS',
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',
    CLOCK_REGRESSION = 'CLOCK_REGRESSION',

    // V. Ledger Internal
    INTEGRITY_BREACH = 'INTEGRITY_BREACH',
    COMMIT_FAILED = 'COMMIT_FAILED',
    REPLAY_FAILURE = 'REPLAY_FAILURE',
}

export class LedgerError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(`[Ledger:${code}] ${reason}`);
        this.name = 'LedgerError';
    }
}

export function isLedgerError(e: unknown): e is LedgerError {
    return e instanceof LedgerError;
}

export function describeError(e: unknown): string {
    return e instanceof Error ? e.message : String(e);
}
