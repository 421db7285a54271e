import { ErrorCode, LedgerError, describeError } from '../kernel-core/Errors.js';

/**
 * Platform: Domain Error Taxonomy
 * Translates ledger rejections into errors the outer surfaces can report.
 */

export abstract class PlatformError extends Error {
    constructor(
        message: string,
        public readonly code: string,
        public readonly httpStatus: number,
        public readonly metadata?: Record<string, unknown>
    ) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when a precondition on ledger state prevents the call.
 */
export class PolicyViolationError extends PlatformError {
    constructor(message: string, code: string, details?: Record<string, unknown>) {
        super(message, code, 409, details);
    }
}

/**
 * Thrown when the caller lacks the ownership or authorship the call needs.
 */
export class SecurityViolationError extends PlatformError {
    constructor(message: string, code: string, details?: Record<string, unknown>) {
        super(message, code, 403, details);
    }
}

export class NotFoundError extends PlatformError {
    constructor(message: string, code: string = ErrorCode.NOT_FOUND) {
        super(message, code, 404);
    }
}

/**
 * Thrown when the request itself is malformed.
 */
export class ValidationError extends PlatformError {
    constructor(message: string, code: string = ErrorCode.INVALID_ARGUMENT) {
        super(message, code, 400);
    }
}

/**
 * Thrown when hash chains or invariants are breached.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string, code: string, details?: Record<string, unknown>) {
        super(message, code, 500, details);
    }
}

/**
 * Thrown when the environment fails (e.g. storage unavailable).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string) {
        super(message, 'INFRASTRUCTURE_FAILURE', 500);
    }
}

const SECURITY: readonly ErrorCode[] = [ErrorCode.NOT_OWNER, ErrorCode.NOT_CREATOR];
const LOOKUP: readonly ErrorCode[] = [ErrorCode.NOT_FOUND, ErrorCode.KEY_NOT_FOUND];
const INPUT: readonly ErrorCode[] = [ErrorCode.INVALID_ARGUMENT, ErrorCode.ZERO_ADDRESS, ErrorCode.SELF_MERGE];
const INTEGRITY: readonly ErrorCode[] = [ErrorCode.INTEGRITY_BREACH, ErrorCode.REPLAY_FAILURE];

export function translateError(e: unknown): PlatformError {
    if (e instanceof PlatformError) return e;
    if (!(e instanceof LedgerError)) return new InfrastructureError(describeError(e));

    if (SECURITY.includes(e.code)) return new SecurityViolationError(e.reason, e.code, e.metadata);
    if (LOOKUP.includes(e.code)) return new NotFoundError(e.reason, e.code);
    if (INPUT.includes(e.code)) return new ValidationError(e.reason, e.code);
    if (INTEGRITY.includes(e.code)) return new DataIntegrityError(e.reason, e.code, e.metadata);
    if (e.code === ErrorCode.COMMIT_FAILED) return new InfrastructureError(e.reason);
    return new PolicyViolationError(e.reason, e.code, e.metadata);
}
