// src/kernel-core/L0/Guards.ts
import type { Address, CallArgs } from './Primitives.js';
import { isZeroAddress } from './Primitives.js';
import { ErrorCode, LedgerError } from '../Errors.js';

// --- Guard Pattern ---
export interface GuardResult {
    ok: boolean;
    code?: ErrorCode;
    violation?: string;
    details?: Record<string, unknown>;
}

export type Guard<T> = (input: T) => GuardResult;

const RESERVED_KEYS = ['__proto__', 'prototype', 'constructor'];

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, msg: string, details?: Record<string, unknown>): GuardResult => ({ ok: false, code, violation: msg, details });

/**
 * Throws the guard's rejection as a LedgerError. Guards run before any
 * field of the draft is touched.
 */
export function enforce(result: GuardResult): void {
    if (result.ok) return;
    throw new LedgerError(result.code ?? ErrorCode.INVALID_ARGUMENT, result.violation ?? 'Guard rejected call', result.details);
}

// --- Concrete Guards ---

// 1. Ownership (contract owner or entity owner)
export const OwnerGuard: Guard<{ actor: Address, owner: Address, subject: string }> = ({ actor, owner, subject }) => {
    if (actor !== owner) return FAIL(ErrorCode.NOT_OWNER, `${actor} is not the owner of ${subject}`, { actor, owner });
    return OK;
};

// 2. Authorship (registry versions)
export const CreatorGuard: Guard<{ actor: Address, creator: Address, subject: string }> = ({ actor, creator, subject }) => {
    if (actor !== creator) return FAIL(ErrorCode.NOT_CREATOR, `${actor} is not the creator of ${subject}`, { actor, creator });
    return OK;
};

// 3. Liveness
export const ActiveGuard: Guard<{ isActive: boolean, subject: string }> = ({ isActive, subject }) => {
    if (!isActive) return FAIL(ErrorCode.INACTIVE, `${subject} is inactive`);
    return OK;
};

// 4. Existence (returns the entity so lookups read as one expression)
export function requireEntity<T>(entity: T | undefined, subject: string, code: ErrorCode = ErrorCode.NOT_FOUND): T {
    if (entity === undefined) throw new LedgerError(code, `${subject} not found`);
    return entity;
}

// 5. Target address (also a map key, hence the reserved-word check)
export const AddressGuard: Guard<{ address: Address, role: string }> = ({ address, role }) => {
    if (isZeroAddress(address)) return FAIL(ErrorCode.ZERO_ADDRESS, `Invalid ${role} address`, { role });
    if (RESERVED_KEYS.includes(address)) return FAIL(ErrorCode.INVALID_ARGUMENT, `Illegal ${role} address: ${address}`, { role });
    return OK;
};

// 6. Attached payment
export const PaymentGuard: Guard<{ value: bigint, fee: bigint }> = ({ value, fee }) => {
    if (value < fee) return FAIL(ErrorCode.INSUFFICIENT_PAYMENT, `Payment ${value} below required fee ${fee}`, { value: value.toString(), fee: fee.toString() });
    return OK;
};

// 7. Maturity (time-locked transitions)
export const MaturityGuard: Guard<{ now: number, since: number, delay: number }> = ({ now, since, delay }) => {
    const readyAt = since + delay;
    if (now < readyAt) return FAIL(ErrorCode.EVOLUTION_NOT_READY, `Not ready for ${readyAt - now}s`, { readyAt });
    return OK;
};

// 8. Balance sufficiency
export const BalanceGuard: Guard<{ balance: bigint, amount: bigint, holder: Address }> = ({ balance, amount, holder }) => {
    if (balance < amount) return FAIL(ErrorCode.INSUFFICIENT_BALANCE, `Balance of ${holder} is ${balance}, needs ${amount}`, { holder });
    return OK;
};

// 9. Allowance sufficiency
export const AllowanceGuard: Guard<{ allowance: bigint, amount: bigint }> = ({ allowance, amount }) => {
    if (allowance < amount) return FAIL(ErrorCode.ALLOWANCE_EXCEEDED, `Allowance ${allowance} below ${amount}`);
    return OK;
};

// 10. Amount sanity
export const AmountGuard: Guard<{ amount: bigint }> = ({ amount }) => {
    if (amount < 0n) return FAIL(ErrorCode.INVALID_ARGUMENT, 'Amount must not be negative');
    return OK;
};

// 11. Map keys (Anti-Prototype Pollution)
export const KeyGuard: Guard<{ key: string }> = ({ key }) => {
    if (key.length === 0) return FAIL(ErrorCode.INVALID_ARGUMENT, 'Key must not be empty');
    if (RESERVED_KEYS.includes(key)) return FAIL(ErrorCode.INVALID_ARGUMENT, `Illegal key: ${key}`);
    return OK;
};

// 12. Time (Monotonicity)
export const TimeGuard: Guard<{ currentTs: number, lastTs: number }> = ({ currentTs, lastTs }) => {
    if (!Number.isSafeInteger(currentTs) || currentTs < 0) return FAIL(ErrorCode.INVALID_ARGUMENT, 'Timestamp must be a non-negative integer');
    if (currentTs < lastTs) return FAIL(ErrorCode.CLOCK_REGRESSION, `Timestamp ${currentTs} precedes last commit at ${lastTs}`);
    return OK;
};

// 13. Entity ids
export const IdGuard: Guard<{ id: number, subject: string }> = ({ id, subject }) => {
    if (!Number.isSafeInteger(id) || id < 0) return FAIL(ErrorCode.INVALID_ARGUMENT, `${subject} id must be a non-negative integer`, { id: String(id) });
    return OK;
};

// 14. Journaled arguments (scalars that read back unchanged from JSON)
export const ArgsGuard: Guard<{ args: CallArgs }> = ({ args }) => {
    for (const [key, value] of Object.entries(args)) {
        const scalar = typeof value === 'string' || typeof value === 'boolean' || (typeof value === 'number' && Number.isFinite(value));
        if (!scalar) return FAIL(ErrorCode.INVALID_ARGUMENT, `Argument ${key} cannot be journaled`, { key });
    }
    return OK;
};
