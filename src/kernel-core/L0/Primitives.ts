export type Address = string;

export const ZERO_ADDRESS: Address = '0x0000000000000000000000000000000000000000';

/**
 * Inputs the host supplies with every call. Trusted as given.
 */
export interface CallContext {
    caller: Address;
    /** Payment attached to the call, in the smallest unit. */
    value: bigint;
    /** Seconds since the epoch. */
    timestamp: number;
}

/** JSON-safe scalar used in journaled arguments and event fields. */
export type ArgValue = string | number | boolean;
export type CallArgs = Record<string, ArgValue>;

export interface LedgerEvent {
    contract: string;
    name: string;
    args: CallArgs;
    timestamp: number;
}

export function isZeroAddress(address: Address): boolean {
    return address.length === 0 || address === ZERO_ADDRESS;
}

/** Own-property lookup; inherited keys such as `toString` read as absent. */
export function own<T>(record: Readonly<Record<string, T>>, key: string): T | undefined {
    return Object.hasOwn(record, key) ? record[key] : undefined;
}

/** Appends to an append-only id index. */
export function appendIndex(index: Record<string, number[]>, key: string, id: number): void {
    const list = own(index, key);
    if (list) list.push(id);
    else index[key] = [id];
}

export function context(caller: Address, timestamp: number, value: bigint = 0n): CallContext {
    return { caller, value, timestamp };
}
