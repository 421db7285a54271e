// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical form: sorted keys, bigints as decimal strings, undefined dropped
export function canonicalize(value: unknown): string {
    return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (Array.isArray(value)) return value.map(normalize);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            const v: unknown = Reflect.get(value, key);
            if (v !== undefined) out[key] = normalize(v);
        }
        return out;
    }
    return value;
}

// 1.3 Pseudo-randomness
// Derived from public inputs, so anyone who sees the call can predict it.
export function pseudoRandomIndex(seed: string, modulus: number): number {
    return Number(BigInt(`0x${hash(seed)}`) % BigInt(modulus));
}
