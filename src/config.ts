import type { Address } from './kernel-core/L0/Primitives.js';
import { DEFAULT_CREATION_FEE } from './Contracts/EvolvingBlocks/EvolvingBlocks.js';
import { ErrorCode, LedgerError } from './kernel-core/Errors.js';

export interface LedgerConfig {
    port: number;
    dbPath: string;
    deployer: Address;
    blocks: {
        creationFee: bigint;
    };
    token: {
        name: string;
        symbol: string;
        decimals: number;
        initialSupply: bigint;
    };
}

export const DEFAULT_DEPLOYER: Address = '0x00000000000000000000000000000000000000d1';

type Env = Record<string, string | undefined>;

function readInteger(env: Env, key: string, fallback: number, min: number, max: number): number {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    const value = Number(raw);
    if (!Number.isInteger(value) || value < min || value > max) {
        throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `${key} must be an integer in [${min}, ${max}], got "${raw}"`);
    }
    return value;
}

function readAmount(env: Env, key: string, fallback: bigint): bigint {
    const raw = env[key];
    if (raw === undefined || raw === '') return fallback;
    if (!/^\d+$/.test(raw)) {
        throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `${key} must be a non-negative integer, got "${raw}"`);
    }
    return BigInt(raw);
}

function readString(env: Env, key: string, fallback: string): string {
    const raw = env[key];
    return raw === undefined || raw === '' ? fallback : raw;
}

export function loadConfig(env: Env = process.env): LedgerConfig {
    return {
        port: readInteger(env, 'LEDGER_PORT', 3000, 0, 65535),
        dbPath: readString(env, 'LEDGER_DB_PATH', 'ledger.db'),
        deployer: readString(env, 'LEDGER_DEPLOYER', DEFAULT_DEPLOYER),
        blocks: {
            creationFee: readAmount(env, 'LEDGER_CREATION_FEE', DEFAULT_CREATION_FEE)
        },
        token: {
            name: readString(env, 'LEDGER_TOKEN_NAME', 'Ledger Token'),
            symbol: readString(env, 'LEDGER_TOKEN_SYMBOL', 'LDG'),
            decimals: readInteger(env, 'LEDGER_TOKEN_DECIMALS', 18, 0, 36),
            initialSupply: readAmount(env, 'LEDGER_TOKEN_INITIAL_SUPPLY', 1_000_000n * 10n ** 18n)
        }
    };
}
