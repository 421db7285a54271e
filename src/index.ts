export { ErrorCode, LedgerError, isLedgerError, describeError } from './kernel-core/Errors.js';
export { ZERO_ADDRESS, context, isZeroAddress } from './kernel-core/L0/Primitives.js';
export type { Address, CallContext, CallArgs, ArgValue, LedgerEvent } from './kernel-core/L0/Primitives.js';
export { StateModel } from './kernel-core/L2/State.js';
export type { StateSnapshot, Transition } from './kernel-core/L2/State.js';
export { Contract } from './kernel-core/L4/Contract.js';
export type { Replayable } from './kernel-core/L4/Contract.js';
export { AuditLog } from './kernel-core/L5/Audit.js';
export type { Evidence, EvidenceStatus, IEventStore, EventListener } from './kernel-core/L5/Audit.js';
export { ReplayEngine } from './kernel-core/L0/Replay.js';

export * from './Contracts/EvolvingBlocks/EvolvingBlocks.js';
export * from './Contracts/ContentRegistry/ContentRegistry.js';
export * from './Contracts/Token/TokenLedger.js';

export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
export { LedgerPlatform } from './Platform/LedgerPlatform.js';
export * from './Platform/Errors.js';
export { loadConfig, DEFAULT_DEPLOYER } from './config.js';
export type { LedgerConfig } from './config.js';
export { LedgerServer } from './server/Server.js';
