import { Contract, argNumber, argString, unknownOperation } from '../../kernel-core/L4/Contract.js';
import type { Invariant } from '../../kernel-core/L0/Invariants.js';
import { idsBelowCounter, indexResolves } from '../../kernel-core/L0/Invariants.js';
import type { Address, CallArgs, CallContext } from '../../kernel-core/L0/Primitives.js';
import { own, appendIndex } from '../../kernel-core/L0/Primitives.js';
import {
    enforce,
    requireEntity,
    OwnerGuard,
    ActiveGuard,
    PaymentGuard,
    MaturityGuard,
    AddressGuard,
    IdGuard
} from '../../kernel-core/L0/Guards.js';
import { onlyOwner, transferOwnership } from '../../kernel-core/L1/Ownership.js';
import { pseudoRandomIndex } from '../../kernel-core/L0/Crypto.js';
import { AuditLog } from '../../kernel-core/L5/Audit.js';
import { ErrorCode, LedgerError } from '../../kernel-core/Errors.js';

export const BASE_POWER = 100;
export const EVOLUTION_TIME = 7 * 24 * 60 * 60; // seconds
export const DEFAULT_CREATION_FEE = 10_000_000_000_000_000n; // 0.01 at 18 decimals

export const BLOCK_COLORS = ['Red', 'Blue', 'Green', 'Yellow', 'Purple', 'Orange'] as const;
export type BlockColor = typeof BLOCK_COLORS[number];

export interface Block {
    readonly id: number;
    readonly owner: Address;
    readonly power: number;
    readonly generation: number;
    readonly birthTime: number;
    readonly color: BlockColor;
    readonly isActive: boolean;
}

export interface BlocksState {
    readonly owner: Address;
    readonly nextBlockId: number;
    readonly blocks: Readonly<Record<string, Block>>;
    readonly blocksByOwner: Readonly<Record<Address, readonly number[]>>;
    readonly collectedFees: bigint;
}

export interface BlocksParams {
    owner: Address;
    creationFee?: bigint;
}

export const BLOCK_INVARIANTS: Invariant<BlocksState>[] = [
    {
        id: 'BLK-01',
        boundary: 'Identity Uniqueness',
        description: 'Block ids are below the next id to allocate',
        predicate: s => idsBelowCounter(s.blocks, s.nextBlockId)
    },
    {
        id: 'BLK-02',
        boundary: 'Index Consistency',
        description: 'Owner index entries resolve to blocks',
        predicate: s => indexResolves(s.blocksByOwner, s.blocks)
    },
    {
        id: 'BLK-03',
        boundary: 'Index Consistency',
        description: 'Every block is listed under its owner',
        predicate: s => Object.values(s.blocks).every(b => own(s.blocksByOwner, b.owner)?.includes(b.id) ?? false)
    },
    {
        id: 'BLK-04',
        boundary: 'Attribute Bounds',
        description: 'Power is positive and generation starts at 1',
        predicate: s => Object.values(s.blocks).every(b => b.power > 0 && b.generation >= 1)
    },
    {
        id: 'BLK-05',
        boundary: 'Fee Accounting',
        description: 'Collected fees are never negative',
        predicate: s => s.collectedFees >= 0n
    }
];

function colorFor(timestamp: number, id: number, caller: Address): BlockColor {
    const color = BLOCK_COLORS[pseudoRandomIndex(`${timestamp}:${id}:${caller}`, BLOCK_COLORS.length)];
    if (!color) throw new LedgerError(ErrorCode.INTEGRITY_BREACH, 'Color index out of range');
    return color;
}

/**
 * EvolvingBlocks: paid-for blocks that grow stronger every EVOLUTION_TIME and
 * can be merged into one. Merged inputs stay on record, permanently inactive.
 */
export class EvolvingBlocks extends Contract<BlocksState> {
    public readonly creationFee: bigint;

    constructor(params: BlocksParams, audit?: AuditLog) {
        super('blocks', {
            owner: params.owner,
            nextBlockId: 1,
            blocks: {},
            blocksByOwner: {},
            collectedFees: 0n
        }, BLOCK_INVARIANTS, audit);
        this.creationFee = params.creationFee ?? DEFAULT_CREATION_FEE;
    }

    // --- Mutations ---

    public create(ctx: CallContext): Promise<number> {
        return this.execute('create', ctx, {}, (draft, emit) => {
            enforce(PaymentGuard({ value: ctx.value, fee: this.creationFee }));

            const id = draft.nextBlockId;
            const block: Block = {
                id,
                owner: ctx.caller,
                power: BASE_POWER,
                generation: 1,
                birthTime: ctx.timestamp,
                color: colorFor(ctx.timestamp, id, ctx.caller),
                isActive: true
            };

            draft.nextBlockId = id + 1;
            draft.blocks[String(id)] = block;
            appendIndex(draft.blocksByOwner, ctx.caller, id);
            draft.collectedFees += ctx.value;

            emit('BlockCreated', { blockId: id, owner: ctx.caller, power: block.power, color: block.color });
            return id;
        });
    }

    public evolve(ctx: CallContext, blockId: number): Promise<Block> {
        return this.execute('evolve', ctx, { blockId }, (draft, emit) => {
            enforce(IdGuard({ id: blockId, subject: 'Block' }));
            const block = requireEntity(own(draft.blocks, String(blockId)), `Block ${blockId}`);
            enforce(OwnerGuard({ actor: ctx.caller, owner: block.owner, subject: `block ${blockId}` }));
            enforce(ActiveGuard({ isActive: block.isActive, subject: `Block ${blockId}` }));
            enforce(MaturityGuard({ now: ctx.timestamp, since: block.birthTime, delay: EVOLUTION_TIME }));

            block.generation += 1;
            block.power += Math.floor((BASE_POWER * block.generation) / 2);
            block.birthTime = ctx.timestamp;

            emit('BlockEvolved', { blockId, generation: block.generation, power: block.power });
            return { ...block };
        });
    }

    public merge(ctx: CallContext, blockIdA: number, blockIdB: number): Promise<number> {
        return this.execute('merge', ctx, { blockIdA, blockIdB }, (draft, emit) => {
            if (blockIdA === blockIdB) {
                throw new LedgerError(ErrorCode.SELF_MERGE, `Block ${blockIdA} cannot merge with itself`);
            }
            enforce(IdGuard({ id: blockIdA, subject: 'Block' }));
            enforce(IdGuard({ id: blockIdB, subject: 'Block' }));
            const a = requireEntity(own(draft.blocks, String(blockIdA)), `Block ${blockIdA}`);
            const b = requireEntity(own(draft.blocks, String(blockIdB)), `Block ${blockIdB}`);
            enforce(OwnerGuard({ actor: ctx.caller, owner: a.owner, subject: `block ${blockIdA}` }));
            enforce(OwnerGuard({ actor: ctx.caller, owner: b.owner, subject: `block ${blockIdB}` }));
            enforce(ActiveGuard({ isActive: a.isActive, subject: `Block ${blockIdA}` }));
            enforce(ActiveGuard({ isActive: b.isActive, subject: `Block ${blockIdB}` }));

            a.isActive = false;
            b.isActive = false;

            const id = draft.nextBlockId;
            const merged: Block = {
                id,
                owner: ctx.caller,
                power: a.power + b.power,
                generation: Math.max(a.generation, b.generation) + 1,
                birthTime: ctx.timestamp,
                color: a.color,
                isActive: true
            };

            draft.nextBlockId = id + 1;
            draft.blocks[String(id)] = merged;
            appendIndex(draft.blocksByOwner, ctx.caller, id);

            emit('BlocksMerged', { blockIdA, blockIdB, newBlockId: id, power: merged.power, generation: merged.generation });
            return id;
        });
    }

    public withdrawFees(ctx: CallContext, to: Address): Promise<bigint> {
        return this.execute('withdrawFees', ctx, { to }, (draft, emit) => {
            onlyOwner(draft, ctx.caller);
            enforce(AddressGuard({ address: to, role: 'recipient' }));

            const amount = draft.collectedFees;
            draft.collectedFees = 0n;

            emit('FeesWithdrawn', { to, amount: amount.toString() });
            return amount;
        });
    }

    public transferOwnership(ctx: CallContext, newOwner: Address): Promise<void> {
        return this.execute('transferOwnership', ctx, { newOwner }, (draft, emit) => {
            transferOwnership(draft, ctx.caller, newOwner, emit);
        });
    }

    // --- Queries ---

    public owner(): Address { return this.model.state.owner; }

    public getBlock(blockId: number): Block | null {
        return own(this.model.state.blocks, String(blockId)) ?? null;
    }

    /** All ids the owner ever held, inactive ones included, in creation order. */
    public getBlocksOf(owner: Address): number[] {
        return [...(own(this.model.state.blocksByOwner, owner) ?? [])];
    }

    public timeUntilEvolution(blockId: number, now: number): number {
        const block = requireEntity(this.getBlock(blockId) ?? undefined, `Block ${blockId}`);
        return Math.max(0, block.birthTime + EVOLUTION_TIME - now);
    }

    public collectedFees(): bigint { return this.model.state.collectedFees; }

    public totalBlocks(): number { return this.model.state.nextBlockId - 1; }

    protected dispatch(operation: string, args: CallArgs, ctx: CallContext): Promise<unknown> {
        switch (operation) {
            case 'create': return this.create(ctx);
            case 'evolve': return this.evolve(ctx, argNumber(args, 'blockId'));
            case 'merge': return this.merge(ctx, argNumber(args, 'blockIdA'), argNumber(args, 'blockIdB'));
            case 'withdrawFees': return this.withdrawFees(ctx, argString(args, 'to'));
            case 'transferOwnership': return this.transferOwnership(ctx, argString(args, 'newOwner'));
            default: return unknownOperation(this.name, operation);
        }
    }
}
