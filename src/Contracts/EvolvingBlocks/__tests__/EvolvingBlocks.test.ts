import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { EvolvingBlocks, BLOCK_COLORS, EVOLUTION_TIME, DEFAULT_CREATION_FEE } from '../EvolvingBlocks.js';
import { AuditLog } from '../../../kernel-core/L5/Audit.js';
import { context, ZERO_ADDRESS } from '../../../kernel-core/L0/Primitives.js';
import { ErrorCode } from '../../../kernel-core/Errors.js';

const DEPLOYER = 'deployer';
const FEE = 100n;
const T0 = 1000;

describe('Evolving Blocks', () => {
    let audit: AuditLog;
    let blocks: EvolvingBlocks;

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        audit = new AuditLog();
        blocks = new EvolvingBlocks({ owner: DEPLOYER, creationFee: FEE }, audit);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    describe('create', () => {
        test('allocates sequential ids with base attributes', async () => {
            expect(await blocks.create(context('alice', T0, FEE))).toBe(1);
            expect(await blocks.create(context('bob', T0, FEE + 5n))).toBe(2);

            const block = blocks.getBlock(1);
            expect(block).toMatchObject({ id: 1, owner: 'alice', power: 100, generation: 1, birthTime: T0, isActive: true });
            expect(BLOCK_COLORS).toContain(block?.color);
            expect(blocks.getBlocksOf('alice')).toEqual([1]);
            expect(blocks.totalBlocks()).toBe(2);
            expect(blocks.collectedFees()).toBe(205n);
        });

        test('color is a pure function of time, id and caller', async () => {
            const twin = new EvolvingBlocks({ owner: DEPLOYER, creationFee: FEE });
            await blocks.create(context('alice', T0, FEE));
            await twin.create(context('alice', T0, FEE));
            expect(twin.getBlock(1)?.color).toBe(blocks.getBlock(1)?.color);
        });

        test('rejects underpayment and journals the rejection', async () => {
            await expect(blocks.create(context('alice', T0, FEE - 1n)))
                .rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_PAYMENT });

            expect(blocks.totalBlocks()).toBe(0);
            const history = await audit.getHistory();
            expect(history).toHaveLength(1);
            expect(history[0]).toMatchObject({ operation: 'create', status: 'REJECTED', reason: 'INSUFFICIENT_PAYMENT', value: '99' });
        });

        test('defaults to the standard fee', () => {
            expect(new EvolvingBlocks({ owner: DEPLOYER }).creationFee).toBe(DEFAULT_CREATION_FEE);
        });

        test('emits BlockCreated', async () => {
            await blocks.create(context('alice', T0, FEE));
            const [event] = await audit.getEvents({ name: 'BlockCreated' });
            expect(event).toMatchObject({ contract: 'blocks', args: { blockId: 1, owner: 'alice', power: 100 }, timestamp: T0 });
        });
    });

    describe('evolve', () => {
        beforeEach(async () => {
            await blocks.create(context('alice', T0, FEE));
        });

        test('fails one second before maturity', async () => {
            await expect(blocks.evolve(context('alice', T0 + EVOLUTION_TIME - 1), 1))
                .rejects.toMatchObject({ code: ErrorCode.EVOLUTION_NOT_READY });
            expect(blocks.getBlock(1)?.generation).toBe(1);
        });

        test('succeeds exactly at maturity and restarts the clock', async () => {
            const evolved = await blocks.evolve(context('alice', T0 + EVOLUTION_TIME), 1);

            expect(evolved).toMatchObject({ generation: 2, power: 200, birthTime: T0 + EVOLUTION_TIME });
            expect(blocks.getBlock(1)).toEqual(evolved);
            expect(blocks.timeUntilEvolution(1, T0 + EVOLUTION_TIME)).toBe(EVOLUTION_TIME);
        });

        test('power grows by half the base power times the new generation', async () => {
            await blocks.evolve(context('alice', T0 + EVOLUTION_TIME), 1);
            const third = await blocks.evolve(context('alice', T0 + 2 * EVOLUTION_TIME), 1);
            expect(third).toMatchObject({ generation: 3, power: 350 });
        });

        test('checks existence, then ownership', async () => {
            const later = T0 + EVOLUTION_TIME;
            await expect(blocks.evolve(context('alice', later), 42)).rejects.toMatchObject({ code: ErrorCode.NOT_FOUND });
            await expect(blocks.evolve(context('bob', later), 1)).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
        });

        test('refuses ids that are not non-negative integers', async () => {
            const later = T0 + EVOLUTION_TIME;
            const before = (await audit.getHistory()).length;

            await expect(blocks.evolve(context('alice', later), -1)).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            const history = await audit.getHistory();
            expect(history).toHaveLength(before + 1);
            expect(history[before]).toMatchObject({ status: 'REJECTED', reason: 'INVALID_ARGUMENT', args: { blockId: -1 } });

            await expect(blocks.evolve(context('alice', later), NaN)).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
            expect(await audit.getHistory()).toHaveLength(before + 1);
        });

        test('timeUntilEvolution counts down to zero', () => {
            expect(blocks.timeUntilEvolution(1, T0)).toBe(EVOLUTION_TIME);
            expect(blocks.timeUntilEvolution(1, T0 + 10)).toBe(EVOLUTION_TIME - 10);
            expect(blocks.timeUntilEvolution(1, T0 + EVOLUTION_TIME + 5)).toBe(0);
            expect(() => blocks.timeUntilEvolution(9, T0)).toThrow('Block 9 not found');
        });
    });

    describe('merge', () => {
        const later = T0 + EVOLUTION_TIME;

        beforeEach(async () => {
            await blocks.create(context('alice', T0, FEE));
            await blocks.create(context('alice', T0, FEE));
            await blocks.create(context('bob', T0, FEE));
            await blocks.evolve(context('alice', later), 1);
        });

        test('sums power, bumps generation and retires both inputs', async () => {
            const first = blocks.getBlock(1);
            const id = await blocks.merge(context('alice', later), 1, 2);

            expect(id).toBe(4);
            expect(blocks.getBlock(4)).toEqual({
                id: 4,
                owner: 'alice',
                power: 300,
                generation: 3,
                birthTime: later,
                color: first?.color,
                isActive: true
            });
            expect(blocks.getBlock(1)?.isActive).toBe(false);
            expect(blocks.getBlock(2)?.isActive).toBe(false);
            expect(blocks.getBlocksOf('alice')).toEqual([1, 2, 4]);
        });

        test('retired blocks can neither evolve nor merge again', async () => {
            await blocks.merge(context('alice', later), 1, 2);
            await expect(blocks.evolve(context('alice', later + EVOLUTION_TIME), 1)).rejects.toMatchObject({ code: ErrorCode.INACTIVE });
            await expect(blocks.merge(context('alice', later + EVOLUTION_TIME), 4, 2)).rejects.toMatchObject({ code: ErrorCode.INACTIVE });
        });

        test('rejects a block merged with itself', async () => {
            await expect(blocks.merge(context('alice', later), 1, 1)).rejects.toMatchObject({ code: ErrorCode.SELF_MERGE });
            expect(blocks.getBlock(1)?.isActive).toBe(true);
        });

        test('caller must own both blocks', async () => {
            await expect(blocks.merge(context('alice', later), 1, 3)).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
            expect(blocks.getBlock(1)?.isActive).toBe(true);
            expect(blocks.getBlock(3)?.isActive).toBe(true);
            expect(blocks.totalBlocks()).toBe(3);
        });

        test('emits BlocksMerged', async () => {
            await blocks.merge(context('alice', later), 1, 2);
            const [event] = await audit.getEvents({ name: 'BlocksMerged' });
            expect(event?.args).toEqual({ blockIdA: 1, blockIdB: 2, newBlockId: 4, power: 300, generation: 3 });
        });
    });

    describe('administration', () => {
        test('only the contract owner withdraws fees', async () => {
            await blocks.create(context('alice', T0, FEE));
            await blocks.create(context('alice', T0, FEE));

            await expect(blocks.withdrawFees(context('alice', T0), 'alice')).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
            await expect(blocks.withdrawFees(context(DEPLOYER, T0), ZERO_ADDRESS)).rejects.toMatchObject({ code: ErrorCode.ZERO_ADDRESS });

            expect(await blocks.withdrawFees(context(DEPLOYER, T0), 'treasury')).toBe(200n);
            expect(blocks.collectedFees()).toBe(0n);
        });

        test('ownership moves to the new owner only', async () => {
            await expect(blocks.transferOwnership(context('alice', T0), 'alice')).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
            await blocks.transferOwnership(context(DEPLOYER, T0), 'alice');

            expect(blocks.owner()).toBe('alice');
            await expect(blocks.withdrawFees(context(DEPLOYER, T0), 'treasury')).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
            const [event] = await audit.getEvents({ name: 'OwnershipTransferred' });
            expect(event?.args).toEqual({ previousOwner: DEPLOYER, newOwner: 'alice' });
        });

        test('contract ownership does not touch block ownership', async () => {
            await blocks.create(context('alice', T0, FEE));
            await blocks.transferOwnership(context(DEPLOYER, T0), 'bob');
            await expect(blocks.evolve(context('bob', T0 + EVOLUTION_TIME), 1)).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
        });

        test('the snapshot chain stays intact across calls', async () => {
            await blocks.create(context('alice', T0, FEE));
            await blocks.evolve(context('alice', T0 + EVOLUTION_TIME), 1);
            expect(blocks.version).toBe(2);
            expect(blocks.verifyIntegrity()).toBe(true);
        });
    });
});
