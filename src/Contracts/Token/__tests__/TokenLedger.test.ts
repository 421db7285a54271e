import { describe, test, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { TokenLedger } from '../TokenLedger.js';
import { AuditLog } from '../../../kernel-core/L5/Audit.js';
import { context, ZERO_ADDRESS } from '../../../kernel-core/L0/Primitives.js';
import { ErrorCode } from '../../../kernel-core/Errors.js';

const A = 'alice';
const B = 'bob';
const C = 'carol';

describe('Token Ledger', () => {
    let audit: AuditLog;
    let token: TokenLedger;

    beforeEach(() => {
        jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        audit = new AuditLog();
        token = new TokenLedger({ owner: A, name: 'Test Token', symbol: 'TST', decimals: 2, initialSupply: 100n }, audit);
    });

    afterEach(() => {
        jest.restoreAllMocks();
    });

    test('genesis credits the initial supply to the owner', () => {
        expect(token.metadata()).toEqual({ name: 'Test Token', symbol: 'TST', decimals: 2 });
        expect(token.totalSupply()).toBe(100n);
        expect(token.balanceOf(A)).toBe(100n);
        expect(token.balanceOf(B)).toBe(0n);
        expect(token.holders()).toEqual([A]);
    });

    test('delegated transfer: approve 40, spend 40', async () => {
        await token.approve(context(A, 1), B, 40n);
        await token.transferFrom(context(B, 2), A, C, 40n);

        expect(token.balanceOf(A)).toBe(60n);
        expect(token.balanceOf(C)).toBe(40n);
        expect(token.allowance(A, B)).toBe(0n);
        expect(token.totalSupply()).toBe(100n);
    });

    test('approve overwrites rather than adds', async () => {
        await token.approve(context(A, 1), B, 40n);
        await token.approve(context(A, 2), B, 25n);
        expect(token.allowance(A, B)).toBe(25n);
    });

    test('transfer moves balance and emits Transfer', async () => {
        await token.transfer(context(A, 1), B, 30n);

        expect(token.balanceOf(A)).toBe(70n);
        expect(token.balanceOf(B)).toBe(30n);
        const [event] = await audit.getEvents({ name: 'Transfer' });
        expect(event?.args).toEqual({ from: A, to: B, value: '30' });
    });

    test('transfer rejects overdrafts, the zero address and negative amounts', async () => {
        await expect(token.transfer(context(A, 1), B, 101n)).rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_BALANCE });
        await expect(token.transfer(context(A, 1), ZERO_ADDRESS, 1n)).rejects.toMatchObject({ code: ErrorCode.ZERO_ADDRESS });
        await expect(token.transfer(context(A, 1), B, -1n)).rejects.toMatchObject({ code: ErrorCode.INVALID_ARGUMENT });
        await expect(token.transfer(context(B, 1), A, 1n)).rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_BALANCE });
        expect(token.balanceOf(A)).toBe(100n);
    });

    test('transferFrom checks balance and allowance separately', async () => {
        await token.approve(context(A, 1), B, 10n);
        await expect(token.transferFrom(context(B, 2), A, C, 11n)).rejects.toMatchObject({ code: ErrorCode.ALLOWANCE_EXCEEDED });

        await token.approve(context(A, 3), B, 500n);
        await expect(token.transferFrom(context(B, 4), A, C, 101n)).rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_BALANCE });
        await expect(token.transferFrom(context(B, 4), A, ZERO_ADDRESS, 1n)).rejects.toMatchObject({ code: ErrorCode.ZERO_ADDRESS });

        expect(token.allowance(A, B)).toBe(500n);
        expect(token.balanceOf(C)).toBe(0n);
    });

    test('allowance can be raised and lowered', async () => {
        expect(await token.increaseAllowance(context(A, 1), B, 15n)).toBe(15n);
        expect(await token.increaseAllowance(context(A, 2), B, 5n)).toBe(20n);
        expect(await token.decreaseAllowance(context(A, 3), B, 8n)).toBe(12n);
        await expect(token.decreaseAllowance(context(A, 4), B, 13n)).rejects.toMatchObject({ code: ErrorCode.ALLOWANCE_EXCEEDED });
        expect(token.allowance(A, B)).toBe(12n);
    });

    test('approving the zero address is rejected', async () => {
        await expect(token.approve(context(A, 1), ZERO_ADDRESS, 5n)).rejects.toMatchObject({ code: ErrorCode.ZERO_ADDRESS });
    });

    test('mint is owner-only and grows supply', async () => {
        await expect(token.mint(context(B, 1), B, 5n)).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
        await expect(token.mint(context(A, 1), ZERO_ADDRESS, 5n)).rejects.toMatchObject({ code: ErrorCode.ZERO_ADDRESS });

        await token.mint(context(A, 2), B, 50n);
        expect(token.totalSupply()).toBe(150n);
        expect(token.balanceOf(B)).toBe(50n);
        const [event] = await audit.getEvents({ name: 'Transfer' });
        expect(event?.args).toEqual({ from: ZERO_ADDRESS, to: B, value: '50' });
    });

    test('burn is owner-only and cannot exceed the holder balance', async () => {
        await token.transfer(context(A, 1), B, 30n);

        await expect(token.burn(context(B, 2), B, 5n)).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
        await expect(token.burn(context(A, 2), B, 31n)).rejects.toMatchObject({ code: ErrorCode.INSUFFICIENT_BALANCE });

        await token.burn(context(A, 3), B, 30n);
        expect(token.balanceOf(B)).toBe(0n);
        expect(token.totalSupply()).toBe(70n);
        const burns = await audit.getEvents({ name: 'Transfer' });
        expect(burns[1]?.args).toEqual({ from: B, to: ZERO_ADDRESS, value: '30' });
    });

    test('burning from the zero address is refused even for nothing', async () => {
        const supply = token.totalSupply();
        await expect(token.burn(context(A, 1), ZERO_ADDRESS, 0n)).rejects.toMatchObject({ code: ErrorCode.ZERO_ADDRESS });
        expect(token.totalSupply()).toBe(supply);
    });

    test('a new owner takes over minting', async () => {
        await token.transferOwnership(context(A, 1), B);
        expect(token.owner()).toBe(B);
        await expect(token.mint(context(A, 2), A, 1n)).rejects.toMatchObject({ code: ErrorCode.NOT_OWNER });
        await token.mint(context(B, 2), B, 1n);
        expect(token.totalSupply()).toBe(101n);
    });

    test('amounts are journaled as decimal strings', async () => {
        await token.transferFrom(context(B, 1), A, C, 0n);
        await token.increaseAllowance(context(A, 2), B, 7n);

        const history = await audit.getHistory();
        expect(history.map(e => e.args)).toEqual([
            { from: A, to: C, amount: '0' },
            { spender: B, added: '7' }
        ]);
    });
});
