import { Contract, argBigInt, argString, unknownOperation } from '../../kernel-core/L4/Contract.js';
import type { Invariant } from '../../kernel-core/L0/Invariants.js';
import type { Address, CallArgs, CallContext } from '../../kernel-core/L0/Primitives.js';
import { own, ZERO_ADDRESS } from '../../kernel-core/L0/Primitives.js';
import { enforce, AddressGuard, AmountGuard, BalanceGuard, AllowanceGuard } from '../../kernel-core/L0/Guards.js';
import { onlyOwner, transferOwnership } from '../../kernel-core/L1/Ownership.js';
import { AuditLog } from '../../kernel-core/L5/Audit.js';

export interface TokenMetadata {
    readonly name: string;
    readonly symbol: string;
    readonly decimals: number;
}

export interface TokenState extends TokenMetadata {
    readonly owner: Address;
    readonly totalSupply: bigint;
    readonly balances: Readonly<Record<Address, bigint>>;
    readonly allowances: Readonly<Record<Address, Readonly<Record<Address, bigint>>>>;
}

export interface TokenParams {
    owner: Address;
    name: string;
    symbol: string;
    decimals?: number;
    /** Credited to `owner` in the genesis state. */
    initialSupply?: bigint;
}

type Balances = Record<Address, bigint>;
type Allowances = Record<Address, Record<Address, bigint>>;

export const TOKEN_INVARIANTS: Invariant<TokenState>[] = [
    {
        id: 'TOK-01',
        boundary: 'Supply Conservation',
        description: 'Sum of balances equals total supply',
        predicate: s => Object.values(s.balances).reduce((sum, b) => sum + b, 0n) === s.totalSupply
    },
    {
        id: 'TOK-02',
        boundary: 'Resource Bounds',
        description: 'Balances are never negative',
        predicate: s => Object.values(s.balances).every(b => b >= 0n)
    },
    {
        id: 'TOK-03',
        boundary: 'Resource Bounds',
        description: 'Allowances are never negative',
        predicate: s => Object.values(s.allowances).every(row => Object.values(row).every(a => a >= 0n))
    }
];

function balanceIn(balances: Readonly<Balances>, holder: Address): bigint {
    return own(balances, holder) ?? 0n;
}

function allowanceIn(allowances: Readonly<Allowances>, holder: Address, spender: Address): bigint {
    const row = own(allowances, holder);
    return row ? own(row, spender) ?? 0n : 0n;
}

function setAllowance(allowances: Allowances, holder: Address, spender: Address, amount: bigint): void {
    const row = own(allowances, holder);
    if (row) row[spender] = amount;
    else allowances[holder] = { [spender]: amount };
}

function move(balances: Balances, from: Address, to: Address, amount: bigint): void {
    enforce(BalanceGuard({ balance: balanceIn(balances, from), amount, holder: from }));
    balances[from] = balanceIn(balances, from) - amount;
    balances[to] = balanceIn(balances, to) + amount;
}

/**
 * TokenLedger: ERC20-style balances with owner-only mint and burn.
 */
export class TokenLedger extends Contract<TokenState> {
    constructor(params: TokenParams, audit?: AuditLog) {
        const initialSupply = params.initialSupply ?? 0n;
        super('token', {
            owner: params.owner,
            name: params.name,
            symbol: params.symbol,
            decimals: params.decimals ?? 18,
            totalSupply: initialSupply,
            balances: initialSupply > 0n ? { [params.owner]: initialSupply } : {},
            allowances: {}
        }, TOKEN_INVARIANTS, audit);
    }

    public transfer(ctx: CallContext, to: Address, amount: bigint): Promise<void> {
        return this.execute('transfer', ctx, { to, amount: amount.toString() }, (draft, emit) => {
            enforce(AmountGuard({ amount }));
            enforce(AddressGuard({ address: to, role: 'recipient' }));

            move(draft.balances, ctx.caller, to, amount);
            emit('Transfer', { from: ctx.caller, to, value: amount.toString() });
        });
    }

    /** Overwrites the allowance; it does not add to it. */
    public approve(ctx: CallContext, spender: Address, amount: bigint): Promise<void> {
        return this.execute('approve', ctx, { spender, amount: amount.toString() }, (draft, emit) => {
            enforce(AmountGuard({ amount }));
            enforce(AddressGuard({ address: spender, role: 'spender' }));

            setAllowance(draft.allowances, ctx.caller, spender, amount);
            emit('Approval', { owner: ctx.caller, spender, value: amount.toString() });
        });
    }

    public increaseAllowance(ctx: CallContext, spender: Address, added: bigint): Promise<bigint> {
        return this.execute('increaseAllowance', ctx, { spender, added: added.toString() }, (draft, emit) => {
            enforce(AmountGuard({ amount: added }));
            enforce(AddressGuard({ address: spender, role: 'spender' }));

            const next = allowanceIn(draft.allowances, ctx.caller, spender) + added;
            setAllowance(draft.allowances, ctx.caller, spender, next);
            emit('Approval', { owner: ctx.caller, spender, value: next.toString() });
            return next;
        });
    }

    public decreaseAllowance(ctx: CallContext, spender: Address, subtracted: bigint): Promise<bigint> {
        return this.execute('decreaseAllowance', ctx, { spender, subtracted: subtracted.toString() }, (draft, emit) => {
            enforce(AmountGuard({ amount: subtracted }));
            enforce(AddressGuard({ address: spender, role: 'spender' }));

            const current = allowanceIn(draft.allowances, ctx.caller, spender);
            enforce(AllowanceGuard({ allowance: current, amount: subtracted }));

            const next = current - subtracted;
            setAllowance(draft.allowances, ctx.caller, spender, next);
            emit('Approval', { owner: ctx.caller, spender, value: next.toString() });
            return next;
        });
    }

    public transferFrom(ctx: CallContext, from: Address, to: Address, amount: bigint): Promise<void> {
        return this.execute('transferFrom', ctx, { from, to, amount: amount.toString() }, (draft, emit) => {
            enforce(AmountGuard({ amount }));
            enforce(AddressGuard({ address: from, role: 'sender' }));
            enforce(AddressGuard({ address: to, role: 'recipient' }));
            enforce(BalanceGuard({ balance: balanceIn(draft.balances, from), amount, holder: from }));

            const allowance = allowanceIn(draft.allowances, from, ctx.caller);
            enforce(AllowanceGuard({ allowance, amount }));

            move(draft.balances, from, to, amount);
            setAllowance(draft.allowances, from, ctx.caller, allowance - amount);
            emit('Transfer', { from, to, value: amount.toString() });
        });
    }

    public mint(ctx: CallContext, to: Address, amount: bigint): Promise<void> {
        return this.execute('mint', ctx, { to, amount: amount.toString() }, (draft, emit) => {
            onlyOwner(draft, ctx.caller);
            enforce(AmountGuard({ amount }));
            enforce(AddressGuard({ address: to, role: 'recipient' }));

            draft.balances[to] = balanceIn(draft.balances, to) + amount;
            draft.totalSupply += amount;
            emit('Transfer', { from: ZERO_ADDRESS, to, value: amount.toString() });
        });
    }

    public burn(ctx: CallContext, from: Address, amount: bigint): Promise<void> {
        return this.execute('burn', ctx, { from, amount: amount.toString() }, (draft, emit) => {
            onlyOwner(draft, ctx.caller);
            enforce(AmountGuard({ amount }));
            enforce(AddressGuard({ address: from, role: 'holder' }));
            const balance = balanceIn(draft.balances, from);
            enforce(BalanceGuard({ balance, amount, holder: from }));

            draft.balances[from] = balance - amount;
            draft.totalSupply -= amount;
            emit('Transfer', { from, to: ZERO_ADDRESS, value: amount.toString() });
        });
    }

    public transferOwnership(ctx: CallContext, newOwner: Address): Promise<void> {
        return this.execute('transferOwnership', ctx, { newOwner }, (draft, emit) => {
            transferOwnership(draft, ctx.caller, newOwner, emit);
        });
    }

    // --- Queries ---

    public owner(): Address { return this.model.state.owner; }

    public metadata(): TokenMetadata {
        const { name, symbol, decimals } = this.model.state;
        return { name, symbol, decimals };
    }

    public totalSupply(): bigint { return this.model.state.totalSupply; }

    public balanceOf(holder: Address): bigint { return balanceIn(this.model.state.balances, holder); }

    public allowance(holder: Address, spender: Address): bigint {
        return allowanceIn(this.model.state.allowances, holder, spender);
    }

    /** Every address that has ever held a balance entry. */
    public holders(): Address[] { return Object.keys(this.model.state.balances); }

    protected dispatch(operation: string, args: CallArgs, ctx: CallContext): Promise<unknown> {
        switch (operation) {
            case 'transfer': return this.transfer(ctx, argString(args, 'to'), argBigInt(args, 'amount'));
            case 'approve': return this.approve(ctx, argString(args, 'spender'), argBigInt(args, 'amount'));
            case 'increaseAllowance': return this.increaseAllowance(ctx, argString(args, 'spender'), argBigInt(args, 'added'));
            case 'decreaseAllowance': return this.decreaseAllowance(ctx, argString(args, 'spender'), argBigInt(args, 'subtracted'));
            case 'transferFrom': return this.transferFrom(ctx, argString(args, 'from'), argString(args, 'to'), argBigInt(args, 'amount'));
            case 'mint': return this.mint(ctx, argString(args, 'to'), argBigInt(args, 'amount'));
            case 'burn': return this.burn(ctx, argString(args, 'from'), argBigInt(args, 'amount'));
            case 'transferOwnership': return this.transferOwnership(ctx, argString(args, 'newOwner'));
            default: return unknownOperation(this.name, operation);
        }
    }
}
