import { StateModel } from '../L2/State.js';
import type { Recipe, StateSnapshot } from '../L2/State.js';
import type { Invariant } from '../L0/Invariants.js';
import type { ArgValue, CallArgs, CallContext } from '../L0/Primitives.js';
import { enforce, AddressGuard, ArgsGuard, TimeGuard } from '../L0/Guards.js';
import { AuditLog } from '../L5/Audit.js';
import type { Evidence } from '../L5/Audit.js';
import { ErrorCode, LedgerError, isLedgerError, describeError } from '../Errors.js';

export interface Replayable {
    readonly name: string;
    replay(entry: Evidence): Promise<void>;
}

/**
 * Contract: one ledger behind a single-writer state model.
 *
 * Every mutating call goes through `execute`, which
 *  - runs the recipe as one atomic transition,
 *  - journals the call (committed or rejected) on the shared audit log,
 *  - publishes the emitted events once the new state is visible.
 * Arguments or timestamps that would not survive the journal are refused
 * before anything is written.
 */
export abstract class Contract<S extends object> implements Replayable {
    protected readonly model: StateModel<S>;
    private replaying = false;

    protected constructor(
        public readonly name: string,
        genesis: S,
        invariants: readonly Invariant<S>[],
        private readonly audit?: AuditLog
    ) {
        this.model = new StateModel(name, genesis, invariants);
    }

    public get version(): number { return this.model.version; }

    public getSnapshotChain(): readonly StateSnapshot<S>[] { return this.model.getSnapshotChain(); }

    public verifyIntegrity(): boolean { return this.model.verifyIntegrity(); }

    protected async execute<R>(operation: string, ctx: CallContext, args: CallArgs, recipe: Recipe<S, R>): Promise<R> {
        const unjournalable = [ArgsGuard({ args }), TimeGuard({ currentTs: ctx.timestamp, lastTs: 0 })].find(r => !r.ok);
        if (unjournalable) {
            console.warn(`[${this.name}] Refused ${operation} from ${ctx.caller}: ${unjournalable.violation ?? 'bad arguments'}`);
            enforce(unjournalable);
        }

        try {
            enforce(AddressGuard({ address: ctx.caller, role: 'caller' }));

            const transition = await this.model.transact(operation, ctx, recipe, async t => {
                if (!this.audit || this.replaying) return;
                try {
                    await this.audit.append({
                        contract: this.name,
                        operation,
                        caller: ctx.caller,
                        value: ctx.value.toString(),
                        timestamp: ctx.timestamp,
                        args,
                        events: t.events,
                        status: 'COMMITTED'
                    });
                } catch (e: unknown) {
                    console.error(`[${this.name}] Journal write failed for ${operation}: ${describeError(e)}`);
                    throw new LedgerError(ErrorCode.COMMIT_FAILED, `Journal write failed: ${describeError(e)}`);
                }
            });

            if (this.audit && !this.replaying) this.audit.publish(transition.events);
            return transition.result;
        } catch (e: unknown) {
            if (isLedgerError(e) && e.code !== ErrorCode.COMMIT_FAILED && !this.replaying) {
                await this.journalRejection(operation, ctx, args, e);
            }
            throw e;
        }
    }

    private async journalRejection(operation: string, ctx: CallContext, args: CallArgs, error: LedgerError): Promise<void> {
        console.warn(`[${this.name}] Rejected ${operation} from ${ctx.caller}: ${error.code}`);
        if (!this.audit) return;
        try {
            await this.audit.append({
                contract: this.name,
                operation,
                caller: ctx.caller,
                value: ctx.value.toString(),
                timestamp: ctx.timestamp,
                args,
                events: [],
                status: 'REJECTED',
                reason: error.code
            });
        } catch (e: unknown) {
            console.error(`[${this.name}] Could not journal rejection of ${operation}: ${describeError(e)}`);
        }
    }

    /**
     * Re-executes a journaled call without journaling it again.
     */
    public async replay(entry: Evidence): Promise<void> {
        const ctx: CallContext = { caller: entry.caller, value: BigInt(entry.value), timestamp: entry.timestamp };
        this.replaying = true;
        try {
            await this.dispatch(entry.operation, entry.args, ctx);
        } finally {
            this.replaying = false;
        }
    }

    protected abstract dispatch(operation: string, args: CallArgs, ctx: CallContext): Promise<unknown>;
}

// --- Journaled argument readers ---

function arg(args: CallArgs, key: string): ArgValue {
    const value = Object.hasOwn(args, key) ? args[key] : undefined;
    if (value === undefined) throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `Missing argument: ${key}`);
    return value;
}

export function argString(args: CallArgs, key: string): string {
    const value = arg(args, key);
    if (typeof value !== 'string') throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `Argument ${key} must be a string`);
    return value;
}

export function argNumber(args: CallArgs, key: string): number {
    const value = arg(args, key);
    if (typeof value !== 'number') throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `Argument ${key} must be a number`);
    return value;
}

export function argBoolean(args: CallArgs, key: string): boolean {
    const value = arg(args, key);
    if (typeof value !== 'boolean') throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `Argument ${key} must be a boolean`);
    return value;
}

export function argBigInt(args: CallArgs, key: string): bigint {
    const value = argString(args, key);
    if (!/^-?\d+$/.test(value)) throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `Argument ${key} must be an integer string`);
    return BigInt(value);
}

export function unknownOperation(contract: string, operation: string): never {
    throw new LedgerError(ErrorCode.INVALID_ARGUMENT, `${contract} has no operation ${operation}`);
}
