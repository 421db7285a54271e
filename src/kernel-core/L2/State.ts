import { produce, freeze } from 'immer';
import type { Draft } from 'immer';
import type { CallArgs, CallContext, LedgerEvent } from '../L0/Primitives.js';
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';
import { checkInvariants } from '../L0/Invariants.js';
import type { Invariant } from '../L0/Invariants.js';
import { enforce, TimeGuard } from '../L0/Guards.js';
import { ErrorCode, LedgerError } from '../Errors.js';

export interface StateSnapshot<S> {
    state: S;
    version: number;
    operation: string;
    timestamp: number;
    stateRoot: string; // Hash of the canonical state
    hash: string;
    previousHash: string;
}

export type Emit = (name: string, args: CallArgs) => void;
export type Recipe<S, R> = (draft: Draft<S>, emit: Emit) => R;

/**
 * A computed but not yet committed state change.
 */
export interface Transition<S, R> {
    operation: string;
    context: CallContext;
    next: S;
    result: R;
    events: LedgerEvent[];
}

export class StateModel<S extends object> {
    private currentState: S;
    private lastTimestamp = 0;

    // Hash chain of committed states
    private snapshots: StateSnapshot<S>[] = [];

    // Single-writer queue: each transition starts after the previous one settles
    private queue: Promise<unknown> = Promise.resolve();

    constructor(
        private readonly contract: string,
        genesis: S,
        private readonly invariants: readonly Invariant<S>[] = []
    ) {
        this.currentState = freeze(genesis, true);

        const stateRoot = this.rootOf(this.currentState);
        this.snapshots.push({
            state: this.currentState,
            version: 0,
            operation: 'genesis',
            timestamp: 0,
            stateRoot,
            hash: this.linkHash(0, 'genesis', 0, stateRoot, GENESIS_HASH),
            previousHash: GENESIS_HASH
        });
    }

    public get state(): S { return this.currentState; }

    public get version(): number { return this.snapshots.length - 1; }

    public getSnapshotChain(): readonly StateSnapshot<S>[] { return this.snapshots; }

    /**
     * Queues one atomic transition. The recipe mutates a draft; nothing is
     * visible until invariants hold and `beforeCommit` (the journal write)
     * resolves. Any throw along the way discards the draft.
     */
    public transact<R>(
        operation: string,
        ctx: CallContext,
        recipe: Recipe<S, R>,
        beforeCommit?: (transition: Transition<S, R>) => Promise<void>
    ): Promise<Transition<S, R>> {
        const run = this.queue.then(() => this.apply(operation, ctx, recipe, beforeCommit));
        // The queue moves on past a rejected call; the caller still receives the rejection through `run`.
        this.queue = run.catch(() => undefined);
        return run;
    }

    private async apply<R>(
        operation: string,
        ctx: CallContext,
        recipe: Recipe<S, R>,
        beforeCommit?: (transition: Transition<S, R>) => Promise<void>
    ): Promise<Transition<S, R>> {
        enforce(TimeGuard({ currentTs: ctx.timestamp, lastTs: this.lastTimestamp }));

        const events: LedgerEvent[] = [];
        const emit: Emit = (name, args) => {
            events.push({ contract: this.contract, name, args, timestamp: ctx.timestamp });
        };

        let outcome: { value: R } | undefined;
        const next = produce(this.currentState, draft => {
            outcome = { value: recipe(draft, emit) };
        });
        if (!outcome) throw new LedgerError(ErrorCode.COMMIT_FAILED, `${operation} produced no outcome`);

        const check = checkInvariants(next, this.invariants);
        if (!check.ok && check.rejection) {
            throw new LedgerError(check.rejection.code, check.rejection.message, {
                invariantId: check.rejection.invariantId,
                boundary: check.rejection.boundary
            });
        }

        const transition: Transition<S, R> = { operation, context: ctx, next, result: outcome.value, events };
        if (beforeCommit) await beforeCommit(transition);

        this.commit(transition);
        return transition;
    }

    private commit<R>(transition: Transition<S, R>): void {
        const previous = this.snapshots[this.snapshots.length - 1];
        if (!previous) throw new LedgerError(ErrorCode.INTEGRITY_BREACH, 'Genesis snapshot missing');

        const version = previous.version + 1;
        const timestamp = transition.context.timestamp;
        const stateRoot = this.rootOf(transition.next);

        this.snapshots.push({
            state: transition.next,
            version,
            operation: transition.operation,
            timestamp,
            stateRoot,
            hash: this.linkHash(version, transition.operation, timestamp, stateRoot, previous.hash),
            previousHash: previous.hash
        });
        this.currentState = transition.next;
        this.lastTimestamp = timestamp;
    }

    public verifyIntegrity(): boolean {
        for (let i = 0; i < this.snapshots.length; i++) {
            const curr = this.snapshots[i];
            if (!curr) return false;

            const expectedPrev = i === 0 ? GENESIS_HASH : this.snapshots[i - 1]?.hash;
            if (curr.previousHash !== expectedPrev) return false;

            const root = this.rootOf(curr.state);
            if (root !== curr.stateRoot) return false;
            if (this.linkHash(curr.version, curr.operation, curr.timestamp, root, curr.previousHash) !== curr.hash) return false;
        }
        return true;
    }

    private rootOf(state: S): string {
        return hash(canonicalize(state));
    }

    private linkHash(version: number, operation: string, timestamp: number, stateRoot: string, previousHash: string): string {
        const canonical: [number, string, number, string, string] = [version, operation, timestamp, stateRoot, previousHash];
        return hash(canonicalize(canonical));
    }
}
