// src/kernel-core/L0/Invariants.ts
import { ErrorCode } from '../Errors.js';

/**
 * A predicate over a contract's whole state. Checked on every candidate
 * state before it is committed.
 */
export interface Invariant<S> {
    id: string;
    boundary: string; // The named boundary (e.g. "Supply Conservation")
    description: string;
    predicate: (state: S) => boolean;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    message: string;
}

export function checkInvariants<S>(state: S, invariants: readonly Invariant<S>[]): { ok: boolean; rejection?: Rejection } {
    for (const inv of invariants) {
        if (!inv.predicate(state)) {
            return {
                ok: false,
                rejection: {
                    code: ErrorCode.INTEGRITY_BREACH,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    message: `Invariant Violation: ${inv.description}`
                }
            };
        }
    }
    return { ok: true };
}

// --- Shared building blocks ---

/** Ids in every owner index must resolve to an entity. */
export function indexResolves(index: Record<string, readonly number[]>, entities: Record<string, unknown>): boolean {
    return Object.values(index).every(ids => ids.every(id => entities[String(id)] !== undefined));
}

/** Every allocated id is below the next one to be handed out. */
export function idsBelowCounter(entities: Record<string, unknown>, nextId: number): boolean {
    return Object.keys(entities).every(id => Number(id) < nextId);
}
