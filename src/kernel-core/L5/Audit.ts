// src/kernel-core/L5/Audit.ts
import { hash, canonicalize, GENESIS_HASH } from '../L0/Crypto.js';
import type { Address, CallArgs, LedgerEvent } from '../L0/Primitives.js';
import { describeError } from '../Errors.js';

export type EvidenceStatus = 'COMMITTED' | 'REJECTED';

/**
 * Event Store Port
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

// --- Evidence: one journaled call ---
export interface Evidence {
    evidenceId: string; // The identifying hash
    previousEvidenceId: string; // Chain linkage
    contract: string;
    operation: string;
    caller: Address;
    value: string; // Attached payment, decimal
    timestamp: number;
    args: CallArgs;
    events: LedgerEvent[];
    status: EvidenceStatus;
    reason?: string;
}

export type EvidenceInput = Omit<Evidence, 'evidenceId' | 'previousEvidenceId'>;

export type EventListener = (event: LedgerEvent) => void | Promise<void>;

export class AuditLog {
    private localChain: Evidence[] = [];
    private listeners: EventListener[] = [];
    private queue: Promise<unknown> = Promise.resolve();

    constructor(private store?: IEventStore) { }

    /**
     * Appends one entry. Appends are serialized so the chain never forks
     * when several contracts share the log.
     */
    public append(input: EvidenceInput): Promise<Evidence> {
        const run = this.queue.then(() => this.write(input));
        this.queue = run.catch(() => undefined);
        return run;
    }

    private async write(input: EvidenceInput): Promise<Evidence> {
        const latest = await this.getTip();
        const previousHash = latest ? latest.evidenceId : GENESIS_HASH;

        const evidence: Evidence = {
            ...input,
            evidenceId: this.calculateHash(previousHash, input),
            previousEvidenceId: previousHash
        };

        // Immutability Law
        Object.freeze(evidence);

        if (this.store) {
            await this.store.append(evidence);
        }

        this.localChain.push(evidence);
        return evidence;
    }

    /**
     * Registers an observer for committed events. Delivery is fire-and-forget.
     */
    public subscribe(listener: EventListener): () => void {
        this.listeners.push(listener);
        return () => {
            this.listeners = this.listeners.filter(l => l !== listener);
        };
    }

    public publish(events: readonly LedgerEvent[]): void {
        for (const event of events) {
            for (const listener of this.listeners) {
                try {
                    Promise.resolve(listener(event)).catch((e: unknown) => {
                        console.warn(`[AuditLog] Subscriber failed on ${event.contract}.${event.name}: ${describeError(e)}`);
                    });
                } catch (e: unknown) {
                    console.warn(`[AuditLog] Subscriber failed on ${event.contract}.${event.name}: ${describeError(e)}`);
                }
            }
        }
    }

    public async getHistory(): Promise<Evidence[]> {
        if (this.store) {
            return await this.store.getHistory();
        }
        return [...this.localChain];
    }

    public async getEvents(filter?: { contract?: string, name?: string }): Promise<LedgerEvent[]> {
        const history = await this.getHistory();
        return history
            .flatMap(entry => entry.events)
            .filter(e => (!filter?.contract || e.contract === filter.contract) && (!filter?.name || e.name === filter.name));
    }

    // Historical Legitimacy
    public async verifyChain(): Promise<boolean> {
        const history = await this.getHistory();
        let prev = GENESIS_HASH;

        for (const entry of history) {
            if (entry.previousEvidenceId !== prev) return false;

            const { evidenceId, previousEvidenceId, ...input } = entry;
            if (this.calculateHash(prev, input) !== evidenceId) return false;

            prev = evidenceId;
        }
        return true;
    }

    public async getTip(): Promise<Evidence | null> {
        if (this.localChain.length > 0) return this.localChain[this.localChain.length - 1] ?? null;
        if (this.store) return await this.store.getLatest();
        return null;
    }

    private calculateHash(prevHash: string, input: EvidenceInput): string {
        // [PreviousHash, Contract, Operation, Caller, Value, Timestamp, Args, Events, Status, Reason]
        const canonical = [
            prevHash,
            input.contract,
            input.operation,
            input.caller,
            input.value,
            input.timestamp,
            input.args,
            input.events,
            input.status,
            input.reason ?? ''
        ];
        return hash(canonicalize(canonical));
    }
}
