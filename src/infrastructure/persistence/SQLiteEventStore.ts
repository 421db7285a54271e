import Database from 'better-sqlite3';
import type { IEventStore, Evidence, EvidenceStatus } from '../../kernel-core/L5/Audit.js';
import type { CallArgs, LedgerEvent } from '../../kernel-core/L0/Primitives.js';
import { ErrorCode, LedgerError } from '../../kernel-core/Errors.js';

interface EvidenceRow {
    sequence: number;
    evidenceId: string;
    previousEvidenceId: string;
    contract: string;
    operation: string;
    caller: string;
    value: string;
    timestamp: number;
    args: string;
    events: string;
    status: string;
    reason: string | null;
}

function parseStatus(status: string): EvidenceStatus {
    if (status === 'COMMITTED' || status === 'REJECTED') return status;
    throw new LedgerError(ErrorCode.INTEGRITY_BREACH, `Unknown journal status: ${status}`);
}

function parseJson<T>(text: string, guard: (v: unknown) => v is T, column: string): T {
    const parsed: unknown = JSON.parse(text);
    if (!guard(parsed)) throw new LedgerError(ErrorCode.INTEGRITY_BREACH, `Malformed journal column: ${column}`);
    return parsed;
}

function isArgs(v: unknown): v is CallArgs {
    return typeof v === 'object' && v !== null && !Array.isArray(v)
        && Object.values(v).every(x => typeof x === 'string' || typeof x === 'number' || typeof x === 'boolean');
}

function isEvents(v: unknown): v is LedgerEvent[] {
    return Array.isArray(v) && v.every(e =>
        typeof e === 'object' && e !== null
        && typeof Reflect.get(e, 'contract') === 'string'
        && typeof Reflect.get(e, 'name') === 'string'
        && typeof Reflect.get(e, 'timestamp') === 'number'
        && isArgs(Reflect.get(e, 'args')));
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = 'ledger.db') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ledger_events (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                contract TEXT NOT NULL,
                operation TEXT NOT NULL,
                caller TEXT NOT NULL,
                value TEXT NOT NULL,
                timestamp INTEGER NOT NULL,
                args TEXT NOT NULL,
                events TEXT NOT NULL,
                status TEXT NOT NULL,
                reason TEXT
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO ledger_events (
                evidenceId, previousEvidenceId, contract, operation, caller, value, timestamp, args, events, status, reason
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.contract,
            evidence.operation,
            evidence.caller,
            evidence.value,
            evidence.timestamp,
            JSON.stringify(evidence.args),
            JSON.stringify(evidence.events),
            evidence.status,
            evidence.reason ?? null
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const rows = this.db.prepare<[], EvidenceRow>('SELECT * FROM ledger_events ORDER BY sequence ASC').all();
        return rows.map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const row = this.db.prepare<[], EvidenceRow>('SELECT * FROM ledger_events ORDER BY sequence DESC LIMIT 1').get();
        return row ? this.mapRowToEvidence(row) : null;
    }

    private mapRowToEvidence(row: EvidenceRow): Evidence {
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            contract: row.contract,
            operation: row.operation,
            caller: row.caller,
            value: row.value,
            timestamp: row.timestamp,
            args: parseJson(row.args, isArgs, 'args'),
            events: parseJson(row.events, isEvents, 'events'),
            status: parseStatus(row.status),
            ...(row.reason !== null ? { reason: row.reason } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
