import { AuditLog } from '../kernel-core/L5/Audit.js';
import type { IEventStore } from './Ports.js';
import { ReplayEngine } from '../kernel-core/L0/Replay.js';
import { EvolvingBlocks } from '../Contracts/EvolvingBlocks/EvolvingBlocks.js';
import { ContentRegistry } from '../Contracts/ContentRegistry/ContentRegistry.js';
import { TokenLedger } from '../Contracts/Token/TokenLedger.js';
import type { LedgerConfig } from '../config.js';
import { ErrorCode, LedgerError } from '../kernel-core/Errors.js';

/**
 * LedgerPlatform: the three contracts on one shared audit journal.
 * All outer surfaces call through this. None builds contracts directly.
 */
export class LedgerPlatform {
    public readonly audit: AuditLog;
    public readonly blocks: EvolvingBlocks;
    public readonly registry: ContentRegistry;
    public readonly token: TokenLedger;
    private booted = false;

    constructor(config: Omit<LedgerConfig, 'port' | 'dbPath'>, eventStore?: IEventStore) {
        this.audit = new AuditLog(eventStore);
        this.blocks = new EvolvingBlocks({ owner: config.deployer, creationFee: config.blocks.creationFee }, this.audit);
        this.registry = new ContentRegistry({ owner: config.deployer }, this.audit);
        this.token = new TokenLedger({ owner: config.deployer, ...config.token }, this.audit);
    }

    public get isBooted(): boolean { return this.booted; }

    /**
     * Rebuilds contract state from the journal. Must run once, before the
     * first call.
     */
    public async boot(): Promise<number> {
        if (this.booted) throw new LedgerError(ErrorCode.INVALID_ARGUMENT, 'Platform already booted');
        const applied = await new ReplayEngine().replay(this.audit, [this.blocks, this.registry, this.token]);
        this.booted = true;
        return applied;
    }

    public verifyIntegrity(): boolean {
        return this.blocks.verifyIntegrity() && this.registry.verifyIntegrity() && this.token.verifyIntegrity();
    }
}
