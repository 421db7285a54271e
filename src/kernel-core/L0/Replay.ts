import { AuditLog } from '../L5/Audit.js';
import type { Replayable } from '../L4/Contract.js';
import { ErrorCode, LedgerError, describeError } from '../Errors.js';

export class ReplayEngine {
    /**
     * Re-executes every committed journal entry onto the given contracts.
     * WARNING: contracts must be freshly constructed with their original parameters.
     */
    public async replay(log: AuditLog, contracts: readonly Replayable[]): Promise<number> {
        if (!(await log.verifyChain())) {
            throw new LedgerError(ErrorCode.REPLAY_FAILURE, 'Journal hash chain is broken');
        }

        const byName = new Map<string, Replayable>(contracts.map(c => [c.name, c]));
        const history = await log.getHistory();
        let applied = 0;

        console.log(`[ReplayEngine] Starting replay of ${history.length} entries...`);

        for (const entry of history) {
            if (entry.status !== 'COMMITTED') continue;

            const contract = byName.get(entry.contract);
            if (!contract) {
                throw new LedgerError(ErrorCode.REPLAY_FAILURE, `No contract named ${entry.contract}`, { evidenceId: entry.evidenceId });
            }

            try {
                await contract.replay(entry);
            } catch (e: unknown) {
                throw new LedgerError(
                    ErrorCode.REPLAY_FAILURE,
                    `Replay failure at ${entry.contract}.${entry.operation} (${entry.evidenceId}): ${describeError(e)}`,
                    { evidenceId: entry.evidenceId }
                );
            }
            applied++;
        }

        console.log(`[ReplayEngine] Replay complete. ${applied} calls applied.`);
        return applied;
    }
}
