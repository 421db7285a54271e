import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { LedgerPlatform } from '../Platform/LedgerPlatform.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { LedgerServer } from './Server.js';
import { describeError } from '../kernel-core/Errors.js';

dotenv.config();

async function bootstrap() {
    const config = loadConfig();
    const store = new SQLiteEventStore(config.dbPath);
    const platform = new LedgerPlatform(config, store);

    platform.audit.subscribe(event => {
        console.log(`[Ledger] ${event.contract}.${event.name} ${JSON.stringify(event.args)}`);
    });

    const server = new LedgerServer(platform);
    await server.start(config.port);

    const shutdown = () => {
        console.log('[LedgerServer] Shutting down...');
        server.stop()
            .then(() => store.close())
            .catch((e: unknown) => console.error(`[LedgerServer] Shutdown failed: ${describeError(e)}`));
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
}

bootstrap().catch((e: unknown) => {
    console.error(`[LedgerServer] Boot failed: ${describeError(e)}`);
    process.exitCode = 1;
});
