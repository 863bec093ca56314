import 'dotenv/config';
import { loadConfig } from './config';
import { startGateway } from './server';
import { errorMessage } from './errors';

// =================================================================
// Gateway entrypoint: env → config → server, stop on SIGINT/SIGTERM
// =================================================================

async function main(): Promise<void> {
    const gateway = await startGateway(loadConfig());

    let stopping = false;
    const shutdown = (signal: string): void => {
        if (stopping) return;
        stopping = true;
        console.log(`${signal} received, shutting down`);

        gateway.close().then(
            () => process.exit(0),
            (err: unknown) => {
                console.error(`Shutdown failed: ${errorMessage(err)}`);
                process.exit(1);
            },
        );
    };

    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
    console.error(`Gateway failed to start: ${errorMessage(err)}`);
    process.exit(1);
});
