// =================================================================
// Start all services: demo backend + gateway
// =================================================================

import 'dotenv/config';
import { createBackend } from './backends';
import { loadConfig } from './config';
import { errorMessage } from './errors';

console.log('');
console.log('🚀 Starting Rate Limit Gateway with a demo backend');
console.log('');

const backendUrl = new URL(loadConfig().backendUrl);
const backendPort = Number(backendUrl.port) || 8001;

// Start the backend first, then the gateway once it is listening
const backend = createBackend('demo-backend').listen(backendPort, () => {
    console.log(`   demo-backend running on http://localhost:${backendPort}`);

    import('./main').catch((err: unknown) => {
        console.error(`Could not load the gateway: ${errorMessage(err)}`);
        backend.close();
        process.exitCode = 1;
    });
});

backend.on('error', (err) => {
    console.error(`demo-backend could not listen on ${backendPort}: ${err.message}`);
    process.exitCode = 1;
});
