#!/usr/bin/env node
import fs from 'fs';

import { loadConfig } from './lib/config';
import { errorMessage } from './lib/errors';
import { createServer } from './server';

function main() {
    const config = loadConfig();
    fs.mkdirSync(config.recordingsDir, { recursive: true });

    const app = createServer(config);
    app.http.listen(config.port, config.host, () => {
        console.log(`[server] listening on http://${config.host}:${config.port}`);
        console.log(`[server] recordings go to ${config.recordingsDir}`);
        if (!config.hostname) {
            console.warn('[server] G3_HOSTNAME is not set; clients must pass a hostname to connect_device');
        }
    });

    let shuttingDown = false;
    const shutdown = (signal: string) => {
        if (shuttingDown) {
            return;
        }
        shuttingDown = true;
        console.log(`[server] ${signal} received, closing`);
        app.close()
            .then(() => process.exit(0))
            .catch(err => {
                console.error(`[server] shutdown failed: ${errorMessage(err)}`);
                process.exit(1);
            });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
}

try {
    main();
} catch (err) {
    console.error(`[server] ${errorMessage(err)}`);
    process.exit(1);
}
