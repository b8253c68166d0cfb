import dotenv from 'dotenv';

import { buildServer } from './server.js';
import { loadServerConfig } from './services/server-config.js';

dotenv.config();

const config = loadServerConfig();
const server = buildServer({ config });

const start = async () => {
    try {
        await server.listen({ port: config.port, host: config.host });
        server.log.info({ guardMode: config.guardMode, guardSource: config.guardSource }, 'Blog GraphQL service ready');
    } catch (err) {
        server.log.error(err);
        process.exit(1);
    }
};

void start();

const shutdown = async (signal: string) => {
    server.log.info(`Received ${signal}, shutting down gracefully...`);
    try {
        await server.close();
        process.exit(0);
    } catch (err) {
        server.log.error(err, 'Error during shutdown');
        process.exit(1);
    }
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
