import { randomUUID } from 'node:crypto';

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';

import { errorHandler } from './api/error-handler.js';
import { graphqlRoutes } from './api/graphql-routes.js';
import { createBlogSchema } from './graphql/blog.js';
import { createBlogStore, type BlogStore } from './services/blog-store.js';
import type { ServerConfig } from './services/server-config.js';

export type BuildServerOptions = {
    config: Omit<ServerConfig, 'port' | 'host'>;
    store?: BlogStore;
    logger?: FastifyServerOptions['logger'];
};

function readRequestIdHeader(raw: string | string[] | undefined): string | null {
    if (typeof raw === 'string' && raw.trim().length > 0) {
        return raw.trim();
    }

    if (Array.isArray(raw) && typeof raw[0] === 'string' && raw[0].trim().length > 0) {
        return raw[0].trim();
    }

    return null;
}

export function buildServer(options: BuildServerOptions): FastifyInstance {
    const { config } = options;
    const store = options.store ?? createBlogStore();

    const server = Fastify({
        logger: options.logger ?? true,
        genReqId: (request) => readRequestIdHeader(request.headers['x-request-id']) || randomUUID()
    });

    // Guard misconfiguration throws here, before the server accepts traffic.
    const guarded = createBlogSchema({
        mode: config.guardMode,
        guardSource: config.guardSource,
        logger: server.log
    });

    server.register(cors);
    server.setErrorHandler(errorHandler);

    server.register(graphqlRoutes, {
        guarded,
        store,
        apiKeys: config.apiKeys,
        authRequired: config.authRequired
    });

    server.get('/health', async () => ({
        status: 'ok',
        timestamp: new Date().toISOString()
    }));

    return server;
}
