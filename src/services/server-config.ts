import type { ApiKeyUser } from '../api/auth.js';
import { parseApiKeyConfig } from '../api/auth.js';
import type { GuardSource } from '../graphql/blog.js';
import type { GuardMode } from '../guard/index.js';

export type ServerConfig = {
    port: number;
    host: string;
    guardMode: GuardMode;
    guardSource: GuardSource;
    authRequired: boolean;
    apiKeys: Map<string, ApiKeyUser>;
};

function parsePort(raw: string | undefined, fallback: number): number {
    if (!raw) return fallback;
    const parsed = Number(raw);
    if (!Number.isInteger(parsed) || parsed <= 0 || parsed > 65535) {
        throw new Error(`Invalid PORT '${raw}'. Use an integer between 1 and 65535.`);
    }

    return parsed;
}

function parseGuardMode(raw: string | undefined): GuardMode {
    const mode = (raw || 'exception').toLowerCase();
    if (mode === 'exception' || mode === 'collect') {
        return mode;
    }

    throw new Error(`Unsupported GUARD_MODE '${raw}'. Supported modes: exception, collect`);
}

function parseGuardSource(raw: string | undefined): GuardSource {
    const source = (raw || 'inline').toLowerCase();
    if (source === 'inline' || source === 'policy') {
        return source;
    }

    throw new Error(`Unsupported GUARD_SOURCE '${raw}'. Supported sources: inline, policy`);
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
    return {
        port: parsePort(env.PORT, 4000),
        host: env.HOST || '0.0.0.0',
        guardMode: parseGuardMode(env.GUARD_MODE),
        guardSource: parseGuardSource(env.GUARD_SOURCE),
        authRequired: (env.AUTH_REQUIRED || 'false').toLowerCase() === 'true',
        apiKeys: parseApiKeyConfig(env.API_KEYS)
    };
}
