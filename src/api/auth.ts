import { IncomingHttpHeaders } from 'node:http';

export type ApiKeyUser = {
    userId: string;
    role: string | null;
};

export type AuthPrincipal = ApiKeyUser & {
    source: 'env';
};

type AuthSuccess = {
    ok: true;
    principal: AuthPrincipal | null;
};

type AuthFailure = {
    ok: false;
    statusCode: number;
    payload: {
        error: string;
        code: string;
        remediation: string;
    };
};

export type AuthResult = AuthSuccess | AuthFailure;

export type AuthOptions = {
    apiKeys: ReadonlyMap<string, ApiKeyUser>;
    authRequired: boolean;
};

const HEADER_API_KEY = 'x-api-key';

/** Parses `key=userId|role` entries separated by commas. The role is optional. */
export function parseApiKeyConfig(raw: string | undefined): Map<string, ApiKeyUser> {
    const result = new Map<string, ApiKeyUser>();
    if (!raw) {
        return result;
    }

    const entries = raw.split(',').map((entry) => entry.trim()).filter(Boolean);
    for (const entry of entries) {
        const [key, userRaw] = entry.split('=');
        const normalizedKey = key?.trim();
        if (!normalizedKey || !userRaw) {
            continue;
        }

        const [userId, role] = userRaw.split('|').map((part) => part.trim());
        if (!userId) {
            continue;
        }

        result.set(normalizedKey, { userId, role: role || null });
    }

    return result;
}

export function getApiKey(headers: IncomingHttpHeaders): string | null {
    const keyHeader = headers[HEADER_API_KEY];
    if (typeof keyHeader === 'string' && keyHeader.trim().length > 0) {
        return keyHeader.trim();
    }

    const authorization = headers.authorization;
    if (typeof authorization !== 'string') {
        return null;
    }

    const [scheme, token] = authorization.split(' ');
    if (scheme?.toLowerCase() === 'bearer' && token) {
        return token.trim();
    }

    return null;
}

export function authenticateApiRequest(headers: IncomingHttpHeaders, options: AuthOptions): AuthResult {
    const apiKey = getApiKey(headers);

    if (!apiKey) {
        if (!options.authRequired) {
            return { ok: true, principal: null };
        }

        return {
            ok: false,
            statusCode: 401,
            payload: {
                error: 'Missing API key',
                code: 'AUTH_MISSING_API_KEY',
                remediation: `Provide an API key in the ${HEADER_API_KEY} header or as a Bearer token.`
            }
        };
    }

    const user = options.apiKeys.get(apiKey);
    if (!user) {
        return {
            ok: false,
            statusCode: 401,
            payload: {
                error: 'Invalid API key',
                code: 'AUTH_INVALID_API_KEY',
                remediation: 'Use one of the API keys configured in API_KEYS.'
            }
        };
    }

    return {
        ok: true,
        principal: { ...user, source: 'env' }
    };
}
