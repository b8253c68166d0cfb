import { describe, expect, it } from 'vitest';

import { parseApiKeyConfig } from '../api/auth.js';
import { buildServer } from '../server.js';
import type { GuardMode } from '../guard/index.js';

const apiKeys = parseApiKeyConfig('admin-key=1|admin,owner-key=1|not_admin,reader-key=2|not_admin');

const buildApp = (options: { authRequired?: boolean; guardMode?: GuardMode } = {}) => buildServer({
    config: {
        apiKeys,
        authRequired: options.authRequired ?? false,
        guardMode: options.guardMode ?? 'exception',
        guardSource: 'inline'
    },
    logger: false
});

const postsQuery = { query: 'query($userId: ID!) { posts(userId: $userId) { id title } }', variables: { userId: '1' } };

describe('GraphQL Auth Status Mapping', () => {
    it('returns 401 when API key is missing and auth is required', async () => {
        const app = buildApp({ authRequired: true });

        const response = await app.inject({ method: 'POST', url: '/graphql', payload: postsQuery });

        expect(response.statusCode).toBe(401);
        expect(response.json()).toEqual({
            error: 'Missing API key',
            code: 'AUTH_MISSING_API_KEY',
            remediation: 'Provide an API key in the x-api-key header or as a Bearer token.'
        });
    });

    it('returns 401 when API key is invalid', async () => {
        const app = buildApp();

        const response = await app.inject({
            method: 'POST',
            url: '/graphql',
            headers: { 'x-api-key': 'unknown-key' },
            payload: postsQuery
        });

        expect(response.statusCode).toBe(401);
        expect(response.json().code).toBe('AUTH_INVALID_API_KEY');
    });

    it('returns 403 when a guard denies in exception mode', async () => {
        const app = buildApp();

        const response = await app.inject({
            method: 'POST',
            url: '/graphql',
            headers: { 'x-api-key': 'reader-key', 'x-request-id': 'req-403' },
            payload: postsQuery
        });

        expect(response.statusCode).toBe(403);
        expect(response.json()).toEqual({
            error: 'Not authorized to access: Query.posts',
            code: 'NOT_AUTHORIZED',
            remediation: 'The current credentials may not access this field. Remove it from the query or use an authorized API key.',
            context: { requestId: 'req-403' }
        });
    });

    it('returns 200 with data for an authorized bearer token', async () => {
        const app = buildApp({ authRequired: true });

        const response = await app.inject({
            method: 'POST',
            url: '/graphql',
            headers: { authorization: 'Bearer admin-key' },
            payload: postsQuery
        });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({ data: { posts: [{ id: '1', title: 'Post Title' }] } });
    });

    it('returns 200 with field errors in collect mode', async () => {
        const app = buildApp({ guardMode: 'collect' });

        const response = await app.inject({
            method: 'POST',
            url: '/graphql',
            headers: { 'x-api-key': 'owner-key' },
            payload: postsQuery
        });

        expect(response.statusCode).toBe(200);
        expect(response.json()).toEqual({
            errors: [
                {
                    message: 'Not authorized to access Post.id',
                    locations: [{ line: 1, column: 48 }],
                    path: ['posts', 0, 'id'],
                    extensions: { code: 'FIELD_DENIED', typeName: 'Post', fieldName: 'id' }
                }
            ],
            data: null
        });
    });

    it('returns 400 for a payload without a query', async () => {
        const app = buildApp();

        const response = await app.inject({ method: 'POST', url: '/graphql', payload: { query: '' } });

        expect(response.statusCode).toBe(400);
        expect(response.json().code).toBe('VALIDATION_ERROR');
    });
});
