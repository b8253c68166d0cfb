import { FastifyInstance } from 'fastify';
import { Type } from '@sinclair/typebox';
import type { TypeBoxTypeProvider } from '@fastify/type-provider-typebox';

import type { GuardedSchema } from '../guard/index.js';
import type { BlogContext } from '../graphql/resolvers.js';
import type { BlogStore, User } from '../services/blog-store.js';
import { authenticateApiRequest, type AuthOptions, type AuthPrincipal } from './auth.js';

export const GraphQLRequestBody = Type.Object({
    query: Type.String({ minLength: 1 }),
    variables: Type.Optional(Type.Union([Type.Record(Type.String(), Type.Unknown()), Type.Null()])),
    operationName: Type.Optional(Type.Union([Type.String(), Type.Null()]))
});

export type GraphQLRouteOptions = AuthOptions & {
    guarded: GuardedSchema<BlogContext>;
    store: BlogStore;
};

function toCurrentUser(principal: AuthPrincipal | null): User | null {
    return principal ? { id: principal.userId, role: principal.role } : null;
}

export async function graphqlRoutes(fastify: FastifyInstance, options: GraphQLRouteOptions) {
    const server = fastify.withTypeProvider<TypeBoxTypeProvider>();
    const { guarded, store } = options;

    server.post('/graphql', {
        schema: {
            body: GraphQLRequestBody
        }
    }, async (request, reply) => {
        const auth = authenticateApiRequest(request.headers, options);
        if (!auth.ok) {
            return reply.status(auth.statusCode).send(auth.payload);
        }

        const context: BlogContext = {
            requestId: request.id,
            currentUser: toCurrentUser(auth.principal),
            store
        };

        const result = await guarded.execute({
            source: request.body.query,
            variableValues: request.body.variables,
            operationName: request.body.operationName,
            contextValue: context,
            logger: request.log
        });

        return reply.status(200).send(result);
    });
}
