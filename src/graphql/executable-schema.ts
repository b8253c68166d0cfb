import { buildSchema, isObjectType, type GraphQLFieldResolver, type GraphQLSchema } from 'graphql';

import { mapSchema } from '../guard/schema-map.js';

export type ResolverMap<TContext> = Record<string, Record<string, GraphQLFieldResolver<unknown, TContext>>>;

/**
 * Builds a schema from SDL and attaches a resolver map keyed by type and
 * field name, the same shape mercurius and friends accept.
 */
export function buildExecutableSchema<TContext>(typeDefs: string, resolvers: ResolverMap<TContext>): GraphQLSchema {
    const schema = buildSchema(typeDefs);

    for (const [typeName, fields] of Object.entries(resolvers)) {
        const type = schema.getType(typeName);
        if (!isObjectType(type)) {
            throw new Error(`Resolvers declared for '${typeName}', which is not an object type of the schema`);
        }

        for (const fieldName of Object.keys(fields)) {
            if (!type.getFields()[fieldName]) {
                throw new Error(`Resolver declared for unknown field '${typeName}.${fieldName}'`);
            }
        }
    }

    return mapSchema<TContext>(schema, {
        field: (owner, fieldName, config) => {
            const resolve = isObjectType(owner) ? resolvers[owner.name]?.[fieldName] : undefined;
            return resolve ? { ...config, resolve } : config;
        }
    });
}
