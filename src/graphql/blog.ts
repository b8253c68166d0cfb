import { createGuardedSchema, type GuardedSchema, type GuardLogger, type GuardMode } from '../guard/index.js';
import { buildExecutableSchema } from './executable-schema.js';
import { inlineGuards } from './guards.js';
import { blogPolicyLocator, policyGuards } from './policies.js';
import { resolvers, type BlogContext } from './resolvers.js';
import { schema } from './schema.js';

export type GuardSource = 'inline' | 'policy';

export type BlogSchemaOptions = {
    mode?: GuardMode;
    guardSource?: GuardSource;
    logger?: GuardLogger;
};

export function createBlogSchema(options: BlogSchemaOptions = {}): GuardedSchema<BlogContext> {
    const executable = buildExecutableSchema<BlogContext>(schema, resolvers);
    const usePolicies = options.guardSource === 'policy';

    return createGuardedSchema<BlogContext>({
        schema: executable,
        guards: usePolicies ? policyGuards : inlineGuards,
        policyLocator: usePolicies ? blogPolicyLocator : undefined,
        mode: options.mode,
        logger: options.logger
    });
}
