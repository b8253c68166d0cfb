import type { GraphQLSchema } from 'graphql';

import { defaultDeniedMessage } from './error-formatter.js';
import { buildGuardRegistry, type GuardRegistry } from './registry.js';
import { ScopeTable } from './scope.js';
import type { DeniedMessageFormatter, GuardDefinitions, GuardLogger, GuardMode, PolicyLocator } from './types.js';

export type GuardOptions<TContext> = {
    schema: GraphQLSchema;
    guards?: GuardDefinitions<TContext>;
    /** Defaults to `exception`. */
    mode?: GuardMode;
    policyLocator?: PolicyLocator<TContext>;
    deniedMessage?: DeniedMessageFormatter;
    /** Used when a request does not bring its own logger. */
    logger?: GuardLogger;
};

export type GuardConfiguration<TContext> = Readonly<{
    mode: GuardMode;
    registry: GuardRegistry<TContext>;
    deniedMessage: DeniedMessageFormatter;
    logger?: GuardLogger;
    scopes: ScopeTable<TContext>;
}>;

export function createGuardConfiguration<TContext>(options: GuardOptions<TContext>): GuardConfiguration<TContext> {
    return Object.freeze({
        mode: options.mode ?? 'exception',
        registry: buildGuardRegistry(options.schema, options.guards ?? {}, options.policyLocator),
        deniedMessage: options.deniedMessage ?? defaultDeniedMessage,
        logger: options.logger,
        scopes: new ScopeTable<TContext>()
    });
}
