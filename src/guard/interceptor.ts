import {
    defaultFieldResolver,
    getLocation,
    isObjectType,
    responsePathAsArray,
    type GraphQLFieldResolver,
    type GraphQLResolveInfo,
    type GraphQLSchema
} from 'graphql';

import type { GuardConfiguration } from './config.js';
import { toAuthorizationDenied, toDenialOutcome, toFieldDeniedError } from './error-formatter.js';
import type { GuardDescriptor } from './registry.js';
import { hasGuards, resolveGuards } from './resolver.js';
import { mapSchema } from './schema-map.js';
import type { GuardScope } from './scope.js';
import type { DenialOutcome, FieldAccessEvent, GuardTarget } from './types.js';

type Denial<TContext> = GuardDescriptor<TContext> | undefined;

const PROCEED: DenialOutcome = { kind: 'proceed' };

function isPromiseLike<T>(value: T | PromiseLike<T>): value is PromiseLike<T> {
    return typeof value === 'object' && value !== null && 'then' in value && typeof value.then === 'function';
}

export function toFieldAccessEvent<TContext>(
    parent: unknown,
    args: Record<string, unknown>,
    context: TContext,
    info: GraphQLResolveInfo
): FieldAccessEvent<TContext> {
    return {
        parent,
        typeName: info.parentType.name,
        fieldName: info.fieldName,
        args: Object.freeze({ ...args }),
        context,
        path: responsePathAsArray(info.path),
        locations: info.fieldNodes.flatMap((node) => (node.loc ? [getLocation(node.loc.source, node.loc.start)] : []))
    };
}

/**
 * Evaluates guards in order and stops at the first one that denies. Stays
 * synchronous until a predicate hands back a promise.
 */
function findDenial<TContext>(
    guards: ReadonlyArray<GuardDescriptor<TContext>>,
    event: FieldAccessEvent<TContext>,
    start = 0
): Denial<TContext> | Promise<Denial<TContext>> {
    for (let index = start; index < guards.length; index += 1) {
        const guard = guards[index];
        const allowed = guard.predicate(event.parent, event.args, event.context);

        if (isPromiseLike(allowed)) {
            return Promise.resolve(allowed).then((granted) => (granted ? findDenial(guards, event, index + 1) : guard));
        }
        if (!allowed) {
            return guard;
        }
    }

    return undefined;
}

function deniedTarget<TContext>(denied: GuardDescriptor<TContext>, event: FieldAccessEvent<TContext>): GuardTarget {
    // Type guards report the field being accessed, not the bare type.
    if (denied.target.argumentName) {
        return denied.target;
    }

    return { typeName: event.typeName, fieldName: event.fieldName };
}

function abortIfDenied<TContext>(scope: GuardScope<TContext>): void {
    const denial = scope.denial;
    if (denial) {
        throw denial;
    }
}

export function interceptField<TContext>(
    resolve: GraphQLFieldResolver<unknown, TContext>,
    configuration: GuardConfiguration<TContext>
): GraphQLFieldResolver<unknown, unknown> {
    const { registry, scopes, mode, deniedMessage } = configuration;

    return (parent, args: Record<string, unknown>, contextValue, info) => {
        const scope = scopes.lookup(contextValue);
        abortIfDenied(scope);

        const guards = resolveGuards(registry, { typeName: info.parentType.name, fieldName: info.fieldName, args });
        if (!hasGuards(guards)) {
            return resolve(parent, args, scope.context, info);
        }

        const event = toFieldAccessEvent(parent, args, scope.context, info);
        const ordered = guards.fieldGuard ? [...guards.argumentGuards, guards.fieldGuard] : guards.argumentGuards;

        const settle = (denied: Denial<TContext>): unknown => {
            const outcome = denied ? toDenialOutcome(deniedTarget(denied, event), mode, event, deniedMessage) : PROCEED;

            switch (outcome.kind) {
                case 'proceed':
                    abortIfDenied(scope);
                    return resolve(parent, args, scope.context, info);
                case 'abort': {
                    const error = toAuthorizationDenied(outcome);
                    scope.logger?.warn({ ...outcome.target, path: outcome.path, mode }, 'Field access denied, aborting execution');
                    scope.deny(error);
                    throw error;
                }
                case 'mask-with-error':
                    scope.logger?.warn({ ...outcome.target, path: outcome.path, mode }, 'Field access denied');
                    throw toFieldDeniedError(outcome, info.fieldNodes);
            }
        };

        const denied = findDenial(ordered, event);
        if (!isPromiseLike(denied)) {
            return settle(denied);
        }

        const evaluation = Promise.resolve(denied).then(settle);
        return mode === 'exception' ? scope.track(evaluation) : evaluation;
    };
}

/**
 * Returns a copy of the schema whose object fields all run through the
 * authorization interceptor. Type resolvers are wrapped as well so that
 * they keep receiving the caller's context.
 */
export function installInterceptors<TContext>(schema: GraphQLSchema, configuration: GuardConfiguration<TContext>): GraphQLSchema {
    const { scopes } = configuration;

    return mapSchema<TContext>(schema, {
        field: (owner, _fieldName, config) => {
            if (!isObjectType(owner)) {
                return config;
            }

            return { ...config, resolve: interceptField(config.resolve ?? defaultFieldResolver, configuration) };
        },
        isTypeOf: (_type, isTypeOf) => (source, contextValue, info) => isTypeOf(source, scopes.lookup(contextValue).context, info),
        resolveType: (_type, resolveType) => (value, contextValue, info, abstractType) => (
            resolveType(value, scopes.lookup(contextValue).context, info, abstractType)
        )
    });
}
