import type { SourceLocation } from 'graphql';

export type GuardArgs = Readonly<Record<string, unknown>>;

/**
 * Runtime authorization check for one field access. Must not mutate its
 * inputs; may read request-scoped caches hanging off the context.
 */
export type GuardPredicate<TContext> = (
    parent: unknown,
    args: GuardArgs,
    context: TContext
) => boolean | Promise<boolean>;

/**
 * Visibility check evaluated before validation. There is no parent object
 * yet: `root` is the request's root value and `staticArgs` its variables.
 */
export type MaskPredicate<TContext> = (
    root: unknown,
    staticArgs: GuardArgs,
    context: TContext
) => boolean | Promise<boolean>;

export const usePolicy: unique symbol = Symbol('usePolicy');

export type PolicyMarker = typeof usePolicy;

export type GuardSource<TContext> = GuardPredicate<TContext> | PolicyMarker;

export type ArgumentDefinition<TContext> = {
    guard?: GuardPredicate<TContext>;
    mask?: MaskPredicate<TContext>;
};

export type FieldDefinition<TContext> = {
    guard?: GuardSource<TContext>;
    mask?: MaskPredicate<TContext>;
    arguments?: Record<string, ArgumentDefinition<TContext>>;
};

export type TypeDefinition<TContext> = {
    guard?: GuardSource<TContext>;
    fields?: Record<string, FieldDefinition<TContext>>;
};

export type GuardDefinitions<TContext> = Record<string, TypeDefinition<TContext>>;

/** Policy object for one type, found through a {@link PolicyLocator}. */
export interface GuardPolicy<TContext> {
    /** Field rules; they take precedence over `authorize`. */
    readonly fields?: Readonly<Record<string, GuardPredicate<TContext>>>;
    /** Type-wide entry point. */
    readonly authorize?: GuardPredicate<TContext>;
}

export type PolicyLocator<TContext> = (typeName: string) => GuardPolicy<TContext> | undefined;

export type GuardMode = 'exception' | 'collect';

export type GuardTarget = {
    typeName: string;
    fieldName?: string;
    argumentName?: string;
};

export type ResponsePath = ReadonlyArray<string | number>;

export type FieldAccessEvent<TContext> = {
    parent: unknown;
    typeName: string;
    fieldName: string;
    args: GuardArgs;
    context: TContext;
    path: ResponsePath;
    locations: SourceLocation[];
};

export type DenialOutcome =
    | { kind: 'proceed' }
    | { kind: 'abort'; message: string; path: ResponsePath; target: GuardTarget }
    | {
        kind: 'mask-with-error';
        message: string;
        path: ResponsePath;
        locations: SourceLocation[];
        target: GuardTarget;
    };

/** pino-compatible subset; Fastify's `request.log` satisfies it. */
export interface GuardLogger {
    debug(details: object, message: string): void;
    warn(details: object, message: string): void;
}

export type DeniedMessageFormatter = (target: GuardTarget, mode: GuardMode) => string;
