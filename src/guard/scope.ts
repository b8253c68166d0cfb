import { AuthorizationDenied } from './errors.js';
import type { GuardLogger } from './types.js';

/**
 * Per-execution state handed to graphql-js as its context value. Holds the
 * caller's context, the denial raised in exception mode and the guard
 * evaluations still running.
 */
export class GuardScope<TContext> {
    private readonly controller = new AbortController();
    private readonly pending = new Set<Promise<unknown>>();

    constructor(readonly context: TContext, readonly logger?: GuardLogger) {}

    get denial(): AuthorizationDenied | undefined {
        const reason: unknown = this.controller.signal.reason;
        return reason instanceof AuthorizationDenied ? reason : undefined;
    }

    /** First denial wins; later ones are dropped. */
    deny(error: AuthorizationDenied): void {
        if (!this.controller.signal.aborted) {
            this.controller.abort(error);
        }
    }

    track<T>(evaluation: Promise<T>): Promise<T> {
        this.pending.add(evaluation);
        const release = () => {
            this.pending.delete(evaluation);
        };
        void evaluation.then(release, release);
        return evaluation;
    }

    /**
     * Resolves once every tracked evaluation has finished, including ones
     * graphql-js stopped waiting for after a sibling failed.
     */
    async settled(): Promise<void> {
        while (this.pending.size > 0) {
            await Promise.allSettled([...this.pending]);
        }
    }
}

/**
 * Maps the context value graphql-js passes to resolvers back to the scope
 * opened for that execution, keeping the caller's context type intact.
 */
export class ScopeTable<TContext> {
    private readonly scopes = new WeakMap<object, GuardScope<TContext>>();

    open(context: TContext, logger?: GuardLogger): GuardScope<TContext> {
        const scope = new GuardScope(context, logger);
        this.scopes.set(scope, scope);
        return scope;
    }

    lookup(contextValue: unknown): GuardScope<TContext> {
        const scope = typeof contextValue === 'object' && contextValue !== null
            ? this.scopes.get(contextValue)
            : undefined;

        if (!scope) {
            throw new Error('Guarded schema must be executed through GuardedSchema.execute');
        }

        return scope;
    }
}
