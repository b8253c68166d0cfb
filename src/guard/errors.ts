import type { GuardTarget, ResponsePath } from './types.js';

export class ConfigurationError extends Error {
    readonly code = 'GUARD_CONFIGURATION_ERROR';

    constructor(message: string) {
        super(message);
        this.name = 'ConfigurationError';
    }
}

/**
 * Fatal denial raised in exception mode. Replaces the whole execution
 * result: callers never see partial data next to it.
 */
export class AuthorizationDenied extends Error {
    readonly code = 'NOT_AUTHORIZED';
    readonly target: GuardTarget;
    readonly path: ResponsePath;

    constructor(message: string, target: GuardTarget, path: ResponsePath) {
        super(message);
        this.target = target;
        this.path = path;
        this.name = 'AuthorizationDenied';
    }
}
