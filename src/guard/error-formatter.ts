import { GraphQLError, type FieldNode, type SourceLocation } from 'graphql';

import { AuthorizationDenied } from './errors.js';
import type { DeniedMessageFormatter, DenialOutcome, GuardMode, GuardTarget, ResponsePath } from './types.js';

export const FIELD_DENIED_CODE = 'FIELD_DENIED';

export function describeTarget(target: GuardTarget): string {
    const segments = [target.typeName];
    if (target.fieldName) {
        segments.push(target.fieldName);
    }
    if (target.argumentName) {
        segments.push(target.argumentName);
    }

    return segments.join('.');
}

export const defaultDeniedMessage: DeniedMessageFormatter = (target, mode) => (
    mode === 'exception'
        ? `Not authorized to access: ${describeTarget(target)}`
        : `Not authorized to access ${describeTarget(target)}`
);

export function toDenialOutcome(
    target: GuardTarget,
    mode: GuardMode,
    site: { path: ResponsePath; locations: SourceLocation[] },
    formatMessage: DeniedMessageFormatter = defaultDeniedMessage
): DenialOutcome {
    const message = formatMessage(target, mode);
    if (mode === 'exception') {
        return { kind: 'abort', message, path: site.path, target };
    }

    return { kind: 'mask-with-error', message, path: site.path, locations: site.locations, target };
}

export function toAuthorizationDenied(outcome: Extract<DenialOutcome, { kind: 'abort' }>): AuthorizationDenied {
    return new AuthorizationDenied(outcome.message, outcome.target, outcome.path);
}

/**
 * Builds the field error graphql-js reports for a collected denial. The
 * error is already located, so the executor keeps its path and nodes.
 */
export function toFieldDeniedError(
    outcome: Extract<DenialOutcome, { kind: 'mask-with-error' }>,
    fieldNodes: ReadonlyArray<FieldNode>
): GraphQLError {
    const { target } = outcome;

    return new GraphQLError(outcome.message, {
        nodes: fieldNodes,
        path: outcome.path,
        extensions: {
            code: FIELD_DENIED_CODE,
            typeName: target.typeName,
            ...(target.fieldName ? { fieldName: target.fieldName } : {}),
            ...(target.argumentName ? { argumentName: target.argumentName } : {})
        }
    });
}
