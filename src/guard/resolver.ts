import type { GuardDescriptor, GuardRegistry } from './registry.js';
import type { FieldAccessEvent } from './types.js';

export type ResolvedGuards<TContext> = {
    argumentGuards: ReadonlyArray<GuardDescriptor<TContext>>;
    fieldGuard?: GuardDescriptor<TContext>;
};

/**
 * Picks the guards that apply to one field access: argument guards for the
 * arguments present in the coerced map, then the field guard, falling back
 * to the guard on the field's parent type. The two are never combined.
 */
export function resolveGuards<TContext>(
    registry: GuardRegistry<TContext>,
    event: Pick<FieldAccessEvent<TContext>, 'typeName' | 'fieldName' | 'args'>
): ResolvedGuards<TContext> {
    const { typeName, fieldName, args } = event;

    const argumentGuards = registry.argumentGuards(typeName, fieldName).filter(({ target }) => (
        target.argumentName !== undefined && Object.prototype.hasOwnProperty.call(args, target.argumentName)
    ));

    return {
        argumentGuards,
        fieldGuard: registry.fieldGuard(typeName, fieldName) ?? registry.typeGuard(typeName)
    };
}

export function hasGuards<TContext>(guards: ResolvedGuards<TContext>): boolean {
    return guards.argumentGuards.length > 0 || guards.fieldGuard !== undefined;
}
