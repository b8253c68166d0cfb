import {
    isInterfaceType,
    isObjectType,
    type GraphQLArgument,
    type GraphQLField,
    type GraphQLInterfaceType,
    type GraphQLObjectType,
    type GraphQLSchema
} from 'graphql';

import { ConfigurationError } from './errors.js';
import { PolicyCache } from './policy.js';
import {
    usePolicy,
    type ArgumentDefinition,
    type FieldDefinition,
    type GuardDefinitions,
    type GuardPredicate,
    type GuardSource,
    type GuardTarget,
    type MaskPredicate,
    type PolicyLocator,
    type TypeDefinition
} from './types.js';

export type GuardDescriptor<TContext> = {
    readonly target: Readonly<GuardTarget>;
    readonly predicate: GuardPredicate<TContext>;
    readonly source: 'inline' | 'policy';
};

export type MaskDescriptor<TContext> = {
    readonly target: Readonly<GuardTarget>;
    readonly predicate: MaskPredicate<TContext>;
};

type OwnerType = GraphQLObjectType | GraphQLInterfaceType;

export function fieldKey(typeName: string, fieldName: string): string {
    return `${typeName}.${fieldName}`;
}

export function argumentKey(typeName: string, fieldName: string, argumentName: string): string {
    return `${typeName}.${fieldName}(${argumentName})`;
}

/**
 * Static lookup table of guards and masks, keyed by exact type, field and
 * argument names. Never mutated once `buildGuardRegistry` returns it.
 */
export class GuardRegistry<TContext> {
    private readonly typeGuards = new Map<string, GuardDescriptor<TContext>>();
    private readonly fieldGuards = new Map<string, GuardDescriptor<TContext>>();
    private readonly argumentGuardsByField = new Map<string, GuardDescriptor<TContext>[]>();
    private readonly maskList: MaskDescriptor<TContext>[] = [];
    private readonly targets = new Set<string>();
    private sealed = false;

    typeGuard(typeName: string): GuardDescriptor<TContext> | undefined {
        return this.typeGuards.get(typeName);
    }

    fieldGuard(typeName: string, fieldName: string): GuardDescriptor<TContext> | undefined {
        return this.fieldGuards.get(fieldKey(typeName, fieldName));
    }

    argumentGuards(typeName: string, fieldName: string): ReadonlyArray<GuardDescriptor<TContext>> {
        return this.argumentGuardsByField.get(fieldKey(typeName, fieldName)) ?? [];
    }

    get masks(): ReadonlyArray<MaskDescriptor<TContext>> {
        return this.maskList;
    }

    get hasMasks(): boolean {
        return this.maskList.length > 0;
    }

    addGuard(descriptor: GuardDescriptor<TContext>): void {
        const { typeName, fieldName, argumentName } = descriptor.target;
        this.claim(`guard:${this.keyOf(descriptor.target)}`, descriptor.target);

        if (!fieldName) {
            this.typeGuards.set(typeName, descriptor);
        } else if (!argumentName) {
            this.fieldGuards.set(fieldKey(typeName, fieldName), descriptor);
        } else {
            const key = fieldKey(typeName, fieldName);
            const existing = this.argumentGuardsByField.get(key) ?? [];
            this.argumentGuardsByField.set(key, [...existing, descriptor]);
        }
    }

    addMask(descriptor: MaskDescriptor<TContext>): void {
        this.claim(`mask:${this.keyOf(descriptor.target)}`, descriptor.target);
        this.maskList.push(descriptor);
    }

    seal(): this {
        this.sealed = true;
        return this;
    }

    private keyOf(target: GuardTarget): string {
        if (!target.fieldName) {
            return target.typeName;
        }

        return target.argumentName
            ? argumentKey(target.typeName, target.fieldName, target.argumentName)
            : fieldKey(target.typeName, target.fieldName);
    }

    private claim(key: string, target: GuardTarget): void {
        if (this.sealed) {
            throw new ConfigurationError('Guard registry is read-only after schema construction');
        }
        if (this.targets.has(key)) {
            throw new ConfigurationError(`Duplicate ${key.split(':')[0]} declared for '${this.keyOf(target)}'`);
        }

        this.targets.add(key);
    }
}

function requireOwnerType(schema: GraphQLSchema, typeName: string): OwnerType {
    const type = schema.getType(typeName);
    if (!type) {
        throw new ConfigurationError(`Guard attached to unknown type '${typeName}'`);
    }
    if (!isObjectType(type) && !isInterfaceType(type)) {
        throw new ConfigurationError(`Guards can only be attached to object or interface types, '${typeName}' is neither`);
    }

    return type;
}

function requireField(owner: OwnerType, fieldName: string): GraphQLField<unknown, unknown> {
    const field = owner.getFields()[fieldName];
    if (!field) {
        throw new ConfigurationError(`Guard attached to unknown field '${owner.name}.${fieldName}'`);
    }

    return field;
}

function requireArgument(owner: OwnerType, field: GraphQLField<unknown, unknown>, argumentName: string): GraphQLArgument {
    const argument = field.args.find((candidate) => candidate.name === argumentName);
    if (!argument) {
        throw new ConfigurationError(`Guard attached to unknown argument '${owner.name}.${field.name}(${argumentName})'`);
    }

    return argument;
}

function requireObjectForGuard(owner: OwnerType, target: string): void {
    if (!isObjectType(owner)) {
        throw new ConfigurationError(`Runtime guards need an object type; '${target}' belongs to interface '${owner.name}'`);
    }
}

/** Interface that already declares this field (or argument), if any. */
function declaringInterface(owner: OwnerType, fieldName: string, argumentName?: string): GraphQLInterfaceType | undefined {
    if (!isObjectType(owner)) {
        return undefined;
    }

    return owner.getInterfaces().find((iface) => {
        const field = iface.getFields()[fieldName];
        if (!field) {
            return false;
        }

        return argumentName === undefined || field.args.some((argument) => argument.name === argumentName);
    });
}

function rejectInheritedMask(owner: OwnerType, fieldName: string, argumentName?: string): void {
    const iface = declaringInterface(owner, fieldName, argumentName);
    if (iface) {
        const element = argumentName ? `${fieldName}(${argumentName})` : fieldName;
        throw new ConfigurationError(
            `Mask on '${owner.name}.${element}' must be declared on interface '${iface.name}', which defines it`
        );
    }
}

function registerTypeGuard<TContext>(
    registry: GuardRegistry<TContext>,
    policies: PolicyCache<TContext>,
    owner: OwnerType,
    guard: GuardSource<TContext>
): void {
    requireObjectForGuard(owner, owner.name);

    if (guard !== usePolicy) {
        registry.addGuard({ target: { typeName: owner.name }, predicate: guard, source: 'inline' });
        return;
    }

    const policy = policies.locate(owner.name);
    if (!policy.authorize && !policy.fields) {
        throw new ConfigurationError(`Policy object for type '${owner.name}' defines no rules`);
    }

    if (policy.authorize) {
        registry.addGuard({ target: { typeName: owner.name }, predicate: policy.authorize, source: 'policy' });
    }

    const rules: Readonly<Record<string, GuardPredicate<TContext>>> = policy.fields ?? {};
    for (const [fieldName, predicate] of Object.entries(rules)) {
        requireField(owner, fieldName);
        registry.addGuard({ target: { typeName: owner.name, fieldName }, predicate, source: 'policy' });
    }
}

function registerType<TContext>(
    registry: GuardRegistry<TContext>,
    policies: PolicyCache<TContext>,
    owner: OwnerType,
    definition: TypeDefinition<TContext>
): void {
    if (definition.guard) {
        registerTypeGuard(registry, policies, owner, definition.guard);
    }

    const fields: Record<string, FieldDefinition<TContext>> = definition.fields ?? {};
    for (const [fieldName, fieldDefinition] of Object.entries(fields)) {
        const field = requireField(owner, fieldName);
        const typeName = owner.name;

        if (fieldDefinition.guard) {
            requireObjectForGuard(owner, fieldKey(typeName, fieldName));

            if (fieldDefinition.guard === usePolicy) {
                const rule = policies.locate(typeName).fields?.[fieldName];
                if (!rule) {
                    throw new ConfigurationError(`Policy object for type '${typeName}' has no rule for field '${fieldName}'`);
                }
                registry.addGuard({ target: { typeName, fieldName }, predicate: rule, source: 'policy' });
            } else {
                registry.addGuard({ target: { typeName, fieldName }, predicate: fieldDefinition.guard, source: 'inline' });
            }
        }

        if (fieldDefinition.mask) {
            rejectInheritedMask(owner, fieldName);
            registry.addMask({ target: { typeName, fieldName }, predicate: fieldDefinition.mask });
        }

        const args: Record<string, ArgumentDefinition<TContext>> = fieldDefinition.arguments ?? {};
        for (const [argumentName, argumentDefinition] of Object.entries(args)) {
            requireArgument(owner, field, argumentName);
            const target = { typeName, fieldName, argumentName };

            if (argumentDefinition.guard) {
                requireObjectForGuard(owner, argumentKey(typeName, fieldName, argumentName));
                registry.addGuard({ target, predicate: argumentDefinition.guard, source: 'inline' });
            }
            if (argumentDefinition.mask) {
                rejectInheritedMask(owner, fieldName, argumentName);
                registry.addMask({ target, predicate: argumentDefinition.mask });
            }
        }
    }
}

/**
 * Walks the guard definitions against the schema and records every guard
 * and mask. All misconfiguration surfaces here as a ConfigurationError.
 */
export function buildGuardRegistry<TContext>(
    schema: GraphQLSchema,
    definitions: GuardDefinitions<TContext>,
    policyLocator?: PolicyLocator<TContext>
): GuardRegistry<TContext> {
    const registry = new GuardRegistry<TContext>();
    const policies = new PolicyCache<TContext>(policyLocator);

    for (const [typeName, definition] of Object.entries(definitions)) {
        registerType(registry, policies, requireOwnerType(schema, typeName), definition);
    }

    return registry.seal();
}
