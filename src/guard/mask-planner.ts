import {
    getNamedType,
    isInterfaceType,
    isIntrospectionType,
    isObjectType,
    isUnionType,
    type GraphQLOutputType,
    type GraphQLSchema
} from 'graphql';

import { argumentKey, fieldKey, type GuardRegistry } from './registry.js';
import { mapSchema, type FieldOwner } from './schema-map.js';
import type { GuardArgs } from './types.js';

export type MaskRequest<TContext> = {
    root?: unknown;
    variables?: GuardArgs | null;
    context: TContext;
};

/**
 * Which fields and arguments are hidden for one request. Built before
 * validation and never shared between requests.
 */
export class VisibilityPlan {
    private readonly hidden: ReadonlySet<string>;

    constructor(hidden: Iterable<string>) {
        this.hidden = new Set(hidden);
    }

    get isEmpty(): boolean {
        return this.hidden.size === 0;
    }

    get hiddenKeys(): string[] {
        return [...this.hidden].sort();
    }

    isFieldVisible(typeName: string, fieldName: string): boolean {
        return !this.hidden.has(fieldKey(typeName, fieldName));
    }

    isArgumentVisible(typeName: string, fieldName: string, argumentName: string): boolean {
        return !this.hidden.has(argumentKey(typeName, fieldName, argumentName));
    }
}

export async function planVisibility<TContext>(
    registry: GuardRegistry<TContext>,
    request: MaskRequest<TContext>
): Promise<VisibilityPlan> {
    const staticArgs: GuardArgs = Object.freeze({ ...(request.variables ?? {}) });

    const decisions = await Promise.all(registry.masks.map(async ({ target, predicate }) => {
        const visible = await predicate(request.root, staticArgs, request.context);
        return { target, visible };
    }));

    const hidden: string[] = [];
    for (const { target, visible } of decisions) {
        if (visible || !target.fieldName) {
            continue;
        }

        hidden.push(target.argumentName
            ? argumentKey(target.typeName, target.fieldName, target.argumentName)
            : fieldKey(target.typeName, target.fieldName));
    }

    return new VisibilityPlan(hidden);
}

/** Elements masked on an interface disappear from its implementations too. */
function ownersOf(owner: FieldOwner): FieldOwner[] {
    return [owner, ...owner.getInterfaces()];
}

function isFieldVisible(plan: VisibilityPlan, owner: FieldOwner, fieldName: string): boolean {
    return ownersOf(owner).every((candidate) => plan.isFieldVisible(candidate.name, fieldName));
}

/**
 * Names of the object, interface and union types left without a visible
 * field or member. A field returning such a type disappears as well, which
 * can empty its owner in turn, so this runs until nothing changes.
 */
function emptiedTypes(schema: GraphQLSchema, plan: VisibilityPlan): Set<string> {
    const empty = new Set<string>();
    const reachable = (type: GraphQLOutputType) => !empty.has(getNamedType(type).name);

    let changed = true;
    while (changed) {
        changed = false;
        for (const type of Object.values(schema.getTypeMap())) {
            if (empty.has(type.name) || isIntrospectionType(type)) {
                continue;
            }

            let visible = true;
            if (isObjectType(type) || isInterfaceType(type)) {
                visible = Object.values(type.getFields()).some((field) => (
                    isFieldVisible(plan, type, field.name) && reachable(field.type)
                ));
            } else if (isUnionType(type)) {
                visible = type.getTypes().some((member) => !empty.has(member.name));
            }

            if (!visible) {
                empty.add(type.name);
                changed = true;
            }
        }
    }

    return empty;
}

/**
 * Schema as the request is allowed to see it. Validating against the view
 * makes hidden elements fail exactly like elements that were never
 * declared, and introspection does not list them. Types the plan leaves
 * empty are removed, root operation types included.
 */
export function createSchemaView(schema: GraphQLSchema, plan: VisibilityPlan): GraphQLSchema {
    if (plan.isEmpty) {
        return schema;
    }

    const empty = emptiedTypes(schema, plan);

    return mapSchema<unknown>(schema, {
        keepType: (type) => !empty.has(type.name),
        field: (owner, fieldName, config) => (
            isFieldVisible(plan, owner, fieldName) && !empty.has(getNamedType(config.type).name) ? config : null
        ),
        argument: (owner, fieldName, argumentName, config) => (
            ownersOf(owner).every((candidate) => plan.isArgumentVisible(candidate.name, fieldName, argumentName)) ? config : null
        )
    });
}
