import {
    GraphQLDirective,
    GraphQLInputObjectType,
    GraphQLInterfaceType,
    GraphQLList,
    GraphQLNonNull,
    GraphQLObjectType,
    GraphQLSchema,
    GraphQLUnionType,
    assertInputType,
    assertInterfaceType,
    assertNullableType,
    assertObjectType,
    assertOutputType,
    getNamedType,
    isEnumType,
    isInputObjectType,
    isInterfaceType,
    isIntrospectionType,
    isListType,
    isNonNullType,
    isObjectType,
    isScalarType,
    isSpecifiedDirective,
    isUnionType,
    type GraphQLArgumentConfig,
    type GraphQLFieldConfig,
    type GraphQLFieldConfigArgumentMap,
    type GraphQLFieldConfigMap,
    type GraphQLInputFieldConfigMap,
    type GraphQLIsTypeOfFn,
    type GraphQLNamedType,
    type GraphQLType,
    type GraphQLTypeResolver
} from 'graphql';

export type FieldOwner = GraphQLObjectType | GraphQLInterfaceType;

/**
 * Per-element transforms applied while a schema is rebuilt. Returning
 * `null` from `field` or `argument` drops the element from the copy, and
 * `false` from `keepType` drops an object, interface or union type.
 */
export type SchemaMapper<TContext> = {
    keepType?: (type: GraphQLObjectType | GraphQLInterfaceType | GraphQLUnionType) => boolean;
    field?: (
        owner: FieldOwner,
        fieldName: string,
        config: GraphQLFieldConfig<unknown, TContext>
    ) => GraphQLFieldConfig<unknown, TContext> | null;
    argument?: (
        owner: FieldOwner,
        fieldName: string,
        argumentName: string,
        config: GraphQLArgumentConfig
    ) => GraphQLArgumentConfig | null;
    isTypeOf?: (type: GraphQLObjectType, isTypeOf: GraphQLIsTypeOfFn<unknown, TContext>) => GraphQLIsTypeOfFn<unknown, unknown>;
    resolveType?: (
        type: GraphQLInterfaceType | GraphQLUnionType,
        resolveType: GraphQLTypeResolver<unknown, TContext>
    ) => GraphQLTypeResolver<unknown, unknown>;
};

/**
 * Copies every named type of the schema, applying the mapper's transforms.
 * Scalars, enums, introspection types and built-in directives are shared
 * with the source schema; everything that can reference another type is
 * rebuilt so the copy stays internally consistent.
 */
export function mapSchema<TContext>(schema: GraphQLSchema, mapper: SchemaMapper<TContext>): GraphQLSchema {
    const rebuilt = new Map<string, GraphQLNamedType>();

    const named = (name: string): GraphQLNamedType => {
        const type = rebuilt.get(name);
        if (!type) {
            throw new Error(`Type '${name}' is missing from the rebuilt schema`);
        }

        return type;
    };

    const kept = (type: GraphQLNamedType): boolean => rebuilt.has(type.name);

    const rewrap = (type: GraphQLType): GraphQLType => {
        if (isListType(type)) {
            return new GraphQLList(rewrap(type.ofType));
        }
        if (isNonNullType(type)) {
            return new GraphQLNonNull(assertNullableType(rewrap(type.ofType)));
        }

        return named(getNamedType(type).name);
    };

    const mapArguments = (
        owner: FieldOwner,
        fieldName: string,
        args: GraphQLFieldConfigArgumentMap
    ): GraphQLFieldConfigArgumentMap => {
        const result: GraphQLFieldConfigArgumentMap = {};
        for (const [argumentName, argumentConfig] of Object.entries(args)) {
            const mapped = mapper.argument ? mapper.argument(owner, fieldName, argumentName, argumentConfig) : argumentConfig;
            if (!mapped) {
                continue;
            }

            result[argumentName] = { ...mapped, type: assertInputType(rewrap(mapped.type)) };
        }

        return result;
    };

    const mapFields = (
        owner: FieldOwner,
        fields: GraphQLFieldConfigMap<unknown, TContext>
    ): GraphQLFieldConfigMap<unknown, TContext> => {
        const result: GraphQLFieldConfigMap<unknown, TContext> = {};
        for (const [fieldName, fieldConfig] of Object.entries(fields)) {
            const mapped = mapper.field ? mapper.field(owner, fieldName, fieldConfig) : fieldConfig;
            if (!mapped) {
                continue;
            }

            result[fieldName] = {
                ...mapped,
                type: assertOutputType(rewrap(mapped.type)),
                args: mapArguments(owner, fieldName, mapped.args ?? {})
            };
        }

        return result;
    };

    const mapInputFields = (fields: GraphQLInputFieldConfigMap): GraphQLInputFieldConfigMap => {
        const result: GraphQLInputFieldConfigMap = {};
        for (const [fieldName, fieldConfig] of Object.entries(fields)) {
            result[fieldName] = { ...fieldConfig, type: assertInputType(rewrap(fieldConfig.type)) };
        }

        return result;
    };

    const mapResolveType = (
        type: GraphQLInterfaceType | GraphQLUnionType,
        resolveType: GraphQLTypeResolver<unknown, TContext> | null | undefined
    ): GraphQLTypeResolver<unknown, TContext> | null | undefined => (
        resolveType && mapper.resolveType ? mapper.resolveType(type, resolveType) : resolveType
    );

    const rebuild = (type: GraphQLNamedType): GraphQLNamedType => {
        if (isObjectType(type)) {
            const config = type.toConfig();
            return new GraphQLObjectType({
                ...config,
                isTypeOf: config.isTypeOf && mapper.isTypeOf ? mapper.isTypeOf(type, config.isTypeOf) : config.isTypeOf,
                interfaces: () => config.interfaces.filter(kept).map((iface) => assertInterfaceType(named(iface.name))),
                fields: () => mapFields(type, config.fields)
            });
        }

        if (isInterfaceType(type)) {
            const config = type.toConfig();
            return new GraphQLInterfaceType({
                ...config,
                resolveType: mapResolveType(type, config.resolveType),
                interfaces: () => config.interfaces.filter(kept).map((iface) => assertInterfaceType(named(iface.name))),
                fields: () => mapFields(type, config.fields)
            });
        }

        if (isUnionType(type)) {
            const config = type.toConfig();
            return new GraphQLUnionType({
                ...config,
                resolveType: mapResolveType(type, config.resolveType),
                types: () => config.types.filter(kept).map((member) => assertObjectType(named(member.name)))
            });
        }

        if (isInputObjectType(type)) {
            const config = type.toConfig();
            return new GraphQLInputObjectType({
                ...config,
                fields: () => mapInputFields(config.fields)
            });
        }

        return type;
    };

    for (const type of Object.values(schema.getTypeMap())) {
        if (isIntrospectionType(type) || isScalarType(type) || isEnumType(type)) {
            rebuilt.set(type.name, type);
        } else if (isInputObjectType(type) || !mapper.keepType || mapper.keepType(type)) {
            rebuilt.set(type.name, rebuild(type));
        }
    }

    const config = schema.toConfig();
    const root = (type: GraphQLObjectType | null | undefined) => (
        type && kept(type) ? assertObjectType(named(type.name)) : undefined
    );

    return new GraphQLSchema({
        ...config,
        query: root(config.query),
        mutation: root(config.mutation),
        subscription: root(config.subscription),
        types: [...rebuilt.values()].filter((type) => !isIntrospectionType(type)),
        directives: config.directives.map((directive) => {
            if (isSpecifiedDirective(directive)) {
                return directive;
            }

            const directiveConfig = directive.toConfig();
            const args: GraphQLFieldConfigArgumentMap = {};
            for (const [argumentName, argumentConfig] of Object.entries(directiveConfig.args)) {
                args[argumentName] = { ...argumentConfig, type: assertInputType(rewrap(argumentConfig.type)) };
            }

            return new GraphQLDirective({ ...directiveConfig, args });
        })
    });
}
