import {
    GraphQLError,
    execute,
    parse,
    validate,
    validateSchema,
    type DocumentNode,
    type ExecutionResult,
    type GraphQLSchema
} from 'graphql';

import { createGuardConfiguration, type GuardConfiguration, type GuardOptions } from './config.js';
import { installInterceptors } from './interceptor.js';
import { createSchemaView, planVisibility, type VisibilityPlan } from './mask-planner.js';
import type { GuardLogger } from './types.js';

export type GuardedRequest<TContext> = {
    source: string | DocumentNode;
    contextValue: TContext;
    variableValues?: Record<string, unknown> | null;
    operationName?: string | null;
    rootValue?: unknown;
    /** Request-scoped logger, e.g. Fastify's `request.log`. */
    logger?: GuardLogger;
};

/**
 * A schema with field guards installed. Execution goes through `execute`,
 * which plans masks, validates against the request's view of the schema
 * and turns an exception-mode denial into a rejected promise.
 */
export class GuardedSchema<TContext> {
    readonly configuration: GuardConfiguration<TContext>;
    readonly schema: GraphQLSchema;

    constructor(options: GuardOptions<TContext>) {
        this.configuration = createGuardConfiguration(options);
        this.schema = installInterceptors(options.schema, this.configuration);
    }

    async planFor(request: Pick<GuardedRequest<TContext>, 'contextValue' | 'variableValues' | 'rootValue'>): Promise<VisibilityPlan | undefined> {
        const { registry } = this.configuration;
        if (!registry.hasMasks) {
            return undefined;
        }

        return planVisibility(registry, {
            root: request.rootValue,
            variables: request.variableValues,
            context: request.contextValue
        });
    }

    async viewFor(request: Pick<GuardedRequest<TContext>, 'contextValue' | 'variableValues' | 'rootValue'>): Promise<GraphQLSchema> {
        const plan = await this.planFor(request);
        return plan ? createSchemaView(this.schema, plan) : this.schema;
    }

    async execute(request: GuardedRequest<TContext>): Promise<ExecutionResult> {
        const logger = request.logger ?? this.configuration.logger;

        let document: DocumentNode;
        if (typeof request.source === 'string') {
            try {
                document = parse(request.source);
            } catch (error) {
                if (error instanceof GraphQLError) {
                    return { errors: [error] };
                }
                throw error;
            }
        } else {
            document = request.source;
        }

        const plan = await this.planFor(request);
        if (plan && !plan.isEmpty) {
            logger?.debug({ hidden: plan.hiddenKeys }, 'Applied visibility plan');
        }
        const schema = plan ? createSchemaView(this.schema, plan) : this.schema;

        // A view whose masks hide every query field has no query root left.
        const schemaErrors = validateSchema(schema);
        if (schemaErrors.length > 0) {
            return { errors: schemaErrors };
        }

        const validationErrors = validate(schema, document);
        if (validationErrors.length > 0) {
            return { errors: validationErrors };
        }

        const scope = this.configuration.scopes.open(request.contextValue, logger);
        const result = await execute({
            schema,
            document,
            rootValue: request.rootValue,
            contextValue: scope,
            variableValues: request.variableValues,
            operationName: request.operationName
        });

        await scope.settled();
        const denial = scope.denial;
        if (denial) {
            throw denial;
        }

        return result;
    }
}

export function createGuardedSchema<TContext>(options: GuardOptions<TContext>): GuardedSchema<TContext> {
    return new GuardedSchema(options);
}
