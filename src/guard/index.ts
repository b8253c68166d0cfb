export { createGuardConfiguration, type GuardConfiguration, type GuardOptions } from './config.js';
export { describeTarget, defaultDeniedMessage, FIELD_DENIED_CODE } from './error-formatter.js';
export { AuthorizationDenied, ConfigurationError } from './errors.js';
export { GuardedSchema, createGuardedSchema, type GuardedRequest } from './executor.js';
export { installInterceptors } from './interceptor.js';
export { VisibilityPlan, createSchemaView, planVisibility } from './mask-planner.js';
export { PolicyCache, conventionPolicyLocator } from './policy.js';
export { GuardRegistry, buildGuardRegistry, type GuardDescriptor, type MaskDescriptor } from './registry.js';
export { resolveGuards } from './resolver.js';
export { mapSchema, type SchemaMapper } from './schema-map.js';
export {
    usePolicy,
    type FieldAccessEvent,
    type GuardArgs,
    type GuardDefinitions,
    type GuardLogger,
    type GuardMode,
    type GuardPolicy,
    type GuardPredicate,
    type GuardTarget,
    type MaskPredicate,
    type PolicyLocator
} from './types.js';
