import { ConfigurationError } from './errors.js';
import type { GuardPolicy, PolicyLocator } from './types.js';

/**
 * Resolves policy objects once per type name. Lookups happen while the
 * registry is built, so a missing policy fails schema construction.
 */
export class PolicyCache<TContext> {
    private readonly policies = new Map<string, GuardPolicy<TContext>>();

    constructor(private readonly locator?: PolicyLocator<TContext>) {}

    locate(typeName: string): GuardPolicy<TContext> {
        const cached = this.policies.get(typeName);
        if (cached) {
            return cached;
        }

        if (!this.locator) {
            throw new ConfigurationError(`Type '${typeName}' requests a policy object but no policy locator is configured`);
        }

        const policy = this.locator(typeName);
        if (!policy) {
            throw new ConfigurationError(`No policy object found for type '${typeName}'`);
        }

        this.policies.set(typeName, policy);
        return policy;
    }
}

/**
 * Locator that maps a type name to a policy by a fixed naming convention,
 * e.g. `Post` to `PostPolicy`.
 */
export function conventionPolicyLocator<TContext>(
    policies: Readonly<Record<string, GuardPolicy<TContext>>>,
    suffix = 'Policy'
): PolicyLocator<TContext> {
    return (typeName) => {
        const name = `${typeName}${suffix}`;
        return Object.prototype.hasOwnProperty.call(policies, name) ? policies[name] : undefined;
    };
}
