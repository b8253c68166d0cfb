import { conventionPolicyLocator, usePolicy, type GuardDefinitions, type GuardPolicy } from '../guard/index.js';
import { adminOnly, canCreatePost, canListUserPosts, canReadPost } from './guards.js';
import type { BlogContext } from './resolvers.js';

export const QueryPolicy: GuardPolicy<BlogContext> = {
    fields: {
        posts: canListUserPosts
    }
};

export const PostPolicy: GuardPolicy<BlogContext> = {
    authorize: canReadPost
};

export const MutationPolicy: GuardPolicy<BlogContext> = {
    fields: {
        createPost: canCreatePost
    }
};

export const blogPolicyLocator = conventionPolicyLocator<BlogContext>({
    QueryPolicy,
    PostPolicy,
    MutationPolicy
});

// Masks stay inline: policy objects only carry runtime guards.
export const policyGuards: GuardDefinitions<BlogContext> = {
    Query: {
        guard: usePolicy,
        fields: {
            postsWithMask: { mask: adminOnly },
            usersWithArgumentMask: {
                arguments: {
                    userId: { mask: adminOnly }
                }
            }
        }
    },
    Post: { guard: usePolicy },
    Mutation: { guard: usePolicy }
};
