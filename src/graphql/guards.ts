import type { GuardArgs, GuardDefinitions, GuardPredicate, MaskPredicate } from '../guard/index.js';
import type { BlogContext } from './resolvers.js';

function readInputUserId(args: GuardArgs): string | undefined {
    const input = args.input;
    if (typeof input === 'object' && input !== null && 'userId' in input && typeof input.userId === 'string') {
        return input.userId;
    }

    return undefined;
}

export const isAdmin = (context: BlogContext): boolean => context.currentUser?.role === 'admin';

/** Users may only list their own posts. */
export const canListUserPosts: GuardPredicate<BlogContext> = (_root, args, context) => (
    context.currentUser !== null && context.currentUser.id === args.userId
);

export const canReadPost: GuardPredicate<BlogContext> = (_post, _args, context) => isAdmin(context);

/** Posts can only be created for the signed-in user. */
export const canCreatePost: GuardPredicate<BlogContext> = (_root, args, context) => (
    context.currentUser !== null && context.currentUser.id === readInputUserId(args)
);

export const adminOnly: MaskPredicate<BlogContext> = (_root, _variables, context) => isAdmin(context);

export const inlineGuards: GuardDefinitions<BlogContext> = {
    Query: {
        fields: {
            posts: { guard: canListUserPosts },
            postsWithMask: { mask: adminOnly },
            usersWithArgumentMask: {
                arguments: {
                    userId: { mask: adminOnly }
                }
            }
        }
    },
    Post: {
        guard: canReadPost
    },
    Mutation: {
        fields: {
            createPost: { guard: canCreatePost }
        }
    }
};
