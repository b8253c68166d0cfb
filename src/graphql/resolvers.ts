import { GraphQLError } from 'graphql';

import type { BlogStore, CreatePostInput, Post, User } from '../services/blog-store.js';
import type { ResolverMap } from './executable-schema.js';

export type BlogContext = {
    requestId?: string;
    currentUser: User | null;
    store: BlogStore;
};

type UserIdArg = { userId: string };
type OptionalUserIdArg = { userId?: string | null };
type CreatePostArgs = { input: CreatePostInput };

function toError(message: string, code: string, remediation: string): GraphQLError {
    return new GraphQLError(message, {
        extensions: {
            code,
            remediation
        }
    });
}

export const resolvers = {
    Query: {
        posts: (_parent: unknown, { userId }: UserIdArg, context: BlogContext): Post[] => (
            context.store.listPostsByUser(userId)
        ),
        postsWithMask: (_parent: unknown, { userId }: UserIdArg, context: BlogContext): Post[] => (
            context.store.listPostsByUser(userId)
        ),
        usersWithArgumentMask: (_parent: unknown, { userId }: OptionalUserIdArg, context: BlogContext): User[] => {
            if (userId === undefined || userId === null) {
                return context.store.listUsers();
            }

            const user = context.store.findUser(userId);
            return user ? [user] : [];
        }
    },
    Mutation: {
        createPost: (_parent: unknown, { input }: CreatePostArgs, context: BlogContext): { post: Post } => {
            if (!context.store.findUser(input.userId)) {
                throw toError(
                    `User ${input.userId} not found`,
                    'USER_NOT_FOUND',
                    'Create posts for an existing user ID.'
                );
            }

            return { post: context.store.createPost(input) };
        }
    }
} satisfies ResolverMap<BlogContext>;
