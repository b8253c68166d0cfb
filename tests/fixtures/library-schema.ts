import type { GraphQLSchema } from 'graphql';

import { buildExecutableSchema } from '../../src/graphql/executable-schema.js';
import { createGuardedSchema, type GuardedSchema, type GuardOptions } from '../../src/guard/index.js';

export type LibraryContext = {
    role: 'admin' | 'reader' | null;
    calls: string[];
};

export type Article = {
    id: string;
    slug: string;
    title: string;
    body: string;
    draft: boolean;
};

export const articles: ReadonlyArray<Article> = [
    { id: 'a1', slug: 'first', title: 'First', body: 'hello', draft: false },
    { id: 'a2', slug: 'second', title: 'Second', body: 'world', draft: true }
];

export const librarySdl = `
  interface Node {
    id: ID!
    slug: String
  }

  type Article implements Node {
    id: ID!
    slug: String
    title: String!
    body(format: String): String
    draft: Boolean
  }

  type Author {
    name: String!
    email: String
  }

  type Query {
    articles: [Article!]!
    article(id: ID!, preview: Boolean): Article
    author: Author
    node(id: ID!): Node
    stats: Int
  }

  type Mutation {
    publish(id: ID!): Article
  }
`;

const findArticle = (id: string): Article | undefined => articles.find((article) => article.id === id);

const bodyOf = (source: unknown): string => (
    typeof source === 'object' && source !== null && 'body' in source && typeof source.body === 'string' ? source.body : ''
);

export function buildLibrarySchema(): GraphQLSchema {
    return buildExecutableSchema<LibraryContext>(librarySdl, {
        Query: {
            articles: (_root, _args, context) => {
                context.calls.push('articles');
                return articles;
            },
            article: (_root, args: { id: string }, context) => {
                context.calls.push('article');
                return findArticle(args.id) ?? null;
            },
            author: (_root, _args, context) => {
                context.calls.push('author');
                return { name: 'Ada', email: 'ada@example.test' };
            },
            node: (_root, args: { id: string }) => {
                const article = findArticle(args.id);
                return article ? { __typename: 'Article', ...article } : null;
            },
            stats: (_root, _args, context) => {
                context.calls.push('stats');
                return articles.length;
            }
        },
        Article: {
            body: (source, args: { format?: string | null }) => (
                args.format === 'upper' ? bodyOf(source).toUpperCase() : bodyOf(source)
            )
        },
        Mutation: {
            publish: (_root, args: { id: string }, context) => {
                context.calls.push('publish');
                return findArticle(args.id) ?? null;
            }
        }
    });
}

export function createLibrary(options: Omit<GuardOptions<LibraryContext>, 'schema'> = {}): GuardedSchema<LibraryContext> {
    return createGuardedSchema<LibraryContext>({ schema: buildLibrarySchema(), ...options });
}

export function libraryContext(role: LibraryContext['role'] = 'reader'): LibraryContext {
    return { role, calls: [] };
}
