import { describe, expect, it, vi } from 'vitest';

import { buildExecutableSchema } from '../graphql/executable-schema.js';
import { buildLibrarySchema, createLibrary, libraryContext, type LibraryContext } from '../../tests/fixtures/library-schema.js';
import { createSchemaView, planVisibility, VisibilityPlan } from './mask-planner.js';
import { createGuardedSchema } from './executor.js';
import { buildGuardRegistry } from './registry.js';
import type { MaskPredicate } from './types.js';

const adminOnly: MaskPredicate<LibraryContext> = (_root, _variables, context) => context.role === 'admin';

describe('planVisibility', () => {
    it('collects the keys of every mask that hides its element', async () => {
        const registry = buildGuardRegistry<LibraryContext>(buildLibrarySchema(), {
            Query: {
                fields: {
                    stats: { mask: adminOnly },
                    article: { arguments: { preview: { mask: async () => false } } },
                    author: { mask: () => true }
                }
            }
        });

        const plan = await planVisibility(registry, { context: libraryContext('reader') });

        expect(plan.hiddenKeys).toEqual(['Query.article(preview)', 'Query.stats']);
        expect(plan.isFieldVisible('Query', 'author')).toBe(true);
        expect(plan.isArgumentVisible('Query', 'article', 'id')).toBe(true);
        expect(plan.isArgumentVisible('Query', 'article', 'preview')).toBe(false);
    });

    it('passes the root value, frozen variables and context to each mask', async () => {
        const mask = vi.fn<MaskPredicate<LibraryContext>>(() => true);
        const registry = buildGuardRegistry<LibraryContext>(buildLibrarySchema(), { Query: { fields: { stats: { mask } } } });
        const context = libraryContext();
        const root = { source: 'test' };

        await planVisibility(registry, { root, variables: { id: 'a1' }, context });

        expect(mask).toHaveBeenCalledWith(root, { id: 'a1' }, context);
        const variables = mask.mock.calls[0]?.[1];
        expect(Object.isFrozen(variables)).toBe(true);
    });
});

describe('createSchemaView', () => {
    it('returns the schema itself for an empty plan', () => {
        const schema = buildLibrarySchema();

        expect(createSchemaView(schema, new VisibilityPlan([]))).toBe(schema);
    });

    it('drops masked fields from interfaces and their implementations', () => {
        const view = createSchemaView(buildLibrarySchema(), new VisibilityPlan(['Node.slug']));

        const article = view.getType('Article');
        const node = view.getType('Node');
        expect(article && 'getFields' in article ? Object.keys(article.getFields()) : []).toEqual(['id', 'title', 'body', 'draft']);
        expect(node && 'getFields' in node ? Object.keys(node.getFields()) : []).toEqual(['id']);
    });
});

describe('GuardedSchema with masks', () => {
    const library = createLibrary({
        guards: {
            Node: { fields: { slug: { mask: adminOnly } } },
            Query: {
                fields: {
                    stats: { mask: adminOnly },
                    article: { arguments: { preview: { mask: async (_root, _variables, context) => context.role === 'admin' } } }
                }
            }
        }
    });
    const unmasked = createLibrary();

    it('rejects a hidden field exactly like a field that does not exist', async () => {
        const context = libraryContext('reader');
        const hidden = await library.execute({ source: '{ stats }', contextValue: context });
        const missing = await unmasked.execute({ source: '{ unknownField }', contextValue: libraryContext('reader') });

        expect(hidden.errors?.map((error) => error.message)).toEqual(['Cannot query field "stats" on type "Query".']);
        expect(missing.errors?.map((error) => error.message)).toEqual(['Cannot query field "unknownField" on type "Query".']);
        expect(hidden.data).toBeUndefined();
        expect(context.calls).toEqual([]);
    });

    it('rejects a hidden argument exactly like an unknown argument', async () => {
        const result = await library.execute({
            source: '{ article(id: "a1", preview: true) { id } }',
            contextValue: libraryContext('reader')
        });

        expect(result.errors?.map((error) => error.toJSON())).toEqual([
            {
                message: 'Unknown argument "preview" on field "Query.article".',
                locations: [{ line: 1, column: 21 }]
            }
        ]);
    });

    it('hides interface fields on implementing types', async () => {
        const result = await library.execute({ source: '{ articles { slug } }', contextValue: libraryContext('reader') });

        expect(result.errors?.map((error) => error.message)).toEqual(['Cannot query field "slug" on type "Article".']);
    });

    it('leaves hidden elements out of introspection', async () => {
        const result = await library.execute({
            source: '{ __type(name: "Query") { fields { name } } }',
            contextValue: libraryContext('reader')
        });

        expect(result.data).toEqual({
            __type: { fields: [{ name: 'articles' }, { name: 'article' }, { name: 'author' }, { name: 'node' }] }
        });
    });

    it('shows everything to callers the masks allow', async () => {
        const result = await library.execute({
            source: '{ stats article(id: "a1", preview: true) { slug } }',
            contextValue: libraryContext('admin')
        });

        expect(result).toEqual({ data: { stats: 2, article: { slug: 'first' } } });
    });

    it('keeps guards and masks on the same field independent', async () => {
        const guard = vi.fn(() => false);
        const both = createLibrary({
            mode: 'collect',
            guards: { Query: { fields: { stats: { mask: adminOnly, guard } } } }
        });

        const hidden = await both.execute({ source: '{ stats }', contextValue: libraryContext('reader') });
        expect(hidden.errors?.map((error) => error.message)).toEqual(['Cannot query field "stats" on type "Query".']);
        expect(guard).toHaveBeenCalledTimes(0);

        const guarded = await both.execute({ source: '{ stats }', contextValue: libraryContext('admin') });
        expect(guarded.data).toEqual({ stats: null });
        expect(guarded.errors?.map((error) => error.message)).toEqual(['Not authorized to access Query.stats']);
        expect(guard).toHaveBeenCalledTimes(1);
    });

    it('logs the hidden keys of a non-empty plan at debug level', async () => {
        const logger = { debug: vi.fn(), warn: vi.fn() };

        await library.execute({ source: '{ articles { id } }', contextValue: libraryContext('reader'), logger });

        expect(logger.debug).toHaveBeenCalledWith(
            { hidden: ['Node.slug', 'Query.article(preview)', 'Query.stats'] },
            'Applied visibility plan'
        );
    });

    it('exposes the view a caller validates against', async () => {
        const readerView = await library.viewFor({ contextValue: libraryContext('reader') });
        const adminView = await library.viewFor({ contextValue: libraryContext('admin') });

        expect(Object.keys(readerView.getQueryType()?.getFields() ?? {})).toEqual(['articles', 'article', 'author', 'node']);
        expect(adminView).toBe(library.schema);
        expect(await unmasked.viewFor({ contextValue: libraryContext('reader') })).toBe(unmasked.schema);
    });
});

describe('views of types left without fields', () => {
    it('drops a root operation type whose fields are all hidden', async () => {
        const library = createLibrary({ guards: { Mutation: { fields: { publish: { mask: adminOnly } } } } });
        const readerContext = libraryContext('reader');
        const adminContext = libraryContext('admin');

        const query = await library.execute({ source: '{ stats }', contextValue: readerContext });
        const mutation = await library.execute({ source: 'mutation { publish(id: "a1") { id } }', contextValue: readerContext });
        const allowed = await library.execute({ source: 'mutation { publish(id: "a1") { id } }', contextValue: adminContext });

        expect(query).toEqual({ data: { stats: 2 } });
        expect(mutation.data).toBeNull();
        expect(mutation.errors).toHaveLength(1);
        expect(readerContext.calls).toEqual(['stats']);
        expect(allowed).toEqual({ data: { publish: { id: 'a1' } } });
        expect(adminContext.calls).toEqual(['publish']);
    });

    it('drops fields whose return type has nothing visible left', async () => {
        const library = createLibrary({
            guards: { Author: { fields: { name: { mask: adminOnly }, email: { mask: adminOnly } } } }
        });

        const view = await library.viewFor({ contextValue: libraryContext('reader') });
        const hidden = await library.execute({ source: '{ author { name } }', contextValue: libraryContext('reader') });
        const visible = await library.execute({ source: '{ stats }', contextValue: libraryContext('reader') });

        expect(view.getType('Author')).toBeUndefined();
        expect(hidden.errors?.map((error) => error.message)).toEqual(['Cannot query field "author" on type "Query".']);
        expect(visible).toEqual({ data: { stats: 2 } });
    });

    it('reports a missing query root instead of throwing', async () => {
        const schema = buildExecutableSchema<LibraryContext>('type Query { secret: Int }', {
            Query: { secret: () => 1 }
        });
        const guarded = createGuardedSchema<LibraryContext>({
            schema,
            guards: { Query: { fields: { secret: { mask: adminOnly } } } }
        });

        const result = await guarded.execute({ source: '{ secret }', contextValue: libraryContext('reader') });

        expect(result.errors?.map((error) => error.message)).toEqual(['Query root type must be provided.']);
    });
});
