import assert from 'node:assert'
import { describe, it } from 'node:test'
import type * as Ast from '../../src/ast/nodes.ts'
import { traverseDocument, type Visitor } from '../../src/ast/visit.ts'
import { BUILTINS_KEY } from '../../src/workspace/builtins.ts'
import { Workspace } from '../../src/workspace/workspace.ts'

const CollectFields: Visitor<Ast.Field[]> = {
	visitField(node, fields) {
		fields.push(node)
	},
}

function fieldsOf(workspace: Workspace, key: string): Ast.Field[] {
	const document = workspace.document(key)
	if (document === undefined) throw new Error(`no document ${key}`)
	const fields: Ast.Field[] = []
	traverseDocument(document.parsed.document, CollectFields, fields)
	return fields
}

function sorted(keys: Iterable<string>): string[] {
	return [...keys].sort()
}

/** Builtins, a root type, a user type and a query selecting through both. */
function split(): Workspace {
	const workspace = Workspace.withBuiltins()
	workspace.addDocument('root.graphql', 'type Query { user: User }')
	workspace.addDocument('user.graphql', 'type User { id: ID }')
	workspace.addDocument('query.graphql', '{ user { id } }')
	workspace.rebuild()
	return workspace
}

describe('workspace', () => {
	describe('documents', () => {
		it('should start with the built-in scalars and directives', () => {
			const workspace = Workspace.withBuiltins()
			assert.deepStrictEqual(workspace.keys(), [BUILTINS_KEY])
			assert.strictEqual(workspace.document(BUILTINS_KEY)?.isBuiltin, true)
			assert.deepStrictEqual(workspace.diagnostics(BUILTINS_KEY), [])
			assert.strictEqual(workspace.database.typeKind('String'), 'Scalar')
			assert.strictEqual(workspace.database.directiveDefinitionsByName('skip').length, 1)
		})

		it('should report the syntax errors of each document', () => {
			const workspace = new Workspace()
			workspace.addDocument('bad.graphql', '{ user')
			assert.deepStrictEqual(
				workspace.diagnostics('bad.graphql').map((diagnostic) => diagnostic.def.code),
				['FCPARSE004']
			)
			assert.deepStrictEqual(workspace.diagnostics('unknown.graphql'), [])
		})

		it('should map source ids back to keys', () => {
			const workspace = new Workspace()
			workspace.addDocument('a.graphql', 'scalar A')
			const document = workspace.document('a.graphql')
			assert.ok(document !== undefined)
			assert.strictEqual(workspace.keyOf(document.sourceId), 'a.graphql')
		})

		it('should replace a document added under an existing key', () => {
			const workspace = new Workspace()
			workspace.addDocument('a.graphql', 'scalar A')
			workspace.addDocument('a.graphql', 'scalar B')
			assert.deepStrictEqual(workspace.keys(), ['a.graphql'])
			const database = workspace.rebuild()
			assert.strictEqual(database.typeExists('A'), false)
			assert.strictEqual(database.typeExists('B'), true)
		})
	})

	describe('invalidation', () => {
		it('should only return the edited document for an unrelated change', () => {
			const workspace = split()
			assert.deepStrictEqual(
				sorted(workspace.addDocument('post.graphql', 'type Post { id: ID }')),
				['post.graphql']
			)
		})

		it('should follow types reached only through field return types', () => {
			const workspace = split()
			const invalidated = workspace.replaceDocument(
				'user.graphql',
				'type User { id: ID name: String }'
			)
			assert.deepStrictEqual(sorted(invalidated), ['query.graphql', 'root.graphql', 'user.graphql'])
			assert.deepStrictEqual(sorted(workspace.pending()), [
				'query.graphql',
				'root.graphql',
				'user.graphql',
			])
		})

		it('should invalidate consumers of a type that did not exist yet', () => {
			const workspace = Workspace.withBuiltins()
			workspace.addDocument('root.graphql', 'type Query { user: User }')
			workspace.addDocument('query.graphql', '{ user { id } }')
			workspace.rebuild()
			const [, id] = fieldsOf(workspace, 'query.graphql')
			assert.ok(id !== undefined)
			assert.strictEqual(workspace.database.inference.fieldDefinitionByField.get(id), undefined)

			assert.deepStrictEqual(
				sorted(workspace.addDocument('user.graphql', 'type User { id: ID }')),
				['query.graphql', 'root.graphql', 'user.graphql']
			)
			const database = workspace.rebuild()
			assert.strictEqual(
				database.inference.fieldDefinitionByField.get(id),
				database.fieldDefinitionsByName('User', 'id')[0]
			)
		})

		it('should invalidate consumers when a document is removed', () => {
			const workspace = split()
			assert.deepStrictEqual(sorted(workspace.removeDocument('user.graphql')), [
				'query.graphql',
				'root.graphql',
				'user.graphql',
			])
			assert.deepStrictEqual(sorted(workspace.removeDocument('missing.graphql')), [])
			const database = workspace.rebuild()
			const [user] = fieldsOf(workspace, 'query.graphql')
			assert.ok(user !== undefined)
			assert.notStrictEqual(database.inference.fieldDefinitionByField.get(user), undefined)
			assert.strictEqual(database.typeExists('User'), false)
		})
	})

	describe('rebuild', () => {
		it('should clear pending documents', () => {
			const workspace = split()
			assert.deepStrictEqual(workspace.pending(), [])
		})

		it('should reuse the resolutions of clean documents', () => {
			const workspace = split()
			const query = workspace.document('query.graphql')
			assert.ok(query !== undefined)
			const before = workspace.database.inferenceFor(query.parsed.document)
			workspace.addDocument('post.graphql', 'type Post { id: ID }')
			const after = workspace.rebuild().inferenceFor(query.parsed.document)
			assert.ok(before !== undefined)
			assert.strictEqual(after, before)
		})

		it('should leave earlier snapshots untouched', () => {
			const workspace = split()
			const first = workspace.database
			const [oldUser] = fieldsOf(workspace, 'query.graphql')
			assert.ok(oldUser !== undefined)

			workspace.replaceDocument('query.graphql', '{ user { id } }')
			const second = workspace.rebuild()
			assert.notStrictEqual(first.inference.fieldDefinitionByField.get(oldUser), undefined)
			assert.strictEqual(second.inference.fieldDefinitionByField.get(oldUser), undefined)

			const [newUser] = fieldsOf(workspace, 'query.graphql')
			assert.ok(newUser !== undefined)
			assert.notStrictEqual(second.inference.fieldDefinitionByField.get(newUser), undefined)
		})
	})
})
