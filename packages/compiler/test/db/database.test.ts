import assert from 'node:assert'
import { describe, it } from 'node:test'
import type * as Ast from '../../src/ast/nodes.ts'
import { traverseDocument, type Visitor } from '../../src/ast/visit.ts'
import { sourceId } from '../../src/core/source.ts'
import { Database } from '../../src/db/database.ts'
import { parse } from '../../src/grammar/document.ts'

const SCHEMA = `
schema { query: Root }
directive @cached(ttl: Int = 60) on FIELD
type Root { user(id: ID = "1"): User search(filter: Filter): SearchResult node: Node }
interface Node { id: ID! }
type User implements Node { id: ID! name: String friends(first: Int): [User!]! }
type Post implements Node { id: ID! }
union SearchResult = User | Post
input Filter { name: String limit: Int = 10 tags: [String] }
enum Color { RED GREEN }
extend type User { email: String }
type User { duplicate: Int }
`

const QUERY = `
query {
  user(id: "2") @cached(ttl: 5) { name friends(first: 3) { id } ...F }
  search(filter: {limit: 1, tags: ["a"]}) { ... on Post { id } }
  missing { id }
}
fragment F on User { email }
`

interface Collected {
	readonly fields: Ast.Field[]
	readonly arguments: Ast.Argument[]
	readonly values: Ast.Value[]
	readonly directives: Ast.Directive[]
	readonly spreads: Ast.FragmentSpread[]
	readonly inlineFragments: Ast.InlineFragment[]
	readonly operations: Ast.OperationDefinition[]
	readonly fragments: Ast.FragmentDefinition[]
}

const Collector: Visitor<Collected> = {
	visitArgument(node, acc) {
		acc.arguments.push(node)
	},
	visitDirective(node, acc) {
		acc.directives.push(node)
	},
	visitField(node, acc) {
		acc.fields.push(node)
	},
	visitFragmentDefinition(node, acc) {
		acc.fragments.push(node)
	},
	visitFragmentSpread(node, acc) {
		acc.spreads.push(node)
	},
	visitInlineFragment(node, acc) {
		acc.inlineFragments.push(node)
	},
	visitOperationDefinition(node, acc) {
		acc.operations.push(node)
	},
	visitValue(node, acc) {
		acc.values.push(node)
	},
}

function collect(document: Ast.Document): Collected {
	const acc: Collected = {
		arguments: [],
		directives: [],
		fields: [],
		fragments: [],
		inlineFragments: [],
		operations: [],
		spreads: [],
		values: [],
	}
	traverseDocument(document, Collector, acc)
	return acc
}

function document(text: string, id = 1): Ast.Document {
	return parse(sourceId(id), text).document
}

function at<T>(items: readonly T[], index: number): T {
	const item = items[index]
	if (item === undefined) throw new Error(`no item at ${index}`)
	return item
}

function present<T>(slot: Ast.Recoverable<T>): T {
	if (slot.kind !== 'Present') throw new Error('expected a present slot')
	return slot.value
}

/** The value literal whose token text is `text`. */
function literal(values: readonly Ast.Value[], text: string): Ast.Value {
	const found = values.find((value) => 'token' in value && value.token.text === text)
	if (found === undefined) throw new Error(`no literal ${text}`)
	return found
}

function typeText(type: Ast.Type | undefined): string | undefined {
	if (type === undefined) return undefined
	switch (type.kind) {
		case 'NamedType':
			return type.name.text
		case 'NonNullType':
			return `${typeText(type.type)}!`
		case 'ListType':
			return `[${type.type.kind === 'Present' ? typeText(type.type.value) : ''}]`
	}
}

function build(): { database: Database; schema: Ast.Document; query: Ast.Document } {
	const schema = document(SCHEMA, 1)
	const query = document(QUERY, 2)
	return { database: Database.fromDocuments([schema, query]), query, schema }
}

describe('db/database', () => {
	describe('name lookups', () => {
		it('should keep duplicates in insertion order', () => {
			const { database } = build()
			const users = database.typeDefinitionsByName('User')
			assert.strictEqual(users.length, 2)
			const first = at(users, 0)
			assert.ok(first.kind === 'ObjectTypeDefinition')
			assert.notStrictEqual(first.interfaces, null)
		})

		it('should return empty lists for absent names', () => {
			const { database } = build()
			assert.deepStrictEqual(database.typeDefinitionsByName('Missing'), [])
			assert.deepStrictEqual(database.fieldDefinitions('Missing'), [])
			assert.deepStrictEqual(database.fragmentsByName('Missing'), [])
		})

		it('should list definition members before extension members', () => {
			const { database } = build()
			assert.deepStrictEqual(
				database.fieldDefinitions('User').map((field) => field.name.text),
				['id', 'name', 'friends', 'duplicate', 'email']
			)
			assert.strictEqual(database.fieldDefinitionsByName('User', 'email').length, 1)
		})

		it('should index enum values, input fields and directives', () => {
			const { database } = build()
			assert.strictEqual(database.enumValueDefinitionsByName('Color', 'GREEN').length, 1)
			assert.deepStrictEqual(
				database.inputValueDefinitions('Filter').map((field) => field.name.text),
				['name', 'limit', 'tags']
			)
			assert.strictEqual(database.directiveDefinitionsByName('cached').length, 1)
		})

		it('should index operations by name and keep anonymous ones apart', () => {
			const database = Database.fromDocuments([document('query A { a } query A { b } { c }')])
			assert.strictEqual(database.operationsByName('A').length, 2)
			assert.strictEqual(database.anonymousOperations().length, 1)
			assert.strictEqual(database.operations().length, 3)
		})

		it('should collect schema directives from definitions and extensions', () => {
			const database = Database.fromDocuments([
				document('schema @a { query: Q }\nextend schema @b'),
			])
			assert.deepStrictEqual(
				database.schemaDirectives().map((directive) => present(directive.name).text),
				['a', 'b']
			)
		})
	})

	describe('type relations', () => {
		it('should classify types by kind', () => {
			const { database } = build()
			assert.strictEqual(database.typeKind('Filter'), 'InputObject')
			assert.strictEqual(database.typeKind('Nope'), null)
			assert.strictEqual(database.isInputType('Color'), true)
			assert.strictEqual(database.isOutputType('Filter'), false)
			assert.strictEqual(database.isCompositeType('SearchResult'), true)
			assert.strictEqual(database.isObjectType('Node'), false)
		})

		it('should answer membership questions', () => {
			const { database } = build()
			assert.strictEqual(database.isUnionMember('Post', 'SearchResult'), true)
			assert.strictEqual(database.isUnionMember('Root', 'SearchResult'), false)
			assert.strictEqual(database.implementsInterface('User', 'Node'), true)
			assert.deepStrictEqual(database.interfaceImplementations('Node'), ['User', 'Post'])
		})

		it('should compute possible types', () => {
			const { database } = build()
			assert.deepStrictEqual(database.possibleTypes('User'), ['User'])
			assert.deepStrictEqual(database.possibleTypes('SearchResult'), ['User', 'Post'])
			assert.deepStrictEqual(database.possibleTypes('Node'), ['User', 'Post'])
			assert.deepStrictEqual(database.possibleTypes('Color'), [])
		})

		it('should take root types from the schema definition', () => {
			const { database } = build()
			assert.strictEqual(database.rootOperationType('query'), 'Root')
			assert.strictEqual(database.rootOperationType('mutation'), null)
		})

		it('should fall back to conventional root names without a schema', () => {
			const database = Database.fromDocuments([document('type Query { a: Int }')])
			assert.strictEqual(database.rootOperationType('query'), 'Query')
			assert.strictEqual(database.rootOperationType('subscription'), 'Subscription')
		})
	})

	describe('inference', () => {
		it('should resolve fields against their enclosing type', () => {
			const { database, query } = build()
			const { fields, operations } = collect(query)
			const lookup = database.inference.fieldDefinitionByField
			assert.strictEqual(lookup.get(at(fields, 0)), database.fieldDefinitionsByName('Root', 'user')[0])
			assert.strictEqual(lookup.get(at(fields, 2)), database.fieldDefinitionsByName('User', 'friends')[0])
			assert.strictEqual(
				database.inference.typeBySelectionSet.get(present(at(operations, 0).selectionSet)),
				'Root'
			)
		})

		it('should unwrap list and non-null return types', () => {
			const { database, query } = build()
			const friends = at(collect(query).fields, 2)
			assert.ok(friends.selectionSet !== null)
			assert.strictEqual(database.inference.typeBySelectionSet.get(friends.selectionSet), 'User')
		})

		it('should resolve inside inline fragments and fragment definitions', () => {
			const { database, query } = build()
			const { fields, inlineFragments } = collect(query)
			const postId = at(fields, 5)
			assert.strictEqual(
				database.inference.typeBySelectionSet.get(present(at(inlineFragments, 0).selectionSet)),
				'Post'
			)
			assert.strictEqual(
				database.inference.fieldDefinitionByField.get(postId),
				database.fieldDefinitionsByName('Post', 'id')[0]
			)
			const email = at(fields, 8)
			assert.strictEqual(
				database.inference.fieldDefinitionByField.get(email),
				database.fieldDefinitionsByName('User', 'email')[0]
			)
		})

		it('should resolve nothing beneath an unknown field', () => {
			const { database, query } = build()
			const { fields } = collect(query)
			const missing = at(fields, 6)
			assert.strictEqual(database.inference.fieldDefinitionByField.get(missing), undefined)
			assert.strictEqual(database.inference.fieldDefinitionByField.get(at(fields, 7)), undefined)
			assert.ok(missing.selectionSet !== null)
			assert.strictEqual(database.inference.typeBySelectionSet.get(missing.selectionSet), undefined)
		})

		it('should type argument values and attach declared defaults', () => {
			const { database, query } = build()
			const { arguments: args, values } = collect(query)
			const id = at(args, 0)
			assert.strictEqual(database.inference.definitionForArgument.get(id)?.name.text, 'id')
			const value = literal(values, '"2"')
			assert.strictEqual(typeText(database.inference.typesForValues.get(value)), 'ID')
			const defaultValue = database.inference.defaultValueForValues.get(value)
			assert.ok(defaultValue !== undefined && 'token' in defaultValue)
			assert.strictEqual(defaultValue.token.text, '"1"')
		})

		it('should type values nested in objects and lists', () => {
			const { database, query } = build()
			const { values } = collect(query)
			const types = database.inference.typesForValues
			assert.strictEqual(typeText(types.get(literal(values, '1'))), 'Int')
			assert.strictEqual(typeText(types.get(literal(values, '"a"'))), 'String')
			const list = values.find((value) => value.kind === 'ListValue')
			assert.ok(list !== undefined)
			assert.strictEqual(typeText(types.get(list)), '[String]')
			const object = values.find((value) => value.kind === 'ObjectValue')
			assert.ok(object !== undefined)
			assert.strictEqual(typeText(types.get(object)), 'Filter')
		})

		it('should resolve directives and their arguments', () => {
			const { database, query } = build()
			const { directives, values } = collect(query)
			assert.strictEqual(
				database.inference.definitionForDirective.get(at(directives, 0)),
				database.directiveDefinitionsByName('cached')[0]
			)
			const ttl = literal(values, '5')
			assert.strictEqual(typeText(database.inference.typesForValues.get(ttl)), 'Int')
			const defaultValue = database.inference.defaultValueForValues.get(ttl)
			assert.ok(defaultValue !== undefined && 'token' in defaultValue)
			assert.strictEqual(defaultValue.token.text, '60')
		})

		it('should link fragment spreads both ways', () => {
			const { database, query } = build()
			const { spreads, fragments } = collect(query)
			const spread = at(spreads, 0)
			const fragment = at(fragments, 0)
			assert.strictEqual(database.inference.fragmentForSpread.get(spread), fragment)
			assert.deepStrictEqual(database.inference.fragmentSpreads.get(fragment), [spread])
		})
	})

	describe('snapshots', () => {
		it('should not resolve nodes from another parse', () => {
			const { database: first, schema, query } = build()
			const second = Database.fromDocuments([schema, document(QUERY, 2)])
			const user = at(collect(query).fields, 0)
			assert.strictEqual(second.inference.fieldDefinitionByField.get(user), undefined)
			assert.notStrictEqual(first.inference.fieldDefinitionByField.get(user), undefined)
		})

		it('should reuse the resolutions it is given', () => {
			const { database: first, schema, query } = build()
			const inference = first.inferenceFor(query)
			assert.ok(inference !== undefined)
			const second = Database.fromDocuments([schema, query], new Map([[query, inference]]))
			assert.strictEqual(second.inferenceFor(query), inference)
			assert.notStrictEqual(second.inferenceFor(schema), first.inferenceFor(schema))
		})

		it('should record the types each definition resolved through', () => {
			const { database, query } = build()
			const inference = database.inferenceFor(query)
			const [operation, fragment] = query.definitions
			assert.ok(inference !== undefined && operation !== undefined && fragment !== undefined)
			assert.deepStrictEqual(
				[...inference.referencedTypes.get(operation)].sort(),
				['Filter', 'ID', 'Post', 'Root', 'SearchResult', 'String', 'User']
			)
			assert.deepStrictEqual(inference.referencedTypes.get(fragment), ['User', 'String'])
		})
	})
})
