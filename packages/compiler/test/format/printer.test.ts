import assert from 'node:assert'
import { describe, it } from 'node:test'
import { sourceId } from '../../src/core/source.ts'
import { print, printDocument } from '../../src/format/printer.ts'
import { parse } from '../../src/grammar/document.ts'

const SOURCE = sourceId(1)

function format(text: string): string {
	return printDocument(parse(SOURCE, text).document)
}

describe('format/printer', () => {
	describe('executable definitions', () => {
		it('should print one selection per line', () => {
			assert.strictEqual(
				format('query Q{user{id name}}'),
				'query Q {\n  user {\n    id\n    name\n  }\n}\n'
			)
		})

		it('should keep the query shorthand', () => {
			assert.strictEqual(format('{a}'), '{\n  a\n}\n')
		})

		it('should print variables, arguments, directives and fragments', () => {
			assert.strictEqual(
				format('query Q($id:ID!=1,$f:[Int]){u(id:$id,o:{a:1,b:[1,2]})@skip(if:true){...F ...on U{x}}}'),
				[
					'query Q($id: ID! = 1, $f: [Int]) {',
					'  u(id: $id, o: {a: 1, b: [1, 2]}) @skip(if: true) {',
					'    ...F',
					'    ... on U {',
					'      x',
					'    }',
					'  }',
					'}',
					'',
				].join('\n')
			)
		})

		it('should separate definitions with a blank line', () => {
			assert.strictEqual(
				format('fragment F on User{id} {a}'),
				'fragment F on User {\n  id\n}\n\n{\n  a\n}\n'
			)
		})

		it('should leave out missing slots', () => {
			assert.strictEqual(format('{ user(id: ) }'), '{\n  user(id: )\n}\n')
		})

		it('should print nothing for an empty document', () => {
			assert.strictEqual(format('  # only a comment\n'), '')
		})
	})

	describe('type system definitions', () => {
		it('should put descriptions on their own line', () => {
			const text =
				'"""Doc"""\ntype Query implements Node & Entity @key {\n"field doc" id(arg: Int = 1): ID! @deprecated(reason: "x")\nname: String}'
			assert.strictEqual(
				format(text),
				[
					'"""Doc"""',
					'type Query implements Node & Entity @key {',
					'  "field doc"',
					'  id(arg: Int = 1): ID! @deprecated(reason: "x")',
					'  name: String',
					'}',
					'',
				].join('\n')
			)
		})

		it('should print every other kind of definition', () => {
			const text =
				'schema{query:Query}\nunion U=A|B\nenum E{X Y}\ninput I{f:Int=2}\ndirective @d(a:Int) repeatable on FIELD|OBJECT\nextend type Query{more:[String]}\nscalar S @specifiedBy(url:"u")'
			assert.strictEqual(
				format(text),
				[
					'schema {',
					'  query: Query',
					'}',
					'',
					'union U = A | B',
					'',
					'enum E {',
					'  X',
					'  Y',
					'}',
					'',
					'input I {',
					'  f: Int = 2',
					'}',
					'',
					'directive @d(a: Int) repeatable on FIELD | OBJECT',
					'',
					'extend type Query {',
					'  more: [String]',
					'}',
					'',
					'scalar S @specifiedBy(url: "u")',
					'',
				].join('\n')
			)
		})

		it('should break argument definitions with descriptions over lines', () => {
			assert.strictEqual(
				format('type Q { f("the id" id: ID, n: Int): Int }'),
				['type Q {', '  f(', '    "the id"', '    id: ID', '    n: Int', '  ): Int', '}', ''].join(
					'\n'
				)
			)
		})
	})

	describe('print', () => {
		it('should print a nested node on its own', () => {
			const [definition] = parse(SOURCE, '{ a(x: [1, 2]) }').document.definitions
			assert.ok(definition?.kind === 'OperationDefinition')
			const set = definition.selectionSet
			assert.ok(set.kind === 'Present')
			const [field] = set.value.selections
			assert.ok(field !== undefined)
			assert.strictEqual(print(field), 'a(x: [1, 2])')
		})
	})
})
