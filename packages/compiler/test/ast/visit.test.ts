import assert from 'node:assert'
import { describe, it } from 'node:test'
import { collectErrors } from '../../src/ast/errors.ts'
import { spanOf } from '../../src/ast/span.ts'
import { traverse, type Visitor } from '../../src/ast/visit.ts'
import { sourceId } from '../../src/core/source.ts'
import { span } from '../../src/core/span.ts'
import { parse } from '../../src/grammar/document.ts'

const SOURCE = sourceId(1)

const FieldEvents: Visitor<string[]> = {
	postVisitField(node, events) {
		events.push(`exit ${node.name.kind === 'Present' ? node.name.value.text : '?'}`)
	},
	visitField(node, events) {
		events.push(`enter ${node.name.kind === 'Present' ? node.name.value.text : '?'}`)
	},
}

describe('ast/visit', () => {
	it('should visit children in source order between visit and postVisit', () => {
		const events: string[] = []
		traverse(parse(SOURCE, '{ a { b } c }').document, FieldEvents, events)
		assert.deepStrictEqual(events, ['enter a', 'enter b', 'exit b', 'exit a', 'enter c', 'exit c'])
	})

	it('should call the group callbacks for every member', () => {
		const seen: string[] = []
		const visitor: Visitor<string[]> = {
			visitDefinition(node, acc) {
				acc.push(node.kind)
			},
			visitValue(node, acc) {
				acc.push(node.kind)
			},
		}
		traverse(parse(SOURCE, '{ a(x: [1]) } scalar S').document, visitor, seen)
		assert.deepStrictEqual(seen, [
			'OperationDefinition',
			'ListValue',
			'IntValue',
			'ScalarTypeDefinition',
		])
	})

	it('should report missing slots', () => {
		const missing: string[] = []
		traverse(
			parse(SOURCE, '{ a').document,
			{
				visitMissing(node, acc) {
					acc.push(node.missing.code)
				},
			},
			missing
		)
		assert.deepStrictEqual(missing, ['FCPARSE004'])
	})
})

describe('ast/span', () => {
	it('should cover every token of a node', () => {
		assert.deepStrictEqual(spanOf(parse(SOURCE, '  { a }  ').document), span(SOURCE, 2, 7))
	})

	it('should return null for a node without tokens', () => {
		assert.strictEqual(spanOf(parse(SOURCE, '').document), null)
	})
})

describe('ast/errors', () => {
	it('should order missing slots and skipped runs by position', () => {
		const diagnostics = collectErrors(parse(SOURCE, 'query { a(x: ) ? }'))
		assert.deepStrictEqual(
			diagnostics.map((diagnostic) => [diagnostic.def.code, diagnostic.span.start]),
			[
				['FCPARSE008', 12],
				['FCPARSE001', 15],
			]
		)
	})

	it('should return nothing for a clean document', () => {
		assert.deepStrictEqual(collectErrors(parse(SOURCE, 'type T { id: ID }')), [])
	})
})
