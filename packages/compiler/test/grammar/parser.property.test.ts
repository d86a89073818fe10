import { describe, it } from 'node:test'
import fc from 'fast-check'
import { collectErrors } from '../../src/ast/errors.ts'
import { sourceId } from '../../src/core/source.ts'
import { parse } from '../../src/grammar/document.ts'

const SOURCE = sourceId(1)

const fragmentOfGraphQL = fc
	.array(
		fc.constantFrom(
			'query',
			'mutation',
			'fragment',
			'on',
			'type',
			'extend',
			'schema',
			'input',
			'enum',
			'union',
			'directive',
			'@',
			'$',
			'...',
			'{',
			'}',
			'(',
			')',
			'[',
			']',
			':',
			'=',
			'!',
			'|',
			'&',
			'name',
			'User',
			'1',
			'"s"',
			'?'
		),
		{ maxLength: 30 }
	)
	.map((parts) => parts.join(' '))

const nestingTemplate = fc.constantFrom(
	(n: number) => `query { a(x: ${'['.repeat(n)}) }`,
	(n: number) => `{ ${'a { '.repeat(n)}`,
	(n: number) => `{ a(x: ${'{ b: '.repeat(n)}) }`,
	(n: number) => `query ($v: ${'['.repeat(n)}Int) { a }`,
	(n: number) => `${'['.repeat(n)}${'{'.repeat(n)}`
)

const deeplyNested = fc
	.tuple(nestingTemplate, fc.integer({ max: 3000, min: 1 }))
	.map(([template, depth]) => template(depth))

const longGarbage = fc
	.array(fc.constantFrom(')', ']', '}', ':', '=', '!', '|', '&', '?', '1', '"s"', 'name'), {
		maxLength: 3000,
		minLength: 500,
	})
	.map((parts) => parts.join(' '))

describe('grammar/parser properties', () => {
	describe('totality', () => {
		it('never throws on deeply nested input', () => {
			fc.assert(
				fc.property(deeplyNested, (input) => {
					collectErrors(parse(SOURCE, input))
					return true
				}),
				{ numRuns: 40 }
			)
		})

		it('never throws on long runs of stray tokens', () => {
			fc.assert(
				fc.property(longGarbage, (input) => {
					collectErrors(parse(SOURCE, input))
					return true
				}),
				{ numRuns: 20 }
			)
		})

		it('never throws on arbitrary text', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					parse(SOURCE, input)
					return true
				}),
				{ numRuns: 500 }
			)
		})

		it('never throws on shuffled GraphQL tokens', () => {
			fc.assert(
				fc.property(fragmentOfGraphQL, (input) => {
					collectErrors(parse(SOURCE, input))
					return true
				}),
				{ numRuns: 500 }
			)
		})
	})

	describe('diagnostics', () => {
		it('are sorted and lie inside the text', () => {
			fc.assert(
				fc.property(fragmentOfGraphQL, (input) => {
					let previous = 0
					for (const diagnostic of collectErrors(parse(SOURCE, input))) {
						const { start, end } = diagnostic.span
						if (start < previous || start > end || end > input.length) return false
						previous = start
					}
					return true
				}),
				{ numRuns: 500 }
			)
		})

		it('unrecognized runs are ordered and disjoint', () => {
			fc.assert(
				fc.property(fragmentOfGraphQL, (input) => {
					let previousEnd = 0
					for (const run of parse(SOURCE, input).unrecognized) {
						if (run.tokens.length === 0 || run.span.start < previousEnd) return false
						previousEnd = run.span.end
					}
					return true
				}),
				{ numRuns: 500 }
			)
		})
	})
})
