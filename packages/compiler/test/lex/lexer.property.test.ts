import { describe, it } from 'node:test'
import fc from 'fast-check'
import { sourceId } from '../../src/core/source.ts'
import { lex } from '../../src/lex/lexer.ts'

const SOURCE = sourceId(1)

const graphqlish = fc
	.array(
		fc.constantFrom(
			'query',
			'type',
			'{',
			'}',
			'(',
			')',
			':',
			'...',
			'$x',
			'@skip',
			'"str"',
			'"""blk"""',
			'12',
			'1.5e3',
			'#c\n',
			' ',
			',',
			'\n',
			'?',
			'"'
		),
		{ maxLength: 40 }
	)
	.map((parts) => parts.join(''))

describe('lex/lexer properties', () => {
	describe('safety properties', () => {
		it('never throws on arbitrary string input', () => {
			fc.assert(
				fc.property(fc.string(), (input) => {
					for (const _ of lex(SOURCE, input)) {
						// drain
					}
					return true
				}),
				{ numRuns: 1000 }
			)
		})
	})

	describe('span properties', () => {
		it('token text is exactly the spanned slice', () => {
			fc.assert(
				fc.property(fc.oneof(fc.string(), graphqlish), (input) => {
					for (const token of lex(SOURCE, input)) {
						if (input.slice(token.span.start, token.span.end) !== token.text) return false
					}
					return true
				}),
				{ numRuns: 500 }
			)
		})

		it('tokens are non-empty, ordered and non-overlapping', () => {
			fc.assert(
				fc.property(fc.oneof(fc.string(), graphqlish), (input) => {
					let previousEnd = 0
					for (const token of lex(SOURCE, input)) {
						if (token.span.start < previousEnd) return false
						if (token.span.end <= token.span.start) return false
						previousEnd = token.span.end
					}
					return previousEnd <= input.length
				}),
				{ numRuns: 500 }
			)
		})
	})
})
