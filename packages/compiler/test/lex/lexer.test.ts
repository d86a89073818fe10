import assert from 'node:assert'
import { describe, it } from 'node:test'
import { sourceId } from '../../src/core/source.ts'
import { isStringValue, type StringValueToken, type Token, TokenKind } from '../../src/core/tokens.ts'
import { lex, lexExact } from '../../src/lex/lexer.ts'
import { stringValue } from '../../src/lex/strings.ts'

const SOURCE = sourceId(1)

function tokens(text: string): Token[] {
	return [...lex(SOURCE, text)]
}

function summary(text: string): Array<[TokenKind, string]> {
	return tokens(text).map((token) => [token.kind, token.text])
}

function stringToken(text: string): StringValueToken {
	const [token] = tokens(text)
	assert.ok(token !== undefined && isStringValue(token), `expected a string token in ${text}`)
	return token
}

describe('lex/lexer', () => {
	describe('basic lexing', () => {
		it('should produce nothing for empty input', () => {
			assert.deepStrictEqual(tokens(''), [])
		})

		it('should lex names and punctuators with spans', () => {
			const result = tokens('query { a }')
			assert.deepStrictEqual(
				result.map((token) => [token.text, token.span.start, token.span.end]),
				[
					['query', 0, 5],
					['{', 6, 7],
					['a', 8, 9],
					['}', 10, 11],
				]
			)
			assert.strictEqual(result[0]?.span.sourceId, SOURCE)
		})

		it('should skip byte order mark, commas and comments', () => {
			assert.deepStrictEqual(summary('\uFEFF# comment\nname, other'), [
				[TokenKind.Name, 'name'],
				[TokenKind.Name, 'other'],
			])
		})

		it('should treat every line terminator as whitespace', () => {
			assert.deepStrictEqual(
				tokens('a\r\nb\rc\nd').map((token) => token.text),
				['a', 'b', 'c', 'd']
			)
		})

		it('should lex every punctuator', () => {
			const result = summary('! $ & ( ) ... : = @ [ ] { | }')
			assert.ok(result.every(([kind]) => kind === TokenKind.Punctuator))
			assert.deepStrictEqual(
				result.map(([, text]) => text),
				['!', '$', '&', '(', ')', '...', ':', '=', '@', '[', ']', '{', '|', '}']
			)
		})

		it('should lex a spread glued to a name', () => {
			assert.deepStrictEqual(summary('...Frag'), [
				[TokenKind.Punctuator, '...'],
				[TokenKind.Name, 'Frag'],
			])
		})
	})

	describe('numbers', () => {
		it('should distinguish ints and floats', () => {
			assert.deepStrictEqual(summary('0 -12 1.5 2e10 -3.0E-2'), [
				[TokenKind.IntValue, '0'],
				[TokenKind.IntValue, '-12'],
				[TokenKind.FloatValue, '1.5'],
				[TokenKind.FloatValue, '2e10'],
				[TokenKind.FloatValue, '-3.0E-2'],
			])
		})

		it('should turn malformed numbers into one error token', () => {
			assert.deepStrictEqual(summary('0123'), [[TokenKind.Error, '0123']])
			assert.deepStrictEqual(summary('12abc'), [[TokenKind.Error, '12abc']])
			assert.deepStrictEqual(summary('1.'), [[TokenKind.Error, '1.']])
			assert.deepStrictEqual(summary('1.2.3'), [[TokenKind.Error, '1.2.3']])
		})

		it('should reject a lone minus sign', () => {
			assert.deepStrictEqual(summary('- a'), [
				[TokenKind.Error, '-'],
				[TokenKind.Name, 'a'],
			])
		})
	})

	describe('strings', () => {
		it('should lex strings with escaped quotes', () => {
			assert.deepStrictEqual(summary('"a\\"b"'), [[TokenKind.StringValue, '"a\\"b"']])
		})

		it('should turn an unterminated string into an error token', () => {
			assert.deepStrictEqual(summary('"abc'), [[TokenKind.Error, '"abc']])
		})

		it('should stop an unterminated string at the end of the line', () => {
			assert.deepStrictEqual(summary('"abc\nname'), [
				[TokenKind.Error, '"abc'],
				[TokenKind.Name, 'name'],
			])
		})

		it('should lex block strings across lines', () => {
			assert.deepStrictEqual(summary('"""a\nb""" c'), [
				[TokenKind.StringValue, '"""a\nb"""'],
				[TokenKind.Name, 'c'],
			])
		})

		it('should keep escaped triple quotes inside block strings', () => {
			assert.deepStrictEqual(summary('"""a \\""" b"""'), [
				[TokenKind.StringValue, '"""a \\""" b"""'],
			])
		})

		it('should turn an unterminated block string into an error token', () => {
			assert.deepStrictEqual(summary('"""abc'), [[TokenKind.Error, '"""abc']])
		})
	})

	describe('unknown characters', () => {
		it('should produce one error token per character', () => {
			assert.deepStrictEqual(summary('? a'), [
				[TokenKind.Error, '?'],
				[TokenKind.Name, 'a'],
			])
		})

		it('should keep surrogate pairs together', () => {
			const [token] = tokens('\u{1F600}')
			assert.strictEqual(token?.kind, TokenKind.Error)
			assert.strictEqual(token?.span.end, 2)
		})
	})

	describe('lexExact', () => {
		it('should materialize a replayable buffer', () => {
			const store = lexExact(SOURCE, 'type Query')
			assert.strictEqual(store.count(), 2)
			assert.deepStrictEqual(
				store.view().map((token) => token.text),
				['type', 'Query']
			)
		})
	})
})

describe('lex/strings', () => {
	it('should resolve simple escapes', () => {
		assert.strictEqual(stringValue(stringToken('"a\\nb\\t\\"c\\\\"')), 'a\nb\t"c\\')
	})

	it('should resolve unicode escapes', () => {
		assert.strictEqual(stringValue(stringToken('"\\u0041\\u00e9"')), 'Aé')
	})

	it('should dedent block strings and drop blank edge lines', () => {
		const token = stringToken('"""\n    hello\n      world\n  """')
		assert.strictEqual(stringValue(token), 'hello\n  world')
	})

	it('should unescape triple quotes in block strings', () => {
		assert.strictEqual(stringValue(stringToken('"""a \\""" b"""')), 'a """ b')
	})
})
