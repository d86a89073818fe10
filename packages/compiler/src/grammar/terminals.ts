/**
 * Single-token terminals and the small lookahead productions the GraphQL
 * grammar needs to tell constructs apart.
 */

import type { SyntaxDiagnosticCode } from '@facet/diagnostics'
import {
	isFloatValue,
	isIntValue,
	isName,
	isPunctuator,
	isStringValue,
	type FloatValueToken,
	type IntValueToken,
	type NameToken,
	type PunctuatorToken,
	type StringValueToken,
	type Token,
} from '../core/tokens.ts'
import type { Missing } from '../ast/nodes.ts'
import { terminal, token } from '../parse/combinators.ts'
import type { Parser } from '../parse/parser.ts'
import { failure, type ParseResult, success } from '../parse/protocol.ts'
import type { Stream } from '../parse/stream.ts'

export type GraphQLParser<O> = Parser<Token, O>

export function name(): GraphQLParser<NameToken> {
	return token('name', (t: Token) => (isName(t) ? t : null))
}

/** A name that is not one of `reserved`. */
export function nameExcept(...reserved: readonly string[]): GraphQLParser<NameToken> {
	return token('name', (t: Token) => (isName(t) && !reserved.includes(t.text) ? t : null))
}

export function keyword(word: string): GraphQLParser<NameToken> {
	return token(word, (t: Token) => (isName(t) && t.text === word ? t : null))
}

/** A name drawn from a fixed set. */
export function oneOf(expected: string, words: ReadonlySet<string>): GraphQLParser<NameToken> {
	return token(expected, (t: Token) => (isName(t) && words.has(t.text) ? t : null))
}

export function punctuator(text: string): GraphQLParser<PunctuatorToken> {
	return token(text, (t: Token) => (isPunctuator(t) && t.text === text ? t : null))
}

export function intValue(): GraphQLParser<IntValueToken> {
	return token('int', (t: Token) => (isIntValue(t) ? t : null))
}

export function floatValue(): GraphQLParser<FloatValueToken> {
	return token('float', (t: Token) => (isFloatValue(t) ? t : null))
}

export function stringValue(): GraphQLParser<StringValueToken> {
	return token('string', (t: Token) => (isStringValue(t) ? t : null))
}

function expectName(
	input: Stream<Token>,
	expected: string,
	accept: (t: NameToken) => boolean
): ParseResult<Token, NameToken> {
	const next = input.next()
	if (next === null) return failure({ kind: 'Incomplete' })
	const t = next.token
	if (!isName(t) || !accept(t)) return failure({ expected, kind: 'Expected' })
	return success(next.input, t)
}

/** `extend <word>`, consumed as one unit so extensions never backtrack. */
export function extension(word: string): GraphQLParser<readonly [NameToken, NameToken]> {
	return terminal((input: Stream<Token>): ParseResult<Token, readonly [NameToken, NameToken]> => {
		const extend = expectName(input, 'extend', (t) => t.text === 'extend')
		if (!extend.ok) return extend
		const kind = expectName(extend.input, word, (t) => t.text === word)
		if (!kind.ok) return kind
		return success(kind.input, [extend.value, kind.value] as const)
	})
}

/** `name :`, the alias prefix of a field. */
export function aliasPrefix(): GraphQLParser<readonly [NameToken, PunctuatorToken]> {
	return terminal(
		(input: Stream<Token>): ParseResult<Token, readonly [NameToken, PunctuatorToken]> => {
			const alias = expectName(input, 'alias', () => true)
			if (!alias.ok) return alias
			const colon = alias.input.next()
			if (colon === null) return failure({ kind: 'Incomplete' })
			const t = colon.token
			if (!isPunctuator(t) || t.text !== ':') return failure({ expected: ':', kind: 'Expected' })
			return success(colon.input, [alias.value, t] as const)
		}
	)
}

/**
 * `...` when a fragment name follows. Anything else after the dots (`on`,
 * a directive, a selection set) starts an inline fragment.
 */
export function spreadDots(): GraphQLParser<PunctuatorToken> {
	return terminal((input: Stream<Token>): ParseResult<Token, PunctuatorToken> => {
		const dots = input.next()
		if (dots === null) return failure({ kind: 'Incomplete' })
		const t = dots.token
		if (!isPunctuator(t) || t.text !== '...') return failure({ expected: '...', kind: 'Expected' })
		const following = dots.input.peek()
		if (following === undefined || !isName(following) || following.text === 'on') {
			return failure({ expected: 'fragment name', kind: 'Expected' })
		}
		return success(dots.input, t)
	})
}

/** Placeholder factory for a missing slot. */
export function expected(code: SyntaxDiagnosticCode): () => Missing {
	return () => ({ code })
}

export function missing(code: SyntaxDiagnosticCode): Missing {
	return { code }
}

/** Placeholder factory for a missing closing delimiter, pointing back at the opening one. */
export function unclosed(code: SyntaxDiagnosticCode): (open: PunctuatorToken) => Missing {
	return (open) => ({ code, related: open.span })
}
