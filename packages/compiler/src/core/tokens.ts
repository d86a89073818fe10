/**
 * Token storage using dense arrays with integer IDs.
 * The parser replays this buffer freely, so it is never mutated after lexing.
 */

import type { Span } from './span.ts'

/** Token kinds - small integer discriminant. */
export const TokenKind = {
	// Special (255)
	Error: 255,
	FloatValue: 3,
	IntValue: 2,

	// Words and symbols (0-1)
	Name: 0,
	Punctuator: 1,

	// Literals (2-4)
	StringValue: 4,
} as const

export type TokenKind = (typeof TokenKind)[keyof typeof TokenKind]

export type TokenId = number & { readonly __brand: 'TokenId' }

export function tokenId(n: number): TokenId {
	return n as TokenId
}

interface TokenOf<K extends TokenKind> {
	readonly kind: K
	/** Exact source text of the lexeme */
	readonly text: string
	readonly span: Span
}

export type NameToken = TokenOf<typeof TokenKind.Name>
export type PunctuatorToken = TokenOf<typeof TokenKind.Punctuator>
export type IntValueToken = TokenOf<typeof TokenKind.IntValue>
export type FloatValueToken = TokenOf<typeof TokenKind.FloatValue>
export type StringValueToken = TokenOf<typeof TokenKind.StringValue>
export type ErrorToken = TokenOf<typeof TokenKind.Error>

export type Token =
	| NameToken
	| PunctuatorToken
	| IntValueToken
	| FloatValueToken
	| StringValueToken
	| ErrorToken

export function isName(token: Token): token is NameToken {
	return token.kind === TokenKind.Name
}

export function isPunctuator(token: Token): token is PunctuatorToken {
	return token.kind === TokenKind.Punctuator
}

export function isIntValue(token: Token): token is IntValueToken {
	return token.kind === TokenKind.IntValue
}

export function isFloatValue(token: Token): token is FloatValueToken {
	return token.kind === TokenKind.FloatValue
}

export function isStringValue(token: Token): token is StringValueToken {
	return token.kind === TokenKind.StringValue
}

/**
 * Dense array storage for tokens.
 * Append-only during lexing.
 */
export class TokenStore {
	private readonly tokens: Token[] = []

	add(token: Token): TokenId {
		const id = tokenId(this.tokens.length)
		this.tokens.push(token)
		return id
	}

	get(id: TokenId): Token {
		const token = this.tokens[id]
		if (token === undefined) {
			throw new Error(`Invalid TokenId: ${id}`)
		}
		return token
	}

	count(): number {
		return this.tokens.length
	}

	isValid(id: TokenId): boolean {
		return id >= 0 && id < this.tokens.length
	}

	*[Symbol.iterator](): Generator<[TokenId, Token]> {
		for (let i = 0; i < this.tokens.length; i++) {
			const token = this.tokens[i]
			if (token !== undefined) yield [tokenId(i), token]
		}
	}

	/** Returns tokens in range [start, end). */
	slice(start: TokenId, end: TokenId): Token[] {
		return this.tokens.slice(start, end)
	}

	/** Read-only view used as parser input. */
	view(): readonly Token[] {
		return this.tokens
	}
}
