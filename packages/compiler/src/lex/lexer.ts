import type { SourceId } from '../core/source.ts'
import { span } from '../core/span.ts'
import { type Token, TokenKind, TokenStore } from '../core/tokens.ts'

const UTF8_BOM = '\uFEFF'

const PUNCTUATORS = new Set(['!', '$', '&', '(', ')', ':', '=', '@', '[', ']', '{', '|', '}'])

interface LexerState {
	readonly sourceId: SourceId
	readonly text: string
	pos: number
}

function isIgnored(char: string): boolean {
	return (
		char === ' ' ||
		char === '\t' ||
		char === '\n' ||
		char === '\r' ||
		char === ',' ||
		char === UTF8_BOM
	)
}

function isNameStart(char: string | undefined): boolean {
	return char !== undefined && /[A-Za-z_]/.test(char)
}

function isNameContinue(char: string | undefined): boolean {
	return char !== undefined && /[A-Za-z0-9_]/.test(char)
}

function isDigit(char: string | undefined): boolean {
	return char !== undefined && char >= '0' && char <= '9'
}

function makeToken(state: LexerState, kind: TokenKind, start: number): Token {
	return {
		kind,
		span: span(state.sourceId, start, state.pos),
		text: state.text.slice(start, state.pos),
	}
}

function skipComment(state: LexerState): void {
	const { text } = state
	while (state.pos < text.length && text[state.pos] !== '\n' && text[state.pos] !== '\r') {
		state.pos++
	}
}

function skipIgnored(state: LexerState): void {
	const { text } = state
	while (state.pos < text.length) {
		const char = text.charAt(state.pos)
		if (char === '#') {
			skipComment(state)
		} else if (isIgnored(char)) {
			state.pos++
		} else {
			return
		}
	}
}

function skipDigits(state: LexerState): void {
	while (isDigit(state.text[state.pos])) state.pos++
}

/** Swallow the rest of a malformed number so it becomes one error token. */
function numberError(state: LexerState, start: number): Token {
	while (isNameContinue(state.text[state.pos]) || state.text[state.pos] === '.') state.pos++
	return makeToken(state, TokenKind.Error, start)
}

function lexExponent(state: LexerState): boolean {
	const { text } = state
	state.pos++
	if (text[state.pos] === '+' || text[state.pos] === '-') state.pos++
	if (!isDigit(text[state.pos])) return false
	skipDigits(state)
	return true
}

function lexNumber(state: LexerState): Token {
	const { text } = state
	const start = state.pos
	if (text[state.pos] === '-') state.pos++

	if (!isDigit(text[state.pos])) return numberError(state, start)

	if (text[state.pos] === '0') {
		state.pos++
		if (isDigit(text[state.pos])) return numberError(state, start)
	} else {
		skipDigits(state)
	}

	let isFloat = false
	if (text[state.pos] === '.') {
		state.pos++
		if (!isDigit(text[state.pos])) return numberError(state, start)
		skipDigits(state)
		isFloat = true
	}
	if (text[state.pos] === 'e' || text[state.pos] === 'E') {
		if (!lexExponent(state)) return numberError(state, start)
		isFloat = true
	}

	const next = text[state.pos]
	if (isNameStart(next) || next === '.' || isDigit(next)) return numberError(state, start)

	return makeToken(state, isFloat ? TokenKind.FloatValue : TokenKind.IntValue, start)
}

function lexBlockString(state: LexerState): Token {
	const { text } = state
	const start = state.pos
	state.pos += 3
	while (state.pos < text.length) {
		if (text.startsWith('\\"""', state.pos)) {
			state.pos += 4
		} else if (text.startsWith('"""', state.pos)) {
			state.pos += 3
			return makeToken(state, TokenKind.StringValue, start)
		} else {
			state.pos++
		}
	}
	return makeToken(state, TokenKind.Error, start)
}

function lexString(state: LexerState): Token {
	const { text } = state
	const start = state.pos
	state.pos++
	while (state.pos < text.length) {
		const char = text[state.pos]
		if (char === '\n' || char === '\r') break
		if (char === '\\') {
			state.pos += 2
			continue
		}
		state.pos++
		if (char === '"') return makeToken(state, TokenKind.StringValue, start)
	}
	state.pos = Math.min(state.pos, text.length)
	return makeToken(state, TokenKind.Error, start)
}

function lexName(state: LexerState): Token {
	const start = state.pos
	while (isNameContinue(state.text[state.pos])) state.pos++
	return makeToken(state, TokenKind.Name, start)
}

function lexUnknown(state: LexerState): Token {
	const start = state.pos
	const codePoint = state.text.codePointAt(state.pos) ?? 0
	state.pos += codePoint > 0xffff ? 2 : 1
	return makeToken(state, TokenKind.Error, start)
}

function lexToken(state: LexerState): Token {
	const { text } = state
	const char = text.charAt(state.pos)

	if (text.startsWith('...', state.pos)) {
		const start = state.pos
		state.pos += 3
		return makeToken(state, TokenKind.Punctuator, start)
	}
	if (PUNCTUATORS.has(char)) {
		const start = state.pos
		state.pos++
		return makeToken(state, TokenKind.Punctuator, start)
	}
	if (isNameStart(char)) return lexName(state)
	if (char === '-' || isDigit(char)) return lexNumber(state)
	if (text.startsWith('"""', state.pos)) return lexBlockString(state)
	if (char === '"') return lexString(state)
	return lexUnknown(state)
}

/**
 * Lex a document into tokens.
 * Never fails: anything unrecognized becomes an Error token.
 */
export function* lex(sourceId: SourceId, text: string): Generator<Token> {
	const state: LexerState = { pos: 0, sourceId, text }
	for (;;) {
		skipIgnored(state)
		if (state.pos >= text.length) return
		yield lexToken(state)
	}
}

/** Materialize every token up front so the parser can backtrack. */
export function lexExact(sourceId: SourceId, text: string): TokenStore {
	const store = new TokenStore()
	for (const token of lex(sourceId, text)) {
		store.add(token)
	}
	return store
}
