/**
 * The recoverable parsing protocol.
 *
 * A Recognizer is a non-consuming lookahead test. A RecoverableParser also
 * consumes, and receives the recovery point: a recognizer for whatever an
 * enclosing construct is waiting for next. Combinators that add their own
 * expectation compose it with the recovery point before delegating, so
 * resynchronization sets travel through the grammar as plain arguments.
 */

import type { MissingToken, Spanned, Stream } from './stream.ts'

export type ParseError =
	| { readonly kind: 'Incomplete' }
	| { readonly kind: 'Expected'; readonly expected: string }
	| { readonly kind: 'Alt' }
	| { readonly kind: 'Many1' }
	| { readonly kind: 'Fail' }

export interface ParseSuccess<T extends Spanned, O> {
	readonly ok: true
	readonly input: Stream<T>
	readonly value: O
}

export interface ParseFailure {
	readonly ok: false
	readonly error: ParseError
}

export type ParseResult<T extends Spanned, O> = ParseSuccess<T, O> | ParseFailure

export interface Recognizer<T extends Spanned> {
	recognize(input: Stream<T>): boolean
}

export interface RecoverableParser<T extends Spanned, O> extends Recognizer<T> {
	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O>
}

/**
 * A slot that may be absent after its construct began. An absent slot still
 * carries a placeholder so it can be reported.
 */
export type Recoverable<V, M> =
	| { readonly kind: 'Present'; readonly value: V }
	| { readonly kind: 'Missing'; readonly missing: MissingToken<M> }

export function present<V>(value: V): { readonly kind: 'Present'; readonly value: V } {
	return { kind: 'Present', value }
}

export function isPresent<V, M>(
	recoverable: Recoverable<V, M>
): recoverable is { readonly kind: 'Present'; readonly value: V } {
	return recoverable.kind === 'Present'
}

/** The value of a present slot, or null. */
export function presentValue<V, M>(recoverable: Recoverable<V, M>): V | null {
	return recoverable.kind === 'Present' ? recoverable.value : null
}

export function success<T extends Spanned, O>(input: Stream<T>, value: O): ParseSuccess<T, O> {
	return { input, ok: true, value }
}

export function failure(error: ParseError): ParseFailure {
	return { error, ok: false }
}

/** Disjunction of two recognizers. */
export function or<T extends Spanned>(left: Recognizer<T>, right: Recognizer<T>): Recognizer<T> {
	return {
		recognize: (input) => left.recognize(input) || right.recognize(input),
	}
}

/** Recognizes nothing. */
export function never<T extends Spanned>(): Recognizer<T> {
	return { recognize: () => false }
}

export function endOfInput<T extends Spanned>(): Recognizer<T> {
	return { recognize: (input) => input.isAtEnd() }
}
