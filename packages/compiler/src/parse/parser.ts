import {
	failure,
	or,
	type ParseResult,
	present,
	type Recognizer,
	type Recoverable,
	type RecoverableParser,
	success,
} from './protocol.ts'
import type { Spanned, Stream } from './stream.ts'

/**
 * Outcome of the shared skip loop.
 * - found: the item parsed after `skipped` tokens
 * - recovered: the recovery point matched after `skipped` tokens
 * - exhausted: input ran out before either happened
 */
export type SkipOutcome<T extends Spanned, O> =
	| {
			readonly kind: 'found'
			readonly input: Stream<T>
			readonly value: O
			readonly skipped: readonly number[]
	  }
	| { readonly kind: 'recovered'; readonly input: Stream<T>; readonly skipped: readonly number[] }
	| { readonly kind: 'exhausted' }

/**
 * Try the item, then the recovery point; when neither matches, skip one token
 * and retry. Every iteration either returns or consumes a token.
 */
export function skipUntil<T extends Spanned, O>(
	input: Stream<T>,
	item: RecoverableParser<T, O>,
	itemRecovery: Recognizer<T>,
	recoveryPoint: Recognizer<T>
): SkipOutcome<T, O> {
	const skipped: number[] = []
	let current = input
	for (;;) {
		const result = item.parse(current, itemRecovery)
		if (result.ok) {
			return { input: result.input, kind: 'found', skipped, value: result.value }
		}
		if (recoveryPoint.recognize(current)) {
			return { input: current, kind: 'recovered', skipped }
		}
		const next = current.next()
		if (next === null) return { kind: 'exhausted' }
		skipped.push(current.position)
		current = next.input
	}
}

/**
 * Base class for every combinator. Adds the fluent operations on top of the
 * two protocol methods.
 */
export abstract class Parser<T extends Spanned, O> implements RecoverableParser<T, O> {
	abstract recognize(input: Stream<T>): boolean

	abstract parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O>

	map<U>(apply: (value: O) => U): Parser<T, U> {
		return new Mapped(this, apply)
	}

	/**
	 * Skip ahead to this parser; if the recovery point shows up first, yield a
	 * Missing placeholder instead of failing.
	 */
	recover<M>(missing: M): Parser<T, Recoverable<O, M>> {
		return new Recover(this, missing)
	}
}

class Mapped<T extends Spanned, O, U> extends Parser<T, U> {
	constructor(
		private readonly inner: RecoverableParser<T, O>,
		private readonly apply: (value: O) => U
	) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.inner.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, U> {
		const result = this.inner.parse(input, recoveryPoint)
		if (!result.ok) return result
		return success(result.input, this.apply(result.value))
	}
}

class Recover<T extends Spanned, O, M> extends Parser<T, Recoverable<O, M>> {
	constructor(
		private readonly inner: RecoverableParser<T, O>,
		private readonly missing: M
	) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.inner.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, Recoverable<O, M>> {
		const outcome = skipUntil(input, this.inner, recoveryPoint, recoveryPoint)
		if (outcome.kind === 'exhausted') return failure({ kind: 'Incomplete' })

		const rest = outcome.input.extend(outcome.skipped)
		const slot: Recoverable<O, M> =
			outcome.kind === 'found'
				? present(outcome.value)
				: { kind: 'Missing', missing: outcome.input.missing(this.missing) }
		return success(rest, slot)
	}
}

type Run<T extends Spanned, O> = (input: Stream<T>, recoveryPoint: Recognizer<T>) => ParseResult<T, O>

/**
 * A chain of parsers producing a flat tuple.
 *
 * Each step parses everything before it with the recovery point widened by
 * its own recognizer, then skips ahead until it or the recovery point
 * matches. A required step (`and`) fails the chain when the recovery point
 * wins; a recoverable step (`andRecover`) records a Missing placeholder.
 * The chain as a whole is only tried where its head is recognized.
 */
export class Sequence<T extends Spanned, O extends readonly unknown[]> extends Parser<T, O> {
	constructor(
		private readonly run: Run<T, O>,
		private readonly head: Recognizer<T>
	) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.head.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O> {
		if (!this.head.recognize(input)) return failure({ kind: 'Fail' })
		return this.run(input, recoveryPoint)
	}

	and<U>(next: RecoverableParser<T, U>): Sequence<T, [...O, U]> {
		return new Sequence<T, [...O, U]>(this.required(next), this.head)
	}

	/** Like `and`, but the chain is also recognized by `next`. */
	andRecognize<U>(next: RecoverableParser<T, U>): Sequence<T, [...O, U]> {
		return new Sequence<T, [...O, U]>(this.required(next), or(this.head, next))
	}

	andRecover<U, M>(
		next: RecoverableParser<T, U>,
		missing: (value: O) => M
	): Sequence<T, [...O, Recoverable<U, M>]> {
		const run: Run<T, [...O, Recoverable<U, M>]> = (input, recoveryPoint) => {
			const left = this.run(input, or(recoveryPoint, next))
			if (!left.ok) return left

			const outcome = skipUntil(left.input, next, recoveryPoint, recoveryPoint)
			if (outcome.kind === 'exhausted') return failure({ kind: 'Incomplete' })

			const rest = outcome.input.extend(outcome.skipped)
			const slot: Recoverable<U, M> =
				outcome.kind === 'found'
					? present(outcome.value)
					: { kind: 'Missing', missing: outcome.input.missing(missing(left.value)) }
			return success<T, [...O, Recoverable<U, M>]>(rest, [...left.value, slot])
		}
		return new Sequence(run, this.head)
	}

	private required<U>(next: RecoverableParser<T, U>): Run<T, [...O, U]> {
		return (input, recoveryPoint) => {
			const left = this.run(input, or(recoveryPoint, next))
			if (!left.ok) return left

			const outcome = skipUntil(left.input, next, recoveryPoint, recoveryPoint)
			if (outcome.kind === 'exhausted') return failure({ kind: 'Incomplete' })
			if (outcome.kind === 'recovered') return failure({ kind: 'Fail' })

			return success<T, [...O, U]>(outcome.input.extend(outcome.skipped), [
				...left.value,
				outcome.value,
			])
		}
	}
}
