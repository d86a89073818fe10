import {
	endOfInput,
	failure,
	or,
	type ParseResult,
	type Recognizer,
	type Recoverable,
	type RecoverableParser,
	success,
} from './protocol.ts'
import { Parser, Sequence, skipUntil } from './parser.ts'
import { type Spanned, Stream, type TokenRun } from './stream.ts'

type Match<T extends Spanned, O> = (input: Stream<T>) => ParseResult<T, O>

class Terminal<T extends Spanned, O> extends Parser<T, O> {
	constructor(private readonly match: Match<T, O>) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.match(input).ok
	}

	parse(input: Stream<T>): ParseResult<T, O> {
		return this.match(input)
	}
}

/**
 * Lift a matcher over the raw stream into both protocol interfaces.
 * Recognizing runs the matcher and throws the advanced stream away.
 */
export function terminal<T extends Spanned, O>(match: Match<T, O>): Parser<T, O> {
	return new Terminal(match)
}

/** Single-token terminal: consumes one token when `accept` returns a value for it. */
export function token<T extends Spanned, O>(
	expected: string,
	accept: (token: T) => O | null
): Parser<T, O> {
	return terminal((input) => {
		const next = input.next()
		if (next === null) return failure({ kind: 'Incomplete' })
		const value = accept(next.token)
		if (value === null) return failure({ expected, kind: 'Expected' })
		return success(next.input, value)
	})
}

class Alt<T extends Spanned, O> extends Parser<T, O> {
	constructor(private readonly alternatives: readonly RecoverableParser<T, O>[]) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.alternatives.some((alternative) => alternative.recognize(input))
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O> {
		for (const alternative of this.alternatives) {
			const result = alternative.parse(input, recoveryPoint)
			if (result.ok) return result
		}
		return failure({ kind: 'Alt' })
	}
}

/**
 * Ordered choice. The first alternative that parses wins, so more specific
 * productions must come first.
 */
export function alt<T extends Spanned, O>(
	...alternatives: readonly RecoverableParser<T, O>[]
): Parser<T, O> {
	return new Alt(alternatives)
}

class Opt<T extends Spanned, O> extends Parser<T, O | null> {
	constructor(private readonly inner: RecoverableParser<T, O>) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.inner.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O | null> {
		const outcome = skipUntil(input, this.inner, recoveryPoint, recoveryPoint)
		switch (outcome.kind) {
			case 'found':
				return success(outcome.input.extend(outcome.skipped), outcome.value)
			case 'recovered':
				return success(input, null)
			case 'exhausted':
				return failure({ kind: 'Incomplete' })
		}
	}
}

/**
 * Optional item. Tokens are skipped while looking for it; if the recovery
 * point shows up first the skips are undone and the result is null.
 */
export function opt<T extends Spanned, O>(inner: RecoverableParser<T, O>): Parser<T, O | null> {
	return new Opt(inner)
}

class Many<T extends Spanned, O> extends Parser<T, O[]> {
	constructor(
		private readonly item: RecoverableParser<T, O>,
		private readonly atLeastOne: boolean
	) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.item.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O[]> {
		const itemRecovery = or(recoveryPoint, this.item)
		const items: O[] = []
		let current = input
		for (;;) {
			const outcome = skipUntil(current, this.item, itemRecovery, recoveryPoint)
			if (outcome.kind !== 'found') break

			items.push(outcome.value)
			const progressed = outcome.input.position > current.position
			current = outcome.input.extend(outcome.skipped)
			if (!progressed) break
		}
		if (this.atLeastOne && items.length === 0) return failure({ kind: 'Many1' })
		return success(current, items)
	}
}

/** Zero or more items, skipping unexpected tokens between them. */
export function many0<T extends Spanned, O>(item: RecoverableParser<T, O>): Parser<T, O[]> {
	return new Many(item, false)
}

/** Like many0, but fails when no item was found. */
export function many1<T extends Spanned, O>(item: RecoverableParser<T, O>): Parser<T, O[]> {
	return new Many(item, true)
}

/** Start a chain. See Sequence. */
export function sequence<T extends Spanned, A>(first: RecoverableParser<T, A>): Sequence<T, [A]> {
	return new Sequence<T, [A]>((input, recoveryPoint) => {
		const result = first.parse(input, recoveryPoint)
		if (!result.ok) return result
		return success<T, [A]>(result.input, [result.value])
	}, first)
}

/**
 * `open body close`, where a missing `close` becomes a placeholder built
 * from the opening token.
 */
export function delimited<T extends Spanned, A, B, C, M>(
	open: RecoverableParser<T, A>,
	body: RecoverableParser<T, B>,
	close: RecoverableParser<T, C>,
	missingClose: (open: A) => M
): Sequence<T, [A, B, Recoverable<C, M>]> {
	return sequence(open)
		.and(body)
		.andRecover(close, ([left]) => missingClose(left))
}

/**
 * Nesting allowance shared by the recursive productions of a grammar.
 * Parsing is synchronous, so one counter serves every parse.
 */
export class NestingBudget {
	private depth = 0

	constructor(readonly limit: number) {}

	/** Run `parse` one level deeper, or return null at the limit. */
	descend<R>(parse: () => R): R | null {
		if (this.depth >= this.limit) return null
		this.depth++
		try {
			return parse()
		} finally {
			this.depth--
		}
	}
}

class Lazy<T extends Spanned, O> extends Parser<T, O> {
	private parser: RecoverableParser<T, O> | null = null

	constructor(
		private readonly build: () => RecoverableParser<T, O>,
		private readonly budget: NestingBudget | null
	) {
		super()
	}

	private get inner(): RecoverableParser<T, O> {
		this.parser ??= this.build()
		return this.parser
	}

	recognize(input: Stream<T>): boolean {
		return this.inner.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O> {
		if (this.budget === null) return this.inner.parse(input, recoveryPoint)
		return (
			this.budget.descend(() => this.inner.parse(input, recoveryPoint)) ??
			failure({ kind: 'Fail' })
		)
	}
}

/**
 * Defer construction, for productions that refer to themselves. With a
 * budget, each parse is one nesting level, and past the limit it fails so
 * the enclosing constructs recover around the rest.
 */
export function lazy<T extends Spanned, O>(
	build: () => RecoverableParser<T, O>,
	budget: NestingBudget | null = null
): Parser<T, O> {
	return new Lazy(build, budget)
}

class Postfix<T extends Spanned, A, B, O> extends Parser<T, O> {
	constructor(
		private readonly base: RecoverableParser<T, A>,
		private readonly suffix: RecoverableParser<T, B>,
		private readonly wrap: (value: A, suffix: B) => O,
		private readonly plain: (value: A) => O
	) {
		super()
	}

	recognize(input: Stream<T>): boolean {
		return this.base.recognize(input)
	}

	parse(input: Stream<T>, recoveryPoint: Recognizer<T>): ParseResult<T, O> {
		const base = this.base.parse(input, or(recoveryPoint, this.suffix))
		if (!base.ok) return base
		const suffix = this.suffix.parse(base.input, recoveryPoint)
		if (!suffix.ok) return success(base.input, this.plain(base.value))
		return success(suffix.input, this.wrap(base.value, suffix.value))
	}
}

/**
 * `base`, optionally followed right away by `suffix`. The suffix is only
 * tried at the next token, so `base` is parsed once either way.
 */
export function postfix<T extends Spanned, A, B, O>(
	base: RecoverableParser<T, A>,
	suffix: RecoverableParser<T, B>,
	wrap: (value: A, suffix: B) => O,
	plain: (value: A) => O
): Parser<T, O> {
	return new Postfix(base, suffix, wrap, plain)
}

export interface Parsed<T extends Spanned, O> {
	readonly value: O
	/** Tokens the parse skipped or never reached */
	readonly unexpected: TokenRun<T>[]
}

/**
 * Run a parser over a whole token buffer with end of input as the outermost
 * recovery point. Returns null only when the parser could not even begin.
 */
export function parseAll<T extends Spanned, O>(
	parser: RecoverableParser<T, O>,
	tokens: readonly T[]
): Parsed<T, O> | null {
	const result = parser.parse(Stream.of(tokens), endOfInput())
	if (!result.ok) return null
	return { unexpected: result.input.unexpected(), value: result.value }
}
