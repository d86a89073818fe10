import {
	collapseToEnd,
	collapseToStart,
	DEFAULT_SPAN,
	joinSpans,
	type Span,
	spanBetween,
} from '../core/span.ts'

/** Anything the parser can consume: it only needs to know where a token sits. */
export interface Spanned {
	readonly span: Span
}

/**
 * Placeholder for a grammar slot that was expected but not found.
 * `missing` describes the expectation; `span` is where it should have been.
 */
export interface MissingToken<M> {
	readonly span: Span
	readonly missing: M
}

/** Consecutive tokens nobody could parse, reported as one unit. */
export interface TokenRun<T> {
	readonly tokens: readonly T[]
	readonly span: Span
}

/**
 * Parser input: a cursor over an exact token buffer plus the positions of
 * tokens skipped during recovery.
 *
 * Streams are immutable. Advancing or recording skips returns a new stream,
 * so backtracking is just holding on to an older value.
 */
export class Stream<T extends Spanned> {
	private constructor(
		private readonly tokens: readonly T[],
		readonly position: number,
		private readonly skipped: readonly number[]
	) {}

	static of<T extends Spanned>(tokens: readonly T[]): Stream<T> {
		return new Stream(tokens, 0, [])
	}

	peek(): T | undefined {
		return this.tokens[this.position]
	}

	/** Consume one token, or null at end of input. */
	next(): { readonly token: T; readonly input: Stream<T> } | null {
		const token = this.tokens[this.position]
		if (token === undefined) return null
		return { input: new Stream(this.tokens, this.position + 1, this.skipped), token }
	}

	isAtEnd(): boolean {
		return this.position >= this.tokens.length
	}

	remaining(): number {
		return Math.max(0, this.tokens.length - this.position)
	}

	/** Record skipped token positions in the unexpected buffer. */
	extend(positions: readonly number[]): Stream<T> {
		if (positions.length === 0) return this
		return new Stream(this.tokens, this.position, [...this.skipped, ...positions])
	}

	/** Positions currently held in the unexpected buffer. */
	skippedPositions(): readonly number[] {
		return this.skipped
	}

	/** Placeholder located between the last consumed token and the next one. */
	missing<M>(missing: M): MissingToken<M> {
		const last = this.tokens[this.position - 1]
		const next = this.tokens[this.position]

		if (last !== undefined && next !== undefined) {
			return { missing, span: spanBetween(last.span, next.span) }
		}
		if (last !== undefined) return { missing, span: collapseToEnd(last.span) }
		if (next !== undefined) return { missing, span: collapseToStart(next.span) }
		return { missing, span: DEFAULT_SPAN }
	}

	/**
	 * Everything the parse did not account for: tokens never reached plus the
	 * skip buffer, grouped into runs of adjacent token positions.
	 */
	unexpected(): TokenRun<T>[] {
		const positions = new Set(this.skipped)
		for (let i = this.position; i < this.tokens.length; i++) positions.add(i)

		const runs: TokenRun<T>[] = []
		let current: T[] = []
		let previous = -2
		for (const position of [...positions].sort((a, b) => a - b)) {
			const token = this.tokens[position]
			if (token === undefined) continue
			if (position !== previous + 1 && current.length > 0) {
				runs.push(toRun(current))
				current = []
			}
			current.push(token)
			previous = position
		}
		if (current.length > 0) runs.push(toRun(current))
		return runs
	}
}

function toRun<T extends Spanned>(tokens: T[]): TokenRun<T> {
	let covered: Span | null = null
	for (const token of tokens) {
		covered = covered === null ? token.span : joinSpans(covered, token.span)
	}
	return { span: covered ?? DEFAULT_SPAN, tokens }
}
