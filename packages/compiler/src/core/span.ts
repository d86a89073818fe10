import { type SourceId, UNKNOWN_SOURCE } from './source.ts'

/**
 * Range of UTF-16 code unit offsets inside one document, end exclusive.
 */
export interface Span {
	readonly sourceId: SourceId
	readonly start: number
	readonly end: number
}

export const DEFAULT_SPAN: Span = { end: 0, sourceId: UNKNOWN_SOURCE, start: 0 }

export function span(sourceId: SourceId, start: number, end: number): Span {
	return { end, sourceId, start }
}

/** Smallest span covering both. Keeps the source of the left span. */
export function joinSpans(left: Span, right: Span): Span {
	return {
		end: Math.max(left.end, right.end),
		sourceId: left.sourceId,
		start: Math.min(left.start, right.start),
	}
}

/** The gap from the end of `left` to the start of `right`. */
export function spanBetween(left: Span, right: Span): Span {
	return { end: right.start, sourceId: left.sourceId, start: left.end }
}

export function collapseToStart(s: Span): Span {
	return { end: s.start, sourceId: s.sourceId, start: s.start }
}

export function collapseToEnd(s: Span): Span {
	return { end: s.end, sourceId: s.sourceId, start: s.end }
}

export function spanBefore(s: Span, index: number): boolean {
	return s.end < index
}

export function spanContains(s: Span, index: number): boolean {
	return s.start <= index && index <= s.end
}

export function spansEqual(a: Span, b: Span): boolean {
	return a.sourceId === b.sourceId && a.start === b.start && a.end === b.end
}
