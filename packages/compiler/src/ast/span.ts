import { joinSpans, type Span } from '../core/span.ts'
import type { AstNode } from './nodes.ts'
import { traverse, type Visitor } from './visit.ts'

interface Covering {
	span: Span | null
}

/** Folds every leaf token's span into the smallest covering span. */
const SpanCollector: Visitor<Covering> = {
	visitSpan(span, acc) {
		acc.span = acc.span === null ? span : joinSpans(acc.span, span)
	},
}

/**
 * Smallest span covering every token of `node`, or null when the node holds
 * no tokens (an empty document). Missing placeholders do not contribute.
 */
export function spanOf(node: AstNode): Span | null {
	const acc: Covering = { span: null }
	traverse(node, SpanCollector, acc)
	return acc.span
}
