import type { Token } from '../core/tokens.ts'
import {
	createDiagnostic,
	type Diagnostic,
	type Label,
	syntaxDiagnostic,
} from '../core/diagnostics.ts'
import type { TokenRun } from '../parse/stream.ts'
import type { AstNode } from './nodes.ts'
import { traverse, type Visitor } from './visit.ts'

/** One diagnostic per Missing placeholder, in source order. */
const CollectErrors: Visitor<Diagnostic[]> = {
	visitMissing({ span, missing }, acc) {
		const def = syntaxDiagnostic(missing.code)
		const labels: Label[] =
			missing.related !== undefined && def.relatedLabel !== undefined
				? [{ message: def.relatedLabel, span: missing.related }]
				: []
		acc.push(createDiagnostic(def, span, labels))
	},
}

export interface ParsedTree {
	readonly document: AstNode
	readonly unrecognized: readonly TokenRun<Token>[]
}

/**
 * Every syntax error of a parse: missing slots plus one diagnostic per run
 * of unrecognized tokens, ordered by position.
 */
export function collectErrors(parsed: ParsedTree): Diagnostic[] {
	const diagnostics: Diagnostic[] = []
	traverse(parsed.document, CollectErrors, diagnostics)
	const unrecognized = syntaxDiagnostic('FCPARSE001')
	for (const run of parsed.unrecognized) {
		diagnostics.push(createDiagnostic(unrecognized, run.span))
	}
	return diagnostics.sort((a, b) => a.span.start - b.span.start)
}
