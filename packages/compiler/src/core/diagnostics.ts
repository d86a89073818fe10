/**
 * Diagnostics attached to source spans, and their terminal rendering.
 */

import {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	interpolateMessage,
} from '@facet/diagnostics'
import type { Span } from './span.ts'

export {
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	getDiagnostic,
	interpolateMessage,
	type SyntaxDiagnosticCode,
	syntaxDiagnostic,
} from '@facet/diagnostics'

/** A secondary location with its own message. */
export interface Label {
	readonly span: Span
	readonly message: string
}

export interface Diagnostic {
	/** The diagnostic definition from the catalog */
	readonly def: DiagnosticDef
	/** Interpolated message with arguments applied */
	readonly message: string
	/** Primary location, annotated with the catalog label */
	readonly span: Span
	readonly labels: readonly Label[]
	/** Template arguments used for message interpolation */
	readonly args?: DiagnosticArgs
}

export function createDiagnostic(
	def: DiagnosticDef,
	span: Span,
	labels: readonly Label[] = [],
	args?: DiagnosticArgs
): Diagnostic {
	return {
		def,
		labels,
		message: interpolateMessage(def.message, args),
		span,
		...(args !== undefined ? { args } : {}),
	}
}

export function isError(diagnostic: Diagnostic): boolean {
	return diagnostic.def.severity === DiagnosticSeverity.Error
}

export interface Position {
	/** 1-indexed */
	readonly line: number
	/** 1-indexed, in UTF-16 code units */
	readonly column: number
}

/**
 * Offset-to-position lookup over one document's text.
 */
export class LineIndex {
	private readonly starts: number[] = [0]

	constructor(private readonly text: string) {
		for (let i = 0; i < text.length; i++) {
			const char = text[i]
			if (char === '\n' || (char === '\r' && text[i + 1] !== '\n')) this.starts.push(i + 1)
		}
	}

	position(offset: number): Position {
		let low = 0
		let high = this.starts.length - 1
		while (low < high) {
			const mid = (low + high + 1) >> 1
			if ((this.starts[mid] ?? 0) <= offset) low = mid
			else high = mid - 1
		}
		return { column: offset - (this.starts[low] ?? 0) + 1, line: low + 1 }
	}

	/** Text of a 1-indexed line without its terminator. */
	line(line: number): string | undefined {
		const start = this.starts[line - 1]
		if (start === undefined) return undefined
		const end = this.starts[line] ?? this.text.length
		return this.text.slice(start, end).replace(/\r?\n$|\r$/, '')
	}
}

function severityLabel(severity: DiagnosticSeverity): string {
	const labels: Record<DiagnosticSeverity, string> = {
		[DiagnosticSeverity.Error]: 'error',
		[DiagnosticSeverity.Warning]: 'warning',
		[DiagnosticSeverity.Note]: 'note',
	}
	return labels[severity]
}

function annotate(
	index: LineIndex,
	span: Span,
	marker: string,
	message: string | undefined,
	gutter: number
): string[] {
	const { line, column } = index.position(span.start)
	const sourceLine = index.line(line)
	if (sourceLine === undefined) return []

	const emptyPrefix = ` ${' '.repeat(gutter)} | `
	const linePrefix = ` ${String(line).padStart(gutter)} | `
	const available = Math.max(1, sourceLine.length - column + 1)
	const width = Math.max(1, Math.min(span.end - span.start, available))
	const underline = `${' '.repeat(column - 1)}${marker.repeat(width)}`
	const text = message === undefined ? underline : `${underline} ${message}`
	return [`${linePrefix}${sourceLine}`, `${emptyPrefix}${text}`.trimEnd()]
}

/**
 * Format a diagnostic for display.
 *
 * Example:
 * ```
 * error[FCPARSE004]: selection set is missing a closing brace
 *   --> query.graphql:2:5
 *    |
 *  2 |   id
 *    |     ^ ... should have a matching `}` here
 *  1 | {
 *    | - this `{` here ...
 * ```
 */
export function formatDiagnostic(diagnostic: Diagnostic, source: string, filename: string): string {
	const { def } = diagnostic
	const index = new LineIndex(source)
	const { line, column } = index.position(diagnostic.span.start)
	const header = `${severityLabel(def.severity)}[${def.code}]: ${diagnostic.message}`
	const location = `  --> ${filename}:${line}:${column}`

	const lastLine = Math.max(
		line,
		...diagnostic.labels.map((label) => index.position(label.span.start).line)
	)
	const gutter = String(lastLine).length
	const emptyPrefix = ` ${' '.repeat(gutter)} |`

	const context = [
		...annotate(index, diagnostic.span, '^', def.label, gutter),
		...diagnostic.labels.flatMap((label) =>
			annotate(index, label.span, '-', label.message, gutter)
		),
	]
	if (context.length === 0) return `${header}\n${location}`

	const lines = [header, location, emptyPrefix, ...context]
	if (def.suggestion !== undefined) {
		const suggestion = interpolateMessage(def.suggestion, diagnostic.args)
		lines.push(emptyPrefix, `${' '.repeat(gutter + 1)} = help: ${suggestion}`)
	}
	return lines.join('\n')
}

export function formatDiagnostics(
	diagnostics: readonly Diagnostic[],
	source: string,
	filename: string
): string {
	return diagnostics.map((d) => formatDiagnostic(d, source, filename)).join('\n\n')
}
