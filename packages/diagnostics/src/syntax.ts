/**
 * Syntax diagnostic definitions.
 *
 * Error code format: FCPARSE<NUMBER>
 * - FCPARSE001: tokens skipped during recovery
 * - FCPARSE002-099: a grammar slot that is missing after its construct began
 *
 * The catalog text lives in syntax.json; every entry is an error.
 */

import syntaxCatalog from './syntax.json' with { type: 'json' }
import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

export type SyntaxDiagnosticCode = keyof typeof syntaxCatalog

interface SyntaxEntry {
	readonly message: string
	readonly description: string
	readonly label: string
	readonly relatedLabel?: string
	readonly suggestion?: string
}

const definitions = new Map<SyntaxDiagnosticCode, DiagnosticDef>()

export function isSyntaxDiagnosticCode(code: string): code is SyntaxDiagnosticCode {
	return Object.hasOwn(syntaxCatalog, code)
}

/**
 * Get the definition of a syntax diagnostic.
 * Definitions are built on first use and shared afterwards.
 */
export function syntaxDiagnostic(code: SyntaxDiagnosticCode): DiagnosticDef {
	const cached = definitions.get(code)
	if (cached) return cached

	const entry: SyntaxEntry = syntaxCatalog[code]
	const def: DiagnosticDef = {
		code,
		description: entry.description,
		label: entry.label,
		message: entry.message,
		severity: DiagnosticSeverity.Error,
		...(entry.relatedLabel !== undefined ? { relatedLabel: entry.relatedLabel } : {}),
		...(entry.suggestion !== undefined ? { suggestion: entry.suggestion } : {}),
	}
	definitions.set(code, def)
	return def
}

export function syntaxDiagnosticCodes(): SyntaxDiagnosticCode[] {
	return Object.keys(syntaxCatalog).filter(isSyntaxDiagnosticCode)
}
