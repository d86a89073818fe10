/**
 * CLI diagnostic definitions.
 *
 * Error code format: FCCLI<NUMBER>
 * - FCCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (FCCLI001-099)
// =============================================================================

export const FCCLI001: DiagnosticDef = {
	code: 'FCCLI001',
	description: "There's no file at this path.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const FCCLI002: DiagnosticDef = {
	code: 'FCCLI002',
	description: "The file exists but it can't be opened.",
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const FCCLI003: DiagnosticDef = {
	code: 'FCCLI003',
	description: "The formatted document couldn't be saved.",
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for this file.',
}

export const FCCLI004: DiagnosticDef = {
	code: 'FCCLI004',
	description: 'Only documents without syntax errors have a canonical layout.',
	message: 'refusing to format {path}: {count} syntax error(s)',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run `facet check {path}` and fix the reported errors first.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	FCCLI001,
	FCCLI002,
	FCCLI003,
	FCCLI004,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS

export function isCliDiagnosticCode(code: string): code is CliDiagnosticCode {
	return Object.hasOwn(CLI_DIAGNOSTICS, code)
}
