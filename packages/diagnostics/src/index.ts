/**
 * @facet/diagnostics
 *
 * Shared diagnostic types and definitions for facet packages.
 */

import { type CliDiagnosticCode, CLI_DIAGNOSTICS, isCliDiagnosticCode } from './cli.ts'
import {
	isSyntaxDiagnosticCode,
	type SyntaxDiagnosticCode,
	syntaxDiagnostic,
	syntaxDiagnosticCodes,
} from './syntax.ts'
import type { DiagnosticDef } from './types.ts'

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	FCCLI001,
	FCCLI002,
	FCCLI003,
	FCCLI004,
	isCliDiagnosticCode,
} from './cli.ts'
export { interpolateMessage } from './interpolate.ts'
export {
	isSyntaxDiagnosticCode,
	type SyntaxDiagnosticCode,
	syntaxDiagnostic,
	syntaxDiagnosticCodes,
} from './syntax.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
} from './types.ts'

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = SyntaxDiagnosticCode | CliDiagnosticCode

/**
 * Every catalog entry, syntax codes first.
 */
export const DIAGNOSTICS: ReadonlyMap<DiagnosticCode, DiagnosticDef> = new Map<
	DiagnosticCode,
	DiagnosticDef
>([
	...syntaxDiagnosticCodes().map((code): [DiagnosticCode, DiagnosticDef] => [
		code,
		syntaxDiagnostic(code),
	]),
	...Object.keys(CLI_DIAGNOSTICS)
		.filter(isCliDiagnosticCode)
		.map((code): [DiagnosticCode, DiagnosticDef] => [code, CLI_DIAGNOSTICS[code]]),
])

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): DiagnosticDef {
	return isCliDiagnosticCode(code) ? CLI_DIAGNOSTICS[code] : syntaxDiagnostic(code)
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return isSyntaxDiagnosticCode(code) || isCliDiagnosticCode(code)
}
