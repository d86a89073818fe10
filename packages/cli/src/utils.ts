import {
	collectErrors,
	type Diagnostic,
	formatDiagnostic,
	parse,
	printDocument,
	sourceId,
	Workspace,
} from '@facet/compiler'
import { FCCLI001, FCCLI002, FCCLI003, FCCLI004, interpolateMessage } from '@facet/diagnostics'

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		const message = interpolateMessage(FCCLI001.message, { path: filePath })
		return `[${FCCLI001.code}] ${message}`
	}
	const message = interpolateMessage(FCCLI002.message, { reason: getErrorMessage(error) })
	return `[${FCCLI002.code}] ${message}`
}

export function formatWriteError(error: unknown): string {
	const message = interpolateMessage(FCCLI003.message, { reason: getErrorMessage(error) })
	return `[${FCCLI003.code}] ${message}`
}

export function formatUnformattableError(filePath: string, count: number): string {
	const message = interpolateMessage(FCCLI004.message, { count, path: filePath })
	return `[${FCCLI004.code}] ${message}`
}

function plural(count: number, word: string): string {
	return `${count} ${word}${count === 1 ? '' : 's'}`
}

export function summarize(errorCount: number, fileCount: number): string {
	const files = plural(fileCount, 'file')
	return errorCount === 0
		? `No syntax errors in ${files}`
		: `Found ${plural(errorCount, 'syntax error')} in ${files}`
}

export interface SourceFile {
	readonly path: string
	readonly text: string
}

export interface CheckReport {
	/** Rendered diagnostics, in file order */
	readonly reports: readonly string[]
	readonly errorCount: number
}

/** Loads every file into one workspace and renders its syntax errors. */
export function checkFiles(files: readonly SourceFile[]): CheckReport {
	const workspace = Workspace.withBuiltins()
	for (const file of files) workspace.addDocument(file.path, file.text)
	workspace.rebuild()

	const reports: string[] = []
	for (const file of files) {
		for (const diagnostic of workspace.diagnostics(file.path)) {
			reports.push(formatDiagnostic(diagnostic, file.text, file.path))
		}
	}
	return { errorCount: reports.length, reports }
}

export type FormatResult =
	| { readonly ok: true; readonly output: string }
	| { readonly ok: false; readonly diagnostics: readonly Diagnostic[] }

/** Canonical layout of a document, or its syntax errors. */
export function formatSource(text: string): FormatResult {
	const parsed = parse(sourceId(1), text)
	const diagnostics = collectErrors(parsed)
	if (diagnostics.length > 0) return { diagnostics, ok: false }
	return { ok: true, output: printDocument(parsed.document) }
}

export interface CommandSummary {
	readonly commandName: string
	readonly description: string
}

/** Lines printed when facet runs without a command. */
export function formatBanner(version: string, commands: readonly CommandSummary[]): string[] {
	const width = Math.max(0, ...commands.map((command) => command.commandName.length))
	return [
		`facet v${version}: checks and formats GraphQL documents`,
		'',
		'Usage: facet <command> [options]',
		'',
		'Commands:',
		...commands.map((command) => `  ${command.commandName.padEnd(width)}  ${command.description}`),
		'',
		'Run "facet <command> --help" for its arguments and flags.',
	]
}
