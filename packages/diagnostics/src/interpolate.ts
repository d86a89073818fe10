import type { DiagnosticArgs } from './types.ts'

const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g

/**
 * Fill `{key}` placeholders from `args`.
 * Placeholders without a matching argument are kept as written.
 */
export function interpolateMessage(template: string, args?: DiagnosticArgs): string {
	if (args === undefined) return template
	return template.replace(PLACEHOLDER, (placeholder, key: string) =>
		Object.hasOwn(args, key) ? String(args[key]) : placeholder
	)
}
