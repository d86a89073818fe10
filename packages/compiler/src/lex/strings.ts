import type { StringValueToken } from '../core/tokens.ts'

const ESCAPES: Record<string, string> = {
	'"': '"',
	'/': '/',
	'\\': '\\',
	b: '\b',
	f: '\f',
	n: '\n',
	r: '\r',
	t: '\t',
}

function unescapeString(raw: string): string {
	let result = ''
	for (let i = 0; i < raw.length; i++) {
		const char = raw.charAt(i)
		if (char !== '\\') {
			result += char
			continue
		}
		const next = raw.charAt(i + 1)
		const simple = ESCAPES[next]
		if (simple !== undefined) {
			result += simple
			i++
			continue
		}
		const hex = raw.slice(i + 2, i + 6)
		if (next === 'u' && /^[0-9A-Fa-f]{4}$/.test(hex)) {
			result += String.fromCharCode(Number.parseInt(hex, 16))
			i += 5
			continue
		}
		result += char
	}
	return result
}

function leadingWhitespace(line: string): number {
	let i = 0
	while (i < line.length && (line[i] === ' ' || line[i] === '\t')) i++
	return i
}

function isBlank(line: string): boolean {
	return leadingWhitespace(line) === line.length
}

function commonIndent(lines: readonly string[]): number | null {
	let indent: number | null = null
	for (const line of lines.slice(1)) {
		const width = leadingWhitespace(line)
		if (width === line.length) continue
		if (indent === null || width < indent) indent = width
	}
	return indent
}

/**
 * Block string value: common indentation removed from every line but the
 * first, leading and trailing blank lines dropped.
 */
export function blockStringValue(raw: string): string {
	const lines = raw.replaceAll('\\"""', '"""').split(/\r\n|\n|\r/)
	const indent = commonIndent(lines)
	const dedented =
		indent === null ? lines : lines.map((line, i) => (i === 0 ? line : line.slice(indent)))

	let first = 0
	let last = dedented.length
	while (first < last && isBlank(dedented[first] ?? '')) first++
	while (last > first && isBlank(dedented[last - 1] ?? '')) last--
	return dedented.slice(first, last).join('\n')
}

export function isBlockString(token: StringValueToken): boolean {
	return token.text.startsWith('"""')
}

/** The string a StringValue token denotes, with quotes and escapes resolved. */
export function stringValue(token: StringValueToken): string {
	if (isBlockString(token)) {
		return blockStringValue(token.text.slice(3, -3))
	}
	return unescapeString(token.text.slice(1, -1))
}
