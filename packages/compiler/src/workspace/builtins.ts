import { readFileSync } from 'node:fs'

/** Document key under which the built-in definitions are added. */
export const BUILTINS_KEY = '<builtins>'

let source: string | undefined

/** Text of the built-in scalars and directives, read once. */
export function builtinsSource(): string {
	source ??= readFileSync(new URL('./builtins.graphql', import.meta.url), 'utf8')
	return source
}
