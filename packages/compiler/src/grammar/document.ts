import type * as Ast from '../ast/nodes.ts'
import type { SourceId } from '../core/source.ts'
import type { Token, TokenStore } from '../core/tokens.ts'
import { lexExact } from '../lex/lexer.ts'
import { alt, many0, parseAll } from '../parse/combinators.ts'
import type { RecoverableParser } from '../parse/protocol.ts'
import { Stream, type TokenRun } from '../parse/stream.ts'
import { executableDefinition } from './executable.ts'
import type { GraphQLParser } from './terminals.ts'
import { typeSystemDefinitionOrExtension } from './type-system.ts'

/** Executable definitions are tried first. */
export const definition: GraphQLParser<Ast.Definition> = alt<Token, Ast.Definition>(
	executableDefinition,
	typeSystemDefinitionOrExtension
)

export const document: GraphQLParser<Ast.Document> = many0(definition).map(
	(definitions): Ast.Document => ({ definitions, kind: 'Document' })
)

export interface ParseOutput<O> {
	readonly document: O
	readonly tokens: TokenStore
	/** Runs of tokens the grammar skipped or never reached */
	readonly unrecognized: readonly TokenRun<Token>[]
}

/**
 * Run any production against `text`, with end of input as the outermost
 * recovery point. Returns null when the production cannot even begin.
 */
export function parseWith<O>(
	parser: RecoverableParser<Token, O>,
	sourceId: SourceId,
	text: string
): ParseOutput<O> | null {
	const tokens = lexExact(sourceId, text)
	const parsed = parseAll(parser, tokens.view())
	if (parsed === null) return null
	return { document: parsed.value, tokens, unrecognized: parsed.unexpected }
}

/**
 * Parse a whole document. Never fails: whatever the grammar cannot place is
 * reported in `unrecognized`.
 */
export function parse(sourceId: SourceId, text: string): ParseOutput<Ast.Document> {
	const tokens = lexExact(sourceId, text)
	const parsed = parseAll(document, tokens.view())
	if (parsed === null) {
		return {
			document: { definitions: [], kind: 'Document' },
			tokens,
			unrecognized: Stream.of(tokens.view()).unexpected(),
		}
	}
	return { document: parsed.value, tokens, unrecognized: parsed.unexpected }
}
