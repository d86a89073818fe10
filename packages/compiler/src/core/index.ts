/**
 * Core data structures shared by every phase.
 */

export {
	createDiagnostic,
	type Diagnostic,
	type DiagnosticArgs,
	type DiagnosticCode,
	type DiagnosticDef,
	DiagnosticSeverity,
	formatDiagnostic,
	formatDiagnostics,
	getDiagnostic,
	interpolateMessage,
	isError,
	type Label,
	LineIndex,
	type Position,
	type SyntaxDiagnosticCode,
	syntaxDiagnostic,
} from './diagnostics.ts'
export { type SourceId, SourceMap, sourceId, UNKNOWN_SOURCE } from './source.ts'
export {
	collapseToEnd,
	collapseToStart,
	DEFAULT_SPAN,
	joinSpans,
	type Span,
	span,
	spanBefore,
	spanBetween,
	spanContains,
	spansEqual,
} from './span.ts'
export {
	type ErrorToken,
	type FloatValueToken,
	type IntValueToken,
	isFloatValue,
	isIntValue,
	isName,
	isPunctuator,
	isStringValue,
	type NameToken,
	type PunctuatorToken,
	type StringValueToken,
	type Token,
	type TokenId,
	TokenKind,
	TokenStore,
	tokenId,
} from './tokens.ts'
