/**
 * Recoverable parsing: protocol, token stream and combinators.
 */

export {
	alt,
	delimited,
	lazy,
	many0,
	many1,
	NestingBudget,
	opt,
	type Parsed,
	parseAll,
	postfix,
	sequence,
	terminal,
	token,
} from './combinators.ts'
export { Parser, Sequence, type SkipOutcome, skipUntil } from './parser.ts'
export {
	endOfInput,
	failure,
	isPresent,
	never,
	or,
	type ParseError,
	type ParseFailure,
	type ParseResult,
	type ParseSuccess,
	present,
	presentValue,
	type Recognizer,
	type Recoverable,
	type RecoverableParser,
	success,
} from './protocol.ts'
export { type MissingToken, type Spanned, Stream, type TokenRun } from './stream.ts'
