/**
 * Lexical analysis module.
 * Turns document text into a flat sequence of tokens.
 */

export { lex, lexExact } from './lexer.ts'
export { blockStringValue, isBlockString, stringValue } from './strings.ts'
