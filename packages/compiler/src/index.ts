/**
 * facet compiler public API
 *
 * Fault-tolerant GraphQL front end:
 * - Lexer with interned source ids and UTF-16 offset spans
 * - Recoverable parser combinators that never abort a document
 * - Immutable syntax tree with a static fold-visitor
 * - Semantic database keyed by node identity, rebuilt per snapshot
 * - Dependency graph deciding which documents an edit invalidates
 */

export { collectErrors, type ParsedTree } from './ast/errors.ts'
export type * as Ast from './ast/nodes.ts'
export { spanOf } from './ast/span.ts'
export * from './ast/visit.ts'
export * from './core/index.ts'
export { Database, type TypeKind } from './db/database.ts'
export { Inference, InferenceView } from './db/inference.ts'
export { InferenceBuilder, inferDocument } from './db/inference-builder.ts'
export { indexDocuments, type Tables } from './db/indexer.ts'
export { Inferred, InferredMany, type Lookup, type LookupMany } from './db/inferred.ts'
export { Bindings, LayeredBindings, MultiMap } from './db/multimap.ts'
export { definitionName, listItemType, namedTypeOf, nameOf } from './db/types.ts'
export { DepGraph } from './deps/depgraph.ts'
export { consumesOf, Dependency, dependencyKey, productOf } from './deps/dependency.ts'
export { print, printDefinition, printDocument } from './format/printer.ts'
export * from './grammar/index.ts'
export * from './lex/index.ts'
export * from './parse/index.ts'
export { BUILTINS_KEY, builtinsSource } from './workspace/builtins.ts'
export {
	type DefinitionId,
	type DocumentOptions,
	definitionId,
	Workspace,
	type WorkspaceDocument,
} from './workspace/workspace.ts'
