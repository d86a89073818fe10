/**
 * GraphQL document grammar built on the recoverable combinators.
 */

export { definition, document, type ParseOutput, parse, parseWith } from './document.ts'
export {
	args,
	defaultValue,
	directives,
	executableDefinition,
	fragmentDefinition,
	MAX_NESTING,
	namedType,
	operationDefinition,
	selectionSet,
	type,
	typeCondition,
	value,
	variable,
} from './executable.ts'
export {
	EXECUTABLE_DIRECTIVE_LOCATIONS,
	TYPE_SYSTEM_DIRECTIVE_LOCATIONS,
	typeSystemDefinitionOrExtension,
} from './type-system.ts'
export { type GraphQLParser } from './terminals.ts'
