/**
 * Type system definitions and extensions.
 */

import type * as Ast from '../ast/nodes.ts'
import type { NameToken, Token } from '../core/tokens.ts'
import { alt, delimited, many0, many1, opt, sequence } from '../parse/combinators.ts'
import type { Sequence } from '../parse/parser.ts'
import {
	defaultValue,
	directives,
	enumValue,
	namedType,
	operationType,
	type,
} from './executable.ts'
import {
	expected,
	extension,
	type GraphQLParser,
	keyword,
	name,
	nameExcept,
	oneOf,
	punctuator,
	stringValue,
	unclosed,
} from './terminals.ts'

export const EXECUTABLE_DIRECTIVE_LOCATIONS: readonly string[] = [
	'QUERY',
	'MUTATION',
	'SUBSCRIPTION',
	'FIELD',
	'FRAGMENT_DEFINITION',
	'FRAGMENT_SPREAD',
	'INLINE_FRAGMENT',
	'VARIABLE_DEFINITION',
]

export const TYPE_SYSTEM_DIRECTIVE_LOCATIONS: readonly string[] = [
	'SCHEMA',
	'SCALAR',
	'OBJECT',
	'FIELD_DEFINITION',
	'ARGUMENT_DEFINITION',
	'INTERFACE',
	'UNION',
	'ENUM',
	'ENUM_VALUE',
	'INPUT_OBJECT',
	'INPUT_FIELD_DEFINITION',
]

const DIRECTIVE_LOCATIONS: ReadonlySet<string> = new Set([
	...EXECUTABLE_DIRECTIVE_LOCATIONS,
	...TYPE_SYSTEM_DIRECTIVE_LOCATIONS,
])

const description: GraphQLParser<Ast.Description> = stringValue().map(
	(token): Ast.Description => ({ kind: 'Description', token })
)

/** Optional description followed by the keyword that starts the definition. */
function introducedBy(word: string): Sequence<Token, [Ast.Description | null, NameToken]> {
	return sequence(opt(description)).andRecognize(keyword(word))
}

// =============================================================================
// SCHEMA
// =============================================================================

const rootOperationTypeDefinition: GraphQLParser<Ast.RootOperationTypeDefinition> = sequence(
	operationType
)
	.andRecover(punctuator(':'), expected('FCPARSE027'))
	.andRecover(namedType, expected('FCPARSE028'))
	.map(
		([operationType, colon, namedType]): Ast.RootOperationTypeDefinition => ({
			colon,
			kind: 'RootOperationTypeDefinition',
			namedType,
			operationType,
		})
	)

const rootOperationTypeDefinitions: GraphQLParser<Ast.RootOperationTypeDefinitions> = sequence(
	punctuator('{')
)
	.andRecover(many1(rootOperationTypeDefinition), expected('FCPARSE059'))
	.andRecover(punctuator('}'), ([open]) => unclosed('FCPARSE026')(open))
	.map(
		([open, definitions, close]): Ast.RootOperationTypeDefinitions => ({
			braces: [open, close],
			definitions,
			kind: 'RootOperationTypeDefinitions',
		})
	)

const schemaDefinition: GraphQLParser<Ast.SchemaDefinition> = introducedBy('schema')
	.and(opt(directives))
	.andRecover(rootOperationTypeDefinitions, expected('FCPARSE025'))
	.map(
		([description, keyword, directives, rootOperationTypes]): Ast.SchemaDefinition => ({
			description,
			directives,
			keyword,
			kind: 'SchemaDefinition',
			rootOperationTypes,
		})
	)

const schemaExtension: GraphQLParser<Ast.SchemaExtension> = sequence(extension('schema'))
	.and(opt(directives))
	.and(opt(rootOperationTypeDefinitions))
	.map(
		([[extend, keyword], directives, rootOperationTypes]): Ast.SchemaExtension => ({
			directives,
			extend,
			keyword,
			kind: 'SchemaExtension',
			rootOperationTypes,
		})
	)

// =============================================================================
// FIELDS AND INPUT VALUES
// =============================================================================

const inputValueDefinition: GraphQLParser<Ast.InputValueDefinition> = sequence(opt(description))
	.andRecognize(name())
	.andRecover(punctuator(':'), expected('FCPARSE039'))
	.andRecover(type, expected('FCPARSE040'))
	.and(opt(defaultValue))
	.and(opt(directives))
	.map(
		([description, name, colon, type, defaultValue, directives]): Ast.InputValueDefinition => ({
			colon,
			defaultValue,
			description,
			directives,
			kind: 'InputValueDefinition',
			name,
			type,
		})
	)

const argumentsDefinition: GraphQLParser<Ast.ArgumentsDefinition> = delimited(
	punctuator('('),
	many0(inputValueDefinition),
	punctuator(')'),
	unclosed('FCPARSE038')
).map(
	([open, definitions, close]): Ast.ArgumentsDefinition => ({
		definitions,
		kind: 'ArgumentsDefinition',
		parens: [open, close],
	})
)

const fieldDefinition: GraphQLParser<Ast.FieldDefinition> = sequence(opt(description))
	.andRecognize(name())
	.and(opt(argumentsDefinition))
	.andRecover(punctuator(':'), expected('FCPARSE036'))
	.andRecover(type, expected('FCPARSE037'))
	.and(opt(directives))
	.map(
		([description, name, args, colon, type, directives]): Ast.FieldDefinition => ({
			arguments: args,
			colon,
			description,
			directives,
			kind: 'FieldDefinition',
			name,
			type,
		})
	)

const fieldsDefinition: GraphQLParser<Ast.FieldsDefinition> = delimited(
	punctuator('{'),
	many0(fieldDefinition),
	punctuator('}'),
	unclosed('FCPARSE035')
).map(
	([open, definitions, close]): Ast.FieldsDefinition => ({
		braces: [open, close],
		definitions,
		kind: 'FieldsDefinition',
	})
)

const implementsInterfaces: GraphQLParser<Ast.ImplementsInterfaces> = sequence(
	keyword('implements')
)
	.and(opt(punctuator('&')))
	.andRecover(namedType, expected('FCPARSE033'))
	.and(many0(sequence(punctuator('&')).andRecover(namedType, expected('FCPARSE034'))))
	.map(
		([keyword, ampersand, first, rest]): Ast.ImplementsInterfaces => ({
			ampersand,
			first,
			keyword,
			kind: 'ImplementsInterfaces',
			rest,
		})
	)

// =============================================================================
// SCALARS, OBJECTS, INTERFACES
// =============================================================================

const scalarTypeDefinition: GraphQLParser<Ast.ScalarTypeDefinition> = introducedBy('scalar')
	.andRecover(name(), expected('FCPARSE029'))
	.and(opt(directives))
	.map(
		([description, keyword, name, directives]): Ast.ScalarTypeDefinition => ({
			description,
			directives,
			keyword,
			kind: 'ScalarTypeDefinition',
			name,
		})
	)

const scalarTypeExtension: GraphQLParser<Ast.ScalarTypeExtension> = sequence(extension('scalar'))
	.andRecover(name(), expected('FCPARSE030'))
	.andRecover(directives, expected('FCPARSE031'))
	.map(
		([[extend, keyword], name, directives]): Ast.ScalarTypeExtension => ({
			directives,
			extend,
			keyword,
			kind: 'ScalarTypeExtension',
			name,
		})
	)

const objectTypeDefinition: GraphQLParser<Ast.ObjectTypeDefinition> = introducedBy('type')
	.andRecover(name(), expected('FCPARSE032'))
	.and(opt(implementsInterfaces))
	.and(opt(directives))
	.and(opt(fieldsDefinition))
	.map(
		([description, keyword, name, interfaces, directives, fields]): Ast.ObjectTypeDefinition => ({
			description,
			directives,
			fields,
			interfaces,
			keyword,
			kind: 'ObjectTypeDefinition',
			name,
		})
	)

const objectTypeExtension: GraphQLParser<Ast.ObjectTypeExtension> = sequence(extension('type'))
	.andRecover(name(), expected('FCPARSE041'))
	.and(opt(implementsInterfaces))
	.and(opt(directives))
	.and(opt(fieldsDefinition))
	.map(
		([[extend, keyword], name, interfaces, directives, fields]): Ast.ObjectTypeExtension => ({
			directives,
			extend,
			fields,
			interfaces,
			keyword,
			kind: 'ObjectTypeExtension',
			name,
		})
	)

const interfaceTypeDefinition: GraphQLParser<Ast.InterfaceTypeDefinition> = introducedBy(
	'interface'
)
	.andRecover(name(), expected('FCPARSE042'))
	.and(opt(implementsInterfaces))
	.and(opt(directives))
	.and(opt(fieldsDefinition))
	.map(
		([description, keyword, name, interfaces, directives, fields]): Ast.InterfaceTypeDefinition => ({
			description,
			directives,
			fields,
			interfaces,
			keyword,
			kind: 'InterfaceTypeDefinition',
			name,
		})
	)

const interfaceTypeExtension: GraphQLParser<Ast.InterfaceTypeExtension> = sequence(
	extension('interface')
)
	.andRecover(name(), expected('FCPARSE043'))
	.and(opt(implementsInterfaces))
	.and(opt(directives))
	.and(opt(fieldsDefinition))
	.map(
		([[extend, keyword], name, interfaces, directives, fields]): Ast.InterfaceTypeExtension => ({
			directives,
			extend,
			fields,
			interfaces,
			keyword,
			kind: 'InterfaceTypeExtension',
			name,
		})
	)

// =============================================================================
// UNIONS, ENUMS, INPUT OBJECTS
// =============================================================================

const unionMemberTypes: GraphQLParser<Ast.UnionMemberTypes> = sequence(punctuator('='))
	.and(opt(punctuator('|')))
	.andRecover(namedType, expected('FCPARSE045'))
	.and(many0(sequence(punctuator('|')).andRecover(namedType, expected('FCPARSE046'))))
	.map(
		([eq, pipe, first, rest]): Ast.UnionMemberTypes => ({
			eq,
			first,
			kind: 'UnionMemberTypes',
			pipe,
			rest,
		})
	)

const unionTypeDefinition: GraphQLParser<Ast.UnionTypeDefinition> = introducedBy('union')
	.andRecover(name(), expected('FCPARSE044'))
	.and(opt(directives))
	.and(opt(unionMemberTypes))
	.map(
		([description, keyword, name, directives, members]): Ast.UnionTypeDefinition => ({
			description,
			directives,
			keyword,
			kind: 'UnionTypeDefinition',
			members,
			name,
		})
	)

const unionTypeExtension: GraphQLParser<Ast.UnionTypeExtension> = sequence(extension('union'))
	.andRecover(name(), expected('FCPARSE047'))
	.and(opt(directives))
	.and(opt(unionMemberTypes))
	.map(
		([[extend, keyword], name, directives, members]): Ast.UnionTypeExtension => ({
			directives,
			extend,
			keyword,
			kind: 'UnionTypeExtension',
			members,
			name,
		})
	)

const enumValueDefinition: GraphQLParser<Ast.EnumValueDefinition> = sequence(opt(description))
	.andRecognize(enumValue)
	.and(opt(directives))
	.map(
		([description, enumValue, directives]): Ast.EnumValueDefinition => ({
			description,
			directives,
			enumValue,
			kind: 'EnumValueDefinition',
		})
	)

const enumValuesDefinition: GraphQLParser<Ast.EnumValuesDefinition> = delimited(
	punctuator('{'),
	many0(enumValueDefinition),
	punctuator('}'),
	unclosed('FCPARSE049')
).map(
	([open, definitions, close]): Ast.EnumValuesDefinition => ({
		braces: [open, close],
		definitions,
		kind: 'EnumValuesDefinition',
	})
)

const enumTypeDefinition: GraphQLParser<Ast.EnumTypeDefinition> = introducedBy('enum')
	.andRecover(name(), expected('FCPARSE048'))
	.and(opt(directives))
	.and(opt(enumValuesDefinition))
	.map(
		([description, keyword, name, directives, values]): Ast.EnumTypeDefinition => ({
			description,
			directives,
			keyword,
			kind: 'EnumTypeDefinition',
			name,
			values,
		})
	)

const enumTypeExtension: GraphQLParser<Ast.EnumTypeExtension> = sequence(extension('enum'))
	.andRecover(name(), expected('FCPARSE050'))
	.and(opt(directives))
	.and(opt(enumValuesDefinition))
	.map(
		([[extend, keyword], name, directives, values]): Ast.EnumTypeExtension => ({
			directives,
			extend,
			keyword,
			kind: 'EnumTypeExtension',
			name,
			values,
		})
	)

const inputFieldsDefinition: GraphQLParser<Ast.InputFieldsDefinition> = delimited(
	punctuator('{'),
	many0(inputValueDefinition),
	punctuator('}'),
	unclosed('FCPARSE052')
).map(
	([open, definitions, close]): Ast.InputFieldsDefinition => ({
		braces: [open, close],
		definitions,
		kind: 'InputFieldsDefinition',
	})
)

const inputObjectTypeDefinition: GraphQLParser<Ast.InputObjectTypeDefinition> = introducedBy(
	'input'
)
	.andRecover(name(), expected('FCPARSE051'))
	.and(opt(directives))
	.and(opt(inputFieldsDefinition))
	.map(
		([description, keyword, name, directives, fields]): Ast.InputObjectTypeDefinition => ({
			description,
			directives,
			fields,
			keyword,
			kind: 'InputObjectTypeDefinition',
			name,
		})
	)

const inputObjectTypeExtension: GraphQLParser<Ast.InputObjectTypeExtension> = sequence(
	extension('input')
)
	.andRecover(name(), expected('FCPARSE053'))
	.and(opt(directives))
	.and(opt(inputFieldsDefinition))
	.map(
		([[extend, keyword], name, directives, fields]): Ast.InputObjectTypeExtension => ({
			directives,
			extend,
			fields,
			keyword,
			kind: 'InputObjectTypeExtension',
			name,
		})
	)

// =============================================================================
// DIRECTIVE DEFINITIONS
// =============================================================================

const directiveLocation: GraphQLParser<Ast.DirectiveLocation> = oneOf(
	'directive location',
	DIRECTIVE_LOCATIONS
).map((token): Ast.DirectiveLocation => ({ kind: 'DirectiveLocation', token }))

const directiveLocations: GraphQLParser<Ast.DirectiveLocations> = sequence(keyword('on'))
	.and(opt(punctuator('|')))
	.andRecover(directiveLocation, expected('FCPARSE057'))
	.and(many0(sequence(punctuator('|')).andRecover(directiveLocation, expected('FCPARSE058'))))
	.map(
		([on, pipe, first, rest]): Ast.DirectiveLocations => ({
			first,
			kind: 'DirectiveLocations',
			on,
			pipe,
			rest,
		})
	)

const directiveDefinition: GraphQLParser<Ast.DirectiveDefinition> = introducedBy('directive')
	.andRecover(punctuator('@'), expected('FCPARSE054'))
	.andRecover(nameExcept('on'), expected('FCPARSE055'))
	.and(opt(argumentsDefinition))
	.and(opt(keyword('repeatable')))
	.andRecover(directiveLocations, expected('FCPARSE056'))
	.map(
		([description, keyword, at, name, args, repeatable, locations]): Ast.DirectiveDefinition => ({
			arguments: args,
			at,
			description,
			keyword,
			kind: 'DirectiveDefinition',
			locations,
			name,
			repeatable,
		})
	)

export const typeSystemDefinitionOrExtension: GraphQLParser<Ast.TypeSystemDefinitionOrExtension> =
	alt<Token, Ast.TypeSystemDefinitionOrExtension>(
		schemaDefinition,
		schemaExtension,
		scalarTypeDefinition,
		scalarTypeExtension,
		objectTypeDefinition,
		objectTypeExtension,
		interfaceTypeDefinition,
		interfaceTypeExtension,
		unionTypeDefinition,
		unionTypeExtension,
		enumTypeDefinition,
		enumTypeExtension,
		inputObjectTypeDefinition,
		inputObjectTypeExtension,
		directiveDefinition
	)
