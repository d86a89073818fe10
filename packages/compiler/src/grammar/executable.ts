/**
 * Executable definitions: operations, fragments, selections, values,
 * variables, types and directives.
 */

import type * as Ast from '../ast/nodes.ts'
import { isName, type NameToken, type Token } from '../core/tokens.ts'
import {
	alt,
	delimited,
	lazy,
	many0,
	many1,
	NestingBudget,
	opt,
	postfix,
	sequence,
	token,
} from '../parse/combinators.ts'
import { present } from '../parse/protocol.ts'
import {
	aliasPrefix,
	expected,
	floatValue,
	type GraphQLParser,
	intValue,
	keyword,
	missing,
	name,
	nameExcept,
	oneOf,
	punctuator,
	spreadDots,
	stringValue,
	unclosed,
} from './terminals.ts'

/** Combined depth of nested selection sets, list and object values, and list types. */
export const MAX_NESTING = 64

const nesting = new NestingBudget(MAX_NESTING)

const OPERATION_KINDS: ReadonlySet<string> = new Set(['query', 'mutation', 'subscription'])

function toOperationKind(text: string): Ast.OperationKind {
	switch (text) {
		case 'mutation':
			return 'mutation'
		case 'subscription':
			return 'subscription'
		default:
			return 'query'
	}
}

export const operationType: GraphQLParser<Ast.OperationType> = oneOf(
	'operation type',
	OPERATION_KINDS
).map((keyword): Ast.OperationType => ({
	keyword,
	kind: 'OperationType',
	operation: toOperationKind(keyword.text),
}))

// =============================================================================
// TYPES
// =============================================================================

export const namedType: GraphQLParser<Ast.NamedType> = name().map(
	(name): Ast.NamedType => ({ kind: 'NamedType', name })
)

const listType: GraphQLParser<Ast.ListType> = lazy(
	() =>
		delimited(
			punctuator('['),
			type.recover(missing('FCPARSE023')),
			punctuator(']'),
			unclosed('FCPARSE022')
		).map(([open, type, close]): Ast.ListType => ({ brackets: [open, close], kind: 'ListType', type })),
	nesting
)

/** A `!` right after a named or list type makes it non-null. */
export const type: GraphQLParser<Ast.Type> = postfix(
	alt<Token, Ast.NamedType | Ast.ListType>(namedType, listType),
	punctuator('!'),
	(type, bang): Ast.Type => ({ bang, kind: 'NonNullType', type }),
	(type): Ast.Type => type
)

// =============================================================================
// VALUES
// =============================================================================

export const variable: GraphQLParser<Ast.Variable> = sequence(punctuator('$'))
	.andRecover(name(), expected('FCPARSE002'))
	.map(([dollar, name]): Ast.Variable => ({ dollar, kind: 'Variable', name }))

const booleanValue: GraphQLParser<Ast.BooleanValue> = token('boolean', (t: Token) =>
	isName(t) && (t.text === 'true' || t.text === 'false') ? t : null
).map((token): Ast.BooleanValue => ({ kind: 'BooleanValue', token, value: token.text === 'true' }))

const nullValue: GraphQLParser<Ast.NullValue> = keyword('null').map(
	(token): Ast.NullValue => ({ kind: 'NullValue', token })
)

export const enumValue: GraphQLParser<Ast.EnumValue> = nameExcept('true', 'false', 'null').map(
	(token): Ast.EnumValue => ({ kind: 'EnumValue', token })
)

const listValue: GraphQLParser<Ast.ListValue> = lazy(
	() =>
		delimited(punctuator('['), many0(value), punctuator(']'), unclosed('FCPARSE014')).map(
			([open, values, close]): Ast.ListValue => ({
				brackets: [open, close],
				kind: 'ListValue',
				values,
			})
		),
	nesting
)

const objectField: GraphQLParser<Ast.ObjectField> = lazy(
	() =>
		sequence(name())
			.andRecover(punctuator(':'), expected('FCPARSE016'))
			.andRecover(value, expected('FCPARSE017'))
			.map(([name, colon, value]): Ast.ObjectField => ({ colon, kind: 'ObjectField', name, value })),
	nesting
)

const objectValue: GraphQLParser<Ast.ObjectValue> = delimited(
	punctuator('{'),
	many0(objectField),
	punctuator('}'),
	unclosed('FCPARSE015')
).map(
	([open, fields, close]): Ast.ObjectValue => ({ braces: [open, close], fields, kind: 'ObjectValue' })
)

export const value: GraphQLParser<Ast.Value> = alt<Token, Ast.Value>(
	variable,
	intValue().map((token): Ast.IntValue => ({ kind: 'IntValue', token })),
	floatValue().map((token): Ast.FloatValue => ({ kind: 'FloatValue', token })),
	stringValue().map((token): Ast.StringValue => ({ kind: 'StringValue', token })),
	booleanValue,
	nullValue,
	enumValue,
	listValue,
	objectValue
)

export const defaultValue: GraphQLParser<Ast.DefaultValue> = sequence(punctuator('='))
	.andRecover(value, expected('FCPARSE021'))
	.map(([eq, value]): Ast.DefaultValue => ({ eq, kind: 'DefaultValue', value }))

// =============================================================================
// ARGUMENTS AND DIRECTIVES
// =============================================================================

const argument: GraphQLParser<Ast.Argument> = sequence(name())
	.andRecover(punctuator(':'), expected('FCPARSE007'))
	.andRecover(value, expected('FCPARSE008'))
	.map(([name, colon, value]): Ast.Argument => ({ colon, kind: 'Argument', name, value }))

export const args: GraphQLParser<Ast.Arguments> = delimited(
	punctuator('('),
	many0(argument),
	punctuator(')'),
	unclosed('FCPARSE006')
).map(([open, items, close]): Ast.Arguments => ({ items, kind: 'Arguments', parens: [open, close] }))

const directive: GraphQLParser<Ast.Directive> = sequence(punctuator('@'))
	.andRecover(name(), expected('FCPARSE024'))
	.and(opt(args))
	.map(([at, name, args]): Ast.Directive => ({ arguments: args, at, kind: 'Directive', name }))

export const directives: GraphQLParser<Ast.Directives> = many1(directive).map(
	(directives): Ast.Directives => ({ directives, kind: 'Directives' })
)

// =============================================================================
// VARIABLES
// =============================================================================

const variableDefinition: GraphQLParser<Ast.VariableDefinition> = sequence(variable)
	.andRecover(punctuator(':'), expected('FCPARSE019'))
	.andRecover(type, expected('FCPARSE020'))
	.and(opt(defaultValue))
	.and(opt(directives))
	.map(
		([variable, colon, type, defaultValue, directives]): Ast.VariableDefinition => ({
			colon,
			defaultValue,
			directives,
			kind: 'VariableDefinition',
			type,
			variable,
		})
	)

const variableDefinitions: GraphQLParser<Ast.VariableDefinitions> = delimited(
	punctuator('('),
	many0(variableDefinition),
	punctuator(')'),
	unclosed('FCPARSE018')
).map(
	([open, definitions, close]): Ast.VariableDefinitions => ({
		definitions,
		kind: 'VariableDefinitions',
		parens: [open, close],
	})
)

// =============================================================================
// SELECTIONS
// =============================================================================

interface FieldHead {
	readonly alias: Ast.Alias | null
	readonly name: Ast.Recoverable<NameToken>
}

const fieldHead: GraphQLParser<FieldHead> = alt<Token, FieldHead>(
	sequence(aliasPrefix())
		.andRecover(name(), expected('FCPARSE005'))
		.map(([[alias, colon], name]): FieldHead => ({
			alias: { colon, kind: 'Alias', name: alias },
			name,
		})),
	name().map((name): FieldHead => ({ alias: null, name: present(name) }))
)

export const selectionSet: GraphQLParser<Ast.SelectionSet> = lazy(
	() =>
		delimited(punctuator('{'), many0(selection), punctuator('}'), unclosed('FCPARSE004')).map(
			([open, selections, close]): Ast.SelectionSet => ({
				braces: [open, close],
				kind: 'SelectionSet',
				selections,
			})
		),
	nesting
)

const field: GraphQLParser<Ast.Field> = sequence(fieldHead)
	.and(opt(args))
	.and(opt(directives))
	.and(opt(selectionSet))
	.map(
		([{ alias, name }, args, directives, selectionSet]): Ast.Field => ({
			alias,
			arguments: args,
			directives,
			kind: 'Field',
			name,
			selectionSet,
		})
	)

export const typeCondition: GraphQLParser<Ast.TypeCondition> = sequence(keyword('on'))
	.andRecover(namedType, expected('FCPARSE013'))
	.map(([on, namedType]): Ast.TypeCondition => ({ kind: 'TypeCondition', namedType, on }))

const fragmentSpread: GraphQLParser<Ast.FragmentSpread> = sequence(spreadDots())
	.and(name())
	.and(opt(directives))
	.map(
		([dots, fragmentName, directives]): Ast.FragmentSpread => ({
			directives,
			dots,
			fragmentName,
			kind: 'FragmentSpread',
		})
	)

const inlineFragment: GraphQLParser<Ast.InlineFragment> = sequence(punctuator('...'))
	.and(opt(typeCondition))
	.and(opt(directives))
	.andRecover(selectionSet, expected('FCPARSE009'))
	.map(
		([dots, typeCondition, directives, selectionSet]): Ast.InlineFragment => ({
			directives,
			dots,
			kind: 'InlineFragment',
			selectionSet,
			typeCondition,
		})
	)

const selection: GraphQLParser<Ast.Selection> = alt<Token, Ast.Selection>(
	fragmentSpread,
	inlineFragment,
	field
)

// =============================================================================
// DEFINITIONS
// =============================================================================

const namedOperation: GraphQLParser<Ast.OperationDefinition> = sequence(operationType)
	.and(opt(name()))
	.and(opt(variableDefinitions))
	.and(opt(directives))
	.andRecover(selectionSet, expected('FCPARSE003'))
	.map(
		([operationType, name, variableDefinitions, directives, selectionSet]): Ast.OperationDefinition => ({
			directives,
			kind: 'OperationDefinition',
			name,
			operationType,
			selectionSet,
			variableDefinitions,
		})
	)

const queryShorthand: GraphQLParser<Ast.OperationDefinition> = selectionSet.map(
	(selectionSet): Ast.OperationDefinition => ({
		directives: null,
		kind: 'OperationDefinition',
		name: null,
		operationType: null,
		selectionSet: present(selectionSet),
		variableDefinitions: null,
	})
)

export const operationDefinition: GraphQLParser<Ast.OperationDefinition> = alt(
	namedOperation,
	queryShorthand
)

export const fragmentDefinition: GraphQLParser<Ast.FragmentDefinition> = sequence(
	keyword('fragment')
)
	.andRecover(nameExcept('on'), expected('FCPARSE010'))
	.andRecover(typeCondition, expected('FCPARSE011'))
	.and(opt(directives))
	.andRecover(selectionSet, expected('FCPARSE012'))
	.map(
		([keyword, fragmentName, typeCondition, directives, selectionSet]): Ast.FragmentDefinition => ({
			directives,
			fragmentName,
			keyword,
			kind: 'FragmentDefinition',
			selectionSet,
			typeCondition,
		})
	)

export const executableDefinition: GraphQLParser<Ast.ExecutableDefinition> = alt<
	Token,
	Ast.ExecutableDefinition
>(operationDefinition, fragmentDefinition)
