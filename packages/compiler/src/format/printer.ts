/**
 * Canonical layout printer.
 *
 * Two-space indentation, one selection or member definition per line,
 * descriptions on their own line. Missing slots are left out. Token text
 * is copied verbatim, so block strings keep their original lines.
 */

import type * as Ast from '../ast/nodes.ts'
import type { Token } from '../core/tokens.ts'

const INDENT = '  '

function text(token: Token): string {
	return token.text
}

function slot<T>(recoverable: Ast.Recoverable<T>, render: (value: T) => string): string {
	return recoverable.kind === 'Present' ? render(recoverable.value) : ''
}

/** Join the non-empty parts. */
function words(...parts: readonly string[]): string {
	return parts.filter((part) => part !== '').join(' ')
}

function optional<T>(value: T | null, render: (value: T) => string): string {
	return value === null ? '' : render(value)
}

function block<T>(
	items: readonly T[],
	indent: string,
	render: (item: T, indent: string) => string
): string {
	if (items.length === 0) return '{}'
	const inner = indent + INDENT
	const lines = items.map((item) => `${inner}${render(item, inner)}`)
	return `{\n${lines.join('\n')}\n${indent}}`
}

function described(description: Ast.Description | null, indent: string, rest: string): string {
	return description === null ? rest : `${text(description.token)}\n${indent}${rest}`
}

// =============================================================================
// VALUES AND TYPES
// =============================================================================

function printValue(value: Ast.Value): string {
	switch (value.kind) {
		case 'Variable':
			return printVariable(value)
		case 'IntValue':
		case 'FloatValue':
		case 'StringValue':
		case 'BooleanValue':
		case 'NullValue':
		case 'EnumValue':
			return text(value.token)
		case 'ListValue':
			return `[${value.values.map(printValue).join(', ')}]`
		case 'ObjectValue':
			return `{${value.fields.map(printObjectField).join(', ')}}`
	}
}

function printVariable(variable: Ast.Variable): string {
	return `$${slot(variable.name, text)}`
}

function printObjectField(field: Ast.ObjectField): string {
	return `${text(field.name)}: ${slot(field.value, printValue)}`
}

function printType(type: Ast.Type): string {
	switch (type.kind) {
		case 'NamedType':
			return text(type.name)
		case 'ListType':
			return `[${slot(type.type, printType)}]`
		case 'NonNullType':
			return `${printType(type.type)}!`
	}
}

function printArguments(args: Ast.Arguments): string {
	const items = args.items.map((item) => `${text(item.name)}: ${slot(item.value, printValue)}`)
	return `(${items.join(', ')})`
}

function printDirective(directive: Ast.Directive): string {
	return `@${slot(directive.name, text)}${optional(directive.arguments, printArguments)}`
}

function printDirectives(directives: Ast.Directives | null): string {
	return optional(directives, (node) => node.directives.map(printDirective).join(' '))
}

function printDefaultValue(node: Ast.DefaultValue | null): string {
	return optional(node, (defaultValue) => `= ${slot(defaultValue.value, printValue)}`)
}

// =============================================================================
// EXECUTABLE DEFINITIONS
// =============================================================================

function printSelectionSet(set: Ast.SelectionSet, indent: string): string {
	return block(set.selections, indent, printSelection)
}

function printSelection(selection: Ast.Selection, indent: string): string {
	switch (selection.kind) {
		case 'Field':
			return printField(selection, indent)
		case 'FragmentSpread':
			return words(`...${text(selection.fragmentName)}`, printDirectives(selection.directives))
		case 'InlineFragment':
			return words(
				'...',
				optional(selection.typeCondition, printTypeCondition),
				printDirectives(selection.directives),
				slot(selection.selectionSet, (set) => printSelectionSet(set, indent))
			)
	}
}

function printField(field: Ast.Field, indent: string): string {
	const alias = optional(field.alias, (node) => `${text(node.name)}: `)
	const head = `${alias}${slot(field.name, text)}${optional(field.arguments, printArguments)}`
	return words(
		head,
		printDirectives(field.directives),
		optional(field.selectionSet, (set) => printSelectionSet(set, indent))
	)
}

function printTypeCondition(condition: Ast.TypeCondition): string {
	return words('on', slot(condition.namedType, printType))
}

function printVariableDefinition(definition: Ast.VariableDefinition): string {
	const type = slot(definition.type, printType)
	return words(
		`${printVariable(definition.variable)}: ${type}`,
		printDefaultValue(definition.defaultValue),
		printDirectives(definition.directives)
	)
}

function printOperationDefinition(operation: Ast.OperationDefinition, indent: string): string {
	const selectionSet = slot(operation.selectionSet, (set) => printSelectionSet(set, indent))
	if (operation.operationType === null) return selectionSet

	const variables = optional(
		operation.variableDefinitions,
		(node) => `(${node.definitions.map(printVariableDefinition).join(', ')})`
	)
	const name = optional(operation.name, text)
	return words(
		operation.operationType.operation,
		name === '' ? variables : `${name}${variables}`,
		printDirectives(operation.directives),
		selectionSet
	)
}

function printFragmentDefinition(fragment: Ast.FragmentDefinition, indent: string): string {
	return words(
		'fragment',
		slot(fragment.fragmentName, text),
		slot(fragment.typeCondition, printTypeCondition),
		printDirectives(fragment.directives),
		slot(fragment.selectionSet, (set) => printSelectionSet(set, indent))
	)
}

// =============================================================================
// TYPE SYSTEM
// =============================================================================

function printInputValueDefinition(definition: Ast.InputValueDefinition, indent: string): string {
	const head = `${text(definition.name)}: ${slot(definition.type, printType)}`
	return described(
		definition.description,
		indent,
		words(head, printDefaultValue(definition.defaultValue), printDirectives(definition.directives))
	)
}

/** Inline unless an argument carries a description. */
function printArgumentsDefinition(args: Ast.ArgumentsDefinition, indent: string): string {
	const multiline = args.definitions.some((definition) => definition.description !== null)
	if (!multiline) {
		return `(${args.definitions.map((definition) => printInputValueDefinition(definition, indent)).join(', ')})`
	}
	const inner = indent + INDENT
	const lines = args.definitions.map(
		(definition) => `${inner}${printInputValueDefinition(definition, inner)}`
	)
	return `(\n${lines.join('\n')}\n${indent})`
}

function printFieldDefinition(definition: Ast.FieldDefinition, indent: string): string {
	const args = optional(definition.arguments, (node) => printArgumentsDefinition(node, indent))
	const head = `${text(definition.name)}${args}: ${slot(definition.type, printType)}`
	return described(
		definition.description,
		indent,
		words(head, printDirectives(definition.directives))
	)
}

function printImplements(node: Ast.ImplementsInterfaces | null): string {
	return optional(node, (interfaces) => {
		const names = [interfaces.first, ...interfaces.rest.map(([, member]) => member)]
			.map((member) => slot(member, printType))
			.filter((name) => name !== '')
		return `implements ${names.join(' & ')}`
	})
}

function printFields(node: Ast.FieldsDefinition | null, indent: string): string {
	return optional(node, (fields) => block(fields.definitions, indent, printFieldDefinition))
}

function printInputFields(node: Ast.InputFieldsDefinition | null, indent: string): string {
	return optional(node, (fields) => block(fields.definitions, indent, printInputValueDefinition))
}

function printUnionMembers(node: Ast.UnionMemberTypes | null): string {
	return optional(node, (members) => {
		const names = [members.first, ...members.rest.map(([, member]) => member)]
			.map((member) => slot(member, printType))
			.filter((name) => name !== '')
		return `= ${names.join(' | ')}`
	})
}

function printEnumValueDefinition(value: Ast.EnumValueDefinition, indent: string): string {
	return described(
		value.description,
		indent,
		words(text(value.enumValue.token), printDirectives(value.directives))
	)
}

function printEnumValues(node: Ast.EnumValuesDefinition | null, indent: string): string {
	return optional(node, (values) => block(values.definitions, indent, printEnumValueDefinition))
}

function printRootOperationTypes(node: Ast.RootOperationTypeDefinitions, indent: string): string {
	const definitions = node.definitions.kind === 'Present' ? node.definitions.value : []
	return block(
		definitions,
		indent,
		(definition) =>
			`${definition.operationType.operation}: ${slot(definition.namedType, printType)}`
	)
}

function printDirectiveLocations(locations: Ast.DirectiveLocations): string {
	const names = [locations.first, ...locations.rest.map(([, location]) => location)]
		.map((location) => slot(location, (node) => text(node.token)))
		.filter((name) => name !== '')
	return `on ${names.join(' | ')}`
}

function printDirectiveDefinition(definition: Ast.DirectiveDefinition, indent: string): string {
	const args = optional(definition.arguments, (node) => printArgumentsDefinition(node, indent))
	return described(
		definition.description,
		indent,
		words(
			'directive',
			`@${slot(definition.name, text)}${args}`,
			optional(definition.repeatable, text),
			slot(definition.locations, printDirectiveLocations)
		)
	)
}

function printTypeSystem(definition: Ast.TypeSystemDefinitionOrExtension, indent: string): string {
	switch (definition.kind) {
		case 'SchemaDefinition':
			return described(
				definition.description,
				indent,
				words(
					'schema',
					printDirectives(definition.directives),
					slot(definition.rootOperationTypes, (types) => printRootOperationTypes(types, indent))
				)
			)
		case 'SchemaExtension':
			return words(
				'extend schema',
				printDirectives(definition.directives),
				optional(definition.rootOperationTypes, (types) => printRootOperationTypes(types, indent))
			)
		case 'ScalarTypeDefinition':
			return described(
				definition.description,
				indent,
				words('scalar', slot(definition.name, text), printDirectives(definition.directives))
			)
		case 'ScalarTypeExtension':
			return words(
				'extend scalar',
				slot(definition.name, text),
				slot(definition.directives, printDirectives)
			)
		case 'ObjectTypeDefinition':
		case 'InterfaceTypeDefinition':
			return described(
				definition.description,
				indent,
				words(
					text(definition.keyword),
					slot(definition.name, text),
					printImplements(definition.interfaces),
					printDirectives(definition.directives),
					printFields(definition.fields, indent)
				)
			)
		case 'ObjectTypeExtension':
		case 'InterfaceTypeExtension':
			return words(
				'extend',
				text(definition.keyword),
				slot(definition.name, text),
				printImplements(definition.interfaces),
				printDirectives(definition.directives),
				printFields(definition.fields, indent)
			)
		case 'UnionTypeDefinition':
			return described(
				definition.description,
				indent,
				words(
					'union',
					slot(definition.name, text),
					printDirectives(definition.directives),
					printUnionMembers(definition.members)
				)
			)
		case 'UnionTypeExtension':
			return words(
				'extend union',
				slot(definition.name, text),
				printDirectives(definition.directives),
				printUnionMembers(definition.members)
			)
		case 'EnumTypeDefinition':
			return described(
				definition.description,
				indent,
				words(
					'enum',
					slot(definition.name, text),
					printDirectives(definition.directives),
					printEnumValues(definition.values, indent)
				)
			)
		case 'EnumTypeExtension':
			return words(
				'extend enum',
				slot(definition.name, text),
				printDirectives(definition.directives),
				printEnumValues(definition.values, indent)
			)
		case 'InputObjectTypeDefinition':
			return described(
				definition.description,
				indent,
				words(
					'input',
					slot(definition.name, text),
					printDirectives(definition.directives),
					printInputFields(definition.fields, indent)
				)
			)
		case 'InputObjectTypeExtension':
			return words(
				'extend input',
				slot(definition.name, text),
				printDirectives(definition.directives),
				printInputFields(definition.fields, indent)
			)
		case 'DirectiveDefinition':
			return printDirectiveDefinition(definition, indent)
	}
}

export function printDefinition(definition: Ast.Definition, indent = ''): string {
	switch (definition.kind) {
		case 'OperationDefinition':
			return printOperationDefinition(definition, indent)
		case 'FragmentDefinition':
			return printFragmentDefinition(definition, indent)
		default:
			return printTypeSystem(definition, indent)
	}
}

/** Definitions separated by a blank line, with a trailing newline. */
export function printDocument(document: Ast.Document): string {
	if (document.definitions.length === 0) return ''
	return `${document.definitions.map((definition) => printDefinition(definition)).join('\n\n')}\n`
}

/**
 * Render any node in the canonical layout. Nested lines are indented
 * relative to column zero.
 */
export function print(node: Ast.AstNode): string {
	switch (node.kind) {
		case 'Document':
			return printDocument(node)
		case 'OperationDefinition':
		case 'FragmentDefinition':
		case 'SchemaDefinition':
		case 'SchemaExtension':
		case 'ScalarTypeDefinition':
		case 'ScalarTypeExtension':
		case 'ObjectTypeDefinition':
		case 'ObjectTypeExtension':
		case 'InterfaceTypeDefinition':
		case 'InterfaceTypeExtension':
		case 'UnionTypeDefinition':
		case 'UnionTypeExtension':
		case 'EnumTypeDefinition':
		case 'EnumTypeExtension':
		case 'InputObjectTypeDefinition':
		case 'InputObjectTypeExtension':
		case 'DirectiveDefinition':
			return printDefinition(node)
		case 'SelectionSet':
			return printSelectionSet(node, '')
		case 'Field':
		case 'FragmentSpread':
		case 'InlineFragment':
			return printSelection(node, '')
		case 'Variable':
		case 'IntValue':
		case 'FloatValue':
		case 'StringValue':
		case 'BooleanValue':
		case 'NullValue':
		case 'EnumValue':
		case 'ListValue':
		case 'ObjectValue':
			return printValue(node)
		case 'NamedType':
		case 'ListType':
		case 'NonNullType':
			return printType(node)
		case 'OperationType':
			return node.operation
		case 'Alias':
			return `${text(node.name)}:`
		case 'Arguments':
			return printArguments(node)
		case 'Argument':
			return `${text(node.name)}: ${slot(node.value, printValue)}`
		case 'TypeCondition':
			return printTypeCondition(node)
		case 'ObjectField':
			return printObjectField(node)
		case 'VariableDefinitions':
			return `(${node.definitions.map(printVariableDefinition).join(', ')})`
		case 'VariableDefinition':
			return printVariableDefinition(node)
		case 'DefaultValue':
			return printDefaultValue(node)
		case 'Directives':
			return printDirectives(node)
		case 'Directive':
			return printDirective(node)
		case 'Description':
			return text(node.token)
		case 'RootOperationTypeDefinitions':
			return printRootOperationTypes(node, '')
		case 'RootOperationTypeDefinition':
			return `${node.operationType.operation}: ${slot(node.namedType, printType)}`
		case 'ImplementsInterfaces':
			return printImplements(node)
		case 'FieldsDefinition':
			return printFields(node, '')
		case 'FieldDefinition':
			return printFieldDefinition(node, '')
		case 'ArgumentsDefinition':
			return printArgumentsDefinition(node, '')
		case 'InputValueDefinition':
			return printInputValueDefinition(node, '')
		case 'UnionMemberTypes':
			return printUnionMembers(node)
		case 'EnumValuesDefinition':
			return printEnumValues(node, '')
		case 'EnumValueDefinition':
			return printEnumValueDefinition(node, '')
		case 'InputFieldsDefinition':
			return printInputFields(node, '')
		case 'DirectiveLocations':
			return printDirectiveLocations(node)
		case 'DirectiveLocation':
			return text(node.token)
	}
}
