/**
 * Static fold-visitor over the syntax tree.
 *
 * A visitor is a bag of optional callbacks sharing one accumulator. Every
 * `traverseX` function calls `visitX`, recurses into each child in source
 * order, then calls `postVisitX`. Token leaves report their span through
 * `visitSpan`; Recoverable slots report through `visitRecoverable` and are
 * followed when present, or reported through `visitMissing` when not.
 */

import type { Span } from '../core/span.ts'
import type { Token } from '../core/tokens.ts'
import type * as Ast from './nodes.ts'

type Callback<N, A> = (node: N, accumulator: A) => void

type NodeCallbacks<A> = {
	readonly [K in Ast.NodeKind as `visit${K}`]?: Callback<Ast.NodeOfKind<K>, A>
} & {
	readonly [K in Ast.NodeKind as `postVisit${K}`]?: Callback<Ast.NodeOfKind<K>, A>
}

export type Visitor<A> = NodeCallbacks<A> & {
	readonly visitDefinition?: Callback<Ast.Definition, A>
	readonly visitSelection?: Callback<Ast.Selection, A>
	readonly visitValue?: Callback<Ast.Value, A>
	readonly visitType?: Callback<Ast.Type, A>
	readonly visitRecoverable?: Callback<Ast.Recoverable<unknown>, A>
	readonly visitMissing?: Callback<Ast.MissingToken, A>
	readonly visitSpan?: (span: Span, accumulator: A) => void
}

function token<A>(leaf: Token, visitor: Visitor<A>, acc: A): void {
	visitor.visitSpan?.(leaf.span, acc)
}

function optionalToken<A>(leaf: Token | null, visitor: Visitor<A>, acc: A): void {
	if (leaf !== null) token(leaf, visitor, acc)
}

function slot<T, A>(
	recoverable: Ast.Recoverable<T>,
	visitor: Visitor<A>,
	acc: A,
	each: (value: T) => void
): void {
	visitor.visitRecoverable?.(recoverable, acc)
	if (recoverable.kind === 'Present') each(recoverable.value)
	else visitor.visitMissing?.(recoverable.missing, acc)
}

function tokenSlot<A>(
	recoverable: Ast.Recoverable<Token>,
	visitor: Visitor<A>,
	acc: A
): void {
	slot(recoverable, visitor, acc, (leaf) => token(leaf, visitor, acc))
}

function delimiters<A>(pair: Ast.Delimiters, visitor: Visitor<A>, acc: A): void {
	token(pair[0], visitor, acc)
}

function closing<A>(pair: Ast.Delimiters, visitor: Visitor<A>, acc: A): void {
	tokenSlot(pair[1], visitor, acc)
}

function directivesOf<A>(node: Ast.Directives | null, visitor: Visitor<A>, acc: A): void {
	if (node !== null) traverseDirectives(node, visitor, acc)
}

function descriptionOf<A>(node: Ast.Description | null, visitor: Visitor<A>, acc: A): void {
	if (node !== null) traverseDescription(node, visitor, acc)
}

// =============================================================================
// DOCUMENT
// =============================================================================

export function traverseDocument<A>(node: Ast.Document, visitor: Visitor<A>, acc: A): void {
	visitor.visitDocument?.(node, acc)
	for (const definition of node.definitions) traverseDefinition(definition, visitor, acc)
	visitor.postVisitDocument?.(node, acc)
}

export function traverseDefinition<A>(node: Ast.Definition, visitor: Visitor<A>, acc: A): void {
	visitor.visitDefinition?.(node, acc)
	traverse(node, visitor, acc)
}

// =============================================================================
// EXECUTABLE DEFINITIONS
// =============================================================================

export function traverseOperationDefinition<A>(
	node: Ast.OperationDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitOperationDefinition?.(node, acc)
	if (node.operationType !== null) traverseOperationType(node.operationType, visitor, acc)
	optionalToken(node.name, visitor, acc)
	if (node.variableDefinitions !== null) {
		traverseVariableDefinitions(node.variableDefinitions, visitor, acc)
	}
	directivesOf(node.directives, visitor, acc)
	slot(node.selectionSet, visitor, acc, (set) => traverseSelectionSet(set, visitor, acc))
	visitor.postVisitOperationDefinition?.(node, acc)
}

export function traverseOperationType<A>(
	node: Ast.OperationType,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitOperationType?.(node, acc)
	token(node.keyword, visitor, acc)
	visitor.postVisitOperationType?.(node, acc)
}

export function traverseSelectionSet<A>(
	node: Ast.SelectionSet,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitSelectionSet?.(node, acc)
	delimiters(node.braces, visitor, acc)
	for (const selection of node.selections) traverseSelection(selection, visitor, acc)
	closing(node.braces, visitor, acc)
	visitor.postVisitSelectionSet?.(node, acc)
}

export function traverseSelection<A>(node: Ast.Selection, visitor: Visitor<A>, acc: A): void {
	visitor.visitSelection?.(node, acc)
	traverse(node, visitor, acc)
}

export function traverseField<A>(node: Ast.Field, visitor: Visitor<A>, acc: A): void {
	visitor.visitField?.(node, acc)
	if (node.alias !== null) traverseAlias(node.alias, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	if (node.arguments !== null) traverseArguments(node.arguments, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.selectionSet !== null) traverseSelectionSet(node.selectionSet, visitor, acc)
	visitor.postVisitField?.(node, acc)
}

export function traverseAlias<A>(node: Ast.Alias, visitor: Visitor<A>, acc: A): void {
	visitor.visitAlias?.(node, acc)
	token(node.name, visitor, acc)
	token(node.colon, visitor, acc)
	visitor.postVisitAlias?.(node, acc)
}

export function traverseArguments<A>(node: Ast.Arguments, visitor: Visitor<A>, acc: A): void {
	visitor.visitArguments?.(node, acc)
	delimiters(node.parens, visitor, acc)
	for (const item of node.items) traverseArgument(item, visitor, acc)
	closing(node.parens, visitor, acc)
	visitor.postVisitArguments?.(node, acc)
}

export function traverseArgument<A>(node: Ast.Argument, visitor: Visitor<A>, acc: A): void {
	visitor.visitArgument?.(node, acc)
	token(node.name, visitor, acc)
	tokenSlot(node.colon, visitor, acc)
	slot(node.value, visitor, acc, (value) => traverseValue(value, visitor, acc))
	visitor.postVisitArgument?.(node, acc)
}

export function traverseFragmentSpread<A>(
	node: Ast.FragmentSpread,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitFragmentSpread?.(node, acc)
	token(node.dots, visitor, acc)
	token(node.fragmentName, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	visitor.postVisitFragmentSpread?.(node, acc)
}

export function traverseInlineFragment<A>(
	node: Ast.InlineFragment,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInlineFragment?.(node, acc)
	token(node.dots, visitor, acc)
	if (node.typeCondition !== null) traverseTypeCondition(node.typeCondition, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	slot(node.selectionSet, visitor, acc, (set) => traverseSelectionSet(set, visitor, acc))
	visitor.postVisitInlineFragment?.(node, acc)
}

export function traverseFragmentDefinition<A>(
	node: Ast.FragmentDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitFragmentDefinition?.(node, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.fragmentName, visitor, acc)
	slot(node.typeCondition, visitor, acc, (condition) =>
		traverseTypeCondition(condition, visitor, acc)
	)
	directivesOf(node.directives, visitor, acc)
	slot(node.selectionSet, visitor, acc, (set) => traverseSelectionSet(set, visitor, acc))
	visitor.postVisitFragmentDefinition?.(node, acc)
}

export function traverseTypeCondition<A>(
	node: Ast.TypeCondition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitTypeCondition?.(node, acc)
	token(node.on, visitor, acc)
	slot(node.namedType, visitor, acc, (named) => traverseNamedType(named, visitor, acc))
	visitor.postVisitTypeCondition?.(node, acc)
}

// =============================================================================
// VALUES
// =============================================================================

export function traverseValue<A>(node: Ast.Value, visitor: Visitor<A>, acc: A): void {
	visitor.visitValue?.(node, acc)
	traverse(node, visitor, acc)
}

export function traverseVariable<A>(node: Ast.Variable, visitor: Visitor<A>, acc: A): void {
	visitor.visitVariable?.(node, acc)
	token(node.dollar, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	visitor.postVisitVariable?.(node, acc)
}

export function traverseIntValue<A>(node: Ast.IntValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitIntValue?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitIntValue?.(node, acc)
}

export function traverseFloatValue<A>(node: Ast.FloatValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitFloatValue?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitFloatValue?.(node, acc)
}

export function traverseStringValue<A>(node: Ast.StringValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitStringValue?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitStringValue?.(node, acc)
}

export function traverseBooleanValue<A>(
	node: Ast.BooleanValue,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitBooleanValue?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitBooleanValue?.(node, acc)
}

export function traverseNullValue<A>(node: Ast.NullValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitNullValue?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitNullValue?.(node, acc)
}

export function traverseEnumValue<A>(node: Ast.EnumValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitEnumValue?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitEnumValue?.(node, acc)
}

export function traverseListValue<A>(node: Ast.ListValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitListValue?.(node, acc)
	delimiters(node.brackets, visitor, acc)
	for (const value of node.values) traverseValue(value, visitor, acc)
	closing(node.brackets, visitor, acc)
	visitor.postVisitListValue?.(node, acc)
}

export function traverseObjectValue<A>(node: Ast.ObjectValue, visitor: Visitor<A>, acc: A): void {
	visitor.visitObjectValue?.(node, acc)
	delimiters(node.braces, visitor, acc)
	for (const field of node.fields) traverseObjectField(field, visitor, acc)
	closing(node.braces, visitor, acc)
	visitor.postVisitObjectValue?.(node, acc)
}

export function traverseObjectField<A>(node: Ast.ObjectField, visitor: Visitor<A>, acc: A): void {
	visitor.visitObjectField?.(node, acc)
	token(node.name, visitor, acc)
	tokenSlot(node.colon, visitor, acc)
	slot(node.value, visitor, acc, (value) => traverseValue(value, visitor, acc))
	visitor.postVisitObjectField?.(node, acc)
}

// =============================================================================
// VARIABLES, TYPES, DIRECTIVES
// =============================================================================

export function traverseVariableDefinitions<A>(
	node: Ast.VariableDefinitions,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitVariableDefinitions?.(node, acc)
	delimiters(node.parens, visitor, acc)
	for (const definition of node.definitions) {
		traverseVariableDefinition(definition, visitor, acc)
	}
	closing(node.parens, visitor, acc)
	visitor.postVisitVariableDefinitions?.(node, acc)
}

export function traverseVariableDefinition<A>(
	node: Ast.VariableDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitVariableDefinition?.(node, acc)
	traverseVariable(node.variable, visitor, acc)
	tokenSlot(node.colon, visitor, acc)
	slot(node.type, visitor, acc, (type) => traverseType(type, visitor, acc))
	if (node.defaultValue !== null) traverseDefaultValue(node.defaultValue, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	visitor.postVisitVariableDefinition?.(node, acc)
}

export function traverseDefaultValue<A>(
	node: Ast.DefaultValue,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitDefaultValue?.(node, acc)
	token(node.eq, visitor, acc)
	slot(node.value, visitor, acc, (value) => traverseValue(value, visitor, acc))
	visitor.postVisitDefaultValue?.(node, acc)
}

export function traverseType<A>(node: Ast.Type, visitor: Visitor<A>, acc: A): void {
	visitor.visitType?.(node, acc)
	traverse(node, visitor, acc)
}

export function traverseNamedType<A>(node: Ast.NamedType, visitor: Visitor<A>, acc: A): void {
	visitor.visitNamedType?.(node, acc)
	token(node.name, visitor, acc)
	visitor.postVisitNamedType?.(node, acc)
}

export function traverseListType<A>(node: Ast.ListType, visitor: Visitor<A>, acc: A): void {
	visitor.visitListType?.(node, acc)
	delimiters(node.brackets, visitor, acc)
	slot(node.type, visitor, acc, (type) => traverseType(type, visitor, acc))
	closing(node.brackets, visitor, acc)
	visitor.postVisitListType?.(node, acc)
}

export function traverseNonNullType<A>(node: Ast.NonNullType, visitor: Visitor<A>, acc: A): void {
	visitor.visitNonNullType?.(node, acc)
	traverseType(node.type, visitor, acc)
	token(node.bang, visitor, acc)
	visitor.postVisitNonNullType?.(node, acc)
}

export function traverseDirectives<A>(node: Ast.Directives, visitor: Visitor<A>, acc: A): void {
	visitor.visitDirectives?.(node, acc)
	for (const directive of node.directives) traverseDirective(directive, visitor, acc)
	visitor.postVisitDirectives?.(node, acc)
}

export function traverseDirective<A>(node: Ast.Directive, visitor: Visitor<A>, acc: A): void {
	visitor.visitDirective?.(node, acc)
	token(node.at, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	if (node.arguments !== null) traverseArguments(node.arguments, visitor, acc)
	visitor.postVisitDirective?.(node, acc)
}

// =============================================================================
// TYPE SYSTEM
// =============================================================================

export function traverseDescription<A>(node: Ast.Description, visitor: Visitor<A>, acc: A): void {
	visitor.visitDescription?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitDescription?.(node, acc)
}

export function traverseSchemaDefinition<A>(
	node: Ast.SchemaDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitSchemaDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	slot(node.rootOperationTypes, visitor, acc, (types) =>
		traverseRootOperationTypeDefinitions(types, visitor, acc)
	)
	visitor.postVisitSchemaDefinition?.(node, acc)
}

export function traverseSchemaExtension<A>(
	node: Ast.SchemaExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitSchemaExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.rootOperationTypes !== null) {
		traverseRootOperationTypeDefinitions(node.rootOperationTypes, visitor, acc)
	}
	visitor.postVisitSchemaExtension?.(node, acc)
}

export function traverseRootOperationTypeDefinitions<A>(
	node: Ast.RootOperationTypeDefinitions,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitRootOperationTypeDefinitions?.(node, acc)
	delimiters(node.braces, visitor, acc)
	slot(node.definitions, visitor, acc, (definitions) => {
		for (const definition of definitions) {
			traverseRootOperationTypeDefinition(definition, visitor, acc)
		}
	})
	closing(node.braces, visitor, acc)
	visitor.postVisitRootOperationTypeDefinitions?.(node, acc)
}

export function traverseRootOperationTypeDefinition<A>(
	node: Ast.RootOperationTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitRootOperationTypeDefinition?.(node, acc)
	traverseOperationType(node.operationType, visitor, acc)
	tokenSlot(node.colon, visitor, acc)
	slot(node.namedType, visitor, acc, (named) => traverseNamedType(named, visitor, acc))
	visitor.postVisitRootOperationTypeDefinition?.(node, acc)
}

export function traverseScalarTypeDefinition<A>(
	node: Ast.ScalarTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitScalarTypeDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	visitor.postVisitScalarTypeDefinition?.(node, acc)
}

export function traverseScalarTypeExtension<A>(
	node: Ast.ScalarTypeExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitScalarTypeExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	slot(node.directives, visitor, acc, (directives) =>
		traverseDirectives(directives, visitor, acc)
	)
	visitor.postVisitScalarTypeExtension?.(node, acc)
}

function objectLikeBody<A>(
	node: {
		readonly interfaces: Ast.ImplementsInterfaces | null
		readonly directives: Ast.Directives | null
		readonly fields: Ast.FieldsDefinition | null
	},
	visitor: Visitor<A>,
	acc: A
): void {
	if (node.interfaces !== null) traverseImplementsInterfaces(node.interfaces, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.fields !== null) traverseFieldsDefinition(node.fields, visitor, acc)
}

export function traverseObjectTypeDefinition<A>(
	node: Ast.ObjectTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitObjectTypeDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	objectLikeBody(node, visitor, acc)
	visitor.postVisitObjectTypeDefinition?.(node, acc)
}

export function traverseObjectTypeExtension<A>(
	node: Ast.ObjectTypeExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitObjectTypeExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	objectLikeBody(node, visitor, acc)
	visitor.postVisitObjectTypeExtension?.(node, acc)
}

export function traverseInterfaceTypeDefinition<A>(
	node: Ast.InterfaceTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInterfaceTypeDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	objectLikeBody(node, visitor, acc)
	visitor.postVisitInterfaceTypeDefinition?.(node, acc)
}

export function traverseInterfaceTypeExtension<A>(
	node: Ast.InterfaceTypeExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInterfaceTypeExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	objectLikeBody(node, visitor, acc)
	visitor.postVisitInterfaceTypeExtension?.(node, acc)
}

function separated<T, A>(
	members: readonly Ast.SeparatedMember<T>[],
	visitor: Visitor<A>,
	acc: A,
	each: (value: T) => void
): void {
	for (const [separator, member] of members) {
		token(separator, visitor, acc)
		slot(member, visitor, acc, each)
	}
}

export function traverseImplementsInterfaces<A>(
	node: Ast.ImplementsInterfaces,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitImplementsInterfaces?.(node, acc)
	token(node.keyword, visitor, acc)
	optionalToken(node.ampersand, visitor, acc)
	const each = (named: Ast.NamedType): void => traverseNamedType(named, visitor, acc)
	slot(node.first, visitor, acc, each)
	separated(node.rest, visitor, acc, each)
	visitor.postVisitImplementsInterfaces?.(node, acc)
}

export function traverseFieldsDefinition<A>(
	node: Ast.FieldsDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitFieldsDefinition?.(node, acc)
	delimiters(node.braces, visitor, acc)
	for (const definition of node.definitions) traverseFieldDefinition(definition, visitor, acc)
	closing(node.braces, visitor, acc)
	visitor.postVisitFieldsDefinition?.(node, acc)
}

export function traverseFieldDefinition<A>(
	node: Ast.FieldDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitFieldDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.name, visitor, acc)
	if (node.arguments !== null) traverseArgumentsDefinition(node.arguments, visitor, acc)
	tokenSlot(node.colon, visitor, acc)
	slot(node.type, visitor, acc, (type) => traverseType(type, visitor, acc))
	directivesOf(node.directives, visitor, acc)
	visitor.postVisitFieldDefinition?.(node, acc)
}

export function traverseArgumentsDefinition<A>(
	node: Ast.ArgumentsDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitArgumentsDefinition?.(node, acc)
	delimiters(node.parens, visitor, acc)
	for (const definition of node.definitions) {
		traverseInputValueDefinition(definition, visitor, acc)
	}
	closing(node.parens, visitor, acc)
	visitor.postVisitArgumentsDefinition?.(node, acc)
}

export function traverseInputValueDefinition<A>(
	node: Ast.InputValueDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInputValueDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.name, visitor, acc)
	tokenSlot(node.colon, visitor, acc)
	slot(node.type, visitor, acc, (type) => traverseType(type, visitor, acc))
	if (node.defaultValue !== null) traverseDefaultValue(node.defaultValue, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	visitor.postVisitInputValueDefinition?.(node, acc)
}

export function traverseUnionTypeDefinition<A>(
	node: Ast.UnionTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitUnionTypeDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.members !== null) traverseUnionMemberTypes(node.members, visitor, acc)
	visitor.postVisitUnionTypeDefinition?.(node, acc)
}

export function traverseUnionTypeExtension<A>(
	node: Ast.UnionTypeExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitUnionTypeExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.members !== null) traverseUnionMemberTypes(node.members, visitor, acc)
	visitor.postVisitUnionTypeExtension?.(node, acc)
}

export function traverseUnionMemberTypes<A>(
	node: Ast.UnionMemberTypes,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitUnionMemberTypes?.(node, acc)
	token(node.eq, visitor, acc)
	optionalToken(node.pipe, visitor, acc)
	const each = (named: Ast.NamedType): void => traverseNamedType(named, visitor, acc)
	slot(node.first, visitor, acc, each)
	separated(node.rest, visitor, acc, each)
	visitor.postVisitUnionMemberTypes?.(node, acc)
}

export function traverseEnumTypeDefinition<A>(
	node: Ast.EnumTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitEnumTypeDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.values !== null) traverseEnumValuesDefinition(node.values, visitor, acc)
	visitor.postVisitEnumTypeDefinition?.(node, acc)
}

export function traverseEnumTypeExtension<A>(
	node: Ast.EnumTypeExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitEnumTypeExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.values !== null) traverseEnumValuesDefinition(node.values, visitor, acc)
	visitor.postVisitEnumTypeExtension?.(node, acc)
}

export function traverseEnumValuesDefinition<A>(
	node: Ast.EnumValuesDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitEnumValuesDefinition?.(node, acc)
	delimiters(node.braces, visitor, acc)
	for (const definition of node.definitions) {
		traverseEnumValueDefinition(definition, visitor, acc)
	}
	closing(node.braces, visitor, acc)
	visitor.postVisitEnumValuesDefinition?.(node, acc)
}

export function traverseEnumValueDefinition<A>(
	node: Ast.EnumValueDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitEnumValueDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	traverseEnumValue(node.enumValue, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	visitor.postVisitEnumValueDefinition?.(node, acc)
}

export function traverseInputObjectTypeDefinition<A>(
	node: Ast.InputObjectTypeDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInputObjectTypeDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.fields !== null) traverseInputFieldsDefinition(node.fields, visitor, acc)
	visitor.postVisitInputObjectTypeDefinition?.(node, acc)
}

export function traverseInputObjectTypeExtension<A>(
	node: Ast.InputObjectTypeExtension,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInputObjectTypeExtension?.(node, acc)
	token(node.extend, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	directivesOf(node.directives, visitor, acc)
	if (node.fields !== null) traverseInputFieldsDefinition(node.fields, visitor, acc)
	visitor.postVisitInputObjectTypeExtension?.(node, acc)
}

export function traverseInputFieldsDefinition<A>(
	node: Ast.InputFieldsDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitInputFieldsDefinition?.(node, acc)
	delimiters(node.braces, visitor, acc)
	for (const definition of node.definitions) {
		traverseInputValueDefinition(definition, visitor, acc)
	}
	closing(node.braces, visitor, acc)
	visitor.postVisitInputFieldsDefinition?.(node, acc)
}

export function traverseDirectiveDefinition<A>(
	node: Ast.DirectiveDefinition,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitDirectiveDefinition?.(node, acc)
	descriptionOf(node.description, visitor, acc)
	token(node.keyword, visitor, acc)
	tokenSlot(node.at, visitor, acc)
	tokenSlot(node.name, visitor, acc)
	if (node.arguments !== null) traverseArgumentsDefinition(node.arguments, visitor, acc)
	optionalToken(node.repeatable, visitor, acc)
	slot(node.locations, visitor, acc, (locations) =>
		traverseDirectiveLocations(locations, visitor, acc)
	)
	visitor.postVisitDirectiveDefinition?.(node, acc)
}

export function traverseDirectiveLocations<A>(
	node: Ast.DirectiveLocations,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitDirectiveLocations?.(node, acc)
	token(node.on, visitor, acc)
	optionalToken(node.pipe, visitor, acc)
	const each = (location: Ast.DirectiveLocation): void =>
		traverseDirectiveLocation(location, visitor, acc)
	slot(node.first, visitor, acc, each)
	separated(node.rest, visitor, acc, each)
	visitor.postVisitDirectiveLocations?.(node, acc)
}

export function traverseDirectiveLocation<A>(
	node: Ast.DirectiveLocation,
	visitor: Visitor<A>,
	acc: A
): void {
	visitor.visitDirectiveLocation?.(node, acc)
	token(node.token, visitor, acc)
	visitor.postVisitDirectiveLocation?.(node, acc)
}

// =============================================================================
// DISPATCH
// =============================================================================

/** Traverse any node by its kind. Union hooks (visitDefinition, ...) are not called. */
export function traverse<A>(node: Ast.AstNode, visitor: Visitor<A>, acc: A): void {
	switch (node.kind) {
		case 'Document':
			return traverseDocument(node, visitor, acc)
		case 'OperationDefinition':
			return traverseOperationDefinition(node, visitor, acc)
		case 'OperationType':
			return traverseOperationType(node, visitor, acc)
		case 'SelectionSet':
			return traverseSelectionSet(node, visitor, acc)
		case 'Field':
			return traverseField(node, visitor, acc)
		case 'Alias':
			return traverseAlias(node, visitor, acc)
		case 'Arguments':
			return traverseArguments(node, visitor, acc)
		case 'Argument':
			return traverseArgument(node, visitor, acc)
		case 'FragmentSpread':
			return traverseFragmentSpread(node, visitor, acc)
		case 'InlineFragment':
			return traverseInlineFragment(node, visitor, acc)
		case 'FragmentDefinition':
			return traverseFragmentDefinition(node, visitor, acc)
		case 'TypeCondition':
			return traverseTypeCondition(node, visitor, acc)
		case 'Variable':
			return traverseVariable(node, visitor, acc)
		case 'IntValue':
			return traverseIntValue(node, visitor, acc)
		case 'FloatValue':
			return traverseFloatValue(node, visitor, acc)
		case 'StringValue':
			return traverseStringValue(node, visitor, acc)
		case 'BooleanValue':
			return traverseBooleanValue(node, visitor, acc)
		case 'NullValue':
			return traverseNullValue(node, visitor, acc)
		case 'EnumValue':
			return traverseEnumValue(node, visitor, acc)
		case 'ListValue':
			return traverseListValue(node, visitor, acc)
		case 'ObjectValue':
			return traverseObjectValue(node, visitor, acc)
		case 'ObjectField':
			return traverseObjectField(node, visitor, acc)
		case 'VariableDefinitions':
			return traverseVariableDefinitions(node, visitor, acc)
		case 'VariableDefinition':
			return traverseVariableDefinition(node, visitor, acc)
		case 'DefaultValue':
			return traverseDefaultValue(node, visitor, acc)
		case 'NamedType':
			return traverseNamedType(node, visitor, acc)
		case 'ListType':
			return traverseListType(node, visitor, acc)
		case 'NonNullType':
			return traverseNonNullType(node, visitor, acc)
		case 'Directives':
			return traverseDirectives(node, visitor, acc)
		case 'Directive':
			return traverseDirective(node, visitor, acc)
		case 'Description':
			return traverseDescription(node, visitor, acc)
		case 'SchemaDefinition':
			return traverseSchemaDefinition(node, visitor, acc)
		case 'SchemaExtension':
			return traverseSchemaExtension(node, visitor, acc)
		case 'RootOperationTypeDefinitions':
			return traverseRootOperationTypeDefinitions(node, visitor, acc)
		case 'RootOperationTypeDefinition':
			return traverseRootOperationTypeDefinition(node, visitor, acc)
		case 'ScalarTypeDefinition':
			return traverseScalarTypeDefinition(node, visitor, acc)
		case 'ScalarTypeExtension':
			return traverseScalarTypeExtension(node, visitor, acc)
		case 'ObjectTypeDefinition':
			return traverseObjectTypeDefinition(node, visitor, acc)
		case 'ObjectTypeExtension':
			return traverseObjectTypeExtension(node, visitor, acc)
		case 'InterfaceTypeDefinition':
			return traverseInterfaceTypeDefinition(node, visitor, acc)
		case 'InterfaceTypeExtension':
			return traverseInterfaceTypeExtension(node, visitor, acc)
		case 'ImplementsInterfaces':
			return traverseImplementsInterfaces(node, visitor, acc)
		case 'FieldsDefinition':
			return traverseFieldsDefinition(node, visitor, acc)
		case 'FieldDefinition':
			return traverseFieldDefinition(node, visitor, acc)
		case 'ArgumentsDefinition':
			return traverseArgumentsDefinition(node, visitor, acc)
		case 'InputValueDefinition':
			return traverseInputValueDefinition(node, visitor, acc)
		case 'UnionTypeDefinition':
			return traverseUnionTypeDefinition(node, visitor, acc)
		case 'UnionTypeExtension':
			return traverseUnionTypeExtension(node, visitor, acc)
		case 'UnionMemberTypes':
			return traverseUnionMemberTypes(node, visitor, acc)
		case 'EnumTypeDefinition':
			return traverseEnumTypeDefinition(node, visitor, acc)
		case 'EnumTypeExtension':
			return traverseEnumTypeExtension(node, visitor, acc)
		case 'EnumValuesDefinition':
			return traverseEnumValuesDefinition(node, visitor, acc)
		case 'EnumValueDefinition':
			return traverseEnumValueDefinition(node, visitor, acc)
		case 'InputObjectTypeDefinition':
			return traverseInputObjectTypeDefinition(node, visitor, acc)
		case 'InputObjectTypeExtension':
			return traverseInputObjectTypeExtension(node, visitor, acc)
		case 'InputFieldsDefinition':
			return traverseInputFieldsDefinition(node, visitor, acc)
		case 'DirectiveDefinition':
			return traverseDirectiveDefinition(node, visitor, acc)
		case 'DirectiveLocations':
			return traverseDirectiveLocations(node, visitor, acc)
		case 'DirectiveLocation':
			return traverseDirectiveLocation(node, visitor, acc)
	}
}
