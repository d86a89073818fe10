/**
 * Syntax tree for GraphQL documents.
 *
 * Nodes are plain immutable records discriminated by `kind`. Leaves are the
 * lexer's tokens. A slot that can be absent once its construct has begun is
 * Recoverable rather than nullable, so the absence can still be reported.
 *
 * Node objects are never copied or merged after parsing: the semantic
 * database keys its caches on object identity.
 */

import type { SyntaxDiagnosticCode } from '@facet/diagnostics'
import type { Span } from '../core/span.ts'
import type {
	FloatValueToken,
	IntValueToken,
	NameToken,
	PunctuatorToken,
	StringValueToken,
} from '../core/tokens.ts'
import type { Recoverable as Slot } from '../parse/protocol.ts'
import type { MissingToken as MissingAt } from '../parse/stream.ts'

/** What a Missing placeholder expected, as a catalog code. */
export interface Missing {
	readonly code: SyntaxDiagnosticCode
	/** The opening delimiter when the closing one is missing */
	readonly related?: Span
}

export type MissingToken = MissingAt<Missing>

export type Recoverable<T> = Slot<T, Missing>

/** Opening token and possibly missing closing token. */
export type Delimiters = readonly [PunctuatorToken, Recoverable<PunctuatorToken>]

// =============================================================================
// DOCUMENT
// =============================================================================

export interface Document {
	readonly kind: 'Document'
	readonly definitions: readonly Definition[]
}

export type ExecutableDefinition = OperationDefinition | FragmentDefinition

export type TypeDefinition =
	| ScalarTypeDefinition
	| ObjectTypeDefinition
	| InterfaceTypeDefinition
	| UnionTypeDefinition
	| EnumTypeDefinition
	| InputObjectTypeDefinition

export type TypeExtension =
	| ScalarTypeExtension
	| ObjectTypeExtension
	| InterfaceTypeExtension
	| UnionTypeExtension
	| EnumTypeExtension
	| InputObjectTypeExtension

export type TypeSystemDefinitionOrExtension =
	| SchemaDefinition
	| SchemaExtension
	| TypeDefinition
	| TypeExtension
	| DirectiveDefinition

export type Definition = ExecutableDefinition | TypeSystemDefinitionOrExtension

// =============================================================================
// EXECUTABLE DEFINITIONS
// =============================================================================

export type OperationKind = 'query' | 'mutation' | 'subscription'

export interface OperationType {
	readonly kind: 'OperationType'
	readonly keyword: NameToken
	readonly operation: OperationKind
}

export interface OperationDefinition {
	readonly kind: 'OperationDefinition'
	/** Null for the query shorthand `{ ... }` */
	readonly operationType: OperationType | null
	readonly name: NameToken | null
	readonly variableDefinitions: VariableDefinitions | null
	readonly directives: Directives | null
	readonly selectionSet: Recoverable<SelectionSet>
}

export interface SelectionSet {
	readonly kind: 'SelectionSet'
	readonly braces: Delimiters
	readonly selections: readonly Selection[]
}

export type Selection = Field | FragmentSpread | InlineFragment

export interface Field {
	readonly kind: 'Field'
	readonly alias: Alias | null
	readonly name: Recoverable<NameToken>
	readonly arguments: Arguments | null
	readonly directives: Directives | null
	readonly selectionSet: SelectionSet | null
}

export interface Alias {
	readonly kind: 'Alias'
	readonly name: NameToken
	readonly colon: PunctuatorToken
}

export interface Arguments {
	readonly kind: 'Arguments'
	readonly parens: Delimiters
	readonly items: readonly Argument[]
}

export interface Argument {
	readonly kind: 'Argument'
	readonly name: NameToken
	readonly colon: Recoverable<PunctuatorToken>
	readonly value: Recoverable<Value>
}

export interface FragmentSpread {
	readonly kind: 'FragmentSpread'
	readonly dots: PunctuatorToken
	readonly fragmentName: NameToken
	readonly directives: Directives | null
}

export interface InlineFragment {
	readonly kind: 'InlineFragment'
	readonly dots: PunctuatorToken
	readonly typeCondition: TypeCondition | null
	readonly directives: Directives | null
	readonly selectionSet: Recoverable<SelectionSet>
}

export interface FragmentDefinition {
	readonly kind: 'FragmentDefinition'
	readonly keyword: NameToken
	readonly fragmentName: Recoverable<NameToken>
	readonly typeCondition: Recoverable<TypeCondition>
	readonly directives: Directives | null
	readonly selectionSet: Recoverable<SelectionSet>
}

export interface TypeCondition {
	readonly kind: 'TypeCondition'
	readonly on: NameToken
	readonly namedType: Recoverable<NamedType>
}

// =============================================================================
// VALUES
// =============================================================================

export type Value =
	| Variable
	| IntValue
	| FloatValue
	| StringValue
	| BooleanValue
	| NullValue
	| EnumValue
	| ListValue
	| ObjectValue

export interface Variable {
	readonly kind: 'Variable'
	readonly dollar: PunctuatorToken
	readonly name: Recoverable<NameToken>
}

export interface IntValue {
	readonly kind: 'IntValue'
	readonly token: IntValueToken
}

export interface FloatValue {
	readonly kind: 'FloatValue'
	readonly token: FloatValueToken
}

export interface StringValue {
	readonly kind: 'StringValue'
	readonly token: StringValueToken
}

export interface BooleanValue {
	readonly kind: 'BooleanValue'
	readonly token: NameToken
	readonly value: boolean
}

export interface NullValue {
	readonly kind: 'NullValue'
	readonly token: NameToken
}

export interface EnumValue {
	readonly kind: 'EnumValue'
	readonly token: NameToken
}

export interface ListValue {
	readonly kind: 'ListValue'
	readonly brackets: Delimiters
	readonly values: readonly Value[]
}

export interface ObjectValue {
	readonly kind: 'ObjectValue'
	readonly braces: Delimiters
	readonly fields: readonly ObjectField[]
}

export interface ObjectField {
	readonly kind: 'ObjectField'
	readonly name: NameToken
	readonly colon: Recoverable<PunctuatorToken>
	readonly value: Recoverable<Value>
}

// =============================================================================
// VARIABLES, TYPES, DIRECTIVES
// =============================================================================

export interface VariableDefinitions {
	readonly kind: 'VariableDefinitions'
	readonly parens: Delimiters
	readonly definitions: readonly VariableDefinition[]
}

export interface VariableDefinition {
	readonly kind: 'VariableDefinition'
	readonly variable: Variable
	readonly colon: Recoverable<PunctuatorToken>
	readonly type: Recoverable<Type>
	readonly defaultValue: DefaultValue | null
	readonly directives: Directives | null
}

export interface DefaultValue {
	readonly kind: 'DefaultValue'
	readonly eq: PunctuatorToken
	readonly value: Recoverable<Value>
}

export type Type = NamedType | ListType | NonNullType

export interface NamedType {
	readonly kind: 'NamedType'
	readonly name: NameToken
}

export interface ListType {
	readonly kind: 'ListType'
	readonly brackets: Delimiters
	readonly type: Recoverable<Type>
}

export interface NonNullType {
	readonly kind: 'NonNullType'
	readonly type: NamedType | ListType
	readonly bang: PunctuatorToken
}

export interface Directives {
	readonly kind: 'Directives'
	readonly directives: readonly Directive[]
}

export interface Directive {
	readonly kind: 'Directive'
	readonly at: PunctuatorToken
	readonly name: Recoverable<NameToken>
	readonly arguments: Arguments | null
}

// =============================================================================
// TYPE SYSTEM
// =============================================================================

export interface Description {
	readonly kind: 'Description'
	readonly token: StringValueToken
}

export interface SchemaDefinition {
	readonly kind: 'SchemaDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly directives: Directives | null
	readonly rootOperationTypes: Recoverable<RootOperationTypeDefinitions>
}

export interface SchemaExtension {
	readonly kind: 'SchemaExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly directives: Directives | null
	readonly rootOperationTypes: RootOperationTypeDefinitions | null
}

export interface RootOperationTypeDefinitions {
	readonly kind: 'RootOperationTypeDefinitions'
	readonly braces: Delimiters
	readonly definitions: Recoverable<readonly RootOperationTypeDefinition[]>
}

export interface RootOperationTypeDefinition {
	readonly kind: 'RootOperationTypeDefinition'
	readonly operationType: OperationType
	readonly colon: Recoverable<PunctuatorToken>
	readonly namedType: Recoverable<NamedType>
}

export interface ScalarTypeDefinition {
	readonly kind: 'ScalarTypeDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
}

export interface ScalarTypeExtension {
	readonly kind: 'ScalarTypeExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Recoverable<Directives>
}

export interface ObjectTypeDefinition {
	readonly kind: 'ObjectTypeDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly interfaces: ImplementsInterfaces | null
	readonly directives: Directives | null
	readonly fields: FieldsDefinition | null
}

export interface ObjectTypeExtension {
	readonly kind: 'ObjectTypeExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly interfaces: ImplementsInterfaces | null
	readonly directives: Directives | null
	readonly fields: FieldsDefinition | null
}

export interface InterfaceTypeDefinition {
	readonly kind: 'InterfaceTypeDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly interfaces: ImplementsInterfaces | null
	readonly directives: Directives | null
	readonly fields: FieldsDefinition | null
}

export interface InterfaceTypeExtension {
	readonly kind: 'InterfaceTypeExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly interfaces: ImplementsInterfaces | null
	readonly directives: Directives | null
	readonly fields: FieldsDefinition | null
}

/** `&`-separated list; the separator before each subsequent member is kept. */
export type SeparatedMember<T> = readonly [PunctuatorToken, Recoverable<T>]

export interface ImplementsInterfaces {
	readonly kind: 'ImplementsInterfaces'
	readonly keyword: NameToken
	readonly ampersand: PunctuatorToken | null
	readonly first: Recoverable<NamedType>
	readonly rest: readonly SeparatedMember<NamedType>[]
}

export interface FieldsDefinition {
	readonly kind: 'FieldsDefinition'
	readonly braces: Delimiters
	readonly definitions: readonly FieldDefinition[]
}

export interface FieldDefinition {
	readonly kind: 'FieldDefinition'
	readonly description: Description | null
	readonly name: NameToken
	readonly arguments: ArgumentsDefinition | null
	readonly colon: Recoverable<PunctuatorToken>
	readonly type: Recoverable<Type>
	readonly directives: Directives | null
}

export interface ArgumentsDefinition {
	readonly kind: 'ArgumentsDefinition'
	readonly parens: Delimiters
	readonly definitions: readonly InputValueDefinition[]
}

export interface InputValueDefinition {
	readonly kind: 'InputValueDefinition'
	readonly description: Description | null
	readonly name: NameToken
	readonly colon: Recoverable<PunctuatorToken>
	readonly type: Recoverable<Type>
	readonly defaultValue: DefaultValue | null
	readonly directives: Directives | null
}

export interface UnionTypeDefinition {
	readonly kind: 'UnionTypeDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
	readonly members: UnionMemberTypes | null
}

export interface UnionTypeExtension {
	readonly kind: 'UnionTypeExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
	readonly members: UnionMemberTypes | null
}

export interface UnionMemberTypes {
	readonly kind: 'UnionMemberTypes'
	readonly eq: PunctuatorToken
	readonly pipe: PunctuatorToken | null
	readonly first: Recoverable<NamedType>
	readonly rest: readonly SeparatedMember<NamedType>[]
}

export interface EnumTypeDefinition {
	readonly kind: 'EnumTypeDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
	readonly values: EnumValuesDefinition | null
}

export interface EnumTypeExtension {
	readonly kind: 'EnumTypeExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
	readonly values: EnumValuesDefinition | null
}

export interface EnumValuesDefinition {
	readonly kind: 'EnumValuesDefinition'
	readonly braces: Delimiters
	readonly definitions: readonly EnumValueDefinition[]
}

export interface EnumValueDefinition {
	readonly kind: 'EnumValueDefinition'
	readonly description: Description | null
	readonly enumValue: EnumValue
	readonly directives: Directives | null
}

export interface InputObjectTypeDefinition {
	readonly kind: 'InputObjectTypeDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
	readonly fields: InputFieldsDefinition | null
}

export interface InputObjectTypeExtension {
	readonly kind: 'InputObjectTypeExtension'
	readonly extend: NameToken
	readonly keyword: NameToken
	readonly name: Recoverable<NameToken>
	readonly directives: Directives | null
	readonly fields: InputFieldsDefinition | null
}

export interface InputFieldsDefinition {
	readonly kind: 'InputFieldsDefinition'
	readonly braces: Delimiters
	readonly definitions: readonly InputValueDefinition[]
}

export interface DirectiveDefinition {
	readonly kind: 'DirectiveDefinition'
	readonly description: Description | null
	readonly keyword: NameToken
	readonly at: Recoverable<PunctuatorToken>
	readonly name: Recoverable<NameToken>
	readonly arguments: ArgumentsDefinition | null
	readonly repeatable: NameToken | null
	readonly locations: Recoverable<DirectiveLocations>
}

export interface DirectiveLocations {
	readonly kind: 'DirectiveLocations'
	readonly on: NameToken
	readonly pipe: PunctuatorToken | null
	readonly first: Recoverable<DirectiveLocation>
	readonly rest: readonly SeparatedMember<DirectiveLocation>[]
}

export interface DirectiveLocation {
	readonly kind: 'DirectiveLocation'
	readonly token: NameToken
}

// =============================================================================
// NODE UNION
// =============================================================================

export type AstNode =
	| Document
	| OperationDefinition
	| OperationType
	| SelectionSet
	| Field
	| Alias
	| Arguments
	| Argument
	| FragmentSpread
	| InlineFragment
	| FragmentDefinition
	| TypeCondition
	| Variable
	| IntValue
	| FloatValue
	| StringValue
	| BooleanValue
	| NullValue
	| EnumValue
	| ListValue
	| ObjectValue
	| ObjectField
	| VariableDefinitions
	| VariableDefinition
	| DefaultValue
	| NamedType
	| ListType
	| NonNullType
	| Directives
	| Directive
	| Description
	| SchemaDefinition
	| SchemaExtension
	| RootOperationTypeDefinitions
	| RootOperationTypeDefinition
	| ScalarTypeDefinition
	| ScalarTypeExtension
	| ObjectTypeDefinition
	| ObjectTypeExtension
	| InterfaceTypeDefinition
	| InterfaceTypeExtension
	| ImplementsInterfaces
	| FieldsDefinition
	| FieldDefinition
	| ArgumentsDefinition
	| InputValueDefinition
	| UnionTypeDefinition
	| UnionTypeExtension
	| UnionMemberTypes
	| EnumTypeDefinition
	| EnumTypeExtension
	| EnumValuesDefinition
	| EnumValueDefinition
	| InputObjectTypeDefinition
	| InputObjectTypeExtension
	| InputFieldsDefinition
	| DirectiveDefinition
	| DirectiveLocations
	| DirectiveLocation

export type NodeKind = AstNode['kind']

export type NodeOfKind<K extends NodeKind> = Extract<AstNode, { readonly kind: K }>
