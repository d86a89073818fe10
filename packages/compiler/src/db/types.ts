import type * as Ast from '../ast/nodes.ts'
import type { NameToken } from '../core/tokens.ts'

export function nameOf(name: Ast.Recoverable<NameToken>): string | null {
	return name.kind === 'Present' ? name.value.text : null
}

/** Name of the innermost named type, through lists and non-null wrappers. */
export function namedTypeOf(type: Ast.Type): string | null {
	switch (type.kind) {
		case 'NamedType':
			return type.name.text
		case 'NonNullType':
			return namedTypeOf(type.type)
		case 'ListType':
			return type.type.kind === 'Present' ? namedTypeOf(type.type.value) : null
	}
}

/** Item type of a list type, looking through one non-null wrapper. */
export function listItemType(type: Ast.Type): Ast.Type | null {
	const nullable = type.kind === 'NonNullType' ? type.type : type
	if (nullable.kind !== 'ListType') return null
	return nullable.type.kind === 'Present' ? nullable.type.value : null
}

/** The name a top-level definition is indexed under, if it has one. */
export function definitionName(definition: Ast.Definition): string | null {
	switch (definition.kind) {
		case 'OperationDefinition':
			return definition.name?.text ?? null
		case 'FragmentDefinition':
			return nameOf(definition.fragmentName)
		case 'SchemaDefinition':
		case 'SchemaExtension':
			return null
		default:
			return nameOf(definition.name)
	}
}

export function isTypeDefinition(definition: Ast.Definition): definition is Ast.TypeDefinition {
	switch (definition.kind) {
		case 'ScalarTypeDefinition':
		case 'ObjectTypeDefinition':
		case 'InterfaceTypeDefinition':
		case 'UnionTypeDefinition':
		case 'EnumTypeDefinition':
		case 'InputObjectTypeDefinition':
			return true
		default:
			return false
	}
}

export function isTypeExtension(definition: Ast.Definition): definition is Ast.TypeExtension {
	switch (definition.kind) {
		case 'ScalarTypeExtension':
		case 'ObjectTypeExtension':
		case 'InterfaceTypeExtension':
		case 'UnionTypeExtension':
		case 'EnumTypeExtension':
		case 'InputObjectTypeExtension':
			return true
		default:
			return false
	}
}
