/**
 * Index pass: files every definition under its name.
 *
 * Runs as a traversal whose accumulator is the set of name tables. Members
 * of object-like types (fields, input values, enum values, union members,
 * implemented interfaces) are filed a second time under their owning type.
 */

import type * as Ast from '../ast/nodes.ts'
import { traverseDocument, type Visitor } from '../ast/visit.ts'
import { LayeredBindings, MultiMap } from './multimap.ts'
import { nameOf } from './types.ts'

export interface Tables {
	readonly typeDefinitions: MultiMap<string, Ast.TypeDefinition>
	readonly typeExtensions: MultiMap<string, Ast.TypeExtension>
	readonly directiveDefinitions: MultiMap<string, Ast.DirectiveDefinition>
	readonly operations: MultiMap<string, Ast.OperationDefinition>
	readonly anonymousOperations: Ast.OperationDefinition[]
	readonly fragments: MultiMap<string, Ast.FragmentDefinition>
	readonly schemaDefinitions: Ast.SchemaDefinition[]
	readonly schemaExtensions: Ast.SchemaExtension[]
	readonly fieldDefinitions: LayeredBindings<Ast.FieldDefinition>
	readonly inputValueDefinitions: LayeredBindings<Ast.InputValueDefinition>
	readonly enumValueDefinitions: LayeredBindings<Ast.EnumValueDefinition>
	readonly unionMemberTypes: LayeredBindings<Ast.NamedType>
	readonly implementedInterfaces: LayeredBindings<Ast.NamedType>
	/** Interface name to the names of the types implementing it */
	readonly interfaceImplementations: MultiMap<string, string>
}

export function createTables(): Tables {
	return {
		anonymousOperations: [],
		directiveDefinitions: new MultiMap(),
		enumValueDefinitions: new LayeredBindings(),
		fieldDefinitions: new LayeredBindings(),
		fragments: new MultiMap(),
		implementedInterfaces: new LayeredBindings(),
		inputValueDefinitions: new LayeredBindings(),
		interfaceImplementations: new MultiMap(),
		operations: new MultiMap(),
		schemaDefinitions: [],
		schemaExtensions: [],
		typeDefinitions: new MultiMap(),
		typeExtensions: new MultiMap(),
		unionMemberTypes: new LayeredBindings(),
	}
}

// =============================================================================
// MEMBERS
// =============================================================================

function separatedMembers(
	first: Ast.Recoverable<Ast.NamedType>,
	rest: readonly Ast.SeparatedMember<Ast.NamedType>[]
): Ast.NamedType[] {
	const members: Ast.NamedType[] = []
	if (first.kind === 'Present') members.push(first.value)
	for (const [, member] of rest) {
		if (member.kind === 'Present') members.push(member.value)
	}
	return members
}

function indexFields(
	tables: Tables,
	type: string,
	fields: Ast.FieldsDefinition | null,
	fromExtension: boolean
): void {
	if (fields === null) return
	for (const field of fields.definitions) {
		tables.fieldDefinitions.insert(type, field.name.text, field, fromExtension)
	}
}

function indexInterfaces(
	tables: Tables,
	type: string,
	interfaces: Ast.ImplementsInterfaces | null,
	fromExtension: boolean
): void {
	if (interfaces === null) return
	for (const named of separatedMembers(interfaces.first, interfaces.rest)) {
		tables.implementedInterfaces.insert(type, named.name.text, named, fromExtension)
		tables.interfaceImplementations.insert(named.name.text, type)
	}
}

function indexObjectLike(
	tables: Tables,
	node:
		| Ast.ObjectTypeDefinition
		| Ast.ObjectTypeExtension
		| Ast.InterfaceTypeDefinition
		| Ast.InterfaceTypeExtension,
	fromExtension: boolean
): void {
	const name = nameOf(node.name)
	if (name === null) return
	indexInterfaces(tables, name, node.interfaces, fromExtension)
	indexFields(tables, name, node.fields, fromExtension)
}

function indexUnion(
	tables: Tables,
	node: Ast.UnionTypeDefinition | Ast.UnionTypeExtension,
	fromExtension: boolean
): void {
	const name = nameOf(node.name)
	if (name === null || node.members === null) return
	for (const named of separatedMembers(node.members.first, node.members.rest)) {
		tables.unionMemberTypes.insert(name, named.name.text, named, fromExtension)
	}
}

function indexEnum(
	tables: Tables,
	node: Ast.EnumTypeDefinition | Ast.EnumTypeExtension,
	fromExtension: boolean
): void {
	const name = nameOf(node.name)
	if (name === null || node.values === null) return
	for (const value of node.values.definitions) {
		tables.enumValueDefinitions.insert(name, value.enumValue.token.text, value, fromExtension)
	}
}

function indexInputObject(
	tables: Tables,
	node: Ast.InputObjectTypeDefinition | Ast.InputObjectTypeExtension,
	fromExtension: boolean
): void {
	const name = nameOf(node.name)
	if (name === null || node.fields === null) return
	for (const field of node.fields.definitions) {
		tables.inputValueDefinitions.insert(name, field.name.text, field, fromExtension)
	}
}

// =============================================================================
// DEFINITIONS
// =============================================================================

function fileType(tables: Tables, node: Ast.TypeDefinition): void {
	const name = nameOf(node.name)
	if (name !== null) tables.typeDefinitions.insert(name, node)
}

function fileExtension(tables: Tables, node: Ast.TypeExtension): void {
	const name = nameOf(node.name)
	if (name !== null) tables.typeExtensions.insert(name, node)
}

const Index: Visitor<Tables> = {
	visitDirectiveDefinition(node, tables) {
		const name = nameOf(node.name)
		if (name !== null) tables.directiveDefinitions.insert(name, node)
	},
	visitEnumTypeDefinition(node, tables) {
		fileType(tables, node)
		indexEnum(tables, node, false)
	},
	visitEnumTypeExtension(node, tables) {
		fileExtension(tables, node)
		indexEnum(tables, node, true)
	},
	visitFragmentDefinition(node, tables) {
		const name = nameOf(node.fragmentName)
		if (name !== null) tables.fragments.insert(name, node)
	},
	visitInputObjectTypeDefinition(node, tables) {
		fileType(tables, node)
		indexInputObject(tables, node, false)
	},
	visitInputObjectTypeExtension(node, tables) {
		fileExtension(tables, node)
		indexInputObject(tables, node, true)
	},
	visitInterfaceTypeDefinition(node, tables) {
		fileType(tables, node)
		indexObjectLike(tables, node, false)
	},
	visitInterfaceTypeExtension(node, tables) {
		fileExtension(tables, node)
		indexObjectLike(tables, node, true)
	},
	visitObjectTypeDefinition(node, tables) {
		fileType(tables, node)
		indexObjectLike(tables, node, false)
	},
	visitObjectTypeExtension(node, tables) {
		fileExtension(tables, node)
		indexObjectLike(tables, node, true)
	},
	visitOperationDefinition(node, tables) {
		if (node.name === null) tables.anonymousOperations.push(node)
		else tables.operations.insert(node.name.text, node)
	},
	visitScalarTypeDefinition(node, tables) {
		fileType(tables, node)
	},
	visitScalarTypeExtension(node, tables) {
		fileExtension(tables, node)
	},
	visitSchemaDefinition(node, tables) {
		tables.schemaDefinitions.push(node)
	},
	visitSchemaExtension(node, tables) {
		tables.schemaExtensions.push(node)
	},
	visitUnionTypeDefinition(node, tables) {
		fileType(tables, node)
		indexUnion(tables, node, false)
	},
	visitUnionTypeExtension(node, tables) {
		fileExtension(tables, node)
		indexUnion(tables, node, true)
	},
}

export function indexDocuments(documents: readonly Ast.Document[]): Tables {
	const tables = createTables()
	for (const document of documents) traverseDocument(document, Index, tables)
	return tables
}
