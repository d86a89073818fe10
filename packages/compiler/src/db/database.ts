/**
 * Semantic database: name tables plus identity-keyed resolutions.
 *
 * A Database is built once from a list of documents and never changes
 * afterwards. Name lookups return every match in insertion order, so the
 * first entry is the one in effect and the rest are duplicates. Absent
 * names return empty lists.
 */

import type * as Ast from '../ast/nodes.ts'
import { presentValue } from '../parse/protocol.ts'
import { type Inference, InferenceView } from './inference.ts'
import { inferDocument } from './inference-builder.ts'
import { indexDocuments, type Tables } from './indexer.ts'

const DEFAULT_ROOT_TYPES: Readonly<Record<Ast.OperationKind, string>> = {
	mutation: 'Mutation',
	query: 'Query',
	subscription: 'Subscription',
}

type TypeNode = Ast.TypeDefinition | Ast.TypeExtension

export class Database {
	private readonly inferences = new Map<Ast.Document, Inference>()
	readonly inference: InferenceView

	private constructor(
		readonly documents: readonly Ast.Document[],
		private readonly tables: Tables
	) {
		this.inference = new InferenceView(this.inferences)
	}

	/**
	 * Indexes every document, then resolves references document by document.
	 * Resolutions found in `reuse` are taken as they are instead of being
	 * inferred again; the caller guarantees nothing they depend on changed.
	 */
	static fromDocuments(
		documents: readonly Ast.Document[],
		reuse: ReadonlyMap<Ast.Document, Inference> = new Map()
	): Database {
		const database = new Database(documents, indexDocuments(documents))
		for (const document of documents) {
			if (database.inferences.has(document)) continue
			database.inferences.set(document, reuse.get(document) ?? inferDocument(database, document))
		}
		return database
	}

	/** Resolutions recorded for one document of this snapshot. */
	inferenceFor(document: Ast.Document): Inference | undefined {
		return this.inferences.get(document)
	}

	// ===== Definitions =====

	typeDefinitions(): Ast.TypeDefinition[] {
		return [...this.tables.typeDefinitions.values()]
	}

	typeDefinitionsByName(name: string): readonly Ast.TypeDefinition[] {
		return this.tables.typeDefinitions.get(name)
	}

	typeExtensions(): Ast.TypeExtension[] {
		return [...this.tables.typeExtensions.values()]
	}

	typeExtensionsByName(name: string): readonly Ast.TypeExtension[] {
		return this.tables.typeExtensions.get(name)
	}

	directiveDefinitions(): Ast.DirectiveDefinition[] {
		return [...this.tables.directiveDefinitions.values()]
	}

	directiveDefinitionsByName(name: string): readonly Ast.DirectiveDefinition[] {
		return this.tables.directiveDefinitions.get(name)
	}

	operations(): Ast.OperationDefinition[] {
		return [...this.tables.operations.values(), ...this.tables.anonymousOperations]
	}

	operationsByName(name: string): readonly Ast.OperationDefinition[] {
		return this.tables.operations.get(name)
	}

	anonymousOperations(): readonly Ast.OperationDefinition[] {
		return this.tables.anonymousOperations
	}

	fragments(): Ast.FragmentDefinition[] {
		return [...this.tables.fragments.values()]
	}

	fragmentsByName(name: string): readonly Ast.FragmentDefinition[] {
		return this.tables.fragments.get(name)
	}

	schemaDefinitions(): readonly Ast.SchemaDefinition[] {
		return this.tables.schemaDefinitions
	}

	schemaExtensions(): readonly Ast.SchemaExtension[] {
		return this.tables.schemaExtensions
	}

	/** Directives applied to schema definitions, then to schema extensions. */
	schemaDirectives(): Ast.Directive[] {
		const directives: Ast.Directive[] = []
		for (const schema of [...this.tables.schemaDefinitions, ...this.tables.schemaExtensions]) {
			if (schema.directives !== null) directives.push(...schema.directives.directives)
		}
		return directives
	}

	// ===== Members =====

	fieldDefinitions(type: string): readonly Ast.FieldDefinition[] {
		return this.tables.fieldDefinitions.members(type)
	}

	fieldDefinitionsByName(type: string, name: string): readonly Ast.FieldDefinition[] {
		return this.tables.fieldDefinitions.membersByName(type, name)
	}

	inputValueDefinitions(type: string): readonly Ast.InputValueDefinition[] {
		return this.tables.inputValueDefinitions.members(type)
	}

	inputValueDefinitionsByName(type: string, name: string): readonly Ast.InputValueDefinition[] {
		return this.tables.inputValueDefinitions.membersByName(type, name)
	}

	enumValueDefinitions(type: string): readonly Ast.EnumValueDefinition[] {
		return this.tables.enumValueDefinitions.members(type)
	}

	enumValueDefinitionsByName(type: string, name: string): readonly Ast.EnumValueDefinition[] {
		return this.tables.enumValueDefinitions.membersByName(type, name)
	}

	unionMemberTypes(type: string): readonly Ast.NamedType[] {
		return this.tables.unionMemberTypes.members(type)
	}

	unionMemberTypesByName(type: string, name: string): readonly Ast.NamedType[] {
		return this.tables.unionMemberTypes.membersByName(type, name)
	}

	implementedInterfaces(type: string): readonly Ast.NamedType[] {
		return this.tables.implementedInterfaces.members(type)
	}

	/** Names of the types declaring that they implement `type`. */
	interfaceImplementations(type: string): readonly string[] {
		return this.tables.interfaceImplementations.get(type)
	}

	/** Object types a value of `type` can be at run time. */
	possibleTypes(type: string): string[] {
		switch (this.typeKind(type)) {
			case 'Object':
				return [type]
			case 'Union':
				return unique(this.unionMemberTypes(type).map((member) => member.name.text))
			case 'Interface':
				return unique(
					this.interfaceImplementations(type).filter((name) => this.isObjectType(name))
				)
			default:
				return []
		}
	}

	/**
	 * Root type for an operation kind: the schema definition's entry, or the
	 * conventional name when no schema is defined. Null when a schema is
	 * defined without that operation.
	 */
	rootOperationType(kind: Ast.OperationKind): string | null {
		const schemas = [...this.tables.schemaDefinitions, ...this.tables.schemaExtensions]
		if (schemas.length === 0) return DEFAULT_ROOT_TYPES[kind]
		for (const schema of schemas) {
			for (const entry of rootEntries(schema)) {
				if (entry.operationType.operation === kind && entry.namedType.kind === 'Present') {
					return entry.namedType.value.name.text
				}
			}
		}
		return null
	}

	// ===== Predicates =====

	typeExists(name: string): boolean {
		return this.tables.typeDefinitions.has(name)
	}

	isObjectType(name: string): boolean {
		return this.typeKind(name) === 'Object'
	}

	/** Scalars, enums and input objects. */
	isInputType(name: string): boolean {
		const kind = this.typeKind(name)
		return kind === 'Scalar' || kind === 'Enum' || kind === 'InputObject'
	}

	/** Every kind except input objects. */
	isOutputType(name: string): boolean {
		const kind = this.typeKind(name)
		return kind !== null && kind !== 'InputObject'
	}

	/** Objects, interfaces and unions. */
	isCompositeType(name: string): boolean {
		const kind = this.typeKind(name)
		return kind === 'Object' || kind === 'Interface' || kind === 'Union'
	}

	isUnionMember(type: string, union: string): boolean {
		return this.unionMemberTypesByName(union, type).length > 0
	}

	implementsInterface(type: string, iface: string): boolean {
		return this.tables.implementedInterfaces.membersByName(type, iface).length > 0
	}

	/** Kind of the first definition of `name`, or of its first extension. */
	typeKind(name: string): TypeKind | null {
		const node: TypeNode | undefined =
			this.tables.typeDefinitions.first(name) ?? this.tables.typeExtensions.first(name)
		return node === undefined ? null : kindOf(node)
	}
}

export type TypeKind = 'Scalar' | 'Object' | 'Interface' | 'Union' | 'Enum' | 'InputObject'

function kindOf(node: TypeNode): TypeKind {
	switch (node.kind) {
		case 'ScalarTypeDefinition':
		case 'ScalarTypeExtension':
			return 'Scalar'
		case 'ObjectTypeDefinition':
		case 'ObjectTypeExtension':
			return 'Object'
		case 'InterfaceTypeDefinition':
		case 'InterfaceTypeExtension':
			return 'Interface'
		case 'UnionTypeDefinition':
		case 'UnionTypeExtension':
			return 'Union'
		case 'EnumTypeDefinition':
		case 'EnumTypeExtension':
			return 'Enum'
		case 'InputObjectTypeDefinition':
		case 'InputObjectTypeExtension':
			return 'InputObject'
	}
}

function rootEntries(
	schema: Ast.SchemaDefinition | Ast.SchemaExtension
): readonly Ast.RootOperationTypeDefinition[] {
	const roots =
		schema.kind === 'SchemaDefinition'
			? presentValue(schema.rootOperationTypes)
			: schema.rootOperationTypes
	if (roots === null) return []
	return presentValue(roots.definitions) ?? []
}

function unique(names: readonly string[]): string[] {
	return [...new Set(names)]
}
