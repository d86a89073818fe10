import type * as Ast from '../ast/nodes.ts'
import { traverseDefinition, type Visitor } from '../ast/visit.ts'
import { definitionName } from '../db/types.ts'

/** A name one definition can provide and others can depend on. */
export type Dependency =
	| { readonly kind: 'Query' }
	| { readonly kind: 'Mutation' }
	| { readonly kind: 'Subscription' }
	| { readonly kind: 'Schema' }
	| { readonly kind: 'Type'; readonly name: string }
	| { readonly kind: 'Directive'; readonly name: string }
	| { readonly kind: 'Fragment'; readonly name: string }

export const Dependency = {
	Mutation: { kind: 'Mutation' },
	Query: { kind: 'Query' },
	Schema: { kind: 'Schema' },
	Subscription: { kind: 'Subscription' },
	directive: (name: string): Dependency => ({ kind: 'Directive', name }),
	fragment: (name: string): Dependency => ({ kind: 'Fragment', name }),
	type: (name: string): Dependency => ({ kind: 'Type', name }),
} as const satisfies Record<string, Dependency | ((name: string) => Dependency)>

/** Stable string form, e.g. `Type:User` or `Schema`. */
export function dependencyKey(dependency: Dependency): string {
	return 'name' in dependency ? `${dependency.kind}:${dependency.name}` : dependency.kind
}

const ROOT_DEPENDENCIES: Readonly<Record<Ast.OperationKind, Dependency>> = {
	mutation: Dependency.Mutation,
	query: Dependency.Query,
	subscription: Dependency.Subscription,
}

/** What a top-level definition provides. Operations provide nothing. */
export function productOf(definition: Ast.Definition): Dependency | null {
	switch (definition.kind) {
		case 'OperationDefinition':
			return null
		case 'SchemaDefinition':
		case 'SchemaExtension':
			return Dependency.Schema
		case 'FragmentDefinition': {
			const name = definitionName(definition)
			return name === null ? null : Dependency.fragment(name)
		}
		case 'DirectiveDefinition': {
			const name = definitionName(definition)
			return name === null ? null : Dependency.directive(name)
		}
		default: {
			const name = definitionName(definition)
			return name === null ? null : Dependency.type(name)
		}
	}
}

const Tracker: Visitor<Map<string, Dependency>> = {
	visitDirective(node, consumed) {
		if (node.name.kind === 'Present') add(consumed, Dependency.directive(node.name.value.text))
	},
	visitFragmentSpread(node, consumed) {
		add(consumed, Dependency.fragment(node.fragmentName.text))
	},
	visitNamedType(node, consumed) {
		add(consumed, Dependency.type(node.name.text))
	},
	visitOperationDefinition(node, consumed) {
		add(consumed, ROOT_DEPENDENCIES[node.operationType?.operation ?? 'query'])
		add(consumed, Dependency.Schema)
	},
}

function add(consumed: Map<string, Dependency>, dependency: Dependency): void {
	consumed.set(dependencyKey(dependency), dependency)
}

/** Everything a definition references, except what it provides itself. */
export function consumesOf(definition: Ast.Definition): Dependency[] {
	const consumed = new Map<string, Dependency>()
	traverseDefinition(definition, Tracker, consumed)
	const product = productOf(definition)
	if (product !== null) consumed.delete(dependencyKey(product))
	return [...consumed.values()]
}
