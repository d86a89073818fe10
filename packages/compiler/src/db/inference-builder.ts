/**
 * InferenceBuilder pass: resolves references inside one document.
 *
 * Walks the tree with a stack of type scopes. An operation pushes its root
 * type, a fragment or typed inline fragment pushes its type condition, and
 * a field pushes its return type. A scope is null once a lookup failed, so
 * nested selections resolve to nothing instead of to the wrong type.
 * Values are typed from a second stack of expectations, filled by
 * arguments, object fields, variable definitions and input value
 * definitions.
 */

import type * as Ast from '../ast/nodes.ts'
import { traverseDocument, type Visitor } from '../ast/visit.ts'
import type { Database } from './database.ts'
import { Inference } from './inference.ts'
import { listItemType, namedTypeOf, nameOf } from './types.ts'

interface Expectation {
	readonly type: Ast.Type
	readonly defaultValue: Ast.Value | null
}

export interface InferenceState {
	readonly database: Database
	readonly inference: Inference
	readonly scopes: (string | null)[]
	readonly expectations: (Expectation | null)[]
	/** Argument definitions for the innermost argument list */
	readonly argumentScopes: (Ast.ArgumentsDefinition | null)[]
	/** Input object type for the innermost object literal */
	readonly inputObjects: (string | null)[]
	definition: Ast.Definition | null
}

function top<T>(stack: readonly (T | null)[]): T | null {
	return stack[stack.length - 1] ?? null
}

/** Records that the current definition resolved something through `type`. */
function reference(state: InferenceState, type: string): void {
	if (state.definition !== null) state.inference.referencedTypes.track(state.definition, type)
}

function enterScope(
	state: InferenceState,
	type: string | null,
	selectionSet: Ast.SelectionSet | null
): void {
	state.scopes.push(type)
	if (type === null) return
	reference(state, type)
	if (selectionSet !== null) state.inference.typeBySelectionSet.insert(selectionSet, type)
}

function exitScope(state: InferenceState): void {
	state.scopes.pop()
}

function selectionSetOf(slot: Ast.Recoverable<Ast.SelectionSet>): Ast.SelectionSet | null {
	return slot.kind === 'Present' ? slot.value : null
}

function conditionType(condition: Ast.TypeCondition | null): string | null {
	if (condition === null || condition.namedType.kind !== 'Present') return null
	return condition.namedType.value.name.text
}

function expect(state: InferenceState, definition: Ast.InputValueDefinition | null): void {
	if (definition === null || definition.type.kind !== 'Present') {
		state.expectations.push(null)
		return
	}
	const defaultValue = definition.defaultValue?.value
	state.expectations.push({
		defaultValue: defaultValue?.kind === 'Present' ? defaultValue.value : null,
		type: definition.type.value,
	})
}

export const InferenceBuilder: Visitor<InferenceState> = {
	visitDefinition(node, state) {
		state.definition = node
	},

	// ===== Scopes =====

	visitOperationDefinition(node, state) {
		const root = state.database.rootOperationType(node.operationType?.operation ?? 'query')
		enterScope(state, root, selectionSetOf(node.selectionSet))
	},
	postVisitOperationDefinition(_node, state) {
		exitScope(state)
	},
	visitFragmentDefinition(node, state) {
		const type =
			node.typeCondition.kind === 'Present' ? conditionType(node.typeCondition.value) : null
		enterScope(state, type, selectionSetOf(node.selectionSet))
	},
	postVisitFragmentDefinition(_node, state) {
		exitScope(state)
	},
	visitInlineFragment(node, state) {
		const type =
			node.typeCondition === null ? top(state.scopes) : conditionType(node.typeCondition)
		enterScope(state, type, selectionSetOf(node.selectionSet))
	},
	postVisitInlineFragment(_node, state) {
		exitScope(state)
	},
	visitField(node, state) {
		const scope = top(state.scopes)
		const name = nameOf(node.name)
		const definition =
			scope === null || name === null
				? undefined
				: state.database.fieldDefinitionsByName(scope, name)[0]
		if (definition === undefined) {
			state.scopes.push(null)
			return
		}
		state.inference.fieldDefinitionByField.insert(node, definition)
		if (node.arguments !== null && definition.arguments !== null) {
			state.inference.definitionForArguments.insert(node.arguments, definition.arguments)
		}
		const type = definition.type.kind === 'Present' ? namedTypeOf(definition.type.value) : null
		enterScope(state, type, node.selectionSet)
	},
	postVisitField(_node, state) {
		exitScope(state)
	},

	// ===== References =====

	visitDirective(node, state) {
		const name = nameOf(node.name)
		const definition =
			name === null ? undefined : state.database.directiveDefinitionsByName(name)[0]
		if (definition === undefined) return
		state.inference.definitionForDirective.insert(node, definition)
		if (node.arguments !== null && definition.arguments !== null) {
			state.inference.definitionForArguments.insert(node.arguments, definition.arguments)
		}
	},
	visitFragmentSpread(node, state) {
		const fragment = state.database.fragmentsByName(node.fragmentName.text)[0]
		if (fragment === undefined) return
		state.inference.fragmentForSpread.insert(node, fragment)
		state.inference.fragmentSpreads.track(fragment, node)
	},

	// ===== Arguments and values =====

	visitArguments(node, state) {
		state.argumentScopes.push(state.inference.definitionForArguments.get(node) ?? null)
	},
	postVisitArguments(_node, state) {
		state.argumentScopes.pop()
	},
	visitArgument(node, state) {
		const definitions = top(state.argumentScopes)
		const definition =
			definitions?.definitions.find((candidate) => candidate.name.text === node.name.text) ??
			null
		if (definition !== null) state.inference.definitionForArgument.insert(node, definition)
		expect(state, definition)
	},
	postVisitArgument(_node, state) {
		state.expectations.pop()
	},
	visitValue(node, state) {
		const expectation = top(state.expectations)
		if (expectation === null) return
		state.inference.typesForValues.insert(node, expectation.type)
		if (expectation.defaultValue !== null) {
			state.inference.defaultValueForValues.insert(node, expectation.defaultValue)
		}
	},
	visitListValue(_node, state) {
		const expectation = top(state.expectations)
		const item = expectation === null ? null : listItemType(expectation.type)
		state.expectations.push(item === null ? null : { defaultValue: null, type: item })
	},
	postVisitListValue(_node, state) {
		state.expectations.pop()
	},
	visitObjectValue(_node, state) {
		const expectation = top(state.expectations)
		const type = expectation === null ? null : namedTypeOf(expectation.type)
		if (type !== null) reference(state, type)
		state.inputObjects.push(type)
	},
	postVisitObjectValue(_node, state) {
		state.inputObjects.pop()
	},
	visitObjectField(node, state) {
		const type = top(state.inputObjects)
		const definition =
			type === null
				? undefined
				: state.database.inputValueDefinitionsByName(type, node.name.text)[0]
		expect(state, definition ?? null)
	},
	postVisitObjectField(_node, state) {
		state.expectations.pop()
	},
	visitVariableDefinition(node, state) {
		state.expectations.push(
			node.type.kind === 'Present' ? { defaultValue: null, type: node.type.value } : null
		)
	},
	postVisitVariableDefinition(_node, state) {
		state.expectations.pop()
	},
	visitInputValueDefinition(node, state) {
		state.expectations.push(
			node.type.kind === 'Present' ? { defaultValue: null, type: node.type.value } : null
		)
	},
	postVisitInputValueDefinition(_node, state) {
		state.expectations.pop()
	},
}

export function inferDocument(database: Database, document: Ast.Document): Inference {
	const state: InferenceState = {
		argumentScopes: [],
		database,
		definition: null,
		expectations: [],
		inference: new Inference(),
		inputObjects: [],
		scopes: [],
	}
	traverseDocument(document, InferenceBuilder, state)
	return state.inference
}
