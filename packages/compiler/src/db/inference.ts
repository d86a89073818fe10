import type * as Ast from '../ast/nodes.ts'
import { Inferred, InferredMany, type Lookup, type LookupMany } from './inferred.ts'

/** Resolutions recorded for the nodes of one document. */
export class Inference {
	readonly fieldDefinitionByField = new Inferred<Ast.Field, Ast.FieldDefinition>()
	/** Name of the type a selection set selects from */
	readonly typeBySelectionSet = new Inferred<Ast.SelectionSet, string>()
	readonly definitionForArguments = new Inferred<Ast.Arguments, Ast.ArgumentsDefinition>()
	readonly definitionForArgument = new Inferred<Ast.Argument, Ast.InputValueDefinition>()
	/** Expected type of a value literal */
	readonly typesForValues = new Inferred<Ast.Value, Ast.Type>()
	/** Declared default of the input value a literal is written for */
	readonly defaultValueForValues = new Inferred<Ast.Value, Ast.Value>()
	readonly definitionForDirective = new Inferred<Ast.Directive, Ast.DirectiveDefinition>()
	readonly fragmentForSpread = new Inferred<Ast.FragmentSpread, Ast.FragmentDefinition>()
	readonly fragmentSpreads = new InferredMany<Ast.FragmentDefinition, Ast.FragmentSpread>()
	/** Type names each top-level definition resolved through */
	readonly referencedTypes = new InferredMany<Ast.Definition, string>()
}

function lookup<K extends object, V>(
	inferences: ReadonlyMap<Ast.Document, Inference>,
	select: (inference: Inference) => Inferred<K, V>
): Lookup<K, V> {
	return {
		get(node) {
			for (const inference of inferences.values()) {
				const value = select(inference).get(node)
				if (value !== undefined) return value
			}
			return undefined
		},
	}
}

function lookupMany<K extends object, V>(
	inferences: ReadonlyMap<Ast.Document, Inference>,
	select: (inference: Inference) => InferredMany<K, V>
): LookupMany<K, V> {
	return {
		get(node) {
			const values: V[] = []
			for (const inference of inferences.values()) values.push(...select(inference).get(node))
			return values
		},
	}
}

/** Read-only view over the resolutions of every document in a snapshot. */
export class InferenceView {
	readonly fieldDefinitionByField: Lookup<Ast.Field, Ast.FieldDefinition>
	readonly typeBySelectionSet: Lookup<Ast.SelectionSet, string>
	readonly definitionForArguments: Lookup<Ast.Arguments, Ast.ArgumentsDefinition>
	readonly definitionForArgument: Lookup<Ast.Argument, Ast.InputValueDefinition>
	readonly typesForValues: Lookup<Ast.Value, Ast.Type>
	readonly defaultValueForValues: Lookup<Ast.Value, Ast.Value>
	readonly definitionForDirective: Lookup<Ast.Directive, Ast.DirectiveDefinition>
	readonly fragmentForSpread: Lookup<Ast.FragmentSpread, Ast.FragmentDefinition>
	/** Spreads of a fragment across all documents */
	readonly fragmentSpreads: LookupMany<Ast.FragmentDefinition, Ast.FragmentSpread>

	constructor(inferences: ReadonlyMap<Ast.Document, Inference>) {
		this.fieldDefinitionByField = lookup(inferences, (i) => i.fieldDefinitionByField)
		this.typeBySelectionSet = lookup(inferences, (i) => i.typeBySelectionSet)
		this.definitionForArguments = lookup(inferences, (i) => i.definitionForArguments)
		this.definitionForArgument = lookup(inferences, (i) => i.definitionForArgument)
		this.typesForValues = lookup(inferences, (i) => i.typesForValues)
		this.defaultValueForValues = lookup(inferences, (i) => i.defaultValueForValues)
		this.definitionForDirective = lookup(inferences, (i) => i.definitionForDirective)
		this.fragmentForSpread = lookup(inferences, (i) => i.fragmentForSpread)
		this.fragmentSpreads = lookupMany(inferences, (i) => i.fragmentSpreads)
	}
}
