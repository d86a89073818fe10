/**
 * Incremental workspace: a set of documents, their syntax errors, and the
 * current Database snapshot.
 *
 * Every top-level definition gets a DefinitionId registered in a DepGraph
 * with what it provides and what it references. Each edit returns the keys
 * of the documents whose resolutions it invalidated; the next rebuild()
 * re-infers those documents and reuses the resolutions of all others.
 */

import { collectErrors } from '../ast/errors.ts'
import type * as Ast from '../ast/nodes.ts'
import type { Diagnostic } from '../core/diagnostics.ts'
import { type SourceId, SourceMap } from '../core/source.ts'
import { Database } from '../db/database.ts'
import type { Inference } from '../db/inference.ts'
import { DepGraph } from '../deps/depgraph.ts'
import { consumesOf, Dependency, dependencyKey, productOf } from '../deps/dependency.ts'
import { type ParseOutput, parse } from '../grammar/document.ts'
import { BUILTINS_KEY, builtinsSource } from './builtins.ts'

export type DefinitionId = number & { readonly __brand: 'DefinitionId' }

export function definitionId(n: number): DefinitionId {
	return n as DefinitionId
}

export interface DocumentOptions {
	/** Part of the language rather than of the user's sources */
	readonly isBuiltin?: boolean
}

export interface WorkspaceDocument {
	readonly key: string
	readonly sourceId: SourceId
	readonly text: string
	readonly isBuiltin: boolean
	readonly parsed: ParseOutput<Ast.Document>
	readonly diagnostics: readonly Diagnostic[]
	/** Parallel to `parsed.document.definitions` */
	readonly definitions: readonly DefinitionId[]
}

export class Workspace {
	private readonly sources = new SourceMap<string>()
	private readonly documents = new Map<SourceId, WorkspaceDocument>()
	private readonly owners = new Map<DefinitionId, SourceId>()
	private readonly graph = new DepGraph<DefinitionId, Dependency>(dependencyKey)
	private readonly dirty = new Set<SourceId>()
	private snapshot: Database = Database.fromDocuments([])
	private nextDefinition = 0

	/** A workspace holding the built-in scalars and directives. */
	static withBuiltins(): Workspace {
		const workspace = new Workspace()
		workspace.addDocument(BUILTINS_KEY, builtinsSource(), { isBuiltin: true })
		workspace.rebuild()
		return workspace
	}

	/** Snapshot from the last rebuild(). */
	get database(): Database {
		return this.snapshot
	}

	/**
	 * Parses and registers a document. Adding a key that is already present
	 * replaces it. Returns the keys of the invalidated documents, including
	 * this one.
	 */
	addDocument(key: string, text: string, options: DocumentOptions = {}): Set<string> {
		const source = this.sources.getOrInsert(key)
		const invalidated = this.documents.has(source)
			? this.unregister(source)
			: new Set<DefinitionId>()

		const parsed = parse(source, text)
		const definitions = parsed.document.definitions.map((definition) =>
			this.register(source, definition, invalidated)
		)
		this.documents.set(source, {
			definitions,
			diagnostics: collectErrors(parsed),
			isBuiltin: options.isBuiltin ?? false,
			key,
			parsed,
			sourceId: source,
			text,
		})

		const keys = this.keysOf(invalidated)
		keys.add(key)
		this.dirty.add(source)
		return keys
	}

	replaceDocument(key: string, text: string, options: DocumentOptions = {}): Set<string> {
		return this.addDocument(key, text, options)
	}

	/** Returns the keys of the invalidated documents, including this one. */
	removeDocument(key: string): Set<string> {
		const source = this.sources.get(key)
		if (source === undefined || !this.documents.has(source)) return new Set()
		const invalidated = this.unregister(source)
		this.documents.delete(source)
		this.dirty.delete(source)
		const keys = this.keysOf(invalidated)
		keys.add(key)
		return keys
	}

	/**
	 * Builds a new snapshot from every current document and makes it the
	 * current one. Earlier snapshots are left untouched.
	 */
	rebuild(): Database {
		const previous = this.snapshot
		const reuse = new Map<Ast.Document, Inference>()
		for (const [source, document] of this.documents) {
			if (this.dirty.has(source)) continue
			const inference = previous.inferenceFor(document.parsed.document)
			if (inference !== undefined) reuse.set(document.parsed.document, inference)
		}

		const documents = [...this.documents.values()]
		this.snapshot = Database.fromDocuments(
			documents.map((document) => document.parsed.document),
			reuse
		)

		for (const document of documents) {
			if (reuse.has(document.parsed.document)) continue
			this.trackReferencedTypes(document)
		}
		this.dirty.clear()
		return this.snapshot
	}

	document(key: string): WorkspaceDocument | undefined {
		const source = this.sources.get(key)
		return source === undefined ? undefined : this.documents.get(source)
	}

	/** Syntax errors of a document; empty for unknown keys. */
	diagnostics(key: string): readonly Diagnostic[] {
		return this.document(key)?.diagnostics ?? []
	}

	keys(): string[] {
		return [...this.documents.values()].map((document) => document.key)
	}

	/** Key of the document a source id was assigned to. */
	keyOf(source: SourceId): string | undefined {
		return this.sources.getKey(source)
	}

	/** Documents changed since the last rebuild, or invalidated by a change. */
	pending(): string[] {
		return [...this.dirty].flatMap((source) => this.documents.get(source)?.key ?? [])
	}

	// ===== Registration =====

	private register(
		source: SourceId,
		definition: Ast.Definition,
		invalidated: Set<DefinitionId>
	): DefinitionId {
		const id = definitionId(this.nextDefinition++)
		this.owners.set(id, source)
		const product = productOf(definition)
		if (product !== null) {
			for (const consumer of this.graph.produce(id, product)) {
				this.graph.invalidate(consumer, invalidated)
			}
		}
		for (const dependency of consumesOf(definition)) this.graph.consume(id, dependency)
		return id
	}

	/** Drops a document's definitions from the graph, collecting what they invalidate. */
	private unregister(source: SourceId): Set<DefinitionId> {
		const invalidated = new Set<DefinitionId>()
		const document = this.documents.get(source)
		if (document === undefined) return invalidated
		for (const id of document.definitions) {
			this.graph.invalidate(id, invalidated)
			this.graph.remove(id)
			this.owners.delete(id)
		}
		return invalidated
	}

	/** Registers the types inference resolved through as dependencies. */
	private trackReferencedTypes(document: WorkspaceDocument): void {
		const inference = this.snapshot.inferenceFor(document.parsed.document)
		if (inference === undefined) return
		document.parsed.document.definitions.forEach((definition, index) => {
			const id = document.definitions[index]
			if (id === undefined) return
			for (const type of inference.referencedTypes.get(definition)) {
				this.graph.consume(id, Dependency.type(type))
			}
		})
	}

	/** Maps definitions to their documents' keys and marks those documents dirty. */
	private keysOf(definitions: ReadonlySet<DefinitionId>): Set<string> {
		const keys = new Set<string>()
		for (const id of definitions) {
			const source = this.owners.get(id)
			if (source === undefined) continue
			const document = this.documents.get(source)
			if (document === undefined) continue
			keys.add(document.key)
			this.dirty.add(source)
		}
		return keys
	}
}
