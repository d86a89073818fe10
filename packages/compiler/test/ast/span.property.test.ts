import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import type * as Ast from '../../src/ast/nodes.ts'
import { spanOf } from '../../src/ast/span.ts'
import { traverse, type Visitor } from '../../src/ast/visit.ts'
import { sourceId } from '../../src/core/source.ts'
import { joinSpans, type Span, span } from '../../src/core/span.ts'
import { parse } from '../../src/grammar/document.ts'
import { document } from '../documents.ts'

const SOURCE = sourceId(1)

type Leaf = { readonly span: Span } | Ast.AstNode

type Part = Span | Ast.AstNode | Ast.Recoverable<Leaf> | null

function spanOfLeaf(leaf: Leaf): Span | null {
	return 'span' in leaf ? leaf.span : spanOf(leaf)
}

function spanOfPart(part: Part): Span | null {
	if (part === null) return null
	if ('start' in part) return part
	if (part.kind === 'Present') return spanOfLeaf(part.value)
	if (part.kind === 'Missing') return null
	return spanOf(part)
}

function joinAll(parts: readonly Part[]): Span | null {
	let joined: Span | null = null
	for (const part of parts) {
		const next = spanOfPart(part)
		if (next !== null) joined = joined === null ? next : joinSpans(joined, next)
	}
	return joined
}

type Composite =
	| Ast.Document
	| Ast.SelectionSet
	| Ast.Field
	| Ast.Arguments
	| Ast.FieldsDefinition
	| Ast.FieldDefinition

function children(node: Composite): Part[] {
	switch (node.kind) {
		case 'Document':
			return [...node.definitions]
		case 'SelectionSet':
			return [node.braces[0].span, ...node.selections, node.braces[1]]
		case 'Field':
			return [node.alias, node.name, node.arguments, node.directives, node.selectionSet]
		case 'Arguments':
			return [node.parens[0].span, ...node.items, node.parens[1]]
		case 'FieldsDefinition':
			return [node.braces[0].span, ...node.definitions, node.braces[1]]
		case 'FieldDefinition':
			return [
				node.description,
				node.name.span,
				node.arguments,
				node.colon,
				node.type,
				node.directives,
			]
	}
}

const Composites: Visitor<Composite[]> = {
	visitArguments(node, acc) {
		acc.push(node)
	},
	visitField(node, acc) {
		acc.push(node)
	},
	visitFieldDefinition(node, acc) {
		acc.push(node)
	},
	visitFieldsDefinition(node, acc) {
		acc.push(node)
	},
	visitSelectionSet(node, acc) {
		acc.push(node)
	},
}

describe('ast/span properties', () => {
	it('a document with no surrounding whitespace spans the whole text', () => {
		fc.assert(
			fc.property(document, (text) => {
				assert.deepStrictEqual(spanOf(parse(SOURCE, text).document), span(SOURCE, 0, text.length))
				return true
			}),
			{ numRuns: 300 }
		)
	})

	it('a composite node spans the join of its children', () => {
		fc.assert(
			fc.property(document, (text) => {
				const root = parse(SOURCE, text).document
				const composites: Composite[] = [root]
				traverse(root, Composites, composites)
				for (const node of composites) {
					assert.deepStrictEqual(spanOf(node), joinAll(children(node)), node.kind)
				}
				return true
			}),
			{ numRuns: 300 }
		)
	})
})
