import assert from 'node:assert'
import { describe, it } from 'node:test'
import fc from 'fast-check'
import { collectErrors } from '../../src/ast/errors.ts'
import { sourceId } from '../../src/core/source.ts'
import { printDocument } from '../../src/format/printer.ts'
import { parse } from '../../src/grammar/document.ts'
import { document } from '../documents.ts'

const SOURCE = sourceId(1)

function format(text: string): string {
	return printDocument(parse(SOURCE, text).document)
}

describe('format/printer properties', () => {
	it('generated documents parse without errors', () => {
		fc.assert(
			fc.property(document, (text) => collectErrors(parse(SOURCE, text)).length === 0),
			{ numRuns: 300 }
		)
	})

	it('printing is idempotent', () => {
		fc.assert(
			fc.property(document, (text) => {
				const once = format(text)
				assert.strictEqual(format(once), once)
				return true
			}),
			{ numRuns: 300 }
		)
	})

	it('printed documents parse without errors', () => {
		fc.assert(
			fc.property(document, (text) => collectErrors(parse(SOURCE, format(text))).length === 0),
			{ numRuns: 300 }
		)
	})
})
