import assert from 'node:assert'
import { describe, it } from 'node:test'
import { SourceMap, sourceId } from '../../src/core/source.ts'

describe('core/source', () => {
	it('should assign ids starting at 1', () => {
		const sources = new SourceMap<string>()
		assert.strictEqual(sources.getOrInsert('a.graphql'), sourceId(1))
		assert.strictEqual(sources.getOrInsert('b.graphql'), sourceId(2))
	})

	it('should return the same id for the same key', () => {
		const sources = new SourceMap<string>()
		const first = sources.getOrInsert('schema.graphql')
		assert.strictEqual(sources.getOrInsert('schema.graphql'), first)
		assert.strictEqual(sources.count(), 1)
	})

	it('should map ids back to keys', () => {
		const sources = new SourceMap<string>()
		const id = sources.getOrInsert('query.graphql')
		assert.strictEqual(sources.getKey(id), 'query.graphql')
		assert.strictEqual(sources.get('query.graphql'), id)
		assert.strictEqual(sources.get('missing.graphql'), undefined)
		assert.strictEqual(sources.isValid(sourceId(2)), false)
	})

	it('should iterate in insertion order', () => {
		const sources = new SourceMap<string>()
		sources.getOrInsert('x')
		sources.getOrInsert('y')
		assert.deepStrictEqual([...sources], [
			[sourceId(1), 'x'],
			[sourceId(2), 'y'],
		])
	})
})
