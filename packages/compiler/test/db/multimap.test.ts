import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Inferred, InferredMany } from '../../src/db/inferred.ts'
import { Bindings, LayeredBindings, MultiMap } from '../../src/db/multimap.ts'

describe('db/multimap', () => {
	describe('MultiMap', () => {
		it('should keep every value in insertion order', () => {
			const map = new MultiMap<string, number>()
			map.insert('a', 1)
			map.insert('b', 2)
			map.insert('a', 3)
			assert.deepStrictEqual(map.get('a'), [1, 3])
			assert.strictEqual(map.first('a'), 1)
			assert.deepStrictEqual([...map.values()], [1, 3, 2])
			assert.strictEqual(map.size, 2)
		})

		it('should return an empty list for absent keys', () => {
			const map = new MultiMap<string, number>()
			assert.deepStrictEqual(map.get('x'), [])
			assert.strictEqual(map.first('x'), undefined)
			assert.strictEqual(map.has('x'), false)
		})
	})

	describe('Bindings', () => {
		it('should index members by owner and by name', () => {
			const bindings = new Bindings<string>()
			bindings.insert('User', 'id', 'User.id')
			bindings.insert('User', 'name', 'User.name')
			bindings.insert('Post', 'id', 'Post.id')
			assert.deepStrictEqual(bindings.members('User'), ['User.id', 'User.name'])
			assert.deepStrictEqual(bindings.membersByName('Post', 'id'), ['Post.id'])
			assert.deepStrictEqual(bindings.membersByName('Post', 'name'), [])
			assert.deepStrictEqual([...bindings.types()], ['User', 'Post'])
		})
	})

	describe('LayeredBindings', () => {
		it('should list definitions before extensions', () => {
			const bindings = new LayeredBindings<string>()
			bindings.insert('User', 'email', 'extension', true)
			bindings.insert('User', 'email', 'definition', false)
			assert.deepStrictEqual(bindings.members('User'), ['definition', 'extension'])
			assert.deepStrictEqual(bindings.membersByName('User', 'email'), ['definition', 'extension'])
		})
	})
})

describe('db/inferred', () => {
	it('should key by identity rather than content', () => {
		const table = new Inferred<{ readonly name: string }, number>()
		const node = { name: 'a' }
		table.insert(node, 1)
		assert.strictEqual(table.get(node), 1)
		assert.strictEqual(table.has({ name: 'a' }), false)
	})

	it('should track distinct values per node', () => {
		const table = new InferredMany<object, string>()
		const node = {}
		table.track(node, 'x')
		table.track(node, 'y')
		table.track(node, 'x')
		assert.deepStrictEqual(table.get(node), ['x', 'y'])
		assert.deepStrictEqual(table.get({}), [])
	})
})
