/**
 * Side tables keyed by node identity.
 *
 * Nodes are never copied after parsing, so the node object itself is the
 * key. A node from another parse, even one with identical content, is a
 * different key and resolves to nothing.
 */
export class Inferred<K extends object, V> {
	private readonly map = new WeakMap<K, V>()

	get(node: K): V | undefined {
		return this.map.get(node)
	}

	has(node: K): boolean {
		return this.map.has(node)
	}

	insert(node: K, value: V): void {
		this.map.set(node, value)
	}
}

export class InferredMany<K extends object, V> {
	private readonly map = new WeakMap<K, V[]>()

	get(node: K): readonly V[] {
		return this.map.get(node) ?? []
	}

	track(node: K, value: V): void {
		const values = this.map.get(node)
		if (values === undefined) this.map.set(node, [value])
		else if (!values.includes(value)) values.push(value)
	}
}

/** Read side shared by a single table and a view over several. */
export interface Lookup<K extends object, V> {
	get(node: K): V | undefined
}

export interface LookupMany<K extends object, V> {
	get(node: K): readonly V[]
}
