const EMPTY: readonly never[] = []

/**
 * Map from a key to every value inserted under it, in insertion order.
 * Lookups of absent keys return an empty list.
 */
export class MultiMap<K, V> {
	private readonly entries = new Map<K, V[]>()

	insert(key: K, value: V): void {
		const values = this.entries.get(key)
		if (values === undefined) this.entries.set(key, [value])
		else values.push(value)
	}

	get(key: K): readonly V[] {
		return this.entries.get(key) ?? EMPTY
	}

	first(key: K): V | undefined {
		return this.entries.get(key)?.[0]
	}

	has(key: K): boolean {
		return this.entries.has(key)
	}

	keys(): IterableIterator<K> {
		return this.entries.keys()
	}

	/** Every value, grouped by key in key insertion order. */
	*values(): Generator<V> {
		for (const values of this.entries.values()) yield* values
	}

	get size(): number {
		return this.entries.size
	}

	*[Symbol.iterator](): Generator<[K, readonly V[]]> {
		yield* this.entries
	}
}

/**
 * Two-level index: owning type name, then member name.
 * Used for fields, input values, enum values and union members.
 */
export class Bindings<V> {
	private readonly byType = new MultiMap<string, V>()
	private readonly byName = new Map<string, MultiMap<string, V>>()

	insert(type: string, name: string, value: V): void {
		this.byType.insert(type, value)
		let members = this.byName.get(type)
		if (members === undefined) {
			members = new MultiMap()
			this.byName.set(type, members)
		}
		members.insert(name, value)
	}

	/** Every member of `type`, in insertion order. */
	members(type: string): readonly V[] {
		return this.byType.get(type)
	}

	membersByName(type: string, name: string): readonly V[] {
		return this.byName.get(type)?.get(name) ?? EMPTY
	}

	types(): IterableIterator<string> {
		return this.byType.keys()
	}
}

/** Bindings from definitions, followed by bindings from extensions. */
export class LayeredBindings<V> {
	readonly definitions = new Bindings<V>()
	readonly extensions = new Bindings<V>()

	insert(type: string, name: string, value: V, fromExtension: boolean): void {
		const layer = fromExtension ? this.extensions : this.definitions
		layer.insert(type, name, value)
	}

	members(type: string): readonly V[] {
		const extended = this.extensions.members(type)
		const defined = this.definitions.members(type)
		return extended.length === 0 ? defined : [...defined, ...extended]
	}

	membersByName(type: string, name: string): readonly V[] {
		const extended = this.extensions.membersByName(type, name)
		const defined = this.definitions.membersByName(type, name)
		return extended.length === 0 ? defined : [...defined, ...extended]
	}
}
