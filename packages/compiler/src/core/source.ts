/**
 * Interned document identities.
 * Every document is addressed by a small integer so spans from many
 * documents can be compared and stored side by side.
 */

export type SourceId = number & { readonly __brand: 'SourceId' }

export function sourceId(n: number): SourceId {
	return n as SourceId
}

/** Reserved for spans that don't belong to any document. */
export const UNKNOWN_SOURCE = sourceId(0)

/**
 * Bidirectional map between document keys and source ids.
 * Ids start at 1 and stay stable for the lifetime of the map.
 */
export class SourceMap<K> {
	private readonly keyToId: Map<K, SourceId> = new Map()
	private readonly idToKey: Map<SourceId, K> = new Map()
	private next = 1

	/** Intern a key, returning its id. Same key always returns same id. */
	getOrInsert(key: K): SourceId {
		const existing = this.keyToId.get(key)
		if (existing !== undefined) return existing

		const id = sourceId(this.next++)
		this.keyToId.set(key, id)
		this.idToKey.set(id, key)
		return id
	}

	get(key: K): SourceId | undefined {
		return this.keyToId.get(key)
	}

	getKey(id: SourceId): K | undefined {
		return this.idToKey.get(id)
	}

	count(): number {
		return this.keyToId.size
	}

	isValid(id: SourceId): boolean {
		return this.idToKey.has(id)
	}

	*[Symbol.iterator](): Generator<[SourceId, K]> {
		yield* this.idToKey
	}
}
