/**
 * Producer/consumer graph deciding what a change invalidates.
 *
 * Each producer key produces at most one value; any key may consume any
 * number of values. Values are compared by their string key. The graph may
 * contain cycles.
 */
export class DepGraph<K, V> {
	private readonly producers = new Map<K, string>()
	private readonly consumers = new Map<string, Set<K>>()

	constructor(private readonly keyOf: (value: V) => string) {}

	/**
	 * Records that `producer` produces `value`, replacing what it produced
	 * before. Returns the keys already consuming `value`.
	 */
	produce(producer: K, value: V): Set<K> {
		const key = this.keyOf(value)
		this.producers.set(producer, key)
		return new Set(this.consumers.get(key))
	}

	consume(consumer: K, value: V): void {
		const key = this.keyOf(value)
		let keys = this.consumers.get(key)
		if (keys === undefined) {
			keys = new Set()
			this.consumers.set(key, keys)
		}
		keys.add(consumer)
	}

	produces(producer: K): boolean {
		return this.producers.has(producer)
	}

	consumersOf(value: V): ReadonlySet<K> {
		return this.consumers.get(this.keyOf(value)) ?? new Set()
	}

	/**
	 * `node` and every key depending on it, directly or through other keys.
	 * Keys already in `accumulator` are not walked again.
	 */
	invalidate(node: K, accumulator: Set<K> = new Set()): Set<K> {
		const pending = [node]
		for (let next = pending.pop(); next !== undefined; next = pending.pop()) {
			if (accumulator.has(next)) continue
			accumulator.add(next)
			const produced = this.producers.get(next)
			if (produced === undefined) continue
			for (const consumer of this.consumers.get(produced) ?? []) {
				if (!accumulator.has(consumer)) pending.push(consumer)
			}
		}
		return accumulator
	}

	/** Forgets what `node` produces and everything it consumes. */
	remove(node: K): void {
		this.producers.delete(node)
		for (const [key, keys] of this.consumers) {
			keys.delete(node)
			if (keys.size === 0) this.consumers.delete(key)
		}
	}
}
