interface CacheEntry<V> {
	value: V
	expiresAt: number
}

export interface TtlCacheOptions {
	ttlMs: number
	maxEntries: number
}

export function makeCacheKey(prefix: string, args: Record<string, unknown>): string {
	const sorted = Object.keys(args)
		.filter((k) => args[k] !== undefined)
		.sort()
		.map((k) => `${k}=${JSON.stringify(args[k])}`)
		.join('&')
	return `${prefix}:${sorted}`
}

/**
 * Map-backed cache with a per-entry TTL and a size cap. When the cap is
 * exceeded, expired entries go first, then the ones closest to expiry.
 */
export class TtlCache<V> {
	private readonly store = new Map<string, CacheEntry<V>>()
	private readonly ttlMs: number
	private readonly maxEntries: number

	constructor(options: TtlCacheOptions) {
		this.ttlMs = options.ttlMs
		this.maxEntries = options.maxEntries
	}

	get(key: string): V | undefined {
		const entry = this.store.get(key)
		if (!entry) return undefined
		if (entry.expiresAt <= Date.now()) {
			this.store.delete(key)
			return undefined
		}
		return entry.value
	}

	set(key: string, value: V, ttlMs = this.ttlMs): void {
		this.store.delete(key)
		this.store.set(key, { value, expiresAt: Date.now() + ttlMs })
		this.evictIfNeeded()
	}

	delete(key: string): boolean {
		return this.store.delete(key)
	}

	deleteWhere(predicate: (value: V, key: string) => boolean): number {
		let removed = 0
		for (const [key, entry] of this.store) {
			if (predicate(entry.value, key)) {
				this.store.delete(key)
				removed++
			}
		}
		return removed
	}

	clear(): void {
		this.store.clear()
	}

	size(): number {
		return this.store.size
	}

	private evictIfNeeded(): void {
		if (this.store.size <= this.maxEntries) return
		const now = Date.now()
		for (const [key, entry] of this.store) {
			if (entry.expiresAt <= now) this.store.delete(key)
		}
		if (this.store.size <= this.maxEntries) return
		const entries = [...this.store.entries()]
		entries.sort((a, b) => a[1].expiresAt - b[1].expiresAt)
		const toRemove = entries.slice(0, entries.length - this.maxEntries)
		for (const [key] of toRemove) this.store.delete(key)
	}
}
