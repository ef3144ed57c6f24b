export interface RateLimitConfig {
	maxRequests: number
	windowMs: number
}

interface Bucket {
	tokens: number
	lastRefill: number
	config: RateLimitConfig
}

/** Token bucket per provider id. */
export class RateLimiter {
	private readonly buckets = new Map<string, Bucket>()

	canRequest(source: string, config: RateLimitConfig): boolean {
		const bucket = this.getBucket(source, config)
		this.refill(bucket)
		return bucket.tokens >= 1
	}

	consumeToken(source: string, config: RateLimitConfig): boolean {
		const bucket = this.getBucket(source, config)
		this.refill(bucket)
		if (bucket.tokens < 1) return false
		bucket.tokens -= 1
		return true
	}

	getRemaining(source: string, config: RateLimitConfig): number {
		const bucket = this.getBucket(source, config)
		this.refill(bucket)
		return Math.floor(bucket.tokens)
	}

	reset(source?: string): void {
		if (source === undefined) this.buckets.clear()
		else this.buckets.delete(source)
	}

	private getBucket(source: string, config: RateLimitConfig): Bucket {
		let bucket = this.buckets.get(source)
		if (!bucket) {
			bucket = { tokens: config.maxRequests, lastRefill: Date.now(), config }
			this.buckets.set(source, bucket)
		}
		return bucket
	}

	private refill(bucket: Bucket): void {
		const now = Date.now()
		const elapsed = now - bucket.lastRefill
		const refillAmount = (elapsed / bucket.config.windowMs) * bucket.config.maxRequests
		bucket.tokens = Math.min(bucket.config.maxRequests, bucket.tokens + refillAmount)
		bucket.lastRefill = now
	}
}
