import type { RateLimitConfig } from '../core/rate-limiter.js'
import type { AssetType, DataType, Period, TimeRange } from '../types.js'

export type { RateLimitConfig }

export interface ProviderCapabilities {
	assetTypes: AssetType[]
	dataTypes: DataType[]
	markets: string[]
}

export interface ExtractRequest {
	symbol: string
	assetType: AssetType
	dataType: DataType
	period: Period
	range: Readonly<TimeRange>
	market?: string
	priority: number
	timeoutMs: number
	signal: AbortSignal
	params: Readonly<Record<string, unknown>>
}

export type RawRecord = Record<string, unknown>

export interface HealthCheckResult {
	healthy: boolean
	message: string
	latencyMs: number
	checkedAt: number
}

/** The contract every data-source plugin fulfils once adapted. */
export interface Provider {
	readonly name: string
	readonly rateLimits?: RateLimitConfig
	readonly priority?: number
	readonly qualityRating?: number
	readonly reliabilityRating?: number
	getCapabilities(): ProviderCapabilities
	extract(request: ExtractRequest): Promise<RawRecord[]>
	healthCheck(): Promise<HealthCheckResult>
	connect?(): Promise<void>
	disconnect?(): Promise<void>
}
