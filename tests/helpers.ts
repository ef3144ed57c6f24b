import type { RateLimitConfig } from '../src/core/rate-limiter.js'
import type { ExtractRequest, HealthCheckResult, Provider, RawRecord } from '../src/providers/types.js'
import type { AssetType, DataType } from '../src/types.js'

export interface FakeProviderOptions {
	assetTypes?: AssetType[]
	dataTypes?: DataType[]
	markets?: string[]
	priority?: number
	rateLimits?: RateLimitConfig
	healthy?: boolean
	extract?: (request: ExtractRequest) => Promise<RawRecord[]>
	healthCheck?: () => Promise<HealthCheckResult>
}

export interface FakeProvider extends Provider {
	readonly requests: ExtractRequest[]
}

export const KLINE_ROWS: RawRecord[] = [
	{ date: '2026-01-02', open: '10.00', high: '10.50', low: '9.80', close: '10.20', volume: '12000' },
	{ date: '2026-01-05', open: '10.20', high: '10.90', low: '10.10', close: '10.80', volume: '15500' },
	{ date: '2026-01-06', open: '10.80', high: '11.00', low: '10.40', close: '10.50', volume: '9800' },
]

export function fakeProvider(name: string, options: FakeProviderOptions = {}): FakeProvider {
	const requests: ExtractRequest[] = []
	const extract = options.extract ?? (async () => KLINE_ROWS.map((row) => ({ ...row })))
	return {
		name,
		priority: options.priority,
		rateLimits: options.rateLimits,
		requests,
		getCapabilities() {
			return {
				assetTypes: options.assetTypes ?? ['stock'],
				dataTypes: options.dataTypes ?? ['historical_kline'],
				markets: options.markets ?? ['US'],
			}
		},
		async extract(request: ExtractRequest): Promise<RawRecord[]> {
			requests.push(request)
			return extract(request)
		},
		async healthCheck(): Promise<HealthCheckResult> {
			if (options.healthCheck) return options.healthCheck()
			const healthy = options.healthy ?? true
			return { healthy, message: healthy ? 'ok' : 'down', latencyMs: 3, checkedAt: Date.now() }
		},
	}
}

export function delay(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms))
}
