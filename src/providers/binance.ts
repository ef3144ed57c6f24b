import { z } from 'zod'
import { ExtractionError } from '../core/errors.js'
import type { Period } from '../types.js'
import type {
	ExtractRequest,
	HealthCheckResult,
	Provider,
	RateLimitConfig,
	RawRecord,
} from './types.js'

const SOURCE = 'binance'
const BASE_URL = 'https://api.binance.com'
const QUOTE_ASSET = 'USDT'
const DEFAULT_LIMIT = 30

const rateLimits: RateLimitConfig = {
	maxRequests: 1200,
	windowMs: 60_000,
}

const INTERVALS: Record<Period, string> = {
	tick: '1m',
	'1m': '1m',
	'5m': '5m',
	'15m': '15m',
	'30m': '30m',
	'60m': '1h',
	D: '1d',
	W: '1w',
	M: '1M',
}

const price = z.string()

// [openTime, open, high, low, close, volume, closeTime, quoteVolume, ...]
const klineSchema = z.array(
	z
		.tuple([z.number(), price, price, price, price, price, z.number(), price])
		.rest(z.unknown()),
)

const tickerSchema = z.object({
	symbol: z.string(),
	lastPrice: z.string(),
	priceChange: z.string(),
	priceChangePercent: z.string(),
	openPrice: z.string(),
	highPrice: z.string(),
	lowPrice: z.string(),
	prevClosePrice: z.string(),
	volume: z.string(),
	quoteVolume: z.string(),
	closeTime: z.number(),
})

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<Response>

function toPair(symbol: string): string {
	const upper = symbol.toUpperCase()
	return upper.endsWith(QUOTE_ASSET) ? upper : `${upper}${QUOTE_ASSET}`
}

function limitFrom(request: ExtractRequest): number {
	const limit = request.params.limit
	return typeof limit === 'number' && limit > 0 ? Math.min(1000, Math.floor(limit)) : DEFAULT_LIMIT
}

export function createBinanceProvider(fetchImpl: FetchLike = fetch, baseUrl = BASE_URL): Provider {
	async function request(path: string, signal?: AbortSignal): Promise<unknown> {
		const res = await fetchImpl(`${baseUrl}${path}`, { signal })
		if (!res.ok) {
			const body = await res.text()
			const kind = res.status === 429 ? 'rate_limit' : res.status >= 500 ? 'server_error' : 'unknown'
			throw new ExtractionError(SOURCE, kind, `Binance API error ${res.status}: ${body}`)
		}
		return res.json()
	}

	async function klines(req: ExtractRequest): Promise<RawRecord[]> {
		const params = new URLSearchParams({
			symbol: toPair(req.symbol),
			interval: INTERVALS[req.period],
			limit: String(limitFrom(req)),
		})
		if (req.range.start) params.set('startTime', String(Date.parse(req.range.start)))
		if (req.range.end) params.set('endTime', String(Date.parse(req.range.end)))

		const parsed = klineSchema.safeParse(await request(`/api/v3/klines?${params}`, req.signal))
		if (!parsed.success) {
			throw new ExtractionError(SOURCE, 'data_quality', 'Binance returned malformed klines')
		}
		return parsed.data.map((k) => ({
			t: k[0],
			o: k[1],
			h: k[2],
			l: k[3],
			c: k[4],
			v: k[5],
			quote_volume: k[7],
		}))
	}

	async function ticker(req: ExtractRequest): Promise<RawRecord[]> {
		const raw = await request(`/api/v3/ticker/24hr?symbol=${toPair(req.symbol)}`, req.signal)
		const parsed = tickerSchema.safeParse(raw)
		if (!parsed.success) {
			throw new ExtractionError(SOURCE, 'data_quality', 'Binance returned a malformed ticker')
		}
		return [{ ...parsed.data }]
	}

	return {
		name: SOURCE,
		rateLimits,
		priority: 1,
		qualityRating: 0.9,
		reliabilityRating: 0.9,

		getCapabilities() {
			return {
				assetTypes: ['crypto'],
				dataTypes: ['historical_kline', 'real_time_quote'],
				markets: ['BINANCE'],
			}
		},

		async extract(req: ExtractRequest): Promise<RawRecord[]> {
			switch (req.dataType) {
				case 'historical_kline':
					return klines(req)
				case 'real_time_quote':
					return ticker(req)
				default:
					throw new ExtractionError(SOURCE, 'unknown', `Binance does not serve ${req.dataType}`)
			}
		},

		async healthCheck(): Promise<HealthCheckResult> {
			const started = Date.now()
			try {
				await request('/api/v3/ping')
				return {
					healthy: true,
					message: 'ok',
					latencyMs: Date.now() - started,
					checkedAt: Date.now(),
				}
			} catch (err) {
				return {
					healthy: false,
					message: err instanceof Error ? err.message : String(err),
					latencyMs: Date.now() - started,
					checkedAt: Date.now(),
				}
			}
		},
	}
}
