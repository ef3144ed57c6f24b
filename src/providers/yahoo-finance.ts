import YahooFinance from 'yahoo-finance2'
import { z } from 'zod'
import { ExtractionError } from '../core/errors.js'
import type { Period } from '../types.js'
import type { ExtractRequest, HealthCheckResult, Provider, RawRecord } from './types.js'

const SOURCE = 'yahoo'
const HEALTH_SYMBOL = 'AAPL'
const DEFAULT_DAYS = 30

type ChartInterval = '1m' | '5m' | '15m' | '30m' | '60m' | '1d' | '1wk' | '1mo'

export interface YahooChartOptions {
	period1: Date
	period2?: Date
	interval: ChartInterval
}

/** The slice of yahoo-finance2 this provider calls. */
export interface YahooClient {
	chart(symbol: string, options: YahooChartOptions): Promise<unknown>
	quote(symbol: string): Promise<unknown>
	search(query: string): Promise<unknown>
}

const INTERVALS: Record<Period, ChartInterval> = {
	tick: '1m',
	'1m': '1m',
	'5m': '5m',
	'15m': '15m',
	'30m': '30m',
	'60m': '60m',
	D: '1d',
	W: '1wk',
	M: '1mo',
}

const num = z.number().nullable().optional()

const chartSchema = z.object({
	quotes: z.array(
		z.object({
			date: z.coerce.date(),
			open: num,
			high: num,
			low: num,
			close: num,
			adjclose: num,
			volume: num,
		}),
	),
})

const quoteSchema = z.object({
	symbol: z.string(),
	shortName: z.string().optional(),
	regularMarketPrice: num,
	regularMarketOpen: num,
	regularMarketDayHigh: num,
	regularMarketDayLow: num,
	regularMarketPreviousClose: num,
	regularMarketVolume: num,
	regularMarketChange: num,
	regularMarketChangePercent: num,
	marketCap: num,
	regularMarketTime: z.coerce.date().optional(),
})

const searchSchema = z.object({
	quotes: z.array(
		z.object({
			symbol: z.string().optional(),
			shortname: z.string().optional(),
			longname: z.string().optional(),
			exchange: z.string().optional(),
			quoteType: z.string().optional(),
		}),
	),
})

function parseReply<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	raw: unknown,
	what: string,
): T {
	const parsed = schema.safeParse(raw)
	if (!parsed.success) {
		throw new ExtractionError(SOURCE, 'data_quality', `[${SOURCE}] unexpected ${what} reply`)
	}
	return parsed.data
}

function startDate(request: ExtractRequest): Date {
	if (request.range.start) return new Date(request.range.start)
	const days = typeof request.params.days === 'number' ? request.params.days : DEFAULT_DAYS
	const start = new Date()
	start.setDate(start.getDate() - days)
	return start
}

export function createYahooClient(): YahooClient {
	const yf = new YahooFinance({ suppressNotices: ['yahooSurvey', 'ripHistorical'] })
	return {
		chart: (symbol, options) => yf.chart(symbol, options),
		quote: (symbol) => yf.quote(symbol),
		search: (query) => yf.search(query),
	}
}

async function history(client: YahooClient, request: ExtractRequest): Promise<RawRecord[]> {
	const raw = await client.chart(request.symbol, {
		period1: startDate(request),
		...(request.range.end ? { period2: new Date(request.range.end) } : {}),
		interval: INTERVALS[request.period],
	})
	return parseReply(chartSchema, raw, 'chart').quotes.map((q) => ({
		date: q.date,
		open: q.open,
		high: q.high,
		low: q.low,
		close: q.close,
		adjclose: q.adjclose,
		volume: q.volume,
	}))
}

async function quote(client: YahooClient, symbol: string): Promise<RawRecord[]> {
	const q = parseReply(quoteSchema, await client.quote(symbol), 'quote')
	return [{ ...q }]
}

async function search(client: YahooClient, request: ExtractRequest): Promise<RawRecord[]> {
	const query = typeof request.params.query === 'string' ? request.params.query : request.symbol
	const { quotes } = parseReply(searchSchema, await client.search(query), 'search')
	return quotes
		.filter((q) => q.symbol !== undefined)
		.map((q) => ({
			symbol: q.symbol,
			shortname: q.longname ?? q.shortname,
			exchange: q.exchange,
			quoteType: q.quoteType,
		}))
}

export function createYahooProvider(client: YahooClient = createYahooClient()): Provider {
	return {
		name: SOURCE,
		rateLimits: { maxRequests: 60, windowMs: 60_000 },
		priority: 1,
		qualityRating: 0.85,
		reliabilityRating: 0.8,

		getCapabilities() {
			return {
				assetTypes: ['stock', 'index', 'fund'],
				dataTypes: ['historical_kline', 'real_time_quote', 'asset_list'],
				markets: ['US'],
			}
		},

		async extract(request: ExtractRequest): Promise<RawRecord[]> {
			switch (request.dataType) {
				case 'historical_kline':
					return history(client, request)
				case 'real_time_quote':
					return quote(client, request.symbol)
				case 'asset_list':
					return search(client, request)
				default:
					throw new ExtractionError(
						SOURCE,
						'unknown',
						`[${SOURCE}] does not serve ${request.dataType}`,
					)
			}
		},

		async healthCheck(): Promise<HealthCheckResult> {
			const started = Date.now()
			try {
				await quote(client, HEALTH_SYMBOL)
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
