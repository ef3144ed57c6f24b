import { z } from 'zod'
import {
	ASSET_TYPES,
	DATA_TYPES,
	PERIODS,
	type DataType,
	type StandardQuery,
} from '../types.js'
import { ConfigurationError } from './errors.js'
import { MAX_TIMER_MS } from './timeout.js'

const DATA_TYPE_ALIASES: Record<string, DataType> = {
	kline: 'historical_kline',
	klines: 'historical_kline',
	daily: 'historical_kline',
	bars: 'historical_kline',
	history: 'historical_kline',
	realtime: 'real_time_quote',
	real_time: 'real_time_quote',
	quote: 'real_time_quote',
	tick: 'real_time_quote',
	stock_list: 'asset_list',
	symbols: 'asset_list',
	financials: 'financial_statement',
	macro: 'macro_economic',
	fund_flow: 'sector_fund_flow',
}

function isDataType(value: string): value is DataType {
	return DATA_TYPES.some((t) => t === value)
}

export function aliasDataType(name: string): DataType | undefined {
	const key = name.trim().toLowerCase()
	if (isDataType(key)) return key
	return DATA_TYPE_ALIASES[key]
}

const dataTypeSchema = z.string().transform((value, ctx) => {
	const resolved = aliasDataType(value)
	if (!resolved) {
		ctx.addIssue({ code: z.ZodIssueCode.custom, message: `unknown data type "${value}"` })
		return z.NEVER
	}
	return resolved
})

const dateString = z
	.string()
	.refine((v) => !Number.isNaN(Date.parse(v)), { message: 'not a parseable date' })

export const queryInputSchema = z.object({
	symbol: z.string().trim().min(1),
	assetType: z.enum(ASSET_TYPES),
	dataType: dataTypeSchema,
	range: z
		.object({
			start: dateString.optional(),
			end: dateString.optional(),
		})
		.default({}),
	period: z.enum(PERIODS).default('D'),
	market: z.string().min(1).optional(),
	provider: z.string().min(1).optional(),
	priority: z.number().min(0).max(100).default(50),
	timeoutMs: z.number().int().positive().max(MAX_TIMER_MS).default(5_000),
	retryCount: z.number().int().min(0).default(3),
	qualityRequirement: z.number().min(0).max(1).optional(),
	extraParams: z.record(z.unknown()).default({}),
})

export type QueryInput = z.input<typeof queryInputSchema>

/** Validates caller input into an immutable {@link StandardQuery}. */
export function buildQuery(input: QueryInput): StandardQuery {
	return parseQuery(input)
}

export function parseQuery(input: unknown): StandardQuery {
	const result = queryInputSchema.safeParse(input)
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
		throw new ConfigurationError(`Invalid query: ${issues.join('; ')}`)
	}

	const { range, extraParams, ...rest } = result.data
	if (range.start && range.end && Date.parse(range.start) > Date.parse(range.end)) {
		throw new ConfigurationError('Invalid query: range.start is after range.end')
	}

	return Object.freeze({
		...rest,
		range: Object.freeze({ ...range }),
		extraParams: Object.freeze({ ...extraParams }),
	})
}

export function describeQuery(query: StandardQuery): string {
	return `${query.dataType}/${query.assetType}:${query.symbol}`
}
