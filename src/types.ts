import type { StrategyMode } from './core/config.js'

export type OutputFormat = 'markdown' | 'json' | 'plain'

export interface GlobalOptions {
	format: OutputFormat
	source?: string
	strategy?: StrategyMode
	cache: boolean
}

export const ASSET_TYPES = ['stock', 'index', 'fund', 'bond', 'futures', 'crypto', 'forex'] as const

export type AssetType = (typeof ASSET_TYPES)[number]

export const DATA_TYPES = [
	'historical_kline',
	'real_time_quote',
	'asset_list',
	'fundamental',
	'financial_statement',
	'macro_economic',
	'sector_fund_flow',
] as const

export type DataType = (typeof DATA_TYPES)[number]

export const PERIODS = ['tick', '1m', '5m', '15m', '30m', '60m', 'D', 'W', 'M'] as const

export type Period = (typeof PERIODS)[number]

export const FIELD_TYPES = [
	'price',
	'volume',
	'percentage',
	'currency',
	'date',
	'ratio',
	'boolean',
	'string',
] as const

export type FieldType = (typeof FIELD_TYPES)[number]

export type MatchMethod = 'exact' | 'custom' | 'fuzzy' | 'inferred' | 'unmapped'

export type CellValue = string | number | boolean | Date | null

export type Row = Record<string, CellValue>

export interface TimeRange {
	start?: string
	end?: string
}

export interface StandardQuery {
	readonly symbol: string
	readonly assetType: AssetType
	readonly dataType: DataType
	readonly range: Readonly<TimeRange>
	readonly period: Period
	readonly market?: string
	readonly provider?: string
	readonly priority: number
	readonly timeoutMs: number
	readonly retryCount: number
	readonly qualityRequirement?: number
	readonly extraParams: Readonly<Record<string, unknown>>
}

export interface FieldMappingInfo {
	source: string
	target: string
	method: MatchMethod
	confidence: number
	fieldType: FieldType
}

export interface SourceInfo {
	provider?: string
	strategy: string
	attempts: number
	failedProviders: string[]
	skipped: string[]
	errors: string[]
	extractionMs: number
	totalMs: number
	cached: boolean
	fetchedAt: string
}

export interface StandardResult {
	readonly success: boolean
	readonly data: readonly Row[]
	readonly columns: readonly string[]
	readonly mapping: readonly FieldMappingInfo[]
	readonly mappingMode: 'intelligent' | 'basic'
	readonly source: Readonly<SourceInfo>
	readonly qualityScore: number
	readonly qualityIssues: readonly string[]
	readonly failureReason?: string
	readonly query: StandardQuery
}

export interface FailoverResult {
	success: boolean
	attempts: number
	failedProviders: string[]
	skipped: string[]
	successfulProvider?: string
	errorMessages: string[]
	totalMs: number
}
