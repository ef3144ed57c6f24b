import type { FieldType } from '../types.js'
import { isNullValue, parseBoolean, parseDate, parseNumber } from './quality.js'

const NAME_RULES: ReadonlyArray<readonly [FieldType, RegExp]> = [
	['boolean', /^(is|has|can)_|flag|enabled|^active$/i],
	['percentage', /pct|percent|涨跌幅|换手率|%/i],
	['ratio', /ratio|^pe$|^pb$|_pe$|_pb$|市盈率|市净率/i],
	['date', /date|time|timestamp|日期|时间|_at$/i],
	['volume', /vol|volume|成交量|shares|qty/i],
	['price', /price|^open|^high|^low|^close|价|vwap/i],
	[
		'currency',
		/amount|turnover|revenue|profit|income|asset|liabilit|equity|cap|value|成交额|收入|利润|资产|负债|金额/i,
	],
	['string', /symbol|code|name|ticker|exchange|market|type|category|sector|industry|代码|名称|板块/i],
]

export function detectFieldTypeFromName(name: string): FieldType | undefined {
	for (const [type, pattern] of NAME_RULES) {
		if (pattern.test(name)) return type
	}
	return undefined
}

function isBooleanLiteral(value: unknown): boolean {
	if (typeof value === 'boolean') return true
	if (typeof value !== 'string') return false
	return /^(true|false|yes|no|是|否)$/i.test(value.trim()) && parseBoolean(value) !== null
}

function isDateLike(value: unknown): boolean {
	if (value instanceof Date) return true
	if (typeof value !== 'string') return false
	return /^\d{4}[-/.]?\d{2}[-/.]?\d{2}/.test(value.trim()) && parseDate(value) !== null
}

export function detectFieldTypeFromValues(samples: readonly unknown[]): FieldType {
	const values = samples.filter((v) => !isNullValue(v))
	if (values.length === 0) return 'string'
	if (values.every(isBooleanLiteral)) return 'boolean'
	if (values.every(isDateLike)) return 'date'

	const numbers: number[] = []
	for (const value of values) {
		const n = parseNumber(value)
		if (n === null) return 'string'
		numbers.push(n)
	}

	const max = Math.max(...numbers.map(Math.abs))
	if (numbers.every((n) => Number.isInteger(n) && n >= 0) && max >= 1000) return 'volume'
	if (max <= 1) return 'ratio'
	if (max <= 100) return 'percentage'
	return 'currency'
}

/** Column semantic type: name heuristics win, value shapes decide the rest. */
export function detectFieldType(name: string, samples: readonly unknown[] = []): FieldType {
	return detectFieldTypeFromName(name) ?? detectFieldTypeFromValues(samples)
}
