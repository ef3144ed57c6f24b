import type { RawRecord } from '../providers/types.js'
import type { CellValue, FieldType, Row } from '../types.js'

export const NULL_SENTINELS: ReadonlySet<string> = new Set([
	'N/A',
	'null',
	'NULL',
	'',
	'nan',
	'NaN',
	'None',
	'--',
	'-',
	'undefined',
])

const NUMERIC_TYPES: ReadonlySet<FieldType> = new Set([
	'price',
	'volume',
	'currency',
	'percentage',
	'ratio',
])

const TRUE_LITERALS = new Set(['true', 'yes', 'y', '1', '是'])
const FALSE_LITERALS = new Set(['false', 'no', 'n', '0', '否'])
const COMPACT_DATE_RE = /^(\d{4})(\d{2})(\d{2})$/
const DATE_RE = /^\d{4}[-/.]\d{1,2}[-/.]\d{1,2}([ T]\d{1,2}:\d{2}(:\d{2}(\.\d+)?)?)?(Z|[+-]\d{2}:?\d{2})?$/
const EPOCH_RE = /^\d{10}(\d{3})?$/

export interface CoercedTable {
	rows: Row[]
	columns: string[]
	completeness: number
	typeConsistency: number
	qualityScore: number
	issues: string[]
}

export function isNumericType(type: FieldType): boolean {
	return NUMERIC_TYPES.has(type)
}

export function isNullValue(value: unknown): boolean {
	if (value === null || value === undefined) return true
	if (typeof value === 'number') return Number.isNaN(value)
	if (typeof value === 'string') return NULL_SENTINELS.has(value.trim())
	if (value instanceof Date) return Number.isNaN(value.getTime())
	return false
}

export function parseNumber(value: unknown): number | null {
	if (typeof value === 'number') return Number.isFinite(value) ? value : null
	if (typeof value !== 'string') return null
	const cleaned = value.trim().replace(/,/g, '').replace(/%$/, '').trim()
	if (cleaned === '') return null
	const n = Number(cleaned)
	return Number.isFinite(n) ? n : null
}

function dateFromParts(year: string, month: string, day: string): Date | null {
	const date = new Date(Date.UTC(Number(year), Number(month) - 1, Number(day)))
	return date.getUTCMonth() === Number(month) - 1 ? date : null
}

function dateFromEpoch(n: number): Date | null {
	if (n >= 1e11) return new Date(n)
	if (n >= 1e8) return new Date(n * 1000)
	return null
}

export function parseDate(value: unknown): Date | null {
	if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value
	if (typeof value === 'number') {
		if (!Number.isFinite(value)) return null
		const compact = COMPACT_DATE_RE.exec(String(value))
		if (compact && Number.isInteger(value)) return dateFromParts(compact[1], compact[2], compact[3])
		return dateFromEpoch(value)
	}
	if (typeof value !== 'string') return null

	const text = value.trim()
	const compact = COMPACT_DATE_RE.exec(text)
	if (compact) return dateFromParts(compact[1], compact[2], compact[3])
	if (EPOCH_RE.test(text)) return dateFromEpoch(Number(text))
	if (!DATE_RE.test(text)) return null

	const date = new Date(text.replace(/[/.](?=\d)/g, '-'))
	return Number.isNaN(date.getTime()) ? null : date
}

export function parseBoolean(value: unknown): boolean | null {
	if (typeof value === 'boolean') return value
	if (typeof value === 'number') return value === 1 ? true : value === 0 ? false : null
	if (typeof value !== 'string') return null
	const text = value.trim().toLowerCase()
	if (TRUE_LITERALS.has(text)) return true
	if (FALSE_LITERALS.has(text)) return false
	return null
}

function toText(value: unknown): string {
	if (value instanceof Date) return value.toISOString()
	if (typeof value === 'object' && value !== null) return JSON.stringify(value)
	return String(value)
}

/** Converts one non-null value to `type`; `null` when it does not parse. */
export function coerceValue(value: unknown, type: FieldType): CellValue {
	if (isNullValue(value)) return null
	if (isNumericType(type)) return parseNumber(value)
	if (type === 'date') return parseDate(value)
	if (type === 'boolean') return parseBoolean(value)
	return toText(value)
}

function collectColumns(records: readonly RawRecord[]): string[] {
	const columns: string[] = []
	const seen = new Set<string>()
	for (const record of records) {
		for (const key of Object.keys(record)) {
			if (!seen.has(key)) {
				seen.add(key)
				columns.push(key)
			}
		}
	}
	return columns
}

function clamp01(n: number): number {
	return Math.min(1, Math.max(0, n))
}

/**
 * Strips null sentinels, coerces each column to its field type, drops
 * all-null rows, and scores the result as
 * completeness·0.6 + typeConsistency·0.4.
 */
export function coerceTable(
	records: readonly RawRecord[],
	fieldTypes: Readonly<Record<string, FieldType>>,
	required: readonly string[],
): CoercedTable {
	const columns = collectColumns(records)
	if (records.length === 0 || columns.length === 0) {
		return { rows: [], columns, completeness: 0, typeConsistency: 0, qualityScore: 0, issues: ['no rows'] }
	}

	const issues: string[] = []
	const typeOf = (col: string): FieldType => fieldTypes[col] ?? 'string'

	let nonNull = 0
	for (const record of records) {
		for (const col of columns) if (!isNullValue(record[col])) nonNull++
	}
	const completeness = nonNull / (records.length * columns.length)

	const failures = new Map<string, number>()
	const rows: Row[] = []
	for (const record of records) {
		const row: Row = {}
		let populated = false
		for (const col of columns) {
			const raw = record[col]
			const value = coerceValue(raw, typeOf(col))
			if (value === null && !isNullValue(raw)) failures.set(col, (failures.get(col) ?? 0) + 1)
			if (value !== null) populated = true
			row[col] = value
		}
		if (populated) rows.push(row)
	}

	const scored = required.length > 0 ? required : columns
	let consistent = 0
	for (const field of scored) {
		if (!columns.includes(field)) {
			issues.push(`missing required field: ${field}`)
			continue
		}
		const hasValue = records.some((r) => !isNullValue(r[field]))
		if (hasValue && !failures.has(field)) consistent++
		else if (!hasValue) issues.push(`${field}: no values`)
	}
	for (const [col, count] of failures) {
		issues.push(`${col}: ${count} value(s) failed ${typeOf(col)} coercion`)
	}
	if (completeness < 1) issues.push(`completeness ${completeness.toFixed(2)}`)

	const typeConsistency = consistent / scored.length
	return {
		rows,
		columns,
		completeness,
		typeConsistency,
		qualityScore: clamp01(0.6 * completeness + 0.4 * typeConsistency),
		issues,
	}
}
