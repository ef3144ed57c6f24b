import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'
import type { RawRecord } from '../providers/types.js'
import {
	DATA_TYPES,
	FIELD_TYPES,
	type DataType,
	type FieldMappingInfo,
	type FieldType,
	type MatchMethod,
} from '../types.js'
import { TtlCache } from './cache.js'
import type { MappingConfig } from './config.js'
import { ConfigurationError } from './errors.js'
import { detectFieldType } from './field-types.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { isNullValue, isNumericType, parseNumber } from './quality.js'
import { findBestMatch } from './similarity.js'

export type MappingMode = 'intelligent' | 'basic'

const fieldSpecSchema = z.object({
	type: z.enum(FIELD_TYPES),
	synonyms: z.array(z.string()).default([]),
})

const dataTypeTableSchema = z.object({
	required: z.array(z.string()).default([]),
	defaults: z.record(z.enum(FIELD_TYPES), z.string()).default({}),
	fields: z.record(z.string(), fieldSpecSchema),
})

const synonymTableSchema = z.record(z.enum(DATA_TYPES), dataTypeTableSchema)

export type DataTypeTable = z.infer<typeof dataTypeTableSchema>
export type SynonymTable = z.infer<typeof synonymTableSchema>

export interface CustomRule {
	target: string
	patterns: ReadonlyArray<string | RegExp>
	fieldType?: FieldType
	priority?: number
	validator?: (samples: readonly unknown[]) => boolean
}

export interface MappingValidation {
	valid: boolean
	issues: string[]
}

export interface MappingStatistics {
	total: number
	exact: number
	custom: number
	fuzzy: number
	inferred: number
	unmapped: number
	successRate: number
	cacheSize: number
}

export interface FieldMappingEngineOptions {
	config: MappingConfig
	table?: SynonymTable
	logger?: Logger
}

interface DataTypeIndex {
	table: DataTypeTable
	exact: Map<string, string>
	exactLower: Map<string, string>
	knownNames: string[]
}

const DEFAULT_TABLE_PATH = fileURLToPath(new URL('../../data/field-synonyms.json', import.meta.url))

const EXACT_CONFIDENCE = 1
const CUSTOM_CONFIDENCE = 0.9
const INFERRED_CONFIDENCE = 0.6
const EMPTY_TABLE: DataTypeTable = { required: [], defaults: {}, fields: {} }

export function loadSynonymTable(path = DEFAULT_TABLE_PATH): SynonymTable {
	let raw: unknown
	try {
		raw = JSON.parse(readFileSync(path, 'utf-8'))
	} catch (err) {
		throw new ConfigurationError(
			`Cannot read synonym table ${path}: ${err instanceof Error ? err.message : String(err)}`,
		)
	}
	const result = synonymTableSchema.safeParse(raw)
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`)
		throw new ConfigurationError(`Invalid synonym table ${path}: ${issues.join('; ')}`)
	}
	return result.data
}

function buildIndex(table: DataTypeTable): DataTypeIndex {
	const exact = new Map<string, string>()
	const exactLower = new Map<string, string>()
	const add = (name: string, target: string) => {
		if (!exact.has(name)) exact.set(name, target)
		const lower = name.toLowerCase()
		if (!exactLower.has(lower)) exactLower.set(lower, target)
	}
	const targets = Object.keys(table.fields)
	for (const target of targets) add(target, target)
	for (const target of targets) {
		for (const synonym of table.fields[target]?.synonyms ?? []) add(synonym, target)
	}
	return { table, exact, exactLower, knownNames: [...exact.keys()] }
}

function sampleColumn(rows: readonly RawRecord[], column: string, size: number): unknown[] {
	const samples: unknown[] = []
	for (const row of rows) {
		if (samples.length >= size) break
		const value = row[column]
		if (!isNullValue(value)) samples.push(value)
	}
	return samples
}

function patternMatches(pattern: string | RegExp, column: string): boolean {
	if (typeof pattern === 'string') return pattern.toLowerCase() === column.toLowerCase()
	pattern.lastIndex = 0
	return pattern.test(column)
}

/**
 * Resolves raw column names to canonical targets per data type: exact
 * synonyms, then custom rules, then fuzzy similarity, then type inference.
 */
export class FieldMappingEngine {
	private readonly config: MappingConfig
	private readonly log: Logger
	private readonly indexes = new Map<DataType, DataTypeIndex>()
	private readonly rules = new Map<DataType, CustomRule[]>()
	private readonly cache: TtlCache<FieldMappingInfo>
	private readonly counts: Record<MatchMethod, number> = {
		exact: 0,
		custom: 0,
		fuzzy: 0,
		inferred: 0,
		unmapped: 0,
	}

	constructor(options: FieldMappingEngineOptions) {
		this.config = options.config
		this.log = (options.logger ?? rootLogger).child({ component: 'field_mapping' })
		this.cache = new TtlCache({
			ttlMs: Number.POSITIVE_INFINITY,
			maxEntries: options.config.cacheMaxEntries,
		})

		const table = options.table ?? loadSynonymTable()
		for (const dataType of DATA_TYPES) {
			this.indexes.set(dataType, buildIndex(table[dataType] ?? EMPTY_TABLE))
		}
	}

	addCustomRule(dataType: DataType, rule: CustomRule): void {
		const rules = [...(this.rules.get(dataType) ?? []), rule]
		rules.sort((a, b) => (b.priority ?? 0) - (a.priority ?? 0))
		this.rules.set(dataType, rules)
		this.cache.clear()
		this.log.debug({ dataType, target: rule.target }, 'custom_rule_added')
	}

	/** Shorthand for one exact-name rule per target. */
	addCustomMapping(dataType: DataType, mapping: Readonly<Record<string, readonly string[]>>): void {
		for (const [target, sources] of Object.entries(mapping)) {
			this.addCustomRule(dataType, { target, patterns: sources })
		}
	}

	requiredFields(dataType: DataType): string[] {
		return [...this.index(dataType).table.required]
	}

	fieldTypeOf(dataType: DataType, target: string): FieldType | undefined {
		return this.index(dataType).table.fields[target]?.type
	}

	mapColumns(
		columns: readonly string[],
		rows: readonly RawRecord[],
		dataType: DataType,
		mode: MappingMode = 'intelligent',
	): FieldMappingInfo[] {
		const resolved = columns.map((column) => {
			const samples = sampleColumn(rows, column, this.config.sampleSize)
			const key = `${mode}|${dataType}|${column}|${samples.length}`
			const hit = this.cache.get(key)
			if (hit) return hit
			const info = Object.freeze(this.resolveColumn(column, samples, dataType, mode))
			this.cache.set(key, info)
			return info
		})

		const mapping = this.resolveConflicts(resolved)
		for (const info of mapping) this.counts[info.method]++
		return mapping
	}

	applyMapping(rows: readonly RawRecord[], mapping: readonly FieldMappingInfo[]): RawRecord[] {
		return rows.map((row) => {
			const out: RawRecord = {}
			for (const info of mapping) out[info.target] = row[info.source]
			return out
		})
	}

	validateMapping(
		rows: readonly RawRecord[],
		mapping: readonly FieldMappingInfo[],
		dataType: DataType,
	): MappingValidation {
		const issues: string[] = []
		const targets = new Set(mapping.map((m) => m.target))
		for (const field of this.index(dataType).table.required) {
			if (!targets.has(field)) issues.push(`missing required field: ${field}`)
		}

		for (const info of mapping) {
			if (info.method === 'unmapped') continue
			const values = rows.map((row) => row[info.source])
			const nonNull = values.filter((v) => !isNullValue(v))
			const ratio = values.length === 0 ? 0 : nonNull.length / values.length
			if (ratio < this.config.nonNullThreshold) {
				issues.push(`${info.target}: non-null ratio ${ratio.toFixed(2)}`)
			}
			if (isNumericType(info.fieldType) && !nonNull.some((v) => parseNumber(v) !== null)) {
				issues.push(`${info.target}: no numeric values`)
			}
		}
		return { valid: issues.length === 0, issues }
	}

	getStatistics(): MappingStatistics {
		const c = this.counts
		const total = c.exact + c.custom + c.fuzzy + c.inferred + c.unmapped
		return {
			total,
			...c,
			successRate: total === 0 ? 0 : (total - c.unmapped) / total,
			cacheSize: this.cache.size(),
		}
	}

	clearCache(): void {
		this.cache.clear()
	}

	private index(dataType: DataType): DataTypeIndex {
		let index = this.indexes.get(dataType)
		if (!index) {
			index = buildIndex(EMPTY_TABLE)
			this.indexes.set(dataType, index)
		}
		return index
	}

	private resolveColumn(
		column: string,
		samples: readonly unknown[],
		dataType: DataType,
		mode: MappingMode,
	): FieldMappingInfo {
		const index = this.index(dataType)
		const typeOf = (target: string) =>
			index.table.fields[target]?.type ?? detectFieldType(target, samples)

		const exact = index.exact.get(column) ?? index.exactLower.get(column.toLowerCase())
		if (exact !== undefined) {
			return {
				source: column,
				target: exact,
				method: 'exact',
				confidence: EXACT_CONFIDENCE,
				fieldType: typeOf(exact),
			}
		}

		if (mode === 'basic') {
			return this.unmapped(column, samples)
		}

		for (const rule of this.rules.get(dataType) ?? []) {
			if (!rule.patterns.some((p) => patternMatches(p, column))) continue
			if (rule.validator && !rule.validator(samples)) continue
			return {
				source: column,
				target: rule.target,
				method: 'custom',
				confidence: CUSTOM_CONFIDENCE,
				fieldType: rule.fieldType ?? typeOf(rule.target),
			}
		}

		const fuzzy = findBestMatch(column, index.knownNames, {
			sequence: this.config.fuzzyCutoff,
			jaccard: this.config.jaccardThreshold,
			containment: this.config.containmentThreshold,
		})
		const fuzzyTarget = fuzzy && index.exact.get(fuzzy.candidate)
		if (fuzzy && fuzzyTarget !== undefined) {
			return {
				source: column,
				target: fuzzyTarget,
				method: 'fuzzy',
				confidence: fuzzy.score,
				fieldType: typeOf(fuzzyTarget),
			}
		}

		const fieldType = detectFieldType(column, samples)
		return {
			source: column,
			target: index.table.defaults[fieldType] ?? column,
			method: 'inferred',
			confidence: INFERRED_CONFIDENCE,
			fieldType,
		}
	}

	private unmapped(column: string, samples: readonly unknown[]): FieldMappingInfo {
		return {
			source: column,
			target: column,
			method: 'unmapped',
			confidence: 0,
			fieldType: detectFieldType(column, samples),
		}
	}

	/**
	 * One column per target: highest confidence wins, then the column already
	 * named after the target, then the earlier column. Losers keep their names.
	 */
	private resolveConflicts(resolved: readonly FieldMappingInfo[]): FieldMappingInfo[] {
		const winners = new Map<string, number>()
		resolved.forEach((info, i) => {
			const current = winners.get(info.target)
			if (current === undefined) {
				winners.set(info.target, i)
				return
			}
			const held = resolved[current]
			const better =
				info.confidence > held.confidence ||
				(info.confidence === held.confidence &&
					info.source === info.target &&
					held.source !== held.target)
			if (better) winners.set(info.target, i)
		})

		const taken = new Set(winners.keys())
		return resolved.map((info, i): FieldMappingInfo => {
			if (winners.get(info.target) === i) return info
			const target = taken.has(info.source) ? `${info.source}_${i}` : info.source
			taken.add(target)
			this.log.debug({ column: info.source, target: info.target }, 'mapping_conflict')
			return { ...info, target, method: 'unmapped', confidence: 0 }
		})
	}
}
