import { beforeEach, describe, expect, it } from 'vitest'
import { parseConfig } from '../src/core/config.js'
import { ConfigurationError } from '../src/core/errors.js'
import { FieldMappingEngine, loadSynonymTable } from '../src/core/field-mapping.js'
import { detectFieldType } from '../src/core/field-types.js'
import { findBestMatch, jaccardSimilarity, sequenceRatio, tokenize } from '../src/core/similarity.js'
import type { RawRecord } from '../src/providers/types.js'

let engine: FieldMappingEngine

beforeEach(() => {
	engine = new FieldMappingEngine({ config: parseConfig().mapping })
})

function targets(columns: string[], rows: RawRecord[] = [], mode: 'intelligent' | 'basic' = 'intelligent') {
	return engine.mapColumns(columns, rows, 'historical_kline', mode).map((m) => m.target)
}

// ─── Similarity ──────────────────────────────────────────────────────────────

describe('similarity', () => {
	it('computes the sequence ratio over matching blocks', () => {
		expect(sequenceRatio('abcd', 'abcd')).toBe(1)
		expect(sequenceRatio('total_revenue', 'totalrevenue')).toBeCloseTo(0.96)
		expect(sequenceRatio('', '')).toBe(1)
		expect(sequenceRatio('abc', 'xyz')).toBe(0)
	})

	it('tokenizes camel, snake and dotted names', () => {
		expect(tokenize('totalRevenue')).toEqual(['total', 'revenue'])
		expect(tokenize('net_profit.ttm')).toEqual(['net', 'profit', 'ttm'])
	})

	it('computes token jaccard', () => {
		expect(jaccardSimilarity('net_profit', 'netProfit')).toBe(1)
		expect(jaccardSimilarity('net_profit', 'gross_profit')).toBeCloseTo(1 / 3)
	})

	it('returns the first stage that clears its threshold', () => {
		const thresholds = { sequence: 0.6, jaccard: 0.3, containment: 0.5 }
		expect(findBestMatch('closePx', ['close', 'open'], thresholds)).toEqual({
			candidate: 'close',
			score: 10 / 12,
			method: 'sequence',
		})
		expect(findBestMatch('qqq', ['close', 'open'], thresholds)).toBeUndefined()
	})
})

// ─── Field types ─────────────────────────────────────────────────────────────

describe('field type detection', () => {
	it('uses name heuristics first', () => {
		expect(detectFieldType('收盘价')).toBe('price')
		expect(detectFieldType('pct_chg')).toBe('percentage')
		expect(detectFieldType('is_st')).toBe('boolean')
		expect(detectFieldType('pe')).toBe('ratio')
		expect(detectFieldType('trade_date')).toBe('date')
		expect(detectFieldType('market_cap')).toBe('currency')
		expect(detectFieldType('ticker')).toBe('string')
	})

	it('falls back to value shapes', () => {
		expect(detectFieldType('f1', ['true', 'no'])).toBe('boolean')
		expect(detectFieldType('f1', ['2026-01-02', '2026/01/05'])).toBe('date')
		expect(detectFieldType('f1', [12_000, '13,500'])).toBe('volume')
		expect(detectFieldType('f1', [0.1, 0.5])).toBe('ratio')
		expect(detectFieldType('f1', [12.5, 99])).toBe('percentage')
		expect(detectFieldType('f1', [1500.5])).toBe('currency')
		expect(detectFieldType('f1', ['abc', 3])).toBe('string')
		expect(detectFieldType('f1', [null, 'N/A'])).toBe('string')
	})
})

// ─── Mapping ─────────────────────────────────────────────────────────────────

describe('field mapping: exact', () => {
	it('maps localized synonyms with full confidence', () => {
		const mapping = engine.mapColumns(
			['日期', '开盘', '最高', '最低', '收盘价', '成交量'],
			[],
			'historical_kline',
		)
		expect(mapping.map((m) => m.target)).toEqual(['datetime', 'open', 'high', 'low', 'close', 'volume'])
		expect(mapping.every((m) => m.method === 'exact' && m.confidence === 1)).toBe(true)
		expect(mapping[4].fieldType).toBe('price')
	})

	it('falls back to a case-insensitive lookup', () => {
		expect(engine.mapColumns(['ClOsE'], [], 'historical_kline')[0]).toEqual({
			source: 'ClOsE',
			target: 'close',
			method: 'exact',
			confidence: 1,
			fieldType: 'price',
		})
	})

	it('leaves canonical names untouched', () => {
		const rows: RawRecord[] = [{ open: 1, high: 2, low: 0.5, close: 1.5 }]
		const mapping = engine.mapColumns(['open', 'high', 'low', 'close'], rows, 'historical_kline')
		expect(mapping.every((m) => m.source === m.target)).toBe(true)

		const once = engine.applyMapping(rows, mapping)
		expect(engine.applyMapping(once, mapping)).toEqual(rows)
	})
})

describe('field mapping: fuzzy and inferred', () => {
	it('matches near-miss names through similarity', () => {
		const [info] = engine.mapColumns(['total_revenue'], [], 'financial_statement')
		expect(info.target).toBe('operating_revenue')
		expect(info.method).toBe('fuzzy')
		expect(info.confidence).toBeCloseTo(0.96)
		expect(info.fieldType).toBe('currency')
	})

	it('infers a default target from value shapes', () => {
		const rows: RawRecord[] = [{ qqq: 12_000 }, { qqq: 15_000 }]
		const [info] = engine.mapColumns(['qqq'], rows, 'historical_kline')
		expect(info).toEqual({
			source: 'qqq',
			target: 'volume',
			method: 'inferred',
			confidence: 0.6,
			fieldType: 'volume',
		})
	})

	it('keeps the column name when the type has no default target', () => {
		const [info] = engine.mapColumns(['xyz_flag'], [], 'financial_statement')
		expect(info.target).toBe('xyz_flag')
		expect(info.fieldType).toBe('boolean')
		expect(info.method).toBe('inferred')
	})

	it('only applies exact matches in basic mode', () => {
		const mapping = engine.mapColumns(['open', 'closePx'], [], 'historical_kline', 'basic')
		expect(mapping.map((m) => [m.target, m.method, m.confidence])).toEqual([
			['open', 'exact', 1],
			['closePx', 'unmapped', 0],
		])
	})
})

describe('field mapping: custom rules', () => {
	it('applies regex rules before similarity', () => {
		engine.addCustomRule('historical_kline', { target: 'close', patterns: [/^px_last$/i] })
		const [info] = engine.mapColumns(['PX_LAST'], [], 'historical_kline')
		expect(info.method).toBe('custom')
		expect(info.target).toBe('close')
		expect(info.confidence).toBe(0.9)
		expect(info.fieldType).toBe('price')
	})

	it('tries higher-priority rules first', () => {
		engine.addCustomRule('historical_kline', { target: 'low', patterns: ['px'], priority: 1 })
		engine.addCustomRule('historical_kline', { target: 'high', patterns: ['PX'], priority: 9 })
		expect(targets(['px'])).toEqual(['high'])
	})

	it('skips rules whose validator rejects the samples', () => {
		engine.addCustomRule('historical_kline', {
			target: 'close',
			patterns: ['qqq'],
			validator: (samples) => samples.every((s) => typeof s === 'number' && s < 100),
		})
		expect(targets(['qqq'], [{ qqq: 12_000 }])).toEqual(['volume'])
		expect(targets(['qqq'], [{ qqq: 12 }, { qqq: 15 }])).toEqual(['close'])
	})

	it('registers exact-name mappings per target', () => {
		engine.addCustomMapping('real_time_quote', { current_price: ['最新成交'] })
		const [info] = engine.mapColumns(['最新成交'], [], 'real_time_quote')
		expect([info.target, info.method]).toEqual(['current_price', 'custom'])
	})
})

describe('field mapping: conflicts', () => {
	it('keeps the higher-confidence column for a contested target', () => {
		const mapping = engine.mapColumns(['closePx', 'c'], [], 'historical_kline')
		expect(mapping.map((m) => [m.source, m.target, m.method])).toEqual([
			['closePx', 'closePx', 'unmapped'],
			['c', 'close', 'exact'],
		])
	})

	it('prefers the column already named after the target on a tie', () => {
		const mapping = engine.mapColumns(['Close', 'close'], [], 'historical_kline')
		expect(mapping.map((m) => [m.source, m.target, m.confidence])).toEqual([
			['Close', 'Close', 0],
			['close', 'close', 1],
		])
	})

	it('keeps the earlier column on a full tie', () => {
		const mapping = engine.mapColumns(['o', 'opening'], [], 'historical_kline')
		expect(mapping.map((m) => m.target)).toEqual(['open', 'opening'])
	})
})

describe('field mapping: validation and statistics', () => {
	it('reports missing required fields', () => {
		const rows: RawRecord[] = [{ o: 1, h: 2, l: 0.5 }]
		const mapping = engine.mapColumns(['o', 'h', 'l'], rows, 'historical_kline')
		expect(engine.validateMapping(rows, mapping, 'historical_kline')).toEqual({
			valid: false,
			issues: ['missing required field: close'],
		})
	})

	it('reports sparse and non-numeric columns', () => {
		const rows: RawRecord[] = [
			{ o: '1', h: '2', l: '0.5', c: null },
			{ o: '1.1', h: '2', l: '0.6', c: 'N/A' },
		]
		const mapping = engine.mapColumns(['o', 'h', 'l', 'c'], rows, 'historical_kline')
		expect(engine.validateMapping(rows, mapping, 'historical_kline').issues).toEqual([
			'close: non-null ratio 0.00',
			'close: no numeric values',
		])
	})

	it('counts methods and caches per column', () => {
		const rows: RawRecord[] = [
			{ open: '1', closePx: '2', qqq: 12_000 },
			{ open: '1.5', closePx: '2.1', qqq: 15_000 },
		]
		const columns = ['open', 'closePx', 'qqq', 'wk']
		engine.mapColumns(columns, rows, 'historical_kline')
		engine.mapColumns(columns, rows, 'historical_kline', 'basic')

		expect(engine.getStatistics()).toEqual({
			total: 8,
			exact: 2,
			custom: 0,
			fuzzy: 1,
			inferred: 2,
			unmapped: 3,
			successRate: 0.625,
			cacheSize: 8,
		})
		engine.clearCache()
		expect(engine.getStatistics().cacheSize).toBe(0)
	})

	it('exposes required fields and declared types', () => {
		expect(engine.requiredFields('sector_fund_flow')).toEqual(['sector', 'net_inflow'])
		expect(engine.fieldTypeOf('real_time_quote', 'change_percent')).toBe('percentage')
		expect(engine.fieldTypeOf('real_time_quote', 'nope')).toBeUndefined()
	})
})

describe('synonym table loading', () => {
	it('rejects unreadable files', () => {
		expect(() => loadSynonymTable('/nonexistent/field-synonyms.json')).toThrow(ConfigurationError)
	})

	it('accepts an injected table', () => {
		const custom = new FieldMappingEngine({
			config: parseConfig().mapping,
			table: {
				historical_kline: {
					required: ['px'],
					defaults: {},
					fields: { px: { type: 'price', synonyms: ['last'] } },
				},
			},
		})
		expect(custom.mapColumns(['last'], [], 'historical_kline')[0].target).toBe('px')
		expect(custom.requiredFields('real_time_quote')).toEqual([])
	})
})
