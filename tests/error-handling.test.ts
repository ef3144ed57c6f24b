import { describe, expect, it } from 'vitest'
import { buildPatch } from '../src/commands/config.js'
import { parseInteger } from '../src/commands/query.js'
import { parseConfig } from '../src/core/config.js'
import {
	CircuitOpenError,
	classifyFailure,
	ConfigurationError,
	DataQualityError,
	ExtractionError,
	ExtractionTimeoutError,
	failureSeverity,
	ProvidersExhaustedError,
	toError,
} from '../src/core/errors.js'
import { describeQuery, parseQuery } from '../src/core/query.js'
import { MAX_TIMER_MS, withTimeout } from '../src/core/timeout.js'
import { delay } from './helpers.js'

// ─── Classification ──────────────────────────────────────────────────────────

describe('failure classification', () => {
	it('prefers an explicit kind', () => {
		expect(classifyFailure(new ExtractionError('a', 'rate_limit', 'slow down'))).toBe('rate_limit')
		expect(classifyFailure(new ExtractionTimeoutError('a', 10))).toBe('timeout')
	})

	it('classifies by message', () => {
		expect(classifyFailure(new Error('request timed out'))).toBe('timeout')
		expect(classifyFailure(new Error('socket hang up'))).toBe('connection')
		expect(classifyFailure('ECONNRESET')).toBe('connection')
		expect(classifyFailure(new Error('HTTP 429 Too Many Requests'))).toBe('rate_limit')
		expect(classifyFailure(new Error('HTTP 502 Bad Gateway'))).toBe('server_error')
		expect(classifyFailure(new DataQualityError('empty reply'))).toBe('data_quality')
		expect(classifyFailure(new Error('weird'))).toBe('unknown')
	})

	it('maps kinds to severities', () => {
		expect(failureSeverity('connection')).toBe('high')
		expect(failureSeverity('rate_limit')).toBe('low')
		expect(failureSeverity('server_error')).toBe('medium')
	})

	it('wraps non-errors', () => {
		const err = toError('plain text')
		expect(err).toBeInstanceOf(Error)
		expect(err.message).toBe('plain text')
	})
})

describe('error messages', () => {
	it('lists every provider message on exhaustion', () => {
		const err = new ProvidersExhaustedError('historical_kline/stock:AAPL', ['a', 'b'], [], [
			'a: down',
			'b: down',
		])
		expect(err.message).toBe('All providers failed for historical_kline/stock:AAPL: a: down; b: down')
		expect(err.attempted).toEqual(['a', 'b'])
		expect(new ProvidersExhaustedError('x', [], [], []).message).toBe('All providers failed for x')
	})

	it('names the degradation of an open circuit', () => {
		expect(new CircuitOpenError('alpha', 'severe').message).toBe(
			'Circuit open for alpha (degradation: severe)',
		)
	})
})

// ─── Timeouts ────────────────────────────────────────────────────────────────

describe('withTimeout', () => {
	it('resolves fast tasks', async () => {
		await expect(withTimeout('alpha', 100, async () => 'ok')).resolves.toBe('ok')
	})

	it('rejects and aborts slow tasks', async () => {
		const seen: { signal?: AbortSignal } = {}
		const pending = withTimeout('alpha', 10, async (signal) => {
			seen.signal = signal
			await delay(100)
			return 'late'
		})
		await expect(pending).rejects.toThrow(ExtractionTimeoutError)
		await expect(pending).rejects.toThrow('alpha timed out after 10ms')
		expect(seen.signal?.aborted).toBe(true)
	})

	it('keeps delays beyond the timer range from firing at once', async () => {
		await expect(
			withTimeout('alpha', 2 ** 31, async () => {
				await delay(5)
				return 'ok'
			}),
		).resolves.toBe('ok')
	})

	it('passes task errors through', async () => {
		const failing = withTimeout('alpha', 100, async () => {
			throw new Error('upstream returned 503')
		})
		await expect(failing).rejects.toThrow('upstream returned 503')
	})
})

// ─── Input validation ────────────────────────────────────────────────────────

describe('query validation', () => {
	it('resolves aliases and fills defaults', () => {
		const query = parseQuery({ symbol: ' AAPL ', assetType: 'stock', dataType: 'daily' })
		expect(query).toEqual({
			symbol: 'AAPL',
			assetType: 'stock',
			dataType: 'historical_kline',
			range: {},
			period: 'D',
			priority: 50,
			timeoutMs: 5_000,
			retryCount: 3,
			extraParams: {},
		})
		expect(Object.isFrozen(query)).toBe(true)
		expect(describeQuery(query)).toBe('historical_kline/stock:AAPL')
	})

	it('rejects timeouts beyond the timer range', () => {
		const input = { symbol: 'AAPL', assetType: 'stock', dataType: 'kline' }
		expect(parseQuery({ ...input, timeoutMs: MAX_TIMER_MS }).timeoutMs).toBe(MAX_TIMER_MS)
		expect(() => parseQuery({ ...input, timeoutMs: 2 ** 31 })).toThrow(
			'Invalid query: timeoutMs: Number must be less than or equal to 2147483647',
		)
	})

	it('rejects unknown data types', () => {
		expect(() => parseQuery({ symbol: 'AAPL', assetType: 'stock', dataType: 'ticks' })).toThrow(
			'Invalid query: dataType: unknown data type "ticks"',
		)
	})

	it('rejects inverted ranges and blank symbols', () => {
		expect(() =>
			parseQuery({
				symbol: 'AAPL',
				assetType: 'stock',
				dataType: 'kline',
				range: { start: '2026-02-01', end: '2026-01-01' },
			}),
		).toThrow('Invalid query: range.start is after range.end')
		expect(() => parseQuery({ symbol: '  ', assetType: 'stock', dataType: 'kline' })).toThrow(
			ConfigurationError,
		)
	})
})

describe('config validation', () => {
	it('fills defaults', () => {
		const config = parseConfig()
		expect(config.circuitBreaker.failureThreshold).toBe(5)
		expect(config.circuitBreaker.recoveryTimeoutMs).toBe(60_000)
		expect(config.registry.healthCheckIntervalMs).toBe(300_000)
		expect(config.registry.healthCheckTimeoutMs).toBe(10_000)
		expect(config.engine.retry).toEqual({ baseDelayMs: 1_000, maxDelayMs: 30_000, multiplier: 2 })
		expect(config.pipeline).toEqual({
			strategy: 'intelligent',
			cacheTtlMs: 300_000,
			cacheMaxEntries: 500,
			workers: 4,
		})
		expect(config.disabledSources).toEqual([])
	})

	it('reports invalid values with their path', () => {
		expect(() => parseConfig({ pipeline: { workers: 0 } })).toThrow(
			'Invalid configuration: pipeline.workers: Number must be greater than or equal to 1',
		)
		expect(() => parseConfig({ pipeline: { strategy: 'random' } })).toThrow(ConfigurationError)
	})

	it('builds nested patches from dotted keys', () => {
		expect(buildPatch('pipeline.strategy', 'priority')).toEqual({
			pipeline: { strategy: 'priority' },
		})
		expect(buildPatch('disabledSources', ['yahoo'])).toEqual({ disabledSources: ['yahoo'] })
		expect(() => buildPatch('..', 1)).toThrow(ConfigurationError)
	})

	it('parses integer options', () => {
		expect(parseInteger('42')).toBe(42)
		expect(() => parseInteger('many')).toThrow('Expected an integer, got "many"')
	})
})
