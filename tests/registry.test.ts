import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { CircuitBreakerManager } from '../src/core/circuit-breaker.js'
import { parseConfig, type RouterConfigInput } from '../src/core/config.js'
import { ConfigurationError } from '../src/core/errors.js'
import { CapabilityRegistry } from '../src/core/registry.js'
import { classifyProvider, normalizeReply } from '../src/providers/adapter.js'
import type { HealthCheckResult } from '../src/providers/types.js'
import { delay, fakeProvider } from './helpers.js'

function createRegistry(disabledSources: string[] = [], registryConfig: RegistryConfigInput = {}) {
	const config = parseConfig({ registry: registryConfig })
	const breakers = new CircuitBreakerManager(config.circuitBreaker)
	const registry = new CapabilityRegistry({ config: config.registry, breakers, disabledSources })
	return { registry, breakers }
}

type RegistryConfigInput = NonNullable<RouterConfigInput['registry']>

function hanging(): Promise<HealthCheckResult> {
	return new Promise(() => {})
}

class CryptoPlugin {
	async fetchRows(): Promise<unknown[]> {
		return []
	}
}

// ─── Provider probing ────────────────────────────────────────────────────────

describe('provider probing', () => {
	it('recognises the full provider interface first', () => {
		expect(classifyProvider(fakeProvider('alpha'))).toBe('interface')
	})

	it('falls back to fetchData plus getSupportedDataTypes', () => {
		const candidate = { fetchData: async () => [], getSupportedDataTypes: () => ['daily'] }
		expect(classifyProvider(candidate)).toBe('methods')
	})

	it('accepts a declared info block', () => {
		expect(classifyProvider({ info: { type: 'data_source' } })).toBe('declared')
		expect(classifyProvider({ info: { dataTypes: ['quote'] } })).toBe('declared')
		expect(classifyProvider({ info: { dataTypes: [] } })).toBeUndefined()
	})

	it('matches on constructor names last', () => {
		expect(classifyProvider(new CryptoPlugin())).toBe('name')
		expect(classifyProvider({ name: 'weather' })).toBeUndefined()
		expect(classifyProvider('yahoo')).toBeUndefined()
	})
})

describe('reply normalization', () => {
	it('copies arrays of records', () => {
		expect(normalizeReply('alpha', [{ close: 1 }])).toEqual([{ close: 1 }])
	})

	it('zips column/row tables', () => {
		const reply = { columns: ['date', 'close'], rows: [['2026-01-02', 3.5]] }
		expect(normalizeReply('alpha', reply)).toEqual([{ date: '2026-01-02', close: 3.5 }])
	})

	it('unwraps a data envelope', () => {
		expect(normalizeReply('alpha', { data: [{ close: 2 }] })).toEqual([{ close: 2 }])
	})

	it('rejects anything else', () => {
		expect(() => normalizeReply('alpha', 'csv,text')).toThrow('alpha returned a non-tabular reply')
		expect(() => normalizeReply('alpha', [1, 2])).toThrow('non-tabular')
	})
})

// ─── Registration ────────────────────────────────────────────────────────────

describe('capability registry: registration', () => {
	it('registers a conforming provider and creates its breaker', () => {
		const { registry, breakers } = createRegistry()
		expect(registry.register('alpha', fakeProvider('alpha'))).toBe(true)

		const [summary] = registry.listProviders()
		expect(summary.id).toBe('alpha')
		expect(summary.match).toBe('interface')
		expect(summary.status).toBe('unknown')
		expect(summary.priority).toBe(100)
		expect(breakers.get('alpha')?.getState()).toBe('closed')
	})

	it('rejects objects that are not providers', () => {
		const { registry } = createRegistry()
		expect(registry.register('junk', { colour: 'blue' })).toBe(false)
		expect(registry.has('junk')).toBe(false)
	})

	it('normalizes declared capabilities from duck-typed plugins', () => {
		const { registry } = createRegistry()
		registry.register('sh-etf', {
			info: { type: 'data_source', assetTypes: ['ETF', 'equity'], dataTypes: ['quote', 'bogus'], markets: ['sh'] },
		})
		expect(registry.getCapabilities('sh-etf')).toEqual({
			assetTypes: ['fund', 'stock'],
			dataTypes: ['real_time_quote'],
			markets: ['SH'],
		})
	})

	it('infers capabilities from the provider id when nothing is declared', () => {
		const { registry } = createRegistry()
		registry.register('okx-feed', new CryptoPlugin())
		expect(registry.getCapabilities('okx-feed')).toEqual({
			assetTypes: ['crypto'],
			dataTypes: ['historical_kline', 'real_time_quote'],
			markets: ['BINANCE', 'OKX', 'HUOBI'],
		})
	})

	it('lets registration options override declared values', () => {
		const { registry } = createRegistry()
		registry.register('alpha', fakeProvider('alpha', { priority: 4 }), {
			priority: 2,
			weight: 3,
			capabilities: { markets: ['hk'] },
		})
		expect(registry.getPriorities()).toEqual({ alpha: 2 })
		expect(registry.getWeights()).toEqual({ alpha: 3 })
		expect(registry.getCapabilities('alpha')?.markets).toEqual(['HK'])
	})

	it('reports discovery outcomes per candidate', () => {
		const { registry } = createRegistry()
		const outcomes = registry.discover({
			alpha: fakeProvider('alpha'),
			beta: { colour: 'red' },
		})
		expect(outcomes).toEqual({ alpha: 'registered', beta: 'not_a_provider' })
	})

	it('drops the breaker and index entries on deregister', () => {
		const { registry, breakers } = createRegistry()
		registry.register('alpha', fakeProvider('alpha'))
		expect(registry.deregister('alpha')).toBe(true)
		expect(registry.deregister('alpha')).toBe(false)
		expect(breakers.get('alpha')).toBeUndefined()
		expect(registry.getAvailable('historical_kline', 'stock')).toEqual([])
	})

	it('throws on status changes for unknown providers', () => {
		const { registry } = createRegistry()
		expect(() => registry.setStatus('ghost', 'inactive')).toThrow(ConfigurationError)
	})
})

// ─── Lookup ──────────────────────────────────────────────────────────────────

describe('capability registry: lookup', () => {
	it('orders candidates by priority then id', () => {
		const { registry } = createRegistry()
		registry.register('zeta', fakeProvider('zeta', { priority: 1 }))
		registry.register('beta', fakeProvider('beta', { priority: 5 }))
		registry.register('alpha', fakeProvider('alpha', { priority: 5 }))
		expect(registry.getAvailable('historical_kline', 'stock')).toEqual(['zeta', 'alpha', 'beta'])
	})

	it('filters by market case-insensitively', () => {
		const { registry } = createRegistry()
		registry.register('us', fakeProvider('us', { markets: ['US'] }))
		registry.register('hk', fakeProvider('hk', { markets: ['HK'] }))
		expect(registry.getAvailable('historical_kline', 'stock', 'hk')).toEqual(['hk'])
		expect(registry.getAvailable('historical_kline', 'stock', 'JP')).toEqual([])
	})

	it('returns nothing for unsupported combinations', () => {
		const { registry } = createRegistry()
		registry.register('alpha', fakeProvider('alpha'))
		expect(registry.getAvailable('historical_kline', 'crypto')).toEqual([])
		expect(registry.getAvailable('macro_economic', 'stock')).toEqual([])
	})

	it('excludes disabled, inactive and open-circuit providers', () => {
		const { registry, breakers } = createRegistry(['off'])
		for (const id of ['off', 'idle', 'tripped', 'ok']) registry.register(id, fakeProvider(id))
		registry.setStatus('idle', 'inactive')
		breakers.getOrCreate('tripped').forceOpen()

		expect(registry.getEntry('off')?.status).toBe('disabled')
		expect(registry.getAvailable('historical_kline', 'stock')).toEqual(['ok'])
	})
})

// ─── Metrics and health ──────────────────────────────────────────────────────

describe('capability registry: metrics', () => {
	it('tracks outcomes and derives a health score', () => {
		const { registry } = createRegistry()
		registry.register('alpha', fakeProvider('alpha'))
		registry.recordOutcome('alpha', true, 200)
		registry.recordOutcome('alpha', false, 100)

		const metrics = registry.getMetrics('alpha')
		expect(metrics?.totalRequests).toBe(2)
		expect(metrics?.successRate).toBe(0.5)
		expect(metrics?.avgResponseTimeMs).toBe(200)
		expect(metrics?.availabilityScore).toBeCloseTo(0.9)
		expect(metrics?.qualityScore).toBeCloseTo(0.9)
		expect(metrics?.healthScore).toBeCloseTo(0.746)
	})

	it('feeds outcomes into the provider breaker', () => {
		const { registry, breakers } = createRegistry()
		registry.register('alpha', fakeProvider('alpha'))
		for (let i = 0; i < 10; i++) registry.recordOutcome('alpha', false, 5)
		expect(breakers.get('alpha')?.getState()).toBe('open')
		expect(registry.getMetrics('alpha')?.healthScore).toBeCloseTo(0.2)
	})

	it('tracks in-flight load', () => {
		const { registry } = createRegistry()
		registry.register('alpha', fakeProvider('alpha'))
		registry.beginRequest('alpha')
		registry.beginRequest('alpha')
		registry.endRequest('alpha')
		expect(registry.getMetrics('alpha')?.currentLoad).toBe(1)
	})

	it('summarizes the registry', () => {
		const { registry } = createRegistry(['beta'])
		registry.register('alpha', fakeProvider('alpha'))
		registry.register('beta', fakeProvider('beta'))
		registry.recordOutcome('alpha', true, 10)

		const stats = registry.getStatistics()
		expect(stats.totalProviders).toBe(2)
		expect(stats.byStatus.unknown).toBe(1)
		expect(stats.byStatus.disabled).toBe(1)
		expect(stats.totalRequests).toBe(1)
		expect(stats.successRate).toBe(1)
	})
})

describe('capability registry: health checks', () => {
	beforeEach(() => {
		vi.useFakeTimers()
		vi.setSystemTime(new Date('2026-02-02T00:00:00Z'))
	})

	afterEach(() => {
		vi.useRealTimers()
	})

	it('marks providers active or error from their health checks', async () => {
		const { registry } = createRegistry()
		registry.register('up', fakeProvider('up'))
		registry.register('down', fakeProvider('down', { healthy: false }))

		const results = await registry.checkHealth()
		expect(results.up.healthy).toBe(true)
		expect(results.down.message).toBe('down')
		expect(registry.getEntry('up')?.status).toBe('active')
		expect(registry.getEntry('down')?.status).toBe('error')
	})

	it('keeps an errored provider out until the health interval passes', async () => {
		const { registry } = createRegistry()
		registry.register('down', fakeProvider('down', { healthy: false }))
		await registry.checkHealth('down')

		expect(registry.getAvailable('historical_kline', 'stock')).toEqual([])
		vi.setSystemTime(new Date('2026-02-02T00:05:00Z'))
		expect(registry.getAvailable('historical_kline', 'stock')).toEqual(['down'])
	})

	it('times out a hung health check without holding up the others', async () => {
		const { registry } = createRegistry([], { healthCheckTimeoutMs: 1_000 })
		registry.register('hung', fakeProvider('hung', { healthCheck: hanging }))
		registry.register('up', fakeProvider('up'))

		const pending = registry.checkHealth()
		await vi.advanceTimersByTimeAsync(1_000)
		const results = await pending

		expect(results.hung).toMatchObject({
			healthy: false,
			message: 'hung timed out after 1000ms',
			latencyMs: 1_000,
		})
		expect(results.up.healthy).toBe(true)
		expect(registry.getEntry('hung')?.status).toBe('error')
		expect(registry.getEntry('up')?.status).toBe('active')
	})

	it('keeps the health loop going past a hung provider', async () => {
		const { registry } = createRegistry([], { healthCheckIntervalMs: 1_000, healthCheckTimeoutMs: 500 })
		let betaHealthy = false
		registry.register('hung', fakeProvider('hung', { healthCheck: hanging }))
		registry.register(
			'beta',
			fakeProvider('beta', {
				healthCheck: async () => ({
					healthy: betaHealthy,
					message: betaHealthy ? 'ok' : 'down',
					latencyMs: 1,
					checkedAt: Date.now(),
				}),
			}),
		)

		registry.startHealthChecks()
		await vi.advanceTimersByTimeAsync(1_500)
		expect(registry.getEntry('beta')?.status).toBe('error')
		expect(registry.getEntry('hung')?.status).toBe('error')

		betaHealthy = true
		await vi.advanceTimersByTimeAsync(1_000)
		expect(registry.getEntry('beta')?.status).toBe('active')
		expect(registry.getEntry('hung')?.lastHealth?.message).toBe('hung timed out after 500ms')
		registry.stopHealthChecks()
	})

	it('runs checks on the interval and skips ticks while one is in flight', async () => {
		const { registry } = createRegistry([], { healthCheckIntervalMs: 1_000, healthCheckTimeoutMs: 5_000 })
		let calls = 0
		registry.register(
			'slow',
			fakeProvider('slow', {
				healthCheck: async () => {
					calls++
					await delay(2_500)
					return { healthy: true, message: 'ok', latencyMs: 2_500, checkedAt: Date.now() }
				},
			}),
		)

		registry.startHealthChecks()
		registry.startHealthChecks()
		await vi.advanceTimersByTimeAsync(1_000)
		expect(calls).toBe(1)

		await vi.advanceTimersByTimeAsync(2_000)
		expect(calls).toBe(1)

		await vi.advanceTimersByTimeAsync(1_000)
		expect(calls).toBe(2)
		expect(registry.getEntry('slow')?.status).toBe('active')

		registry.stopHealthChecks()
		await vi.advanceTimersByTimeAsync(10_000)
		expect(calls).toBe(2)
	})

	it('rejects health checks for unknown providers', async () => {
		const { registry } = createRegistry()
		await expect(registry.checkHealth('ghost')).rejects.toThrow('Unknown provider: ghost')
	})
})
