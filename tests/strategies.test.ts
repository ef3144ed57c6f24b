import { describe, expect, it } from 'vitest'
import type { ProviderMetrics } from '../src/core/registry.js'
import {
	CircuitBreakerAwareStrategy,
	HealthBasedStrategy,
	PriorityStrategy,
	RoundRobinStrategy,
	StrategyRouter,
	WeightedRoundRobinStrategy,
	type BreakerSnapshot,
	type RoutingContext,
	type RoutingRequest,
} from '../src/core/strategies.js'

const request: RoutingRequest = {
	symbol: 'AAPL',
	assetType: 'stock',
	dataType: 'historical_kline',
	period: 'D',
	priority: 50,
	timeoutMs: 5_000,
	retryCount: 3,
	params: {},
}

function metrics(providerId: string, overrides: Partial<ProviderMetrics> = {}): ProviderMetrics {
	return {
		providerId,
		totalRequests: 10,
		successRequests: 10,
		failedRequests: 0,
		successRate: 1,
		avgResponseTimeMs: 0,
		qualityScore: 1,
		availabilityScore: 1,
		currentLoad: 0,
		healthScore: 1,
		...overrides,
	}
}

function context(overrides: Partial<RoutingContext> = {}): RoutingContext {
	return { metrics: {}, priorities: {}, weights: {}, breakers: {}, ...overrides }
}

function breaker(state: BreakerSnapshot['state'], failureRate = 0, windowCount = 0): BreakerSnapshot {
	return { state, failureRate, windowCount }
}

describe('priority strategy', () => {
	it('orders by ascending priority and is deterministic', () => {
		const strategy = new PriorityStrategy()
		const ctx = context({ priorities: { a: 3, b: 1, c: 2 } })
		expect(strategy.rank(['a', 'b', 'c'], request, ctx)).toEqual(['b', 'c', 'a'])
		expect(strategy.rank(['a', 'b', 'c'], request, ctx)).toEqual(['b', 'c', 'a'])
		expect(strategy.select(['a', 'b', 'c'], request, ctx)).toBe('b')
	})

	it('puts undeclared providers last and breaks ties on health', () => {
		const strategy = new PriorityStrategy()
		const ctx = context({
			priorities: { a: 1, b: 1 },
			metrics: { a: metrics('a', { healthScore: 0.4 }), b: metrics('b', { healthScore: 0.9 }) },
		})
		expect(strategy.rank(['x', 'a', 'b'], request, ctx)).toEqual(['b', 'a', 'x'])
	})

	it('returns nothing for no candidates', () => {
		expect(new PriorityStrategy().select([], request, context())).toBeUndefined()
	})
})

describe('round robin strategy', () => {
	it('rotates the head on each call', () => {
		const strategy = new RoundRobinStrategy(0.5)
		const picks = [1, 2, 3, 4].map(() => strategy.select(['a', 'b', 'c'], request, context()))
		expect(picks).toEqual(['a', 'b', 'c', 'a'])
	})

	it('rotates over healthy providers and appends the rest', () => {
		const strategy = new RoundRobinStrategy(0.5)
		const ctx = context({ metrics: { b: metrics('b', { healthScore: 0.2 }) } })
		expect(strategy.rank(['a', 'b', 'c'], request, ctx)).toEqual(['a', 'c', 'b'])
		expect(strategy.rank(['a', 'b', 'c'], request, ctx)).toEqual(['c', 'a', 'b'])
	})

	it('starts over after reset', () => {
		const strategy = new RoundRobinStrategy(0.5)
		strategy.select(['a', 'b'], request, context())
		strategy.reset()
		expect(strategy.select(['a', 'b'], request, context())).toBe('a')
	})
})

describe('weighted round robin strategy', () => {
	it('selects in proportion to weight', () => {
		const strategy = new WeightedRoundRobinStrategy()
		const ctx = context({ weights: { a: 3, b: 1 } })
		const picks = [1, 2, 3, 4].map(() => strategy.select(['a', 'b'], request, ctx))
		expect(picks).toEqual(['a', 'a', 'b', 'a'])
		expect(strategy.getCredit('a')).toBe(0)
		expect(strategy.getCredit('b')).toBe(0)
	})

	it('skips providers with zero effective weight', () => {
		const strategy = new WeightedRoundRobinStrategy()
		const ctx = context({ metrics: { a: metrics('a', { healthScore: 0 }) } })
		expect(strategy.select(['a', 'b'], request, ctx)).toBe('b')
		expect(strategy.select(['a', 'b'], request, ctx)).toBe('b')
	})
})

describe('health based strategy', () => {
	it('scores health, success rate and latency', () => {
		const strategy = new HealthBasedStrategy(10_000)
		const ctx = context({
			metrics: {
				a: metrics('a', { healthScore: 0.9, successRate: 0.8, avgResponseTimeMs: 5_000 }),
			},
		})
		expect(strategy.score('a', ctx)).toBeCloseTo(0.78)
		expect(strategy.score('b', ctx)).toBeCloseTo(1)
		expect(strategy.rank(['a', 'b'], request, ctx)).toEqual(['b', 'a'])
	})

	it('keeps candidate order on equal scores', () => {
		const strategy = new HealthBasedStrategy(10_000)
		expect(strategy.rank(['c', 'a', 'b'], request, context())).toEqual(['c', 'a', 'b'])
	})
})

describe('circuit breaker aware strategy', () => {
	const strategy = new CircuitBreakerAwareStrategy(new HealthBasedStrategy(10_000), 10, 0.5)

	it('drops open circuits and well-sampled failing providers', () => {
		const ctx = context({
			breakers: {
				a: breaker('open'),
				b: breaker('closed', 0.6, 10),
				c: breaker('closed', 1, 5),
			},
		})
		expect(strategy.isExcluded('a', ctx)).toBe(true)
		expect(strategy.isExcluded('b', ctx)).toBe(true)
		expect(strategy.isExcluded('c', ctx)).toBe(false)
		expect(strategy.rank(['a', 'b', 'c', 'd'], request, ctx)).toEqual(['c', 'd'])
	})

	it('falls back to every candidate when all are excluded', () => {
		const ctx = context({ breakers: { a: breaker('open'), b: breaker('open') } })
		expect(strategy.rank(['a', 'b'], request, ctx)).toEqual(['a', 'b'])
	})
})

describe('strategy router', () => {
	const router = new StrategyRouter({
		healthFloor: 0.5,
		latencyCeilingMs: 10_000,
		minimumCalls: 10,
		failureRateThreshold: 0.5,
	})

	it('chooses a strategy from the request shape', () => {
		expect(router.choose({ ...request, priority: 90 }, 2)).toBe('health_based')
		expect(router.choose({ ...request, qualityRequirement: 0.95 }, 2)).toBe('circuit_breaker_aware')
		expect(router.choose(request, 4)).toBe('round_robin')
		expect(router.choose(request, 2, 'priority')).toBe('priority')
		expect(router.choose(request, 2)).toBe('health_based')
	})

	it('dispatches to the named strategy', () => {
		const ctx = context({ priorities: { a: 2, b: 1 } })
		expect(router.get('priority').name).toBe('priority')
		expect(router.rank('priority', ['a', 'b'], request, ctx)).toEqual(['b', 'a'])
	})
})
