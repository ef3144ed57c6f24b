import type { AssetType, DataType, Period } from '../types.js'
import type { CircuitState } from './circuit-breaker.js'
import type { StrategyName } from './config.js'
import type { ProviderMetrics } from './registry.js'

export interface RoutingRequest {
	symbol: string
	assetType: AssetType
	dataType: DataType
	period: Period
	market?: string
	priority: number
	timeoutMs: number
	retryCount: number
	qualityRequirement?: number
	params: Readonly<Record<string, unknown>>
}

export interface BreakerSnapshot {
	state: CircuitState
	failureRate: number
	windowCount: number
}

export interface RoutingContext {
	metrics: Readonly<Record<string, ProviderMetrics>>
	priorities: Readonly<Record<string, number>>
	weights: Readonly<Record<string, number>>
	breakers: Readonly<Record<string, BreakerSnapshot>>
}

export interface StrategySettings {
	healthFloor: number
	latencyCeilingMs: number
	minimumCalls: number
	failureRateThreshold: number
}

export interface RoutingStrategy {
	readonly name: StrategyName
	select(candidates: readonly string[], request: RoutingRequest, context: RoutingContext): string | undefined
	/** Full failover order; `select` is its head. */
	rank(candidates: readonly string[], request: RoutingRequest, context: RoutingContext): string[]
}

const UNDECLARED_PRIORITY = 999

function health(id: string, context: RoutingContext): number {
	return context.metrics[id]?.healthScore ?? 1
}

function sortByScore(candidates: readonly string[], score: (id: string) => number): string[] {
	const scores = new Map(candidates.map((id) => [id, score(id)]))
	return [...candidates].sort((a, b) => (scores.get(b) ?? 0) - (scores.get(a) ?? 0))
}

abstract class BaseStrategy implements RoutingStrategy {
	abstract readonly name: StrategyName

	abstract rank(candidates: readonly string[], request: RoutingRequest, context: RoutingContext): string[]

	select(candidates: readonly string[], request: RoutingRequest, context: RoutingContext): string | undefined {
		return this.rank(candidates, request, context)[0]
	}
}

export class PriorityStrategy extends BaseStrategy {
	readonly name = 'priority'

	rank(candidates: readonly string[], _request: RoutingRequest, context: RoutingContext): string[] {
		const priority = (id: string) => context.priorities[id] ?? UNDECLARED_PRIORITY
		return [...candidates].sort(
			(a, b) => priority(a) - priority(b) || health(b, context) - health(a, context),
		)
	}
}

export class RoundRobinStrategy extends BaseStrategy {
	readonly name = 'round_robin'
	private cursor = 0
	private readonly healthFloor: number

	constructor(healthFloor: number) {
		super()
		this.healthFloor = healthFloor
	}

	rank(candidates: readonly string[], _request: RoutingRequest, context: RoutingContext): string[] {
		if (candidates.length === 0) return []
		const healthy = candidates.filter((id) => health(id, context) > this.healthFloor)
		const pool = healthy.length > 0 ? healthy : [...candidates]
		const start = this.cursor % pool.length
		this.cursor++

		const rotated = [...pool.slice(start), ...pool.slice(0, start)]
		return [...rotated, ...candidates.filter((id) => !rotated.includes(id))]
	}

	reset(): void {
		this.cursor = 0
	}
}

export class WeightedRoundRobinStrategy extends BaseStrategy {
	readonly name = 'weighted_round_robin'
	private readonly credits = new Map<string, number>()

	rank(candidates: readonly string[], _request: RoutingRequest, context: RoutingContext): string[] {
		if (candidates.length === 0) return []

		let total = 0
		for (const id of candidates) {
			const increment = (context.weights[id] ?? 1) * health(id, context)
			this.credits.set(id, (this.credits.get(id) ?? 0) + increment)
			total += increment
		}
		if (total === 0) return [...candidates]

		const ranked = sortByScore(candidates, (id) => this.credits.get(id) ?? 0)
		const selected = ranked[0]
		this.credits.set(selected, (this.credits.get(selected) ?? 0) - total)
		return ranked
	}

	getCredit(id: string): number {
		return this.credits.get(id) ?? 0
	}

	reset(): void {
		this.credits.clear()
	}
}

export class HealthBasedStrategy extends BaseStrategy {
	readonly name = 'health_based'
	private readonly latencyCeilingMs: number

	constructor(latencyCeilingMs: number) {
		super()
		this.latencyCeilingMs = latencyCeilingMs
	}

	score(id: string, context: RoutingContext): number {
		const m = context.metrics[id]
		const successRate = m?.successRate ?? 1
		const latency = Math.max(0, 1 - (m?.avgResponseTimeMs ?? 0) / this.latencyCeilingMs)
		return 0.4 * health(id, context) + 0.4 * successRate + 0.2 * latency
	}

	rank(candidates: readonly string[], _request: RoutingRequest, context: RoutingContext): string[] {
		return sortByScore(candidates, (id) => this.score(id, context))
	}
}

export class CircuitBreakerAwareStrategy extends BaseStrategy {
	readonly name = 'circuit_breaker_aware'
	private readonly delegate: HealthBasedStrategy
	private readonly minimumCalls: number
	private readonly failureRateThreshold: number

	constructor(delegate: HealthBasedStrategy, minimumCalls: number, failureRateThreshold: number) {
		super()
		this.delegate = delegate
		this.minimumCalls = minimumCalls
		this.failureRateThreshold = failureRateThreshold
	}

	isExcluded(id: string, context: RoutingContext): boolean {
		const breaker = context.breakers[id]
		if (!breaker) return false
		if (breaker.state === 'open') return true
		return breaker.windowCount >= this.minimumCalls && breaker.failureRate >= this.failureRateThreshold
	}

	rank(candidates: readonly string[], request: RoutingRequest, context: RoutingContext): string[] {
		const admitted = candidates.filter((id) => !this.isExcluded(id, context))
		return this.delegate.rank(admitted.length > 0 ? admitted : candidates, request, context)
	}
}

/** Holds one instance of every strategy so stateful ones keep their cursor. */
export class StrategyRouter {
	private readonly strategies: Record<StrategyName, RoutingStrategy>
	private readonly roundRobin: RoundRobinStrategy
	private readonly weighted: WeightedRoundRobinStrategy

	constructor(settings: StrategySettings) {
		const healthBased = new HealthBasedStrategy(settings.latencyCeilingMs)
		this.roundRobin = new RoundRobinStrategy(settings.healthFloor)
		this.weighted = new WeightedRoundRobinStrategy()
		this.strategies = {
			priority: new PriorityStrategy(),
			round_robin: this.roundRobin,
			weighted_round_robin: this.weighted,
			health_based: healthBased,
			circuit_breaker_aware: new CircuitBreakerAwareStrategy(
				healthBased,
				settings.minimumCalls,
				settings.failureRateThreshold,
			),
		}
	}

	get(name: StrategyName): RoutingStrategy {
		return this.strategies[name]
	}

	/** Per-request choice from priority, quality requirement and fan-out. */
	choose(request: RoutingRequest, candidateCount: number, preferred?: StrategyName): StrategyName {
		if (request.priority > 80) return 'health_based'
		if ((request.qualityRequirement ?? 0) > 0.9) return 'circuit_breaker_aware'
		if (candidateCount > 3) return 'round_robin'
		return preferred ?? 'health_based'
	}

	rank(
		name: StrategyName,
		candidates: readonly string[],
		request: RoutingRequest,
		context: RoutingContext,
	): string[] {
		return this.strategies[name].rank(candidates, request, context)
	}

	reset(): void {
		this.roundRobin.reset()
		this.weighted.reset()
	}
}
