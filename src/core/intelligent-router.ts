import { TtlCache } from './cache.js'
import { STRATEGY_NAMES, type EngineConfig, type EngineWeights, type StrategyName } from './config.js'
import { logger as rootLogger, type Logger } from './logger.js'
import type { MetricsSource } from './registry.js'
import type { RoutingRequest } from './strategies.js'

export type RoutingMode = StrategyName | 'intelligent'

export interface ScoreBreakdown {
	providerId: string
	health: number
	performance: number
	loadBalance: number
	contextMatch: number
	learning: number
	total: number
}

export interface RoutingDecision {
	providerId?: string
	ranked: readonly string[]
	scores: readonly ScoreBreakdown[]
	cached: boolean
}

export interface StrategyPerformance {
	successRate: number
	usage: number
	weight: number
}

export interface EngineStatistics {
	decisions: number
	cacheHits: number
	cacheSize: number
	trackedProviders: number
	strategies: Record<RoutingMode, StrategyPerformance>
}

export interface IntelligentRouterOptions {
	config: EngineConfig
	latencyCeilingMs: number
	source: MetricsSource
	logger?: Logger
}

interface OutcomeRecord {
	success: boolean
	latencyMs: number
	at: number
}

const NO_HISTORY_PERFORMANCE = 0.8

const ROUTING_MODES: readonly RoutingMode[] = ['intelligent', ...STRATEGY_NAMES]

const INITIAL_STRATEGY_WEIGHTS: Record<RoutingMode, number> = {
	intelligent: 0.3,
	health_based: 0.25,
	priority: 0.15,
	circuit_breaker_aware: 0.1,
	round_robin: 0.1,
	weighted_round_robin: 0.1,
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value))
}

function normalizeWeights(weights: EngineWeights): EngineWeights {
	const sum =
		weights.health + weights.performance + weights.loadBalance + weights.contextMatch + weights.learning
	if (sum <= 0) return weights
	return {
		health: weights.health / sum,
		performance: weights.performance / sum,
		loadBalance: weights.loadBalance / sum,
		contextMatch: weights.contextMatch / sum,
		learning: weights.learning / sum,
	}
}

function successRate(records: readonly OutcomeRecord[]): number {
	if (records.length === 0) return 0
	return records.filter((r) => r.success).length / records.length
}

function priorityBand(priority: number): 'high' | 'normal' | 'low' {
	if (priority > 80) return 'high'
	if (priority < 30) return 'low'
	return 'normal'
}

/**
 * Multi-factor provider scoring with a short-lived decision cache, outcome
 * history for trend learning, and self-tuning strategy weights.
 *
 * Reads provider state only through {@link MetricsSource}.
 */
export class IntelligentRouter {
	private readonly config: EngineConfig
	private readonly weights: EngineWeights
	private readonly latencyCeilingMs: number
	private readonly source: MetricsSource
	private readonly log: Logger
	private readonly decisions: TtlCache<RoutingDecision>
	private readonly history = new Map<string, OutcomeRecord[]>()
	private readonly strategyStats = new Map<RoutingMode, { successRate: number; usage: number }>()
	private strategyWeights: Record<RoutingMode, number> = { ...INITIAL_STRATEGY_WEIGHTS }
	private outcomesSinceOptimize = 0
	private decisionCount = 0
	private cacheHits = 0

	constructor(options: IntelligentRouterOptions) {
		this.config = options.config
		this.weights = normalizeWeights(options.config.weights)
		this.latencyCeilingMs = options.latencyCeilingMs
		this.source = options.source
		this.log = (options.logger ?? rootLogger).child({ component: 'intelligent_router' })
		this.decisions = new TtlCache({
			ttlMs: options.config.decisionCacheTtlMs,
			maxEntries: options.config.decisionCacheMaxEntries,
		})
	}

	score(providerId: string, request: RoutingRequest, candidates: readonly string[]): ScoreBreakdown {
		const health = this.source.getMetrics(providerId)?.healthScore ?? 1
		const performance = this.historicalPerformance(providerId)
		const loadBalance = this.loadBalance(providerId, candidates)
		const contextMatch = this.contextMatch(providerId, request)
		const learning = this.learningAdjustment(providerId)

		const w = this.weights
		const total = clamp(
			w.health * health +
				w.performance * performance +
				w.loadBalance * loadBalance +
				w.contextMatch * contextMatch +
				w.learning * learning,
			0,
			1,
		)
		return { providerId, health, performance, loadBalance, contextMatch, learning, total }
	}

	decide(candidates: readonly string[], request: RoutingRequest): RoutingDecision {
		this.decisionCount++
		if (candidates.length === 0) return { ranked: [], scores: [], cached: false }

		const key = this.cacheKey(candidates, request)
		const hit = this.decisions.get(key)
		if (hit) {
			this.cacheHits++
			return { ...hit, cached: true }
		}

		const scores = candidates
			.map((id) => this.score(id, request, candidates))
			.sort((a, b) => b.total - a.total || a.providerId.localeCompare(b.providerId))
		const ranked = scores.map((s) => s.providerId)
		const decision: RoutingDecision = Object.freeze({
			providerId: ranked[0],
			ranked: Object.freeze(ranked),
			scores: Object.freeze(scores),
			cached: false,
		})
		this.decisions.set(key, decision)
		this.log.debug({ selected: decision.providerId, candidates: candidates.length }, 'routing_decision')
		return decision
	}

	select(candidates: readonly string[], request: RoutingRequest): string | undefined {
		return this.decide(candidates, request).providerId
	}

	rank(candidates: readonly string[], request: RoutingRequest): string[] {
		return [...this.decide(candidates, request).ranked]
	}

	recordOutcome(providerId: string, success: boolean, latencyMs: number): void {
		const records = this.history.get(providerId) ?? []
		records.push({ success, latencyMs, at: Date.now() })
		while (records.length > this.config.historySize) records.shift()
		this.history.set(providerId, records)

		if (!success) {
			this.decisions.deleteWhere((d) => d.providerId === providerId)
		}
	}

	recordStrategyOutcome(mode: RoutingMode, success: boolean): void {
		const alpha = this.config.tuning.alpha
		const stats = this.strategyStats.get(mode) ?? { successRate: 1, usage: 0 }
		stats.usage++
		stats.successRate = alpha * (success ? 1 : 0) + (1 - alpha) * stats.successRate
		this.strategyStats.set(mode, stats)

		this.outcomesSinceOptimize++
		if (this.outcomesSinceOptimize >= this.config.tuning.optimizeEvery) {
			this.outcomesSinceOptimize = 0
			this.optimizeStrategyWeights()
		}
	}

	/**
	 * Nudges each well-sampled strategy's weight up or down by its success
	 * rate, then renormalizes and clamps to the configured band. Returns false
	 * when there is not enough usage to act on.
	 */
	optimizeStrategyWeights(): boolean {
		const { minTotalUsage, minStrategyUsage, floor, ceiling } = this.config.tuning
		let totalUsage = 0
		for (const stats of this.strategyStats.values()) totalUsage += stats.usage
		if (totalUsage <= minTotalUsage) return false

		const next = { ...this.strategyWeights }
		for (const [mode, stats] of this.strategyStats) {
			if (stats.usage <= minStrategyUsage) continue
			if (stats.successRate > 0.9) next[mode] = Math.min(ceiling, next[mode] * 1.1)
			else if (stats.successRate < 0.7) next[mode] = Math.max(floor, next[mode] * 0.9)
		}

		const sum = ROUTING_MODES.reduce((acc, m) => acc + next[m], 0)
		for (const mode of ROUTING_MODES) {
			next[mode] = clamp(sum > 0 ? next[mode] / sum : 0, floor, ceiling)
		}
		this.strategyWeights = next
		this.log.debug({ weights: next, totalUsage }, 'strategy_weights_optimized')
		return true
	}

	/**
	 * Exponential backoff for the `retryCount`-th retry, plus 10-30% jitter,
	 * capped at `retry.maxDelayMs`.
	 */
	retryDelay(retryCount: number, random: () => number = Math.random): number {
		const { baseDelayMs, maxDelayMs, multiplier } = this.config.retry
		const delay = baseDelayMs * multiplier ** Math.max(0, retryCount)
		const jitter = (0.1 + 0.2 * random()) * delay
		return Math.min(maxDelayMs, delay + jitter)
	}

	getStrategyWeights(): Readonly<Record<RoutingMode, number>> {
		return { ...this.strategyWeights }
	}

	/** Highest-weighted concrete strategy; ties go to declaration order. */
	preferredStrategy(): StrategyName {
		let best: StrategyName = STRATEGY_NAMES[0]
		for (const name of STRATEGY_NAMES) {
			if (this.strategyWeights[name] > this.strategyWeights[best]) best = name
		}
		return best
	}

	getStatistics(): EngineStatistics {
		const perf = (mode: RoutingMode): StrategyPerformance => {
			const stats = this.strategyStats.get(mode)
			return {
				successRate: stats?.successRate ?? 1,
				usage: stats?.usage ?? 0,
				weight: this.strategyWeights[mode],
			}
		}
		return {
			decisions: this.decisionCount,
			cacheHits: this.cacheHits,
			cacheSize: this.decisions.size(),
			trackedProviders: this.history.size,
			strategies: {
				intelligent: perf('intelligent'),
				priority: perf('priority'),
				round_robin: perf('round_robin'),
				weighted_round_robin: perf('weighted_round_robin'),
				health_based: perf('health_based'),
				circuit_breaker_aware: perf('circuit_breaker_aware'),
			},
		}
	}

	clearDecisionCache(): void {
		this.decisions.clear()
	}

	clearHistory(providerId?: string): void {
		if (providerId === undefined) this.history.clear()
		else this.history.delete(providerId)
		this.decisions.clear()
	}

	private cacheKey(candidates: readonly string[], request: RoutingRequest): string {
		return [
			[...candidates].sort().join(','),
			request.assetType,
			request.dataType,
			request.market ?? '',
			priorityBand(request.priority),
		].join('|')
	}

	private historicalPerformance(providerId: string): number {
		const records = (this.history.get(providerId) ?? []).slice(-this.config.performanceWindow)
		if (records.length === 0) return NO_HISTORY_PERFORMANCE

		let weightSum = 0
		let successSum = 0
		let latencySum = 0
		records.forEach((record, i) => {
			const age = records.length - 1 - i
			const weight = this.config.recencyDecay ** age
			weightSum += weight
			successSum += weight * (record.success ? 1 : 0)
			latencySum += weight * record.latencyMs
		})
		const weightedSuccess = successSum / weightSum
		const weightedLatency = latencySum / weightSum
		return 0.7 * weightedSuccess + 0.3 * Math.max(0, 1 - weightedLatency / this.latencyCeilingMs)
	}

	private loadBalance(providerId: string, candidates: readonly string[]): number {
		const load = (id: string) => this.source.getMetrics(id)?.currentLoad ?? 0
		const avg = candidates.reduce((acc, id) => acc + load(id), 0) / Math.max(1, candidates.length)
		if (avg === 0) return 1
		return Math.max(0, 1 - 0.5 * (load(providerId) / avg))
	}

	private contextMatch(providerId: string, request: RoutingRequest): number {
		let score = 0.5
		const caps = this.source.getCapabilities(providerId)
		if (caps) {
			score += caps.assetTypes.includes(request.assetType) ? 0.2 : -0.3
			score += caps.dataTypes.includes(request.dataType) ? 0.2 : -0.3
			if (request.market !== undefined) {
				score += caps.markets.includes(request.market.toUpperCase()) ? 0.05 : -0.2
			}
		}

		const rate = this.source.getMetrics(providerId)?.successRate ?? 1
		if (request.priority > 80 && rate > 0.95) score += 0.1
		else if (request.priority < 30) score += 0.05
		return clamp(score, 0, 1)
	}

	private learningAdjustment(providerId: string): number {
		const window = this.config.learningWindow
		const records = this.history.get(providerId) ?? []
		if (records.length < window * 2) return 0

		const recent = records.slice(-window)
		const prior = records.slice(-window * 2, -window)
		const trend = successRate(recent) - successRate(prior)
		const bound = this.config.learningBound
		return clamp(trend * this.config.learningRate, -bound, bound)
	}
}
