import { adaptProvider, type ProviderMatch, type ProviderAdapter } from '../providers/adapter.js'
import type { HealthCheckResult, ProviderCapabilities } from '../providers/types.js'
import type { AssetType, DataType } from '../types.js'
import type { CircuitBreakerManager, CircuitState } from './circuit-breaker.js'
import type { RegistryConfig } from './config.js'
import { ConfigurationError, toError } from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { withTimeout } from './timeout.js'

export type ProviderStatus = 'unknown' | 'active' | 'inactive' | 'error' | 'disabled'

export type DiscoveryOutcome = 'registered' | 'not_a_provider' | 'failed'

export interface RegisterOptions {
	priority?: number
	weight?: number
	capabilities?: Partial<ProviderCapabilities>
	qualityRating?: number
	reliabilityRating?: number
}

export interface ProviderEntry {
	readonly id: string
	readonly adapter: ProviderAdapter
	readonly capabilities: ProviderCapabilities
	readonly priority: number
	readonly weight: number
	readonly qualityRating: number
	readonly reliabilityRating: number
	readonly registeredAt: number
	status: ProviderStatus
	lastHealth?: HealthCheckResult
}

export interface ProviderMetrics {
	providerId: string
	totalRequests: number
	successRequests: number
	failedRequests: number
	successRate: number
	avgResponseTimeMs: number
	qualityScore: number
	availabilityScore: number
	currentLoad: number
	lastSuccessAt?: number
	lastFailureAt?: number
	healthScore: number
}

export interface ProviderSummary {
	id: string
	status: ProviderStatus
	match: ProviderMatch
	priority: number
	weight: number
	capabilities: ProviderCapabilities
	lastHealth?: HealthCheckResult
}

export interface RegistryStatistics {
	totalProviders: number
	byStatus: Record<ProviderStatus, number>
	indexBuckets: number
	totalRequests: number
	successRate: number
	avgHealthScore: number
}

/** Read-only view the routing layer scores against. */
export interface MetricsSource {
	getMetrics(providerId: string): ProviderMetrics | undefined
	getCapabilities(providerId: string): ProviderCapabilities | undefined
}

interface MutableMetrics {
	totalRequests: number
	successRequests: number
	failedRequests: number
	timedRequests: number
	avgResponseTimeMs: number
	qualityScore: number
	availabilityScore: number
	currentLoad: number
	lastSuccessAt?: number
	lastFailureAt?: number
}

export interface CapabilityRegistryOptions {
	config: RegistryConfig
	breakers: CircuitBreakerManager
	disabledSources?: readonly string[]
	logger?: Logger
}

const DEFAULT_PRIORITY = 100
const BREAKER_SCORE: Record<CircuitState, number> = { closed: 1, half_open: 0.5, open: 0 }

function emptyMetrics(): MutableMetrics {
	return {
		totalRequests: 0,
		successRequests: 0,
		failedRequests: 0,
		timedRequests: 0,
		avgResponseTimeMs: 0,
		qualityScore: 1,
		availabilityScore: 1,
		currentLoad: 0,
	}
}

function indexKey(dataType: DataType, assetType: AssetType): string {
	return `${dataType}|${assetType}`
}

/**
 * Owns provider registration, the capability index, and the per-provider
 * metrics that routing decisions read.
 */
export class CapabilityRegistry implements MetricsSource {
	private readonly config: RegistryConfig
	private readonly breakers: CircuitBreakerManager
	private readonly disabledSources: ReadonlySet<string>
	private readonly log: Logger
	private readonly entries = new Map<string, ProviderEntry>()
	private readonly metrics = new Map<string, MutableMetrics>()
	private index = new Map<string, string[]>()
	private marketIndex = new Map<string, Set<string>>()
	private healthTimer: ReturnType<typeof setInterval> | undefined
	private healthRunning = false

	constructor(options: CapabilityRegistryOptions) {
		this.config = options.config
		this.breakers = options.breakers
		this.disabledSources = new Set(options.disabledSources ?? [])
		this.log = (options.logger ?? rootLogger).child({ component: 'registry' })
	}

	register(id: string, provider: unknown, options: RegisterOptions = {}): boolean {
		const adapter = adaptProvider(id, provider, options.capabilities)
		if (!adapter) {
			this.log.warn({ provider: id }, 'provider_rejected')
			return false
		}
		if (this.entries.has(id)) {
			this.log.warn({ provider: id }, 'provider_replaced')
		}

		const capabilities = adapter.getCapabilities()
		this.entries.set(id, {
			id,
			adapter,
			capabilities,
			priority: options.priority ?? adapter.priority ?? DEFAULT_PRIORITY,
			weight: options.weight ?? 1,
			qualityRating: options.qualityRating ?? adapter.qualityRating ?? 0.8,
			reliabilityRating: options.reliabilityRating ?? adapter.reliabilityRating ?? 0.8,
			registeredAt: Date.now(),
			status: this.disabledSources.has(id) ? 'disabled' : 'unknown',
		})
		this.metrics.set(id, emptyMetrics())
		this.breakers.getOrCreate(id)
		this.rebuildIndex()

		this.log.info(
			{ provider: id, match: adapter.match, ...capabilities },
			'provider_registered',
		)
		return true
	}

	deregister(id: string): boolean {
		const entry = this.entries.get(id)
		if (!entry) return false

		this.entries.delete(id)
		this.metrics.delete(id)
		this.breakers.remove(id)
		this.rebuildIndex()

		entry.adapter.disconnect().catch((err: unknown) => {
			this.log.warn({ provider: id, err }, 'provider_disconnect_failed')
		})
		this.log.info({ provider: id }, 'provider_deregistered')
		return true
	}

	discover(candidates: Record<string, unknown>): Record<string, DiscoveryOutcome> {
		const outcomes: Record<string, DiscoveryOutcome> = {}
		for (const [id, candidate] of Object.entries(candidates)) {
			try {
				outcomes[id] = this.register(id, candidate) ? 'registered' : 'not_a_provider'
			} catch (err) {
				this.log.error({ provider: id, err }, 'provider_discovery_failed')
				outcomes[id] = 'failed'
			}
		}
		return outcomes
	}

	has(id: string): boolean {
		return this.entries.has(id)
	}

	getEntry(id: string): ProviderEntry | undefined {
		return this.entries.get(id)
	}

	setStatus(id: string, status: ProviderStatus): void {
		const entry = this.entries.get(id)
		if (!entry) throw new ConfigurationError(`Unknown provider: ${id}`)
		entry.status = status
		this.log.info({ provider: id, status }, 'provider_status_changed')
	}

	getCapabilities(id: string): ProviderCapabilities | undefined {
		const entry = this.entries.get(id)
		if (!entry) return undefined
		return {
			assetTypes: [...entry.capabilities.assetTypes],
			dataTypes: [...entry.capabilities.dataTypes],
			markets: [...entry.capabilities.markets],
		}
	}

	/** Index lookup filtered by status, health grace and breaker availability. */
	getAvailable(dataType: DataType, assetType: AssetType, market?: string): string[] {
		let ids = this.index.get(indexKey(dataType, assetType)) ?? []
		if (market !== undefined) {
			const inMarket = this.marketIndex.get(market.toUpperCase()) ?? new Set<string>()
			ids = ids.filter((id) => inMarket.has(id))
		}
		return ids.filter((id) => this.isEligible(id))
	}

	isEligible(id: string): boolean {
		const entry = this.entries.get(id)
		if (!entry) return false
		if (entry.status === 'disabled' || entry.status === 'inactive') return false

		if (entry.status === 'error') {
			const last = entry.lastHealth
			if (!last || Date.now() - last.checkedAt < this.config.healthCheckIntervalMs) return false
		}

		const breaker = this.breakers.get(id)
		return breaker === undefined || breaker.isAvailable()
	}

	beginRequest(id: string): void {
		const m = this.metrics.get(id)
		if (m) m.currentLoad++
	}

	endRequest(id: string): void {
		const m = this.metrics.get(id)
		if (m) m.currentLoad = Math.max(0, m.currentLoad - 1)
	}

	recordOutcome(
		id: string,
		success: boolean,
		latencyMs: number,
		qualityScore = success ? 1 : 0,
		error?: unknown,
	): void {
		const m = this.metrics.get(id)
		if (!m) {
			this.log.warn({ provider: id }, 'outcome_for_unknown_provider')
			return
		}

		const now = Date.now()
		const alpha = this.config.ewmaAlpha
		m.totalRequests++
		if (success) {
			m.successRequests++
			m.lastSuccessAt = now
			if (latencyMs > 0) {
				m.timedRequests++
				m.avgResponseTimeMs += (latencyMs - m.avgResponseTimeMs) / m.timedRequests
			}
		} else {
			m.failedRequests++
			m.lastFailureAt = now
		}
		m.qualityScore = alpha * qualityScore + (1 - alpha) * m.qualityScore
		m.availabilityScore = alpha * (success ? 1 : 0) + (1 - alpha) * m.availabilityScore

		const breaker = this.breakers.getOrCreate(id)
		if (success) breaker.recordSuccess(latencyMs)
		else breaker.recordFailure(error ?? new Error(`${id} extraction failed`), latencyMs)
	}

	getMetrics(id: string): ProviderMetrics | undefined {
		const m = this.metrics.get(id)
		if (!m) return undefined
		const successRate = m.totalRequests === 0 ? 1 : m.successRequests / m.totalRequests
		return Object.freeze({
			providerId: id,
			totalRequests: m.totalRequests,
			successRequests: m.successRequests,
			failedRequests: m.failedRequests,
			successRate,
			avgResponseTimeMs: m.avgResponseTimeMs,
			qualityScore: m.qualityScore,
			availabilityScore: m.availabilityScore,
			currentLoad: m.currentLoad,
			lastSuccessAt: m.lastSuccessAt,
			lastFailureAt: m.lastFailureAt,
			healthScore: this.healthScore(id, successRate, m.avgResponseTimeMs),
		})
	}

	getAllMetrics(): Record<string, ProviderMetrics> {
		const out: Record<string, ProviderMetrics> = {}
		for (const id of this.entries.keys()) {
			const m = this.getMetrics(id)
			if (m) out[id] = m
		}
		return out
	}

	getPriorities(): Record<string, number> {
		const out: Record<string, number> = {}
		for (const [id, entry] of this.entries) out[id] = entry.priority
		return out
	}

	getWeights(): Record<string, number> {
		const out: Record<string, number> = {}
		for (const [id, entry] of this.entries) out[id] = entry.weight
		return out
	}

	listProviders(): ProviderSummary[] {
		return [...this.entries.values()].map((e) =>
			Object.freeze({
				id: e.id,
				status: e.status,
				match: e.adapter.match,
				priority: e.priority,
				weight: e.weight,
				capabilities: this.getCapabilities(e.id) ?? e.capabilities,
				lastHealth: e.lastHealth,
			}),
		)
	}

	getStatistics(): RegistryStatistics {
		const byStatus: Record<ProviderStatus, number> = {
			unknown: 0,
			active: 0,
			inactive: 0,
			error: 0,
			disabled: 0,
		}
		let totalRequests = 0
		let successRequests = 0
		let healthSum = 0
		for (const entry of this.entries.values()) {
			byStatus[entry.status]++
			const m = this.getMetrics(entry.id)
			if (!m) continue
			totalRequests += m.totalRequests
			successRequests += m.successRequests
			healthSum += m.healthScore
		}
		const count = this.entries.size
		return {
			totalProviders: count,
			byStatus,
			indexBuckets: this.index.size,
			totalRequests,
			successRate: totalRequests === 0 ? 1 : successRequests / totalRequests,
			avgHealthScore: count === 0 ? 0 : healthSum / count,
		}
	}

	async checkHealth(id?: string): Promise<Record<string, HealthCheckResult>> {
		let targets: ProviderEntry[]
		if (id !== undefined) {
			const entry = this.entries.get(id)
			if (!entry) throw new ConfigurationError(`Unknown provider: ${id}`)
			targets = [entry]
		} else {
			targets = [...this.entries.values()].filter((e) => e.status !== 'disabled')
		}

		const settled = await Promise.allSettled(targets.map((entry) => this.runHealthCheck(entry)))
		const results: Record<string, HealthCheckResult> = {}
		settled.forEach((outcome, i) => {
			const entry = targets[i]
			results[entry.id] =
				outcome.status === 'fulfilled'
					? outcome.value
					: this.recordHealth(entry, {
							healthy: false,
							message: toError(outcome.reason).message,
							latencyMs: 0,
							checkedAt: Date.now(),
						})
		})
		return results
	}

	startHealthChecks(): void {
		if (this.healthTimer) return
		this.healthTimer = setInterval(() => {
			void this.runHealthTick()
		}, this.config.healthCheckIntervalMs)
		this.healthTimer.unref()
		this.log.info({ intervalMs: this.config.healthCheckIntervalMs }, 'health_checks_started')
	}

	stopHealthChecks(): void {
		if (!this.healthTimer) return
		clearInterval(this.healthTimer)
		this.healthTimer = undefined
		this.log.info('health_checks_stopped')
	}

	async shutdown(): Promise<void> {
		this.stopHealthChecks()
		const results = await Promise.allSettled(
			[...this.entries.values()].map((e) => e.adapter.disconnect()),
		)
		for (const result of results) {
			if (result.status === 'rejected') {
				this.log.warn({ err: result.reason }, 'provider_disconnect_failed')
			}
		}
	}

	private async runHealthTick(): Promise<void> {
		if (this.healthRunning) return
		this.healthRunning = true
		try {
			await this.checkHealth()
		} catch (err) {
			this.log.error({ err }, 'health_tick_failed')
		} finally {
			this.healthRunning = false
		}
	}

	private async runHealthCheck(entry: ProviderEntry): Promise<HealthCheckResult> {
		const started = Date.now()
		let result: HealthCheckResult
		try {
			result = await withTimeout(entry.id, this.config.healthCheckTimeoutMs, () =>
				entry.adapter.healthCheck(),
			)
		} catch (err) {
			result = {
				healthy: false,
				message: toError(err).message,
				latencyMs: Date.now() - started,
				checkedAt: Date.now(),
			}
		}
		return this.recordHealth(entry, result)
	}

	private recordHealth(entry: ProviderEntry, result: HealthCheckResult): HealthCheckResult {
		entry.lastHealth = result
		if (entry.status !== 'disabled' && entry.status !== 'inactive') {
			entry.status = result.healthy ? 'active' : 'error'
		}
		const fields = { provider: entry.id, latencyMs: result.latencyMs, message: result.message }
		if (result.healthy) this.log.debug(fields, 'health_check_passed')
		else this.log.warn(fields, 'health_check_failed')
		return result
	}

	private healthScore(id: string, successRate: number, avgResponseTimeMs: number): number {
		const state = this.breakers.get(id)?.getState() ?? 'closed'
		const latencyScore = Math.max(0, 1 - avgResponseTimeMs / this.config.latencyCeilingMs)
		return 0.5 * successRate + 0.3 * BREAKER_SCORE[state] + 0.2 * latencyScore
	}

	private rebuildIndex(): void {
		const index = new Map<string, string[]>()
		const markets = new Map<string, Set<string>>()
		const ordered = [...this.entries.values()].sort(
			(a, b) => a.priority - b.priority || a.id.localeCompare(b.id),
		)

		for (const entry of ordered) {
			for (const dataType of entry.capabilities.dataTypes) {
				for (const assetType of entry.capabilities.assetTypes) {
					const key = indexKey(dataType, assetType)
					const bucket = index.get(key) ?? []
					if (!bucket.includes(entry.id)) bucket.push(entry.id)
					index.set(key, bucket)
				}
			}
			for (const market of entry.capabilities.markets) {
				const set = markets.get(market) ?? new Set<string>()
				set.add(entry.id)
				markets.set(market, set)
			}
		}

		this.index = index
		this.marketIndex = markets
	}
}
