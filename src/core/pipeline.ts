import type { RawRecord } from '../providers/types.js'
import type {
	DataType,
	FailoverResult,
	FieldMappingInfo,
	FieldType,
	Row,
	SourceInfo,
	StandardQuery,
	StandardResult,
} from '../types.js'
import { makeCacheKey, TtlCache } from './cache.js'
import type { CircuitBreakerManager } from './circuit-breaker.js'
import type { PipelineConfig, StrategyMode } from './config.js'
import {
	ConfigurationError,
	DataQualityError,
	ProvidersExhaustedError,
	toError,
} from './errors.js'
import type { FieldMappingEngine, MappingMode } from './field-mapping.js'
import type { IntelligentRouter, RoutingMode } from './intelligent-router.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { describeQuery } from './query.js'
import { coerceTable } from './quality.js'
import type { RateLimiter } from './rate-limiter.js'
import type { CapabilityRegistry } from './registry.js'
import type { BreakerSnapshot, RoutingContext, RoutingRequest, StrategyRouter } from './strategies.js'
import { withTimeout } from './timeout.js'
import { WorkerPool, type WorkerPoolSnapshot } from './worker-pool.js'

export interface PipelineDependencies {
	config: PipelineConfig
	registry: CapabilityRegistry
	breakers: CircuitBreakerManager
	rateLimiter: RateLimiter
	strategies: StrategyRouter
	engine: IntelligentRouter
	mapper: FieldMappingEngine
	logger?: Logger
}

export interface ProcessOptions {
	noCache?: boolean
	strategy?: StrategyMode
}

export interface RankedCandidates {
	strategy: RoutingMode
	ranked: string[]
}

export interface TransformedData {
	rows: Row[]
	columns: string[]
	mapping: FieldMappingInfo[]
	mappingMode: MappingMode
	qualityScore: number
	issues: string[]
}

export interface FailoverOutcome {
	result: FailoverResult
	data?: TransformedData
	extractionMs: number
}

export interface PipelineStatistics {
	totalRequests: number
	cacheHits: number
	failovers: number
	exhausted: number
	avgProcessingMs: number
	pool: WorkerPoolSnapshot
}

function collectColumns(records: readonly RawRecord[]): string[] {
	const seen = new Set<string>()
	for (const record of records) for (const key of Object.keys(record)) seen.add(key)
	return [...seen]
}

function freezeRows(rows: readonly Row[]): readonly Row[] {
	return Object.freeze(rows.map((row) => Object.freeze({ ...row })))
}

/** Throws {@link ProvidersExhaustedError} for a failed result, returns it otherwise. */
export function requireSuccess(result: StandardResult): StandardResult {
	if (result.success) return result
	throw new ProvidersExhaustedError(
		describeQuery(result.query),
		[...result.source.failedProviders],
		[...result.source.skipped],
		[...result.source.errors],
	)
}

/**
 * Query → candidates → ranked failover extraction → mapping and coercion →
 * cached {@link StandardResult}. Owns its collaborators one-way; none of them
 * call back into the pipeline.
 */
export class ExtractTransformPipeline {
	private readonly config: PipelineConfig
	private readonly registry: CapabilityRegistry
	private readonly breakers: CircuitBreakerManager
	private readonly rateLimiter: RateLimiter
	private readonly strategies: StrategyRouter
	private readonly engine: IntelligentRouter
	private readonly mapper: FieldMappingEngine
	private readonly log: Logger
	private readonly cache: TtlCache<StandardResult>
	private readonly pool: WorkerPool
	private totalRequests = 0
	private cacheHits = 0
	private failovers = 0
	private exhausted = 0
	private processedCount = 0
	private processingMsTotal = 0

	constructor(deps: PipelineDependencies) {
		this.config = deps.config
		this.registry = deps.registry
		this.breakers = deps.breakers
		this.rateLimiter = deps.rateLimiter
		this.strategies = deps.strategies
		this.engine = deps.engine
		this.mapper = deps.mapper
		this.log = (deps.logger ?? rootLogger).child({ component: 'pipeline' })
		this.cache = new TtlCache({
			ttlMs: deps.config.cacheTtlMs,
			maxEntries: deps.config.cacheMaxEntries,
		})
		this.pool = new WorkerPool(deps.config.workers)
	}

	transformQuery(query: StandardQuery): RoutingRequest {
		return {
			symbol: query.symbol,
			assetType: query.assetType,
			dataType: query.dataType,
			period: query.period,
			market: query.market,
			priority: query.priority,
			timeoutMs: query.timeoutMs,
			retryCount: query.retryCount,
			qualityRequirement: query.qualityRequirement,
			params: query.extraParams,
		}
	}

	resolveCandidates(query: StandardQuery): string[] {
		if (query.provider !== undefined) {
			const entry = this.registry.getEntry(query.provider)
			if (!entry) throw new ConfigurationError(`Unknown provider: ${query.provider}`)
			if (entry.status === 'disabled') {
				throw new ConfigurationError(`Provider ${query.provider} is disabled`)
			}
			return [query.provider]
		}
		return this.registry.getAvailable(query.dataType, query.assetType, query.market)
	}

	rank(
		candidates: readonly string[],
		request: RoutingRequest,
		mode: StrategyMode = this.config.strategy,
	): RankedCandidates {
		if (candidates.length <= 1) {
			return { strategy: mode === 'auto' ? 'priority' : mode, ranked: [...candidates] }
		}
		if (mode === 'intelligent') {
			return { strategy: 'intelligent', ranked: this.engine.rank(candidates, request) }
		}
		const name =
			mode === 'auto'
				? this.strategies.choose(request, candidates.length, this.engine.preferredStrategy())
				: mode
		return {
			strategy: name,
			ranked: this.strategies.rank(name, candidates, request, this.routingContext(candidates)),
		}
	}

	async extractWithFailover(
		query: StandardQuery,
		request: RoutingRequest,
		ranked: readonly string[],
	): Promise<FailoverOutcome> {
		const started = Date.now()
		const maxAttempts = query.retryCount + 1
		const failedProviders: string[] = []
		const skipped: string[] = []
		const errorMessages: string[] = []
		let remaining = query.timeoutMs
		let attempts = 0

		const finish = (successfulProvider?: string): FailoverResult => ({
			success: successfulProvider !== undefined,
			attempts,
			failedProviders,
			skipped,
			successfulProvider,
			errorMessages,
			totalMs: Date.now() - started,
		})

		for (const [position, id] of ranked.entries()) {
			if (attempts >= maxAttempts) break
			if (remaining <= 0) {
				skipped.push(...ranked.slice(position))
				errorMessages.push(`timeout budget of ${query.timeoutMs}ms exhausted`)
				break
			}

			const entry = this.registry.getEntry(id)
			if (!entry) {
				skipped.push(id)
				continue
			}
			const limits = entry.adapter.rateLimits
			if (limits && !this.rateLimiter.canRequest(id, limits)) {
				skipped.push(id)
				errorMessages.push(`${id}: rate limited`)
				this.log.debug({ provider: id }, 'provider_rate_limited')
				continue
			}
			const breaker = this.breakers.getOrCreate(id)
			if (!breaker.canExecute()) {
				skipped.push(id)
				errorMessages.push(`${id}: circuit open (${breaker.getDegradation()})`)
				this.log.debug({ provider: id }, 'provider_circuit_open')
				continue
			}
			if (limits) this.rateLimiter.consumeToken(id, limits)

			attempts++
			const attemptStarted = Date.now()
			const budget = remaining
			this.registry.beginRequest(id)
			try {
				await entry.adapter.ensureConnected()
				const records = await withTimeout(id, budget, (signal) =>
					entry.adapter.extract({
						symbol: request.symbol,
						assetType: request.assetType,
						dataType: request.dataType,
						period: request.period,
						range: query.range,
						market: request.market,
						priority: request.priority,
						timeoutMs: budget,
						signal,
						params: request.params,
					}),
				)
				const extractionMs = Date.now() - attemptStarted
				const data = this.transformData(records, query.dataType)

				this.registry.recordOutcome(id, true, extractionMs, data.qualityScore)
				this.engine.recordOutcome(id, true, extractionMs)
				return { result: finish(id), data, extractionMs }
			} catch (err) {
				const latencyMs = Date.now() - attemptStarted
				const message = toError(err).message
				failedProviders.push(id)
				errorMessages.push(`${id}: ${message}`)
				this.registry.recordOutcome(id, false, latencyMs, 0, err)
				this.engine.recordOutcome(id, false, latencyMs)
				this.log.warn({ provider: id, attempt: attempts, latencyMs, err }, 'failover_attempt_failed')
			} finally {
				this.registry.endRequest(id)
				remaining -= Date.now() - attemptStarted
			}
		}

		return { result: finish(), extractionMs: 0 }
	}

	/**
	 * Maps, validates, coerces and scores one provider reply. Throws
	 * {@link DataQualityError} when the reply is empty or carries none of the
	 * data type's required fields.
	 */
	transformData(records: readonly RawRecord[], dataType: DataType): TransformedData {
		if (records.length === 0) throw new DataQualityError('empty reply')

		const columns = collectColumns(records)
		const issues: string[] = []
		let mappingMode: MappingMode = 'intelligent'
		let mapping = this.mapper.mapColumns(columns, records, dataType, 'intelligent')

		const required = this.mapper.requiredFields(dataType)
		const covered = (candidate: readonly FieldMappingInfo[]): number => {
			const targets = new Set(candidate.map((m) => m.target))
			return required.filter((field) => targets.has(field)).length
		}

		const validation = this.mapper.validateMapping(records, mapping, dataType)
		if (!validation.valid) {
			issues.push(...validation.issues.map((issue) => `mapping: ${issue}`))
			// basic mode must not cover fewer required fields than intelligent mode
			const basic = this.mapper.mapColumns(columns, records, dataType, 'basic')
			if (covered(basic) >= covered(mapping)) {
				mapping = basic
				mappingMode = 'basic'
			}
			this.log.warn({ dataType, issues: validation.issues, mappingMode }, 'mapping_validation_failed')
		}

		if (required.length > 0 && covered(mapping) === 0) {
			throw new DataQualityError(`reply has none of the required fields: ${required.join(', ')}`)
		}

		const fieldTypes: Record<string, FieldType> = {}
		for (const info of mapping) fieldTypes[info.target] = info.fieldType

		const table = coerceTable(this.mapper.applyMapping(records, mapping), fieldTypes, required)
		if (table.rows.length === 0) throw new DataQualityError('reply holds no non-null values')

		return {
			rows: table.rows,
			columns: table.columns,
			mapping,
			mappingMode,
			qualityScore: table.qualityScore,
			issues: [...issues, ...table.issues],
		}
	}

	async process(query: StandardQuery, options: ProcessOptions = {}): Promise<StandardResult> {
		const started = Date.now()
		this.totalRequests++

		const cacheKey = this.cacheKey(query)
		if (!options.noCache) {
			const hit = this.cache.get(cacheKey)
			if (hit) {
				this.cacheHits++
				return Object.freeze({ ...hit, source: Object.freeze({ ...hit.source, cached: true }) })
			}
		}

		const request = this.transformQuery(query)
		const candidates = this.resolveCandidates(query)
		if (candidates.length === 0) {
			this.exhausted++
			this.log.warn({ query: describeQuery(query) }, 'no_providers_available')
			const reason = `No providers available for ${describeQuery(query)}`
			return this.failure(query, 'none', started, reason, {
				success: false,
				attempts: 0,
				failedProviders: [],
				skipped: [],
				errorMessages: [],
				totalMs: 0,
			})
		}

		const { strategy, ranked } = this.rank(candidates, request, options.strategy)
		const outcome = await this.extractWithFailover(query, request, ranked)
		this.engine.recordStrategyOutcome(strategy, outcome.result.success)
		this.recordProcessing(started)

		if (!outcome.result.success || !outcome.data) {
			this.exhausted++
			const reason = new ProvidersExhaustedError(
				describeQuery(query),
				outcome.result.failedProviders,
				outcome.result.skipped,
				outcome.result.errorMessages,
			).message
			this.log.warn(
				{
					query: describeQuery(query),
					attempted: outcome.result.failedProviders,
					skipped: outcome.result.skipped,
				},
				'providers_exhausted',
			)
			return this.failure(query, strategy, started, reason, outcome.result)
		}

		if (outcome.result.failedProviders.length > 0) this.failovers++

		const { data } = outcome
		const source: SourceInfo = Object.freeze({
			provider: outcome.result.successfulProvider,
			strategy,
			attempts: outcome.result.attempts,
			failedProviders: outcome.result.failedProviders,
			skipped: outcome.result.skipped,
			errors: outcome.result.errorMessages,
			extractionMs: outcome.extractionMs,
			totalMs: Date.now() - started,
			cached: false,
			fetchedAt: new Date().toISOString(),
		})
		const result: StandardResult = Object.freeze({
			success: true,
			data: freezeRows(data.rows),
			columns: Object.freeze(data.columns),
			mapping: Object.freeze(data.mapping),
			mappingMode: data.mappingMode,
			source,
			qualityScore: data.qualityScore,
			qualityIssues: Object.freeze(data.issues),
			query,
		})

		this.cache.set(cacheKey, result)
		this.log.debug(
			{
				query: describeQuery(query),
				provider: source.provider,
				attempts: source.attempts,
				qualityScore: result.qualityScore,
			},
			'query_processed',
		)
		return result
	}

	/** Same as {@link process}, bounded by the configured worker count. */
	submit(query: StandardQuery, options: ProcessOptions = {}): Promise<StandardResult> {
		return this.pool.run(() => this.process(query, options))
	}

	processMany(
		queries: readonly StandardQuery[],
		options: ProcessOptions = {},
	): Promise<StandardResult[]> {
		return Promise.all(queries.map((query) => this.submit(query, options)))
	}

	getStatistics(): PipelineStatistics {
		return {
			totalRequests: this.totalRequests,
			cacheHits: this.cacheHits,
			failovers: this.failovers,
			exhausted: this.exhausted,
			avgProcessingMs: this.processedCount === 0 ? 0 : this.processingMsTotal / this.processedCount,
			pool: this.pool.snapshot(),
		}
	}

	clearCache(): void {
		this.cache.clear()
	}

	private cacheKey(query: StandardQuery): string {
		return makeCacheKey('query', {
			symbol: query.symbol,
			assetType: query.assetType,
			dataType: query.dataType,
			period: query.period,
			start: query.range.start,
			end: query.range.end,
			market: query.market,
			provider: query.provider,
			extra: query.extraParams,
		})
	}

	private routingContext(candidates: readonly string[]): RoutingContext {
		const breakers: Record<string, BreakerSnapshot> = {}
		for (const id of candidates) {
			const breaker = this.breakers.get(id)
			if (!breaker) continue
			const report = breaker.getReport()
			breakers[id] = {
				state: report.state,
				failureRate: report.failureRate,
				windowCount: report.windowCount,
			}
		}
		return {
			metrics: this.registry.getAllMetrics(),
			priorities: this.registry.getPriorities(),
			weights: this.registry.getWeights(),
			breakers,
		}
	}

	private recordProcessing(started: number): void {
		this.processedCount++
		this.processingMsTotal += Date.now() - started
	}

	private failure(
		query: StandardQuery,
		strategy: string,
		started: number,
		reason: string,
		failover: FailoverResult,
	): StandardResult {
		return Object.freeze({
			success: false,
			data: Object.freeze([]),
			columns: Object.freeze([]),
			mapping: Object.freeze([]),
			mappingMode: 'intelligent',
			source: Object.freeze({
				strategy,
				attempts: failover.attempts,
				failedProviders: failover.failedProviders,
				skipped: failover.skipped,
				errors: failover.errorMessages,
				extractionMs: 0,
				totalMs: Date.now() - started,
				cached: false,
				fetchedAt: new Date().toISOString(),
			}),
			qualityScore: 0,
			qualityIssues: Object.freeze([]),
			failureReason: reason,
			query,
		})
	}
}
