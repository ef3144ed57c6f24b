import { CircuitBreakerManager } from './circuit-breaker.js'
import { parseConfig, type RouterConfig, type RouterConfigInput } from './config.js'
import { FieldMappingEngine, type SynonymTable } from './field-mapping.js'
import { IntelligentRouter } from './intelligent-router.js'
import { logger as rootLogger, type Logger } from './logger.js'
import { ExtractTransformPipeline } from './pipeline.js'
import { RateLimiter } from './rate-limiter.js'
import { CapabilityRegistry } from './registry.js'
import { StrategyRouter } from './strategies.js'

export interface RouterContext {
	config: RouterConfig
	logger: Logger
	rateLimiter: RateLimiter
	breakers: CircuitBreakerManager
	registry: CapabilityRegistry
	strategies: StrategyRouter
	engine: IntelligentRouter
	mapper: FieldMappingEngine
	pipeline: ExtractTransformPipeline
	start(): void
	shutdown(): Promise<void>
}

export interface RouterContextOptions {
	logger?: Logger
	synonyms?: SynonymTable
}

/**
 * Wires every component from one validated config. Each call yields an
 * isolated graph; nothing is shared between contexts.
 */
export function createRouterContext(
	input: RouterConfigInput | RouterConfig = {},
	options: RouterContextOptions = {},
): RouterContext {
	const config = parseConfig(input)
	const logger = options.logger ?? rootLogger
	const rateLimiter = new RateLimiter()
	const breakers = new CircuitBreakerManager(config.circuitBreaker, logger.child({ component: 'breaker' }))
	const registry = new CapabilityRegistry({
		config: config.registry,
		breakers,
		disabledSources: config.disabledSources,
		logger,
	})
	const strategies = new StrategyRouter({
		healthFloor: config.registry.healthFloor,
		latencyCeilingMs: config.registry.latencyCeilingMs,
		minimumCalls: config.circuitBreaker.minimumCalls,
		failureRateThreshold: config.circuitBreaker.failureRateThreshold,
	})
	const engine = new IntelligentRouter({
		config: config.engine,
		latencyCeilingMs: config.registry.latencyCeilingMs,
		source: registry,
		logger,
	})
	const mapper = new FieldMappingEngine({ config: config.mapping, table: options.synonyms, logger })
	const pipeline = new ExtractTransformPipeline({
		config: config.pipeline,
		registry,
		breakers,
		rateLimiter,
		strategies,
		engine,
		mapper,
		logger,
	})

	return {
		config,
		logger,
		rateLimiter,
		breakers,
		registry,
		strategies,
		engine,
		mapper,
		pipeline,
		start: () => registry.startHealthChecks(),
		shutdown: () => registry.shutdown(),
	}
}
