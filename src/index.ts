export type {
	OutputFormat,
	GlobalOptions,
	AssetType,
	DataType,
	Period,
	FieldType,
	MatchMethod,
	CellValue,
	Row,
	TimeRange,
	StandardQuery,
	StandardResult,
	FieldMappingInfo,
	SourceInfo,
	FailoverResult,
} from './types.js'
export { ASSET_TYPES, DATA_TYPES, PERIODS, FIELD_TYPES } from './types.js'

export type {
	Provider,
	ProviderCapabilities,
	ExtractRequest,
	RawRecord,
	HealthCheckResult,
	RateLimitConfig,
} from './providers/types.js'
export { ProviderAdapter, adaptProvider, classifyProvider, normalizeReply } from './providers/adapter.js'
export { registerBuiltinProviders } from './providers/registry.js'
export { createYahooProvider, type YahooClient } from './providers/yahoo-finance.js'
export { createBinanceProvider, type FetchLike } from './providers/binance.js'

export {
	parseConfig,
	loadConfig,
	saveConfig,
	getConfigPath,
	resetConfigCache,
	routerConfigSchema,
	STRATEGY_NAMES,
	STRATEGY_MODES,
	type RouterConfig,
	type RouterConfigInput,
	type StrategyName,
	type StrategyMode,
} from './core/config.js'
export * from './core/errors.js'
export { createLogger, logger, type Logger, type LogLevel, type LogFields } from './core/logger.js'
export { createRouterContext, type RouterContext } from './core/context.js'
export { buildQuery, parseQuery, aliasDataType, describeQuery, type QueryInput } from './core/query.js'

export {
	CircuitBreaker,
	CircuitBreakerManager,
	type CircuitState,
	type CircuitBreakerReport,
	type StateChangeEvent,
} from './core/circuit-breaker.js'
export {
	CapabilityRegistry,
	type ProviderMetrics,
	type ProviderSummary,
	type ProviderStatus,
	type RegistryStatistics,
	type MetricsSource,
} from './core/registry.js'
export {
	StrategyRouter,
	PriorityStrategy,
	RoundRobinStrategy,
	WeightedRoundRobinStrategy,
	HealthBasedStrategy,
	CircuitBreakerAwareStrategy,
	type RoutingStrategy,
	type RoutingRequest,
	type RoutingContext,
} from './core/strategies.js'
export {
	IntelligentRouter,
	type RoutingDecision,
	type ScoreBreakdown,
	type EngineStatistics,
} from './core/intelligent-router.js'
export {
	FieldMappingEngine,
	loadSynonymTable,
	type CustomRule,
	type MappingMode,
	type MappingValidation,
	type SynonymTable,
} from './core/field-mapping.js'
export { detectFieldType } from './core/field-types.js'
export { coerceTable, coerceValue, isNullValue } from './core/quality.js'
export {
	ExtractTransformPipeline,
	requireSuccess,
	type ProcessOptions,
	type PipelineStatistics,
} from './core/pipeline.js'
export { WorkerPool } from './core/worker-pool.js'
export { TtlCache, makeCacheKey } from './core/cache.js'
export { RateLimiter } from './core/rate-limiter.js'
export * as formatter from './core/formatter.js'
