import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join, resolve } from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from './errors.js'

export const STRATEGY_NAMES = [
	'priority',
	'round_robin',
	'weighted_round_robin',
	'health_based',
	'circuit_breaker_aware',
] as const

export type StrategyName = (typeof STRATEGY_NAMES)[number]

export const STRATEGY_MODES = ['intelligent', 'auto', ...STRATEGY_NAMES] as const

export type StrategyMode = (typeof STRATEGY_MODES)[number]

const ratio = z.number().min(0).max(1)

const adaptiveSchema = z
	.object({
		enabled: z.boolean().default(false),
		sampleSize: z.number().int().min(1).max(1000).default(50),
		factor: z.number().positive().max(1).default(0.1),
		minScale: z.number().positive().max(1).default(0.5),
		maxScale: z.number().min(1).max(10).default(1.5),
		highSuccessRate: ratio.default(0.9),
		lowSuccessRate: ratio.default(0.7),
	})
	.default({})

const degradationSchema = z
	.object({
		moderate: ratio.default(0.4),
		severe: ratio.default(0.6),
		critical: ratio.default(0.8),
	})
	.default({})

export const circuitBreakerSchema = z
	.object({
		failureThreshold: z.number().int().min(1).default(5),
		failureRateThreshold: ratio.default(0.5),
		minimumCalls: z.number().int().min(1).default(10),
		windowSize: z.number().int().min(1).max(1000).default(10),
		recoveryTimeoutMs: z.number().int().min(0).default(60_000),
		halfOpenMaxCalls: z.number().int().min(1).default(3),
		successThreshold: z.number().int().min(1).default(3),
		slowCallThresholdMs: z.number().int().min(1).default(5_000),
		slowCallRateThreshold: ratio.default(1),
		degradation: degradationSchema,
		adaptive: adaptiveSchema,
	})
	.default({})

const registrySchema = z
	.object({
		healthCheckIntervalMs: z.number().int().min(1_000).max(3_600_000).default(300_000),
		healthCheckTimeoutMs: z.number().int().min(100).max(300_000).default(10_000),
		healthFloor: ratio.default(0.5),
		latencyCeilingMs: z.number().positive().default(10_000),
		ewmaAlpha: ratio.default(0.1),
	})
	.default({})

const weightsSchema = z
	.object({
		health: z.number().min(0).default(0.3),
		performance: z.number().min(0).default(0.25),
		loadBalance: z.number().min(0).default(0.2),
		contextMatch: z.number().min(0).default(0.15),
		learning: z.number().min(0).default(0.1),
	})
	.default({})

const tuningSchema = z
	.object({
		alpha: ratio.default(0.1),
		minTotalUsage: z.number().int().min(0).default(100),
		minStrategyUsage: z.number().int().min(0).default(10),
		floor: ratio.default(0.05),
		ceiling: ratio.default(0.6),
		optimizeEvery: z.number().int().min(1).default(50),
	})
	.default({})

const retrySchema = z
	.object({
		baseDelayMs: z.number().int().min(0).default(1_000),
		maxDelayMs: z.number().int().min(0).default(30_000),
		multiplier: z.number().min(1).default(2),
	})
	.default({})

const engineSchema = z
	.object({
		weights: weightsSchema,
		performanceWindow: z.number().int().min(1).default(20),
		recencyDecay: z.number().positive().max(1).default(0.9),
		learningWindow: z.number().int().min(1).default(10),
		learningRate: z.number().min(0).default(0.5),
		learningBound: ratio.default(0.2),
		historySize: z.number().int().min(1).default(100),
		decisionCacheTtlMs: z.number().int().min(0).default(300_000),
		decisionCacheMaxEntries: z.number().int().min(1).default(1_000),
		tuning: tuningSchema,
		retry: retrySchema,
	})
	.default({})

const pipelineSchema = z
	.object({
		strategy: z.enum(STRATEGY_MODES).default('intelligent'),
		cacheTtlMs: z.number().int().min(0).default(300_000),
		cacheMaxEntries: z.number().int().min(1).default(500),
		workers: z.number().int().min(1).max(20).default(4),
	})
	.default({})

const mappingSchema = z
	.object({
		fuzzyCutoff: ratio.default(0.6),
		jaccardThreshold: ratio.default(0.3),
		containmentThreshold: ratio.default(0.5),
		sampleSize: z.number().int().min(1).default(100),
		nonNullThreshold: ratio.default(0.8),
		cacheMaxEntries: z.number().int().min(1).default(2_000),
	})
	.default({})

export const routerConfigSchema = z.object({
	circuitBreaker: circuitBreakerSchema,
	registry: registrySchema,
	engine: engineSchema,
	pipeline: pipelineSchema,
	mapping: mappingSchema,
	disabledSources: z.array(z.string()).default([]),
})

export type RouterConfigInput = z.input<typeof routerConfigSchema>
export type RouterConfig = z.infer<typeof routerConfigSchema>
export type CircuitBreakerConfig = RouterConfig['circuitBreaker']
export type RegistryConfig = RouterConfig['registry']
export type EngineConfig = RouterConfig['engine']
export type EngineWeights = EngineConfig['weights']
export type PipelineConfig = RouterConfig['pipeline']
export type MappingConfig = RouterConfig['mapping']

export function parseConfig(input: unknown = {}): RouterConfig {
	const result = routerConfigSchema.safeParse(input)
	if (!result.success) {
		const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
		throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`)
	}
	return result.data
}

function loadEnvFile(): void {
	const envPath = resolve(process.cwd(), '.env')
	if (!existsSync(envPath)) return
	const content = readFileSync(envPath, 'utf-8')
	for (const line of content.split('\n')) {
		const trimmed = line.trim()
		if (!trimmed || trimmed.startsWith('#')) continue
		const eqIdx = trimmed.indexOf('=')
		if (eqIdx === -1) continue
		const key = trimmed.slice(0, eqIdx).trim()
		let val = trimmed.slice(eqIdx + 1).trim()
		if (
			(val.startsWith('"') && val.endsWith('"')) ||
			(val.startsWith("'") && val.endsWith("'"))
		) {
			val = val.slice(1, -1)
		}
		if (process.env[key] === undefined) {
			process.env[key] = val
		}
	}
}

const CONFIG_DIR = join(homedir(), '.mdr')
const CONFIG_FILE = join(CONFIG_DIR, 'config.json')

let cached: RouterConfig | null = null

type JsonObject = Record<string, unknown>

function isObject(value: unknown): value is JsonObject {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function readConfigFile(): JsonObject {
	if (!existsSync(CONFIG_FILE)) return {}
	let parsed: unknown
	try {
		parsed = JSON.parse(readFileSync(CONFIG_FILE, 'utf-8'))
	} catch (err) {
		throw new ConfigurationError(
			`Malformed config file ${CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
		)
	}
	return isObject(parsed) ? parsed : {}
}

function section(source: JsonObject, key: string): JsonObject {
	const value = source[key]
	return isObject(value) ? value : {}
}

function envNumber(name: string): number | undefined {
	const raw = process.env[name]
	if (raw === undefined || raw === '') return undefined
	const n = Number(raw)
	if (Number.isNaN(n)) throw new ConfigurationError(`${name} must be a number, got "${raw}"`)
	return n
}

export function loadConfig(): RouterConfig {
	if (cached) return cached
	loadEnvFile()

	const fromFile = readConfigFile()
	const pipeline = section(fromFile, 'pipeline')
	const registry = section(fromFile, 'registry')

	const strategy = process.env.MDR_STRATEGY
	const workers = envNumber('MDR_WORKERS')
	const cacheTtlMs = envNumber('MDR_CACHE_TTL_MS')
	const healthCheckIntervalMs = envNumber('MDR_HEALTH_INTERVAL_MS')
	const disabled = process.env.MDR_DISABLED_SOURCES

	cached = parseConfig({
		...fromFile,
		pipeline: {
			...pipeline,
			...(strategy ? { strategy } : {}),
			...(workers !== undefined ? { workers } : {}),
			...(cacheTtlMs !== undefined ? { cacheTtlMs } : {}),
		},
		registry: {
			...registry,
			...(healthCheckIntervalMs !== undefined ? { healthCheckIntervalMs } : {}),
		},
		...(disabled
			? {
					disabledSources: disabled
						.split(',')
						.map((s) => s.trim())
						.filter(Boolean),
				}
			: {}),
	})

	return cached
}

function deepMerge(base: JsonObject, patch: JsonObject): JsonObject {
	const merged: JsonObject = { ...base }
	for (const [key, value] of Object.entries(patch)) {
		const current = merged[key]
		merged[key] = isObject(current) && isObject(value) ? deepMerge(current, value) : value
	}
	return merged
}

export function saveConfig(patch: JsonObject): void {
	const merged = deepMerge(readConfigFile(), patch)
	parseConfig(merged)

	if (!existsSync(CONFIG_DIR)) {
		mkdirSync(CONFIG_DIR, { recursive: true })
	}
	writeFileSync(CONFIG_FILE, JSON.stringify(merged, null, 2), { mode: 0o600 })
	cached = null
}

export function resetConfigCache(): void {
	cached = null
}

export function getConfigPath(): string {
	return CONFIG_FILE
}
