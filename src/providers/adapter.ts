import { z } from 'zod'
import { DataQualityError, ExtractionError, toError } from '../core/errors.js'
import { aliasDataType } from '../core/query.js'
import type { RateLimitConfig } from '../core/rate-limiter.js'
import { ASSET_TYPES, type AssetType, type DataType } from '../types.js'
import type {
	ExtractRequest,
	HealthCheckResult,
	Provider,
	ProviderCapabilities,
	RawRecord,
} from './types.js'

export type ProviderMatch = 'interface' | 'methods' | 'declared' | 'name'

type Callable = (...args: unknown[]) => unknown

const NAME_INDICATORS = [
	'datasource',
	'data_source',
	'dataplugin',
	'stockplugin',
	'cryptoplugin',
	'futuresplugin',
	'forexplugin',
	'bondplugin',
	'marketdata',
	'market_data',
]

const ASSET_ALIASES: Record<string, AssetType> = {
	future: 'futures',
	etf: 'fund',
	currency: 'forex',
	fx: 'forex',
	cryptocurrency: 'crypto',
	equity: 'stock',
}

const declarationSchema = z.object({
	assetTypes: z.array(z.string()).optional(),
	dataTypes: z.array(z.string()).optional(),
	markets: z.array(z.string()).optional(),
})

const rateLimitSchema = z.object({
	maxRequests: z.number().positive(),
	windowMs: z.number().positive(),
})

const healthReplySchema = z.object({
	healthy: z.boolean(),
	message: z.string().optional(),
	latencyMs: z.number().optional(),
})

const tableReplySchema = z.object({
	columns: z.array(z.string()),
	rows: z.array(z.array(z.unknown())),
})

export function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function isCallable(value: unknown): value is Callable {
	return typeof value === 'function'
}

function isAssetType(value: string): value is AssetType {
	return ASSET_TYPES.some((t) => t === value)
}

function candidateNames(candidate: Record<string, unknown>): string[] {
	const names: string[] = []
	if (typeof candidate.name === 'string') names.push(candidate.name)
	const ctor: unknown = Reflect.get(candidate, 'constructor')
	if (isCallable(ctor) && ctor.name && ctor.name !== 'Object') names.push(ctor.name)
	return names.map((n) => n.toLowerCase())
}

/**
 * Decides whether an arbitrary object is a data-source provider. Checks run
 * in precedence order and the first hit wins.
 */
export function classifyProvider(candidate: unknown): ProviderMatch | undefined {
	if (!isRecord(candidate)) return undefined

	if (['getCapabilities', 'extract', 'healthCheck'].every((m) => isCallable(candidate[m]))) {
		return 'interface'
	}
	if (isCallable(candidate.fetchData) && isCallable(candidate.getSupportedDataTypes)) {
		return 'methods'
	}
	const info = candidate.info
	if (
		isRecord(info) &&
		(info.type === 'data_source' || (Array.isArray(info.dataTypes) && info.dataTypes.length > 0))
	) {
		return 'declared'
	}
	if (candidateNames(candidate).some((n) => NAME_INDICATORS.some((ind) => n.includes(ind)))) {
		return 'name'
	}
	return undefined
}

export function inferCapabilitiesFromName(name: string): ProviderCapabilities {
	const n = name.toLowerCase()
	const dataTypes: DataType[] = ['historical_kline', 'real_time_quote']

	if (['crypto', 'binance', 'okx', 'huobi'].some((k) => n.includes(k))) {
		return { assetTypes: ['crypto'], dataTypes, markets: ['BINANCE', 'OKX', 'HUOBI'] }
	}
	if (n.includes('future') || n.includes('ctp')) {
		return { assetTypes: ['futures'], dataTypes, markets: ['CFFEX', 'SHFE', 'DCE', 'CZCE'] }
	}
	if (n.includes('bond')) {
		return { assetTypes: ['bond'], dataTypes, markets: ['SH', 'SZ'] }
	}
	if (n.includes('forex') || /(^|[^a-z])fx([^a-z]|$)/.test(n)) {
		return { assetTypes: ['forex'], dataTypes, markets: ['FX'] }
	}
	return { assetTypes: ['stock'], dataTypes, markets: ['SH', 'SZ'] }
}

function normalizeAssetTypes(values: string[]): AssetType[] {
	const out = new Set<AssetType>()
	for (const raw of values) {
		const key = raw.trim().toLowerCase()
		if (isAssetType(key)) out.add(key)
		else if (ASSET_ALIASES[key]) out.add(ASSET_ALIASES[key])
	}
	return [...out]
}

function normalizeDataTypes(values: string[]): DataType[] {
	const out = new Set<DataType>()
	for (const raw of values) {
		const resolved = aliasDataType(raw)
		if (resolved) out.add(resolved)
	}
	return [...out]
}

async function invoke(target: Record<string, unknown>, method: string, ...args: unknown[]): Promise<unknown> {
	const fn = target[method]
	if (!isCallable(fn)) return undefined
	return await fn.call(target, ...args)
}

function readDeclaration(target: Record<string, unknown>, match: ProviderMatch): unknown {
	if (match === 'interface') {
		const fn = target.getCapabilities
		return isCallable(fn) ? fn.call(target) : undefined
	}
	if (match === 'methods') {
		const fn = target.getSupportedDataTypes
		const dataTypes: unknown = isCallable(fn) ? fn.call(target) : undefined
		const info = isRecord(target.info) ? target.info : {}
		return { ...info, ...(Array.isArray(dataTypes) && { dataTypes }) }
	}
	return target.info
}

export function resolveCapabilities(
	name: string,
	target: Record<string, unknown>,
	match: ProviderMatch,
	overrides: Partial<ProviderCapabilities> = {},
): ProviderCapabilities {
	const defaults = inferCapabilitiesFromName(name)
	const parsed = declarationSchema.safeParse(readDeclaration(target, match))
	const declared = parsed.success ? parsed.data : {}

	const assetTypes = overrides.assetTypes ?? normalizeAssetTypes(declared.assetTypes ?? [])
	const dataTypes = overrides.dataTypes ?? normalizeDataTypes(declared.dataTypes ?? [])
	const markets = (overrides.markets ?? declared.markets ?? []).map((m) => m.toUpperCase())

	return {
		assetTypes: assetTypes.length > 0 ? assetTypes : defaults.assetTypes,
		dataTypes: dataTypes.length > 0 ? dataTypes : defaults.dataTypes,
		markets: markets.length > 0 ? markets : defaults.markets,
	}
}

export function normalizeReply(provider: string, raw: unknown): RawRecord[] {
	if (Array.isArray(raw)) {
		const records: RawRecord[] = []
		for (const item of raw) {
			if (!isRecord(item)) {
				throw new DataQualityError(`${provider} returned a non-tabular reply`)
			}
			records.push({ ...item })
		}
		return records
	}

	const table = tableReplySchema.safeParse(raw)
	if (table.success) {
		const { columns, rows } = table.data
		return rows.map((row) => Object.fromEntries(columns.map((col, i) => [col, row[i]])))
	}

	if (isRecord(raw) && Array.isArray(raw.data)) return normalizeReply(provider, raw.data)

	throw new DataQualityError(`${provider} returned a non-tabular reply`)
}

function optionalNumber(value: unknown): number | undefined {
	return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

/**
 * Wraps any object that passed {@link classifyProvider} in the full
 * {@link Provider} contract. Built once at registration; methods the target
 * lacks get defaults.
 */
export class ProviderAdapter implements Provider {
	readonly name: string
	readonly match: ProviderMatch
	readonly rateLimits?: RateLimitConfig
	readonly priority?: number
	readonly qualityRating?: number
	readonly reliabilityRating?: number
	private readonly target: Record<string, unknown>
	private readonly capabilities: ProviderCapabilities
	private connected = false

	constructor(
		name: string,
		target: Record<string, unknown>,
		match: ProviderMatch,
		capabilities: Partial<ProviderCapabilities> = {},
	) {
		this.name = name
		this.target = target
		this.match = match
		this.capabilities = resolveCapabilities(name, target, match, capabilities)

		const limits = rateLimitSchema.safeParse(target.rateLimits)
		if (limits.success) this.rateLimits = limits.data
		this.priority = optionalNumber(target.priority)
		this.qualityRating = optionalNumber(target.qualityRating)
		this.reliabilityRating = optionalNumber(target.reliabilityRating)
	}

	getCapabilities(): ProviderCapabilities {
		return {
			assetTypes: [...this.capabilities.assetTypes],
			dataTypes: [...this.capabilities.dataTypes],
			markets: [...this.capabilities.markets],
		}
	}

	supports(dataType: DataType, assetType: AssetType, market?: string): boolean {
		const caps = this.capabilities
		if (!caps.dataTypes.includes(dataType) || !caps.assetTypes.includes(assetType)) return false
		return market === undefined || caps.markets.includes(market.toUpperCase())
	}

	isConnected(): boolean {
		return this.connected
	}

	async extract(request: ExtractRequest): Promise<RawRecord[]> {
		let raw: unknown
		if (isCallable(this.target.extract)) {
			raw = await invoke(this.target, 'extract', request)
		} else if (isCallable(this.target.fetchData)) {
			raw = await invoke(this.target, 'fetchData', request.symbol, request.dataType, {
				...request.params,
				assetType: request.assetType,
				period: request.period,
				start: request.range.start,
				end: request.range.end,
				market: request.market,
				signal: request.signal,
			})
		} else {
			throw new ExtractionError(this.name, 'unknown', `${this.name} exposes no extraction method`)
		}
		return normalizeReply(this.name, raw)
	}

	async healthCheck(): Promise<HealthCheckResult> {
		const started = Date.now()
		const finish = (healthy: boolean, message: string, latencyMs?: number): HealthCheckResult => ({
			healthy,
			message,
			latencyMs: latencyMs ?? Date.now() - started,
			checkedAt: Date.now(),
		})

		try {
			if (isCallable(this.target.healthCheck)) {
				const reply = await invoke(this.target, 'healthCheck')
				if (typeof reply === 'boolean') return finish(reply, reply ? 'ok' : 'unhealthy')
				const parsed = healthReplySchema.safeParse(reply)
				if (!parsed.success) return finish(false, 'malformed health reply')
				return finish(parsed.data.healthy, parsed.data.message ?? '', parsed.data.latencyMs)
			}
			if (isCallable(this.target.testConnection)) {
				const ok = await invoke(this.target, 'testConnection')
				return finish(ok === true, ok === true ? 'connection ok' : 'connection test failed')
			}
			return finish(true, 'no health check')
		} catch (err) {
			return finish(false, toError(err).message)
		}
	}

	async connect(): Promise<void> {
		await this.ensureConnected()
	}

	async ensureConnected(): Promise<void> {
		if (this.connected) return
		if (isCallable(this.target.connect)) {
			try {
				await invoke(this.target, 'connect')
			} catch (err) {
				throw new ExtractionError(
					this.name,
					'connection',
					`${this.name} failed to connect: ${toError(err).message}`,
					{ cause: err },
				)
			}
		}
		this.connected = true
	}

	async disconnect(): Promise<void> {
		if (!this.connected) return
		this.connected = false
		await invoke(this.target, 'disconnect')
	}
}

export function adaptProvider(
	name: string,
	candidate: unknown,
	capabilities?: Partial<ProviderCapabilities>,
): ProviderAdapter | undefined {
	if (candidate instanceof ProviderAdapter) return candidate
	const match = classifyProvider(candidate)
	if (!match || !isRecord(candidate)) return undefined
	return new ProviderAdapter(name, candidate, match, capabilities)
}
