export type FailureKind =
	| 'timeout'
	| 'connection'
	| 'rate_limit'
	| 'server_error'
	| 'data_quality'
	| 'unknown'

export type FailureSeverity = 'low' | 'medium' | 'high'

export type DegradationLevel = 'none' | 'minor' | 'moderate' | 'severe' | 'critical'

const FAILURE_KINDS: readonly FailureKind[] = [
	'timeout',
	'connection',
	'rate_limit',
	'server_error',
	'data_quality',
	'unknown',
]

const TIMEOUT_RE = /\btimed?[\s_-]?out\b|\btimeout\b|etimedout|aborterror/i
const CONNECTION_RE =
	/connection|econnreset|econnrefused|enotfound|eai_again|network|socket|fetch failed/i
const RATE_LIMIT_RE = /rate[\s_-]?limit|too many requests|\b429\b/i
const SERVER_RE = /server|\bhttp\b|\b5\d\d\b/i

export class ConfigurationError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigurationError'
	}
}

export class ExtractionError extends Error {
	readonly provider: string
	readonly kind: FailureKind

	constructor(provider: string, kind: FailureKind, message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'ExtractionError'
		this.provider = provider
		this.kind = kind
	}
}

export class ExtractionTimeoutError extends ExtractionError {
	readonly timeoutMs: number

	constructor(provider: string, timeoutMs: number) {
		super(provider, 'timeout', `${provider} timed out after ${timeoutMs}ms`)
		this.name = 'ExtractionTimeoutError'
		this.timeoutMs = timeoutMs
	}
}

export class DataQualityError extends Error {
	readonly qualityScore: number

	constructor(message: string, qualityScore = 0) {
		super(message)
		this.name = 'DataQualityError'
		this.qualityScore = qualityScore
	}
}

export class CircuitOpenError extends Error {
	readonly provider: string
	readonly degradation: DegradationLevel

	constructor(provider: string, degradation: DegradationLevel) {
		super(`Circuit open for ${provider} (degradation: ${degradation})`)
		this.name = 'CircuitOpenError'
		this.provider = provider
		this.degradation = degradation
	}
}

export class ProvidersExhaustedError extends Error {
	readonly attempted: readonly string[]
	readonly skipped: readonly string[]
	readonly messages: readonly string[]

	constructor(label: string, attempted: string[], skipped: string[], messages: string[]) {
		const detail = messages.length > 0 ? `: ${messages.join('; ')}` : ''
		super(`All providers failed for ${label}${detail}`)
		this.name = 'ProvidersExhaustedError'
		this.attempted = attempted
		this.skipped = skipped
		this.messages = messages
	}
}

export function toError(err: unknown): Error {
	return err instanceof Error ? err : new Error(String(err))
}

function isFailureKind(value: unknown): value is FailureKind {
	return typeof value === 'string' && FAILURE_KINDS.some((kind) => kind === value)
}

function readProperty(err: unknown, key: string): unknown {
	if (typeof err !== 'object' || err === null) return undefined
	return Reflect.get(err, key)
}

export function classifyFailure(err: unknown): FailureKind {
	const explicit = readProperty(err, 'kind')
	if (isFailureKind(explicit)) return explicit

	const error = toError(err)
	const text = `${error.name} ${error.message}`

	if (TIMEOUT_RE.test(text)) return 'timeout'
	if (CONNECTION_RE.test(text)) return 'connection'
	if (RATE_LIMIT_RE.test(text)) return 'rate_limit'
	if (SERVER_RE.test(text)) return 'server_error'
	if (err instanceof DataQualityError || typeof readProperty(err, 'qualityScore') === 'number') {
		return 'data_quality'
	}
	return 'unknown'
}

export function failureSeverity(kind: FailureKind): FailureSeverity {
	switch (kind) {
		case 'connection':
			return 'high'
		case 'rate_limit':
			return 'low'
		default:
			return 'medium'
	}
}
