import type { CircuitBreakerConfig } from './config.js'
import {
	CircuitOpenError,
	classifyFailure,
	failureSeverity,
	toError,
	type DegradationLevel,
	type FailureKind,
	type FailureSeverity,
} from './errors.js'
import { logger as rootLogger, type Logger } from './logger.js'

export type CircuitState = 'closed' | 'open' | 'half_open'

interface WindowSample {
	success: boolean
	slow: boolean
	at: number
}

export interface FailureRecord {
	at: number
	kind: FailureKind
	severity: FailureSeverity
	message: string
	responseTimeMs: number
}

export interface StateChangeEvent {
	provider: string
	from: CircuitState
	to: CircuitState
	reason: string
	degradation: DegradationLevel
	at: number
}

export type StateChangeListener = (event: StateChangeEvent) => void
export type FailureListener = (provider: string, failure: FailureRecord) => void
export type DegradationHandler = (provider: string, degradation: DegradationLevel) => void

export interface CircuitBreakerReport {
	provider: string
	state: CircuitState
	degradation: DegradationLevel
	failureRate: number
	slowCallRate: number
	windowCount: number
	windowFailures: number
	totalCalls: number
	successfulCalls: number
	failedCalls: number
	rejectedCalls: number
	consecutiveFailures: number
	halfOpenCallCount: number
	stateChanges: number
	lastFailureAt?: number
	failureThreshold: number
	recoveryTimeoutMs: number
	failuresByKind: Readonly<Record<FailureKind, number>>
	recentFailures: readonly FailureRecord[]
}

const MAX_FAILURE_RECORDS = 100
const REPORTED_FAILURES = 5
const DEGRADATION_STEPS: readonly DegradationLevel[] = [
	'none',
	'minor',
	'moderate',
	'severe',
	'critical',
]

function emptyKindCounts(): Record<FailureKind, number> {
	return {
		timeout: 0,
		connection: 0,
		rate_limit: 0,
		server_error: 0,
		data_quality: 0,
		unknown: 0,
	}
}

function clamp(value: number, min: number, max: number): number {
	return Math.min(max, Math.max(min, value))
}

/**
 * Closed → Open → HalfOpen state machine for a single provider.
 *
 * Every method runs synchronously to completion, so a check followed by a
 * transition can never interleave with another caller.
 */
export class CircuitBreaker {
	readonly provider: string
	private readonly config: CircuitBreakerConfig
	private readonly log: Logger
	private readonly minimumCalls: number
	private readonly successThreshold: number
	private readonly listeners = new Set<StateChangeListener>()
	private readonly failureListeners = new Set<FailureListener>()
	private readonly degradationHandlers = new Map<DegradationLevel, DegradationHandler>()

	private state: CircuitState = 'closed'
	private degradation: DegradationLevel = 'none'
	private window: WindowSample[] = []
	private outcomes: boolean[] = []
	private failures: FailureRecord[] = []
	private failuresByKind = emptyKindCounts()
	private lastFailureTime: number | undefined
	private halfOpenCallCount = 0
	private trialSuccesses = 0
	private consecutiveFailures = 0
	private totalCalls = 0
	private successfulCalls = 0
	private failedCalls = 0
	private rejectedCalls = 0
	private stateChanges = 0
	private failureThreshold: number
	private recoveryTimeoutMs: number

	constructor(provider: string, config: CircuitBreakerConfig, log: Logger = rootLogger) {
		this.provider = provider
		this.config = config
		this.log = log.child({ component: 'circuit_breaker', provider })
		this.minimumCalls = Math.min(config.minimumCalls, config.windowSize)
		this.successThreshold = Math.min(config.successThreshold, config.halfOpenMaxCalls)
		this.failureThreshold = config.failureThreshold
		this.recoveryTimeoutMs = config.recoveryTimeoutMs
	}

	getState(): CircuitState {
		return this.state
	}

	getDegradation(): DegradationLevel {
		return this.degradation
	}

	/**
	 * Gate for a real extraction attempt. In HalfOpen each `true` consumes one
	 * of the `halfOpenMaxCalls` trial slots.
	 */
	canExecute(): boolean {
		if (this.state === 'closed') return true

		if (this.state === 'open') {
			if (!this.recoveryElapsed()) return this.reject()
			this.transition('half_open', 'recovery timeout elapsed')
		}

		if (this.halfOpenCallCount < this.config.halfOpenMaxCalls) {
			this.halfOpenCallCount++
			return true
		}
		return this.reject()
	}

	/**
	 * Runs `operation` behind the breaker and records its outcome. Rejects with
	 * {@link CircuitOpenError} without calling it when the circuit is open.
	 */
	async execute<T>(operation: () => Promise<T>): Promise<T> {
		if (!this.canExecute()) throw new CircuitOpenError(this.provider, this.degradation)

		const started = Date.now()
		try {
			const result = await operation()
			this.recordSuccess(Date.now() - started)
			return result
		} catch (err) {
			this.recordFailure(err, Date.now() - started)
			throw err
		}
	}

	/** Same decision as {@link canExecute} without reserving a trial slot. */
	isAvailable(): boolean {
		if (this.state === 'closed') return true
		if (this.state === 'open') return this.recoveryElapsed()
		return this.halfOpenCallCount < this.config.halfOpenMaxCalls
	}

	recordSuccess(responseTimeMs = 0): void {
		this.totalCalls++
		this.successfulCalls++
		this.consecutiveFailures = 0
		this.pushSample(true, responseTimeMs)

		if (this.state === 'half_open') {
			this.trialSuccesses++
			if (this.trialSuccesses >= this.successThreshold) {
				this.transition('closed', `${this.trialSuccesses} consecutive trial successes`)
			}
		} else if (this.state === 'closed') {
			this.evaluate()
		}
	}

	recordFailure(error: unknown, responseTimeMs = 0): void {
		const err = toError(error)
		const kind = classifyFailure(error)
		const now = Date.now()

		this.totalCalls++
		this.failedCalls++
		this.consecutiveFailures++
		this.lastFailureTime = now
		this.pushSample(false, responseTimeMs)

		const record: FailureRecord = {
			at: now,
			kind,
			severity: failureSeverity(kind),
			message: err.message,
			responseTimeMs,
		}
		this.failures.push(record)
		if (this.failures.length > MAX_FAILURE_RECORDS) this.failures.shift()
		this.failuresByKind[kind]++

		this.log.debug({ kind, responseTimeMs, err: error }, 'breaker_failure_recorded')
		for (const listener of this.failureListeners) {
			try {
				listener(this.provider, record)
			} catch (listenerErr) {
				this.log.error({ err: listenerErr }, 'breaker_failure_listener_failed')
			}
		}

		if (this.state === 'half_open') {
			this.transition('open', `trial call failed (${kind})`)
		} else if (this.state === 'closed') {
			this.evaluate()
		}
	}

	forceOpen(reason = 'forced open'): void {
		this.lastFailureTime = Date.now()
		this.transition('open', reason)
	}

	forceClose(): void {
		this.transition('closed', 'forced closed')
	}

	reset(): void {
		const previous = this.state
		this.window = []
		this.outcomes = []
		this.failures = []
		this.failuresByKind = emptyKindCounts()
		this.lastFailureTime = undefined
		this.consecutiveFailures = 0
		this.totalCalls = 0
		this.successfulCalls = 0
		this.failedCalls = 0
		this.rejectedCalls = 0
		this.failureThreshold = this.config.failureThreshold
		this.recoveryTimeoutMs = this.config.recoveryTimeoutMs
		if (previous !== 'closed') this.transition('closed', 'reset')
		this.stateChanges = 0
	}

	onStateChange(listener: StateChangeListener): () => void {
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	onFailure(listener: FailureListener): () => void {
		this.failureListeners.add(listener)
		return () => {
			this.failureListeners.delete(listener)
		}
	}

	/** Called on every rejected call while the breaker sits at `level`. One handler per level. */
	onDegradation(level: DegradationLevel, handler: DegradationHandler): () => void {
		this.degradationHandlers.set(level, handler)
		return () => {
			if (this.degradationHandlers.get(level) === handler) this.degradationHandlers.delete(level)
		}
	}

	getFailureRate(): number {
		if (this.window.length === 0) return 0
		return this.window.filter((s) => !s.success).length / this.window.length
	}

	getSlowCallRate(): number {
		if (this.window.length === 0) return 0
		return this.window.filter((s) => s.slow).length / this.window.length
	}

	getReport(): CircuitBreakerReport {
		return Object.freeze({
			provider: this.provider,
			state: this.state,
			degradation: this.degradation,
			failureRate: this.getFailureRate(),
			slowCallRate: this.getSlowCallRate(),
			windowCount: this.window.length,
			windowFailures: this.window.filter((s) => !s.success).length,
			totalCalls: this.totalCalls,
			successfulCalls: this.successfulCalls,
			failedCalls: this.failedCalls,
			rejectedCalls: this.rejectedCalls,
			consecutiveFailures: this.consecutiveFailures,
			halfOpenCallCount: this.halfOpenCallCount,
			stateChanges: this.stateChanges,
			lastFailureAt: this.lastFailureTime,
			failureThreshold: this.failureThreshold,
			recoveryTimeoutMs: this.recoveryTimeoutMs,
			failuresByKind: Object.freeze({ ...this.failuresByKind }),
			recentFailures: Object.freeze(this.failures.slice(-REPORTED_FAILURES)),
		})
	}

	private reject(): false {
		this.rejectedCalls++
		const handler = this.degradationHandlers.get(this.degradation)
		if (handler) {
			try {
				handler(this.provider, this.degradation)
			} catch (err) {
				this.log.error({ err, degradation: this.degradation }, 'degradation_handler_failed')
			}
		}
		return false
	}

	private recoveryElapsed(): boolean {
		if (this.lastFailureTime === undefined) return true
		return Date.now() - this.lastFailureTime >= this.recoveryTimeoutMs
	}

	private pushSample(success: boolean, responseTimeMs: number): void {
		const slow = responseTimeMs >= this.config.slowCallThresholdMs
		this.window.push({ success, slow, at: Date.now() })
		while (this.window.length > this.config.windowSize) this.window.shift()
		this.adapt(success)
	}

	private evaluate(): void {
		if (this.window.length < this.minimumCalls) return

		const failures = this.window.filter((s) => !s.success).length
		const failureRate = failures / this.window.length
		const slowRate = this.getSlowCallRate()

		if (failures >= this.failureThreshold) {
			this.transition('open', `${failures} failures in window`)
		} else if (failureRate >= this.config.failureRateThreshold) {
			this.transition('open', `failure rate ${failureRate.toFixed(2)}`)
		} else if (this.config.slowCallRateThreshold < 1 && slowRate >= this.config.slowCallRateThreshold) {
			this.transition('open', `slow call rate ${slowRate.toFixed(2)}`)
		}
	}

	private adapt(success: boolean): void {
		const adaptive = this.config.adaptive
		if (!adaptive.enabled) return

		this.outcomes.push(success)
		while (this.outcomes.length > adaptive.sampleSize) this.outcomes.shift()
		if (this.outcomes.length < adaptive.sampleSize) return

		const successRate = this.outcomes.filter(Boolean).length / this.outcomes.length
		let scale: number
		if (successRate > adaptive.highSuccessRate) scale = 1 + adaptive.factor
		else if (successRate < adaptive.lowSuccessRate) scale = 1 - adaptive.factor
		else return

		const { failureThreshold, recoveryTimeoutMs } = this.config
		this.failureThreshold = clamp(
			this.failureThreshold * scale,
			failureThreshold * adaptive.minScale,
			failureThreshold * adaptive.maxScale,
		)
		this.recoveryTimeoutMs = clamp(
			this.recoveryTimeoutMs * scale,
			recoveryTimeoutMs * adaptive.minScale,
			recoveryTimeoutMs * adaptive.maxScale,
		)
	}

	private degradationForRate(rate: number): DegradationLevel {
		const { critical, severe, moderate } = this.config.degradation
		if (rate >= critical) return 'critical'
		if (rate >= severe) return 'severe'
		if (rate >= moderate) return 'moderate'
		return 'minor'
	}

	private transition(to: CircuitState, reason: string): void {
		const from = this.state
		if (from === to) return

		this.state = to
		this.stateChanges++
		this.halfOpenCallCount = 0
		this.trialSuccesses = 0

		if (to === 'open') {
			this.degradation = this.degradationForRate(this.getFailureRate())
		} else if (to === 'half_open') {
			const idx = DEGRADATION_STEPS.indexOf(this.degradation)
			this.degradation = DEGRADATION_STEPS[Math.max(1, idx - 1)] ?? 'minor'
		} else {
			this.degradation = 'none'
			this.window = []
			this.consecutiveFailures = 0
		}

		const event: StateChangeEvent = {
			provider: this.provider,
			from,
			to,
			reason,
			degradation: this.degradation,
			at: Date.now(),
		}
		const level = to === 'open' ? 'warn' : 'info'
		this.log[level]({ from, to, reason, degradation: this.degradation }, 'breaker_state_changed')

		for (const listener of this.listeners) {
			try {
				listener(event)
			} catch (err) {
				this.log.error({ err }, 'breaker_listener_failed')
			}
		}
	}
}

/** One breaker per provider id, created lazily from the shared config. */
export class CircuitBreakerManager {
	private readonly breakers = new Map<string, CircuitBreaker>()
	private readonly listeners = new Set<StateChangeListener>()
	private readonly config: CircuitBreakerConfig
	private readonly log: Logger

	constructor(config: CircuitBreakerConfig, log: Logger = rootLogger) {
		this.config = config
		this.log = log
	}

	getOrCreate(provider: string, overrides: Partial<CircuitBreakerConfig> = {}): CircuitBreaker {
		let breaker = this.breakers.get(provider)
		if (!breaker) {
			breaker = new CircuitBreaker(provider, { ...this.config, ...overrides }, this.log)
			breaker.onStateChange((event) => {
				for (const listener of this.listeners) listener(event)
			})
			this.breakers.set(provider, breaker)
		}
		return breaker
	}

	get(provider: string): CircuitBreaker | undefined {
		return this.breakers.get(provider)
	}

	remove(provider: string): boolean {
		return this.breakers.delete(provider)
	}

	resetAll(): void {
		for (const breaker of this.breakers.values()) breaker.reset()
	}

	onStateChange(listener: StateChangeListener): () => void {
		this.listeners.add(listener)
		return () => {
			this.listeners.delete(listener)
		}
	}

	getReports(): Record<string, CircuitBreakerReport> {
		const reports: Record<string, CircuitBreakerReport> = {}
		for (const [id, breaker] of this.breakers) reports[id] = breaker.getReport()
		return reports
	}
}
