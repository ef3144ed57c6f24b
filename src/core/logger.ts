export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export type LogFields = Record<string, unknown>

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
	silent: 100,
}

export interface Logger {
	debug(fields: LogFields | string, msg?: string): void
	info(fields: LogFields | string, msg?: string): void
	warn(fields: LogFields | string, msg?: string): void
	error(fields: LogFields | string, msg?: string): void
	child(bindings: LogFields): Logger
}

function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LEVEL_ORDER, value)
}

function currentLevel(): LogLevel {
	const raw = (process.env.LOG_LEVEL ?? 'info').toLowerCase()
	return isLogLevel(raw) ? raw : 'info'
}

function toErrorPayload(err: unknown): unknown {
	if (err instanceof Error) {
		return { name: err.name, message: err.message, stack: err.stack }
	}
	if (typeof err === 'object' && err !== null) return err
	return { message: String(err) }
}

function emit(level: Exclude<LogLevel, 'silent'>, bindings: LogFields, arg: LogFields | string, msg?: string): void {
	if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) return

	const fields = typeof arg === 'string' ? {} : arg
	const payload: LogFields = {
		level,
		time: new Date().toISOString(),
		...bindings,
		...fields,
		msg: typeof arg === 'string' ? arg : (msg ?? ''),
	}
	if (fields.err !== undefined) {
		payload.err = toErrorPayload(fields.err)
	}

	const line = JSON.stringify(payload)
	if (level === 'error') console.error(line)
	else if (level === 'warn') console.warn(line)
	else console.log(line)
}

export function createLogger(bindings: LogFields = {}): Logger {
	return {
		debug: (fields, msg) => emit('debug', bindings, fields, msg),
		info: (fields, msg) => emit('info', bindings, fields, msg),
		warn: (fields, msg) => emit('warn', bindings, fields, msg),
		error: (fields, msg) => emit('error', bindings, fields, msg),
		child: (extra) => createLogger({ ...bindings, ...extra }),
	}
}

export const logger = createLogger()
