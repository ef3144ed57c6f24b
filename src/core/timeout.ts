import { ExtractionTimeoutError } from './errors.js'

/** Largest delay setTimeout honours; longer values fire immediately. */
export const MAX_TIMER_MS = 2_147_483_647

/**
 * Runs `task` with an AbortSignal that fires after `timeoutMs`. The returned
 * promise rejects with {@link ExtractionTimeoutError} at the deadline even if
 * the task ignores the signal.
 */
export async function withTimeout<T>(
	provider: string,
	timeoutMs: number,
	task: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
	const controller = new AbortController()
	let timeoutId: ReturnType<typeof setTimeout> | undefined

	const deadline = new Promise<never>((_, reject) => {
		timeoutId = setTimeout(() => {
			controller.abort('timeout')
			reject(new ExtractionTimeoutError(provider, timeoutMs))
		}, Math.min(timeoutMs, MAX_TIMER_MS))
	})

	try {
		return await Promise.race([task(controller.signal), deadline])
	} catch (err) {
		if (controller.signal.aborted) throw new ExtractionTimeoutError(provider, timeoutMs)
		throw err
	} finally {
		clearTimeout(timeoutId)
	}
}
