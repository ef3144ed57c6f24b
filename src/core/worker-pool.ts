export interface WorkerPoolSnapshot {
	size: number
	active: number
	queued: number
	completed: number
}

/** Bounded concurrency for pipeline runs; excess tasks wait in FIFO order. */
export class WorkerPool {
	private active = 0
	private completed = 0
	private readonly queue: Array<() => void> = []
	private readonly size: number

	constructor(size: number) {
		this.size = Math.max(1, Math.floor(size))
	}

	async run<T>(task: () => Promise<T>): Promise<T> {
		await this.acquire()
		try {
			return await task()
		} finally {
			this.completed++
			this.release()
		}
	}

	snapshot(): WorkerPoolSnapshot {
		return {
			size: this.size,
			active: this.active,
			queued: this.queue.length,
			completed: this.completed,
		}
	}

	private async acquire(): Promise<void> {
		if (this.active < this.size) {
			this.active++
			return
		}
		await new Promise<void>((resolve) => {
			this.queue.push(() => {
				this.active++
				resolve()
			})
		})
	}

	private release(): void {
		this.active = Math.max(0, this.active - 1)
		const next = this.queue.shift()
		if (next) next()
	}
}
