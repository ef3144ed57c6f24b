import type { Command } from 'commander'
import type { RouterContext } from '../core/context.js'
import { formatPercent, formatTable } from '../core/formatter.js'
import type { GlobalOptions } from '../types.js'

export function registerHealthCommand(program: Command, getContext: () => RouterContext): void {
	program
		.command('health [source]')
		.description('Run provider health checks')
		.action(async (source: string | undefined) => {
			const opts = program.opts<GlobalOptions>()
			const { registry } = getContext()
			const results = await registry.checkHealth(source)

			const rows = Object.entries(results).map(([id, r]) => [
				id,
				r.healthy ? 'healthy' : 'unhealthy',
				formatPercent(registry.getMetrics(id)?.healthScore ?? 0),
				`${r.latencyMs}ms`,
				r.message,
			])

			console.log(
				formatTable(['Source', 'Health', 'Score', 'Latency', 'Message'], rows, opts.format),
			)
		})
}
