import type { Command } from 'commander'
import type { RouterContext } from '../core/context.js'
import { formatPercent, formatTable } from '../core/formatter.js'
import type { GlobalOptions } from '../types.js'

export function registerBreakersCommand(program: Command, getContext: () => RouterContext): void {
	program
		.command('breakers')
		.description('Show circuit breaker state per provider')
		.action(() => {
			const opts = program.opts<GlobalOptions>()
			const reports = getContext().breakers.getReports()

			const rows = Object.values(reports).map((r) => [
				r.provider,
				r.state,
				r.degradation,
				formatPercent(r.failureRate),
				`${r.failedCalls}/${r.totalCalls}`,
				r.rejectedCalls,
				r.recentFailures.at(-1)?.message,
			])

			console.log(
				formatTable(
					['Source', 'State', 'Degradation', 'Failure Rate', 'Failed', 'Rejected', 'Last Error'],
					rows,
					opts.format,
				),
			)
		})
}
