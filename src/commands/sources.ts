import type { Command } from 'commander'
import type { RouterContext } from '../core/context.js'
import { formatTable } from '../core/formatter.js'
import type { GlobalOptions } from '../types.js'

export function registerSourcesCommand(program: Command, getContext: () => RouterContext): void {
	program
		.command('sources')
		.description('List registered providers, capabilities, and status')
		.action(() => {
			const opts = program.opts<GlobalOptions>()
			const { registry, breakers, rateLimiter } = getContext()

			const rows = registry.listProviders().map((p) => {
				const limits = registry.getEntry(p.id)?.adapter.rateLimits
				const remaining = limits
					? `${rateLimiter.getRemaining(p.id, limits)}/${limits.maxRequests}`
					: 'unlimited'
				return [
					p.id,
					p.status,
					p.capabilities.assetTypes.join(', '),
					p.capabilities.dataTypes.join(', '),
					p.capabilities.markets.join(', '),
					p.priority,
					breakers.get(p.id)?.getState() ?? 'closed',
					remaining,
				]
			})

			console.log(
				formatTable(
					['Source', 'Status', 'Assets', 'Data Types', 'Markets', 'Priority', 'Breaker', 'Remaining'],
					rows,
					opts.format,
				),
			)
		})
}
