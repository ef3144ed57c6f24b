import type { Command } from 'commander'
import type { RouterContext } from '../core/context.js'
import { ConfigurationError } from '../core/errors.js'
import { formatResult } from '../core/formatter.js'
import { requireSuccess } from '../core/pipeline.js'
import { parseQuery } from '../core/query.js'
import type { GlobalOptions } from '../types.js'

interface QueryCommandOptions {
	assetType: string
	dataType: string
	period: string
	start?: string
	end?: string
	market?: string
	priority: number
	timeout: number
	limit: number
}

export function parseInteger(value: string): number {
	const n = Number.parseInt(value, 10)
	if (Number.isNaN(n)) throw new ConfigurationError(`Expected an integer, got "${value}"`)
	return n
}

export function registerQueryCommand(program: Command, getContext: () => RouterContext): void {
	program
		.command('query <symbol>')
		.description('Fetch standardized market data with routing and failover')
		.option('-a, --asset-type <type>', 'stock, index, fund, bond, futures, crypto, forex', 'stock')
		.option('-d, --data-type <type>', 'kline, quote, asset_list, financials, ...', 'kline')
		.option('-p, --period <period>', 'tick, 1m, 5m, 15m, 30m, 60m, D, W, M', 'D')
		.option('--start <date>', 'range start (YYYY-MM-DD)')
		.option('--end <date>', 'range end (YYYY-MM-DD)')
		.option('-m, --market <market>', 'restrict to providers serving this market')
		.option('--priority <n>', 'request priority 0-100', parseInteger, 50)
		.option('--timeout <ms>', 'total timeout budget across attempts', parseInteger, 5_000)
		.option('--limit <n>', 'rows to print (most recent)', parseInteger, 20)
		.action(async (symbol: string, cmdOpts: QueryCommandOptions) => {
			const opts = program.opts<GlobalOptions>()
			const query = parseQuery({
				symbol,
				assetType: cmdOpts.assetType,
				dataType: cmdOpts.dataType,
				period: cmdOpts.period,
				range: { start: cmdOpts.start, end: cmdOpts.end },
				market: cmdOpts.market,
				provider: opts.source,
				priority: cmdOpts.priority,
				timeoutMs: cmdOpts.timeout,
			})

			const { pipeline } = getContext()
			const result = requireSuccess(
				await pipeline.process(query, { noCache: !opts.cache, strategy: opts.strategy }),
			)
			console.log(formatResult(result, opts.format, cmdOpts.limit))
		})
}
