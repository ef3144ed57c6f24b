#!/usr/bin/env node
import { readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command, Option } from 'commander'
import { registerBreakersCommand } from './commands/breakers.js'
import { registerConfigCommand } from './commands/config.js'
import { registerHealthCommand } from './commands/health.js'
import { registerQueryCommand } from './commands/query.js'
import { registerSourcesCommand } from './commands/sources.js'
import { loadConfig, STRATEGY_MODES } from './core/config.js'
import { createRouterContext, type RouterContext } from './core/context.js'
import { isRecord } from './providers/adapter.js'
import { registerBuiltinProviders } from './providers/registry.js'
import type { OutputFormat } from './types.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'))
const version = isRecord(pkg) && typeof pkg.version === 'string' ? pkg.version : '0.0.0'

let context: RouterContext | undefined

function getContext(): RouterContext {
	if (!context) {
		context = createRouterContext(loadConfig())
		registerBuiltinProviders(context)
	}
	return context
}

const program = new Command()

program
	.name('mdr')
	.description('Market data router: capability-based routing, circuit breaking, and field mapping')
	.version(version)
	.option('--json', 'output as JSON')
	.option('--plain', 'output as tab-separated values')
	.option('-v, --verbose', 'verbose routing logs')
	.option('-s, --source <source>', 'force a specific provider')
	.addOption(new Option('--strategy <name>', 'routing strategy').choices(STRATEGY_MODES))
	.option('--no-cache', 'bypass the result cache')
	.hook('preAction', () => {
		const rawOpts = program.opts()
		let format: OutputFormat = 'markdown'
		if (rawOpts.json) format = 'json'
		else if (rawOpts.plain) format = 'plain'
		program.setOptionValue('format', format)

		if (rawOpts.verbose) process.env.LOG_LEVEL = 'debug'
		else process.env.LOG_LEVEL ??= 'warn'
	})

registerQueryCommand(program, getContext)
registerSourcesCommand(program, getContext)
registerHealthCommand(program, getContext)
registerBreakersCommand(program, getContext)
registerConfigCommand(program)

program
	.parseAsync(process.argv)
	.then(() => context?.shutdown())
	.catch((err: unknown) => {
		console.error(`Error: ${err instanceof Error ? err.message : String(err)}`)
		process.exit(1)
	})
