import type { Command } from 'commander'
import { getConfigPath, loadConfig, saveConfig } from '../core/config.js'
import { ConfigurationError } from '../core/errors.js'

function parseValue(raw: string): unknown {
	try {
		return JSON.parse(raw)
	} catch {
		return raw
	}
}

/** `a.b.c` + value → `{ a: { b: { c: value } } }`. */
export function buildPatch(key: string, value: unknown): Record<string, unknown> {
	const parts = key.split('.').filter(Boolean)
	if (parts.length === 0) throw new ConfigurationError(`Invalid key: "${key}"`)
	let patch: Record<string, unknown> = { [parts[parts.length - 1]]: value }
	for (let i = parts.length - 2; i >= 0; i--) {
		patch = { [parts[i]]: patch }
	}
	return patch
}

export function registerConfigCommand(program: Command): void {
	const config = program.command('config').description('Manage configuration')

	config
		.command('show')
		.description('Show the effective configuration')
		.action(() => {
			console.log(`Config file: ${getConfigPath()}\n`)
			console.log(JSON.stringify(loadConfig(), null, 2))
		})

	config
		.command('set <key> <value>')
		.description('Set a value by dotted path, e.g. pipeline.strategy health_based')
		.action((key: string, value: string) => {
			saveConfig(buildPatch(key, parseValue(value)))
			console.log(`Set ${key} = ${value}`)
		})

	config
		.command('path')
		.description('Show config file path')
		.action(() => {
			console.log(getConfigPath())
		})
}
