import type { RouterContext } from '../core/context.js'
import { createBinanceProvider } from './binance.js'
import type { Provider } from './types.js'
import { createYahooProvider } from './yahoo-finance.js'

export interface BuiltinProviders {
	yahoo?: Provider
	binance?: Provider
}

/** Registers the bundled providers; pass replacements to swap either one. */
export function registerBuiltinProviders(
	context: Pick<RouterContext, 'registry'>,
	providers: BuiltinProviders = {},
): string[] {
	const registered: string[] = []
	const yahoo = providers.yahoo ?? createYahooProvider()
	const binance = providers.binance ?? createBinanceProvider()
	if (context.registry.register(yahoo.name, yahoo)) registered.push(yahoo.name)
	if (context.registry.register(binance.name, binance)) registered.push(binance.name)
	return registered
}
