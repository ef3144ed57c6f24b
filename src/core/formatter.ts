import type { CellValue, OutputFormat, StandardResult } from '../types.js'

type Cell = string | number | undefined | null

export function formatTable(headers: string[], rows: Cell[][], format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(
			rows.map((row) => {
				const obj: Record<string, string | number | null> = {}
				for (let i = 0; i < headers.length; i++) {
					obj[headers[i]] = row[i] ?? null
				}
				return obj
			}),
			null,
			2,
		)
	}

	if (format === 'plain') {
		const headerLine = headers.join('\t')
		const dataLines = rows.map((row) => row.map((v) => v ?? '').join('\t'))
		return [headerLine, ...dataLines].join('\n')
	}

	const colWidths = headers.map((h, i) => {
		const maxData = rows.reduce((max, row) => Math.max(max, String(row[i] ?? '').length), 0)
		return Math.max(h.length, maxData)
	})

	const headerLine = `| ${headers.map((h, i) => h.padEnd(colWidths[i])).join(' | ')} |`
	const separator = `| ${colWidths.map((w) => '-'.repeat(w)).join(' | ')} |`
	const dataLines = rows.map(
		(row) => `| ${row.map((v, i) => String(v ?? '').padEnd(colWidths[i])).join(' | ')} |`,
	)

	return [headerLine, separator, ...dataLines].join('\n')
}

export function formatKeyValue(data: Record<string, Cell>, format: OutputFormat): string {
	if (format === 'json') {
		return JSON.stringify(data, null, 2)
	}

	const entries = Object.entries(data).filter(([_, v]) => v != null)
	if (format === 'plain') {
		return entries.map(([k, v]) => `${k}\t${v}`).join('\n')
	}

	const maxKeyLen = entries.reduce((max, [k]) => Math.max(max, k.length), 0)
	return entries.map(([k, v]) => `**${k.padEnd(maxKeyLen)}**: ${v}`).join('\n')
}

export function formatNumber(n: number, decimals = 2): string {
	if (Math.abs(n) >= 1e12) return `${(n / 1e12).toFixed(decimals)}T`
	if (Math.abs(n) >= 1e9) return `${(n / 1e9).toFixed(decimals)}B`
	if (Math.abs(n) >= 1e6) return `${(n / 1e6).toFixed(decimals)}M`
	if (Math.abs(n) >= 1e3) return `${(n / 1e3).toFixed(decimals)}K`
	return n.toFixed(decimals)
}

/** Ratio in [0,1] as a percentage string. */
export function formatPercent(ratio: number): string {
	return `${(ratio * 100).toFixed(1)}%`
}

export function formatCell(value: CellValue): string | number | null {
	if (value === null) return null
	if (value instanceof Date) {
		const iso = value.toISOString()
		return iso.endsWith('T00:00:00.000Z') ? iso.slice(0, 10) : iso
	}
	if (typeof value === 'boolean') return value ? 'true' : 'false'
	return value
}

export function formatResult(result: StandardResult, format: OutputFormat, limit: number): string {
	const rows = result.data.slice(-limit)
	const { source } = result

	if (format === 'json') {
		return JSON.stringify(
			{
				data: rows,
				columns: result.columns,
				qualityScore: result.qualityScore,
				qualityIssues: result.qualityIssues,
				mapping: result.mapping,
				source,
			},
			null,
			2,
		)
	}

	const table = formatTable(
		[...result.columns],
		rows.map((row) => result.columns.map((col) => formatCell(row[col] ?? null))),
		format,
	)
	const summary = formatKeyValue(
		{
			Source: source.provider + (source.cached ? ' (cached)' : ''),
			Strategy: source.strategy,
			Attempts: source.attempts,
			Failed: source.failedProviders.length > 0 ? source.failedProviders.join(', ') : undefined,
			Quality: formatPercent(result.qualityScore),
			Mapping: result.mappingMode,
			Rows: `${rows.length} of ${result.data.length}`,
		},
		format,
	)
	return `${table}\n\n${summary}`
}
