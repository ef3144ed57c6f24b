export type SimilarityMethod = 'sequence' | 'jaccard' | 'containment'

export interface SimilarityThresholds {
	sequence: number
	jaccard: number
	containment: number
}

export interface SimilarityMatch {
	candidate: string
	score: number
	method: SimilarityMethod
}

interface Block {
	aStart: number
	bStart: number
	size: number
}

function longestCommonBlock(
	a: readonly string[],
	aLo: number,
	aHi: number,
	b: readonly string[],
	bLo: number,
	bHi: number,
): Block {
	let best: Block = { aStart: aLo, bStart: bLo, size: 0 }
	let prev = new Array<number>(bHi - bLo + 1).fill(0)
	for (let i = aLo; i < aHi; i++) {
		const curr = new Array<number>(bHi - bLo + 1).fill(0)
		for (let j = bLo; j < bHi; j++) {
			if (a[i] !== b[j]) continue
			const len = prev[j - bLo] + 1
			curr[j - bLo + 1] = len
			if (len > best.size) best = { aStart: i - len + 1, bStart: j - len + 1, size: len }
		}
		prev = curr
	}
	return best
}

function matchingCharacters(
	a: readonly string[],
	aLo: number,
	aHi: number,
	b: readonly string[],
	bLo: number,
	bHi: number,
): number {
	if (aLo >= aHi || bLo >= bHi) return 0
	const block = longestCommonBlock(a, aLo, aHi, b, bLo, bHi)
	if (block.size === 0) return 0
	return (
		block.size +
		matchingCharacters(a, aLo, block.aStart, b, bLo, block.bStart) +
		matchingCharacters(a, block.aStart + block.size, aHi, b, block.bStart + block.size, bHi)
	)
}

/** Ratcliff/Obershelp ratio: 2·M / (|a| + |b|). */
export function sequenceRatio(a: string, b: string): number {
	const left = Array.from(a)
	const right = Array.from(b)
	const total = left.length + right.length
	if (total === 0) return 1
	return (2 * matchingCharacters(left, 0, left.length, right, 0, right.length)) / total
}

export function tokenize(name: string): string[] {
	return name
		.replace(/([a-z0-9])([A-Z])/g, '$1 $2')
		.toLowerCase()
		.split(/[\s_\-.]+/)
		.filter(Boolean)
}

export function jaccardSimilarity(a: string, b: string): number {
	const left = new Set(tokenize(a))
	const right = new Set(tokenize(b))
	if (left.size === 0 || right.size === 0) return 0
	let shared = 0
	for (const token of left) if (right.has(token)) shared++
	return shared / (left.size + right.size - shared)
}

export function containmentSimilarity(a: string, b: string): number {
	const left = a.toLowerCase()
	const right = b.toLowerCase()
	if (!left || !right) return 0
	const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left]
	return longer.includes(shorter) ? Array.from(shorter).length / Array.from(longer).length : 0
}

function bestBy(
	name: string,
	candidates: readonly string[],
	measure: (a: string, b: string) => number,
): { candidate: string; score: number } | undefined {
	let best: { candidate: string; score: number } | undefined
	for (const candidate of candidates) {
		const score = measure(name, candidate)
		if (!best || score > best.score) best = { candidate, score }
	}
	return best
}

/**
 * Tries sequence ratio, then token Jaccard, then containment, and returns the
 * first stage whose best candidate clears its threshold.
 */
export function findBestMatch(
	name: string,
	candidates: readonly string[],
	thresholds: SimilarityThresholds,
): SimilarityMatch | undefined {
	const lowered = name.toLowerCase()
	const sequence = bestBy(lowered, candidates, (a, b) => sequenceRatio(a, b.toLowerCase()))
	if (sequence && sequence.score >= thresholds.sequence) return { ...sequence, method: 'sequence' }

	const jaccard = bestBy(name, candidates, jaccardSimilarity)
	if (jaccard && jaccard.score >= thresholds.jaccard) return { ...jaccard, method: 'jaccard' }

	const contained = bestBy(lowered, candidates, containmentSimilarity)
	if (contained && contained.score >= thresholds.containment) {
		return { ...contained, method: 'containment' }
	}
	return undefined
}
