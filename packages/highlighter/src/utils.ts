/**
 * Highlighter Utility Functions
 */

import type { TextRange } from './patternCompiler'

/**
 * Normalize a file suffix to lower case with a leading dot
 */
export const normalizeExtension = (extension: string): string => {
	const trimmed = extension.trim().toLowerCase()
	if (!trimmed) return ''
	return trimmed.startsWith('.') ? trimmed : `.${trimmed}`
}

/**
 * Suffix of a path (".py" for "src/main.py"), empty when there is none
 */
export const extensionOfPath = (filePath: string): string => {
	const base = filePath.split(/[\\/]/).pop() ?? ''
	const dot = base.lastIndexOf('.')
	if (dot <= 0) return ''
	return normalizeExtension(base.slice(dot))
}

/**
 * Index of the first range in a sorted, disjoint list whose end is after `position`
 */
const firstEndingAfter = (ranges: readonly TextRange[], position: number) => {
	let low = 0
	let high = ranges.length
	while (low < high) {
		const mid = (low + high) >>> 1
		const range = ranges[mid]
		if (range && range.end <= position) low = mid + 1
		else high = mid
	}
	return low
}

/**
 * Check whether [start, end) intersects any range of a sorted, disjoint list
 */
export const overlapsAny = (
	ranges: readonly TextRange[],
	start: number,
	end: number
): boolean => {
	const candidate = ranges[firstEndingAfter(ranges, start)]
	return candidate !== undefined && candidate.start < end
}

/**
 * Insert a range into a sorted, disjoint list. Caller guarantees no overlap.
 */
export const insertRange = (ranges: TextRange[], range: TextRange): void => {
	ranges.splice(firstEndingAfter(ranges, range.start), 0, range)
}

export const yieldToEventLoop = (): Promise<void> =>
	new Promise((resolve) => setImmediate(resolve))
