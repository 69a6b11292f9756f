/**
 * Highlighter Constants
 */

import type { LineRegionState } from './types'

/**
 * State of a line that starts outside any region
 */
export const NO_REGION: LineRegionState = Object.freeze({
	region: null,
	nestedLanguage: null,
	nested: null,
})

// Nested languages deeper than this are styled flatly
export const MAX_NESTING_DEPTH = 8

// Lines propagated per background chunk
export const DEFAULT_CHUNK_SIZE = 500
