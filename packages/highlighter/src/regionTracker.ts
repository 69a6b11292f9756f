/**
 * Multiline Region Tracker
 *
 * Line i+1 starts in whatever region line i left open, so states are always
 * produced by a forward scan from a line whose state is known.
 */

import { NO_REGION } from './consts'
import { EMPTY_CONTEXT, type TokenizeContext } from './nestedDispatcher'
import type { CompiledLanguage } from './patternCompiler'
import { tokenizeLine } from './tokenizer'
import type { LineRegionState } from './types'

/**
 * Compare two line states structurally, nested states included
 */
export const statesEqual = (
	a: LineRegionState,
	b: LineRegionState
): boolean => {
	if (a === b) return true
	if (a.region !== b.region) return false
	if (a.nestedLanguage !== b.nestedLanguage) return false
	return statesEqual(a.nested ?? NO_REGION, b.nested ?? NO_REGION)
}

/**
 * State at the start of the line after `line`
 */
export const nextLineState = (
	line: string,
	state: LineRegionState,
	language: CompiledLanguage,
	context: TokenizeContext = EMPTY_CONTEXT
): LineRegionState => tokenizeLine(line, state, language, context).endState

/**
 * Compute line-start states for a whole document
 */
export const computeLineStates = (
	lines: readonly string[],
	language: CompiledLanguage,
	context: TokenizeContext = EMPTY_CONTEXT
): LineRegionState[] => {
	const states: LineRegionState[] = []

	let state = NO_REGION
	for (const line of lines) {
		states.push(state)
		state = nextLineState(line, state, language, context)
	}

	return states
}
