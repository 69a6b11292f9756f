/**
 * Line Tokenizer
 *
 * Pure per-line styling. Priority is positional: whatever claims a range first
 * keeps it. Regions claim before single-line rules, and single-line rules claim
 * in their compiled order.
 */

import { NO_REGION } from './consts'
import {
	EMPTY_CONTEXT,
	resolveInterior,
	type TokenizeContext,
} from './nestedDispatcher'
import type {
	CompiledLanguage,
	CompiledRegion,
	CompiledRule,
	Matcher,
	PatternMatch,
	TextRange,
} from './patternCompiler'
import type {
	LineRegionState,
	LineTokenizeResult,
	ResolvedStyle,
	StyledSpan,
} from './types'
import { insertRange, overlapsAny } from './utils'

type RegionOutcome = {
	/** Position after the region, or null when it stays open past the line */
	end: number | null
	endState: LineRegionState
}

const pushSpan = (
	spans: StyledSpan[],
	style: ResolvedStyle | null,
	start: number,
	end: number
) => {
	if (style && end > start) {
		spans.push({ ...style, start, end })
	}
}

/**
 * Apply single-line rules over the text not yet claimed
 */
const applyLineRules = (
	line: string,
	rules: readonly CompiledRule[],
	spans: StyledSpan[],
	claimed: TextRange[]
) => {
	for (const { matcher, style } of rules) {
		let position = 0
		while (position < line.length) {
			const match = matcher.find(line, position)
			if (!match) break

			if (overlapsAny(claimed, match.start, match.end)) {
				position = match.start + 1
				continue
			}

			// the full match is consumed even when only a group is styled
			insertRange(claimed, { start: match.start, end: match.end })
			if (match.styled) {
				pushSpan(spans, style, match.styled.start, match.styled.end)
			}
			position = match.end
		}
	}
}

const findRegionStart = (
	line: string,
	from: number,
	regions: readonly CompiledRegion[]
): { region: CompiledRegion; match: PatternMatch } | null => {
	let best: { region: CompiledRegion; match: PatternMatch } | null = null
	for (const region of regions) {
		const match = region.start.find(line, from)
		if (match && (!best || match.start < best.match.start)) {
			best = { region, match }
		}
	}
	return best
}

/**
 * Style one region occurrence from `regionStart`, looking for its end from
 * `contentStart` (after the opening delimiter, or 0 when carried over)
 */
const runRegion = (
	line: string,
	language: CompiledLanguage,
	region: CompiledRegion,
	regionStart: number,
	contentStart: number,
	nestedState: LineRegionState,
	context: TokenizeContext,
	spans: StyledSpan[],
	claimed: TextRange[]
): RegionOutcome => {
	const endMatch = region.end.find(line, contentStart)
	const contentEnd = endMatch ? endMatch.start : line.length
	const regionEnd = endMatch ? endMatch.end : line.length

	if (regionEnd > regionStart) {
		insertRange(claimed, { start: regionStart, end: regionEnd })
	}

	if (region.rule.nestedLanguage === undefined) {
		pushSpan(spans, region.style, regionStart, regionEnd)
		return {
			end: endMatch ? regionEnd : null,
			endState: endMatch
				? NO_REGION
				: { region: region.rule, nestedLanguage: null, nested: null },
		}
	}

	const interior = resolveInterior(
		language.definition.name,
		region,
		line,
		contentStart,
		contentEnd,
		nestedState,
		context,
		tokenizeLine
	)
	pushSpan(spans, interior.delimiterStyle, regionStart, contentStart)
	for (const span of interior.spans) spans.push(span)

	if (!endMatch) {
		return {
			end: null,
			endState: {
				region: region.rule,
				nestedLanguage: interior.language,
				nested: interior.endState,
			},
		}
	}

	pushSpan(spans, interior.delimiterStyle, endMatch.start, endMatch.end)
	return { end: regionEnd, endState: NO_REGION }
}

/**
 * Tokenize a single line with the given starting state
 */
export const tokenizeLine = (
	line: string,
	state: LineRegionState,
	language: CompiledLanguage,
	context: TokenizeContext = EMPTY_CONTEXT
): LineTokenizeResult => {
	const spans: StyledSpan[] = []
	const claimed: TextRange[] = []
	let endState = NO_REGION
	let position: number | null = 0

	// Continue a region opened on an earlier line
	const carried = state.region ? language.regionsByRule.get(state.region) : undefined
	if (carried) {
		const outcome = runRegion(
			line,
			language,
			carried,
			0,
			0,
			state.nested ?? NO_REGION,
			context,
			spans,
			claimed
		)
		position = outcome.end
		endState = outcome.endState
	}

	// Open new regions in the remaining text, earliest start first
	while (position !== null) {
		const opening = findRegionStart(line, position, language.regions)
		if (!opening) break

		const outcome = runRegion(
			line,
			language,
			opening.region,
			opening.match.start,
			opening.match.end,
			NO_REGION,
			context,
			spans,
			claimed
		)
		position = outcome.end
		endState = outcome.endState
	}

	applyLineRules(line, language.rules, spans, claimed)

	spans.sort((a, b) => a.start - b.start)
	return { spans, endState }
}

/**
 * Style a line from bare matchers: an optional open region ending somewhere
 * on this line, then single-line rules over the rest
 */
export const tokenize = (
	line: string,
	rules: readonly CompiledRule[],
	regionEnd?: { matcher: Matcher; style: ResolvedStyle | null }
): StyledSpan[] => {
	const spans: StyledSpan[] = []
	const claimed: TextRange[] = []

	if (regionEnd) {
		const end = regionEnd.matcher.find(line, 0)?.end ?? line.length
		if (end > 0) insertRange(claimed, { start: 0, end })
		pushSpan(spans, regionEnd.style, 0, end)
	}

	applyLineRules(line, rules, spans, claimed)

	spans.sort((a, b) => a.start - b.start)
	return spans
}
