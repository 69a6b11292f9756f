/**
 * Nested-Language Dispatcher
 *
 * Styles a region interior with another language's rules and translates the
 * resulting spans back into the outer line's coordinates.
 */

import { MAX_NESTING_DEPTH, NO_REGION } from './consts'
import { PaletteResolutionError } from './errors'
import {
	resolveStyle,
	type CompiledLanguage,
	type CompiledRegion,
} from './patternCompiler'
import type {
	Diagnostic,
	LanguageDefinition,
	LineRegionState,
	LineTokenizeResult,
	ResolvedStyle,
	StyledSpan,
} from './types'

export type TokenizeContext = {
	resolveLanguage: (name: string) => CompiledLanguage | undefined
	onDiagnostic?: (diagnostic: Diagnostic) => void
	depth: number
}

export type TokenizeFn = (
	line: string,
	state: LineRegionState,
	language: CompiledLanguage,
	context: TokenizeContext
) => LineTokenizeResult

export type InteriorResult = {
	spans: StyledSpan[]
	endState: LineRegionState
	language: LanguageDefinition | null
	/** Style of the region delimiters */
	delimiterStyle: ResolvedStyle | null
}

export const EMPTY_CONTEXT: TokenizeContext = {
	resolveLanguage: () => undefined,
	depth: 0,
}

const flatInterior = (
	style: ResolvedStyle | null,
	from: number,
	to: number
): InteriorResult => ({
	spans: style && to > from ? [{ ...style, start: from, end: to }] : [],
	endState: NO_REGION,
	language: null,
	delimiterStyle: style,
})

/**
 * The region's own style, or its role looked up in the nested palette when
 * the outer palette does not define it
 */
const regionStyle = (
	region: CompiledRegion,
	nested: CompiledLanguage
): ResolvedStyle | null => {
	const { styleRole, emphasis } = region.rule
	if (region.style || styleRole === undefined) return region.style
	try {
		return resolveStyle(nested.definition.palette, styleRole, emphasis)
	} catch (error) {
		if (error instanceof PaletteResolutionError) return null
		throw error
	}
}

/**
 * Style `line.slice(from, to)` with the region's nested language
 */
export const resolveInterior = (
	outerLanguage: string,
	region: CompiledRegion,
	line: string,
	from: number,
	to: number,
	nestedState: LineRegionState,
	context: TokenizeContext,
	tokenize: TokenizeFn
): InteriorResult => {
	const nestedName = region.rule.nestedLanguage
	if (nestedName === undefined) {
		return flatInterior(region.style, from, to)
	}

	const nested = context.resolveLanguage(nestedName)
	if (!nested) {
		context.onDiagnostic?.({
			kind: 'nested-language-missing',
			language: outerLanguage,
			rule: region.rule.name,
			message: `Nested language "${nestedName}" is not loaded; styling region flatly`,
		})
		return flatInterior(region.style, from, to)
	}

	const delimiterStyle = regionStyle(region, nested)
	if (context.depth >= MAX_NESTING_DEPTH) {
		return flatInterior(delimiterStyle, from, to)
	}

	const result = tokenize(line.slice(from, to), nestedState, nested, {
		...context,
		depth: context.depth + 1,
	})

	return {
		spans: result.spans.map((span) => ({
			...span,
			start: span.start + from,
			end: span.end + from,
		})),
		endState: result.endState,
		language: nested.definition,
		delimiterStyle,
	}
}
