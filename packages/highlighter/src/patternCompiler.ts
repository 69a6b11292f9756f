/**
 * Pattern Compiler
 *
 * Wraps rule patterns behind a uniform matcher so the tokenizer treats
 * single-line rules and region delimiters the same way.
 */

import {
	HighlighterError,
	PaletteResolutionError,
	PatternCompileError,
	describeError,
} from './errors'
import type {
	Diagnostic,
	Emphasis,
	LanguageDefinition,
	RegionRule,
	ResolvedStyle,
	SingleLineRule,
} from './types'

export type PatternSpec = {
	source: string
	caseInsensitive?: boolean
	/** Capture group to style, 0 or undefined for the whole match */
	group?: number
}

export type TextRange = {
	start: number
	end: number
}

export type PatternMatch = TextRange & {
	/** Range to style; null when the capture group is absent or empty */
	styled: TextRange | null
}

export type Matcher = {
	readonly source: string
	readonly group: number
	/** Whether the pattern can match the empty string */
	readonly matchesEmpty: boolean
	/** First non-empty match starting at or after `from` */
	find(line: string, from: number): PatternMatch | null
}

export type CompiledRule = {
	rule: SingleLineRule
	matcher: Matcher
	style: ResolvedStyle
}

export type CompiledRegion = {
	rule: RegionRule
	start: Matcher
	end: Matcher
	/** Null for nested regions whose role the outer palette leaves out */
	style: ResolvedStyle | null
}

export type CompiledLanguage = {
	definition: LanguageDefinition
	rules: CompiledRule[]
	regions: CompiledRegion[]
	regionsByRule: Map<RegionRule, CompiledRegion>
}

export type CompileLanguageResult = {
	language: CompiledLanguage
	diagnostics: Diagnostic[]
}

const countGroups = (regex: RegExp): number => {
	const probe = new RegExp(`${regex.source}|`, regex.flags.replace('g', ''))
	const result = probe.exec('')
	return result ? result.length - 1 : 0
}

const createRegex = (source: string, flags: string): RegExp => {
	try {
		return new RegExp(source, flags)
	} catch (error) {
		throw new PatternCompileError(source, describeError(error), error)
	}
}

/**
 * Compile one pattern into a matcher
 */
export const compilePattern = ({
	source,
	caseInsensitive = false,
	group = 0,
}: PatternSpec): Matcher => {
	if (source.length === 0) {
		throw new PatternCompileError(source, 'pattern is empty')
	}
	if (!Number.isInteger(group) || group < 0) {
		throw new PatternCompileError(source, `invalid capture group ${group}`)
	}

	const flags = `g${caseInsensitive ? 'i' : ''}${group > 0 ? 'd' : ''}`
	const regex = createRegex(source, flags)

	const groupCount = countGroups(regex)
	if (group > groupCount) {
		throw new PatternCompileError(
			source,
			`capture group ${group} does not exist (pattern has ${groupCount})`
		)
	}

	const matchesEmpty = createRegex(source, flags.replace('g', '')).test('')

	const styledRange = (
		match: RegExpExecArray,
		whole: TextRange
	): TextRange | null => {
		if (group === 0) return whole
		const indices = match.indices?.[group]
		if (!indices) return null
		// a group inside a lookaround can fall outside the match
		const start = Math.max(indices[0], whole.start)
		const end = Math.min(indices[1], whole.end)
		return end > start ? { start, end } : null
	}

	const find = (line: string, from: number): PatternMatch | null => {
		let position = from
		while (position <= line.length) {
			regex.lastIndex = position
			const match = regex.exec(line)
			if (!match) return null

			const start = match.index
			const end = start + match[0].length
			if (end === start) {
				// zero-width: skip this position
				position = start + 1
				continue
			}

			const whole = { start, end }
			return { start, end, styled: styledRange(match, whole) }
		}
		return null
	}

	return { source, group, matchesEmpty, find }
}

/**
 * Resolve a palette role to a concrete style
 */
export const resolveStyle = (
	palette: Readonly<Record<string, string>>,
	role: string,
	emphasis: Emphasis
): ResolvedStyle => {
	const color = Object.prototype.hasOwnProperty.call(palette, role)
		? palette[role]
		: undefined
	if (color === undefined) {
		throw new PaletteResolutionError(role)
	}
	return { role, color, ...emphasis }
}

export const compileRule = (
	rule: SingleLineRule,
	palette: Readonly<Record<string, string>>
): CompiledRule => {
	const matcher = compilePattern({
		source: rule.pattern,
		caseInsensitive: rule.caseInsensitive,
		group: rule.captureGroup,
	})
	const style = resolveStyle(palette, rule.styleRole, rule.emphasis)
	return { rule, matcher, style }
}

export const compileRegion = (
	rule: RegionRule,
	palette: Readonly<Record<string, string>>
): CompiledRegion => {
	const start = compilePattern({
		source: rule.startPattern,
		caseInsensitive: rule.caseInsensitive,
	})
	const end = compilePattern({
		source: rule.endPattern,
		caseInsensitive: rule.caseInsensitive,
	})

	let style: ResolvedStyle | null = null
	if (rule.styleRole !== undefined) {
		try {
			style = resolveStyle(palette, rule.styleRole, rule.emphasis)
		} catch (error) {
			// resolved against the nested palette when the region is tokenized
			if (!(error instanceof PaletteResolutionError) || !rule.nestedLanguage) {
				throw error
			}
		}
	} else if (!rule.nestedLanguage) {
		throw new HighlighterError(`Region rule "${rule.name}" needs a color`)
	}

	return { rule, start, end, style }
}

const diagnosticKind = (error: unknown): Diagnostic['kind'] => {
	if (error instanceof PatternCompileError) return 'pattern-compile'
	if (error instanceof PaletteResolutionError) return 'palette-resolution'
	return 'invalid-rule'
}

export const ruleDiagnostic = (
	language: string,
	rule: string,
	error: unknown
): Diagnostic => ({
	kind: diagnosticKind(error),
	language,
	rule,
	message: describeError(error),
})

/**
 * Compile every rule of a definition. Rules that fail are left out and reported.
 */
export const compileLanguage = (
	definition: LanguageDefinition
): CompileLanguageResult => {
	const diagnostics: Diagnostic[] = []
	const rules: CompiledRule[] = []
	const regions: CompiledRegion[] = []

	for (const rule of definition.rules) {
		try {
			rules.push(compileRule(rule, definition.palette))
		} catch (error) {
			if (!(error instanceof HighlighterError)) throw error
			diagnostics.push(ruleDiagnostic(definition.name, rule.name, error))
		}
	}

	for (const rule of definition.multilineRules) {
		let region: CompiledRegion
		try {
			region = compileRegion(rule, definition.palette)
		} catch (error) {
			if (!(error instanceof HighlighterError)) throw error
			diagnostics.push(ruleDiagnostic(definition.name, rule.name, error))
			continue
		}
		if (region.start.matchesEmpty) {
			diagnostics.push({
				kind: 'zero-width-region',
				language: definition.name,
				rule: rule.name,
				message: `Region start /${rule.startPattern}/ can match empty text`,
			})
			continue
		}
		regions.push(region)
	}

	// stable: equal priorities keep declared order
	rules.sort((a, b) => b.rule.priority - a.rule.priority)

	const regionsByRule = new Map(
		regions.map((region): [RegionRule, CompiledRegion] => [region.rule, region])
	)

	return {
		language: { definition, rules, regions, regionsByRule },
		diagnostics,
	}
}
