/**
 * Highlighter Types
 */

/**
 * Rendering flags applied on top of a palette color
 */
export type Emphasis = {
	bold: boolean
	italic: boolean
	underline: boolean
}

/**
 * Single-line rule: a regex evaluated against one line of text
 */
export type SingleLineRule = {
	name: string
	pattern: string
	styleRole: string
	/** When set, only this group is styled; the full match is still consumed */
	captureGroup?: number
	caseInsensitive: boolean
	emphasis: Emphasis
	/** Higher runs first; equal priorities keep declared order */
	priority: number
}

/**
 * Region rule: a start/end pair that may span lines
 */
export type RegionRule = {
	name: string
	startPattern: string
	endPattern: string
	/** Style of the whole region, or of its delimiters when nested */
	styleRole?: string
	/** Language applied to the region interior */
	nestedLanguage?: string
	caseInsensitive: boolean
	emphasis: Emphasis
}

/**
 * Immutable per-language rule set
 */
export type LanguageDefinition = {
	readonly name: string
	/** Lower case, with leading dot */
	readonly extensions: readonly string[]
	readonly palette: Readonly<Record<string, string>>
	readonly rules: readonly SingleLineRule[]
	readonly multilineRules: readonly RegionRule[]
}

/**
 * Palette role resolved to a concrete style
 */
export type ResolvedStyle = Emphasis & {
	role: string
	color: string
}

/**
 * Styled output unit, half-open range within one line
 */
export type StyledSpan = ResolvedStyle & {
	start: number
	end: number
}

/**
 * Region state at the start of a line
 */
export type LineRegionState = {
	readonly region: RegionRule | null
	readonly nestedLanguage: LanguageDefinition | null
	/** The nested language's own state inside `region` */
	readonly nested: LineRegionState | null
}

/**
 * Result of tokenizing a line
 */
export type LineTokenizeResult = {
	spans: StyledSpan[]
	endState: LineRegionState
}

/**
 * Spans for one document line
 */
export type LineHighlight = {
	line: number
	spans: StyledSpan[]
}

export type DiagnosticKind =
	| 'invalid-rule'
	| 'pattern-compile'
	| 'palette-resolution'
	| 'zero-width-region'
	| 'extension-collision'
	| 'duplicate-language'
	| 'nested-language-missing'
	| 'file-load'

/**
 * Non-fatal problem found while loading or using a definition
 */
export type Diagnostic = {
	kind: DiagnosticKind
	language: string
	rule?: string
	message: string
}
