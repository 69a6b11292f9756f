/**
 * @repo/highlighter
 *
 * Declarative, JSON-configured syntax highlighting with multiline regions and
 * nested languages.
 */

// Sessions and registry
export {
	HighlightSession,
	openDocument,
	type LineEdit,
	type SessionOptions,
	type SettleOptions,
	type SettleResult,
} from './session'
export {
	LanguageRegistry,
	type RegistrationResult,
	type RegistryOptions,
} from './registry'
export {
	BUNDLED_LANGUAGES_DIR,
	createDefaultRegistry,
	loadLanguageDirectory,
	type DefaultRegistryOptions,
} from './loadLanguages'

// Definitions
export {
	loadDefinition,
	parseDefinitionSource,
	type LoadResult,
} from './definitionStore'
export {
	compileLanguage,
	compilePattern,
	resolveStyle,
	type CompiledLanguage,
	type CompiledRegion,
	type CompiledRule,
	type Matcher,
	type PatternMatch,
	type PatternSpec,
} from './patternCompiler'

// Tokenizing (for advanced use)
export { tokenizeLine, tokenize } from './tokenizer'
export { computeLineStates, nextLineState, statesEqual } from './regionTracker'
export { resolveInterior, type TokenizeContext } from './nestedDispatcher'
export { NO_REGION, MAX_NESTING_DEPTH } from './consts'

export {
	HighlighterError,
	PatternCompileError,
	PaletteResolutionError,
	DefinitionLoadError,
} from './errors'

export type {
	Diagnostic,
	DiagnosticKind,
	Emphasis,
	LanguageDefinition,
	LineHighlight,
	LineRegionState,
	LineTokenizeResult,
	RegionRule,
	ResolvedStyle,
	SingleLineRule,
	StyledSpan,
} from './types'
