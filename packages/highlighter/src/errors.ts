export class HighlighterError extends Error {
	constructor(message: string, cause?: unknown) {
		super(message, cause === undefined ? undefined : { cause })
		this.name = 'HighlighterError'
	}
}

/**
 * A rule pattern that does not compile. Scoped to one rule.
 */
export class PatternCompileError extends HighlighterError {
	readonly pattern: string

	constructor(pattern: string, message: string, cause?: unknown) {
		super(`Invalid pattern /${pattern}/: ${message}`, cause)
		this.name = 'PatternCompileError'
		this.pattern = pattern
	}
}

/**
 * A rule referencing a color role the palette does not define. Scoped to one rule.
 */
export class PaletteResolutionError extends HighlighterError {
	readonly role: string

	constructor(role: string) {
		super(`Unknown color role "${role}"`)
		this.name = 'PaletteResolutionError'
		this.role = role
	}
}

/**
 * A definition source that cannot be used at all. Scoped to one language.
 */
export class DefinitionLoadError extends HighlighterError {
	readonly origin: string

	constructor(origin: string, message: string, cause?: unknown) {
		super(`Cannot load language definition ${origin}: ${message}`, cause)
		this.name = 'DefinitionLoadError'
		this.origin = origin
	}
}

export const describeError = (error: unknown): string =>
	error instanceof Error ? error.message : String(error)
