/**
 * Language Registry
 *
 * Process-wide lookup of loaded definitions by name and by file extension.
 * Definitions are immutable once registered; compiled matchers are built on
 * first use and cached.
 */

import { loggers } from '@repo/logger'
import { loadDefinition, parseDefinitionSource, type LoadResult } from './definitionStore'
import type { TokenizeContext } from './nestedDispatcher'
import { compileLanguage, type CompiledLanguage } from './patternCompiler'
import type { Diagnostic, LanguageDefinition } from './types'
import { extensionOfPath, normalizeExtension } from './utils'

const log = loggers.registry

/**
 * Load outcome plus whether the definition is now the registered one for its
 * name. A well-formed definition whose name is taken loads but is not
 * registered.
 */
export type RegistrationResult = LoadResult & { registered: boolean }

export type RegistryOptions = {
	onDiagnostic?: (diagnostic: Diagnostic) => void
}

const formatDiagnostic = ({ language, rule, message }: Diagnostic) =>
	rule ? `[${language}] ${rule}: ${message}` : `[${language}] ${message}`

export class LanguageRegistry {
	private readonly byName = new Map<string, LanguageDefinition>()
	private readonly byExtension = new Map<string, LanguageDefinition>()
	private readonly compiledByName = new Map<string, CompiledLanguage>()
	private readonly collected: Diagnostic[] = []
	private readonly reportedOnce = new Set<string>()
	private readonly onDiagnostic?: (diagnostic: Diagnostic) => void

	readonly context: TokenizeContext

	constructor(options: RegistryOptions = {}) {
		this.onDiagnostic = options.onDiagnostic
		this.context = {
			resolveLanguage: (name) => this.compiled(name),
			onDiagnostic: (diagnostic) => this.reportOnce(diagnostic),
			depth: 0,
		}
	}

	/**
	 * Record a non-fatal problem
	 */
	report(diagnostic: Diagnostic): void {
		this.collected.push(diagnostic)
		log.warn(formatDiagnostic(diagnostic))
		this.onDiagnostic?.(diagnostic)
	}

	private reportOnce(diagnostic: Diagnostic): void {
		const key = `${diagnostic.kind}:${diagnostic.language}:${diagnostic.rule ?? ''}`
		if (this.reportedOnce.has(key)) return
		this.reportedOnce.add(key)
		this.report(diagnostic)
	}

	/**
	 * Add a definition. Returns false when its name is already taken.
	 * An extension already claimed by another language stays with that language.
	 */
	register(definition: LanguageDefinition): boolean {
		if (this.byName.has(definition.name)) {
			this.report({
				kind: 'duplicate-language',
				language: definition.name,
				message: `Language "${definition.name}" is already registered`,
			})
			return false
		}

		this.byName.set(definition.name, definition)

		for (const extension of definition.extensions) {
			const owner = this.byExtension.get(extension)
			if (owner) {
				this.report({
					kind: 'extension-collision',
					language: definition.name,
					message: `Extension "${extension}" already belongs to "${owner.name}"`,
				})
				continue
			}
			this.byExtension.set(extension, definition)
		}

		log.debug(
			`registered ${definition.name} (${definition.rules.length} rules, ${definition.multilineRules.length} regions)`
		)
		return true
	}

	/**
	 * Load and register a parsed definition source
	 */
	load(source: unknown, origin?: string): RegistrationResult {
		return this.accept(loadDefinition(source, origin))
	}

	/**
	 * Load and register a JSON definition source
	 */
	loadText(text: string, origin?: string): RegistrationResult {
		return this.accept(parseDefinitionSource(text, origin))
	}

	private accept(result: LoadResult): RegistrationResult {
		if (!result.ok) {
			log.error(result.error.message)
			return { ...result, registered: false }
		}
		for (const diagnostic of result.diagnostics) {
			this.report(diagnostic)
		}
		return { ...result, registered: this.register(result.definition) }
	}

	definitionForName(name: string): LanguageDefinition | undefined {
		return this.byName.get(name)
	}

	/**
	 * Undefined means plain text
	 */
	definitionForExtension(extension: string): LanguageDefinition | undefined {
		return this.byExtension.get(normalizeExtension(extension))
	}

	definitionForFile(filePath: string): LanguageDefinition | undefined {
		const extension = extensionOfPath(filePath)
		return extension ? this.byExtension.get(extension) : undefined
	}

	supportedExtensions(): string[] {
		return [...this.byExtension.keys()].sort()
	}

	supportedLanguages(): string[] {
		return [...this.byName.keys()].sort()
	}

	/**
	 * Compiled matchers for a language, built once
	 */
	compiled(name: string): CompiledLanguage | undefined {
		const cached = this.compiledByName.get(name)
		if (cached) return cached

		const definition = this.byName.get(name)
		if (!definition) return undefined

		const { language, diagnostics } = compileLanguage(definition)
		for (const diagnostic of diagnostics) {
			this.reportOnce(diagnostic)
		}
		this.compiledByName.set(name, language)
		return language
	}

	diagnostics(): readonly Diagnostic[] {
		return this.collected
	}
}
