/**
 * Rule Definition Store
 *
 * Turns a declarative source into an immutable LanguageDefinition.
 * Failures stay as small as possible: a broken rule is dropped and reported,
 * only a broken file header makes the whole language unavailable.
 */

import { z } from 'zod'
import { DefinitionLoadError, HighlighterError, describeError } from './errors'
import {
	compileRegion,
	compileRule,
	ruleDiagnostic,
} from './patternCompiler'
import {
	definitionSourceSchema,
	regionSourceSchema,
	ruleSourceSchema,
	type RegionSource,
	type RuleSource,
} from './schema'
import type {
	Diagnostic,
	Emphasis,
	LanguageDefinition,
	RegionRule,
	SingleLineRule,
} from './types'
import { normalizeExtension } from './utils'

export type LoadResult =
	| { ok: true; definition: LanguageDefinition; diagnostics: Diagnostic[] }
	| { ok: false; error: DefinitionLoadError }

const INLINE_ORIGIN = '<inline>'

const toEmphasis = (source: {
	bold?: boolean
	italic?: boolean
	underline?: boolean
}): Emphasis =>
	Object.freeze({
		bold: source.bold ?? false,
		italic: source.italic ?? false,
		underline: source.underline ?? false,
	})

const toRule = (source: RuleSource, index: number): SingleLineRule =>
	Object.freeze({
		name: source.name ?? `rule #${index}`,
		pattern: source.pattern,
		styleRole: source.color,
		captureGroup: source.group ? source.group : undefined,
		caseInsensitive: source.case_insensitive ?? false,
		emphasis: toEmphasis(source),
		priority: source.priority ?? 0,
	})

const toRegion = (source: RegionSource, index: number): RegionRule =>
	Object.freeze({
		name: source.name ?? `multiline rule #${index}`,
		startPattern: source.start,
		endPattern: source.end,
		styleRole: source.color,
		nestedLanguage: source.nested_language,
		caseInsensitive: source.case_insensitive ?? false,
		emphasis: toEmphasis(source),
	})

const entryName = (raw: unknown, fallback: string): string => {
	if (typeof raw === 'object' && raw !== null && 'name' in raw) {
		const { name } = raw
		if (typeof name === 'string' && name) return name
	}
	return fallback
}

/**
 * Build an immutable definition from an already parsed source object
 */
export const loadDefinition = (
	source: unknown,
	origin: string = INLINE_ORIGIN
): LoadResult => {
	const parsed = definitionSourceSchema.safeParse(source)
	if (!parsed.success) {
		return {
			ok: false,
			error: new DefinitionLoadError(
				origin,
				z.prettifyError(parsed.error),
				parsed.error
			),
		}
	}

	const { name, colors } = parsed.data
	const diagnostics: Diagnostic[] = []

	const extensions = [
		...new Set(parsed.data.extensions.map(normalizeExtension)),
	].filter(Boolean)
	if (extensions.length === 0) {
		return {
			ok: false,
			error: new DefinitionLoadError(origin, 'no usable file extensions'),
		}
	}

	const palette = Object.freeze({ ...colors })

	const rules: SingleLineRule[] = []
	parsed.data.rules.forEach((raw, index) => {
		const ruleName = entryName(raw, `rule #${index}`)
		const result = ruleSourceSchema.safeParse(raw)
		if (!result.success) {
			diagnostics.push({
				kind: 'invalid-rule',
				language: name,
				rule: ruleName,
				message: z.prettifyError(result.error),
			})
			return
		}
		const rule = toRule(result.data, index)
		try {
			compileRule(rule, palette)
		} catch (error) {
			if (!(error instanceof HighlighterError)) throw error
			diagnostics.push(ruleDiagnostic(name, rule.name, error))
			return
		}
		rules.push(rule)
	})

	const multilineRules: RegionRule[] = []
	parsed.data.multiline_rules.forEach((raw, index) => {
		const ruleName = entryName(raw, `multiline rule #${index}`)
		const result = regionSourceSchema.safeParse(raw)
		if (!result.success) {
			diagnostics.push({
				kind: 'invalid-rule',
				language: name,
				rule: ruleName,
				message: z.prettifyError(result.error),
			})
			return
		}
		const region = toRegion(result.data, index)
		try {
			const compiled = compileRegion(region, palette)
			if (compiled.start.matchesEmpty) {
				diagnostics.push({
					kind: 'zero-width-region',
					language: name,
					rule: region.name,
					message: `Region start /${region.startPattern}/ can match empty text`,
				})
				return
			}
		} catch (error) {
			if (!(error instanceof HighlighterError)) throw error
			diagnostics.push(ruleDiagnostic(name, region.name, error))
			return
		}
		multilineRules.push(region)
	})

	const definition: LanguageDefinition = Object.freeze({
		name,
		extensions: Object.freeze(extensions),
		palette,
		rules: Object.freeze(rules),
		multilineRules: Object.freeze(multilineRules),
	})

	return { ok: true, definition, diagnostics }
}

/**
 * Build a definition from JSON text
 */
export const parseDefinitionSource = (
	text: string,
	origin: string = INLINE_ORIGIN
): LoadResult => {
	let source: unknown
	try {
		source = JSON.parse(text)
	} catch (error) {
		return {
			ok: false,
			error: new DefinitionLoadError(
				origin,
				`invalid JSON (${describeError(error)})`,
				error
			),
		}
	}
	return loadDefinition(source, origin)
}
