import { describe, expect, it } from 'vitest'
import { loadDefinition, parseDefinitionSource } from './definitionStore'
import { DefinitionLoadError } from './errors'
import { demoSource } from './testing/languages'

const base = {
	name: 'sample',
	extensions: ['.sample'],
	colors: { keyword: '#569cd6', comment: '#6a9955' },
}

describe('loadDefinition', () => {
	it('builds a frozen definition from a valid source', () => {
		const result = loadDefinition(demoSource)
		if (!result.ok) throw result.error

		const { definition, diagnostics } = result
		expect(diagnostics).toEqual([])
		expect(definition.name).toBe('demo')
		expect(definition.rules.map((rule) => rule.name)).toEqual([
			'string',
			'line-comment',
			'function-definition',
			'keyword',
			'number',
		])
		expect(definition.multilineRules[0]?.startPattern).toBe('/\\*')
		expect(Object.isFrozen(definition)).toBe(true)
		expect(Object.isFrozen(definition.rules)).toBe(true)
		expect(Object.isFrozen(definition.palette)).toBe(true)
	})

	it('normalizes and deduplicates extensions', () => {
		const result = loadDefinition({
			...base,
			extensions: ['SAMPLE', '.sample', 'smp'],
		})

		expect(result.ok && result.definition.extensions).toEqual([
			'.sample',
			'.smp',
		])
	})

	it('fills rule defaults', () => {
		const result = loadDefinition({
			...base,
			rules: [{ pattern: 'if', color: 'keyword', group: 0 }],
		})
		if (!result.ok) throw result.error

		expect(result.definition.rules[0]).toEqual({
			name: 'rule #0',
			pattern: 'if',
			styleRole: 'keyword',
			captureGroup: undefined,
			caseInsensitive: false,
			emphasis: { bold: false, italic: false, underline: false },
			priority: 0,
		})
	})

	it('fails the whole language when the header is invalid', () => {
		const result = loadDefinition({ extensions: ['.x'], colors: {} }, 'x.json')

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error).toBeInstanceOf(DefinitionLoadError)
		expect(result.error.origin).toBe('x.json')
		expect(result.error.message).toMatch(
			/^Cannot load language definition x\.json: /
		)
	})

	it('drops bad rules one by one', () => {
		const result = loadDefinition({
			...base,
			rules: [
				{ name: 'broken', pattern: '(', color: 'keyword' },
				{ pattern: 'x' },
				{ pattern: '\\d+', color: 'number' },
				{ name: 'if', pattern: '\\bif\\b', color: 'keyword' },
			],
		})
		if (!result.ok) throw result.error

		expect(result.definition.rules.map((rule) => rule.name)).toEqual(['if'])
		expect(
			result.diagnostics.map(({ kind, language, rule }) => ({
				kind,
				language,
				rule,
			}))
		).toEqual([
			{ kind: 'pattern-compile', language: 'sample', rule: 'broken' },
			{ kind: 'invalid-rule', language: 'sample', rule: 'rule #1' },
			{ kind: 'palette-resolution', language: 'sample', rule: 'rule #2' },
		])
	})

	it('drops region rules without a style or with an empty-matching start', () => {
		const result = loadDefinition({
			...base,
			multiline_rules: [
				{ name: 'bare', start: '<<', end: '>>' },
				{ name: 'greedy', start: 'a*', end: 'b', color: 'comment' },
				{ name: 'comment', start: '/\\*', end: '\\*/', color: 'comment' },
			],
		})
		if (!result.ok) throw result.error

		expect(result.definition.multilineRules.map((rule) => rule.name)).toEqual([
			'comment',
		])
		expect(result.diagnostics.map(({ kind }) => kind)).toEqual([
			'invalid-rule',
			'zero-width-region',
		])
	})

	it('keeps nested regions whose color the outer palette lacks', () => {
		const result = loadDefinition({
			...base,
			multiline_rules: [
				{
					name: 'script',
					start: '<script>',
					end: '</script>',
					color: 'tag',
					nested_language: 'demo',
				},
			],
		})
		if (!result.ok) throw result.error

		expect(result.diagnostics).toEqual([])
		expect(result.definition.multilineRules[0]?.nestedLanguage).toBe('demo')
	})
})

describe('parseDefinitionSource', () => {
	it('parses JSON text', () => {
		const result = parseDefinitionSource(JSON.stringify(base), 'sample.json')

		expect(result.ok && result.definition.rules).toEqual([])
	})

	it('reports malformed JSON', () => {
		const result = parseDefinitionSource('{', 'broken.json')

		expect(result.ok).toBe(false)
		if (result.ok) return
		expect(result.error.message).toMatch(
			/^Cannot load language definition broken\.json: invalid JSON \(/
		)
	})
})
