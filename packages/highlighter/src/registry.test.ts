import { setLogForwarder, type LogForwarderEntry } from '@repo/logger'
import { afterEach, describe, expect, it } from 'vitest'
import { LanguageRegistry } from './registry'
import { createFixtureRegistry, demoSource, markupSource } from './testing/languages'
import type { Diagnostic } from './types'

describe('LanguageRegistry', () => {
	afterEach(() => {
		setLogForwarder(undefined)
	})

	it('looks languages up by name, extension and file path', () => {
		const registry = createFixtureRegistry([demoSource, markupSource])

		expect(registry.supportedLanguages()).toEqual(['demo', 'markup'])
		expect(registry.supportedExtensions()).toEqual(['.demo', '.markup'])
		expect(registry.definitionForName('markup')?.name).toBe('markup')
		expect(registry.definitionForExtension('DEMO')?.name).toBe('demo')
		expect(registry.definitionForFile('src/pages/index.markup')?.name).toBe(
			'markup'
		)
		expect(registry.definitionForFile('C:\\work\\main.demo')?.name).toBe('demo')
	})

	it('treats unknown or missing extensions as plain text', () => {
		const registry = createFixtureRegistry([demoSource])

		expect(registry.definitionForExtension('.unknownext')).toBeUndefined()
		expect(registry.definitionForFile('Makefile')).toBeUndefined()
		expect(registry.definitionForFile('.demo')).toBeUndefined()
		expect(registry.definitionForName('python')).toBeUndefined()
	})

	it('rejects a second language with the same name', () => {
		const registry = createFixtureRegistry([demoSource])
		const first = registry.definitionForName('demo')

		const result = registry.load({ ...demoSource, extensions: ['.demo2'] })

		expect(result).toMatchObject({ ok: true, registered: false })
		expect(registry.definitionForName('demo')).toBe(first)
		expect(registry.definitionForExtension('.demo2')).toBeUndefined()
		expect(registry.diagnostics().map(({ kind }) => kind)).toEqual([
			'duplicate-language',
		])
	})

	it('reports a new language as registered', () => {
		const registry = new LanguageRegistry()

		const result = registry.load(demoSource, 'fixture')

		expect(result.registered).toBe(true)
		if (!result.ok) throw result.error
		expect(registry.definitionForName('demo')).toBe(result.definition)
	})

	it('keeps the first owner of a shared extension', () => {
		const reported: Diagnostic[] = []
		const registry = createFixtureRegistry([demoSource], {
			onDiagnostic: (diagnostic) => reported.push(diagnostic),
		})

		registry.load({
			name: 'other',
			extensions: ['.demo', '.oth'],
			colors: { text: '#d4d4d4' },
		})

		expect(reported).toEqual([
			{
				kind: 'extension-collision',
				language: 'other',
				message: 'Extension ".demo" already belongs to "demo"',
			},
		])
		expect(registry.definitionForExtension('.demo')?.name).toBe('demo')
		expect(registry.definitionForExtension('.oth')?.name).toBe('other')
	})

	it('reports dropped rules and logs them as warnings', () => {
		const entries: LogForwarderEntry[] = []
		setLogForwarder((entry) => entries.push(entry))
		const registry = new LanguageRegistry()

		const result = registry.load({
			name: 'broken',
			extensions: ['.broken'],
			colors: { keyword: '#569cd6' },
			rules: [{ name: 'paren', pattern: '(', color: 'keyword' }],
		})

		expect(result.ok).toBe(true)
		expect(registry.diagnostics().map(({ kind, rule }) => ({ kind, rule }))).toEqual([
			{ kind: 'pattern-compile', rule: 'paren' },
		])
		expect(entries.map(({ tag, level }) => ({ tag, level }))).toContainEqual({
			tag: 'highlighter:registry',
			level: 'warn',
		})
	})

	it('leaves the registry unchanged when a source cannot be loaded', () => {
		const registry = createFixtureRegistry([demoSource])

		const result = registry.loadText('{ "name": ', 'truncated.json')

		expect(result).toMatchObject({ ok: false, registered: false })
		expect(registry.supportedLanguages()).toEqual(['demo'])
		expect(registry.diagnostics()).toEqual([])
	})

	it('compiles each language once', () => {
		const registry = createFixtureRegistry([demoSource])

		const compiled = registry.compiled('demo')

		expect(compiled?.rules).toHaveLength(5)
		expect(registry.compiled('demo')).toBe(compiled)
		expect(registry.compiled('missing')).toBeUndefined()
	})
})
