import { describe, expect, it } from 'vitest'
import { NO_REGION } from './consts'
import { computeLineStates, nextLineState, statesEqual } from './regionTracker'
import {
	compileFixture,
	demoSource,
	regionRule,
	requireDefinition,
} from './testing/languages'
import type { LineRegionState } from './types'

const demo = compileFixture(demoSource)

describe('statesEqual', () => {
	const comment = regionRule('comment', '/\\*', '\\*/', 'comment')
	const string = regionRule('string', '"""', '"""', 'string')
	const nestedDefinition = requireDefinition(demoSource)

	it('compares structurally', () => {
		expect(
			statesEqual(
				{ region: comment, nestedLanguage: null, nested: null },
				{ region: comment, nestedLanguage: null, nested: null }
			)
		).toBe(true)
		expect(
			statesEqual(
				{ region: comment, nestedLanguage: null, nested: null },
				{ region: string, nestedLanguage: null, nested: null }
			)
		).toBe(false)
		expect(
			statesEqual(NO_REGION, { region: null, nestedLanguage: null, nested: null })
		).toBe(true)
	})

	it('treats a missing nested state as no region', () => {
		const outer = regionRule('script', '<s>', '</s>', 'tag', {
			nestedLanguage: 'demo',
		})
		const bare: LineRegionState = {
			region: outer,
			nestedLanguage: nestedDefinition,
			nested: null,
		}
		const explicit: LineRegionState = { ...bare, nested: NO_REGION }
		const inComment: LineRegionState = {
			...bare,
			nested: { region: comment, nestedLanguage: null, nested: null },
		}

		expect(statesEqual(bare, explicit)).toBe(true)
		expect(statesEqual(bare, inComment)).toBe(false)
	})
})

describe('computeLineStates', () => {
	const commentRule = demo.regions[0]?.rule

	it('carries a block comment until it closes', () => {
		const states = computeLineStates(['/* start', 'middle', 'end */ code', 'x'], demo)

		expect(states.map((state) => state.region)).toEqual([
			null,
			commentRule,
			commentRule,
			null,
		])
	})

	it('returns one state per line, the first always outside regions', () => {
		expect(computeLineStates([], demo)).toEqual([])
		expect(computeLineStates(['/*'], demo)).toEqual([NO_REGION])
	})

	it('agrees with stepping line by line', () => {
		const lines = ['var a = 1 /*', '', '*/ /* */ /*', '"*/"', 'return 2']
		const states = computeLineStates(lines, demo)

		let state = NO_REGION
		lines.forEach((line, index) => {
			expect(states[index]).toEqual(state)
			state = nextLineState(line, state, demo)
		})
	})
})
