/**
 * Highlight Session
 *
 * Owns the line-state cache of one open document. States are trusted up to
 * the first pending line; everything after it is a cached guess that forward
 * propagation either confirms (convergence) or overwrites.
 */

import { loggers } from '@repo/logger'
import { NO_REGION } from './consts'
import { highlighterEnv } from './env'
import { describeError } from './errors'
import type { TokenizeContext } from './nestedDispatcher'
import type { CompiledLanguage } from './patternCompiler'
import type { LanguageRegistry } from './registry'
import { nextLineState, statesEqual } from './regionTracker'
import { tokenizeLine } from './tokenizer'
import type { LineHighlight, LineRegionState, StyledSpan } from './types'
import { yieldToEventLoop } from './utils'

const log = loggers.session

const resolveChunkSize = (requested: number | undefined): number => {
	if (requested === undefined) return highlighterEnv.chunkSize
	if (Number.isInteger(requested) && requested > 0) return requested
	log.warn(
		`Ignoring chunk size ${requested}; using ${highlighterEnv.chunkSize}`
	)
	return highlighterEnv.chunkSize
}

/**
 * Replace `removed` lines at `start` with `inserted`
 */
export type LineEdit = {
	start: number
	removed: number
	inserted: readonly string[]
}

export type SessionOptions = {
	registry: LanguageRegistry
	/** Language name, or null for plain text */
	language: string | null
	text: string
}

export type SettleOptions = {
	signal?: AbortSignal
	chunkSize?: number
}

export type SettleResult = {
	status: 'complete' | 'superseded' | 'aborted'
	/** Lines propagated during this call */
	processed: number
}

const splitLines = (text: string): string[] => text.split(/\r?\n/)

const initialStates = (lineCount: number): (LineRegionState | undefined)[] =>
	Array.from({ length: lineCount }, (_, index) =>
		index === 0 ? NO_REGION : undefined
	)

export class HighlightSession {
	private lines: string[]
	private states: (LineRegionState | undefined)[]
	// sorted line indices whose end state must be recomputed
	private pending: number[]
	private currentVersion = 0
	private readonly language: CompiledLanguage | null
	private readonly context: TokenizeContext

	private constructor(
		language: CompiledLanguage | null,
		context: TokenizeContext,
		text: string
	) {
		this.language = language
		this.context = context
		this.lines = splitLines(text)
		this.states = initialStates(this.lines.length)
		this.pending = language ? [0] : []
	}

	/**
	 * Create a session for a document in the given language
	 */
	static create({ registry, language, text }: SessionOptions): HighlightSession {
		const compiled = language === null ? undefined : registry.compiled(language)
		if (language !== null && !compiled) {
			log.debug(`unknown language "${language}", using plain text`)
		}
		return new HighlightSession(compiled ?? null, registry.context, text)
	}

	get version(): number {
		return this.currentVersion
	}

	get lineCount(): number {
		return this.lines.length
	}

	get languageName(): string | null {
		return this.language?.definition.name ?? null
	}

	getLineText(lineIndex: number): string | undefined {
		return this.lines[lineIndex]
	}

	/**
	 * Whether the cached start state of a line is known to be correct
	 */
	isLineStateTrusted(lineIndex: number): boolean {
		if (lineIndex < 0 || lineIndex >= this.lines.length) return false
		if (!this.language) return true
		const firstPending = this.pending[0]
		return firstPending === undefined || lineIndex <= firstPending
	}

	/**
	 * Start state of a line, brought up to date first
	 */
	getLineState(lineIndex: number): LineRegionState | undefined {
		if (lineIndex < 0 || lineIndex >= this.lines.length) return undefined
		if (!this.language) return NO_REGION
		this.ensureTrusted(lineIndex)
		return this.states[lineIndex]
	}

	/**
	 * Start states of every line, propagating whatever is pending
	 */
	getLineStates(): LineRegionState[] {
		this.ensureTrusted(this.lines.length - 1)
		return this.lines.map((_, index) =>
			this.language ? (this.states[index] ?? NO_REGION) : NO_REGION
		)
	}

	/**
	 * Replace the whole document
	 */
	setText(text: string): void {
		this.applyEdit({ start: 0, removed: this.lines.length, inserted: splitLines(text) })
	}

	/**
	 * Apply a line edit. States before `start` stay trusted; states after the
	 * edited block are kept as cached values for convergence.
	 */
	applyEdit({ start, removed, inserted }: LineEdit): void {
		const lineCount = this.lines.length
		const editStart = Math.min(Math.max(0, start), lineCount)
		const removeCount = Math.min(Math.max(0, removed), lineCount - editStart)
		const insertCount = inserted.length
		const delta = insertCount - removeCount

		this.currentVersion++
		this.lines = this.lines
			.slice(0, editStart)
			.concat(inserted, this.lines.slice(editStart + removeCount))

		if (this.lines.length === 0) {
			this.lines = ['']
			this.states = [NO_REGION]
			this.pending = this.language ? [0] : []
			return
		}

		if (!this.language) return

		const startState = this.states[editStart]
		const before = this.states.slice(0, editStart)
		const after = this.states.slice(editStart + removeCount)
		const edited: (LineRegionState | undefined)[] = []
		if (insertCount > 0) {
			edited.push(startState)
			for (let i = 1; i < insertCount; i++) edited.push(undefined)
		} else if (after.length > 0) {
			// the first surviving line now starts where the removed block did
			after[0] = startState
		}
		this.states = [...before, ...edited, ...after]

		const pending = new Set<number>()
		for (const index of this.pending) {
			if (index < editStart) pending.add(index)
			else if (index >= editStart + removeCount) pending.add(index + delta)
		}
		const touched = Math.max(insertCount, 1)
		for (let i = editStart; i < editStart + touched && i < this.lines.length; i++) {
			pending.add(i)
		}
		if (editStart > 0 && this.states[editStart] === undefined) {
			pending.add(editStart - 1)
		}
		this.pending = [...pending].sort((a, b) => a - b)
	}

	/**
	 * Styled spans for lines [start, end). Only the dependency chain up to
	 * `end` is propagated.
	 */
	highlightLines(start: number, end: number): LineHighlight[] {
		const from = Math.max(0, start)
		const to = Math.min(end, this.lines.length)
		if (to <= from) return []

		this.ensureTrusted(to - 1)

		const result: LineHighlight[] = []
		for (let line = from; line < to; line++) {
			result.push({ line, spans: this.spansForLine(line) })
		}
		return result
	}

	/**
	 * Propagate pending states in chunks, yielding between chunks.
	 * A newer edit or an aborted signal stops the pass.
	 */
	async settle(options: SettleOptions = {}): Promise<SettleResult> {
		const { signal } = options
		const chunkSize = resolveChunkSize(options.chunkSize)
		const version = this.currentVersion
		let processed = 0

		while (this.pending.length > 0) {
			if (signal?.aborted) {
				log.debug(`settle aborted after ${processed} lines`)
				return { status: 'aborted', processed }
			}
			if (version !== this.currentVersion) {
				log.debug(`settle superseded by version ${this.currentVersion}`)
				return { status: 'superseded', processed }
			}

			for (let i = 0; i < chunkSize && this.pending.length > 0; i++) {
				this.propagateOne()
				processed++
			}

			if (this.pending.length > 0) {
				await yieldToEventLoop()
			}
		}

		return { status: 'complete', processed }
	}

	private spansForLine(lineIndex: number): StyledSpan[] {
		const line = this.lines[lineIndex]
		if (!this.language || line === undefined) return []
		try {
			return tokenizeLine(
				line,
				this.states[lineIndex] ?? NO_REGION,
				this.language,
				this.context
			).spans
		} catch (error) {
			log.error(`cannot highlight line ${lineIndex}: ${describeError(error)}`)
			return []
		}
	}

	private ensureTrusted(lineIndex: number): void {
		let firstPending = this.pending[0]
		while (firstPending !== undefined && firstPending < lineIndex) {
			this.propagateOne()
			firstPending = this.pending[0]
		}
	}

	/**
	 * Recompute the end state of the first pending line
	 */
	private propagateOne(): void {
		const index = this.pending.shift()
		const language = this.language
		if (index === undefined || !language) return

		const line = this.lines[index] ?? ''
		const state = this.states[index] ?? NO_REGION
		let next: LineRegionState
		try {
			next = nextLineState(line, state, language, this.context)
		} catch (error) {
			log.error(`cannot propagate line ${index}: ${describeError(error)}`)
			next = NO_REGION
		}

		const nextIndex = index + 1
		if (nextIndex >= this.lines.length) return

		const nextIsPending = this.pending[0] === nextIndex
		const cached = this.states[nextIndex]
		if (!nextIsPending && cached !== undefined && statesEqual(cached, next)) {
			// converged
			return
		}

		this.states[nextIndex] = next
		if (!nextIsPending) this.pending.unshift(nextIndex)
	}
}

/**
 * Session for a file, picking the language from its extension
 */
export const openDocument = (
	registry: LanguageRegistry,
	filePath: string,
	text: string
): HighlightSession =>
	HighlightSession.create({
		registry,
		language: registry.definitionForFile(filePath)?.name ?? null,
		text,
	})
