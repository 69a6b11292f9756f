import path from 'node:path'
import { z } from 'zod'
import { DEFAULT_CHUNK_SIZE } from './consts'

const envSchema = z.object({
	HIGHLIGHTER_LANGUAGE_DIRS: z.string().optional(),
	HIGHLIGHTER_CHUNK_SIZE: z.coerce.number().int().positive().optional(),
})

const parsed = envSchema.safeParse(process.env)
if (!parsed.success) {
	throw new Error(z.prettifyError(parsed.error))
}

const languageDirs = (parsed.data.HIGHLIGHTER_LANGUAGE_DIRS ?? '')
	.split(path.delimiter)
	.map((dir) => dir.trim())
	.filter(Boolean)

export const highlighterEnv = {
	languageDirs,
	chunkSize: parsed.data.HIGHLIGHTER_CHUNK_SIZE ?? DEFAULT_CHUNK_SIZE,
}

export type HighlighterEnv = typeof highlighterEnv
