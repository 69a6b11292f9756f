import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import { loggers } from '@repo/logger'
import { highlighterEnv } from './env'
import { describeError } from './errors'
import { LanguageRegistry, type RegistryOptions } from './registry'

const log = loggers.registry

export const BUNDLED_LANGUAGES_DIR = fileURLToPath(
	new URL('../languages', import.meta.url)
)

/**
 * Load every *.json definition in a directory, in file name order.
 * Returns the number of languages registered.
 */
export const loadLanguageDirectory = (
	registry: LanguageRegistry,
	dir: string
): number => {
	let entries: string[]
	try {
		entries = fs.readdirSync(dir)
	} catch (error) {
		registry.report({
			kind: 'file-load',
			language: dir,
			message: `Cannot read language directory: ${describeError(error)}`,
		})
		return 0
	}

	let loaded = 0
	for (const entry of entries.filter((name) => name.endsWith('.json')).sort()) {
		const filePath = path.join(dir, entry)
		let text: string
		try {
			text = fs.readFileSync(filePath, 'utf8')
		} catch (error) {
			registry.report({
				kind: 'file-load',
				language: entry,
				message: `Cannot read ${filePath}: ${describeError(error)}`,
			})
			continue
		}

		if (registry.loadText(text, filePath).registered) loaded++
	}

	log.debug(`loaded ${loaded} languages from ${dir}`)
	return loaded
}

export type DefaultRegistryOptions = RegistryOptions & {
	/** Extra directories loaded after the bundled definitions */
	languageDirs?: readonly string[]
}

/**
 * Registry with the bundled definitions plus any configured directories
 */
export const createDefaultRegistry = (
	options: DefaultRegistryOptions = {}
): LanguageRegistry => {
	const registry = new LanguageRegistry(options)
	const dirs = [
		BUNDLED_LANGUAGES_DIR,
		...(options.languageDirs ?? highlighterEnv.languageDirs),
	]
	for (const dir of dirs) {
		loadLanguageDirectory(registry, dir)
	}
	return registry
}
