import { LOGGER_DEFINITIONS } from './definitions'

const enabledByTag = new Map<string, boolean>(
	Object.values(LOGGER_DEFINITIONS).map(({ tag, enabled }): [string, boolean] => [
		tag,
		enabled,
	])
)

const matchingTags = (tag: string, includeChildren: boolean): string[] =>
	Array.from(enabledByTag.keys()).filter(
		(known) => known === tag || (includeChildren && known.startsWith(`${tag}:`))
	)

const isLoggerEnabled = (tag: string): boolean =>
	enabledByTag.get(tag.trim()) ?? false

/**
 * With `includeChildren`, every tag below `tag` follows it, so
 * `setLoggerEnabled('highlighter', false, { includeChildren: true })`
 * silences the whole highlighter.
 */
const setLoggerEnabled = (
	tag: string,
	enabled: boolean,
	options?: { includeChildren?: boolean }
): void => {
	const normalized = tag.trim()
	const targets = matchingTags(normalized, options?.includeChildren ?? false)
	if (targets.length === 0) {
		throw new Error(`Unknown logger tag "${normalized}"`)
	}
	for (const target of targets) {
		enabledByTag.set(target, enabled)
	}
}

const configureLoggers = (config: Readonly<Record<string, boolean>>): void => {
	for (const [tag, enabled] of Object.entries(config)) {
		setLoggerEnabled(tag, enabled)
	}
}

export { configureLoggers, isLoggerEnabled, setLoggerEnabled }
