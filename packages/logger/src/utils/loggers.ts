import { consola } from './consola'
import { LOGGER_DEFINITIONS, type LoggerName } from './definitions'
import { forwardLog, type LogLevel } from './forwarding'
import { isLoggerEnabled } from './toggles'

type LogMethod = (message: string, ...args: unknown[]) => void

type Logger = Readonly<Record<LogLevel, LogMethod>> & {
	readonly tag: string
}

const createScopedLogger = (tag: string): Logger => {
	const instance = consola.withTag(tag)

	const method =
		(level: LogLevel): LogMethod =>
		(message, ...args) => {
			if (!isLoggerEnabled(tag)) return
			forwardLog({ tag, level, args: [message, ...args] }, instance)
			instance[level](message, ...args)
		}

	return {
		tag,
		debug: method('debug'),
		info: method('info'),
		warn: method('warn'),
		error: method('error'),
	}
}

const loggers: Readonly<Record<LoggerName, Logger>> = Object.freeze({
	registry: createScopedLogger(LOGGER_DEFINITIONS.registry.tag),
	session: createScopedLogger(LOGGER_DEFINITIONS.session.tag),
})

export { loggers }
export type { Logger, LoggerName }
