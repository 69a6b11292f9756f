export { loggers } from './utils/loggers'
export type { Logger, LoggerName } from './utils/loggers'

export {
	configureLoggers,
	isLoggerEnabled,
	setLoggerEnabled,
} from './utils/toggles'

export { setLogForwarder } from './utils/forwarding'
export type { LogForwarderEntry, LogLevel } from './utils/forwarding'
