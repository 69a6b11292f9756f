import type { ConsolaInstance } from './consola'

type LogLevel = 'debug' | 'info' | 'warn' | 'error'

type LogForwarderEntry = {
	tag: string
	level: LogLevel
	args: unknown[]
}

type LogForwarder = (entry: LogForwarderEntry) => void

let logForwarder: LogForwarder | undefined

const setLogForwarder = (forwarder?: LogForwarder) => {
	logForwarder = forwarder
}

// a failing forwarder is reported on the logger itself, never rethrown
const forwardLog = (entry: LogForwarderEntry, instance: ConsolaInstance) => {
	if (!logForwarder) return
	try {
		logForwarder(entry)
	} catch (error) {
		instance.debug('log forwarder failed', error)
	}
}

export { forwardLog, setLogForwarder }
export type { LogForwarder, LogForwarderEntry, LogLevel }
