type LoggerDefinition = {
	tag: string
	enabled: boolean
}

const LOGGER_DEFINITIONS = {
	registry: {
		tag: 'highlighter:registry',
		enabled: true,
	},
	session: {
		tag: 'highlighter:session',
		enabled: true,
	},
} as const satisfies Record<string, LoggerDefinition>

type LoggerName = keyof typeof LOGGER_DEFINITIONS

export { LOGGER_DEFINITIONS }
export type { LoggerDefinition, LoggerName }
