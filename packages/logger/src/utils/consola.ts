import { createConsola, type ConsolaInstance } from 'consola'
import { loggerEnv } from '../env'

const DEFAULT_LEVEL = loggerEnv.loggerLevel ?? (loggerEnv.isDev ? 4 : 3)

const consola = createConsola({
	level: DEFAULT_LEVEL,
})

export { consola }
export type { ConsolaInstance }
