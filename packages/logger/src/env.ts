import { z } from 'zod'

const parseLevel = (value: unknown): number | undefined => {
	if (typeof value === 'number') return value
	if (typeof value === 'string' && value.trim().length > 0) {
		const parsed = Number.parseInt(value, 10)
		return Number.isNaN(parsed) ? undefined : parsed
	}
	return undefined
}

const envSchema = z.object({
	LOGGER_LEVEL: z
		.preprocess(parseLevel, z.number().int().min(0).max(5))
		.optional(),
	NODE_ENV: z.enum(['development', 'production', 'test']).optional(),
})

const parsed = envSchema.safeParse(process.env)
if (!parsed.success) {
	throw new Error(z.prettifyError(parsed.error))
}

const nodeEnv = parsed.data.NODE_ENV ?? 'development'

export const loggerEnv = {
	nodeEnv,
	isDev: nodeEnv === 'development',
	loggerLevel: parsed.data.LOGGER_LEVEL,
}

export type LoggerEnv = typeof loggerEnv
