import { createConsola, LogLevels, type ConsolaInstance, type LogType } from 'consola'

/**
 * Logger areas. Each area gets its own root tag; call sites narrow further
 * with `withTag`, e.g. `loggers.lens.withTag('scheduler')`.
 */
export const LOGGER_AREAS = ['lens', 'settings'] as const

export type LoggerArea = (typeof LOGGER_AREAS)[number]

export const LOG_LEVEL_ENV = 'LENSLINE_LOG_LEVEL'

const DEFAULT_LEVEL: LogType = 'warn'

const isLogType = (value: string): value is LogType =>
	Object.prototype.hasOwnProperty.call(LogLevels, value)

/**
 * Resolves a consola level from a level name. Unknown or missing names fall
 * back to `warn` so tests stay quiet unless asked otherwise.
 */
export const resolveLogLevel = (name: string | undefined): number => {
	const normalized = name?.trim().toLowerCase()
	if (normalized && isLogType(normalized)) {
		return LogLevels[normalized]
	}
	return LogLevels[DEFAULT_LEVEL]
}

export const logger: ConsolaInstance = createConsola({
	level: resolveLogLevel(process.env[LOG_LEVEL_ENV]),
})

export const loggers: Record<LoggerArea, ConsolaInstance> = {
	lens: logger.withTag('lens'),
	settings: logger.withTag('settings'),
}
