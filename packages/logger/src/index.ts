export {
	logger,
	loggers,
	resolveLogLevel,
	LOGGER_AREAS,
	LOG_LEVEL_ENV,
} from './loggers'

export type { LoggerArea } from './loggers'
