import { pino, destination, type Logger } from 'pino'
import type { ResolvedConfig } from '../config/schema.js'

export type { Logger }

const STDERR = 2

/** Logs go to stderr; stdout is reserved for command output. */
export function createLogger(config: Pick<ResolvedConfig, 'logLevel'>): Logger {
    if (config.logLevel === 'debug' || config.logLevel === 'trace') {
        return pino({
            name: 'statelog',
            level: config.logLevel,
            transport: { target: 'pino-pretty', options: { colorize: true, destination: STDERR } },
        })
    }
    return pino({ name: 'statelog', level: config.logLevel }, destination(STDERR))
}
