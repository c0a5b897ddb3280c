// Console logger for the command-line tools
import winston from 'winston'

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface LoggerOptions {
  level: LogLevel
  silent?: boolean
}

/**
 * Console logger for the command-line tools.
 * Every level goes to stderr so stdout only carries records.
 */
export function createLogger(options: LoggerOptions): winston.Logger {
  return winston.createLogger({
    level: options.level,
    silent: options.silent ?? false,
    format: winston.format.combine(
      winston.format.timestamp({
        format: 'YYYY-MM-DD HH:mm:ss',
      }),
      winston.format.errors({ stack: true }),
      winston.format.printf(({ level, message, timestamp, stack }) => {
        const prefix = `[${String(timestamp)}] [read-to-eof] [${level.toUpperCase()}]`
        if (stack) {
          return `${prefix} ${String(message)}\n${String(stack)}`
        }
        return `${prefix} ${String(message)}`
      })
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
    exitOnError: false,
  })
}
