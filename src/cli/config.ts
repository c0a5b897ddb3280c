// Configuration for the read-to-eof program
import { z } from 'zod'
import { RetainingBufferOptions } from '../core/strategy'
import { LOG_LEVELS } from './logger'

/**
 * Zod schema for the program settings.
 * Numeric values arrive as strings from the environment and are coerced.
 */
export const ReadToEofConfigSchema = z.object({
  host: z.string().min(1).default('127.0.0.1'),
  port: z.coerce.number().int().min(1).max(65535).default(34254),
  strategy: z.enum(['rotate', 'overflow']).default('rotate'),
  capacity: z.coerce.number().int().positive().default(4096),
  overflowCapacity: z.coerce.number().int().nonnegative().default(1024),
  delimiter: z
    .string()
    .length(1)
    .refine((s) => s.charCodeAt(0) < 0x80, { message: 'delimiter must be a single ASCII character' })
    .default(','),
  logLevel: z.enum(LOG_LEVELS).default('info'),
})

export type ReadToEofConfig = z.infer<typeof ReadToEofConfigSchema>

/**
 * Environment variables read by loadConfig
 */
export const ENV_KEYS = {
  host: 'RB_HOST',
  port: 'RB_PORT',
  strategy: 'RB_STRATEGY',
  capacity: 'RB_CAPACITY',
  overflowCapacity: 'RB_OVERFLOW_CAPACITY',
  delimiter: 'RB_DELIMITER',
  logLevel: 'RB_LOG_LEVEL',
} as const

type ConfigInput = z.input<typeof ReadToEofConfigSchema>

/**
 * Resolve settings from defaults, the environment and explicit overrides (highest precedence)
 * @throws {Error} If any value fails validation
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigInput = {}): ReadToEofConfig {
  const fromEnv: Record<string, string> = {}
  for (const [key, name] of Object.entries(ENV_KEYS)) {
    const value = env[name]
    if (value !== undefined && value !== '') {
      fromEnv[key] = value
    }
  }

  const result = ReadToEofConfigSchema.safeParse({ ...fromEnv, ...overrides })
  if (!result.success) {
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')
    throw new Error(`Invalid configuration: ${details}`)
  }
  return result.data
}

/**
 * Buffer options for the configured strategy.
 * `capacity` is the whole buffer for 'rotate' and the primary region for 'overflow'.
 */
export function bufferOptions(config: ReadToEofConfig): RetainingBufferOptions {
  if (config.strategy === 'rotate') {
    return { strategy: 'rotate', capacity: config.capacity }
  }
  return {
    strategy: 'overflow',
    primaryCapacity: config.capacity,
    overflowCapacity: config.overflowCapacity,
  }
}
