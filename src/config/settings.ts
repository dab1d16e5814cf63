import { z } from 'zod'
import { parseValue } from './env.js'

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error'])

export type LogLevel = z.infer<typeof LogLevelSchema>

// Engine settings, read from STRATA_* environment variables
export const EngineSettingsSchema = z.object({
  logLevel: LogLevelSchema.default('warn'),
  fetchTimeout: z.number().int().positive().default(10000),
})

export type EngineSettings = z.infer<typeof EngineSettingsSchema>

const SETTINGS_ENV_VARS = {
  logLevel: 'STRATA_LOG_LEVEL',
  fetchTimeout: 'STRATA_FETCH_TIMEOUT',
} as const

/**
 * An engine setting whose variable held a value the schema rejects.
 */
export interface IgnoredSetting {
  variable: string
  value: string
  message: string
}

/**
 * Read the engine's own settings from the environment.
 *
 * - STRATA_LOG_LEVEL -> logLevel
 * - STRATA_FETCH_TIMEOUT -> fetchTimeout (milliseconds)
 *
 * A variable with an invalid value is ignored, and its setting keeps the
 * default.
 */
export function readSettings(
  env: Record<string, string | undefined> = process.env
): { settings: EngineSettings; ignored: IgnoredSetting[] } {
  const raw: Record<string, unknown> = {}
  const ignored: IgnoredSetting[] = []

  for (const [field, envKey] of Object.entries(SETTINGS_ENV_VARS)) {
    const value = env[envKey]
    if (value === undefined || value === '') continue

    const parsed = parseValue(value)
    const check = EngineSettingsSchema.safeParse({ [field]: parsed })
    if (check.success) {
      raw[field] = parsed
    } else {
      ignored.push({ variable: envKey, value, message: check.error.issues[0].message })
    }
  }

  return { settings: EngineSettingsSchema.parse(raw), ignored }
}

/**
 * Same as readSettings, without the list of ignored variables.
 */
export function loadSettings(
  env: Record<string, string | undefined> = process.env
): EngineSettings {
  return readSettings(env).settings
}
