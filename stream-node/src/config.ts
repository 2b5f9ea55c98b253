/**
 * Environment configuration.
 *
 * | Variable                | Meaning                                   | Default   |
 * | ----------------------- | ----------------------------------------- | --------- |
 * | `LZ4_STREAM_LOG_LEVEL`  | pino level                                | `info`    |
 * | `LZ4_STREAM_BLOCK_SIZE` | default block size                        | `default` |
 * | `LZ4_STREAM_LEVEL`      | default compression level (name or 0-12)  | `fast`    |
 * | `LZ4_STREAM_CHECKSUM`   | default content checksum (`true`/`false`) | `false`   |
 *
 * @module
 */
import { z } from 'zod'
import { ConfigError } from './errors.js'
import {
  BLOCK_SIZES,
  COMPRESSION_LEVEL_NAMES,
  type CompressionLevel,
  type FramePreferences
} from './frame-preferences.js'

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

const environmentSchema = z.object({
  LZ4_STREAM_LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
  LZ4_STREAM_BLOCK_SIZE: z.enum(BLOCK_SIZES).default('default'),
  LZ4_STREAM_LEVEL: z
    .union([z.enum(COMPRESSION_LEVEL_NAMES), z.number().int().min(0).max(12)])
    .default('fast'),
  LZ4_STREAM_CHECKSUM: z.boolean().default(false)
})

type Environment = z.infer<typeof environmentSchema>

export type LogLevel = (typeof LOG_LEVELS)[number]

export interface Config {
  readonly logLevel: LogLevel
  /** Defaults applied to writers built without explicit preferences. */
  readonly preferences: Readonly<
    Pick<FramePreferences, 'blockSize' | 'compressionLevel' | 'checksum'>
  >
}

/**
 * Turn a raw variable into what its schema field expects: numbers for
 * numeric levels, booleans for flags, strings otherwise.
 */
function coerceValue(key: keyof Environment, value: string | undefined): unknown {
  if (value === undefined || value === '') return undefined

  switch (key) {
    case 'LZ4_STREAM_CHECKSUM': {
      const flag = value.trim().toLowerCase()
      if (flag === 'true' || flag === '1') return true
      if (flag === 'false' || flag === '0') return false
      return value
    }
    case 'LZ4_STREAM_LEVEL':
      return /^\d+$/.test(value.trim()) ? Number(value.trim()) : value.trim()
    default:
      return value.trim()
  }
}

/**
 * Parse configuration from an environment map.
 *
 * @throws ConfigError naming the first invalid variable
 */
export function parseConfig(env: Record<string, string | undefined>): Config {
  const raw: Record<string, unknown> = {}
  for (const key of environmentSchema.keyof().options) {
    raw[key] = coerceValue(key, env[key])
  }

  const parsed = environmentSchema.safeParse(raw)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const variable = issue === undefined ? 'environment' : issue.path.join('.')
    throw new ConfigError(variable, issue?.message ?? 'invalid', parsed.error)
  }

  const level: CompressionLevel = parsed.data.LZ4_STREAM_LEVEL
  return {
    logLevel: parsed.data.LZ4_STREAM_LOG_LEVEL,
    preferences: {
      blockSize: parsed.data.LZ4_STREAM_BLOCK_SIZE,
      compressionLevel: level,
      checksum: parsed.data.LZ4_STREAM_CHECKSUM
    }
  }
}

let cached: Config | null = null

/**
 * Configuration from `process.env`, parsed on first use.
 */
export function getConfig(): Config {
  if (cached === null) {
    cached = parseConfig(process.env)
  }
  return cached
}
