import { existsSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import { isAbsolute, resolve } from 'node:path'
import { z } from 'zod'
import { DEFAULT_NOTIFICATION_DESTINATION } from '../notifications'
import { DEFAULT_TRANSPORT_CONFIG, type TransportConfig } from '../transport'

/**
 * Error thrown when configuration loading fails
 */
export class ConfigLoadError extends Error {
  constructor(
    message: string,
    public readonly filePath: string,
    public override readonly cause?: Error
  ) {
    super(message)
    this.name = 'ConfigLoadError'
  }
}

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly filePath: string
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Schema of the service configuration file
 *
 * @example
 * {
 *   "charts": { "directory": "${HOME}/charts" },
 *   "transport": { "endpoint": "tcp://127.0.0.1:6565", "identity": "chart-renderer" },
 *   "notifications": { "destination": "telegram", "enabled": true }
 * }
 */
const configSchema = z.object({
  charts: z.object({
    directory: z.string().min(1, 'charts.directory must not be empty')
  }),
  transport: z
    .object({
      endpoint: z.string().min(1).default(DEFAULT_TRANSPORT_CONFIG.endpoint),
      identity: z.string().min(1).default(DEFAULT_TRANSPORT_CONFIG.identity)
    })
    .default({}),
  notifications: z
    .object({
      destination: z.string().min(1).default(DEFAULT_NOTIFICATION_DESTINATION),
      enabled: z.boolean().default(true)
    })
    .default({})
})

export interface ChartServiceConfig {
  readonly charts: { readonly directory: string }
  readonly transport: TransportConfig
  readonly notifications: { readonly destination: string; readonly enabled: boolean }
}

export const DEFAULT_CONFIG_FILE = 'chart-renderer.json'

/**
 * Expands environment variables in a string
 * Supports ${VAR_NAME} and $VAR_NAME syntax
 */
export function expandEnvironmentVariables(str: string): string {
  return str
    .replace(/\$\{([^}]+)\}/g, (_, varName: string) => {
      return process.env[varName] || ''
    })
    .replace(/\$([A-Z_][A-Z0-9_]*)/gi, (_, varName: string) => {
      return process.env[varName] || ''
    })
}

/**
 * Recursively expands environment variables in an object
 */
function expandObjectEnvironmentVariables(obj: unknown): unknown {
  if (typeof obj === 'string') {
    return expandEnvironmentVariables(obj)
  }

  if (Array.isArray(obj)) {
    return obj.map(expandObjectEnvironmentVariables)
  }

  if (obj && typeof obj === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, value] of Object.entries(obj)) {
      expanded[key] = expandObjectEnvironmentVariables(value)
    }
    return expanded
  }

  return obj
}

/**
 * Validates a configuration object that was already parsed and expanded
 * @throws ConfigValidationError listing every invalid field
 */
export function validateServiceConfig(config: unknown, filePath: string): ChartServiceConfig {
  const result = configSchema.safeParse(config)
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ')
    throw new ConfigValidationError(`Invalid configuration: ${details}`, filePath)
  }
  return result.data
}

/**
 * Loads and validates the service configuration file
 * @param configPath Path to the configuration file (absolute or relative)
 * @throws ConfigLoadError if file cannot be read or parsed
 * @throws ConfigValidationError if configuration is invalid
 */
export async function loadServiceConfig(configPath: string): Promise<ChartServiceConfig> {
  // Resolve path (convert relative to absolute)
  const resolvedPath = isAbsolute(configPath)
    ? configPath
    : resolve(process.cwd(), configPath)

  if (!existsSync(resolvedPath)) {
    throw new ConfigLoadError(`Configuration file not found: ${resolvedPath}`, resolvedPath)
  }

  let rawContent: string
  try {
    rawContent = await readFile(resolvedPath, 'utf-8')
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to read configuration file: ${error instanceof Error ? error.message : 'Unknown error'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  let parsedConfig: unknown
  try {
    parsedConfig = JSON.parse(rawContent)
  } catch (error) {
    throw new ConfigLoadError(
      `Failed to parse JSON configuration: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
      resolvedPath,
      error instanceof Error ? error : undefined
    )
  }

  return validateServiceConfig(expandObjectEnvironmentVariables(parsedConfig), resolvedPath)
}

/**
 * Command-line values that take precedence over the file
 */
export interface ConfigOverrides {
  directory?: string
  endpoint?: string
  identity?: string
  notify?: boolean
}

export function applyConfigOverrides(config: ChartServiceConfig, overrides: ConfigOverrides): ChartServiceConfig {
  return {
    charts: { directory: overrides.directory ?? config.charts.directory },
    transport: {
      endpoint: overrides.endpoint ?? config.transport.endpoint,
      identity: overrides.identity ?? config.transport.identity
    },
    notifications: {
      destination: config.notifications.destination,
      enabled: overrides.notify === false ? false : config.notifications.enabled
    }
  }
}

/**
 * Configuration used when no file exists and the output directory is given on the command line
 */
export function createDefaultServiceConfig(directory: string): ChartServiceConfig {
  return {
    charts: { directory },
    transport: { ...DEFAULT_TRANSPORT_CONFIG },
    notifications: { destination: DEFAULT_NOTIFICATION_DESTINATION, enabled: true }
  }
}
