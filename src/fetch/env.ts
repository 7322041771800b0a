import { ConfigError } from '../utils/errors'

/** Variables available to `env[NAME]` placeholders */
export type Environment = Readonly<Record<string, string | undefined>>

const ENV_PLACEHOLDER = /env\[([A-Za-z_][A-Za-z0-9_]*)\]/g

/**
 * Replaces every `env[NAME]` placeholder with the variable's value.
 *
 * @throws {ConfigError} A referenced variable is not set
 *
 * @example
 * ```typescript
 * substituteEnv('Bearer env[API_TOKEN]', { API_TOKEN: 'test-secret' })
 * // 'Bearer test-secret'
 * ```
 */
export function substituteEnv(value: string, env: Environment): string {
  return value.replace(ENV_PLACEHOLDER, (_placeholder, name: string) => {
    const replacement = env[name]
    if (replacement === undefined) {
      throw new ConfigError(`Environment variable '${name}' is not set`, { variable: name })
    }
    return replacement
  })
}
