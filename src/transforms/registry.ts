import type { TransformSpec } from '../types/source'
import type { Scalar } from '../types/records'
import { ConfigError, TransformError, errorMessage } from '../utils/errors'
import type { Logger } from '../utils/logger'
import { createSilentLogger } from '../utils/logger'
import { dateFormatTransform } from './date-format'
import { multiplyTransform } from './multiply'
import { phoneTransform } from './phone'
import type { CompiledTransform, TransformFactory } from './types'

/**
 * Maps transform type names to their factories.
 *
 * @example
 * ```typescript
 * const registry = createDefaultTransformRegistry()
 * registry.register('uppercase', () => (value) => String(value).toUpperCase())
 *
 * const upper = registry.compile({ type: 'uppercase' })
 * upper.apply('acme') // 'ACME'
 * ```
 */
export class TransformRegistry {
  private readonly factories = new Map<string, TransformFactory>()
  private readonly logger: Logger

  constructor(logger: Logger = createSilentLogger()) {
    this.logger = logger
  }

  /**
   * Registers a transform factory. An existing registration with the same
   * type is replaced.
   */
  register(type: string, factory: TransformFactory): void {
    if (this.factories.has(type)) {
      this.logger.warn(`Transform '${type}' is already registered. Overwriting.`)
    }
    this.factories.set(type, factory)
  }

  has(type: string): boolean {
    return this.factories.has(type)
  }

  list(): string[] {
    return Array.from(this.factories.keys())
  }

  /**
   * Compiles `{ type, ...params }` into a transform.
   *
   * @throws {ConfigError} Unknown type or invalid parameters
   */
  compile(spec: TransformSpec): CompiledTransform {
    const { type, ...params } = spec
    const factory = this.factories.get(type)
    if (!factory) {
      throw new ConfigError(`Unknown transform type '${type}'`, {
        type,
        available: this.list(),
      })
    }

    const fn = factory(params)

    return {
      type,
      params,
      apply(value: Scalar): Scalar {
        if (value === null) {
          return null
        }
        try {
          return fn(value)
        } catch (error) {
          if (error instanceof TransformError) {
            throw error
          }
          throw new TransformError(type, value, errorMessage(error))
        }
      },
    }
  }
}

/**
 * Creates a registry holding the built-in transforms.
 */
export function createDefaultTransformRegistry(logger?: Logger): TransformRegistry {
  const registry = new TransformRegistry(logger)
  registry.register('date_format', dateFormatTransform)
  registry.register('multiply', multiplyTransform)
  registry.register('phone', phoneTransform)
  return registry
}

/** Registry used when none is injected */
export const defaultTransformRegistry = createDefaultTransformRegistry()

/**
 * Registers a transform on the default registry.
 */
export function registerTransform(type: string, factory: TransformFactory): void {
  defaultTransformRegistry.register(type, factory)
}
