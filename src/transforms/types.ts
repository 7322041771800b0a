import type { Scalar } from '../types/records'

/**
 * Converts one non-null canonical value. Throws `TransformError` when the
 * value cannot be converted.
 */
export type TransformFunction = (value: string | number) => Scalar

/**
 * Builds a transform from its parameters (the transform object minus `type`).
 * Throws `ConfigError` when the parameters are invalid.
 */
export type TransformFactory = (params: Record<string, unknown>) => TransformFunction

/**
 * A transform compiled from `{ type, ...params }` at load time.
 */
export interface CompiledTransform {
  readonly type: string
  readonly params: Readonly<Record<string, unknown>>
  /** `null` passes through untouched */
  apply(value: Scalar): Scalar
}
