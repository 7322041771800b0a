/**
 * Dot-path lookup into parsed JSON values.
 * @module extraction/dot-path
 */

export type PathLookup = { found: true; value: unknown } | { found: false }

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * Resolves `a.b.c` against a value. Segments applied to arrays must be
 * non-negative integer indices.
 *
 * @example
 * ```typescript
 * lookupPath({ data: { items: [{ id: 7 }] } }, 'data.items.0.id')
 * // { found: true, value: 7 }
 * lookupPath({ data: {} }, 'data.items')
 * // { found: false }
 * ```
 */
export function lookupPath(root: unknown, path: string): PathLookup {
  let current: unknown = root

  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      if (!/^\d+$/.test(segment)) {
        return { found: false }
      }
      const index = Number(segment)
      if (index >= current.length) {
        return { found: false }
      }
      current = current[index]
    } else if (isRecord(current)) {
      if (!Object.prototype.hasOwnProperty.call(current, segment)) {
        return { found: false }
      }
      current = current[segment]
    } else {
      return { found: false }
    }
  }

  return current === undefined ? { found: false } : { found: true, value: current }
}

/**
 * Value at `path`, or `undefined` when the path does not resolve
 */
export function getPath(root: unknown, path: string): unknown {
  const lookup = lookupPath(root, path)
  return lookup.found ? lookup.value : undefined
}
