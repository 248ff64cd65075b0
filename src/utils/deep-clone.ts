/**
 * Deep copy of node values
 *
 * Node values are usually primitives. Object values (records, lists) are
 * copied whenever a tree is copied, so a copy never shares them with its
 * source. @jsbits/deep-clone runs in "exact" mode, keeping prototypes and
 * property descriptors.
 */

import _deepClone from '@jsbits/deep-clone'

/**
 * Throws on a value that contains itself. Only the current ancestor chain
 * counts: an object reached twice through different parents is fine.
 */
const assertAcyclic = (value: unknown): void => {
  if (value === null || typeof value !== 'object') return

  const ancestors = new WeakSet<object>()

  const walk = (obj: object, path: string): void => {
    if (ancestors.has(obj)) {
      throw new Error(
        `[deepClone] Circular reference detected at "${path}". ` +
          'Configuration values must not contain themselves.',
      )
    }
    ancestors.add(obj)

    for (const [key, descriptor] of Object.entries(Object.getOwnPropertyDescriptors(obj))) {
      const child: unknown = descriptor.value
      if (!descriptor.get && child !== null && typeof child === 'object') {
        walk(child, path ? `${path}.${key}` : key)
      }
    }

    ancestors.delete(obj)
  }

  walk(value, '')
}

/** Independent copy of a value; the input must not be circular. */
export const deepClone = <T>(value: T): T => {
  assertAcyclic(value)
  return _deepClone(value, true)
}
