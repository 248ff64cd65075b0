/**
 * Runtime Guards
 *
 * Call-site checks shared by the configuration classes. Each guard throws
 * the matching ConfigurationError subclass; none of them is gated by
 * environment.
 */

import {
  InvalidOptionsError,
  MalformedKeyError,
  ReadOnlyConfigurationError,
} from '../core/errors'
import type { KeySegment } from '../tree/types'

export const guard = {
  /**
   * Rejects a write on a read-only configuration.
   *
   * @throws ReadOnlyConfigurationError always
   *
   * @example
   * ```typescript
   * setProperty(): never {
   *   return guard.readOnly('setProperty')
   * }
   * ```
   */
  readOnly: (operation: string): never => {
    throw new ReadOnlyConfigurationError(operation)
  },

  /**
   * Rejects keys that end in an attribute where a node is required.
   *
   * @throws MalformedKeyError pointing at the attribute segment
   *
   * @example
   * ```typescript
   * guard.nodeKey('a.b', parseKey('a.b'), 'addNodes') // OK
   * guard.nodeKey('a[@b]', parseKey('a[@b]'), 'addNodes') // throws
   * ```
   */
  nodeKey: (
    key: string,
    segments: readonly KeySegment[],
    operation: string,
  ): void => {
    const last = segments[segments.length - 1]
    if (last?.attribute) {
      throw new MalformedKeyError(
        key,
        Math.max(key.lastIndexOf('[@'), 0),
        `${operation} needs a node key, not an attribute`,
      )
    }
  },

  /**
   * Rejects listeners that are not functions (untyped callers).
   *
   * @throws InvalidOptionsError
   */
  listener: (listener: unknown): void => {
    if (typeof listener !== 'function') {
      throw new InvalidOptionsError(['listener: listener must be a function'])
    }
  },
} as const
