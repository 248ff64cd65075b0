/**
 * Type predicates for node values
 *
 * Values read from a configuration are `unknown`; these narrow them where
 * the tree code branches on their shape.
 */

export type Primitive =
  | string
  | number
  | boolean
  | symbol
  | bigint
  | null
  | undefined

/** `null` and `undefined` both mean "no value" in a node. */
const isNil = (value: unknown): value is null | undefined => value == null

const isNotNil = <T>(value: T | null | undefined): value is T => value != null

/**
 * Plain object literal (or `Object.create(null)`). Arrays, maps, dates and
 * class instances are not, so loaders treat them as values.
 */
const isObject = (value: unknown): value is Record<string, unknown> => {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/** Multi-valued nodes and attributes hold arrays. */
const isArray = (value: unknown): value is readonly unknown[] =>
  Array.isArray(value)

/** Anything `typeof` does not call an object or a function. */
const isPrimitive = (value: unknown): value is Primitive =>
  value == null || (typeof value !== 'object' && typeof value !== 'function')

/**
 * Unified namespace for type checking
 *
 * @example
 * ```typescript
 * if (is.array(value)) { ... }        // one entry per element
 * if (is.not.nil(node.value)) { ... } // node carries a value
 * ```
 */
export const is = {
  nil: isNil,
  object: isObject,
  array: isArray,
  string: (value: unknown): value is string => typeof value === 'string',
  number: (value: unknown): value is number => typeof value === 'number',
  boolean: (value: unknown): value is boolean => typeof value === 'boolean',
  primitive: isPrimitive,
  not: {
    nil: isNotNil,
  },
}
