/**
 * Key Expression Parser
 *
 * Parses configuration keys into segments and renders segments back into
 * canonical keys.
 *
 * Grammar:
 * - Segments are separated by `.`: `tables.table.name`
 * - A segment may end in an index among same-named siblings: `table(1)`.
 *   Negative indices (`table(-1)`) mean "append a new sibling" and only
 *   make sense for add operations.
 * - `[@name]` addresses an attribute, either right after a segment
 *   (`table[@type]`) or as a segment of its own (`table.[@type]`, `[@type]`).
 *   It is always the last segment.
 * - `\` escapes the next character; `.`, `(`, `)`, `[`, `]` and `\` must be
 *   escaped inside names.
 *
 * @module key/key-parser
 */

import { MalformedKeyError } from '../core/errors'
import type { KeySegment } from '../tree/types'

/** Index sentinel used by add operations to request a new sibling. */
export const APPEND_INDEX = -1

const DELIMITER = '.'
const ESCAPE = '\\'
const INDEX_START = '('
const INDEX_END = ')'
const ATTRIBUTE_START = '[@'
const ATTRIBUTE_END = ']'

const STRUCTURAL_CHARS = /[.()[\]\\]/g

// Cache parsed keys to avoid repeated string parsing overhead
const keyCache = new Map<string, readonly KeySegment[]>()
const MAX_CACHE_SIZE = 1000

const EMPTY_KEY: readonly KeySegment[] = Object.freeze([])

/**
 * Helper: read an (escaped) name up to the next structural character
 *
 * @returns Tuple of [name, nextIndex]
 */
const readName = (key: string, start: number): [string, number] => {
  let name = ''
  let i = start

  while (i < key.length) {
    const char = key.charAt(i)

    if (char === ESCAPE) {
      if (i + 1 >= key.length) {
        throw new MalformedKeyError(key, i, 'dangling escape character')
      }
      name += key.charAt(i + 1)
      i += 2
    } else if (char === DELIMITER || char === INDEX_START || char === '[') {
      break
    } else if (char === INDEX_END || char === ATTRIBUTE_END) {
      throw new MalformedKeyError(key, i, `unescaped '${char}' in name`)
    } else {
      name += char
      i++
    }
  }

  return [name, i]
}

/**
 * Helper: read `(n)` starting at the opening parenthesis
 *
 * @returns Tuple of [index, nextIndex]
 */
const readIndex = (key: string, start: number): [number, number] => {
  const end = key.indexOf(INDEX_END, start + 1)
  if (end < 0) {
    throw new MalformedKeyError(key, start, 'unterminated index')
  }

  const content = key.slice(start + 1, end)
  if (!/^-?\d+$/.test(content)) {
    throw new MalformedKeyError(key, start, `invalid index '${content}'`)
  }

  const index = Number(content)
  if (!Number.isSafeInteger(index)) {
    throw new MalformedKeyError(key, start, `index out of range '${content}'`)
  }

  // Any signed index, -0 included, appends
  return [content.startsWith('-') ? APPEND_INDEX : index, end + 1]
}

/**
 * Helper: read `[@name]` starting at the opening bracket
 *
 * @returns Tuple of [attributeName, nextIndex]
 */
const readAttribute = (key: string, start: number): [string, number] => {
  if (!key.startsWith(ATTRIBUTE_START, start)) {
    throw new MalformedKeyError(key, start, `expected '${ATTRIBUTE_START}'`)
  }

  let name = ''
  let i = start + ATTRIBUTE_START.length

  while (i < key.length) {
    const char = key.charAt(i)
    if (char === ESCAPE) {
      if (i + 1 >= key.length) {
        throw new MalformedKeyError(key, i, 'dangling escape character')
      }
      name += key.charAt(i + 1)
      i += 2
    } else if (char === ATTRIBUTE_END) {
      if (!name) {
        throw new MalformedKeyError(key, start, 'empty attribute name')
      }
      return [name, i + 1]
    } else {
      name += char
      i++
    }
  }

  throw new MalformedKeyError(key, start, 'unterminated attribute')
}

/**
 * Helper: Parse key string into segments (uncached)
 */
const parseKeyUncached = (key: string): readonly KeySegment[] => {
  const segments: KeySegment[] = []
  let i = 0

  while (i < key.length) {
    if (key.charAt(i) === '[') {
      const [name, next] = readAttribute(key, i)
      segments.push(Object.freeze({ name, attribute: true }))
      if (next < key.length) {
        throw new MalformedKeyError(
          key,
          next,
          'attribute must be the last segment',
        )
      }
      break
    }

    const [name, afterName] = readName(key, i)
    if (!name) {
      throw new MalformedKeyError(key, i, 'empty segment')
    }
    i = afterName

    if (key.charAt(i) === INDEX_START) {
      const [index, afterIndex] = readIndex(key, i)
      segments.push(Object.freeze({ name, index, attribute: false }))
      i = afterIndex
    } else {
      segments.push(Object.freeze({ name, attribute: false }))
    }

    if (i >= key.length) {
      break
    }

    const char = key.charAt(i)
    if (char === DELIMITER) {
      i++
      if (i >= key.length) {
        throw new MalformedKeyError(key, i, 'key ends with a delimiter')
      }
    } else if (char !== '[') {
      throw new MalformedKeyError(key, i, `unexpected '${char}'`)
    }
  }

  return Object.freeze(segments)
}

/**
 * Parses a key string into an array of segments.
 *
 * `''`, `null` and `undefined` denote the root and parse to an empty array.
 * Parsed keys are cached; the returned arrays are frozen.
 *
 * @throws MalformedKeyError if the key does not follow the grammar
 *
 * @example
 * ```typescript
 * parseKey('tables.table(1).name')
 * // [{ name: 'tables', attribute: false },
 * //  { name: 'table', index: 1, attribute: false },
 * //  { name: 'name', attribute: false }]
 *
 * parseKey('table[@type]')
 * // [{ name: 'table', attribute: false }, { name: 'type', attribute: true }]
 * ```
 */
export const parseKey = (key: string | null | undefined): readonly KeySegment[] => {
  if (!key) {
    return EMPTY_KEY
  }

  const cached = keyCache.get(key)
  if (cached !== undefined) {
    return cached
  }

  const segments = parseKeyUncached(key)

  if (keyCache.size >= MAX_CACHE_SIZE) {
    keyCache.clear()
  }
  keyCache.set(key, segments)

  return segments
}

/**
 * Escapes the structural characters of a raw name so it can be used as a
 * single key segment.
 *
 * @example
 * ```typescript
 * escapeKeyPart('db.host')     // 'db\\.host'
 * escapeKeyPart('f(x)')        // 'f\\(x\\)'
 * ```
 */
export const escapeKeyPart = (raw: string): string =>
  raw.replace(STRUCTURAL_CHARS, (char) => ESCAPE + char)

/** Renders a single segment, without delimiter. */
export const renderSegment = (segment: KeySegment): string => {
  if (segment.attribute) {
    return `${ATTRIBUTE_START}${escapeKeyPart(segment.name)}${ATTRIBUTE_END}`
  }
  const name = escapeKeyPart(segment.name)
  return segment.index === undefined
    ? name
    : `${name}${INDEX_START}${String(segment.index)}${INDEX_END}`
}

/**
 * Renders segments back into a canonical key string.
 *
 * Attributes are appended without delimiter; names are escaped. For every
 * key `k` that parses, `parseKey(renderKey(parseKey(k)))` equals
 * `parseKey(k)`.
 *
 * @example
 * ```typescript
 * renderKey(parseKey('tables.table(0).[@type]'))
 * // 'tables.table(0)[@type]'
 * ```
 */
export const renderKey = (segments: readonly KeySegment[]): string => {
  let result = ''

  for (const segment of segments) {
    if (!segment.attribute && result) {
      result += DELIMITER
    }
    result += renderSegment(segment)
  }

  return result
}

/**
 * Joins a prefix key and a relative key.
 *
 * @example
 * ```typescript
 * joinKeys('tables.table(0)', 'name')   // 'tables.table(0).name'
 * joinKeys('tables.table(0)', '[@type]') // 'tables.table(0)[@type]'
 * joinKeys('', 'name')                  // 'name'
 * ```
 */
export const joinKeys = (
  prefix: string | null | undefined,
  key: string | null | undefined,
): string => {
  if (!prefix) return key ?? ''
  if (!key) return prefix
  return key.startsWith('[') ? prefix + key : prefix + DELIMITER + key
}

/** True when the key addresses an attribute. */
export const isAttributeKey = (key: string | null | undefined): boolean => {
  const segments = parseKey(key)
  return segments.length > 0 && segments[segments.length - 1]?.attribute === true
}

/**
 * Clears the key parser cache.
 *
 * The cache will be rebuilt automatically as keys are parsed.
 */
export const clearKeyCache = (): void => {
  keyCache.clear()
}
