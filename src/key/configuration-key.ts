/**
 * Immutable fluent builder for configuration keys.
 *
 * @example
 * ```typescript
 * const key = new ConfigurationKey()
 *   .append('tables')
 *   .append('table')
 *   .appendIndex(1)
 *   .append('name')
 *
 * key.toString() // 'tables.table(1).name'
 * ```
 *
 * @module key/configuration-key
 */

import { MalformedKeyError } from '../core/errors'
import type { KeySegment } from '../tree/types'
import { parseKey, renderKey } from './key-parser'

export class ConfigurationKey {
  readonly segments: readonly KeySegment[]

  constructor(key?: string | readonly KeySegment[] | null) {
    this.segments =
      typeof key === 'string' || key == null ? parseKey(key) : [...key]
  }

  /**
   * Appends a segment. With `escape` (the default) the name is taken
   * literally; without it, `part` is parsed as a key fragment and may carry
   * several segments, indices or an attribute.
   */
  append(part: string, escape = true): ConfigurationKey {
    this.assertNotAttribute(part)
    const added: readonly KeySegment[] = escape
      ? [{ name: part, attribute: false }]
      : parseKey(part)
    return new ConfigurationKey([...this.segments, ...added])
  }

  /** Sets the index of the last segment. */
  appendIndex(index: number): ConfigurationKey {
    const last = this.segments[this.segments.length - 1]
    if (!last || last.attribute) {
      throw new MalformedKeyError(
        this.toString(),
        this.toString().length,
        'an index needs a preceding node segment',
      )
    }
    return new ConfigurationKey([
      ...this.segments.slice(0, -1),
      { name: last.name, index, attribute: false },
    ])
  }

  appendAttribute(name: string): ConfigurationKey {
    this.assertNotAttribute(`[@${name}]`)
    return new ConfigurationKey([
      ...this.segments,
      { name, attribute: true },
    ])
  }

  /** The key without its last segment. */
  parent(): ConfigurationKey {
    return new ConfigurationKey(this.segments.slice(0, -1))
  }

  isAttributeKey(): boolean {
    return this.segments[this.segments.length - 1]?.attribute === true
  }

  get length(): number {
    return this.segments.length
  }

  toString(): string {
    return renderKey(this.segments)
  }

  private assertNotAttribute(part: string): void {
    if (this.isAttributeKey()) {
      throw new MalformedKeyError(
        this.toString() + part,
        this.toString().length,
        'attribute must be the last segment',
      )
    }
  }
}
