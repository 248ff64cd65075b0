/**
 * Tree construction from plain data
 *
 * Entry points for loaders: `buildTree` takes an explicit node description,
 * `buildTreeFromObject` mirrors a nested object the way a JSON or YAML
 * document reads.
 *
 * @module tree/build-tree
 */

import { z } from 'zod'

import { InvalidSourceError } from '../core/errors'
import { is } from '../utils/is'
import { createNode } from './node'
import type { ConfigNode, NodeSource } from './types'

const nodeSourceSchema: z.ZodType<NodeSource> = z.lazy(() =>
  z.object({
    name: z.string(),
    value: z.unknown().optional(),
    attributes: z.record(z.unknown()).optional(),
    children: z.array(nodeSourceSchema).optional(),
  }),
)

const fromSource = (source: NodeSource): ConfigNode =>
  createNode({
    name: source.name,
    value: source.value,
    attributes: new Map(Object.entries(source.attributes ?? {})),
    children: (source.children ?? []).map(fromSource),
  })

/**
 * Builds a node tree from a plain description.
 *
 * @throws InvalidSourceError if the description is not a valid node source
 *
 * @example
 * ```typescript
 * const root = buildTree({
 *   name: 'database',
 *   attributes: { vendor: 'sqlite' },
 *   children: [{ name: 'file', value: 'app.db' }],
 * })
 * ```
 */
export const buildTree = (source: unknown): ConfigNode => {
  const result = nodeSourceSchema.safeParse(source)
  if (!result.success) {
    throw new InvalidSourceError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
    )
  }
  return fromSource(result.data)
}

/** Prefix marking attribute keys in {@link buildTreeFromObject}. */
export const ATTRIBUTE_PREFIX = '@'

/**
 * Helper: children and attributes of a plain object
 */
const buildObjectParts = (
  obj: Record<string, unknown>,
): { children: ConfigNode[]; attributes: Map<string, unknown> } => {
  const children: ConfigNode[] = []
  const attributes = new Map<string, unknown>()

  for (const key in obj) {
    if (!Object.prototype.hasOwnProperty.call(obj, key)) continue
    const value = obj[key]

    if (key.startsWith(ATTRIBUTE_PREFIX)) {
      attributes.set(key.slice(ATTRIBUTE_PREFIX.length), value)
    } else if (is.array(value)) {
      // Arrays become repeated siblings of the same name
      for (const item of value) {
        children.push(buildNamedNode(key, item))
      }
    } else {
      children.push(buildNamedNode(key, value))
    }
  }

  return { children, attributes }
}

const buildNamedNode = (name: string, value: unknown): ConfigNode => {
  if (is.object(value)) {
    return createNode({ name, ...buildObjectParts(value) })
  }
  return createNode({ name, value })
}

/**
 * Builds a node tree mirroring a nested plain object.
 *
 * Object keys become child nodes, arrays become repeated siblings, keys
 * starting with `@` become attributes and everything else becomes a value.
 *
 * @example
 * ```typescript
 * const root = buildTreeFromObject({
 *   tables: {
 *     table: [
 *       { '@type': 'system', name: 'users' },
 *       { name: 'documents' },
 *     ],
 *   },
 * })
 * // tables.table(0)[@type] === 'system'
 * ```
 */
export const buildTreeFromObject = (
  data: Record<string, unknown>,
  rootName = '',
): ConfigNode => createNode({ name: rootName, ...buildObjectParts(data) })
