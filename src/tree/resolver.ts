/**
 * Node Resolver
 *
 * Maps parsed keys to node locations within one snapshot, and back.
 *
 * Resolution walks the segments left to right. At each level it keeps the
 * children whose name matches, in tree order; an explicit index keeps only
 * the n-th of them and an absent index branches on all of them, so a key
 * without indices expands to every matching descendant.
 *
 * @module tree/resolver
 */

import { AmbiguousKeyError, KeyNotFoundError, MalformedKeyError } from '../core/errors'
import { renderKey } from '../key/key-parser'
import { is } from '../utils/is'
import type {
  ConfigNode,
  KeySegment,
  LocationStep,
  NodeAddData,
  NodeId,
  NodeLocation,
} from './types'

// ---------------------------------------------------------------------------
// Locations
// ---------------------------------------------------------------------------

export const rootLocation = (root: ConfigNode): NodeLocation => ({
  root,
  steps: [],
  node: root,
})

export const childLocation = (
  location: NodeLocation,
  index: number,
): NodeLocation => {
  const child = location.node.children[index]
  if (!child) {
    throw new RangeError(
      `Node '${location.node.name}' has no child at index ${String(index)}`,
    )
  }
  return {
    root: location.root,
    steps: [...location.steps, { parent: location.node, index }],
    node: child,
  }
}

const attributeLocation = (
  location: NodeLocation,
  attribute: string,
): NodeLocation => ({ ...location, attribute })

/** Positions of the children named `name`, in tree order. */
export const indicesOfChildren = (node: ConfigNode, name: string): number[] => {
  const indices: number[] = []
  node.children.forEach((child, i) => {
    if (child.name === name) {
      indices.push(i)
    }
  })
  return indices
}

const matchSegment = (
  location: NodeLocation,
  segment: KeySegment,
): NodeLocation[] => {
  if (segment.attribute) {
    return location.node.attributes.has(segment.name)
      ? [attributeLocation(location, segment.name)]
      : []
  }

  const indices = indicesOfChildren(location.node, segment.name)
  if (segment.index === undefined) {
    return indices.map((i) => childLocation(location, i))
  }

  // Out of range and the append sentinel both select nothing
  const selected = indices[segment.index]
  return selected === undefined ? [] : [childLocation(location, selected)]
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

/**
 * Resolves a parsed key against a root node.
 *
 * @returns Matching locations in deterministic tree order; an empty key
 *   resolves to the root itself.
 *
 * @example
 * ```typescript
 * resolveKey(root, parseKey('tables.table.name'))
 * // one location per table that has a name child
 * ```
 */
export const resolveKey = (
  root: ConfigNode,
  segments: readonly KeySegment[],
): NodeLocation[] => {
  let current: NodeLocation[] = [rootLocation(root)]

  for (const segment of segments) {
    const next: NodeLocation[] = []
    for (const location of current) {
      // Attribute locations have no descendants
      if (location.attribute === undefined) {
        next.push(...matchSegment(location, segment))
      }
    }
    current = next
    if (current.length === 0) {
      break
    }
  }

  return current
}

/** Like {@link resolveKey}, dropping attribute locations. */
export const resolveNodes = (
  root: ConfigNode,
  segments: readonly KeySegment[],
): NodeLocation[] =>
  resolveKey(root, segments).filter((location) => location.attribute === undefined)

/**
 * Resolves a key that must select exactly one node.
 *
 * @throws KeyNotFoundError if nothing matches
 * @throws AmbiguousKeyError if several nodes match
 */
export const resolveSingle = (
  root: ConfigNode,
  segments: readonly KeySegment[],
): NodeLocation => {
  const locations = resolveNodes(root, segments)
  const [first] = locations

  if (!first) {
    throw new KeyNotFoundError(renderKey(segments))
  }
  if (locations.length > 1) {
    throw new AmbiguousKeyError(renderKey(segments), locations.length)
  }

  return first
}

// ---------------------------------------------------------------------------
// Values
// ---------------------------------------------------------------------------

/** Raw value held at a location (attribute or node value). */
export const valueAt = (location: NodeLocation): unknown =>
  location.attribute === undefined
    ? location.node.value
    : location.node.attributes.get(location.attribute)

/**
 * Values held at the locations, in order. Missing values are skipped and
 * list values (multi-valued attributes, array values) contribute each of
 * their elements.
 */
export const collectValues = (locations: readonly NodeLocation[]): unknown[] => {
  const values: unknown[] = []

  for (const location of locations) {
    const value = valueAt(location)
    if (is.array(value)) {
      for (const element of value) {
        if (is.not.nil(element)) {
          values.push(element)
        }
      }
    } else if (is.not.nil(value)) {
      values.push(value)
    }
  }

  return values
}

/**
 * The value carried by exactly one of the locations, or `undefined` when
 * none or several carry one.
 */
export const uniqueValue = (locations: readonly NodeLocation[]): unknown => {
  let found: unknown = undefined
  let count = 0

  for (const location of locations) {
    const value = valueAt(location)
    if (is.not.nil(value)) {
      found = value
      count++
    }
  }

  return count === 1 ? found : undefined
}

// ---------------------------------------------------------------------------
// Add targets
// ---------------------------------------------------------------------------

/**
 * Determines where an add operation creates its node.
 *
 * Walks the key while the segments address existing nodes: an in-range
 * index picks that sibling, no index picks the last same-named sibling.
 * The first segment that does not exist (or an append index) stops the
 * walk; it and everything after it will be created. The final segment
 * always names the new node, so adding to an existing key creates a new
 * sibling.
 *
 * @throws MalformedKeyError for an empty key or an attribute in the middle
 */
export const prepareAdd = (
  root: ConfigNode,
  segments: readonly KeySegment[],
): NodeAddData => {
  const last = segments[segments.length - 1]
  if (!last) {
    throw new MalformedKeyError('', 0, 'an add operation needs a key')
  }

  let parent = rootLocation(root)
  let position = 0

  while (position < segments.length - 1) {
    const segment = segments[position]
    if (!segment || segment.attribute) {
      break
    }
    const indices = indicesOfChildren(parent.node, segment.name)
    const selected = indices[segment.index ?? indices.length - 1]
    if (selected === undefined) {
      break
    }
    parent = childLocation(parent, selected)
    position++
  }

  const pathNodes: string[] = []
  for (const segment of segments.slice(position, -1)) {
    if (segment.attribute) {
      const key = renderKey(segments)
      throw new MalformedKeyError(key, key.indexOf('[@'), 'attribute must be the last segment')
    }
    pathNodes.push(segment.name)
  }

  return { parent, pathNodes, newName: last.name, attribute: last.attribute }
}

// ---------------------------------------------------------------------------
// Keys of locations
// ---------------------------------------------------------------------------

/** Segments addressing a step's child, indexed when siblings share its name. */
const stepSegment = (step: LocationStep): KeySegment => {
  const child = step.parent.children[step.index]
  const name = child?.name ?? ''
  const siblings = indicesOfChildren(step.parent, name)
  return siblings.length > 1
    ? { name, index: siblings.indexOf(step.index), attribute: false }
    : { name, attribute: false }
}

/**
 * Canonical key of a location relative to its root.
 *
 * @example
 * ```typescript
 * nodeKey(location) // 'tables.table(1).fields.field(0)'
 * ```
 */
export const nodeKey = (location: NodeLocation): string => {
  const segments = location.steps.map(stepSegment)
  if (location.attribute !== undefined) {
    segments.push({ name: location.attribute, attribute: true })
  }
  return renderKey(segments)
}

// ---------------------------------------------------------------------------
// Identity index
// ---------------------------------------------------------------------------

interface IndexEntry {
  readonly node: ConfigNode
  readonly parent: IndexEntry | null
  readonly index: number
}

const treeIndexes = new WeakMap<ConfigNode, Map<NodeId, IndexEntry>>()

const buildIndex = (root: ConfigNode): Map<NodeId, IndexEntry> => {
  const entries = new Map<NodeId, IndexEntry>()

  const visit = (entry: IndexEntry): void => {
    entries.set(entry.node.id, entry)
    entry.node.children.forEach((child, index) => {
      visit({ node: child, parent: entry, index })
    })
  }

  visit({ node: root, parent: null, index: -1 })
  return entries
}

/** Identity index of a snapshot, computed once per root. */
const indexOf = (root: ConfigNode): Map<NodeId, IndexEntry> => {
  let index = treeIndexes.get(root)
  if (!index) {
    index = buildIndex(root)
    treeIndexes.set(root, index)
  }
  return index
}

/** True when a node with this identity is part of the tree. */
export const containsNode = (root: ConfigNode, id: NodeId): boolean =>
  indexOf(root).has(id)

/**
 * Finds the node with the given identity in a snapshot.
 *
 * @returns Its location, or `undefined` when the node is not part of the tree
 */
export const locateNode = (
  root: ConfigNode,
  id: NodeId,
): NodeLocation | undefined => {
  const entry = indexOf(root).get(id)
  if (!entry) {
    return undefined
  }

  const steps: LocationStep[] = []
  let current: IndexEntry = entry
  while (current.parent) {
    steps.unshift({ parent: current.parent.node, index: current.index })
    current = current.parent
  }

  return { root, steps, node: entry.node }
}
