/**
 * Node creation and copy-on-write helpers
 *
 * Nodes are created frozen. Every helper that "changes" a node returns a new
 * node carrying the same `id`; helpers that copy a tree hand out fresh ids.
 *
 * @module tree/node
 */

import { deepClone } from '../utils/deep-clone'
import { is } from '../utils/is'
import type { ConfigNode, NodeId } from './types'

let lastNodeId = 0

/** Hands out the next identity token. */
export const nextNodeId = (): NodeId => ++lastNodeId

const EMPTY_CHILDREN: readonly ConfigNode[] = Object.freeze([])
const EMPTY_ATTRIBUTES: ReadonlyMap<string, unknown> = new Map()

interface NodeParts {
  id?: NodeId
  name?: string
  value?: unknown
  children?: readonly ConfigNode[]
  attributes?: ReadonlyMap<string, unknown>
}

/**
 * Creates a frozen node. Omitted parts default to an empty name, no value,
 * no children and no attributes; a missing `id` gets a fresh one.
 */
export const createNode = (parts: NodeParts = {}): ConfigNode => {
  const children =
    parts.children && parts.children.length > 0
      ? Object.freeze([...parts.children])
      : EMPTY_CHILDREN
  const attributes =
    parts.attributes && parts.attributes.size > 0
      ? new Map(parts.attributes)
      : EMPTY_ATTRIBUTES

  return Object.freeze({
    id: parts.id ?? nextNodeId(),
    name: parts.name ?? '',
    value: parts.value,
    children,
    attributes,
  })
}

/** True when the node carries a value (`null` counts as none). */
export const hasValue = (node: ConfigNode): boolean => is.not.nil(node.value)

/** True when the node has no value, no children and no attributes. */
export const isUndefinedNode = (node: ConfigNode): boolean =>
  !hasValue(node) && node.children.length === 0 && node.attributes.size === 0

/** True when neither the node nor any descendant holds a value or attribute. */
export const isEmptyTree = (node: ConfigNode): boolean =>
  !hasValue(node) &&
  node.attributes.size === 0 &&
  node.children.every(isEmptyTree)

// ---------------------------------------------------------------------------
// Copy-on-write (same id)
// ---------------------------------------------------------------------------

export const withValue = (node: ConfigNode, value: unknown): ConfigNode =>
  createNode({ ...node, value })

export const withChildren = (
  node: ConfigNode,
  children: readonly ConfigNode[],
): ConfigNode => createNode({ ...node, children })

export const withAttribute = (
  node: ConfigNode,
  name: string,
  value: unknown,
): ConfigNode => {
  const attributes = new Map(node.attributes)
  attributes.set(name, value)
  return createNode({ ...node, attributes })
}

export const withoutAttribute = (node: ConfigNode, name: string): ConfigNode => {
  if (!node.attributes.has(name)) {
    return node
  }
  const attributes = new Map(node.attributes)
  attributes.delete(name)
  return createNode({ ...node, attributes })
}

/** Same identity and name, nothing else. */
export const clearNode = (node: ConfigNode): ConfigNode =>
  createNode({ id: node.id, name: node.name })

/** Replaces the child at `index`; `null` removes it. */
export const replaceChildAt = (
  node: ConfigNode,
  index: number,
  child: ConfigNode | null,
): ConfigNode => {
  const children = [...node.children]
  if (child) {
    children[index] = child
  } else {
    children.splice(index, 1)
  }
  return withChildren(node, children)
}

// ---------------------------------------------------------------------------
// Copies (fresh ids)
// ---------------------------------------------------------------------------

/** Independent copy of a node value; primitives are returned as they are. */
export const cloneValue = (value: unknown): unknown =>
  is.primitive(value) ? value : deepClone(value)

/**
 * Deep copy of a subtree: every node gets a new id and object values are
 * cloned, so the copy shares nothing with the source.
 */
export const copyTree = (node: ConfigNode): ConfigNode => {
  const attributes = new Map<string, unknown>()
  for (const [name, value] of node.attributes) {
    attributes.set(name, cloneValue(value))
  }
  return createNode({
    name: node.name,
    value: cloneValue(node.value),
    attributes,
    children: node.children.map(copyTree),
  })
}

/**
 * Copy of a subtree (fresh ids) with every value passed through `fn`.
 * List values are mapped element by element.
 */
export const mapValues = (
  node: ConfigNode,
  fn: (value: unknown) => unknown,
): ConfigNode => {
  const map = (value: unknown): unknown =>
    is.array(value) ? value.map(fn) : is.nil(value) ? value : fn(value)

  const attributes = new Map<string, unknown>()
  for (const [name, value] of node.attributes) {
    attributes.set(name, map(value))
  }
  return createNode({
    name: node.name,
    value: map(node.value),
    attributes,
    children: node.children.map((child) => mapValues(child, fn)),
  })
}

/** Gives the root of `node` the identity `id`, keeping everything else. */
export const adoptIdentity = (node: ConfigNode, id: NodeId): ConfigNode =>
  node.id === id ? node : createNode({ ...node, id })

/**
 * Gives every position of a tree its own identity. A node that occurs more
 * than once keeps its id at its first position in tree order; later
 * occurrences are replaced by copies with fresh ids.
 *
 * @returns `root` itself when no id repeats
 */
export const withUniqueIds = (root: ConfigNode): ConfigNode => {
  const seen = new Set<NodeId>()

  const visit = (node: ConfigNode): ConfigNode => {
    if (seen.has(node.id)) {
      return copyTree(node)
    }
    seen.add(node.id)

    let changed = false
    const children = node.children.map((child) => {
      const next = visit(child)
      if (next !== child) {
        changed = true
      }
      return next
    })
    return changed ? withChildren(node, children) : node
  }

  return visit(root)
}

/** Number of nodes in the subtree, the root included. */
export const countNodes = (node: ConfigNode): number =>
  node.children.reduce((total, child) => total + countNodes(child), 1)

// ---------------------------------------------------------------------------
// Builder
// ---------------------------------------------------------------------------

/**
 * Fluent builder for a single node.
 *
 * @example
 * ```typescript
 * const table = new NodeBuilder()
 *   .name('table')
 *   .addAttribute('type', 'system')
 *   .addChild(new NodeBuilder().name('name').value('users').create())
 *   .create()
 * ```
 */
export class NodeBuilder {
  private nodeName = ''
  private nodeValue: unknown = undefined
  private readonly childNodes: ConfigNode[] = []
  private readonly attributeMap = new Map<string, unknown>()

  name(name: string): this {
    this.nodeName = name
    return this
  }

  value(value: unknown): this {
    this.nodeValue = value
    return this
  }

  addChild(child: ConfigNode): this {
    this.childNodes.push(child)
    return this
  }

  addChildren(children: Iterable<ConfigNode>): this {
    for (const child of children) {
      this.childNodes.push(child)
    }
    return this
  }

  addAttribute(name: string, value: unknown): this {
    this.attributeMap.set(name, value)
    return this
  }

  addAttributes(attributes: ReadonlyMap<string, unknown>): this {
    for (const [name, value] of attributes) {
      this.attributeMap.set(name, value)
    }
    return this
  }

  create(): ConfigNode {
    return createNode({
      name: this.nodeName,
      value: this.nodeValue,
      children: this.childNodes,
      attributes: this.attributeMap,
    })
  }
}
