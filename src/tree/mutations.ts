/**
 * Tree Mutator
 *
 * Pure copy-on-write edits. Each function takes nodes of one snapshot and
 * returns the root of a new snapshot; nodes outside the edited path are
 * shared between both. Edited nodes keep their identity.
 *
 * Edits do not describe themselves: the configuration that applies one
 * commits it with the ChangeEvent its listeners receive.
 *
 * @module tree/mutations
 */

import {
  clearNode,
  createNode,
  isUndefinedNode,
  replaceChildAt,
  withAttribute,
  withChildren,
  withValue,
  withoutAttribute,
} from './node'
import { is } from '../utils/is'
import { locateNode } from './resolver'
import type { ConfigNode, NodeAddData, NodeId, NodeLocation } from './types'

/**
 * Rebuilds the ancestors of a location around a replacement for its node.
 * `null` removes the node; removing the root clears it instead.
 */
const rebuild = (
  location: NodeLocation,
  replacement: ConfigNode | null,
): ConfigNode => {
  let current = replacement

  for (let i = location.steps.length - 1; i >= 0; i--) {
    const step = location.steps[i]
    if (step) {
      current = replaceChildAt(step.parent, step.index, current)
    }
  }

  return current ?? clearNode(location.root)
}

/**
 * Replaces the value at a location (node value, or attribute value for an
 * attribute location).
 */
export const setNodeValue = (
  location: NodeLocation,
  value: unknown,
): ConfigNode => {
  const node =
    location.attribute === undefined
      ? withValue(location.node, value)
      : withAttribute(location.node, location.attribute, value)

  return rebuild(location, node)
}

/** Appends children to the node at a location. */
export const addChildren = (
  location: NodeLocation,
  children: readonly ConfigNode[],
): ConfigNode =>
  rebuild(location, withChildren(location.node, [...location.node.children, ...children]))

/** Adds a value to an attribute, making it multi-valued if it is set. */
const appendAttributeValue = (
  node: ConfigNode,
  name: string,
  value: unknown,
): ConfigNode => {
  if (!node.attributes.has(name)) {
    return withAttribute(node, name, value)
  }
  const current = node.attributes.get(name)
  const values = is.array(current) ? [...current, value] : [current, value]
  return withAttribute(node, name, values)
}

/**
 * Creates the node (or attribute) described by an add target, synthesizing
 * the missing intermediate nodes below its existing parent. `children` are
 * placed below a new node (ignored for attributes).
 */
export const addPath = (
  data: NodeAddData,
  value: unknown,
  children: readonly ConfigNode[] = [],
): ConfigNode => {
  const { parent, pathNodes, newName } = data

  if (data.attribute && pathNodes.length === 0) {
    return rebuild(parent, appendAttributeValue(parent.node, newName, value))
  }

  const names = [...pathNodes]
  let tail: ConfigNode
  if (data.attribute) {
    tail = createNode({
      name: names.pop(),
      attributes: new Map([[newName, value]]),
    })
  } else {
    tail = createNode({ name: newName, value, children })
  }

  for (let i = names.length - 1; i >= 0; i--) {
    tail = createNode({ name: names[i], children: [tail] })
  }

  return addChildren(parent, [tail])
}

/** Detaches the node (or removes the attribute) at a location. */
export const removeSubtree = (location: NodeLocation): ConfigNode =>
  location.attribute === undefined
    ? rebuild(location, null)
    : rebuild(location, withoutAttribute(location.node, location.attribute))

/** Empties the root while keeping its identity and name. */
export const clearRoot = (root: ConfigNode): ConfigNode => clearNode(root)

/** Edit applied to a node; `null` removes it. */
export type NodeEdit = (node: ConfigNode) => ConfigNode | null

export interface EditOptions {
  /** Remove edited nodes left without value, children and attributes. */
  prune?: boolean
}

/**
 * Applies identity-keyed edits in a single pass.
 *
 * Only the ancestors of edited nodes are rebuilt. Edits see the node after
 * its own descendants were edited. The root is never removed: removing it
 * clears it.
 */
export const editNodes = (
  root: ConfigNode,
  edits: ReadonlyMap<NodeId, NodeEdit>,
  options: EditOptions = {},
): ConfigNode => {
  const onPath = new Set<NodeId>()
  for (const id of edits.keys()) {
    const location = locateNode(root, id)
    if (location) {
      onPath.add(id)
      for (const step of location.steps) {
        onPath.add(step.parent.id)
      }
    }
  }

  const transform = (node: ConfigNode, isRoot: boolean): ConfigNode | null => {
    let changed = false
    const children: ConfigNode[] = []

    for (const child of node.children) {
      const next = onPath.has(child.id) ? transform(child, false) : child
      if (next !== child) {
        changed = true
      }
      if (next) {
        children.push(next)
      }
    }

    const current = changed ? withChildren(node, children) : node
    const edit = edits.get(node.id)
    if (!edit) {
      return current
    }

    const edited = edit(current)
    if (isRoot) {
      return edited ?? clearNode(current)
    }
    if (edited && options.prune && isUndefinedNode(edited)) {
      return null
    }
    return edited
  }

  if (onPath.size === 0) {
    return root
  }

  return transform(root, true) ?? clearNode(root)
}

/**
 * Replaces the node with the given identity.
 *
 * @returns The new root, or the unchanged root when the node is not part of it
 */
export const replaceNode = (
  root: ConfigNode,
  id: NodeId,
  replacement: ConfigNode | null,
): ConfigNode => editNodes(root, new Map([[id, () => replacement]]))
