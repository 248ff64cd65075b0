/**
 * Subset construction
 *
 * A subset is an independent tree built from everything a key selects.
 * Each match contributes on its own:
 *
 * - a node with children contributes copies of its children
 * - a leaf with a value contributes a `@value` child holding that value
 * - attributes of matched nodes, and matched attributes, become attributes
 *   of the subset root
 *
 * The subset root carries a value only when exactly one matched node has one.
 *
 * @module configuration/subset
 */

import { cloneValue, copyTree, createNode, hasValue } from '../tree/node'
import { uniqueValue, valueAt } from '../tree/resolver'
import type { ConfigNode, NodeLocation } from '../tree/types'

/** Name of the synthetic child holding the value of a matched leaf. */
export const SUBSET_VALUE_NODE = '@value'

export const buildSubsetRoot = (locations: readonly NodeLocation[]): ConfigNode => {
  const children: ConfigNode[] = []
  const attributes = new Map<string, unknown>()
  const nodeLocations: NodeLocation[] = []

  for (const location of locations) {
    if (location.attribute !== undefined) {
      attributes.set(location.attribute, cloneValue(valueAt(location)))
      continue
    }

    const { node } = location
    nodeLocations.push(location)

    if (node.children.length > 0) {
      children.push(...node.children.map(copyTree))
    } else if (hasValue(node)) {
      children.push(
        createNode({ name: SUBSET_VALUE_NODE, value: cloneValue(node.value) }),
      )
    }

    for (const [name, value] of node.attributes) {
      attributes.set(name, cloneValue(value))
    }
  }

  return createNode({
    value: cloneValue(uniqueValue(nodeLocations)),
    children,
    attributes,
  })
}
