/**
 * Node Tree Type Definitions
 *
 * The configuration tree is persistent: nodes are frozen value objects and
 * every edit produces new nodes along the edited path. A node that replaces
 * an older version of itself keeps the older version's `id`, which is what
 * views use to find their anchor again after the tree changed.
 *
 * @module tree/types
 */

/** Stable identity token of a node, unique within one tree. */
export type NodeId = number

/**
 * A single element of the configuration tree.
 *
 * @example
 * ```typescript
 * const table: ConfigNode = {
 *   id: 7,
 *   name: 'table',
 *   value: undefined,
 *   children: [nameNode, fieldsNode],
 *   attributes: new Map([['type', 'system']]),
 * }
 * ```
 */
export interface ConfigNode {
  readonly id: NodeId
  readonly name: string
  /** Raw value; `undefined` and `null` both mean "no value". */
  readonly value?: unknown
  /** Ordered children; siblings may share a name. */
  readonly children: readonly ConfigNode[]
  readonly attributes: ReadonlyMap<string, unknown>
}

/** One step of a parsed key. */
export interface KeySegment {
  readonly name: string
  /** Position among same-named siblings; negative means "append". */
  readonly index?: number
  readonly attribute: boolean
}

/** One hop from a parent to one of its children. */
export interface LocationStep {
  readonly parent: ConfigNode
  readonly index: number
}

/**
 * A resolved position in a specific snapshot.
 *
 * `steps` leads from `root` to `node`; an attribute location additionally
 * names the attribute of `node` it refers to.
 */
export interface NodeLocation {
  readonly root: ConfigNode
  readonly steps: readonly LocationStep[]
  readonly node: ConfigNode
  readonly attribute?: string
}

/**
 * Where an add operation puts its new node.
 *
 * `parent` exists in the tree; `pathNodes` are created below it in order and
 * `newName` is created below the last of them (as an attribute when
 * `attribute` is set).
 */
export interface NodeAddData {
  readonly parent: NodeLocation
  readonly pathNodes: readonly string[]
  readonly newName: string
  readonly attribute: boolean
}

/** Plain description of a node, as produced by format loaders. */
export interface NodeSource {
  name: string
  value?: unknown
  attributes?: Record<string, unknown>
  children?: NodeSource[]
}
