import { describe, expect, it } from 'vitest'

import {
  adoptIdentity,
  clearNode,
  copyTree,
  countNodes,
  createNode,
  isEmptyTree,
  isUndefinedNode,
  mapValues,
  NodeBuilder,
  replaceChildAt,
  withAttribute,
  withoutAttribute,
  withUniqueIds,
  withValue,
} from '~/tree/node'

describe('createNode', () => {
  it('should create a frozen empty node by default', () => {
    const node = createNode()

    expect(node.name).toBe('')
    expect(node.value).toBeUndefined()
    expect(node.children).toEqual([])
    expect(node.attributes.size).toBe(0)
    expect(Object.isFrozen(node)).toBe(true)
    expect(Object.isFrozen(node.children)).toBe(true)
  })

  it('should hand out distinct ids', () => {
    expect(createNode().id).not.toBe(createNode().id)
  })

  it('should not share the children array it was given', () => {
    const children = [createNode({ name: 'a' })]
    const node = createNode({ children })
    children.push(createNode({ name: 'b' }))

    expect(node.children).toHaveLength(1)
  })
})

describe('copy-on-write helpers', () => {
  it('should keep the identity when changing the value', () => {
    const node = createNode({ name: 'port', value: 80 })
    const changed = withValue(node, 8080)

    expect(changed.id).toBe(node.id)
    expect(changed.value).toBe(8080)
    expect(node.value).toBe(80)
  })

  it('should add and remove attributes without touching the original', () => {
    const node = createNode({ name: 'table' })
    const typed = withAttribute(node, 'type', 'system')

    expect(typed.attributes.get('type')).toBe('system')
    expect(node.attributes.has('type')).toBe(false)
    expect(withoutAttribute(typed, 'type').attributes.has('type')).toBe(false)
  })

  it('should return the same node when removing a missing attribute', () => {
    const node = createNode({ name: 'table' })

    expect(withoutAttribute(node, 'type')).toBe(node)
  })

  it('should clear everything but identity and name', () => {
    const node = new NodeBuilder()
      .name('table')
      .value('x')
      .addAttribute('type', 'system')
      .addChild(createNode({ name: 'name' }))
      .create()
    const cleared = clearNode(node)

    expect(cleared.id).toBe(node.id)
    expect(cleared.name).toBe('table')
    expect(isUndefinedNode(cleared)).toBe(true)
  })

  it('should replace or remove a child by position', () => {
    const a = createNode({ name: 'a' })
    const b = createNode({ name: 'b' })
    const parent = createNode({ children: [a, b] })
    const c = createNode({ name: 'c' })

    expect(replaceChildAt(parent, 1, c).children).toEqual([a, c])
    expect(replaceChildAt(parent, 0, null).children).toEqual([b])
  })

  it('should adopt an identity only when it differs', () => {
    const node = createNode({ name: 'a' })
    const other = createNode({ name: 'b' })

    expect(adoptIdentity(node, node.id)).toBe(node)
    expect(adoptIdentity(other, node.id).id).toBe(node.id)
    expect(adoptIdentity(other, node.id).name).toBe('b')
  })
})

describe('copyTree', () => {
  it('should give every node a fresh id', () => {
    const child = createNode({ name: 'child', value: 1 })
    const root = createNode({ name: 'root', children: [child] })
    const copy = copyTree(root)

    expect(copy.id).not.toBe(root.id)
    expect(copy.children[0]?.id).not.toBe(child.id)
    expect(copy.children[0]?.value).toBe(1)
  })

  it('should clone object values', () => {
    const value = { host: 'localhost' }
    const root = createNode({
      name: 'db',
      value,
      attributes: new Map([['opts', ['a']]]),
    })
    const copy = copyTree(root)

    expect(copy.value).toEqual(value)
    expect(copy.value).not.toBe(value)
    expect(copy.attributes.get('opts')).toEqual(['a'])
    expect(copy.attributes.get('opts')).not.toBe(root.attributes.get('opts'))
  })
})

describe('withUniqueIds', () => {
  it('should return the same root when no id repeats', () => {
    const root = createNode({ children: [createNode({ name: 'a' }), createNode({ name: 'b' })] })

    expect(withUniqueIds(root)).toBe(root)
  })

  it('should copy a reused node at every position after the first', () => {
    const leaf = createNode({ name: 'a', value: 1 })
    const root = createNode({ children: [leaf, leaf] })

    const next = withUniqueIds(root)

    expect(next.id).toBe(root.id)
    expect(next.children[0]).toBe(leaf)
    expect(next.children[1]?.id).not.toBe(leaf.id)
    expect(next.children[1]?.value).toBe(1)
  })

  it('should copy a reused node below different parents', () => {
    const leaf = createNode({ name: 'a', value: 1 })
    const first = createNode({ name: 'p', children: [leaf] })
    const second = createNode({ name: 'p', children: [leaf] })

    const next = withUniqueIds(createNode({ children: [first, second] }))

    expect(next.children[0]).toBe(first)
    expect(next.children[1]?.id).toBe(second.id)
    expect(next.children[1]?.children[0]?.id).not.toBe(leaf.id)
  })
})

describe('mapValues', () => {
  it('should map node values, attribute values and list elements', () => {
    const root = createNode({
      name: 'root',
      value: 'a',
      attributes: new Map([['tags', ['x', 'y']]]),
      children: [createNode({ name: 'child', value: 'b' }), createNode({ name: 'empty' })],
    })
    const mapped = mapValues(root, (value) => `${String(value)}!`)

    expect(mapped.value).toBe('a!')
    expect(mapped.attributes.get('tags')).toEqual(['x!', 'y!'])
    expect(mapped.children[0]?.value).toBe('b!')
    expect(mapped.children[1]?.value).toBeUndefined()
  })
})

describe('tree predicates', () => {
  it('should tell an empty tree apart from one holding data', () => {
    const empty = createNode({ children: [createNode({ name: 'a' })] })
    const withData = createNode({
      children: [createNode({ name: 'a', children: [createNode({ name: 'b', value: 0 })] })],
    })

    expect(isEmptyTree(empty)).toBe(true)
    expect(isUndefinedNode(empty)).toBe(false)
    expect(isEmptyTree(withData)).toBe(false)
  })

  it('should treat null as no value', () => {
    expect(isUndefinedNode(createNode({ value: null }))).toBe(true)
  })

  it('should count nodes including the root', () => {
    const root = createNode({
      children: [createNode({ children: [createNode()] }), createNode()],
    })

    expect(countNodes(root)).toBe(4)
  })
})

describe('NodeBuilder', () => {
  it('should build a node from its parts', () => {
    const node = new NodeBuilder()
      .name('table')
      .value('v')
      .addChildren([createNode({ name: 'a' }), createNode({ name: 'b' })])
      .addAttributes(new Map([['type', 'system']]))
      .create()

    expect(node.name).toBe('table')
    expect(node.value).toBe('v')
    expect(node.children.map((child) => child.name)).toEqual(['a', 'b'])
    expect(node.attributes.get('type')).toBe('system')
  })
})
