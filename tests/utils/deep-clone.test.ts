import { describe, expect, it } from 'vitest'

import { deepClone } from '~/utils/deep-clone'

describe('deepClone', () => {
  it('should return primitives as they are', () => {
    expect(deepClone(5432)).toBe(5432)
    expect(deepClone('localhost')).toBe('localhost')
    expect(deepClone(null)).toBe(null)
  })

  it('should copy nested values', () => {
    const original = { pool: { size: 4, hosts: ['db-1', 'db-2'] } }
    const cloned = deepClone(original)

    cloned.pool.size = 8
    cloned.pool.hosts.push('db-3')

    expect(original.pool.size).toBe(4)
    expect(original.pool.hosts).toEqual(['db-1', 'db-2'])
  })

  it('should clone shared references independently', () => {
    const shared = { port: 5432 }
    const original = { primary: shared, replica: shared }
    const cloned = deepClone(original)

    expect(cloned.primary).toEqual(shared)
    expect(cloned.primary).not.toBe(shared)
  })

  it('should reject circular values', () => {
    const value: { name: string; self?: unknown } = { name: 'loop' }
    value.self = value

    expect(() => deepClone(value)).toThrow('Circular reference detected at "self"')
  })
})
