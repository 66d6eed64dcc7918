import { describe, it, expect } from 'vitest'
import { ToolRegistry } from '../tool-registry.js'
import { InvalidArgumentError } from '../../errors.js'
import { createMockTool, createRandomTool } from '../../__fixtures__/tool-helpers.js'

describe('ToolRegistry', () => {
  it('registers tools in order', () => {
    const registry = new ToolRegistry([createMockTool('a'), createMockTool('b')])
    registry.add(createMockTool('c'))

    expect(registry.size).toBe(3)
    expect(registry.has('b')).toBe(true)
    expect(registry.get('c')?.name).toBe('c')
    expect(registry.get('missing')).toBeUndefined()
    expect(registry.values().map((tool) => tool.name)).toEqual(['a', 'b', 'c'])
  })

  it('rejects duplicate names', () => {
    const registry = new ToolRegistry([createMockTool('a')])

    expect(() => registry.add(createMockTool('a'))).toThrow(InvalidArgumentError)
    expect(() => registry.add(createMockTool('a'))).toThrow('Tool "a" is already registered')
  })

  describe('select', () => {
    const registry = new ToolRegistry([createMockTool('a'), createMockTool('b'), createMockTool('c')])

    it('returns every tool for a missing or empty list', () => {
      expect(registry.select()).toHaveLength(3)
      expect(registry.select([])).toHaveLength(3)
    })

    it('keeps registration order and ignores unknown names', () => {
      expect(registry.select(['c', 'a', 'zzz']).map((tool) => tool.name)).toEqual(['a', 'c'])
    })

    it('returns nothing when tools are disabled', () => {
      expect(registry.select(['a'], true)).toEqual([])
    })
  })

  it('maps tools to their specs', () => {
    const tool = createRandomTool()

    expect(ToolRegistry.toSpecs([tool])).toEqual([tool.toolSpec])
  })
})
