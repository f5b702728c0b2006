import { describe, expect, it } from 'vitest'
import { InstructionCache } from '../instruction-cache'

describe('InstructionCache', () => {
  it('should serve recorded bytes by position', () => {
    const cache = new InstructionCache()
    cache.record(3, 0x5b)
    cache.record(4, 0x2b)

    expect(cache.get(3)).toBe(0x5b)
    expect(cache.get(4)).toBe(0x2b)
    expect(cache.get(5)).toBeUndefined()
    expect(cache.has(4)).toBe(true)
    expect(cache.size).toBe(2)
  })

  it('should keep the first byte recorded at a position', () => {
    const cache = new InstructionCache()

    expect(cache.record(2, 0x2b)).toBe(true)
    expect(cache.record(2, 0x2d)).toBe(false)
    expect(cache.get(2)).toBe(0x2b)
    expect(cache.size).toBe(1)
  })

  it('should list positions in program order', () => {
    const cache = new InstructionCache()
    cache.record(9, 0x5d)
    cache.record(1, 0x5b)
    cache.record(5, 0x2d)

    expect(cache.positions()).toEqual([1, 5, 9])
  })
})
