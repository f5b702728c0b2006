import { ENGINE_ERRORS } from '@bfstream/types'
import { describe, expect, it } from 'vitest'
import {
  DECREMENTInstruction,
  INCREMENTInstruction,
  MOVE_LEFTInstruction,
  MOVE_RIGHTInstruction,
} from '../memory'
import { createContext } from './context-helper'

describe('Memory Instructions', () => {
  describe('MOVE_RIGHT', () => {
    it('should advance the data pointer', () => {
      const { context, tape } = createContext()

      const result = new MOVE_RIGHTInstruction().execute(context)

      expect(result.error).toBeNull()
      expect(tape.pointer).toBe(1)
    })

    it('should fail on the last cell and keep the pointer', () => {
      const { context, tape } = createContext({
        cells: [0, 0, 0],
        dataPointer: 2,
      })

      const result = new MOVE_RIGHTInstruction().execute(context)

      expect(result.error?.code).toBe(ENGINE_ERRORS.BOUNDARY)
      expect(result.error?.message).toBe('shift+ moves out of boundary')
      expect(tape.pointer).toBe(2)
    })
  })

  describe('MOVE_LEFT', () => {
    it('should step the data pointer back', () => {
      const { context, tape } = createContext({ dataPointer: 10 })

      const result = new MOVE_LEFTInstruction().execute(context)

      expect(result.error).toBeNull()
      expect(tape.pointer).toBe(9)
    })

    it('should fail on cell 0 and keep the pointer', () => {
      const { context, tape } = createContext({ cells: [0, 0, 0, 0, 0] })

      const result = new MOVE_LEFTInstruction().execute(context)

      expect(result.error?.code).toBe(ENGINE_ERRORS.BOUNDARY)
      expect(result.error?.message).toBe('shift- moves out of boundary')
      expect(tape.pointer).toBe(0)
    })
  })

  describe('INCREMENT', () => {
    it('should add one to the current cell only', () => {
      const { context, tape } = createContext({ cells: [0, 0, 0, 0, 0] })

      new INCREMENTInstruction().execute(context)

      expect(Array.from(tape.cells)).toEqual([1, 0, 0, 0, 0])
      expect(tape.pointer).toBe(0)
    })

    it('should wrap an 8-bit cell from 127 to -128', () => {
      const { context, tape } = createContext({ cells: [127], cellWidth: 8 })

      new INCREMENTInstruction().execute(context)

      expect(tape.read()).toBe(-128)
    })
  })

  describe('DECREMENT', () => {
    it('should subtract one from the current cell only', () => {
      const { context, tape } = createContext({
        cells: [0, 3, 0, 0, 0],
        dataPointer: 1,
      })

      new DECREMENTInstruction().execute(context)

      expect(Array.from(tape.cells)).toEqual([0, 2, 0, 0, 0])
      expect(tape.pointer).toBe(1)
    })

    it('should wrap a 32-bit cell from the minimum to the maximum', () => {
      const { context, tape } = createContext({ cells: [-2147483648] })

      new DECREMENTInstruction().execute(context)

      expect(tape.read()).toBe(2147483647)
    })
  })
})
