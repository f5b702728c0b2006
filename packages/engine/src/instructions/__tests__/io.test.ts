import { ENGINE_ERRORS } from '@bfstream/types'
import { describe, expect, it } from 'vitest'
import { INPUTInstruction, OUTPUTInstruction } from '../io'
import { createContext } from './context-helper'

describe('I/O Instructions', () => {
  describe('OUTPUT', () => {
    it('should write the current cell', async () => {
      const { context, tape, output } = createContext({
        cells: [0, 15, 0, 0, 0],
        dataPointer: 1,
      })

      const result = await new OUTPUTInstruction().execute(context)

      expect(result.error).toBeNull()
      expect(output.values).toEqual([15])
      expect(Array.from(tape.cells)).toEqual([0, 15, 0, 0, 0])
    })

    it('should report a writer failure as an I/O error', async () => {
      const { context } = createContext({ failOutputAfter: 0 })

      const result = await new OUTPUTInstruction().execute(context)

      expect(result.error?.code).toBe(ENGINE_ERRORS.IO)
      expect(result.error?.message).toBe('failed to write value: output error')
    })
  })

  describe('INPUT', () => {
    it('should store the value read in the current cell', async () => {
      const { context, tape, input } = createContext({
        cells: [0, 0, 0, 0, 0],
        dataPointer: 1,
        instructionPointer: 7,
        input: [12],
      })

      const result = await new INPUTInstruction().execute(context)

      expect(result.error).toBeNull()
      expect(Array.from(tape.cells)).toEqual([0, 12, 0, 0, 0])
      expect(input.prompts).toEqual(['enter value [#cmd: 7]'])
    })

    it('should wrap values wider than the cell', async () => {
      const { context, tape } = createContext({
        cells: [0],
        cellWidth: 8,
        input: [200],
      })

      await new INPUTInstruction().execute(context)

      expect(tape.read()).toBe(-56)
    })

    it('should report a reader failure as an I/O error', async () => {
      const { context, tape } = createContext({ cells: [5] })

      const result = await new INPUTInstruction().execute(context)

      expect(result.error?.code).toBe(ENGINE_ERRORS.IO)
      expect(result.error?.message).toBe('failed to read value: no more input')
      expect(tape.read()).toBe(5)
    })
  })
})
