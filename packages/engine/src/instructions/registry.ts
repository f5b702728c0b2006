/**
 * Instruction Registry
 *
 * Maps opcodes to their handlers; the dispatcher for the engine.
 * Bytes without a handler are no-ops, which is how comments and whitespace
 * pass through a program.
 */

import { logger } from '@bfstream/core'
import type { InstructionHandler } from '@bfstream/types'
import { PROTECTED_OPCODES } from '../config'
import { LOOP_ENDInstruction, LOOP_STARTInstruction } from './control-flow'
import { INPUTInstruction, OUTPUTInstruction } from './io'
import {
  DECREMENTInstruction,
  INCREMENTInstruction,
  MOVE_LEFTInstruction,
  MOVE_RIGHTInstruction,
} from './memory'

export class InstructionRegistry {
  private handlers: Map<number, InstructionHandler> = new Map()

  constructor() {
    this.registerInstructions()
  }

  /**
   * Register the baseline instruction set
   */
  private registerInstructions(): void {
    // Memory instructions
    this.install(new MOVE_RIGHTInstruction())
    this.install(new MOVE_LEFTInstruction())
    this.install(new INCREMENTInstruction())
    this.install(new DECREMENTInstruction())

    // I/O instructions
    this.install(new OUTPUTInstruction())
    this.install(new INPUTInstruction())

    // Control flow instructions
    this.install(new LOOP_STARTInstruction())
    this.install(new LOOP_ENDInstruction())
  }

  private install(handler: InstructionHandler): void {
    this.handlers.set(handler.opcode, handler)
  }

  /**
   * Register an instruction handler, replacing any handler for the same opcode.
   * Loop markers are left untouched: their handlers own the loop stack and the
   * cache protocol.
   * @returns whether the handler was installed
   */
  register(handler: InstructionHandler): boolean {
    if (PROTECTED_OPCODES.has(handler.opcode)) {
      logger.debug('Registry: ignoring handler for protected opcode', {
        opcode: handler.opcode,
        name: handler.name,
      })
      return false
    }
    this.install(handler)
    return true
  }

  getHandler(opcode: number): InstructionHandler | undefined {
    return this.handlers.get(opcode)
  }

  hasHandler(opcode: number): boolean {
    return this.handlers.has(opcode)
  }

  getRegisteredOpcodes(): number[] {
    return Array.from(this.handlers.keys())
  }
}
