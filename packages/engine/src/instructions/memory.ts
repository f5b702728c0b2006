/**
 * Memory Instructions
 *
 * Data pointer moves and cell arithmetic
 */

import type { InstructionContext, InstructionResult } from '@bfstream/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * MOVE_RIGHT instruction ('>')
 * Fails at the last cell, leaving the pointer where it is
 */
export class MOVE_RIGHTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MOVE_RIGHT
  readonly name = 'MOVE_RIGHT'

  execute(context: InstructionContext): InstructionResult {
    const [error] = context.tape.moveRight()
    return error ? this.fail(error) : this.continue()
  }
}

/**
 * MOVE_LEFT instruction ('<')
 * Fails at cell 0, leaving the pointer where it is
 */
export class MOVE_LEFTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.MOVE_LEFT
  readonly name = 'MOVE_LEFT'

  execute(context: InstructionContext): InstructionResult {
    const [error] = context.tape.moveLeft()
    return error ? this.fail(error) : this.continue()
  }
}

/**
 * INCREMENT instruction ('+'), wraps at the cell width
 */
export class INCREMENTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.INCREMENT
  readonly name = 'INCREMENT'

  execute(context: InstructionContext): InstructionResult {
    context.tape.increment()
    return this.continue()
  }
}

/**
 * DECREMENT instruction ('-'), wraps at the cell width
 */
export class DECREMENTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.DECREMENT
  readonly name = 'DECREMENT'

  execute(context: InstructionContext): InstructionResult {
    context.tape.decrement()
    return this.continue()
  }
}
