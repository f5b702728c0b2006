/**
 * Control Flow Instructions
 *
 * LOOP_START and LOOP_END. Loop bounds are learned while running: a loop's end
 * position is only known once its LOOP_END has executed, nothing is scanned ahead.
 *
 * Both handlers leave the instruction pointer one before the intended next
 * position, since the engine advances it after every step.
 */

import { logger } from '@bfstream/core'
import {
  ENGINE_ERRORS,
  EngineError,
  type InstructionContext,
  type InstructionResult,
} from '@bfstream/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * LOOP_START instruction ('[')
 *
 * A position already on top of the loop stack means LOOP_END just sent us back
 * to re-test the guard; anything else is a first entry and is pushed.
 * With a zero guard the loop is popped and left:
 * - on re-entry, by jumping to the pending loop end
 * - on first entry, by putting the engine in skip mode until the matching LOOP_END
 */
export class LOOP_STARTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.LOOP_START
  readonly name = 'LOOP_START'

  execute(context: InstructionContext): InstructionResult {
    const position = context.instructionPointer
    const reentry = context.loopStack.peek() === position
    const loopEnd = context.pendingLoopEnd
    context.pendingLoopEnd = null

    if (!reentry) {
      context.loopStack.push(position)
    }

    if (context.tape.read() !== 0) {
      return this.continue()
    }

    context.loopStack.pop()

    if (reentry && loopEnd !== null) {
      context.instructionPointer = loopEnd
    } else {
      logger.debug('LOOP_START: zero guard, skipping loop body', { position })
      context.skipDepth = 1
    }

    return this.continue()
  }
}

/**
 * LOOP_END instruction (']')
 * Records its own position as the pending loop end and jumps back to the loop start
 */
export class LOOP_ENDInstruction extends BaseInstruction {
  readonly opcode = OPCODES.LOOP_END
  readonly name = 'LOOP_END'

  execute(context: InstructionContext): InstructionResult {
    const loopStart = context.loopStack.peek()

    if (loopStart === undefined) {
      return this.fail(
        new EngineError(
          ENGINE_ERRORS.STACK_UNDERFLOW,
          `stack is empty on closing loop [#cmd: ${context.instructionPointer}]`,
        ),
      )
    }

    context.pendingLoopEnd = context.instructionPointer
    context.instructionPointer = loopStart - 1

    return this.continue()
  }
}
