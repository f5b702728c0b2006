/**
 * I/O Instructions
 *
 * Move cell values to and from the engine's capability providers
 */

import {
  ENGINE_ERRORS,
  EngineError,
  type InstructionContext,
  type InstructionResult,
} from '@bfstream/types'
import { OPCODES } from '../config'
import { BaseInstruction } from './base'

/**
 * OUTPUT instruction ('.')
 * Emits the current cell, a writer failure aborts the run
 */
export class OUTPUTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.OUTPUT
  readonly name = 'OUTPUT'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const written = await context.output.write(context.tape.read())
    return this.fromSafe(
      written,
      (error) =>
        new EngineError(
          ENGINE_ERRORS.IO,
          `failed to write value: ${error.message}`,
          null,
          { cause: error },
        ),
    )
  }
}

/**
 * INPUT instruction (',')
 * Stores one value from the reader in the current cell
 */
export class INPUTInstruction extends BaseInstruction {
  readonly opcode = OPCODES.INPUT
  readonly name = 'INPUT'

  async execute(context: InstructionContext): Promise<InstructionResult> {
    const [error, value] = await context.input.read(
      `enter value [#cmd: ${context.instructionPointer}]`,
    )
    if (error) {
      return this.fail(
        new EngineError(
          ENGINE_ERRORS.IO,
          `failed to read value: ${error.message}`,
          null,
          { cause: error },
        ),
      )
    }

    context.tape.write(value)
    return this.continue()
  }
}
