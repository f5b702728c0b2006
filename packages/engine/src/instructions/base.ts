/**
 * Base Instruction System
 *
 * Defines the abstract class shared by the baseline instructions.
 * Custom opcodes may extend it or implement `InstructionHandler` directly.
 */

import {
  type EngineError,
  type InstructionContext,
  type InstructionHandler,
  type InstructionResult,
  isEngineError,
  type Safe,
} from '@bfstream/types'

/**
 * Convert a one-character string or a byte into an opcode
 */
export function toOpcode(symbol: string | number): number {
  if (typeof symbol === 'number') {
    if (!Number.isInteger(symbol) || symbol < 0 || symbol > 0xff) {
      throw new RangeError(`opcode must be a byte, got ${symbol}`)
    }
    return symbol
  }
  if (symbol.length !== 1 || symbol.charCodeAt(0) > 0xff) {
    throw new RangeError(`opcode must be a single byte character, got "${symbol}"`)
  }
  return symbol.charCodeAt(0)
}

export abstract class BaseInstruction implements InstructionHandler {
  abstract readonly opcode: number
  abstract readonly name: string

  abstract execute(
    context: InstructionContext,
  ): InstructionResult | Promise<InstructionResult>

  protected continue(): InstructionResult {
    return { error: null }
  }

  protected fail(error: EngineError): InstructionResult {
    return { error }
  }

  /**
   * Lift a Safe tuple from the tape or a capability into a result
   */
  protected fromSafe<T>(
    [error]: Safe<T>,
    wrap: (error: Error) => EngineError,
  ): InstructionResult {
    if (error === undefined) return this.continue()
    return this.fail(isEngineError(error) ? error : wrap(error))
  }
}
