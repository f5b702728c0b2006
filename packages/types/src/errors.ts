/**
 * Engine Error Constants
 *
 * Centralized definitions of every failure a run can end with.
 * All of them are fatal to the run that raised them; retrying is the caller's call.
 */

export const ENGINE_ERRORS = {
  /** Data pointer moved past either edge of the tape */
  BOUNDARY: 'boundary',
  /** Loop-end reached with no open loop */
  STACK_UNDERFLOW: 'stack_underflow',
  /** Input or output capability failed */
  IO: 'io',
  /** Instruction source failed for a reason other than end of input */
  SOURCE_READ: 'source_read',
  /** A registered handler threw instead of returning a result */
  HANDLER: 'handler',
  /** The run's abort signal fired */
  CANCELLED: 'cancelled',
  /** The configured step budget ran out */
  STEP_LIMIT: 'step_limit',
  /** A run was started on an engine that is already running */
  BUSY: 'busy',
} as const

export type EngineErrorCode = (typeof ENGINE_ERRORS)[keyof typeof ENGINE_ERRORS]

export class EngineError extends Error {
  readonly code: EngineErrorCode
  /** Instruction pointer at the time of failure, null until the engine attributes it */
  readonly instructionPointer: number | null

  constructor(
    code: EngineErrorCode,
    message: string,
    instructionPointer: number | null = null,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'EngineError'
    this.code = code
    this.instructionPointer = instructionPointer
  }

  /**
   * Attribute the error to the instruction that raised it.
   * The original error is kept as `cause`.
   */
  at(instructionPointer: number): EngineError {
    return new EngineError(
      this.code,
      `failed to process [#cmd: ${instructionPointer}]: ${this.message}`,
      instructionPointer,
      { cause: this },
    )
  }
}

export function isEngineError(
  value: unknown,
  code?: EngineErrorCode,
): value is EngineError {
  return (
    value instanceof EngineError && (code === undefined || value.code === code)
  )
}
