/**
 * Streaming Execution Engine
 *
 * Runs programs pulled one byte at a time from a forward-only source.
 * Loop bodies are replayed from an instruction cache that is filled while at
 * least one loop is open, so the source never has to deliver a byte twice.
 */

import { logger } from '@bfstream/core'
import {
  type CellArray,
  ENGINE_ERRORS,
  type EngineOptions,
  type EngineStateSnapshot,
  EngineError,
  type ExecutionLogEntry,
  type IEngine,
  type InputReader,
  type InstructionContext,
  type InstructionHandler,
  type InstructionResult,
  type InstructionSource,
  type OutputWriter,
  type RunOptions,
  type Safe,
  type SafePromise,
  safeError,
  safeResult,
  toError,
} from '@bfstream/types'
import {
  OPCODES,
  type ResolvedEngineOptions,
  resolveEngineOptions,
} from './config'
import { InstructionCache } from './instruction-cache'
import { InstructionRegistry } from './instructions/registry'
import { EngineLoopStack } from './loop-stack'
import { CellTape } from './tape'

interface FetchedInstruction {
  opcode: number
  /** Served from the cache rather than the source */
  replayed: boolean
}

export class StreamingEngine implements IEngine {
  public readonly registry: InstructionRegistry
  public readonly tape: CellTape
  public readonly options: ResolvedEngineOptions
  protected readonly context: InstructionContext
  protected cache: InstructionCache | null = null
  protected running = false

  /** Step counter for the current run */
  protected executionStep = 0

  /** Per-step trace of the current run, filled when `trace` is on */
  public executionLogs: ExecutionLogEntry[] = []

  constructor(
    input: InputReader,
    output: OutputWriter,
    options: EngineOptions = {},
  ) {
    this.options = resolveEngineOptions(options)
    this.registry = new InstructionRegistry()
    this.tape = new CellTape(this.options.memorySize, this.options.cellWidth)
    this.context = {
      tape: this.tape,
      instructionPointer: 0,
      loopStack: new EngineLoopStack(),
      pendingLoopEnd: null,
      skipDepth: 0,
      input,
      output,
    }
  }

  /**
   * Add or replace an opcode handler. Handlers for the loop markers are ignored.
   */
  withInstruction(handler: InstructionHandler): this {
    this.registry.register(handler)
    return this
  }

  get state(): EngineStateSnapshot {
    return {
      instructionPointer: this.context.instructionPointer,
      dataPointer: this.tape.pointer,
      loopDepth: this.context.loopStack.getDepth(),
      cacheSize: this.cache?.size ?? 0,
      skipping: this.context.skipDepth > 0,
      running: this.running,
    }
  }

  /**
   * Execute a program until its source runs dry.
   *
   * @returns a copy of the tape on success, or the error that ended the run,
   * attributed to the instruction pointer where it happened
   */
  public async run(
    source: InstructionSource,
    options: RunOptions = {},
  ): SafePromise<CellArray, EngineError> {
    if (this.running) {
      return safeError(
        new EngineError(ENGINE_ERRORS.BUSY, 'engine is already running'),
      )
    }

    this.running = true
    try {
      return await this.execute(source, options)
    } finally {
      this.running = false
    }
  }

  private reset(): void {
    this.context.instructionPointer = 0
    this.context.loopStack.clear()
    this.context.pendingLoopEnd = null
    this.context.skipDepth = 0
    this.tape.reset()
    this.cache = null
    this.executionStep = 0
    this.executionLogs = []
  }

  private async execute(
    source: InstructionSource,
    { signal }: RunOptions,
  ): SafePromise<CellArray, EngineError> {
    this.reset()
    const { stepLimit } = this.options

    logger.debug('Run: starting', {
      memorySize: this.tape.capacity,
      cellWidth: this.tape.width,
      stepLimit,
    })

    for (;;) {
      const instructionPointer = this.context.instructionPointer

      if (signal?.aborted) {
        logger.debug('Run: cancelled', { instructionPointer })
        return safeError(
          new EngineError(
            ENGINE_ERRORS.CANCELLED,
            `run cancelled before [#cmd: ${instructionPointer}]`,
            instructionPointer,
            { cause: signal.reason },
          ),
        )
      }

      if (stepLimit !== null && this.executionStep >= stepLimit) {
        return this.abort(
          new EngineError(
            ENGINE_ERRORS.STEP_LIMIT,
            `step limit of ${stepLimit} reached before [#cmd: ${instructionPointer}]`,
            instructionPointer,
          ),
        )
      }

      const [fetchError, fetched] = await this.fetch(source, instructionPointer)
      if (fetchError) {
        return this.abort(fetchError)
      }
      if (fetched === null) {
        return this.finish()
      }

      this.executionStep++

      if (this.context.skipDepth > 0) {
        this.skip(fetched, instructionPointer)
      } else {
        const error = await this.dispatch(fetched, instructionPointer)
        if (error) {
          return this.abort(error)
        }
      }

      // The outermost loop is closed, nothing left to replay
      if (this.context.loopStack.isEmpty()) {
        this.cache = null
      }

      this.context.instructionPointer++
    }
  }

  /**
   * Next instruction, from the cache when this position was already read
   * @returns null once the source is exhausted
   */
  private async fetch(
    source: InstructionSource,
    instructionPointer: number,
  ): SafePromise<FetchedInstruction | null, EngineError> {
    const cached = this.cache?.get(instructionPointer)
    if (cached !== undefined) {
      return safeResult({ opcode: cached, replayed: true })
    }

    let read: Safe<number | null>
    try {
      read = await source.read()
    } catch (thrown) {
      read = safeError(toError(thrown))
    }

    const [error, opcode] = read
    if (error) {
      return safeError(
        new EngineError(
          ENGINE_ERRORS.SOURCE_READ,
          `failed to read command [#cmd: ${instructionPointer}]: ${error.message}`,
          instructionPointer,
          { cause: error },
        ),
      )
    }
    if (opcode === null) {
      return safeResult(null)
    }
    return safeResult({ opcode, replayed: false })
  }

  /**
   * Run one instruction
   * @returns the error that ends the run, if any
   */
  private async dispatch(
    { opcode, replayed }: FetchedInstruction,
    instructionPointer: number,
  ): Promise<EngineError | null> {
    // Recording starts at the loop-start token itself and covers every byte
    // while a loop is open, no-ops included, so each body is complete on replay
    if (opcode === OPCODES.LOOP_START || !this.context.loopStack.isEmpty()) {
      this.remember(instructionPointer, opcode)
    }

    const handler = this.registry.getHandler(opcode)
    if (handler === undefined) {
      this.log(instructionPointer, opcode, 'NOOP', replayed)
      return null
    }

    let result: InstructionResult
    try {
      result = await handler.execute(this.context)
    } catch (thrown) {
      const cause = toError(thrown)
      return new EngineError(
        ENGINE_ERRORS.HANDLER,
        `${handler.name} handler failed: ${cause.message}`,
        null,
        { cause },
      ).at(instructionPointer)
    }

    this.log(instructionPointer, opcode, handler.name, replayed)

    return result.error ? result.error.at(instructionPointer) : null
  }

  /**
   * Consume one byte of a loop body entered with a zero guard.
   * Nested markers are counted so the matching loop end closes the skip.
   */
  private skip(
    { opcode, replayed }: FetchedInstruction,
    instructionPointer: number,
  ): void {
    if (!this.context.loopStack.isEmpty()) {
      this.remember(instructionPointer, opcode)
    }

    if (opcode === OPCODES.LOOP_START) {
      this.context.skipDepth++
    } else if (opcode === OPCODES.LOOP_END) {
      this.context.skipDepth--
    }

    this.log(instructionPointer, opcode, 'SKIP', replayed)
  }

  private remember(instructionPointer: number, opcode: number): void {
    if (this.cache === null) {
      this.cache = new InstructionCache()
    }
    this.cache.record(instructionPointer, opcode)
  }

  private log(
    instructionPointer: number,
    opcode: number,
    name: string,
    replayed: boolean,
  ): void {
    if (!this.options.trace) return

    this.executionLogs.push({
      step: this.executionStep,
      instructionPointer,
      opcode,
      name,
      dataPointer: this.tape.pointer,
      cell: this.tape.read(),
      replayed,
    })
  }

  private finish(): Safe<CellArray, EngineError> {
    const openLoops = this.context.loopStack.getDepth()
    if (openLoops > 0 || this.context.skipDepth > 0) {
      logger.warn('Run: input ended inside an open loop', {
        openLoops,
        skipDepth: this.context.skipDepth,
        instructionPointer: this.context.instructionPointer,
      })
    }

    logger.debug('Run: finished', {
      steps: this.executionStep,
      dataPointer: this.tape.pointer,
    })
    return safeResult(this.tape.snapshot())
  }

  private abort(error: EngineError): Safe<CellArray, EngineError> {
    logger.error('Run: aborted', error, {
      code: error.code,
      instructionPointer: error.instructionPointer,
    })
    return safeError(error)
  }
}
