/**
 * Streaming Engine Types
 *
 * Shared interfaces for the engine, its instruction handlers and the
 * capability providers that feed it instructions and input values and
 * consume its output.
 */

import type { EngineError } from './errors'
import type { Safe, SafePromise } from './safe'

/** Signed cell widths the tape can be built with */
export type CellWidth = 8 | 16 | 32

export type CellArray = Int8Array | Int16Array | Int32Array

/**
 * Forward-only source of instruction bytes.
 * `read` resolves to the next byte, or null once the input is exhausted.
 */
export interface InstructionSource {
  read(): SafePromise<number | null>
}

/**
 * Input capability used by the `,` instruction.
 * The hint names the instruction asking, for interactive prompts.
 */
export interface InputReader {
  read(hint: string): SafePromise<number>
  close(): SafePromise<void>
}

/**
 * Output capability used by the `.` instruction
 */
export interface OutputWriter {
  write(value: number): SafePromise<void>
  close(): SafePromise<void>
}

/**
 * Fixed-size cell tape plus its data pointer
 */
export interface Tape {
  readonly cells: CellArray
  readonly capacity: number
  readonly width: CellWidth
  readonly pointer: number

  moveRight(): Safe<number, EngineError>
  moveLeft(): Safe<number, EngineError>
  moveTo(index: number): Safe<number, EngineError>
  increment(): number
  decrement(): number
  read(): number
  write(value: number): number
  reset(): void
  snapshot(): CellArray
}

export interface LoopStack {
  peek(): number | undefined
  push(position: number): void
  pop(): number | undefined
  getDepth(): number
  isEmpty(): boolean
  clear(): void
  equals(
    other: LoopStack,
    compare?: (a: number, b: number) => boolean,
  ): boolean
  /** Positions from the innermost loop outwards */
  toArray(): number[]
}

/**
 * Mutable engine state handed to every instruction handler.
 * Handlers own it exclusively for the duration of their call.
 */
export interface InstructionContext {
  tape: Tape
  /** Position of the instruction being executed; advanced by 1 after every step */
  instructionPointer: number
  loopStack: LoopStack
  /** Position of the last loop-end seen, consumed by the next loop-start */
  pendingLoopEnd: number | null
  /** Open brackets still to consume while skipping a loop body, 0 when not skipping */
  skipDepth: number
  input: InputReader
  output: OutputWriter
}

/**
 * Instruction result, the context is mutated in place
 */
export interface InstructionResult {
  error: EngineError | null // null = continue execution
}

export interface InstructionHandler {
  readonly opcode: number
  readonly name: string
  execute(
    context: InstructionContext,
  ): InstructionResult | Promise<InstructionResult>
}

export interface EngineOptions {
  /** Tape capacity in cells, 0 selects the default */
  memorySize?: number
  cellWidth?: CellWidth
  /** Maximum dispatch steps per run, null for no limit */
  stepLimit?: number | null
  /** Record every dispatched step in `executionLogs` */
  trace?: boolean
}

export interface RunOptions {
  signal?: AbortSignal
}

export interface ExecutionLogEntry {
  step: number
  instructionPointer: number
  opcode: number
  name: string
  dataPointer: number
  cell: number
  /** Served from the instruction cache rather than the source */
  replayed: boolean
}

export interface EngineStateSnapshot {
  instructionPointer: number
  dataPointer: number
  loopDepth: number
  cacheSize: number
  skipping: boolean
  running: boolean
}

export interface IEngine {
  run(
    source: InstructionSource,
    options?: RunOptions,
  ): SafePromise<CellArray, EngineError>
}
