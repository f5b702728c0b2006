import {
  type CellArray,
  type CellWidth,
  ENGINE_ERRORS,
  EngineError,
  type Safe,
  safeError,
  safeResult,
  type Tape,
} from '@bfstream/types'

function allocateCells(width: CellWidth, capacity: number): CellArray {
  switch (width) {
    case 8:
      return new Int8Array(capacity)
    case 16:
      return new Int16Array(capacity)
    case 32:
      return new Int32Array(capacity)
  }
}

/**
 * Cell Tape Implementation
 *
 * Fixed-capacity run of signed cells backed by a typed array, so
 * increments and writes wrap exactly like the chosen integer width.
 * The data pointer stays within [0, capacity) after every call;
 * a move that would leave the tape fails and changes nothing.
 */
export class CellTape implements Tape {
  public readonly cells: CellArray
  public readonly capacity: number
  public readonly width: CellWidth
  private dataPointer = 0

  constructor(capacity: number, width: CellWidth = 32) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`tape capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
    this.width = width
    this.cells = allocateCells(width, capacity)
  }

  get pointer(): number {
    return this.dataPointer
  }

  moveRight(): Safe<number, EngineError> {
    if (this.dataPointer >= this.capacity - 1) {
      return safeError(
        new EngineError(ENGINE_ERRORS.BOUNDARY, 'shift+ moves out of boundary'),
      )
    }
    this.dataPointer++
    return safeResult(this.dataPointer)
  }

  moveLeft(): Safe<number, EngineError> {
    if (this.dataPointer <= 0) {
      return safeError(
        new EngineError(ENGINE_ERRORS.BOUNDARY, 'shift- moves out of boundary'),
      )
    }
    this.dataPointer--
    return safeResult(this.dataPointer)
  }

  moveTo(index: number): Safe<number, EngineError> {
    if (!Number.isInteger(index) || index < 0 || index >= this.capacity) {
      return safeError(
        new EngineError(
          ENGINE_ERRORS.BOUNDARY,
          `cell ${index} is outside the tape [0, ${this.capacity})`,
        ),
      )
    }
    this.dataPointer = index
    return safeResult(this.dataPointer)
  }

  increment(): number {
    this.cells[this.dataPointer] += 1
    return this.cells[this.dataPointer]
  }

  decrement(): number {
    this.cells[this.dataPointer] -= 1
    return this.cells[this.dataPointer]
  }

  read(): number {
    return this.cells[this.dataPointer]
  }

  /**
   * @returns the stored value, wrapped to the cell width
   */
  write(value: number): number {
    this.cells[this.dataPointer] = value
    return this.cells[this.dataPointer]
  }

  reset(): void {
    this.dataPointer = 0
  }

  snapshot(): CellArray {
    return this.cells.slice()
  }
}
