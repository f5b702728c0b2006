import type { LoopStack } from '@bfstream/types'

/**
 * Loop Stack Implementation
 *
 * Start positions of the loops currently open, innermost on top
 */
export class EngineLoopStack implements LoopStack {
  private positions: number[] = []

  /**
   * Build a stack from values listed top first, `of(2, 1)` pops 2 before 1
   */
  static of(...values: number[]): EngineLoopStack {
    const stack = new EngineLoopStack()
    for (let i = values.length - 1; i >= 0; i--) {
      stack.push(values[i])
    }
    return stack
  }

  peek(): number | undefined {
    return this.positions[this.positions.length - 1]
  }

  push(position: number): void {
    this.positions.push(position)
  }

  pop(): number | undefined {
    return this.positions.pop()
  }

  getDepth(): number {
    return this.positions.length
  }

  isEmpty(): boolean {
    return this.positions.length === 0
  }

  clear(): void {
    this.positions = []
  }

  equals(
    other: LoopStack,
    compare: (a: number, b: number) => boolean = (a, b) => a === b,
  ): boolean {
    const mine = this.toArray()
    const theirs = other.toArray()
    if (mine.length !== theirs.length) return false
    return mine.every((position, index) => compare(position, theirs[index]))
  }

  toArray(): number[] {
    return [...this.positions].reverse()
  }
}
