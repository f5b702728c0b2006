/**
 * Instruction Cache
 *
 * Replay buffer for instruction bytes already consumed from a forward-only
 * source. Keyed by absolute instruction position, so bodies of nested loops
 * share one cache and no ordering has to be maintained.
 *
 * A position keeps the byte it was first recorded with; the source can only
 * ever deliver one byte per position within a run.
 */
export class InstructionCache {
  private readonly entries = new Map<number, number>()

  get(position: number): number | undefined {
    return this.entries.get(position)
  }

  has(position: number): boolean {
    return this.entries.has(position)
  }

  /**
   * @returns false when the position was already recorded
   */
  record(position: number, opcode: number): boolean {
    if (this.entries.has(position)) return false
    this.entries.set(position, opcode)
    return true
  }

  get size(): number {
    return this.entries.size
  }

  positions(): number[] {
    return Array.from(this.entries.keys()).sort((a, b) => a - b)
  }
}
