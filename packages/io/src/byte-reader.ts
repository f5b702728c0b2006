export type Chunk = Uint8Array | string

/**
 * Pulls single bytes out of an async chunk stream, one chunk at a time.
 * Forward-only: a byte handed out is never seen again.
 */
export class ByteReader {
  private readonly iterator: AsyncIterator<Chunk>
  private chunk: Uint8Array = new Uint8Array(0)
  private offset = 0
  private exhausted = false

  constructor(chunks: AsyncIterable<Chunk>) {
    this.iterator = chunks[Symbol.asyncIterator]()
  }

  /**
   * @returns the next byte, or null at the end of the stream
   */
  async next(): Promise<number | null> {
    while (this.offset >= this.chunk.length) {
      if (this.exhausted) return null

      const { value, done } = await this.iterator.next()
      if (done) {
        this.exhausted = true
        return null
      }
      this.chunk = typeof value === 'string' ? Buffer.from(value) : value
      this.offset = 0
    }
    return this.chunk[this.offset++]
  }

  async close(): Promise<void> {
    if (this.exhausted) return
    this.exhausted = true
    await this.iterator.return?.()
  }
}
