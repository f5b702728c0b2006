/**
 * Instruction Sources
 *
 * Forward-only providers of program bytes for the engine
 */

import { createReadStream } from 'node:fs'
import {
  type InstructionSource,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@bfstream/types'
import { ByteReader, type Chunk } from './byte-reader'

/**
 * Program held in memory, handed out one byte per read
 */
export class BytesSource implements InstructionSource {
  private readonly bytes: Uint8Array
  private offset = 0

  constructor(program: string | Uint8Array) {
    this.bytes = typeof program === 'string' ? Buffer.from(program) : program
  }

  /** Bytes delivered so far */
  get delivered(): number {
    return this.offset
  }

  read(): SafePromise<number | null> {
    if (this.offset >= this.bytes.length) {
      return Promise.resolve(safeResult(null))
    }
    return Promise.resolve(safeResult(this.bytes[this.offset++]))
  }
}

/**
 * Program arriving as chunks from any async iterable: a Node Readable,
 * `process.stdin`, a socket, a generator
 */
export class StreamSource implements InstructionSource {
  private readonly bytes: ByteReader
  private count = 0

  constructor(chunks: AsyncIterable<Chunk>) {
    this.bytes = new ByteReader(chunks)
  }

  get delivered(): number {
    return this.count
  }

  async read(): SafePromise<number | null> {
    const [error, byte] = await safeTry(this.bytes.next())
    if (error) return safeError(error)
    if (byte !== null) this.count++
    return safeResult(byte)
  }

  close(): Promise<void> {
    return this.bytes.close()
  }
}

/**
 * Stream a program from a file. A missing file surfaces on the first read.
 */
export function openFileSource(path: string): StreamSource {
  return new StreamSource(createReadStream(path))
}

export function toInstructionSource(
  program: string | Uint8Array | AsyncIterable<Chunk> | InstructionSource,
): InstructionSource {
  if (typeof program === 'string' || program instanceof Uint8Array) {
    return new BytesSource(program)
  }
  if (isChunkStream(program)) {
    return new StreamSource(program)
  }
  return program
}

// Readables also carry a `read` method, so test for the iterator protocol
function isChunkStream(
  value: AsyncIterable<Chunk> | InstructionSource,
): value is AsyncIterable<Chunk> {
  return Symbol.asyncIterator in value
}
