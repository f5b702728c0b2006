/**
 * Input Readers
 *
 * Providers for the `,` instruction
 */

import { createReadStream } from 'node:fs'
import { access } from 'node:fs/promises'
import type { Readable, Writable } from 'node:stream'
import {
  type InputReader,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@bfstream/types'
import { ByteReader } from './byte-reader'
import { writeText } from './streams'

/**
 * Values from an in-memory list, in order.
 * Running out of values is a read failure.
 */
export class QueueInputReader implements InputReader {
  private readonly values: number[]
  /** Hints received, one per read */
  public readonly prompts: string[] = []

  constructor(values: Iterable<number> = []) {
    this.values = [...values]
  }

  read(hint: string): SafePromise<number> {
    this.prompts.push(hint)
    const value = this.values.shift()
    if (value === undefined) {
      return Promise.resolve(safeError(new Error('no more input')))
    }
    return Promise.resolve(safeResult(value))
  }

  close(): SafePromise<void> {
    return Promise.resolve(safeResult(undefined))
  }
}

/**
 * Successive bytes of a file as input values
 */
export class FileInputReader implements InputReader {
  private readonly bytes: ByteReader

  private constructor(path: string) {
    this.bytes = new ByteReader(createReadStream(path))
  }

  static async open(path: string): SafePromise<FileInputReader> {
    const [error] = await safeTry(access(path))
    if (error) return safeError(error)
    return safeResult(new FileInputReader(path))
  }

  async read(_hint: string): SafePromise<number> {
    const [error, byte] = await safeTry(this.bytes.next())
    if (error) return safeError(error)
    if (byte === null) return safeError(new Error('end of input file'))
    return safeResult(byte)
  }

  close(): SafePromise<void> {
    return safeTry(this.bytes.close())
  }
}

/**
 * Terminal-like input stream; stdin in production
 */
export type TerminalInput = Readable & {
  isTTY?: boolean
  setRawMode?: (mode: boolean) => unknown
}

/**
 * Reads one byte per value from stdin after printing the hint.
 * On a TTY the terminal is switched to raw mode so a single key press is
 * enough, and the key is echoed since raw mode does not.
 */
export class StdinInputReader implements InputReader {
  private readonly bytes: ByteReader
  private readonly raw: boolean

  constructor(
    private readonly input: TerminalInput = process.stdin,
    private readonly prompt: Writable = process.stdout,
  ) {
    this.raw = input.isTTY === true && input.setRawMode !== undefined
    if (this.raw) {
      input.setRawMode?.(true)
    }
    this.bytes = new ByteReader(input)
  }

  async read(hint: string): SafePromise<number> {
    const [promptError] = await safeTry(writeText(this.prompt, `${hint}: `))
    if (promptError) {
      return safeError(
        new Error(`failed to print message: ${promptError.message}`, {
          cause: promptError,
        }),
      )
    }

    const [error, byte] = await safeTry(this.bytes.next())
    if (error) return safeError(error)
    if (byte === null) return safeError(new Error('stdin closed'))

    if (this.raw) {
      const [echoError] = await safeTry(
        writeText(this.prompt, `${String.fromCharCode(byte)}\r\n`),
      )
      if (echoError) return safeError(echoError)
    }

    return safeResult(byte)
  }

  async close(): SafePromise<void> {
    if (this.raw) {
      this.input.setRawMode?.(false)
      const [error] = await safeTry(writeText(this.prompt, '\r'))
      if (error) {
        return safeError(
          new Error(`failed to restore terminal: ${error.message}`, {
            cause: error,
          }),
        )
      }
    }
    return safeResult(undefined)
  }
}
