/**
 * Output Writers
 *
 * Providers for the `.` instruction
 */

import { type FileHandle, open } from 'node:fs/promises'
import type { Writable } from 'node:stream'
import {
  type OutputWriter,
  type SafePromise,
  safeError,
  safeResult,
  safeTry,
} from '@bfstream/types'
import { writeText } from './streams'

export type OutputFormat = 'decimal' | 'char'

function formatValue(value: number, format: OutputFormat): string {
  return format === 'char' ? String.fromCharCode(value) : `${value}\n`
}

/**
 * Keeps every value in memory
 */
export class CollectingWriter implements OutputWriter {
  public readonly values: number[] = []
  public closed = false

  /**
   * @param failAfter - accept this many values, then fail every write
   */
  constructor(private readonly failAfter: number = Number.POSITIVE_INFINITY) {}

  write(value: number): SafePromise<void> {
    if (this.values.length >= this.failAfter) {
      return Promise.resolve(safeError(new Error('output error')))
    }
    this.values.push(value)
    return Promise.resolve(safeResult(undefined))
  }

  /** Values as characters */
  text(): string {
    return this.values.map((value) => String.fromCharCode(value)).join('')
  }

  close(): SafePromise<void> {
    this.closed = true
    return Promise.resolve(safeResult(undefined))
  }
}

/**
 * Prints each value, one decimal per line by default
 */
export class StdoutWriter implements OutputWriter {
  constructor(
    private readonly format: OutputFormat = 'decimal',
    private readonly stream: Writable = process.stdout,
  ) {}

  write(value: number): SafePromise<void> {
    return safeTry(writeText(this.stream, formatValue(value, this.format)))
  }

  close(): SafePromise<void> {
    return Promise.resolve(safeResult(undefined))
  }
}

/**
 * Appends each value to a file as a decimal followed by a space
 */
export class FileOutputWriter implements OutputWriter {
  private constructor(private readonly handle: FileHandle) {}

  static async open(path: string): SafePromise<FileOutputWriter> {
    const [error, handle] = await safeTry(open(path, 'a'))
    if (error) {
      return safeError(
        new Error(`failed to open file: ${error.message}`, { cause: error }),
      )
    }
    return safeResult(new FileOutputWriter(handle))
  }

  async write(value: number): SafePromise<void> {
    const [error] = await safeTry(this.handle.write(`${value} `))
    if (error) return safeError(error)
    return safeResult(undefined)
  }

  close(): SafePromise<void> {
    return safeTry(this.handle.close())
  }
}
