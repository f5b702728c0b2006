import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { Readable } from 'node:stream'
import { safeResult, type InstructionSource } from '@bfstream/types'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  BytesSource,
  openFileSource,
  StreamSource,
  toInstructionSource,
} from '../sources'

async function drain(source: InstructionSource): Promise<number[]> {
  const bytes: number[] = []
  for (;;) {
    const [error, byte] = await source.read()
    if (error) throw error
    if (byte === null) return bytes
    bytes.push(byte)
  }
}

describe('BytesSource', () => {
  it('should hand out one byte per read, then null', async () => {
    const source = new BytesSource('ab')

    expect(await source.read()).toEqual([undefined, 97])
    expect(await source.read()).toEqual([undefined, 98])
    expect(await source.read()).toEqual([undefined, null])
    expect(await source.read()).toEqual([undefined, null])
    expect(source.delivered).toBe(2)
  })

  it('should accept raw bytes', async () => {
    const source = new BytesSource(new Uint8Array([0x2b, 0x00, 0xff]))

    expect(await drain(source)).toEqual([0x2b, 0x00, 0xff])
  })
})

describe('StreamSource', () => {
  it('should flatten string and byte chunks in order', async () => {
    async function* chunks() {
      yield '+-'
      yield ''
      yield new Uint8Array([0x5b, 0x5d])
      yield '.'
    }
    const source = new StreamSource(chunks())

    expect(await drain(source)).toEqual([0x2b, 0x2d, 0x5b, 0x5d, 0x2e])
    expect(source.delivered).toBe(5)
  })

  it('should surface a failing stream as a read error', async () => {
    async function* chunks() {
      yield '+'
      throw new Error('connection lost')
    }
    const source = new StreamSource(chunks())

    expect(await source.read()).toEqual([undefined, 0x2b])
    const [error] = await source.read()
    expect(error?.message).toBe('connection lost')
  })

  it('should read from a Node readable', async () => {
    const source = new StreamSource(Readable.from(['>', '<']))

    expect(await drain(source)).toEqual([0x3e, 0x3c])
  })
})

describe('openFileSource', () => {
  let dir: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'bfstream-source-'))
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('should stream the file contents', async () => {
    const path = join(dir, 'program.b')
    await writeFile(path, '++[-]')

    const source = openFileSource(path)

    expect(await drain(source)).toEqual([0x2b, 0x2b, 0x5b, 0x2d, 0x5d])
  })

  it('should fail the first read for a missing file', async () => {
    const source = openFileSource(join(dir, 'missing.b'))

    const [error] = await source.read()

    expect(error).toBeInstanceOf(Error)
    expect(source.delivered).toBe(0)
  })
})

describe('toInstructionSource', () => {
  it('should wrap strings and byte arrays', () => {
    expect(toInstructionSource('+')).toBeInstanceOf(BytesSource)
    expect(toInstructionSource(new Uint8Array([1]))).toBeInstanceOf(BytesSource)
  })

  it('should wrap readables as streams', async () => {
    const source = toInstructionSource(Readable.from(['+']))

    expect(source).toBeInstanceOf(StreamSource)
    expect(await drain(source)).toEqual([0x2b])
  })

  it('should pass sources through', () => {
    const custom: InstructionSource = {
      read: () => Promise.resolve(safeResult(null)),
    }

    expect(toInstructionSource(custom)).toBe(custom)
  })
})
