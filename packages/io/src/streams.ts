import type { Writable } from 'node:stream'

/**
 * Write text and resolve once the stream has accepted it
 */
export function writeText(stream: Writable, text: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(text, (error) => {
      if (error) reject(error)
      else resolve()
    })
  })
}
