/**
 * Capability providers: instruction sources, input readers and output writers
 */

export { ByteReader, type Chunk } from './src/byte-reader'
export { QueueInputReader, FileInputReader, StdinInputReader, type TerminalInput } from './src/readers'
export {
  BytesSource,
  openFileSource,
  StreamSource,
  toInstructionSource,
} from './src/sources'
export {
  CollectingWriter,
  FileOutputWriter,
  type OutputFormat,
  StdoutWriter,
} from './src/writers'
