import { Writable } from 'node:stream'
import { MemorySink, RecursiveMutex, createWriterConfig } from '../src'
import type { SinkOptions, WriterConfig } from '../src'

export function memoryConfig(
  capacity = 512,
  options?: SinkOptions,
): { config: WriterConfig; sink: MemorySink } {
  const sink = new MemorySink(capacity, options)
  return { config: createWriterConfig(new RecursiveMutex(), sink), sink }
}

/**
 * Returns a stream that records every chunk it receives and acknowledges each
 * write on a later turn of the event loop.
 */
export function collectingStream() {
  const chunks: Buffer[] = []
  const stream = new Writable({
    write(
      chunk: Buffer,
      _encoding: BufferEncoding,
      callback: (error?: Error | null) => void,
    ) {
      chunks.push(chunk)
      setImmediate(callback)
    },
  })

  return {
    stream,
    chunks,
    output: () => Buffer.concat(chunks).toString('utf8'),
  }
}

export function failingStream(message = 'broken pipe') {
  return new Writable({
    write(
      _chunk: Buffer,
      _encoding: BufferEncoding,
      callback: (error?: Error | null) => void,
    ) {
      callback(new Error(message))
    },
  })
}

export function delay(ms: number) {
  return new Promise<void>((resolve) => setTimeout(resolve, ms))
}

export function bytes(text: string) {
  return new TextEncoder().encode(text)
}
