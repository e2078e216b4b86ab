import type { Writable } from 'node:stream'
import { NoSpaceLeftError, StreamClosedError } from './errors'

/**
 * Size in bytes of the internal buffer of the standard-stream sinks and the
 * default for every {@link BufferedSink}.
 */
export const DEFAULT_BUFFER_SIZE = 1024

/**
 * A Sink is a buffered destination for formatted output. `write` appends bytes
 * to the internal buffer and drains it to the destination whenever it fills
 * up; `flush` drains whatever is still buffered. `discard` drops buffered
 * bytes that have not reached the destination, so that output of a failed
 * call never surfaces later.
 *
 * A sink is not synchronized by itself. It is only ever used through a
 * {@link WriterConfig} whose lock guards it.
 */
export interface Sink {
  write(bytes: Uint8Array): Promise<void>
  flush(): Promise<void>
  discard(): void
}

export interface SinkOptions {
  bufferSize?: number
}

/**
 * BufferedSink implements the buffering of a {@link Sink} over a fixed-size
 * byte buffer. Subclasses provide `drain`, which hands one chunk to the
 * destination. Chunks passed to `drain` are copies and stay valid after the
 * buffer is reused.
 */
export abstract class BufferedSink implements Sink {
  private readonly buffer: Uint8Array
  private used = 0

  constructor(bufferSize: number = DEFAULT_BUFFER_SIZE) {
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new RangeError(`invalid buffer size: ${bufferSize}`)
    }
    this.buffer = new Uint8Array(bufferSize)
  }

  /**
   * Number of bytes written but not yet drained.
   */
  get buffered(): number {
    return this.used
  }

  get bufferSize(): number {
    return this.buffer.length
  }

  async write(bytes: Uint8Array): Promise<void> {
    let offset = 0
    while (offset < bytes.length) {
      if (this.used === this.buffer.length) {
        await this.flush()
      }
      const n = Math.min(this.buffer.length - this.used, bytes.length - offset)
      this.buffer.set(bytes.subarray(offset, offset + n), this.used)
      this.used += n
      offset += n
    }
  }

  async flush(): Promise<void> {
    if (this.used === 0) {
      return
    }
    const chunk = this.buffer.slice(0, this.used)
    this.used = 0
    await this.drain(chunk)
  }

  discard(): void {
    this.used = 0
  }

  protected abstract drain(chunk: Uint8Array): Promise<void>
}

interface StreamState {
  failure: Error | undefined
}

const watched = new WeakMap<Writable, StreamState>()

function watch(stream: Writable): StreamState {
  const known = watched.get(stream)
  if (known) {
    return known
  }

  const state: StreamState = { failure: undefined }
  stream.on('error', (err: Error) => {
    state.failure = err
  })
  watched.set(stream, state)
  return state
}

/**
 * StreamSink buffers output for a Node.js {@link Writable}, such as
 * `process.stdout`, a file stream or a socket the caller has opened. A drain
 * resolves once the stream has accepted the chunk and rejects with the error
 * the stream reports. Error events of the stream are captured here, so a
 * broken pipe fails the pending and all later drains instead of crashing the
 * process. A destroyed or ended stream fails with {@link StreamClosedError}.
 * All sinks over one stream share a single error listener.
 */
export class StreamSink extends BufferedSink {
  private readonly state: StreamState

  constructor(
    readonly stream: Writable,
    options: SinkOptions = {},
  ) {
    super(options.bufferSize)
    this.state = watch(stream)
  }

  protected drain(chunk: Uint8Array): Promise<void> {
    return new Promise((resolve, reject) => {
      if (this.stream.destroyed || this.stream.writableEnded) {
        reject(
          new StreamClosedError('stream is closed', {
            cause: this.state.failure,
          }),
        )
        return
      }
      this.stream.write(chunk, (err) => {
        if (err) {
          reject(err)
        } else {
          resolve()
        }
      })
    })
  }
}

/**
 * MemorySink is an in-memory destination of fixed capacity. Drained bytes are
 * appended at `end`, the end-of-data offset. A drain that does not fit into
 * the remaining capacity fails with {@link NoSpaceLeftError} and writes
 * nothing. Use it for custom in-process sinks and to capture output in tests.
 */
export class MemorySink extends BufferedSink {
  private readonly storage: Uint8Array
  private offset = 0

  constructor(capacity: number, options: SinkOptions = {}) {
    super(options.bufferSize)
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`invalid capacity: ${capacity}`)
    }
    this.storage = new Uint8Array(capacity)
  }

  get capacity(): number {
    return this.storage.length
  }

  /**
   * Offset one past the last byte written to the destination.
   */
  get end(): number {
    return this.offset
  }

  /**
   * Returns a copy of the bytes written so far.
   */
  written(): Uint8Array {
    return this.storage.slice(0, this.offset)
  }

  toString(): string {
    return new TextDecoder().decode(this.storage.subarray(0, this.offset))
  }

  /**
   * Rewinds `end` to 0 and drops anything still buffered.
   */
  reset(): void {
    this.offset = 0
    this.discard()
  }

  protected async drain(chunk: Uint8Array): Promise<void> {
    if (this.offset + chunk.length > this.storage.length) {
      throw new NoSpaceLeftError(
        `no space left: ${chunk.length} bytes do not fit into ${
          this.storage.length - this.offset
        } remaining`,
      )
    }
    this.storage.set(chunk, this.offset)
    this.offset += chunk.length
  }
}
