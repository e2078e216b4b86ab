import type { Writable } from 'node:stream'
import { RecursiveMutex } from './mutex'
import { DEFAULT_BUFFER_SIZE, StreamSink } from './sink'
import type { WriterConfig } from './writer'
import { createWriterConfig } from './writer'

export interface OutputContextOptions {
  /**
   * Destination of the stdout config. Defaults to `process.stdout`.
   */
  stdout?: Writable

  /**
   * Destination of the stderr config. Defaults to `process.stderr`.
   */
  stderr?: Writable

  /**
   * Internal buffer size of both sinks. Defaults to {@link DEFAULT_BUFFER_SIZE}.
   */
  bufferSize?: number
}

/**
 * OutputContext owns the writer configs of the standard streams. Each config
 * pairs a dedicated {@link RecursiveMutex} with a {@link StreamSink} over its
 * stream and is created on first access. Once created, a config is never
 * replaced for the lifetime of the context. Invalid options are rejected by
 * the constructor.
 */
export class OutputContext {
  private out: WriterConfig | undefined
  private err: WriterConfig | undefined

  constructor(private readonly options: OutputContextOptions = {}) {
    const { bufferSize } = options
    if (
      bufferSize !== undefined &&
      (!Number.isInteger(bufferSize) || bufferSize < 1)
    ) {
      throw new RangeError(`invalid buffer size: ${bufferSize}`)
    }
  }

  get stdout(): WriterConfig {
    this.out ??= this.createConfig(this.options.stdout ?? process.stdout)
    return this.out
  }

  get stderr(): WriterConfig {
    this.err ??= this.createConfig(this.options.stderr ?? process.stderr)
    return this.err
  }

  private createConfig(stream: Writable) {
    return createWriterConfig(
      new RecursiveMutex(),
      new StreamSink(stream, {
        bufferSize: this.options.bufferSize ?? DEFAULT_BUFFER_SIZE,
      }),
    )
  }
}

let current: OutputContext | undefined

/**
 * Returns the output context of the process, creating it over
 * `process.stdout` and `process.stderr` on first use.
 */
export function getOutputContext(): OutputContext {
  current ??= new OutputContext()
  return current
}

/**
 * Replaces the output context of the process and returns the previous one.
 * Applications embedding the standard entry points into other streams install
 * their context once at startup; tests install one per case and restore the
 * previous context afterwards.
 */
export function setOutputContext(
  context: OutputContext,
): OutputContext | undefined {
  const previous = current
  current = context
  return previous
}
