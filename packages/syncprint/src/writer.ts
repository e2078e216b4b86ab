import type { RecursiveMutex } from './mutex'
import type { Sink } from './sink'

/**
 * A WriterConfig binds a {@link RecursiveMutex} to the {@link Sink} it guards.
 * Output reaches the sink only through {@link print} and the functions built
 * on it, which hold the lock for the whole format, write and flush sequence.
 * The lock must outlive every use of the sink through the config.
 */
export interface WriterConfig {
  readonly lock: RecursiveMutex
  readonly sink: Sink
}

/**
 * Creates a frozen {@link WriterConfig} from a lock and the sink it protects.
 */
export function createWriterConfig(
  lock: RecursiveMutex,
  sink: Sink,
): WriterConfig {
  return Object.freeze({ lock, sink })
}
