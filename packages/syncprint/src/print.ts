import { PrintError, errorMessage } from './errors'
import type { FormatArgs } from './format'
import { format } from './format'
import type { WriterConfig } from './writer'

const encoder = new TextEncoder()

/**
 * Formats the template with the given arguments and writes the result to the
 * sink of `config`, flushing it before the returned promise resolves. The
 * config's lock is held across formatting, writing and flushing, so the output
 * of one call is never interleaved with the output of another call on the
 * same config. The lock is released on every exit path.
 *
 * Any failure rejects with a {@link PrintError} carrying the underlying error
 * as `cause`: a template that does not fit its arguments, an argument that
 * cannot be rendered, or a destination that refuses the bytes. Bytes that
 * were buffered but not yet drained are dropped. Nothing is retried.
 */
export async function print<T extends string>(
  config: WriterConfig,
  template: T,
  ...args: FormatArgs<T>
): Promise<void> {
  await config.lock.run(async () => {
    try {
      await config.sink.write(encoder.encode(format(template, ...args)))
      await config.sink.flush()
    } catch (err) {
      config.sink.discard()
      throw new PrintError(`print failed: ${errorMessage(err)}`, {
        cause: err,
      })
    }
  })
}

/**
 * Same as {@link print}, but a {@link PrintError} is discarded and the
 * returned promise resolves normally. Meant for best-effort diagnostics where
 * a failed write, like one to a terminal that has gone away during shutdown,
 * must not reach the caller.
 */
export async function debugPrint<T extends string>(
  config: WriterConfig,
  template: T,
  ...args: FormatArgs<T>
): Promise<void> {
  try {
    await print(config, template, ...args)
  } catch (err) {
    if (!(err instanceof PrintError)) {
      throw err
    }
  }
}

/**
 * Runs `fn` while holding the lock of `config`. Calls to {@link print} on the
 * same config made from within `fn` re-enter the lock, so their output reaches
 * the destination as one uninterrupted block while other callers wait.
 * Resolves with the result of `fn`; its rejection propagates unchanged.
 *
 * ```ts
 * await group(config, async () => {
 *   await print(config, 'Header\n')
 *   for (const row of rows) {
 *     await print(config, '  {s:<12}{d:>6}\n', row.name, row.count)
 *   }
 * })
 * ```
 */
export function group<T>(
  config: WriterConfig,
  fn: () => T | Promise<T>,
): Promise<T> {
  return config.lock.run(fn)
}
