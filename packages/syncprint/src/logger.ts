import { inspect } from 'node:util'
import type { ConsolaInstance, ConsolaReporter, LogObject } from 'consola'
import { LogLevels, createConsola } from 'consola'
import { getOutputContext } from './context'
import { debugPrint } from './print'
import type { WriterConfig } from './writer'

/**
 * Creates a new {@link ConsolaInstance} that writes through the given writer
 * config, which defaults to the stderr config of the current output context.
 * Log lines take the same lock as {@link print}, so they never interleave with
 * other output on that config. A line that cannot be written is dropped. The
 * verbosity can be controlled through the `enabled` option: when enabled, the
 * default logging level is used, otherwise the logger is silenced.
 */
export function createLogger(
  config: WriterConfig = getOutputContext().stderr,
  options?: { enabled?: boolean },
): ConsolaInstance {
  const enabled = options?.enabled ?? true

  return createConsola({
    reporters: [createReporter(config)],
    level: enabled ? LogLevels.info : LogLevels.silent,
  })
}

/**
 * Returns a consola reporter that prints each log object as one line to
 * `config`. Lines of type `log` are printed as they are; other types are
 * prefixed with the type and, if present, the tag: `[warn] [db] slow query`.
 */
export function createReporter(config: WriterConfig): ConsolaReporter {
  return {
    log(logObj) {
      void debugPrint(config, '{s}\n', formatLogObject(logObj))
    },
  }
}

function formatLogObject(logObj: LogObject) {
  const prefix = [
    logObj.type === 'log' ? '' : `[${logObj.type}] `,
    logObj.tag ? `[${logObj.tag}] ` : '',
  ].join('')

  const message = logObj.args
    .map((arg: unknown) => (typeof arg === 'string' ? arg : inspect(arg)))
    .join(' ')

  return prefix + message
}
