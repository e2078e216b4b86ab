import { getOutputContext } from './context'
import { PrintError, errorMessage } from './errors'
import type { FormatArgs } from './format'
import { group, print } from './print'
import type { WriterConfig } from './writer'

type StandardStream = 'stdout' | 'stderr'

function standardConfig(name: StandardStream): WriterConfig {
  try {
    return getOutputContext()[name]
  } catch (err) {
    throw new PrintError(`${name} is unavailable: ${errorMessage(err)}`, {
      cause: err,
    })
  }
}

async function suppress(output: () => Promise<void>): Promise<void> {
  try {
    await output()
  } catch (err) {
    if (!(err instanceof PrintError)) {
      throw err
    }
  }
}

/**
 * Prints to stdout. Calls are serialized on the stdout lock and its
 * buffer is flushed before the returned promise resolves. Rejects
 * with a {@link PrintError} when the output cannot be delivered.
 */
export async function writeStdout<T extends string>(
  template: T,
  ...args: FormatArgs<T>
): Promise<void> {
  await print(standardConfig('stdout'), template, ...args)
}

/**
 * Prints to stderr, the same way {@link writeStdout} prints to stdout.
 */
export async function writeStderr<T extends string>(
  template: T,
  ...args: FormatArgs<T>
): Promise<void> {
  await print(standardConfig('stderr'), template, ...args)
}

/**
 * Prints to stdout and silently returns on failure.
 */
export function debugStdout<T extends string>(
  template: T,
  ...args: FormatArgs<T>
): Promise<void> {
  return suppress(() => writeStdout(template, ...args))
}

/**
 * Prints to stderr and silently returns on failure.
 */
export function debugStderr<T extends string>(
  template: T,
  ...args: FormatArgs<T>
): Promise<void> {
  return suppress(() => writeStderr(template, ...args))
}

/**
 * The error-suppressing entry points, grouped as `debug.stdout` and
 * `debug.stderr`.
 */
export const debug = {
  stdout: debugStdout,
  stderr: debugStderr,
} as const

export async function groupStdout<T>(fn: () => T | Promise<T>): Promise<T> {
  return group(standardConfig('stdout'), fn)
}

export async function groupStderr<T>(fn: () => T | Promise<T>): Promise<T> {
  return group(standardConfig('stderr'), fn)
}
