/**
 * PrintError is the single error kind surfaced by {@link print} and the
 * standard-stream entry points. It is raised when output cannot currently be
 * delivered, whether the template could not be rendered or the destination
 * refused the bytes. The original failure is available as `cause`.
 */
export class PrintError extends Error {
  name = 'PrintError'
}

/**
 * TemplateError reports a template that does not match its arguments: an
 * unknown placeholder, a stray or unterminated brace, a wrong argument count,
 * or an argument of the wrong type for its placeholder.
 */
export class TemplateError extends Error {
  name = 'TemplateError'
}

/**
 * Raised by a {@link MemorySink} when a drain would write past its capacity.
 */
export class NoSpaceLeftError extends Error {
  name = 'NoSpaceLeftError'
}

/**
 * Raised by a {@link StreamSink} when its stream has been destroyed or ended.
 * If the stream failed with an error before, that error is the `cause`.
 */
export class StreamClosedError extends Error {
  name = 'StreamClosedError'
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
