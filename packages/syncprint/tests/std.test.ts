import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import {
  DEFAULT_BUFFER_SIZE,
  OutputContext,
  PrintError,
  StreamSink,
  debug,
  debugStderr,
  debugStdout,
  getOutputContext,
  groupStderr,
  groupStdout,
  setOutputContext,
  writeStderr,
  writeStdout,
} from '../src'
import type { WriterConfig } from '../src'
import { collectingStream, failingStream } from './testutils'

describe('OutputContext', () => {
  it('creates each config once', () => {
    const context = new OutputContext({
      stdout: collectingStream().stream,
      stderr: collectingStream().stream,
    })

    expect(context.stdout).toBe(context.stdout)
    expect(context.stderr).toBe(context.stderr)
  })

  it('gives each stream its own lock and sink', () => {
    const context = new OutputContext({
      stdout: collectingStream().stream,
      stderr: collectingStream().stream,
    })

    expect(context.stdout.lock).not.toBe(context.stderr.lock)
    expect(context.stdout.sink).not.toBe(context.stderr.sink)
  })

  it('defaults to the process streams and the default buffer size', () => {
    const { sink } = new OutputContext().stdout

    expect(sink).toBeInstanceOf(StreamSink)
    expect(sink).toHaveProperty('stream', process.stdout)
    expect(sink).toHaveProperty('bufferSize', DEFAULT_BUFFER_SIZE)
  })

  it('rejects an invalid buffer size', () => {
    const { stream } = collectingStream()

    expect(() => new OutputContext({ stdout: stream, bufferSize: 0 })).toThrow(
      RangeError,
    )
    expect(() => new OutputContext({ bufferSize: 1.5 })).toThrow(RangeError)
  })

  it('adds one error listener per stream', () => {
    const { stream } = collectingStream()
    const before = stream.listenerCount('error')

    for (let i = 0; i < 20; i++) {
      const context = new OutputContext({ stdout: stream, stderr: stream })
      expect(context.stdout.sink).toBeInstanceOf(StreamSink)
      expect(context.stderr.sink).toBeInstanceOf(StreamSink)
    }

    expect(stream.listenerCount('error')).toBe(before + 1)
  })

  it('takes a buffer size', () => {
    const { sink } = new OutputContext({
      stderr: collectingStream().stream,
      bufferSize: 64,
    }).stderr

    expect(sink).toHaveProperty('bufferSize', 64)
  })
})

describe('standard streams', () => {
  let previous: OutputContext | undefined
  let stdout: ReturnType<typeof collectingStream>
  let stderr: ReturnType<typeof collectingStream>

  beforeEach(() => {
    stdout = collectingStream()
    stderr = collectingStream()
    previous = setOutputContext(
      new OutputContext({ stdout: stdout.stream, stderr: stderr.stream }),
    )
  })

  afterEach(() => {
    setOutputContext(previous ?? new OutputContext())
  })

  it('installs the output context', () => {
    const context = getOutputContext()
    expect(context.stdout.sink).toBeInstanceOf(StreamSink)
    expect(setOutputContext(context)).toBe(context)
  })

  it('writes to stdout', async () => {
    await writeStdout('Hello {s}! Number: {d}\n', 'world', 42)

    expect(stdout.output()).toBe('Hello world! Number: 42\n')
    expect(stderr.output()).toBe('')
  })

  it('writes to stderr', async () => {
    await writeStderr('warning: {s}\n', 'disk almost full')

    expect(stderr.output()).toBe('warning: disk almost full\n')
    expect(stdout.output()).toBe('')
  })

  it('writes debug output', async () => {
    await debugStdout('out {d}\n', 1)
    await debugStderr('err {d}\n', 2)
    await debug.stdout('out {d}\n', 3)
    await debug.stderr('err {d}\n', 4)

    expect(stdout.output()).toBe('out 1\nout 3\n')
    expect(stderr.output()).toBe('err 2\nerr 4\n')
  })

  it('groups output per stream', async () => {
    const order = await Promise.all([
      groupStdout(async () => {
        await writeStdout('a\n')
        await writeStdout('b\n')
        return 'stdout'
      }),
      groupStderr(() => writeStderr('c\n').then(() => 'stderr')),
    ])

    expect(order).toEqual(['stdout', 'stderr'])
    expect(stdout.output()).toBe('a\nb\n')
    expect(stderr.output()).toBe('c\n')
  })

  describe('when a stream is unavailable', () => {
    class UnavailableContext extends OutputContext {
      get stdout(): WriterConfig {
        throw new Error('no stdout')
      }
    }

    beforeEach(() => {
      setOutputContext(new UnavailableContext())
    })

    it('rejects the write function', async () => {
      const err = await writeStdout('lost\n').then(
        () => undefined,
        (err: unknown) => err,
      )

      expect(err).toBeInstanceOf(PrintError)
      expect(err).toHaveProperty('cause.message', 'no stdout')
    })

    it('resolves the debug function', async () => {
      await expect(debugStdout('lost\n')).resolves.toBeUndefined()
      await expect(debug.stdout('lost {d}\n', 1)).resolves.toBeUndefined()
    })
  })

  describe('when the stream fails', () => {
    beforeEach(() => {
      setOutputContext(
        new OutputContext({
          stdout: failingStream(),
          stderr: failingStream(),
        }),
      )
    })

    it('rejects the write functions', async () => {
      await expect(writeStdout('lost\n')).rejects.toBeInstanceOf(PrintError)
      await expect(writeStderr('lost\n')).rejects.toBeInstanceOf(PrintError)
    })

    it('resolves the debug functions', async () => {
      await expect(debugStdout('lost\n')).resolves.toBeUndefined()
      await expect(debugStderr('lost\n')).resolves.toBeUndefined()
      expect(getOutputContext().stdout.lock.locked).toBe(false)
      expect(getOutputContext().stderr.lock.locked).toBe(false)
    })
  })
})
