import { inspect } from 'node:util'
import { TemplateError } from './errors'

/**
 * Placeholder specifiers understood by {@link format}.
 */
export type Specifier = 's' | 'd' | 'x' | 'X' | 'b' | 'o' | 'c' | 'e' | 'any' | ''

type ArgumentOf<S extends string> = S extends 's'
  ? string
  : S extends 'd' | 'x' | 'X' | 'b' | 'o' | 'c'
  ? number | bigint
  : S extends 'e'
  ? number
  : S extends 'any' | ''
  ? unknown
  : never

/**
 * The argument type a placeholder body such as `d` or `s:>8` accepts.
 */
export type ArgumentFor<Placeholder extends string> =
  Placeholder extends `${infer S}:${string}` ? ArgumentOf<S> : ArgumentOf<Placeholder>

/**
 * FormatArgs computes the argument tuple of a template literal type, one
 * element per placeholder in order of appearance. Escaped braces (`{{`, `}}`)
 * take no argument. A template with an unterminated placeholder yields
 * `never`, so it cannot be called with any arguments. Non-literal `string`
 * templates accept any arguments and are checked when they are rendered.
 */
export type FormatArgs<T extends string> = string extends T
  ? unknown[]
  : T extends `${string}{${infer Rest}`
  ? Rest extends `{${infer After}`
    ? FormatArgs<After>
    : Rest extends `${infer Placeholder}}${infer Tail}`
    ? [ArgumentFor<Placeholder>, ...FormatArgs<Tail>]
    : never
  : []

type Align = '<' | '^' | '>'

interface Placeholder {
  specifier: Specifier
  fill: string
  align: Align
  width: number
}

const specifiers: readonly string[] = [
  's',
  'd',
  'x',
  'X',
  'b',
  'o',
  'c',
  'e',
  'any',
  '',
] satisfies Specifier[]

const numeric: readonly Specifier[] = ['d', 'x', 'X', 'b', 'o', 'e']

const radix = { x: 16, X: 16, b: 2, o: 8 } as const

const optionsPattern = /^(?:(.)?([<^>]))?(\d+)?$/u

/**
 * Renders a brace template with the given arguments. Each `{spec}` or
 * `{spec:options}` placeholder consumes the next argument; `{{` and `}}` stand
 * for literal braces. Supported specifiers are `s` (string), `d` (decimal
 * number or bigint), `x`/`X` (hexadecimal), `b` (binary), `o` (octal), `c`
 * (code point), `e` (scientific notation) and `any` or an empty body (any
 * value, inspected unless it is a string). Options are
 * `[[fill]align][width]`, where align is one of `<`, `^` and `>`.
 *
 * The argument list is typed from the template via {@link FormatArgs}. A
 * template that does not fit its arguments throws a {@link TemplateError}.
 *
 * ```ts
 * format('Hello {s}! Number: {d}\n', 'world', 42)
 * // 'Hello world! Number: 42\n'
 * ```
 */
export function format<T extends string>(
  template: T,
  ...args: FormatArgs<T>
): string {
  return render(template, args)
}

/**
 * Untyped form of {@link format} for templates and arguments that are only
 * known at run time.
 */
export function render(template: string, args: readonly unknown[]): string {
  let out = ''
  let next = 0
  let start = 0
  let i = 0

  while (i < template.length) {
    const ch = template[i]
    if (ch !== '{' && ch !== '}') {
      i++
      continue
    }

    out += template.slice(start, i)

    if (template[i + 1] === ch) {
      out += ch
      i += 2
      start = i
      continue
    }

    if (ch === '}') {
      throw new TemplateError(`unmatched '}' at offset ${i}`)
    }

    const close = template.indexOf('}', i + 1)
    if (close < 0) {
      throw new TemplateError(`unterminated placeholder at offset ${i}`)
    }

    const placeholder = parsePlaceholder(template.slice(i + 1, close))
    if (next >= args.length) {
      throw new TemplateError(
        `missing argument for placeholder ${next} at offset ${i}`,
      )
    }
    out += pad(renderArgument(placeholder.specifier, args[next]), placeholder)
    next++
    i = close + 1
    start = i
  }

  if (next < args.length) {
    throw new TemplateError(
      `too many arguments: template uses ${next}, got ${args.length}`,
    )
  }

  return out + template.slice(start)
}

function parsePlaceholder(body: string): Placeholder {
  const colon = body.indexOf(':')
  const spec = colon < 0 ? body : body.slice(0, colon)
  const options = colon < 0 ? '' : body.slice(colon + 1)

  if (!isSpecifier(spec)) {
    throw new TemplateError(`unknown placeholder {${body}}`)
  }

  const match = optionsPattern.exec(options)
  if (!match) {
    throw new TemplateError(`invalid options in placeholder {${body}}`)
  }
  const [, fill, align, width] = match

  return {
    specifier: spec,
    fill: fill ?? ' ',
    align: isAlign(align) ? align : numeric.includes(spec) ? '>' : '<',
    width: width ? Number(width) : 0,
  }
}

function renderArgument(specifier: Specifier, value: unknown): string {
  switch (specifier) {
    case 's':
      if (typeof value !== 'string') {
        throw mismatch(specifier, 'a string', value)
      }
      return value
    case 'd':
      if (typeof value !== 'number' && typeof value !== 'bigint') {
        throw mismatch(specifier, 'a number', value)
      }
      return String(value)
    case 'x':
    case 'X':
    case 'b':
    case 'o': {
      const digits = integer(specifier, value).toString(radix[specifier])
      return specifier === 'X' ? digits.toUpperCase() : digits
    }
    case 'c': {
      const code = Number(integer(specifier, value))
      if (code < 0 || code > 0x10ffff) {
        throw new TemplateError(`{c} expects a code point, got ${code}`)
      }
      return String.fromCodePoint(code)
    }
    case 'e':
      if (typeof value !== 'number') {
        throw mismatch(specifier, 'a number', value)
      }
      return value.toExponential()
    case 'any':
    case '':
      return typeof value === 'string' ? value : inspect(value)
  }
}

function integer(specifier: Specifier, value: unknown): number | bigint {
  if (typeof value === 'bigint') {
    return value
  }
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value
  }
  throw mismatch(specifier, 'an integer', value)
}

function pad(text: string, { fill, align, width }: Placeholder): string {
  const length = [...text].length
  if (length >= width) {
    return text
  }
  const padding = width - length
  switch (align) {
    case '<':
      return text + fill.repeat(padding)
    case '>':
      return fill.repeat(padding) + text
    case '^': {
      const left = Math.floor(padding / 2)
      return fill.repeat(left) + text + fill.repeat(padding - left)
    }
  }
}

function mismatch(specifier: Specifier, expected: string, value: unknown) {
  return new TemplateError(
    `{${specifier}} expects ${expected}, got ${describeValue(value)}`,
  )
}

function describeValue(value: unknown) {
  if (value === null) {
    return 'null'
  }
  return typeof value === 'object' ? 'an object' : typeof value
}

function isSpecifier(value: string): value is Specifier {
  return specifiers.includes(value)
}

function isAlign(value: string | undefined): value is Align {
  return value === '<' || value === '^' || value === '>'
}
