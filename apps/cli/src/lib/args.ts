import { parseArgs, type ParseArgsConfig } from 'node:util'
import type { ZodType, ZodTypeDef } from 'zod'
import { InvalidOptionsError } from './errors.js'

type OptionSpec = NonNullable<ParseArgsConfig['options']>

export interface ParsedArgs {
  values: Record<string, string | boolean | undefined>
  positionals: string[]
}

const NEGATIVE_NUMBER = /^-\d|^-\.\d/

/**
 * Rewrite `--opt -30` (and `-r -30`) as `--opt=-30` for string options, so
 * negative numbers are read as values rather than as unknown flags.
 */
export function attachNegativeValues(argv: string[], options: OptionSpec): string[] {
  const longNames = new Map<string, string>()
  for (const [name, spec] of Object.entries(options)) {
    if (spec.type !== 'string') continue
    longNames.set(`--${name}`, name)
    if (spec.short !== undefined) longNames.set(`-${spec.short}`, name)
  }

  const out: string[] = []
  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]!
    if (token === '--') {
      out.push(...argv.slice(i))
      break
    }
    const name = longNames.get(token)
    const next = argv[i + 1]
    if (name !== undefined && next !== undefined && NEGATIVE_NUMBER.test(next)) {
      out.push(`--${name}=${next}`)
      i++
    } else {
      out.push(token)
    }
  }
  return out
}

/** Tokenize argv, turning parser errors into {@link InvalidOptionsError}. */
export function tokenize(argv: string[], options: OptionSpec): ParsedArgs {
  try {
    const { values, positionals } = parseArgs({
      args: attachNegativeValues(argv, options),
      options,
      allowPositionals: true,
      strict: true,
    })
    const flat: ParsedArgs['values'] = {}
    for (const [key, value] of Object.entries(values)) {
      if (typeof value === 'string' || typeof value === 'boolean') flat[key] = value
    }
    return { values: flat, positionals }
  } catch (err) {
    throw new InvalidOptionsError([err instanceof Error ? err.message : String(err)])
  }
}

/** Validate with a zod schema, collecting every issue as `path: message`. */
export function validate<Out, In>(schema: ZodType<Out, ZodTypeDef, In>, input: unknown): Out {
  const result = schema.safeParse(input)
  if (!result.success) {
    throw new InvalidOptionsError(
      result.error.issues.map((issue) =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      ),
    )
  }
  return result.data
}

export function stringValue(values: ParsedArgs['values'], key: string): string | undefined {
  const value = values[key]
  return typeof value === 'string' ? value : undefined
}

export function flagValue(values: ParsedArgs['values'], key: string): boolean {
  return values[key] === true
}
