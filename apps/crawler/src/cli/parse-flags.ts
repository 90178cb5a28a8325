/**
 * Flag parsing for the crawler CLI: `--key value`, `--key=value` and bare
 * boolean `--key`.
 */

export type Flags = Record<string, string | boolean>

/** Thrown for bad invocations; the CLI exits with code 2 */
export class UsageError extends Error {
  readonly exitCode = 2

  constructor(message: string) {
    super(message)
    this.name = 'UsageError'
  }
}

export function parseFlags(argv: readonly string[], booleanFlags: ReadonlySet<string> = new Set()): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      throw new UsageError(`Unexpected argument: ${token}`)
    }

    const body = token.slice(2)
    const eq = body.indexOf('=')
    if (eq > 0) {
      flags[body.slice(0, eq)] = body.slice(eq + 1)
      continue
    }

    const next = argv[i + 1]
    if (!booleanFlags.has(body) && next !== undefined && !next.startsWith('--')) {
      flags[body] = next
      i++
    } else {
      flags[body] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined
}

export function asPositiveInt(name: string, value: string | boolean | undefined): number | undefined {
  if (value === undefined) return undefined
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    throw new UsageError(`--${name} expects a positive integer`)
  }
  const parsed = Number.parseInt(value, 10)
  if (parsed < 1) {
    throw new UsageError(`--${name} expects a positive integer`)
  }
  return parsed
}

export function asChoice<T extends string>(
  name: string,
  value: string | boolean | undefined,
  choices: readonly T[]
): T | undefined {
  if (value === undefined) return undefined
  const match = choices.find(choice => choice === value)
  if (match === undefined) {
    throw new UsageError(`--${name} must be one of: ${choices.join(', ')}`)
  }
  return match
}
