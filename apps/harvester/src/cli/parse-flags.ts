export type Flags = Record<string, string | boolean>

/**
 * `--key value` pairs; consecutive non-flag tokens join into one value and
 * a flag with no value is `true`. Positional tokens are ignored.
 */
export function parseFlags(argv: string[]): Flags {
  const flags: Flags = {}

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i]
    if (!token.startsWith('--')) {
      continue
    }

    const key = token.slice(2)
    const valueTokens: string[] = []
    let j = i + 1
    while (j < argv.length && !argv[j].startsWith('--')) {
      valueTokens.push(argv[j])
      j++
    }

    if (valueTokens.length > 0) {
      flags[key] = valueTokens.join(' ')
      i = j - 1
    } else {
      flags[key] = true
    }
  }

  return flags
}

export function asString(value: string | boolean | undefined): string {
  return typeof value === 'string' ? value : ''
}

/**
 * Positive integer flag value; undefined when absent, NaN when present but
 * not a positive integer so the caller can reject it.
 */
export function asPositiveInt(value: string | boolean | undefined): number | undefined {
  if (value === undefined) {
    return undefined
  }
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    return Number.NaN
  }
  const parsed = Number.parseInt(value, 10)
  return parsed > 0 ? parsed : Number.NaN
}
