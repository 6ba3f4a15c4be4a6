/**
 * Row readers. `pg` hands back untyped rows; these narrow single columns
 * and fail loudly when the schema and the code disagree.
 */

export function readId(row: Record<string, unknown> | undefined, column = 'id'): number {
  const value = row?.[column]
  if (typeof value === 'number' && Number.isInteger(value)) return value
  if (typeof value === 'string' && /^\d+$/.test(value)) return Number(value)
  throw new Error(`Expected integer column "${column}", got ${typeof value}`)
}

export function readOptionalString(row: Record<string, unknown>, column: string): string | undefined {
  const value = row[column]
  return typeof value === 'string' ? value : undefined
}

export function readInt(row: Record<string, unknown>, column: string, fallback = 0): number {
  const value = row[column]
  if (typeof value === 'number') return value
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value)
  return fallback
}

export function readDate(row: Record<string, unknown>, column: string): Date {
  const value = row[column]
  if (value instanceof Date) return value
  if (typeof value === 'string' || typeof value === 'number') {
    const parsed = new Date(value)
    if (!Number.isNaN(parsed.getTime())) return parsed
  }
  throw new Error(`Expected timestamp column "${column}"`)
}
