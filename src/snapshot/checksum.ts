import crypto from 'crypto'

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/**
 * JSON with object keys sorted at every level, so equal states
 * serialize identically regardless of key insertion order
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, current: unknown) => {
    if (!isPlainObject(current)) return current

    const sorted: Record<string, unknown> = {}
    for (const key of Object.keys(current).sort()) {
      sorted[key] = current[key]
    }
    return sorted
  })
}

export function checksumOf(value: unknown): string {
  return crypto.createHash('sha256').update(canonicalJson(value)).digest('hex')
}
