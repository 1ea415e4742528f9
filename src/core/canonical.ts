import { createHash } from 'crypto'

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys)
  if (value && typeof value === 'object') {
    const out: Record<string, unknown> = {}
    for (const k of Object.keys(value).sort()) {
      const v: unknown = Reflect.get(value, k)
      if (v !== undefined) out[k] = sortKeys(v)
    }
    return out
  }
  return value
}

/**
 * JSON with object keys sorted at every level. Equal values always serialize to equal strings.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(sortKeys(value))
}

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex')
}
