export const DEFAULT_EPOCH_ISO = "2024-01-01T00:00:00.000Z"

export class Config {
  static readonly SNOWFLAKE_EPOCH = envEpoch("SNOWFLAKE_EPOCH", Date.parse(DEFAULT_EPOCH_ISO))
  static readonly LOG_LEVEL = envStr("LOG_LEVEL", "info", true)
  static readonly LOG_PRETTY = envStr("NODE_ENV", "") === "development"
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name]
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def
    throw new Error(`Env var ${name} not set`)
  }
  return v
}

/**
 * Instant given either as Unix milliseconds ("1704067200000") or as an
 * ISO-8601 string ("2024-01-01T00:00:00Z"). Returns Unix milliseconds.
 */
export function envEpoch(name: string, def?: number): number {
  const v = process.env[name]
  if (v === undefined || v.trim() === "") {
    if (def !== undefined) return def
    throw new Error(`Env var ${name} not set`)
  }
  const trimmed = v.trim()
  const ms = /^-?\d+$/.test(trimmed) ? Number(trimmed) : Date.parse(trimmed)
  if (!Number.isSafeInteger(ms)) {
    throw new Error(`Env var ${name} is not a valid instant: ${v}`)
  }
  return ms
}
