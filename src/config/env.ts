type IntOptions = { min?: number; max?: number }

export function readIntEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, opts: IntOptions = {}): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed)) return fallback
  let value = Math.floor(parsed)
  if (opts.min !== undefined) value = Math.max(opts.min, value)
  if (opts.max !== undefined) value = Math.min(opts.max, value)
  return value
}

export function readNumberEnv(env: NodeJS.ProcessEnv, key: string, fallback: number, opts: IntOptions = {}): number {
  const raw = env[key]
  if (raw === undefined || raw.trim() === '') return fallback
  const parsed = Number(raw)
  if (!Number.isFinite(parsed)) return fallback
  let value = parsed
  if (opts.min !== undefined) value = Math.max(opts.min, value)
  if (opts.max !== undefined) value = Math.min(opts.max, value)
  return value
}

export function readStringEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const raw = env[key]?.trim()
  return raw && raw.length > 0 ? raw : undefined
}
