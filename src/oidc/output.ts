import type { Credential } from './service-client.js'

export const OUTPUT_FORMATS = ['table', 'json'] as const
export type OutputFormat = (typeof OUTPUT_FORMATS)[number]

export function parseOutputFormat(value: string | undefined): OutputFormat {
  if (value === undefined) return 'table'
  const normalized = value.trim().toLowerCase()
  for (const format of OUTPUT_FORMATS) {
    if (format === normalized) return format
  }
  throw new Error(`--format must be one of: ${OUTPUT_FORMATS.join(', ')}. Received "${value}".`)
}

function formatDuration(seconds: number): string {
  if (seconds <= 0) return '∞'
  const h = Math.floor(seconds / 3600)
  const m = Math.floor((seconds % 3600) / 60)
  const s = seconds % 60
  return `${h > 0 ? `${h}h` : ''}${m > 0 ? `${m}m` : ''}${s > 0 || (h === 0 && m === 0) ? `${s}s` : ''}`
}

function table(rows: Array<[string, string]>): string {
  const width = Math.max('Key'.length, ...rows.map(([key]) => key.length))
  const lines = [`${'Key'.padEnd(width)}    Value`, `${'---'.padEnd(width)}    -----`]
  for (const [key, value] of rows) {
    lines.push(`${key.padEnd(width)}    ${value}`)
  }
  return lines.join('\n')
}

export function formatCredential(credential: Credential, format: OutputFormat): string {
  if (format === 'json') {
    return JSON.stringify(credential, null, 2)
  }

  const auth = credential.auth
  if (!auth) {
    return 'Success! The auth service returned no token.'
  }

  const rows: Array<[string, string]> = [
    ['token', auth.client_token],
    ['token_accessor', auth.accessor ?? 'n/a'],
    ['token_duration', formatDuration(auth.lease_duration ?? 0)],
    ['token_renewable', String(auth.renewable ?? false)],
    ['token_policies', `[${(auth.token_policies ?? auth.policies ?? []).join(' ')}]`],
  ]
  for (const [key, value] of Object.entries(auth.metadata ?? {}).sort(([a], [b]) => a.localeCompare(b))) {
    rows.push([`token_meta_${key}`, value])
  }

  return `Success! You are now authenticated. The token below is not stored anywhere.\n\n${table(rows)}`
}
