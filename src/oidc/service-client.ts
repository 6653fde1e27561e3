import { APP_DISPLAY_NAME, APP_VERSION, errorMessage } from './utils.js'
import type { ServiceConfig } from './config.js'

export interface CredentialAuth {
  client_token: string
  accessor?: string
  policies?: string[]
  token_policies?: string[]
  metadata?: Record<string, string>
  lease_duration?: number
  renewable?: boolean
  entity_id?: string
}

/** Response body of the auth service. Login responses carry the issued token under `auth`. */
export interface Credential {
  request_id?: string
  lease_id?: string
  lease_duration?: number
  renewable?: boolean
  data?: Record<string, unknown> | null
  warnings?: string[] | null
  auth?: CredentialAuth | null
}

/** The two service operations the login flow needs. */
export interface AuthServiceClient {
  write(path: string, data: Record<string, unknown>): Promise<Credential | null>
  readWithData(path: string, data: Record<string, string>): Promise<Credential | null>
}

export class ServiceResponseError extends Error {
  readonly status: number
  readonly url: string
  readonly errors: string[]

  constructor(method: string, url: string, status: number, errors: string[]) {
    const lines = ['Error making API request.', '', `URL: ${method} ${url}`]
    if (errors.length > 0) {
      lines.push(`Code: ${status}. Errors:`, '', ...errors.map((e) => `* ${e}`))
    } else {
      lines.push(`Code: ${status}. Raw Message:`)
    }
    super(lines.join('\n'))
    this.name = 'ServiceResponseError'
    this.status = status
    this.url = url
    this.errors = errors
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value)
}

function stringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined
  return value.filter((entry): entry is string => typeof entry === 'string')
}

function stringRecord(value: unknown): Record<string, string> | undefined {
  if (!isRecord(value)) return undefined
  const out: Record<string, string> = {}
  for (const [k, v] of Object.entries(value)) {
    if (typeof v === 'string') out[k] = v
  }
  return out
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined
}

function optionalNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined
}

function optionalBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined
}

function parseAuth(raw: unknown): CredentialAuth | null {
  if (!isRecord(raw) || typeof raw.client_token !== 'string') return null
  return {
    client_token: raw.client_token,
    accessor: optionalString(raw.accessor),
    policies: stringArray(raw.policies),
    token_policies: stringArray(raw.token_policies),
    metadata: stringRecord(raw.metadata),
    lease_duration: optionalNumber(raw.lease_duration),
    renewable: optionalBoolean(raw.renewable),
    entity_id: optionalString(raw.entity_id),
  }
}

/** Validate a decoded response body, dropping malformed optional fields. */
export function parseCredential(raw: unknown): Credential | null {
  if (!isRecord(raw)) return null
  return {
    request_id: optionalString(raw.request_id),
    lease_id: optionalString(raw.lease_id),
    lease_duration: optionalNumber(raw.lease_duration),
    renewable: optionalBoolean(raw.renewable),
    data: isRecord(raw.data) ? raw.data : null,
    warnings: stringArray(raw.warnings) ?? null,
    auth: parseAuth(raw.auth),
  }
}

/** Auth service client over HTTP, using the global fetch. */
export class HttpAuthServiceClient implements AuthServiceClient {
  readonly config: ServiceConfig

  constructor(config: ServiceConfig) {
    this.config = config
  }

  async write(path: string, data: Record<string, unknown>): Promise<Credential | null> {
    return this.request('PUT', this.buildUrl(path), JSON.stringify(data))
  }

  async readWithData(path: string, data: Record<string, string>): Promise<Credential | null> {
    const url = this.buildUrl(path)
    for (const [key, value] of Object.entries(data)) {
      url.searchParams.append(key, value)
    }
    return this.request('GET', url)
  }

  private buildUrl(path: string): URL {
    return new URL(`${this.config.address}/v1/${path.replace(/^\/+/, '')}`)
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'X-Vault-Request': 'true',
      'User-Agent': `${APP_DISPLAY_NAME}/${APP_VERSION}`,
    }
    if (hasBody) headers['Content-Type'] = 'application/json'
    if (this.config.token) headers['X-Vault-Token'] = this.config.token
    if (this.config.namespace) headers['X-Vault-Namespace'] = this.config.namespace
    return headers
  }

  private async request(method: string, url: URL, body?: string): Promise<Credential | null> {
    const response = await fetch(url, {
      method,
      headers: this.headers(body !== undefined),
      body,
      signal: AbortSignal.timeout(this.config.timeoutMs),
    })

    const text = await response.text()
    if (!response.ok) {
      throw new ServiceResponseError(method, url.toString(), response.status, extractErrors(text))
    }
    if (response.status === 204 || text.trim().length === 0) {
      return null
    }

    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (error) {
      throw new Error(`Invalid JSON from ${method} ${url.toString()}: ${errorMessage(error)}`)
    }
    const credential = parseCredential(parsed)
    if (!credential) {
      throw new ServiceResponseError(method, url.toString(), response.status, ['response body is not a JSON object'])
    }
    return credential
  }
}

function extractErrors(text: string): string[] {
  try {
    const parsed: unknown = JSON.parse(text)
    if (isRecord(parsed)) {
      return stringArray(parsed.errors) ?? []
    }
  } catch {
    // not JSON
  }
  const trimmed = text.trim()
  return trimmed.length > 0 ? [trimmed] : []
}
