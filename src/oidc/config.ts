export class ConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'ConfigError'
  }
}

export const LOGIN_CONFIG_KEYS = [
  'role',
  'mount',
  'listenaddress',
  'port',
  'callbackmethod',
  'callbackhost',
  'callbackport',
] as const

export type LoginConfigKey = (typeof LOGIN_CONFIG_KEYS)[number]

export type LoginConfigInput = Partial<Record<string, string>>

export type LoginConfig = {
  role: string
  mount: string
  listenAddress: string
  port: string
  callbackMethod: string
  callbackHost: string
  callbackPort: string
}

export const DEFAULT_LOGIN_CONFIG: Readonly<Omit<LoginConfig, 'role' | 'callbackPort'>> = {
  mount: 'oidc',
  listenAddress: 'localhost',
  port: '8250',
  callbackMethod: 'http',
  callbackHost: 'localhost',
}

const PORT_PATTERN = /^\d{1,5}$/

function isLoginConfigKey(key: string): key is LoginConfigKey {
  return (LOGIN_CONFIG_KEYS as readonly string[]).includes(key)
}

export function assertPort(name: string, value: string): string {
  if (!PORT_PATTERN.test(value) || Number(value) > 65535) {
    throw new ConfigError(`${name} must be a port number between 0 and 65535. Received "${value}".`)
  }
  return value
}

/**
 * Apply defaults to a flat login config map. A key that is present counts as set,
 * even when its value is empty; `callbackport` falls back to the resolved `port`.
 */
export function resolveLoginConfig(input: LoginConfigInput = {}): LoginConfig {
  for (const key of Object.keys(input)) {
    if (!isLoginConfigKey(key)) {
      throw new ConfigError(`Unknown login option "${key}". Accepted: ${LOGIN_CONFIG_KEYS.join(', ')}`)
    }
  }

  const port = input.port ?? DEFAULT_LOGIN_CONFIG.port
  return {
    role: input.role ?? '',
    mount: input.mount ?? DEFAULT_LOGIN_CONFIG.mount,
    listenAddress: input.listenaddress ?? DEFAULT_LOGIN_CONFIG.listenAddress,
    port: assertPort('port', port),
    callbackMethod: input.callbackmethod ?? DEFAULT_LOGIN_CONFIG.callbackMethod,
    callbackHost: input.callbackhost ?? DEFAULT_LOGIN_CONFIG.callbackHost,
    callbackPort: assertPort('callbackport', input.callbackport ?? port),
  }
}

const SERVICE_ADDR_ENV = 'OIDC_LOGIN_ADDR'
const SERVICE_TOKEN_ENV = 'OIDC_LOGIN_TOKEN'
const SERVICE_NAMESPACE_ENV = 'OIDC_LOGIN_NAMESPACE'
const REQUEST_TIMEOUT_MS_ENV = 'OIDC_LOGIN_REQUEST_TIMEOUT_MS'

export type ServiceConfig = {
  address: string
  token?: string
  namespace?: string
  timeoutMs: number
}

export const DEFAULT_SERVICE_CONFIG: Readonly<ServiceConfig> = {
  address: 'https://127.0.0.1:8200',
  timeoutMs: 60_000,
}

export interface ServiceConfigOverrides {
  address?: string
  token?: string
  namespace?: string
}

export function parseServiceConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ServiceConfigOverrides = {},
): ServiceConfig {
  const address =
    parseOptionalStringEnv(overrides.address) ??
    parseOptionalStringEnv(env[SERVICE_ADDR_ENV]) ??
    DEFAULT_SERVICE_CONFIG.address

  return {
    address: parseAddress(overrides.address !== undefined ? '--address' : SERVICE_ADDR_ENV, address),
    token: parseOptionalStringEnv(overrides.token) ?? parseOptionalStringEnv(env[SERVICE_TOKEN_ENV]),
    namespace: parseOptionalStringEnv(overrides.namespace) ?? parseOptionalStringEnv(env[SERVICE_NAMESPACE_ENV]),
    timeoutMs: parsePositiveIntegerEnv(REQUEST_TIMEOUT_MS_ENV, env[REQUEST_TIMEOUT_MS_ENV], DEFAULT_SERVICE_CONFIG.timeoutMs),
  }
}

function parseAddress(name: string, rawValue: string): string {
  let url: URL
  try {
    url = new URL(rawValue)
  } catch {
    throw new ConfigError(`${name} must be an absolute http(s) URL. Received "${rawValue}".`)
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(`${name} must be an absolute http(s) URL. Received "${rawValue}".`)
  }
  return rawValue.replace(/\/+$/, '')
}

function parseOptionalStringEnv(rawValue: string | undefined): string | undefined {
  if (rawValue === undefined) {
    return undefined
  }
  const trimmed = rawValue.trim()
  return trimmed.length === 0 ? undefined : trimmed
}

function parsePositiveIntegerEnv(name: string, rawValue: string | undefined, defaultValue: number): number {
  if (rawValue === undefined) {
    return defaultValue
  }

  const trimmed = rawValue.trim()
  if (trimmed.length === 0) {
    return defaultValue
  }

  const parsed = Number(trimmed)
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new ConfigError(`${name} must be a positive integer. Received "${rawValue}".`)
  }

  return parsed
}
