export const APP_DISPLAY_NAME = 'oidc-login'
export const APP_BIN_NAME = 'oidc-login'
export const APP_VERSION = '0.1.0'

export const CALLBACK_PATH = '/oidc/callback'

export interface ParsedOptions {
  [key: string]: string | boolean
}

export interface ParsedCommandLine {
  options: ParsedOptions
  config: Record<string, string>
}

/**
 * Split CLI arguments into `--flag [value]` options and `key=value` login config.
 * `--no-<name>` switches are stored as `<name>: false`.
 */
export function parseArgs(argv: string[]): ParsedCommandLine {
  const options: ParsedOptions = {}
  const config: Record<string, string> = {}
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i]
    if (arg.startsWith('--')) {
      const key = arg.slice(2)
      if (key.startsWith('no-')) {
        options[key.slice(3)] = false
        continue
      }
      const next = argv[i + 1]
      if (next !== undefined && !next.startsWith('--')) {
        options[key] = next
        i += 1
        continue
      }
      options[key] = true
      continue
    }

    const eq = arg.indexOf('=')
    if (eq <= 0) {
      throw new Error(`Invalid argument "${arg}": expected key=value`)
    }
    config[arg.slice(0, eq).toLowerCase()] = arg.slice(eq + 1)
  }
  return { options, config }
}

export function stringOption(options: ParsedOptions, key: string): string | undefined {
  const value = options[key]
  return typeof value === 'string' ? value : undefined
}

export function errorMessage(error: unknown): string {
  return (error instanceof Error && error.message) || String(error)
}

export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
}

export function helpText(): string {
  return `${APP_DISPLAY_NAME}

Usage:
  ${APP_BIN_NAME} login [--address <url>] [--token <token>] [--namespace <ns>] [--format table|json] [--no-browser] [K=V...]
  ${APP_BIN_NAME} help

  The OIDC auth method lets users authenticate with an OIDC provider.
  The provider must be configured as part of a role by the operator.

  Authenticate using role "engineering":

      $ ${APP_BIN_NAME} login role=engineering
      Complete the login via your OIDC provider. Launching browser to:

          https://accounts.example.com/o/oauth2/v2/...

  The default browser is opened for the user to complete the login.
  Alternatively, the user may visit the printed URL directly.

Configuration:
  role=<string>
      Role of type "oidc" to use for authentication.

  mount=<string>
      Path where the OIDC auth method is mounted (default: oidc).

  listenaddress=<string>
      Address to bind the OIDC callback listener to (default: localhost).

  port=<string>
      Local port for the OIDC callback listener (default: 8250).

  callbackmethod=<string>
      Scheme to use in the OIDC redirect_uri (default: http).

  callbackhost=<string>
      Host to use in the OIDC redirect_uri (default: localhost).

  callbackport=<string>
      Port to use in the OIDC redirect_uri (default: the value set for port).

Environment Overrides:
  OIDC_LOGIN_ADDR                  Auth service address (default: https://127.0.0.1:8200)
  OIDC_LOGIN_TOKEN                 Token sent with service requests
  OIDC_LOGIN_NAMESPACE             Namespace sent with service requests
  OIDC_LOGIN_REQUEST_TIMEOUT_MS    Per-request timeout in milliseconds (default: 60000)
`
}

export function printHelp(): void {
  console.log(helpText())
}
