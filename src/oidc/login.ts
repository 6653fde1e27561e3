import type http from 'node:http'
import process from 'node:process'

import { fetchAuthUrl } from './auth-url.js'
import { openUrl } from './browser.js'
import { closeCallbackServer, createCallbackApp, listenCallbackServer, type LoginOutcome } from './callback-server.js'
import { parseServiceConfig, resolveLoginConfig, type LoginConfigInput } from './config.js'
import { OneShot } from './one-shot.js'
import { formatCredential, parseOutputFormat } from './output.js'
import { HttpAuthServiceClient, type AuthServiceClient, type Credential } from './service-client.js'
import { errorMessage, stringOption, type ParsedOptions } from './utils.js'

export type { LoginOutcome } from './callback-server.js'

export class InterruptedError extends Error {
  constructor() {
    super('Interrupted')
    this.name = 'InterruptedError'
  }
}

export interface LoginOptions {
  /** Aborting this signal interrupts the login like Ctrl-C does. */
  signal?: AbortSignal
  /** Listen for process SIGINT while the login is pending (default: true). */
  handleSigint?: boolean
  /** Browser launcher; `false` only prints the URL. */
  openBrowser?: ((url: string) => Promise<void>) | false
}

async function raceInterrupt<T>(work: Promise<T>, interrupted: Promise<InterruptedError>): Promise<T> {
  const result = await Promise.race([work.then((value) => ({ value })), interrupted])
  if (result instanceof InterruptedError) {
    throw result
  }
  return result.value
}

async function launchBrowser(authUrl: string, openBrowser: LoginOptions['openBrowser']): Promise<void> {
  if (openBrowser === false) {
    console.error(`Complete the login via your OIDC provider. Open this URL in your browser:\n\n    ${authUrl}\n\n`)
    return
  }

  console.error(`Complete the login via your OIDC provider. Launching browser to:\n\n    ${authUrl}\n\n`)
  try {
    await (openBrowser ?? openUrl)(authUrl)
  } catch (error) {
    console.error(
      `Error attempting to automatically open browser: '${errorMessage(error)}'.\nPlease visit the authorization URL manually.`,
    )
  }
}

/**
 * Run one OIDC browser login: fetch the authorization URL, open the browser,
 * wait for the provider redirect on the local callback listener and exchange it
 * for a credential.
 *
 * Settles exactly once, with whichever of callback outcome, listener failure or
 * interruption comes first. The listener and signal handlers are released on
 * every path.
 */
export async function authenticate(
  client: AuthServiceClient,
  input: LoginConfigInput = {},
  options: LoginOptions = {},
): Promise<Credential | null> {
  const interrupted = new OneShot<InterruptedError>()
  const onInterrupt = (): void => {
    interrupted.settle(new InterruptedError())
  }
  const handleSigint = options.handleSigint ?? true
  if (handleSigint) {
    process.on('SIGINT', onInterrupt)
  }
  options.signal?.addEventListener('abort', onInterrupt)
  if (options.signal?.aborted) {
    onInterrupt()
  }

  let server: http.Server | undefined
  try {
    const config = resolveLoginConfig(input)

    const authUrl = await raceInterrupt(
      fetchAuthUrl(client, {
        role: config.role,
        mount: config.mount,
        callbackPort: config.callbackPort,
        callbackMethod: config.callbackMethod,
        callbackHost: config.callbackHost,
      }),
      interrupted.promise,
    )

    const outcome = new OneShot<LoginOutcome>()
    const app = createCallbackApp({
      client,
      mount: config.mount,
      resolve: (result) => {
        outcome.settle(result)
      },
    })

    server = await listenCallbackServer(app, config.listenAddress, config.port)
    server.on('error', (error) => {
      outcome.settle({ ok: false, error })
    })

    await launchBrowser(authUrl, options.openBrowser)

    const result = await raceInterrupt(outcome.promise, interrupted.promise)
    if (!result.ok) {
      throw result.error
    }
    return result.credential
  } finally {
    if (handleSigint) {
      process.off('SIGINT', onInterrupt)
    }
    options.signal?.removeEventListener('abort', onInterrupt)
    if (server) {
      await closeCallbackServer(server)
    }
  }
}

export async function commandLogin(options: ParsedOptions, config: Record<string, string>): Promise<void> {
  const format = parseOutputFormat(stringOption(options, 'format'))
  const client = new HttpAuthServiceClient(
    parseServiceConfig(process.env, {
      address: stringOption(options, 'address'),
      token: stringOption(options, 'token'),
      namespace: stringOption(options, 'namespace'),
    }),
  )

  const credential = await authenticate(client, config, {
    openBrowser: options.browser === false ? false : undefined,
  })
  if (!credential) {
    throw new Error('Empty response from the auth service')
  }
  console.log(formatCredential(credential, format))
}
