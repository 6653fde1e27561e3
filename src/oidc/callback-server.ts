import http from 'node:http'

import express, { type Express, type Request, type Response } from 'express'

import { classifyError, GENERIC_SUMMARY } from './error-classifier.js'
import { SUCCESS_HTML, errorHtml } from './pages.js'
import { APP_DISPLAY_NAME, CALLBACK_PATH, errorMessage } from './utils.js'
import type { AuthServiceClient, Credential } from './service-client.js'

export type LoginOutcome = { ok: true; credential: Credential | null } | { ok: false; error: unknown }

export interface CallbackAppOptions {
  client: AuthServiceClient
  mount: string
  /** Receives the outcome of the first callback, after its page has been sent. */
  resolve: (outcome: LoginOutcome) => void
}

function queryParam(value: unknown): string {
  if (typeof value === 'string') return value
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0]
  return ''
}

function sendHtml(res: Response, status: number, html: string, onDone?: () => void): void {
  if (res.destroyed) {
    // browser went away during the exchange; 'close' has already fired
    onDone?.()
    return
  }
  if (onDone) {
    // 'close' fires once the page is flushed, or when the browser goes away first
    res.once('close', onDone)
  }
  res.status(status).type('html').send(html)
}

/** Error page for a failed exchange; falls back to a generic message when classification finds nothing. */
export function renderExchangeError(error: unknown): string {
  const { summary, detail } = classifyError(error)
  return errorHtml(summary || GENERIC_SUMMARY, detail || errorMessage(error))
}

/**
 * Build the per-attempt callback application. Only the first request to the
 * callback path performs the code exchange.
 */
export function createCallbackApp({ client, mount, resolve }: CallbackAppOptions): Express {
  const app = express()
  app.disable('x-powered-by')
  let claimed = false

  async function handleCallback(req: Request, res: Response): Promise<void> {
    if (claimed) {
      sendHtml(res, 409, errorHtml(GENERIC_SUMMARY, 'This login has already received its callback.'))
      return
    }
    claimed = true

    const data = {
      code: queryParam(req.query.code),
      state: queryParam(req.query.state),
    }

    let outcome: LoginOutcome
    try {
      const credential = await client.readWithData(`auth/${mount}/oidc/callback`, data)
      outcome = { ok: true, credential }
    } catch (error) {
      outcome = { ok: false, error }
    }

    const html = outcome.ok ? SUCCESS_HTML : renderExchangeError(outcome.error)
    sendHtml(res, 200, html, () => resolve(outcome))
  }

  app.get(CALLBACK_PATH, (req, res, next) => {
    handleCallback(req, res).catch(next)
  })

  return app
}

/** Bind the callback listener. Rejects when the address cannot be bound. */
export function listenCallbackServer(app: Express, listenAddress: string, port: string): Promise<http.Server> {
  return new Promise((resolve, reject) => {
    const server = http.createServer(app)
    const onError = (error: Error): void => {
      server.off('listening', onListening)
      reject(error)
    }
    const onListening = (): void => {
      server.off('error', onError)
      resolve(server)
    }
    server.once('error', onError)
    server.once('listening', onListening)
    server.listen(Number(port), listenAddress)
  })
}

/** Stop listening and drop every open connection, including in-flight requests. */
export function closeCallbackServer(server: http.Server): Promise<void> {
  if (!server.listening) {
    return Promise.resolve()
  }
  return new Promise((resolve) => {
    server.close((error) => {
      if (error) {
        console.error(`[${APP_DISPLAY_NAME}] callback listener close failed: ${error.message}`)
      }
      resolve()
    })
    server.closeAllConnections()
  })
}
