import http from 'node:http'
import { setTimeout as delay } from 'node:timers/promises'

import { describe, it, expect, vi, afterEach } from 'vitest'

import {
  closeCallbackServer,
  createCallbackApp,
  listenCallbackServer,
  type LoginOutcome,
} from '../../src/oidc/callback-server.js'
import { ServiceResponseError, type Credential } from '../../src/oidc/service-client.js'
import { createFakeServiceClient, TEST_CREDENTIAL, type FakeServiceOptions } from '../helpers/fake-service-client.js'
import { getFreePort } from '../helpers/free-port.js'

const servers: http.Server[] = []

afterEach(async () => {
  await Promise.all(servers.splice(0).map((server) => closeCallbackServer(server)))
})

async function startApp(options: FakeServiceOptions = {}, mount = 'oidc') {
  const client = createFakeServiceClient(options)
  const outcomes: LoginOutcome[] = []
  let notify: (outcome: LoginOutcome) => void = () => {}
  const firstOutcome = new Promise<LoginOutcome>((resolve) => {
    notify = resolve
  })
  const app = createCallbackApp({
    client,
    mount,
    resolve: (outcome) => {
      outcomes.push(outcome)
      notify(outcome)
    },
  })
  const port = await getFreePort()
  const server = await listenCallbackServer(app, '127.0.0.1', String(port))
  servers.push(server)
  return { client, outcomes, firstOutcome, base: `http://127.0.0.1:${port}` }
}

describe('callback app', () => {
  it('exchanges code and state and renders the success page', async () => {
    const { client, firstOutcome, base } = await startApp({}, 'corp-sso')

    const res = await fetch(`${base}/oidc/callback?code=abc&state=xyz`)
    const body = await res.text()

    expect(res.status).toBe(200)
    expect(res.headers.get('content-type')).toBe('text/html; charset=utf-8')
    expect(body).toContain('<h1 class="ok">Signed in via your OIDC provider</h1>')
    expect(client.reads).toEqual([{ path: 'auth/corp-sso/oidc/callback', data: { code: 'abc', state: 'xyz' } }])
    await expect(firstOutcome).resolves.toEqual({ ok: true, credential: TEST_CREDENTIAL })
  })

  it('passes missing query values as empty strings', async () => {
    const { client, firstOutcome, base } = await startApp()

    await (await fetch(`${base}/oidc/callback`)).text()
    await firstOutcome

    expect(client.reads[0].data).toEqual({ code: '', state: '' })
  })

  it('renders the classified error and resolves the raw error', async () => {
    const failure = new ServiceResponseError('GET', 'http://auth.test/v1/auth/oidc/oidc/callback', 400, [
      'Login failed: code expired',
    ])
    const { firstOutcome, base } = await startApp({
      readWithData: async () => {
        throw failure
      },
    })

    const res = await fetch(`${base}/oidc/callback?code=abc&state=xyz`)
    const body = await res.text()

    expect(res.status).toBe(200)
    expect(body).toContain('<h1 class="fail">Login failed</h1>')
    expect(body).toContain('<pre>code expired</pre>')
    await expect(firstOutcome).resolves.toEqual({ ok: false, error: failure })
  })

  it('falls back to the raw message when the error is not classifiable', async () => {
    const { firstOutcome, base } = await startApp({
      readWithData: async () => {
        throw new Error('socket hang up')
      },
    })

    const body = await (await fetch(`${base}/oidc/callback?code=abc&state=xyz`)).text()

    expect(body).toContain('<h1 class="fail">Login error</h1>')
    expect(body).toContain('<pre>socket hang up</pre>')
    await firstOutcome
  })

  it('escapes error text embedded in the page', async () => {
    const { firstOutcome, base } = await startApp({
      readWithData: async () => {
        throw new Error('Errors: * <script>alert(1)</script>')
      },
    })

    const body = await (await fetch(`${base}/oidc/callback?code=abc&state=xyz`)).text()

    expect(body).toContain('<pre>&lt;script&gt;alert(1)&lt;/script&gt;</pre>')
    expect(body).not.toContain('<script>')
    await firstOutcome
  })

  it('refuses a second callback while the first exchange is running', async () => {
    let release: (credential: Credential) => void = () => {}
    const { client, outcomes, firstOutcome, base } = await startApp({
      readWithData: () =>
        new Promise<Credential>((resolve) => {
          release = resolve
        }),
    })

    const first = fetch(`${base}/oidc/callback?code=abc&state=xyz`)
    await vi.waitFor(() => expect(client.reads).toHaveLength(1))

    const second = await fetch(`${base}/oidc/callback?code=retry&state=xyz`)
    expect(second.status).toBe(409)
    expect(await second.text()).toContain('This login has already received its callback.')

    release(TEST_CREDENTIAL)
    expect((await first).status).toBe(200)
    await firstOutcome
    expect(client.reads).toHaveLength(1)
    expect(outcomes).toHaveLength(1)
  })

  it('resolves the outcome when the browser disconnects during the exchange', async () => {
    let release: (credential: Credential) => void = () => {}
    const { client, outcomes, firstOutcome, base } = await startApp({
      readWithData: () =>
        new Promise<Credential>((resolve) => {
          release = resolve
        }),
    })

    const req = http.get(`${base}/oidc/callback?code=abc&state=xyz`)
    req.on('error', () => undefined)
    await vi.waitFor(() => expect(client.reads).toHaveLength(1))
    req.destroy()
    await delay(100)

    release(TEST_CREDENTIAL)
    await expect(firstOutcome).resolves.toEqual({ ok: true, credential: TEST_CREDENTIAL })
    expect(outcomes).toHaveLength(1)
  })

  it('returns 404 for other paths without resolving', async () => {
    const { client, outcomes, base } = await startApp()

    const res = await fetch(`${base}/favicon.ico`)
    await res.text()

    expect(res.status).toBe(404)
    expect(client.reads).toHaveLength(0)
    expect(outcomes).toHaveLength(0)
  })
})

describe('listenCallbackServer', () => {
  it('rejects when the port is already bound', async () => {
    const { base } = await startApp()
    const port = new URL(base).port
    const app = createCallbackApp({ client: createFakeServiceClient(), mount: 'oidc', resolve: () => {} })

    await expect(listenCallbackServer(app, '127.0.0.1', port)).rejects.toMatchObject({ code: 'EADDRINUSE' })
  })
})

describe('closeCallbackServer', () => {
  it('stops accepting connections', async () => {
    const app = createCallbackApp({ client: createFakeServiceClient(), mount: 'oidc', resolve: () => {} })
    const port = await getFreePort()
    const server = await listenCallbackServer(app, '127.0.0.1', String(port))

    await closeCallbackServer(server)

    expect(server.listening).toBe(false)
    await expect(fetch(`http://127.0.0.1:${port}/oidc/callback`)).rejects.toThrow()
  })
})
