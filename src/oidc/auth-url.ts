import { CALLBACK_PATH } from './utils.js'
import type { AuthServiceClient, Credential } from './service-client.js'

export interface AuthUrlRequest {
  role: string
  mount: string
  callbackPort: string
  callbackMethod: string
  callbackHost: string
}

export function buildRedirectUri(callbackMethod: string, callbackHost: string, callbackPort: string): string {
  return `${callbackMethod}://${callbackHost}:${callbackPort}${CALLBACK_PATH}`
}

/** Returns the `auth_url` field when it is a non-empty string. */
export function extractAuthUrl(response: Credential | null): string | undefined {
  const value = response?.data?.auth_url
  if (typeof value !== 'string' || value.length === 0) {
    return undefined
  }
  return value
}

export async function fetchAuthUrl(client: AuthServiceClient, request: AuthUrlRequest): Promise<string> {
  const response = await client.write(`auth/${request.mount}/oidc/auth_url`, {
    role: request.role,
    redirect_uri: buildRedirectUri(request.callbackMethod, request.callbackHost, request.callbackPort),
  })

  const authUrl = extractAuthUrl(response)
  if (authUrl === undefined) {
    throw new Error(
      `Unable to authorize role ${JSON.stringify(request.role)}. Check the auth service logs for more information.`,
    )
  }
  return authUrl
}
