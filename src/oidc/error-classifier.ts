import { errorMessage } from './utils.js'

export const ERR_NO_RESPONSE = 'No response from provider'
export const ERR_LOGIN_FAILED = 'Login failed'
export const ERR_TOKEN_VERIFICATION = 'Token verification failed'

export const GENERIC_SUMMARY = 'Login error'

// Checked in this order.
const KNOWN_HEADERS = [ERR_NO_RESPONSE, ERR_LOGIN_FAILED, ERR_TOKEN_VERIFICATION] as const

const ERROR_BLOCK_PATTERN = /Errors:.*\* *(.*)/s

export interface ClassifiedError {
  summary: string
  detail: string
}

/**
 * Split a service error into a known summary sentence and the remaining detail,
 * e.g. `"Errors:\n\n* Login failed: code already redeemed"` becomes
 * `{ summary: "Login failed", detail: "code already redeemed" }`.
 *
 * Returns empty strings when the text has no `Errors: *` block.
 */
export function classifyError(error: unknown): ClassifiedError {
  const match = ERROR_BLOCK_PATTERN.exec(errorMessage(error))
  if (!match) {
    return { summary: '', detail: '' }
  }

  const block = match[1]
  const lowered = block.toLowerCase()
  for (const header of KNOWN_HEADERS) {
    if (lowered.startsWith(header.toLowerCase())) {
      const detail = block.slice(header.length).replace(/^[.:\s]+/, '')
      return {
        summary: block.slice(0, header.length),
        detail: detail || block,
      }
    }
  }

  return { summary: GENERIC_SUMMARY, detail: block }
}
