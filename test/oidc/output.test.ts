import { describe, it, expect } from 'vitest'

import { formatCredential, parseOutputFormat } from '../../src/oidc/output.js'
import type { Credential } from '../../src/oidc/service-client.js'

const credential: Credential = {
  auth: {
    client_token: 'test-token',
    accessor: 'test-accessor',
    policies: ['default'],
    metadata: { role: 'dev' },
    lease_duration: 3600,
    renewable: true,
  },
}

describe('parseOutputFormat', () => {
  it('defaults to table and accepts json case-insensitively', () => {
    expect(parseOutputFormat(undefined)).toBe('table')
    expect(parseOutputFormat('JSON')).toBe('json')
  })

  it('rejects unknown formats', () => {
    expect(() => parseOutputFormat('yaml')).toThrow('--format must be one of: table, json. Received "yaml".')
  })
})

describe('formatCredential', () => {
  it('renders the auth block as a table', () => {
    expect(formatCredential(credential, 'table')).toBe(
      [
        'Success! You are now authenticated. The token below is not stored anywhere.',
        '',
        'Key                Value',
        '---                -----',
        'token              test-token',
        'token_accessor     test-accessor',
        'token_duration     1h',
        'token_renewable    true',
        'token_policies     [default]',
        'token_meta_role    dev',
      ].join('\n'),
    )
  })

  it('formats mixed and unlimited durations', () => {
    const line = (seconds: number) =>
      formatCredential({ auth: { client_token: 't', lease_duration: seconds } }, 'table')
        .split('\n')
        .find((l) => l.startsWith('token_duration'))
    expect(line(5430)).toBe('token_duration     1h30m30s')
    expect(line(45)).toBe('token_duration     45s')
    expect(line(0)).toBe('token_duration     ∞')
  })

  it('prints indented JSON', () => {
    expect(formatCredential(credential, 'json')).toBe(JSON.stringify(credential, null, 2))
  })

  it('reports a response without a token', () => {
    expect(formatCredential({ data: {} }, 'table')).toBe('Success! The auth service returned no token.')
  })
})
