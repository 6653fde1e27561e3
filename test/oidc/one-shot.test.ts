import { describe, it, expect } from 'vitest'

import { OneShot } from '../../src/oidc/one-shot.js'

describe('OneShot', () => {
  it('keeps the first value and drops later ones', async () => {
    const cell = new OneShot<string>()
    expect(cell.settle('first')).toBe(true)
    expect(cell.settle('second')).toBe(false)
    await expect(cell.promise).resolves.toBe('first')
  })
})
