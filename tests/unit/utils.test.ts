import { describe, expect, it } from 'vitest'
import { asErrorMessage, maskSecret } from '../../src/utils/logger.js'
import { sleepWhile } from '../../src/utils/time.js'

describe('sleepWhile', () => {
  it('waits the full duration in ticks', async () => {
    const waits: number[] = []

    const completed = await sleepWhile(2500, () => true, {
      tickMs: 1000,
      sleep: async (ms) => {
        waits.push(ms)
      },
    })

    expect(completed).toBe(true)
    expect(waits).toEqual([1000, 1000, 500])
  })

  it('returns early once the condition turns false', async () => {
    const waits: number[] = []
    let keepWaiting = true

    const completed = await sleepWhile(5000, () => keepWaiting, {
      tickMs: 1000,
      sleep: async (ms) => {
        waits.push(ms)
        if (waits.length === 2) keepWaiting = false
      },
    })

    expect(completed).toBe(false)
    expect(waits).toEqual([1000, 1000])
  })
})

describe('maskSecret', () => {
  it('keeps both ends of a long value', () => {
    expect(maskSecret('abcdefghijkl')).toBe('abcd***ijkl')
  })

  it('hides short values completely', () => {
    expect(maskSecret('abcdefgh')).toBe('***')
  })

  it('marks missing values', () => {
    expect(maskSecret(undefined)).toBe('[unset]')
    expect(maskSecret('  ')).toBe('[unset]')
  })
})

describe('asErrorMessage', () => {
  it('reads the message of an error and stringifies anything else', () => {
    expect(asErrorMessage(new Error('boom'))).toBe('boom')
    expect(asErrorMessage(42)).toBe('42')
  })
})
