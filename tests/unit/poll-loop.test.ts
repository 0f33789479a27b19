import fs from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import type { AccountChecker } from '../../src/core/monitor/detector.js'
import { PollLoop } from '../../src/core/monitor/loop.js'
import type { PollLoopOptions } from '../../src/core/monitor/loop.js'
import type { AccountCheckOutcome } from '../../src/core/monitor/types.js'
import { SettingsRepository } from '../../src/core/settings/repository.js'
import { StateStore } from '../../src/core/state/store.js'
import type { Sleep } from '../../src/utils/time.js'
import { makeTempDir } from '../helpers/fakes.js'

type Behaviour = (handle: string) => AccountCheckOutcome['status'] | Error

class ScriptedChecker implements AccountChecker {
  readonly calls: string[] = []

  constructor(private readonly behaviour: Behaviour) {}

  async checkAccount(handle: string): Promise<AccountCheckOutcome> {
    this.calls.push(handle)
    const result = this.behaviour(handle)
    if (result instanceof Error) throw result
    return {
      handle,
      status: result,
      message: result === 'failed' ? 'upstream unavailable' : undefined,
      primed: [],
      updated: [],
      notifications: 0,
      delivered: 0,
    }
  }
}

const yieldTurn: Sleep = () => new Promise(resolve => setImmediate(resolve))

describe('PollLoop', () => {
  let dataPath: string
  let settings: SettingsRepository
  let store: StateStore
  let sleeps: number[]

  function makeLoop(checker: AccountChecker, options: Partial<PollLoopOptions> = {}): PollLoop {
    return new PollLoop({
      checker,
      settings,
      store,
      leaseHolder: 'test-host',
      accountDelayMs: 0,
      tickMs: 300_000,
      ...options,
    })
  }

  beforeEach(async () => {
    dataPath = await makeTempDir()
    settings = new SettingsRepository(path.join(dataPath, 'settings.json'), { accounts: ['a', 'b', 'c'] })
    store = new StateStore(dataPath)
    sleeps = []
  })

  afterEach(async () => {
    await fs.rm(dataPath, { recursive: true, force: true })
  })

  it('keeps checking the remaining accounts when one fails', async () => {
    const checker = new ScriptedChecker(handle => (handle === 'b' ? new Error('boom') : 'ok'))
    const loop: PollLoop = makeLoop(checker, {
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 60_000) loop.halt()
      },
    })

    await expect(loop.start()).resolves.toBe(true)
    await loop.waitForIdle()

    expect(checker.calls).toEqual(['a', 'b', 'c'])
    const status = loop.status()
    expect(status.lastSweepOutcomes.map(outcome => outcome.status)).toEqual(['ok', 'failed', 'ok'])
    expect(status.lastSweepOutcomes[1]?.message).toBe('boom')
    expect(status.consecutiveErrors).toBe(0)
    expect(status.workerAlive).toBe(false)
    expect(status.running).toBe(true)
  })

  it('cools down once consecutive failures reach the threshold', async () => {
    const checker = new ScriptedChecker(() => 'failed')
    const loop: PollLoop = makeLoop(checker, {
      errorThreshold: 3,
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 300_000) loop.halt()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(checker.calls).toEqual(['a', 'b', 'c'])
    expect(loop.cooldownCount).toBe(1)
    expect(sleeps).toContain(300_000)
    expect(sleeps).not.toContain(60_000)
    expect(loop.status().consecutiveErrors).toBe(0)
  })

  it('carries the failure count across sweeps', async () => {
    await settings.removeAccount('c')
    const checker = new ScriptedChecker(() => 'failed')
    const loop: PollLoop = makeLoop(checker, {
      errorThreshold: 3,
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 300_000) loop.halt()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(checker.calls).toEqual(['a', 'b', 'a', 'b'])
    expect(sleeps.filter(ms => ms === 60_000)).toHaveLength(1)
    expect(loop.cooldownCount).toBe(1)
  })

  it('does not count skipped accounts toward the failure threshold', async () => {
    const checker = new ScriptedChecker(handle => (handle === 'b' ? 'skipped' : 'failed'))
    const loop: PollLoop = makeLoop(checker, {
      errorThreshold: 3,
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 60_000) loop.halt()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(loop.status().consecutiveErrors).toBe(2)
    expect(loop.cooldownCount).toBe(0)
  })

  it('exits at the next check-point after stop', async () => {
    const checker = new ScriptedChecker(() => 'ok')
    const loop: PollLoop = makeLoop(checker, {
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 60_000) await loop.stop()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(loop.isWorkerAlive()).toBe(false)
    expect(settings.isRunning()).toBe(false)
    expect(loop.status().state).toBe('stopped')
    const saved = JSON.parse(await fs.readFile(settings.settingsPath, 'utf8'))
    expect(saved.running).toBe(false)
  })

  it('pauses after a sweep-level failure and then resumes', async () => {
    vi.spyOn(store, 'acquireLease').mockRejectedValueOnce(new Error('lock unreadable'))
    const checker = new ScriptedChecker(() => 'ok')
    const loop: PollLoop = makeLoop(checker, {
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 60_000) loop.halt()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(sleeps).toEqual([10_000, 0, 0, 0, 60_000])
    expect(checker.calls).toEqual(['a', 'b', 'c'])
  })

  it('leaves the interval wait within one tick of a stop', async () => {
    const checker = new ScriptedChecker(() => 'ok')
    const loop: PollLoop = makeLoop(checker, {
      tickMs: 1000,
      sleep: async (ms) => {
        sleeps.push(ms)
        if (sleeps.filter(step => step === 1000).length === 3) await loop.stop()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(sleeps).toEqual([0, 0, 0, 1000, 1000, 1000])
    expect(checker.calls).toEqual(['a', 'b', 'c'])
    expect(loop.isWorkerAlive()).toBe(false)
  })

  it('does not spawn a second worker while one is alive', async () => {
    const checker = new ScriptedChecker(() => 'ok')
    const loop = makeLoop(checker, { sleep: yieldTurn })

    await expect(loop.start()).resolves.toBe(true)
    await expect(loop.start()).resolves.toBe(false)
    expect(loop.status().state).toBe('running')

    loop.halt()
    await loop.waitForIdle()
    expect(loop.isWorkerAlive()).toBe(false)
  })

  it('skips the sweep while another instance holds the lease', async () => {
    await fs.writeFile(path.join(dataPath, 'monitor.lock'), JSON.stringify({
      holder: 'other-host',
      acquiredAt: new Date().toISOString(),
      expiresAt: new Date(Date.now() + 60_000).toISOString(),
    }), 'utf8')
    const checker = new ScriptedChecker(() => 'ok')
    const loop: PollLoop = makeLoop(checker, {
      sleep: async (ms) => {
        sleeps.push(ms)
        if (ms === 60_000) loop.halt()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    expect(checker.calls).toEqual([])
    const lock = JSON.parse(await fs.readFile(path.join(dataPath, 'monitor.lock'), 'utf8'))
    expect(lock.holder).toBe('other-host')
  })

  it('releases the lease after a sweep', async () => {
    const checker = new ScriptedChecker(() => 'ok')
    const loop: PollLoop = makeLoop(checker, {
      sleep: async (ms) => {
        if (ms === 60_000) loop.halt()
      },
    })

    await loop.start()
    await loop.waitForIdle()

    await expect(fs.access(path.join(dataPath, 'monitor.lock'))).rejects.toThrow()
  })
})
