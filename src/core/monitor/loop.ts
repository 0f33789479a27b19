import os from 'node:os'
import type { SettingsRepository } from '../settings/repository.js'
import type { StateStore } from '../state/store.js'
import { asErrorMessage, logger } from '../../utils/logger.js'
import { nowIso, sleep as defaultSleep, sleepWhile } from '../../utils/time.js'
import type { Sleep } from '../../utils/time.js'
import type { AccountChecker } from './detector.js'
import type { AccountCheckOutcome, MonitorStatus } from './types.js'

const log = logger.child('loop')

const DEFAULT_ACCOUNT_DELAY_MS = 1000
const DEFAULT_ERROR_THRESHOLD = 10
const DEFAULT_COOLDOWN_MS = 5 * 60 * 1000
const DEFAULT_FAILURE_PAUSE_MS = 10_000
const DEFAULT_TICK_MS = 1000
const DEFAULT_LEASE_TTL_MS = 10 * 60 * 1000

export interface PollLoopOptions {
  checker: AccountChecker
  settings: SettingsRepository
  store: StateStore
  leaseHolder?: string
  leaseTtlMs?: number
  accountDelayMs?: number
  errorThreshold?: number
  cooldownMs?: number
  failurePauseMs?: number
  tickMs?: number
  sleep?: Sleep
}

export class PollLoop {
  private readonly checker: AccountChecker
  private readonly settings: SettingsRepository
  private readonly store: StateStore
  private readonly leaseHolder: string
  private readonly leaseTtlMs: number
  private readonly accountDelayMs: number
  private readonly errorThreshold: number
  private readonly cooldownMs: number
  private readonly failurePauseMs: number
  private readonly tickMs: number
  private readonly sleep: Sleep
  private worker: Promise<void> | null = null
  private halted = false
  private consecutiveErrors = 0
  private cooldowns = 0
  private lastSweepStartedAt?: string
  private lastSweepFinishedAt?: string
  private lastSweepOutcomes: AccountCheckOutcome[] = []

  constructor(options: PollLoopOptions) {
    this.checker = options.checker
    this.settings = options.settings
    this.store = options.store
    this.leaseHolder = options.leaseHolder ?? `${os.hostname()}-${process.pid}`
    this.leaseTtlMs = options.leaseTtlMs ?? DEFAULT_LEASE_TTL_MS
    this.accountDelayMs = options.accountDelayMs ?? DEFAULT_ACCOUNT_DELAY_MS
    this.errorThreshold = Math.max(1, options.errorThreshold ?? DEFAULT_ERROR_THRESHOLD)
    this.cooldownMs = options.cooldownMs ?? DEFAULT_COOLDOWN_MS
    this.failurePauseMs = options.failurePauseMs ?? DEFAULT_FAILURE_PAUSE_MS
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS
    this.sleep = options.sleep ?? defaultSleep
  }

  isWorkerAlive(): boolean {
    return this.worker !== null
  }

  /** Number of error cool-downs entered since construction. */
  get cooldownCount(): number {
    return this.cooldowns
  }

  /**
   * Sets the persisted running flag and spawns the worker. Returns false
   * when a worker is already alive; it picks the flag up at its next check.
   */
  async start(): Promise<boolean> {
    this.halted = false
    try {
      await this.settings.setRunning(true)
    }
    catch (error) {
      log.warn('Running flag not persisted; starting anyway', { error: asErrorMessage(error) })
    }

    if (this.worker) {
      log.info('Monitor worker already running')
      return false
    }

    this.spawn()
    return true
  }

  private spawn(): void {
    log.info('Monitor worker starting')
    this.worker = this.runWorker()
      .catch((error: unknown) => {
        log.error('Monitor worker crashed', { error })
      })
      .finally(() => {
        this.worker = null
        // A start that landed while the worker was exiting.
        if (this.shouldContinue()) this.spawn()
      })
  }

  /** Clears the persisted running flag; the worker exits at its next check-point. */
  async stop(): Promise<void> {
    try {
      await this.settings.setRunning(false)
    }
    catch (error) {
      log.warn('Stopped flag not persisted', { error: asErrorMessage(error) })
    }
    log.info('Monitor stop requested')
  }

  /** Stops the worker for this process only, leaving the persisted flag as is. */
  halt(): void {
    this.halted = true
  }

  async waitForIdle(): Promise<void> {
    await this.worker
  }

  status(): MonitorStatus {
    const settings = this.settings.snapshot()
    return {
      state: this.isWorkerAlive() && this.shouldContinue() ? 'running' : 'stopped',
      running: settings.running,
      workerAlive: this.isWorkerAlive(),
      trackedStates: this.store.snapshotCount(),
      monitoredAccounts: settings.accounts.length,
      intervalSeconds: settings.intervalSeconds,
      consecutiveErrors: this.consecutiveErrors,
      lastSweepStartedAt: this.lastSweepStartedAt,
      lastSweepFinishedAt: this.lastSweepFinishedAt,
      lastSweepOutcomes: [...this.lastSweepOutcomes],
    }
  }

  private shouldContinue(): boolean {
    return !this.halted && this.settings.isRunning()
  }

  private async wait(ms: number): Promise<boolean> {
    return sleepWhile(ms, () => this.shouldContinue(), { tickMs: this.tickMs, sleep: this.sleep })
  }

  private async runWorker(): Promise<void> {
    log.info('Monitor loop started')

    while (this.shouldContinue()) {
      try {
        await this.runSweep()
        if (!this.shouldContinue()) break

        if (this.consecutiveErrors >= this.errorThreshold) {
          this.cooldowns += 1
          log.warn('Too many consecutive errors; cooling down', {
            consecutiveErrors: this.consecutiveErrors,
            cooldownMs: this.cooldownMs,
          })
          await this.wait(this.cooldownMs)
          this.consecutiveErrors = 0
          continue
        }

        const { intervalSeconds } = this.settings.snapshot()
        log.info('Waiting for next sweep', { intervalSeconds })
        await this.wait(intervalSeconds * 1000)
      }
      catch (error) {
        log.error('Monitor loop failed; pausing', { error, pauseMs: this.failurePauseMs })
        await this.sleep(this.failurePauseMs)
      }
    }

    log.info('Monitor loop stopped')
  }

  private async runSweep(): Promise<void> {
    const { accounts, intervalSeconds } = this.settings.snapshot()
    const startedAt = Date.now()
    const outcomes: AccountCheckOutcome[] = []
    this.lastSweepStartedAt = nowIso()
    log.info('Sweep started', { accounts: accounts.length, intervalSeconds })

    try {
      for (const handle of accounts) {
        if (!this.shouldContinue()) break
        // Renewed per account so a long sweep never outlives its lease.
        const leased = await this.store.acquireLease(this.leaseHolder, this.leaseTtlMs)
        if (!leased) {
          log.warn('Sweep aborted; another instance holds the monitor lease')
          break
        }

        outcomes.push(await this.checkOne(handle))
        await this.sleep(this.accountDelayMs)
      }
    }
    finally {
      await this.store.releaseLease(this.leaseHolder)
      this.lastSweepOutcomes = outcomes
      this.lastSweepFinishedAt = nowIso()
    }

    log.info('Sweep completed', {
      accounts: outcomes.length,
      failed: outcomes.filter(outcome => outcome.status === 'failed').length,
      notifications: outcomes.reduce((sum, outcome) => sum + outcome.notifications, 0),
      consecutiveErrors: this.consecutiveErrors,
      durationMs: Date.now() - startedAt,
    })
  }

  private async checkOne(handle: string): Promise<AccountCheckOutcome> {
    try {
      const outcome = await this.checker.checkAccount(handle)
      if (outcome.status === 'failed') {
        this.consecutiveErrors += 1
      }
      else if (outcome.status === 'ok') {
        this.consecutiveErrors = 0
      }
      return outcome
    }
    catch (error) {
      this.consecutiveErrors += 1
      log.error('Account check failed unexpectedly', {
        account: handle,
        consecutiveErrors: this.consecutiveErrors,
        error,
      })
      return {
        handle,
        status: 'failed',
        message: asErrorMessage(error),
        primed: [],
        updated: [],
        notifications: 0,
        delivered: 0,
      }
    }
  }
}
