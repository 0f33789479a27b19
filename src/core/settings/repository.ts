import fs from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { MIN_INTERVAL_SECONDS } from '../../config/index.js'
import { logger } from '../../utils/logger.js'

const log = logger.child('settings')

const optionalSecret = z.preprocess((value) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}, z.string().optional())

const settingsSchema = z.object({
  accounts: z.array(z.string().min(1)).default([]),
  intervalSeconds: z.number().int().min(MIN_INTERVAL_SECONDS).default(60),
  running: z.boolean().default(false),
  twitterApiKey: optionalSecret,
  telegramBotToken: optionalSecret,
  telegramChatId: optionalSecret,
})

export type MonitorSettings = z.infer<typeof settingsSchema>

export interface SettingsDefaults {
  accounts: string[]
  intervalSeconds: number
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

/**
 * Owns the mutable monitor settings. Readers get a copy per call, so a
 * mutation becomes visible to the poll loop at its next check-point.
 */
export class SettingsRepository {
  readonly settingsPath: string
  private current: MonitorSettings
  private saveChain: Promise<void> = Promise.resolve()

  constructor(settingsPath: string, initial?: Partial<MonitorSettings>) {
    this.settingsPath = settingsPath
    this.current = settingsSchema.parse(initial ?? {})
  }

  async load(defaults: SettingsDefaults): Promise<MonitorSettings> {
    let raw: string
    try {
      raw = await fs.readFile(this.settingsPath, 'utf8')
    }
    catch (error) {
      if (!isNodeError(error) || error.code !== 'ENOENT') {
        log.error('Failed to read settings', { path: this.settingsPath, error })
        throw error
      }
      this.current = settingsSchema.parse({
        accounts: defaults.accounts,
        intervalSeconds: defaults.intervalSeconds,
      })
      log.info('Settings file not found; created from environment', {
        path: this.settingsPath,
        accounts: this.current.accounts.length,
      })
      await this.save()
      return this.snapshot()
    }

    try {
      this.current = settingsSchema.parse(JSON.parse(raw))
    }
    catch (error) {
      log.error('Failed to parse settings', { path: this.settingsPath, error })
      throw error
    }
    log.debug('Settings loaded', {
      path: this.settingsPath,
      accounts: this.current.accounts.length,
      intervalSeconds: this.current.intervalSeconds,
      running: this.current.running,
    })
    return this.snapshot()
  }

  snapshot(): MonitorSettings {
    return { ...this.current, accounts: [...this.current.accounts] }
  }

  isRunning(): boolean {
    return this.current.running
  }

  hasAccount(handle: string): boolean {
    return this.current.accounts.includes(handle)
  }

  async setRunning(running: boolean): Promise<void> {
    if (this.current.running === running) return
    this.current = { ...this.current, running }
    await this.save()
  }

  async setInterval(intervalSeconds: number): Promise<void> {
    const parsed = settingsSchema.shape.intervalSeconds.parse(intervalSeconds)
    this.current = { ...this.current, intervalSeconds: parsed }
    await this.save()
  }

  /** Returns false when the handle is already monitored. */
  async addAccount(handle: string): Promise<boolean> {
    if (this.hasAccount(handle)) return false
    this.current = { ...this.current, accounts: [...this.current.accounts, handle] }
    await this.save()
    return true
  }

  /** Returns false when the handle was not monitored. */
  async removeAccount(handle: string): Promise<boolean> {
    if (!this.hasAccount(handle)) return false
    this.current = {
      ...this.current,
      accounts: this.current.accounts.filter(account => account !== handle),
    }
    await this.save()
    return true
  }

  private async save(): Promise<void> {
    const payload = JSON.stringify(settingsSchema.parse(this.current), null, 2)
    const write = this.saveChain.then(async () => {
      await fs.mkdir(path.dirname(this.settingsPath), { recursive: true })
      await fs.writeFile(this.settingsPath, payload, 'utf8')
    })
    this.saveChain = write.catch(() => undefined)
    try {
      await write
    }
    catch (error) {
      log.error('Failed to save settings', { path: this.settingsPath, error })
      throw error
    }
  }
}
