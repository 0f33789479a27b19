import { MIN_INTERVAL_SECONDS, normalizeHandle } from '../../config/index.js'
import type { ClassifiedItems, DataSourceClient, ProfileInfo } from '../../types/index.js'
import type { Notifier } from '../notifications/types.js'
import type { SettingsRepository } from '../settings/repository.js'
import type { StateStore } from '../state/store.js'
import { asErrorMessage, logger } from '../../utils/logger.js'
import { classify } from './classifier.js'
import type { PollLoop } from './loop.js'
import type { MonitorStatus } from './types.js'

const log = logger.child('controller')

export type ControllerResult<T extends object = object> =
  | ({ ok: true } & T)
  | { ok: false; message: string }

export interface AccountPreview {
  handle: string
  classified: ClassifiedItems
  pinnedItemId: string | null
}

export interface MonitorControllerOptions {
  loop: PollLoop
  settings: SettingsRepository
  store: StateStore
  client: DataSourceClient
  notifier: Notifier
  testMessage: () => string
}

/** Operations behind the operator surface; results are tagged, never thrown. */
export class MonitorController {
  private readonly loop: PollLoop
  private readonly settings: SettingsRepository
  private readonly store: StateStore
  private readonly client: DataSourceClient
  private readonly notifier: Notifier
  private readonly testMessage: () => string

  constructor(options: MonitorControllerOptions) {
    this.loop = options.loop
    this.settings = options.settings
    this.store = options.store
    this.client = options.client
    this.notifier = options.notifier
    this.testMessage = options.testMessage
  }

  status(): MonitorStatus {
    return this.loop.status()
  }

  listAccounts(): string[] {
    return this.settings.snapshot().accounts
  }

  async startMonitor(): Promise<ControllerResult<{ started: boolean }>> {
    const started = await this.loop.start()
    return { ok: true, started }
  }

  async stopMonitor(): Promise<ControllerResult> {
    await this.loop.stop()
    return { ok: true }
  }

  async addAccount(raw: string): Promise<ControllerResult<{ profile: ProfileInfo }>> {
    const handle = normalizeHandle(raw)
    if (!handle) return { ok: false, message: 'Account handle cannot be empty' }
    if (this.settings.hasAccount(handle)) {
      return { ok: false, message: `@${handle} is already monitored` }
    }

    const profile = await this.client.fetchProfile(handle)
    if (!profile.ok) {
      log.warn('Account verification failed', { account: handle, message: profile.message })
      return { ok: false, message: `Account not found or API error: ${profile.message}` }
    }

    try {
      const added = await this.settings.addAccount(handle)
      if (!added) return { ok: false, message: `@${handle} is already monitored` }
    }
    catch (error) {
      return { ok: false, message: `Failed to save settings: ${asErrorMessage(error)}` }
    }
    log.info('Account added', { account: handle, name: profile.value.name })
    return { ok: true, profile: profile.value }
  }

  async removeAccount(raw: string): Promise<ControllerResult<{ removedEntries: number }>> {
    const handle = normalizeHandle(raw)
    if (!handle) return { ok: false, message: 'Account handle cannot be empty' }

    try {
      // State goes first so a failed settings save cannot leave stale ids behind.
      const { wasMonitored, removedEntries } = await this.store.transaction(async (store) => {
        const removedEntries = store.deleteAccount(handle)
        if (removedEntries > 0) await store.persist()
        const wasMonitored = await this.settings.removeAccount(handle)
        return { wasMonitored, removedEntries }
      })
      if (!wasMonitored && removedEntries === 0) {
        return { ok: false, message: `@${handle} is not monitored` }
      }
      log.info('Account removed', { account: handle, removedEntries })
      return { ok: true, removedEntries }
    }
    catch (error) {
      return { ok: false, message: `Failed to remove @${handle}: ${asErrorMessage(error)}` }
    }
  }

  async previewAccount(raw: string): Promise<ControllerResult<{ preview: AccountPreview }>> {
    const handle = normalizeHandle(raw)
    if (!handle) return { ok: false, message: 'Account handle cannot be empty' }

    const items = await this.client.fetchRecentItems(handle)
    if (!items.ok) return { ok: false, message: items.message }
    const profile = await this.client.fetchProfile(handle)

    return {
      ok: true,
      preview: {
        handle,
        classified: classify(items.value),
        pinnedItemId: profile.ok ? profile.value.pinnedItemId : null,
      },
    }
  }

  async setInterval(seconds: number): Promise<ControllerResult<{ intervalSeconds: number }>> {
    if (!Number.isInteger(seconds) || seconds < MIN_INTERVAL_SECONDS) {
      return { ok: false, message: `Interval must be a whole number of at least ${MIN_INTERVAL_SECONDS} seconds` }
    }
    try {
      await this.settings.setInterval(seconds)
    }
    catch (error) {
      return { ok: false, message: `Failed to save settings: ${asErrorMessage(error)}` }
    }
    log.info('Check interval updated', { intervalSeconds: seconds })
    return { ok: true, intervalSeconds: seconds }
  }

  async sendTestMessage(): Promise<ControllerResult> {
    const delivered = await this.notifier.send(this.testMessage())
    if (!delivered) {
      return { ok: false, message: 'Test message not delivered; check the Telegram configuration' }
    }
    return { ok: true }
  }
}
