import type { DataSourceClient, Item, Slot } from '../../types/index.js'
import type { Notifier } from '../notifications/types.js'
import type { StateStore } from '../state/store.js'
import { logger } from '../../utils/logger.js'
import { classify, classifiedEntries } from './classifier.js'
import type { AccountCheckOutcome, AccountIdentity, MonitorEvent } from './types.js'

const log = logger.child('detector')

export interface AccountChecker {
  checkAccount(handle: string): Promise<AccountCheckOutcome>
}

export interface ChangeDetectorOptions {
  client: DataSourceClient
  store: StateStore
  notifier: Notifier
  formatEvent: (event: MonitorEvent) => string
  /** Consulted inside each state transaction; a removed account is left alone. */
  isMonitored?: (handle: string) => boolean
}

interface SlotChanges {
  removed: boolean
  writes: Array<{ slot: Slot; id: string | null }>
  primed: Slot[]
  updated: Slot[]
  events: MonitorEvent[]
}

function emptyChanges(): SlotChanges {
  return { removed: false, writes: [], primed: [], updated: [], events: [] }
}

export class ChangeDetector implements AccountChecker {
  private readonly client: DataSourceClient
  private readonly store: StateStore
  private readonly notifier: Notifier
  private readonly formatEvent: (event: MonitorEvent) => string
  private readonly isMonitored: (handle: string) => boolean

  constructor(options: ChangeDetectorOptions) {
    this.client = options.client
    this.store = options.store
    this.notifier = options.notifier
    this.formatEvent = options.formatEvent
    this.isMonitored = options.isMonitored ?? (() => true)
  }

  async checkAccount(handle: string): Promise<AccountCheckOutcome> {
    log.info('Checking account', { account: handle })
    const outcome: AccountCheckOutcome = {
      handle,
      status: 'ok',
      primed: [],
      updated: [],
      notifications: 0,
      delivered: 0,
    }
    let account: AccountIdentity = { handle, name: handle }
    let currentPinned: string | null = null

    const profile = await this.client.fetchProfile(handle)
    if (profile.ok) {
      account = { handle, name: profile.value.name }
      currentPinned = profile.value.pinnedItemId
      const changes = await this.applyPinned(outcome, account, currentPinned)
      if (changes.removed) return this.skipRemoved(outcome)
    }
    else {
      log.warn('Profile fetch failed; pinned check skipped', {
        account: handle,
        kind: profile.kind,
        message: profile.message,
      })
    }

    const items = await this.client.fetchRecentItems(handle)
    if (!items.ok) {
      log.warn('Recent items fetch failed; account skipped this cycle', {
        account: handle,
        kind: items.kind,
        message: items.message,
      })
      return { ...outcome, status: 'failed', message: items.message }
    }

    if (items.value.length === 0) {
      log.info('No recent items', { account: handle })
      return outcome
    }
    log.debug('Recent items fetched', { account: handle, count: items.value.length })

    const changes = await this.applyItems(outcome, account, items.value, currentPinned)
    if (changes.removed) return this.skipRemoved(outcome)

    log.info('Account checked', {
      account: handle,
      primed: outcome.primed,
      updated: outcome.updated,
      notifications: outcome.notifications,
    })
    return outcome
  }

  private async applyPinned(
    outcome: AccountCheckOutcome,
    account: AccountIdentity,
    currentPinned: string | null,
  ): Promise<SlotChanges> {
    const { handle } = account
    return this.store.transaction(async (store) => {
      const changes = emptyChanges()
      if (!this.isMonitored(handle)) {
        changes.removed = true
        return changes
      }

      if (!store.has(handle, 'pinned')) {
        changes.writes.push({ slot: 'pinned', id: currentPinned })
        changes.primed.push('pinned')
        log.info('Pinned reference primed', { account: handle, pinned: currentPinned })
      }
      else {
        const previous = store.get(handle, 'pinned') ?? null
        if (previous === currentPinned) return changes
        changes.writes.push({ slot: 'pinned', id: currentPinned })
        changes.updated.push('pinned')
        if (currentPinned) {
          log.info('Pinned item changed', { account: handle, previous, current: currentPinned })
          changes.events.push({ kind: 'pinned-changed', account, previousId: previous, currentId: currentPinned })
        }
        else if (previous) {
          log.info('Pinned item cleared', { account: handle, previous })
          changes.events.push({ kind: 'pinned-cleared', account, previousId: previous })
        }
      }

      return this.commit(store, outcome, changes)
    })
  }

  private async applyItems(
    outcome: AccountCheckOutcome,
    account: AccountIdentity,
    items: readonly Item[],
    currentPinned: string | null,
  ): Promise<SlotChanges> {
    const { handle } = account
    const classified = classify(items)
    return this.store.transaction(async (store) => {
      const changes = emptyChanges()
      if (!this.isMonitored(handle)) {
        changes.removed = true
        return changes
      }

      for (const [category, item] of classifiedEntries(classified)) {
        if (!store.has(handle, category)) {
          changes.writes.push({ slot: category, id: item.id })
          changes.primed.push(category)
          log.info('Slot primed', { account: handle, slot: category, id: item.id })
          continue
        }

        if (store.get(handle, category) === item.id) continue
        changes.writes.push({ slot: category, id: item.id })
        changes.updated.push(category)

        if (item.id === currentPinned) {
          log.info('Pinned item already reported; slot updated silently', {
            account: handle,
            slot: category,
            id: item.id,
          })
          continue
        }

        log.info('New item detected', { account: handle, slot: category, id: item.id })
        changes.events.push({ kind: 'new-item', account, item })
      }

      return this.commit(store, outcome, changes)
    })
  }

  /**
   * Sends the queued notifications, then records the new ids. A send that
   * throws leaves the previous ids in place, so the next check repeats it.
   */
  private async commit(store: StateStore, outcome: AccountCheckOutcome, changes: SlotChanges): Promise<SlotChanges> {
    outcome.primed.push(...changes.primed)
    outcome.updated.push(...changes.updated)
    await this.deliver(outcome, changes.events)

    if (changes.writes.length === 0) return changes
    for (const { slot, id } of changes.writes) {
      store.put(outcome.handle, slot, id)
    }
    await store.persist()
    return changes
  }

  private skipRemoved(outcome: AccountCheckOutcome): AccountCheckOutcome {
    log.info('Account removed during check; skipping', { account: outcome.handle })
    return { ...outcome, status: 'skipped', message: 'Account no longer monitored' }
  }

  private async deliver(outcome: AccountCheckOutcome, events: MonitorEvent[]): Promise<void> {
    for (const event of events) {
      outcome.notifications += 1
      const delivered = await this.notifier.send(this.formatEvent(event))
      if (delivered) outcome.delivered += 1
      log.info(delivered ? 'Notification delivered' : 'Notification not delivered', {
        account: event.account.handle,
        kind: event.kind,
      })
    }
  }
}
