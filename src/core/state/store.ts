import fs from 'node:fs/promises'
import path from 'node:path'
import { z } from 'zod'
import { SLOTS } from '../../types/index.js'
import type { Slot } from '../../types/index.js'
import { asErrorMessage, logger } from '../../utils/logger.js'

const log = logger.child('state')

const SNAPSHOT_VERSION = 1

const slotValueSchema = z.string().min(1).nullable().optional()

const accountEntriesSchema = z.object({
  original: slotValueSchema,
  reply: slotValueSchema,
  repost: slotValueSchema,
  pinned: slotValueSchema,
})

const snapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  accounts: z.record(accountEntriesSchema).default({}),
})

// Flat `<handle>_<slot>` map written by the first generation of the monitor.
const legacySnapshotSchema = z.record(z.union([z.string(), z.number()]).nullable())

const LEGACY_SLOT_SUFFIXES: Record<string, Slot> = {
  original: 'original',
  reply: 'reply',
  repost: 'repost',
  retweet: 'repost',
  pinned: 'pinned',
}

const leaseSchema = z.object({
  holder: z.string().min(1),
  expiresAt: z.string().min(1),
  acquiredAt: z.string().min(1),
})

export type SlotEntries = Partial<Record<Slot, string | null>>

export type StateSnapshot = z.infer<typeof snapshotSchema>

export interface StateStoreOptions {
  fileName?: string
  lockFileName?: string
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error
}

function splitLegacyKey(key: string): { account: string; slot: Slot } | null {
  const separator = key.lastIndexOf('_')
  if (separator <= 0) return null
  const slot = LEGACY_SLOT_SUFFIXES[key.slice(separator + 1)]
  if (!slot) return null
  return { account: key.slice(0, separator), slot }
}

/**
 * Last-seen item id per (account, slot), mirrored to `state.json`.
 *
 * Writers run inside `transaction()` so a batch of updates and the persist
 * that follows it never interleave with another batch.
 */
export class StateStore {
  readonly dataPath: string
  private readonly statePath: string
  private readonly lockPath: string
  private readonly entries = new Map<string, Map<Slot, string | null>>()
  private transactionChain: Promise<void> = Promise.resolve()
  private writeChain: Promise<void> = Promise.resolve()

  constructor(dataPath: string, options: StateStoreOptions = {}) {
    this.dataPath = dataPath
    this.statePath = path.join(dataPath, options.fileName ?? 'state.json')
    this.lockPath = path.join(dataPath, options.lockFileName ?? 'monitor.lock')
  }

  get filePath(): string {
    return this.statePath
  }

  has(account: string, slot: Slot): boolean {
    return this.entries.get(account)?.has(slot) ?? false
  }

  /** `undefined` when the slot was never observed, `null` when observed empty. */
  get(account: string, slot: Slot): string | null | undefined {
    return this.entries.get(account)?.get(slot)
  }

  put(account: string, slot: Slot, id: string | null): void {
    let slots = this.entries.get(account)
    if (!slots) {
      slots = new Map()
      this.entries.set(account, slots)
    }
    slots.set(slot, id)
  }

  /** Removes every slot of the account and returns how many were dropped. */
  deleteAccount(account: string): number {
    const slots = this.entries.get(account)
    if (!slots) return 0
    this.entries.delete(account)
    return slots.size
  }

  accounts(): string[] {
    return Array.from(this.entries.keys())
  }

  entriesFor(account: string): SlotEntries {
    const result: SlotEntries = {}
    for (const [slot, id] of this.entries.get(account) ?? []) {
      result[slot] = id
    }
    return result
  }

  snapshotCount(): number {
    let count = 0
    for (const slots of this.entries.values()) {
      count += slots.size
    }
    return count
  }

  toSnapshot(): StateSnapshot {
    const accounts: StateSnapshot['accounts'] = {}
    for (const account of this.entries.keys()) {
      accounts[account] = this.entriesFor(account)
    }
    return { version: SNAPSHOT_VERSION, accounts }
  }

  async transaction<T>(fn: (store: StateStore) => Promise<T> | T): Promise<T> {
    const run = this.transactionChain.then(() => fn(this))
    this.transactionChain = run.then(() => undefined, () => undefined)
    return run
  }

  async load(): Promise<void> {
    let raw: string
    try {
      raw = await fs.readFile(this.statePath, 'utf8')
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') {
        log.info('No state snapshot found; starting empty', { path: this.statePath })
        return
      }
      log.error('State load failed; starting empty', { path: this.statePath, error })
      return
    }

    let payload: unknown
    try {
      payload = JSON.parse(raw)
    }
    catch (error) {
      log.error('State snapshot is not valid JSON; starting empty', {
        path: this.statePath,
        error: asErrorMessage(error),
      })
      return
    }

    this.entries.clear()
    const snapshot = snapshotSchema.safeParse(payload)
    if (snapshot.success) {
      for (const [account, slots] of Object.entries(snapshot.data.accounts)) {
        for (const slot of SLOTS) {
          const value = slots[slot]
          if (value !== undefined) this.put(account, slot, value)
        }
      }
      log.info('State restored', { path: this.statePath, entries: this.snapshotCount() })
      return
    }

    const legacy = legacySnapshotSchema.safeParse(payload)
    if (!legacy.success) {
      log.error('State snapshot has an unknown shape; starting empty', { path: this.statePath })
      return
    }

    const dropped: string[] = []
    for (const [key, value] of Object.entries(legacy.data)) {
      const parsedKey = splitLegacyKey(key)
      if (!parsedKey) {
        dropped.push(key)
        continue
      }
      this.put(parsedKey.account, parsedKey.slot, value === null ? null : String(value))
    }
    if (dropped.length > 0) {
      log.warn('Legacy state keys without a known slot were dropped', { keys: dropped })
    }
    log.info('Legacy state migrated', { path: this.statePath, entries: this.snapshotCount() })
  }

  /**
   * Writes the current mapping next to the snapshot and renames it into
   * place. Returns false on failure; memory stays authoritative.
   */
  async persist(): Promise<boolean> {
    const write = this.writeChain.then(() => this.writeSnapshot())
    this.writeChain = write.then(() => undefined, () => undefined)
    return write
  }

  private async writeSnapshot(): Promise<boolean> {
    const snapshot = this.toSnapshot()
    const tempPath = `${this.statePath}.${process.pid}.${Date.now()}.tmp`
    try {
      await fs.mkdir(this.dataPath, { recursive: true })
      await fs.writeFile(tempPath, JSON.stringify(snapshot, null, 2), 'utf8')
      await fs.rename(tempPath, this.statePath)
      log.debug('State saved', { path: this.statePath, entries: this.snapshotCount() })
      return true
    }
    catch (error) {
      log.error('State save failed; keeping in-memory state', { path: this.statePath, error })
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn('State temp file cleanup failed', { path: tempPath, error: asErrorMessage(cleanupError) })
      })
      return false
    }
  }

  async acquireLease(holder: string, ttlMs: number): Promise<boolean> {
    await fs.mkdir(this.dataPath, { recursive: true })
    const now = Date.now()
    const lease = {
      holder,
      acquiredAt: new Date(now).toISOString(),
      expiresAt: new Date(now + ttlMs).toISOString(),
    }

    try {
      const handle = await fs.open(this.lockPath, 'wx')
      try {
        await handle.writeFile(JSON.stringify(lease, null, 2), 'utf8')
      }
      finally {
        await handle.close()
      }
      log.debug('Monitor lease acquired', { holder, path: this.lockPath, mode: 'create' })
      return true
    }
    catch (error) {
      if (!isNodeError(error) || error.code !== 'EEXIST') {
        log.warn('Monitor lease create failed', { holder, error: asErrorMessage(error) })
        return false
      }
    }

    try {
      const raw = await fs.readFile(this.lockPath, 'utf8')
      const existing = leaseSchema.parse(JSON.parse(raw))
      const expiresAt = new Date(existing.expiresAt).getTime()
      if (Number.isFinite(expiresAt) && expiresAt > now && existing.holder !== holder) {
        log.warn('Monitor lease held by another instance', {
          holder,
          currentHolder: existing.holder,
          expiresAt: existing.expiresAt,
        })
        return false
      }
    }
    catch (error) {
      log.warn('Monitor lease unreadable; replacing lock', { holder, error: asErrorMessage(error) })
    }

    // Takeover goes through a rename, then a read-back: of two instances
    // replacing the same expired lease, only the last rename wins.
    const tempPath = `${this.lockPath}.${process.pid}.${Date.now()}.tmp`
    try {
      await fs.writeFile(tempPath, JSON.stringify(lease, null, 2), 'utf8')
      await fs.rename(tempPath, this.lockPath)
      const confirmed = leaseSchema.parse(JSON.parse(await fs.readFile(this.lockPath, 'utf8')))
      if (confirmed.holder !== holder) {
        log.warn('Monitor lease taken over by another instance', { holder, currentHolder: confirmed.holder })
        return false
      }
      log.debug('Monitor lease acquired', { holder, path: this.lockPath, mode: 'replace' })
      return true
    }
    catch (error) {
      log.warn('Monitor lease replace failed', { holder, error: asErrorMessage(error) })
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn('Lease temp file cleanup failed', { path: tempPath, error: asErrorMessage(cleanupError) })
      })
      return false
    }
  }

  async releaseLease(holder: string): Promise<void> {
    try {
      const raw = await fs.readFile(this.lockPath, 'utf8')
      const existing = leaseSchema.parse(JSON.parse(raw))
      if (existing.holder !== holder) return
      await fs.rm(this.lockPath)
      log.debug('Monitor lease released', { holder, path: this.lockPath })
    }
    catch (error) {
      if (isNodeError(error) && error.code === 'ENOENT') return
      log.warn('Monitor lease release failed', { holder, error: asErrorMessage(error) })
    }
  }
}
