import type { Item, Slot } from '../../types/index.js'

export interface AccountIdentity {
  handle: string
  name: string
}

export type MonitorEvent =
  | { kind: 'new-item'; account: AccountIdentity; item: Item }
  | { kind: 'pinned-changed'; account: AccountIdentity; previousId: string | null; currentId: string }
  | { kind: 'pinned-cleared'; account: AccountIdentity; previousId: string }

export type MonitorState = 'stopped' | 'running'

export interface AccountCheckOutcome {
  handle: string
  status: 'ok' | 'failed' | 'skipped'
  message?: string
  primed: Slot[]
  updated: Slot[]
  notifications: number
  delivered: number
}

export interface MonitorStatus {
  state: MonitorState
  running: boolean
  workerAlive: boolean
  trackedStates: number
  monitoredAccounts: number
  intervalSeconds: number
  consecutiveErrors: number
  lastSweepStartedAt?: string
  lastSweepFinishedAt?: string
  lastSweepOutcomes: AccountCheckOutcome[]
}
