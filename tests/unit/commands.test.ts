import fs from 'node:fs/promises'
import path from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { MonitorController } from '../../src/core/monitor/controller.js'
import { ChangeDetector } from '../../src/core/monitor/detector.js'
import { PollLoop } from '../../src/core/monitor/loop.js'
import type { MonitorStatus } from '../../src/core/monitor/types.js'
import { SettingsRepository } from '../../src/core/settings/repository.js'
import { StateStore } from '../../src/core/state/store.js'
import {
  createCommandHandler,
  formatHelp,
  formatPreview,
  formatStatus,
  parseCommand,
} from '../../src/integrations/telegram/commands.js'
import type { CommandHandler } from '../../src/integrations/telegram/commands.js'
import { FakeDataSource, RecordingNotifier, item, makeTempDir } from '../helpers/fakes.js'

describe('parseCommand', () => {
  it('splits the command name from its arguments', () => {
    expect(parseCommand('  /Add   alice  ')).toEqual({ name: 'add', args: ['alice'] })
  })

  it('accepts a mention of this bot', () => {
    expect(parseCommand('/status@WatchBot', 'watchbot')).toEqual({ name: 'status', args: [] })
  })

  it('ignores commands addressed to another bot', () => {
    expect(parseCommand('/status@OtherBot', 'watchbot')).toBeNull()
  })

  it.each(['hello', '/', ''])('ignores %j', (text) => {
    expect(parseCommand(text)).toBeNull()
  })
})

describe('formatStatus', () => {
  const base: MonitorStatus = {
    state: 'running',
    running: true,
    workerAlive: true,
    trackedStates: 8,
    monitoredAccounts: 2,
    intervalSeconds: 60,
    consecutiveErrors: 1,
    lastSweepOutcomes: [],
  }

  it('lists the monitor counters', () => {
    expect(formatStatus(base)).toBe([
      '<b>Monitor status</b>',
      'State: running',
      'Running flag: on',
      'Worker alive: yes',
      'Accounts: 2',
      'Tracked states: 8',
      'Interval: 60s',
      'Consecutive errors: 1',
    ].join('\n'))
  })

  it('appends the last sweep outcomes', () => {
    const text = formatStatus({
      ...base,
      lastSweepFinishedAt: '2024-01-01T10:00:00.000Z',
      lastSweepOutcomes: [
        { handle: 'alice', status: 'ok', primed: [], updated: ['original'], notifications: 1, delivered: 1 },
        { handle: 'bob', status: 'failed', message: 'HTTP <500>', primed: [], updated: [], notifications: 0, delivered: 0 },
      ],
    })

    expect(text.split('\n').slice(-3)).toEqual([
      'Last sweep: 2024-01-01T10:00:00.000Z',
      '@alice: ok, 1 new',
      '@bob: failed, 0 new (HTTP &lt;500&gt;)',
    ])
  })
})

describe('formatPreview', () => {
  it('shows each category and the pinned reference', () => {
    const text = formatPreview({
      handle: 'alice',
      classified: { original: item('2', 'original', 'hi & bye') },
      pinnedItemId: null,
    })

    expect(text).toBe([
      '<b>Latest items for @alice</b>',
      'original: 2 https://x.com/someone/status/2',
      'hi &amp; bye',
      'reply: none',
      'repost: none',
      'pinned: none',
    ].join('\n'))
  })
})

describe('formatHelp', () => {
  it('lists every command with an escaped description', () => {
    const lines = formatHelp().split('\n')

    expect(lines[0]).toBe('<b>Social Watch commands</b>')
    expect(lines).toContain('/add - Monitor an account: /add &lt;handle&gt;')
    expect(lines).toHaveLength(11)
  })
})

describe('createCommandHandler', () => {
  let dataPath: string
  let source: FakeDataSource
  let notifier: RecordingNotifier
  let loop: PollLoop
  let handle: CommandHandler

  beforeEach(async () => {
    dataPath = await makeTempDir()
    source = new FakeDataSource()
    notifier = new RecordingNotifier()
    const settings = new SettingsRepository(path.join(dataPath, 'settings.json'))
    const store = new StateStore(dataPath)
    const detector = new ChangeDetector({
      client: source,
      store,
      notifier,
      formatEvent: event => event.kind,
    })
    loop = new PollLoop({
      checker: detector,
      settings,
      store,
      sleep: () => new Promise(resolve => setImmediate(resolve)),
    })
    handle = createCommandHandler(new MonitorController({
      loop,
      settings,
      store,
      client: source,
      notifier,
      testMessage: () => 'test message',
    }))
  })

  afterEach(async () => {
    loop.halt()
    await loop.waitForIdle()
    await fs.rm(dataPath, { recursive: true, force: true })
  })

  it('manages the account list', async () => {
    source.setProfile('alice')

    await expect(handle({ name: 'accounts', args: [] })).resolves.toBe('No accounts monitored.')
    await expect(handle({ name: 'add', args: ['@alice'] })).resolves.toBe(
      'Now monitoring alice name (@alice), 42 followers.',
    )
    await expect(handle({ name: 'accounts', args: [] })).resolves.toBe('@alice')
    await expect(handle({ name: 'remove', args: ['@alice'] })).resolves.toBe(
      'Stopped monitoring @alice; cleared 0 tracked states.',
    )
    await expect(handle({ name: 'remove', args: ['alice'] })).resolves.toBe('@alice is not monitored')
  })

  it('answers with usage when an argument is missing', async () => {
    await expect(handle({ name: 'add', args: [] })).resolves.toBe('Usage: /add &lt;handle&gt;')
    await expect(handle({ name: 'items', args: [] })).resolves.toBe('Usage: /items &lt;handle&gt;')
    await expect(handle({ name: 'interval', args: [] })).resolves.toBe('Usage: /interval &lt;seconds&gt;')
  })

  it('updates the interval', async () => {
    await expect(handle({ name: 'interval', args: ['15'] })).resolves.toBe('Check interval set to 15s.')
    await expect(handle({ name: 'interval', args: ['soon'] })).resolves.toBe(
      'Interval must be a whole number of at least 5 seconds',
    )
  })

  it('starts the monitor once', async () => {
    await expect(handle({ name: 'run', args: [] })).resolves.toBe('Monitoring started.')
    await expect(handle({ name: 'run', args: [] })).resolves.toBe('Monitoring is already running.')
    await expect(handle({ name: 'stop', args: [] })).resolves.toBe('Monitoring will stop at the next check-point.')
  })

  it('sends a test message', async () => {
    await expect(handle({ name: 'test', args: [] })).resolves.toBe('Test message sent.')
    expect(notifier.messages).toEqual(['test message'])
  })

  it('previews an account', async () => {
    source.setProfile('alice').setItems('alice', [item('1', 'repost', 'shared')])

    const reply = await handle({ name: 'items', args: ['alice'] })

    expect(reply?.split('\n')).toContain('repost: 1 https://x.com/someone/status/1')
  })

  it('shows help for /start and /help', async () => {
    await expect(handle({ name: 'start', args: [] })).resolves.toBe(formatHelp())
    await expect(handle({ name: 'help', args: [] })).resolves.toBe(formatHelp())
  })

  it('ignores unknown commands', async () => {
    await expect(handle({ name: 'dance', args: [] })).resolves.toBeNull()
  })
})
