import type { AccountCheckOutcome, MonitorStatus } from '../../core/monitor/types.js'
import type { AccountPreview, MonitorController } from '../../core/monitor/controller.js'
import { ITEM_CATEGORIES } from '../../types/index.js'
import type { TelegramBotCommand } from './types.js'
import { escapeHtml, truncateText } from './format.js'

const PREVIEW_TEXT_LIMIT = 120

export interface ParsedCommand {
  name: string
  args: string[]
}

export type CommandHandler = (command: ParsedCommand) => Promise<string | null>

export const BOT_COMMANDS: TelegramBotCommand[] = [
  { command: 'status', description: 'Show monitor status' },
  { command: 'run', description: 'Start monitoring' },
  { command: 'stop', description: 'Stop monitoring' },
  { command: 'accounts', description: 'List monitored accounts' },
  { command: 'add', description: 'Monitor an account: /add <handle>' },
  { command: 'remove', description: 'Stop monitoring an account: /remove <handle>' },
  { command: 'items', description: 'Show latest items: /items <handle>' },
  { command: 'interval', description: 'Set check interval: /interval <seconds>' },
  { command: 'test', description: 'Send a test notification' },
  { command: 'help', description: 'Show available commands' },
]

export function parseCommand(text: string, botUsername?: string): ParsedCommand | null {
  const trimmed = text.trim()
  if (!trimmed.startsWith('/')) return null

  const [token = '', ...args] = trimmed.split(/\s+/)
  const [rawName, mention] = token.slice(1).split('@')
  if (!rawName) return null
  if (mention && botUsername && mention.toLowerCase() !== botUsername.toLowerCase()) {
    return null
  }
  return {
    name: rawName.toLowerCase(),
    args,
  }
}

export function formatHelp(): string {
  const lines = ['<b>Social Watch commands</b>']
  for (const command of BOT_COMMANDS) {
    lines.push(`/${command.command} - ${escapeHtml(command.description)}`)
  }
  return lines.join('\n')
}

function formatOutcome(outcome: AccountCheckOutcome): string {
  const detail = outcome.message ? ` (${escapeHtml(outcome.message)})` : ''
  return `@${escapeHtml(outcome.handle)}: ${outcome.status}, ${outcome.notifications} new${detail}`
}

export function formatStatus(status: MonitorStatus): string {
  const lines = [
    '<b>Monitor status</b>',
    `State: ${status.state}`,
    `Running flag: ${status.running ? 'on' : 'off'}`,
    `Worker alive: ${status.workerAlive ? 'yes' : 'no'}`,
    `Accounts: ${status.monitoredAccounts}`,
    `Tracked states: ${status.trackedStates}`,
    `Interval: ${status.intervalSeconds}s`,
    `Consecutive errors: ${status.consecutiveErrors}`,
  ]
  if (status.lastSweepFinishedAt) {
    lines.push(`Last sweep: ${escapeHtml(status.lastSweepFinishedAt)}`)
    lines.push(...status.lastSweepOutcomes.map(formatOutcome))
  }
  return lines.join('\n')
}

export function formatPreview(preview: AccountPreview): string {
  const lines = [`<b>Latest items for @${escapeHtml(preview.handle)}</b>`]
  for (const category of ITEM_CATEGORIES) {
    const item = preview.classified[category]
    if (!item) {
      lines.push(`${category}: none`)
      continue
    }
    const text = escapeHtml(truncateText(item.text, PREVIEW_TEXT_LIMIT))
    lines.push(`${category}: ${escapeHtml(item.id)} ${escapeHtml(item.url)}\n${text}`)
  }
  lines.push(`pinned: ${preview.pinnedItemId ? escapeHtml(preview.pinnedItemId) : 'none'}`)
  return lines.join('\n')
}

function usage(command: string, argument: string): string {
  return `Usage: /${command} &lt;${argument}&gt;`
}

export function createCommandHandler(controller: MonitorController): CommandHandler {
  return async (command) => {
    switch (command.name) {
      case 'start':
      case 'help':
        return formatHelp()
      case 'status':
        return formatStatus(controller.status())
      case 'run': {
        const result = await controller.startMonitor()
        if (!result.ok) return escapeHtml(result.message)
        return result.started ? 'Monitoring started.' : 'Monitoring is already running.'
      }
      case 'stop': {
        const result = await controller.stopMonitor()
        return result.ok ? 'Monitoring will stop at the next check-point.' : escapeHtml(result.message)
      }
      case 'accounts': {
        const accounts = controller.listAccounts()
        if (accounts.length === 0) return 'No accounts monitored.'
        return accounts.map(handle => `@${escapeHtml(handle)}`).join('\n')
      }
      case 'add': {
        const [handle] = command.args
        if (!handle) return usage('add', 'handle')
        const result = await controller.addAccount(handle)
        if (!result.ok) return escapeHtml(result.message)
        const { profile } = result
        return `Now monitoring ${escapeHtml(profile.name)} (@${escapeHtml(profile.handle)}), ${profile.followers} followers.`
      }
      case 'remove': {
        const [handle] = command.args
        if (!handle) return usage('remove', 'handle')
        const result = await controller.removeAccount(handle)
        if (!result.ok) return escapeHtml(result.message)
        return `Stopped monitoring @${escapeHtml(handle.replace(/^@+/, ''))}; cleared ${result.removedEntries} tracked states.`
      }
      case 'items': {
        const [handle] = command.args
        if (!handle) return usage('items', 'handle')
        const result = await controller.previewAccount(handle)
        if (!result.ok) return escapeHtml(result.message)
        return formatPreview(result.preview)
      }
      case 'interval': {
        const [raw] = command.args
        if (!raw) return usage('interval', 'seconds')
        const result = await controller.setInterval(Number(raw))
        if (!result.ok) return escapeHtml(result.message)
        return `Check interval set to ${result.intervalSeconds}s.`
      }
      case 'test': {
        const result = await controller.sendTestMessage()
        return result.ok ? 'Test message sent.' : escapeHtml(result.message)
      }
      default:
        return null
    }
  }
}
