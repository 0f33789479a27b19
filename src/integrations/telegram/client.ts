import { asErrorMessage, logger } from '../../utils/logger.js'
import { sleep as defaultSleep } from '../../utils/time.js'
import type { Sleep } from '../../utils/time.js'
import { TelegramBotApiClient } from './api.js'
import { BOT_COMMANDS, parseCommand } from './commands.js'
import type { CommandHandler } from './commands.js'
import type { TelegramUpdate } from './types.js'

const log = logger.child('telegram:bot')

const POLL_TIMEOUT_SECONDS = 30
const MIN_POLL_BACKOFF_MS = 2000
const MAX_POLL_BACKOFF_MS = 60_000
const COMMAND_FAILED_REPLY = 'Command failed. Check service logs and try again.'

export type BotApi = Pick<TelegramBotApiClient, 'getMe' | 'deleteWebhook' | 'setMyCommands' | 'getUpdates' | 'sendMessage'>

export interface TelegramCommandBotOptions {
  token: string
  allowedChatIds: string[]
  handleCommand: CommandHandler
  api?: BotApi
  sleep?: Sleep
}

/**
 * Long-polls `getUpdates` and answers operator commands from allowed chats.
 * Only text messages are read; everything else is acknowledged and dropped.
 */
export class TelegramCommandBot {
  private readonly api: BotApi
  private readonly allowedChatIds: Set<string>
  private readonly handleCommand: CommandHandler
  private readonly sleep: Sleep
  private botUsername?: string
  private nextOffset?: number
  private stopped = true
  private polling: Promise<void> | null = null

  constructor(options: TelegramCommandBotOptions) {
    this.api = options.api ?? new TelegramBotApiClient(options.token)
    this.allowedChatIds = new Set(
      options.allowedChatIds
        .map(chatId => chatId.trim())
        .filter(chatId => chatId.length > 0),
    )
    this.handleCommand = options.handleCommand
    this.sleep = options.sleep ?? defaultSleep
  }

  /** Registers the bot and starts polling. Returns false when no chat may issue commands. */
  async start(): Promise<boolean> {
    if (this.allowedChatIds.size === 0) {
      log.warn('Command bot not started; no allowed chat IDs configured')
      return false
    }
    if (this.polling) {
      this.stopped = false
      return true
    }

    await this.prepare()
    this.stopped = false
    this.polling = this.pollUntilStopped()
      .catch((error: unknown) => {
        log.error('Command polling crashed', { error })
      })
      .finally(() => {
        this.polling = null
      })
    return true
  }

  /** Polling ends once the in-flight long poll returns. */
  stop(): void {
    this.stopped = true
  }

  async handleUpdate(update: TelegramUpdate): Promise<void> {
    const message = update.message
    if (!message?.text) return
    const chatId = String(message.chat.id)

    if (!this.allowedChatIds.has(chatId)) {
      log.warn('Command ignored from unauthorized chat', { chatId, updateId: update.update_id })
      return
    }

    const command = parseCommand(message.text, this.botUsername)
    if (!command) return
    log.info('Command received', { command: command.name, chatId })

    let text: string | null
    try {
      text = await this.handleCommand(command)
    }
    catch (error) {
      log.warn('Command failed', { command: command.name, chatId, error: asErrorMessage(error) })
      text = COMMAND_FAILED_REPLY
    }
    if (!text) return

    await this.api.sendMessage({
      chatId,
      threadId: message.message_thread_id,
      text,
      disableWebPreview: true,
    })
  }

  private async prepare(): Promise<void> {
    try {
      const me = await this.api.getMe()
      this.botUsername = me.username
      log.info('Bot ready', { username: me.username ?? '[unknown]', id: me.id })
    }
    catch (error) {
      log.warn('getMe failed', { error: asErrorMessage(error) })
    }

    try {
      await this.api.deleteWebhook(true)
    }
    catch (error) {
      log.warn('deleteWebhook failed', { error: asErrorMessage(error) })
    }

    try {
      await this.api.setMyCommands(BOT_COMMANDS)
    }
    catch (error) {
      log.warn('Command registration failed', { error: asErrorMessage(error) })
    }
  }

  private async pollUntilStopped(): Promise<void> {
    let backoffMs = MIN_POLL_BACKOFF_MS

    while (!this.stopped) {
      let updates: TelegramUpdate[]
      try {
        updates = await this.api.getUpdates({
          offset: this.nextOffset,
          timeout: POLL_TIMEOUT_SECONDS,
          allowed_updates: ['message'],
        })
      }
      catch (error) {
        if (this.stopped) break
        log.warn('Polling cycle failed', { error: asErrorMessage(error), backoffMs })
        await this.sleep(backoffMs)
        backoffMs = Math.min(MAX_POLL_BACKOFF_MS, backoffMs * 2)
        continue
      }

      backoffMs = MIN_POLL_BACKOFF_MS
      for (const update of updates) {
        this.nextOffset = update.update_id + 1
        try {
          await this.handleUpdate(update)
        }
        catch (error) {
          log.warn('Reply failed', { updateId: update.update_id, error: asErrorMessage(error) })
        }
      }
    }
    log.info('Command polling stopped')
  }
}
