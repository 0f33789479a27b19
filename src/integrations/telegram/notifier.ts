import type { Notifier } from '../../core/notifications/types.js'
import { asErrorMessage, logger, maskSecret } from '../../utils/logger.js'
import { sleep as defaultSleep } from '../../utils/time.js'
import type { Sleep } from '../../utils/time.js'
import { TelegramBotApiClient, TelegramRequestError } from './api.js'
import type { TelegramCredentials } from './types.js'

const log = logger.child('telegram')

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_RETRY_DELAY_MS = 2000

export interface TelegramNotifierOptions {
  /** Read on every send so updated credentials apply without a restart. */
  credentials: () => TelegramCredentials
  threadId?: number
  maxAttempts?: number
  retryDelayMs?: number
  sleep?: Sleep
}

export class TelegramNotifier implements Notifier {
  private readonly credentials: () => TelegramCredentials
  private readonly threadId?: number
  private readonly maxAttempts: number
  private readonly retryDelayMs: number
  private readonly sleep: Sleep
  private api?: { token: string; client: TelegramBotApiClient }
  private sendChain: Promise<unknown> = Promise.resolve()

  constructor(options: TelegramNotifierOptions) {
    this.credentials = options.credentials
    this.threadId = options.threadId
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.sleep = options.sleep ?? defaultSleep
  }

  isConfigured(): boolean {
    const { botToken, chatId } = this.credentials()
    return Boolean(botToken?.trim() && chatId?.trim())
  }

  async send(text: string): Promise<boolean> {
    const run = this.sendChain.then(() => this.deliver(text))
    this.sendChain = run.catch(() => undefined)
    return run
  }

  private clientFor(token: string): TelegramBotApiClient {
    if (this.api?.token !== token) {
      this.api = { token, client: new TelegramBotApiClient(token) }
    }
    return this.api.client
  }

  private async deliver(text: string): Promise<boolean> {
    const credentials = this.credentials()
    const token = credentials.botToken?.trim()
    const chatId = credentials.chatId?.trim()
    if (!token || !chatId) {
      log.warn('Telegram notification skipped; bot token or chat ID not configured')
      return false
    }

    const client = this.clientFor(token)
    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      try {
        await client.sendMessage({
          chatId,
          threadId: this.threadId,
          text,
          disableWebPreview: true,
        })
        log.debug('Telegram notification delivered', { chatId: maskSecret(chatId, 3), attempt })
        return true
      }
      catch (error) {
        const transport = !(error instanceof TelegramRequestError) || error.isTransportFailure
        if (!transport) {
          log.warn('Telegram rejected notification', {
            chatId: maskSecret(chatId, 3),
            error: asErrorMessage(error),
          })
          return false
        }

        if (attempt < this.maxAttempts) {
          log.warn('Telegram send failed; retrying', {
            attempt,
            backoffMs: this.retryDelayMs,
            error: asErrorMessage(error),
          })
          await this.sleep(this.retryDelayMs)
          continue
        }

        log.warn('Telegram send failed', {
          attempts: attempt,
          error: asErrorMessage(error),
        })
      }
    }
    return false
  }
}
