import { z } from 'zod'
import { asErrorMessage, logger, maskSecret } from '../../utils/logger.js'
import {
  telegramEnvelopeSchema,
  telegramMessageSchema,
  telegramUpdateSchema,
  telegramUserSchema,
} from './types.js'
import type {
  TelegramBotCommand,
  TelegramGetUpdatesParams,
  TelegramMessage,
  TelegramSendMessageParams,
  TelegramUpdate,
  TelegramUser,
} from './types.js'

const log = logger.child('telegram:api')

const TELEGRAM_BASE_URL = 'https://api.telegram.org'
const DEFAULT_REQUEST_TIMEOUT_MS = 30_000
// Head room over the long-poll window before the request is aborted.
const LONG_POLL_GRACE_MS = 10_000

export class TelegramRequestError extends Error {
  readonly method: string
  readonly status?: number
  readonly errorCode?: number
  readonly retryAfterSeconds?: number

  constructor(
    message: string,
    options: {
      method: string
      status?: number
      errorCode?: number
      retryAfterSeconds?: number
      cause?: unknown
    },
  ) {
    super(message, { cause: options.cause })
    this.name = 'TelegramRequestError'
    this.method = options.method
    this.status = options.status
    this.errorCode = options.errorCode
    this.retryAfterSeconds = options.retryAfterSeconds
  }

  /** True when no response arrived, as opposed to Telegram rejecting the call. */
  get isTransportFailure(): boolean {
    return this.status === undefined
  }
}

interface RawResponse {
  status: number
  ok: boolean
  text: string
}

function parseJson(text: string): unknown {
  if (text.trim().length === 0) return undefined
  try {
    return JSON.parse(text)
  }
  catch {
    return undefined
  }
}

export class TelegramBotApiClient {
  private readonly baseUrl: string

  constructor(token: string) {
    this.baseUrl = `${TELEGRAM_BASE_URL}/bot${token}`
    log.debug('Client initialized', { token: maskSecret(token, 6) })
  }

  getMe(): Promise<TelegramUser> {
    return this.call('getMe', telegramUserSchema)
  }

  async deleteWebhook(dropPendingUpdates = true): Promise<void> {
    await this.call('deleteWebhook', z.boolean(), { drop_pending_updates: dropPendingUpdates })
  }

  async setMyCommands(commands: TelegramBotCommand[]): Promise<void> {
    await this.call('setMyCommands', z.boolean(), { commands })
  }

  getUpdates(params: TelegramGetUpdatesParams): Promise<TelegramUpdate[]> {
    const timeoutMs = (params.timeout ?? 0) * 1000 + LONG_POLL_GRACE_MS
    return this.call('getUpdates', z.array(telegramUpdateSchema), params, timeoutMs)
  }

  sendMessage(params: TelegramSendMessageParams): Promise<TelegramMessage> {
    return this.call('sendMessage', telegramMessageSchema, {
      chat_id: params.chatId,
      message_thread_id: params.threadId,
      text: params.text,
      parse_mode: 'HTML',
      disable_web_page_preview: params.disableWebPreview ?? true,
    })
  }

  private async call<T>(
    method: string,
    resultSchema: z.ZodType<T, z.ZodTypeDef, unknown>,
    body?: unknown,
    timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS,
  ): Promise<T> {
    const response = await this.post(method, body, timeoutMs)
    const envelope = telegramEnvelopeSchema.safeParse(parseJson(response.text))

    if (!envelope.success) {
      log.warn('Response was not a Bot API envelope', { method, status: response.status })
      const message = response.ok ? 'Telegram API returned an invalid payload' : `Telegram API HTTP ${response.status}`
      throw new TelegramRequestError(message, { method, status: response.status })
    }

    const payload = envelope.data
    if (!payload.ok) {
      log.warn('Request rejected', {
        method,
        status: response.status,
        errorCode: payload.error_code,
        description: payload.description,
      })
      throw new TelegramRequestError(payload.description ?? `Telegram API HTTP ${response.status}`, {
        method,
        status: response.status,
        errorCode: payload.error_code,
        retryAfterSeconds: payload.parameters?.retry_after,
      })
    }
    if (!response.ok) {
      throw new TelegramRequestError(`Telegram API HTTP ${response.status}`, { method, status: response.status })
    }

    const result = resultSchema.safeParse(payload.result)
    if (!result.success) {
      log.warn('Result did not match the expected shape', { method, issue: result.error.issues[0]?.message })
      throw new TelegramRequestError('Telegram API result had an unexpected shape', { method, status: response.status })
    }
    return result.data
  }

  private async post(method: string, body: unknown, timeoutMs: number): Promise<RawResponse> {
    log.debug('Request', { method, hasBody: body !== undefined })
    try {
      const response = await fetch(`${this.baseUrl}/${method}`, {
        method: 'POST',
        headers: { 'content-type': 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(timeoutMs),
      })
      return { status: response.status, ok: response.ok, text: await response.text() }
    }
    catch (error) {
      log.warn('Request failed before a response arrived', { method, error: asErrorMessage(error) })
      throw new TelegramRequestError('Telegram API network request failed', { method, cause: error })
    }
  }
}
