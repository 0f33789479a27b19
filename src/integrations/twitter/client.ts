import type { z } from 'zod'
import type { DataSourceClient, FetchResult, Item, ItemCategory, ProfileInfo } from '../../types/index.js'
import { DEFAULT_TWITTER_API_BASE_URL } from '../../config/index.js'
import { asErrorMessage, logger } from '../../utils/logger.js'
import { sleep as defaultSleep } from '../../utils/time.js'
import type { Sleep } from '../../utils/time.js'
import {
  envelopeSchema,
  lastTweetsResponseSchema,
  userInfoResponseSchema,
} from './types.js'
import type { ApiTweet, ApiUserInfo } from './types.js'

const log = logger.child('twitter')

const DEFAULT_MAX_ATTEMPTS = 3
const DEFAULT_RETRY_DELAY_MS = 2000
const DEFAULT_TIMEOUT_MS = 30_000

export interface TwitterApiClientOptions {
  /** Read on every request so a changed key applies without a restart. */
  apiKey: () => string | undefined
  baseUrl?: string
  maxAttempts?: number
  retryDelayMs?: number
  timeoutMs?: number
  sleep?: Sleep
}

export function statusUrl(handle: string, id: string): string {
  return `https://x.com/${encodeURIComponent(handle)}/status/${encodeURIComponent(id)}`
}

export function categorize(tweet: ApiTweet): ItemCategory {
  if (tweet.retweeted_tweet && Object.keys(tweet.retweeted_tweet).length > 0) return 'repost'
  if (tweet.isReply === true) return 'reply'
  return 'original'
}

function toItem(handle: string, tweet: ApiTweet): Item {
  return {
    id: tweet.id,
    category: categorize(tweet),
    text: tweet.text ?? '',
    url: tweet.url?.trim() || statusUrl(handle, tweet.id),
    createdAt: tweet.createdAt ?? '',
  }
}

function toProfile(handle: string, data: ApiUserInfo): ProfileInfo {
  return {
    handle,
    name: data.name?.trim() || handle,
    followers: data.followers ?? 0,
    avatarUrl: data.profilePicture ?? '',
    pinnedItemId: data.pinnedTweetIds?.[0] ?? null,
  }
}

export class TwitterApiClient implements DataSourceClient {
  private readonly apiKey: () => string | undefined
  private readonly baseUrl: string
  private readonly maxAttempts: number
  private readonly retryDelayMs: number
  private readonly timeoutMs: number
  private readonly sleep: Sleep

  constructor(options: TwitterApiClientOptions) {
    this.apiKey = options.apiKey
    this.baseUrl = (options.baseUrl ?? DEFAULT_TWITTER_API_BASE_URL).replace(/\/+$/, '')
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS)
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.sleep = options.sleep ?? defaultSleep
  }

  async fetchProfile(handle: string): Promise<FetchResult<ProfileInfo>> {
    const result = await this.request('/twitter/user/info', { userName: handle }, userInfoResponseSchema)
    if (!result.ok) return result
    return { ok: true, value: toProfile(handle, result.value.data) }
  }

  async fetchRecentItems(handle: string): Promise<FetchResult<Item[]>> {
    const result = await this.request(
      '/twitter/user/last_tweets',
      { userName: handle, includeReplies: 'true' },
      lastTweetsResponseSchema,
    )
    if (!result.ok) return result
    const tweets = result.value.data?.tweets ?? result.value.tweets ?? []
    return { ok: true, value: tweets.map(tweet => toItem(handle, tweet)) }
  }

  private async request<T>(
    path: string,
    query: Record<string, string>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<FetchResult<T>> {
    const apiKey = this.apiKey()?.trim()
    if (!apiKey) {
      log.warn('Data source request skipped; API key not configured', { path })
      return { ok: false, kind: 'config', message: 'API key not configured' }
    }
    if (!query.userName?.trim()) {
      return { ok: false, kind: 'invalid', message: 'Account handle is empty' }
    }

    const url = `${this.baseUrl}${path}?${new URLSearchParams(query).toString()}`
    let lastError = 'Request failed'

    for (let attempt = 1; attempt <= this.maxAttempts; attempt += 1) {
      let status: number
      let ok: boolean
      let text: string
      try {
        log.debug('Data source request', { path, account: query.userName, attempt })
        const response = await fetch(url, {
          method: 'GET',
          headers: {
            'X-API-Key': apiKey,
            Accept: 'application/json',
          },
          signal: AbortSignal.timeout(this.timeoutMs),
        })
        status = response.status
        ok = response.ok
        text = await response.text()
      }
      catch (error) {
        lastError = asErrorMessage(error)
        log.warn('Data source request failed before response', {
          path,
          account: query.userName,
          attempt,
          maxAttempts: this.maxAttempts,
          error: lastError,
        })
        if (attempt < this.maxAttempts) {
          await this.sleep(this.retryDelayMs)
        }
        continue
      }

      return this.interpret(path, query.userName, status, ok, text, schema)
    }

    return { ok: false, kind: 'network', message: `Network error after ${this.maxAttempts} attempts: ${lastError}` }
  }

  private interpret<T>(
    path: string,
    account: string,
    status: number,
    ok: boolean,
    text: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): FetchResult<T> {
    let payload: unknown
    try {
      payload = JSON.parse(text)
    }
    catch {
      if (!ok) {
        log.warn('Data source returned HTTP error', { path, account, status })
        return { ok: false, kind: 'rejected', message: `HTTP ${status}` }
      }
      log.warn('Data source response was not JSON', { path, account, status })
      return { ok: false, kind: 'invalid', message: 'Response was not JSON' }
    }

    const envelope = envelopeSchema.safeParse(payload)
    const providerMessage = envelope.success
      ? envelope.data.msg ?? envelope.data.message ?? undefined
      : undefined
    if (!ok || !envelope.success || envelope.data.status !== 'success') {
      const message = providerMessage ?? (ok ? 'Provider reported an error' : `HTTP ${status}`)
      log.warn('Data source rejected request', { path, account, status, message })
      return { ok: false, kind: 'rejected', message }
    }

    const parsed = schema.safeParse(payload)
    if (!parsed.success) {
      const issue = parsed.error.issues[0]
      const message = issue ? `${issue.path.join('.') || 'response'}: ${issue.message}` : 'Unexpected response shape'
      log.warn('Data source response did not match schema', { path, account, message })
      return { ok: false, kind: 'invalid', message }
    }

    return { ok: true, value: parsed.data }
  }
}
