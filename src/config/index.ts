import path from 'node:path'
import dotenv from 'dotenv'
import { z } from 'zod'

dotenv.config()

export const DEFAULT_TWITTER_API_BASE_URL = 'https://api.twitterapi.io'
export const MIN_INTERVAL_SECONDS = 5

export function normalizeHandle(raw: string): string {
  return raw.trim().replace(/^@+/, '').trim()
}

const blankToUndefined = (value: unknown) => {
  if (typeof value === 'string' && value.trim().length === 0) return undefined
  return value
}

const optionalString = z.preprocess(blankToUndefined, z.string().optional())

const flag = (defaultValue: boolean) => z.preprocess((value) => {
  if (typeof value !== 'string') return value
  const normalized = value.trim().toLowerCase()
  if (normalized === '') return undefined
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return value
}, z.boolean().default(defaultValue))

const toNumber = (value: unknown) => {
  const present = blankToUndefined(value)
  if (typeof present !== 'string') return present
  const parsed = Number(present)
  return Number.isFinite(parsed) ? parsed : present
}

const integer = (min: number) => z.number().int().min(min)

// Comma-separated, trimmed, de-duplicated.
const list = (normalize: (entry: string) => string = entry => entry.trim()) => z
  .string()
  .optional()
  .transform(value => Array.from(new Set(
    (value ?? '')
      .split(',')
      .map(normalize)
      .filter(entry => entry.length > 0),
  )))

const lowercase = (value: unknown) => {
  const present = blankToUndefined(value)
  return typeof present === 'string' ? present.trim().toLowerCase() : present
}

const envSchema = z.object({
  DATA_PATH: z.string().default('.data'),
  SETTINGS_PATH: optionalString,
  LOG_LEVEL: z.preprocess(lowercase, z.enum(['debug', 'info', 'warn', 'error']).default('info')),
  LOG_SUMMARY_PATH: optionalString,
  LOG_DETAIL_PATH: optionalString,
  TWITTER_API_KEY: optionalString,
  TWITTER_API_BASE_URL: z.preprocess(blankToUndefined, z.string().url().default(DEFAULT_TWITTER_API_BASE_URL)),
  TELEGRAM_BOT_TOKEN: optionalString,
  TELEGRAM_CHAT_ID: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TELEGRAM_ALLOWED_CHAT_IDS: list(),
  TELEGRAM_THREAD_ID: z.preprocess(toNumber, integer(1).optional()),
  TELEGRAM_POLLING_ENABLED: flag(true),
  NOTIFY_LOCALE: z.preprocess(lowercase, z.enum(['en', 'zh']).default('en')),
  MONITOR_ACCOUNTS: list(normalizeHandle),
  CHECK_INTERVAL_SECONDS: z.preprocess(toNumber, integer(MIN_INTERVAL_SECONDS).default(60)),
})

type ParsedEnv = z.infer<typeof envSchema>

export type AppConfig = Omit<ParsedEnv, 'MONITOR_ACCOUNTS' | 'TELEGRAM_ALLOWED_CHAT_IDS'> & {
  settingsPath: string
  logSummaryPath: string
  logDetailPath: string
  /** Seeds a settings file that does not exist yet. */
  monitorAccounts: string[]
  /** Chats whose commands the bot accepts; the notification chat when unset. */
  telegramAllowedChatIds: string[]
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { MONITOR_ACCOUNTS, TELEGRAM_ALLOWED_CHAT_IDS, ...parsed } = envSchema.parse(env)
  const logsPath = path.join(parsed.DATA_PATH, 'logs')

  let telegramAllowedChatIds = TELEGRAM_ALLOWED_CHAT_IDS
  if (telegramAllowedChatIds.length === 0 && parsed.TELEGRAM_CHAT_ID) {
    telegramAllowedChatIds = [parsed.TELEGRAM_CHAT_ID]
  }

  return {
    ...parsed,
    settingsPath: parsed.SETTINGS_PATH ?? path.join(parsed.DATA_PATH, 'settings.json'),
    logSummaryPath: parsed.LOG_SUMMARY_PATH ?? path.join(logsPath, 'summary.log'),
    logDetailPath: parsed.LOG_DETAIL_PATH ?? path.join(logsPath, 'detail.log'),
    monitorAccounts: MONITOR_ACCOUNTS,
    telegramAllowedChatIds,
  }
}
