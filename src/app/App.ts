import { loadConfig } from '../config/index.js'
import type { AppConfig } from '../config/index.js'
import { MonitorController } from '../core/monitor/controller.js'
import { ChangeDetector } from '../core/monitor/detector.js'
import { PollLoop } from '../core/monitor/loop.js'
import { SettingsRepository } from '../core/settings/repository.js'
import { StateStore } from '../core/state/store.js'
import { TwitterApiClient } from '../integrations/twitter/client.js'
import { TelegramCommandBot } from '../integrations/telegram/client.js'
import { createCommandHandler } from '../integrations/telegram/commands.js'
import { formatEvent, formatTestMessage } from '../integrations/telegram/format.js'
import { TelegramNotifier } from '../integrations/telegram/notifier.js'
import { closeLogger, configureLogger, logger, maskSecret } from '../utils/logger.js'

export class App {
  private loop?: PollLoop
  private bot?: TelegramCommandBot

  async start(config: AppConfig = loadConfig()): Promise<void> {
    await configureLogger({
      level: config.LOG_LEVEL,
      summaryPath: config.logSummaryPath,
      detailPath: config.logDetailPath,
    })
    logger.info('App starting')
    logger.debug('App config', {
      dataPath: config.DATA_PATH,
      settingsPath: config.settingsPath,
      twitterApiBaseUrl: config.TWITTER_API_BASE_URL,
      twitterApiKey: maskSecret(config.TWITTER_API_KEY),
      telegramBotToken: maskSecret(config.TELEGRAM_BOT_TOKEN, 6),
      telegramPollingEnabled: config.TELEGRAM_POLLING_ENABLED,
      telegramAllowedChats: config.telegramAllowedChatIds.length,
      notifyLocale: config.NOTIFY_LOCALE,
      logLevel: config.LOG_LEVEL,
      logSummaryPath: config.logSummaryPath,
      logDetailPath: config.logDetailPath,
    })

    const settings = new SettingsRepository(config.settingsPath)
    await settings.load({
      accounts: config.monitorAccounts,
      intervalSeconds: config.CHECK_INTERVAL_SECONDS,
    })
    const store = new StateStore(config.DATA_PATH)
    await store.load()

    const client = new TwitterApiClient({
      apiKey: () => settings.snapshot().twitterApiKey ?? config.TWITTER_API_KEY,
      baseUrl: config.TWITTER_API_BASE_URL,
    })
    const notifier = new TelegramNotifier({
      credentials: () => {
        const current = settings.snapshot()
        return {
          botToken: current.telegramBotToken ?? config.TELEGRAM_BOT_TOKEN,
          chatId: current.telegramChatId ?? config.TELEGRAM_CHAT_ID,
        }
      },
      threadId: config.TELEGRAM_THREAD_ID,
    })
    if (notifier.isConfigured()) {
      logger.info('Telegram notifier configured', { threadId: config.TELEGRAM_THREAD_ID ?? null })
    }
    else {
      logger.warn('Telegram notifier not configured; notifications will be skipped')
    }

    const detector = new ChangeDetector({
      client,
      store,
      notifier,
      formatEvent: event => formatEvent(event, config.NOTIFY_LOCALE),
      isMonitored: handle => settings.hasAccount(handle),
    })
    const loop = new PollLoop({ checker: detector, settings, store })
    this.loop = loop
    const controller = new MonitorController({
      loop,
      settings,
      store,
      client,
      notifier,
      testMessage: () => formatTestMessage(config.NOTIFY_LOCALE),
    })

    const botToken = settings.snapshot().telegramBotToken ?? config.TELEGRAM_BOT_TOKEN
    if (botToken && config.TELEGRAM_POLLING_ENABLED) {
      const bot = new TelegramCommandBot({
        token: botToken,
        allowedChatIds: config.telegramAllowedChatIds,
        handleCommand: createCommandHandler(controller),
      })
      if (await bot.start()) this.bot = bot
    }
    else {
      logger.info('Telegram command bot disabled')
    }

    if (settings.isRunning()) {
      logger.info('Monitor was running before restart; resuming')
      await loop.start()
    }
    else {
      logger.info('Monitor idle; send /run to start it')
    }
    logger.info('App started', {
      accounts: settings.snapshot().accounts.length,
      trackedStates: store.snapshotCount(),
    })
  }

  /** Stops this process's worker without clearing the persisted running flag. */
  async shutdown(): Promise<void> {
    logger.info('App shutting down')
    this.bot?.stop()
    if (this.loop) {
      this.loop.halt()
      await this.loop.waitForIdle()
    }
    logger.info('App stopped')
    closeLogger()
  }
}
