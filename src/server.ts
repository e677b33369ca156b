import 'dotenv/config';
import http from 'node:http';
import { Telegraf } from 'telegraf';
import rateLimit from 'telegraf-ratelimit';
import * as Sentry from '@sentry/node';
import { createApp } from './app';
import { AppConfig, loadConfig } from './config';
import { t } from './i18n';
import { LichessClient } from './lichess/client';
import { log } from './log';
import { commandsTotal } from './metrics';
import { StateStore } from './store/state';
import { isCommandUpdate, registerCommands } from './telegram/commands';
import { TelegramSender } from './telegram/sender';
import { GameWatcher } from './watcher/watcher';

export async function main(config: AppConfig = loadConfig()) {
  Sentry.init({ dsn: config.sentryDsn });

  const store = await StateStore.open(config.stateFile);
  const bot = new Telegraf(config.telegramToken);
  const lichess = new LichessClient(config.lichessUrl, { timeoutMs: config.lichessTimeoutMs });
  const watcher = new GameWatcher(store, lichess, new TelegramSender(bot.telegram), {
    intervalMs: config.pollIntervalMs,
    initialDelayMs: config.pollInitialDelayMs
  });

  bot.use(rateLimit({
    window: 10000,
    limit: 5,
    keyGenerator: ctx => String(ctx.from?.id)
  }));

  bot.use(async (ctx, next) => {
    const started = Date.now();
    await next();
    if (isCommandUpdate(ctx.update)) commandsTotal.inc();
    log.info({ type: ctx.updateType, ms: Date.now() - started }, 'Update handled');
  });

  registerCommands(bot, { store, watcher });

  bot.catch((err, ctx) => {
    log.error({ err }, 'Bot error');
    Sentry.captureException(err);
    ctx.reply(t('error')).catch(replyErr => log.warn({ err: replyErr }, 'Failed to report error to chat'));
  });

  const app = createApp();
  const useWebhook = config.production && config.publicUrl !== undefined;
  if (useWebhook) {
    app.use(bot.webhookCallback('/bot'));
  }

  const server = http.createServer(app);
  server.listen(config.port, () => {
    log.info(`🚀 Server running on port ${config.port}`);

    if (useWebhook) {
      const webhookUrl = `${config.publicUrl}/bot`;
      log.info(`🔗 Setting webhook to: ${webhookUrl}`);
      bot.telegram.setWebhook(webhookUrl)
        .then(() => log.info('✅ Webhook set successfully'))
        .catch(err => log.error({ err }, '❌ Failed to set webhook'));
    } else {
      log.info('🔄 Using long polling');
      bot.launch(() => log.info('🤖 Bot launched in polling mode'))
        .catch(err => log.error({ err }, '❌ Failed to launch bot'));
    }
  });

  watcher.start();

  const shutdown = (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully`);
    watcher.stop();
    if (!useWebhook) {
      try {
        bot.stop(signal);
      } catch (err) {
        log.warn({ err }, 'Bot was not running');
      }
    }
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  return { app, bot, server, store, watcher };
}

if (require.main === module) {
  main().catch(err => {
    log.fatal({ err }, 'Failed to start');
    process.exit(1);
  });
}
