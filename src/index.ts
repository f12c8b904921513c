import * as dotenv from 'dotenv';
// Configure dotenv before any other imports
dotenv.config();

import * as path from 'path';
import { Telegraf } from 'telegraf';
import { loadConfig } from './config';
import { errorMessage } from './errors';
import { registerCommands } from './handlers/commandHandler';
import { botLogger, logger } from './logger';
import { createServices } from './services';
import { loadReminders } from './services/contentService';
import { setupDailyJobs, setupReminders } from './services/schedulerService';
import type { BotContext } from './types';

function main(): void {
  const config = loadConfig();
  const bot = new Telegraf<BotContext>(config.botToken);
  const services = createServices(config, bot.telegram);

  registerCommands(bot, services);
  setupDailyJobs(services.scheduler, services.manifestations, services.cards);
  if (config.remindersEnabled) {
    const reminders = loadReminders(path.join(config.contentDir, 'reminders.json'));
    setupReminders(services.scheduler, reminders, bot.telegram, config.chatId);
  }

  // Error handling
  bot.catch((err, ctx) => {
    botLogger.error({ error: errorMessage(err), updateType: ctx.updateType }, 'Unhandled bot error');
  });

  // Start the bot
  bot
    .launch(() => {
      logger.info({ timezone: config.timezone, jobs: services.scheduler.names().length }, 'Bot is online (manifestations + cards)');
    })
    .catch((err) => {
      logger.fatal({ error: errorMessage(err) }, 'Failed to start bot');
      process.exit(1);
    });

  // Enable graceful stop
  const shutdown = (signal: string) => {
    services.scheduler.stopAll();
    bot.stop(signal);
    services.db.close();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

try {
  main();
} catch (error) {
  logger.fatal({ error: errorMessage(error) }, 'Startup failed');
  process.exit(1);
}
