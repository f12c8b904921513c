import { DateTime } from 'luxon';
import type { Telegraf } from 'telegraf';
import type { AppServices } from '../services';
import { FocusError, errorMessage } from '../errors';
import { botLogger } from '../logger';
import { focusLoggedText, MAX_FOCUS_MINUTES, MIN_FOCUS_MINUTES, PHONE_FREE_CALLBACK } from '../services/focusService';
import { formatWeeklySummary, type XpChange } from '../services/gamifyService';
import { scheduleTestAt, scheduleTestIn } from '../services/schedulerService';
import type { BotContext, ClockTime, Recipient } from '../types';

export const DEFAULT_TEST_DELAY_MIN = 5;
// keeps one-off test jobs well inside what a timer can hold
const MAX_TEST_DELAY_MIN = 24 * 60;

export const HELP_TEXT =
  "Commands:\n" +
  "/start – greet\n" +
  "/health – liveness check\n" +
  "/status – show config/time\n" +
  "/force_manifest – send today's manifestation set (you) now\n" +
  "/force_manifest_partner – send today's manifestation set (partner) now\n" +
  "/force_card – send card prompt now\n" +
  "/force_reveal – send card reveal now\n" +
  "/clear_cache [all] – forget used manifestations (all: also today's picks)\n" +
  "/test_in <minutes> – schedule both manifestation sets once, starting in <minutes>\n" +
  "/test_at <HH:MM> – schedule both sets at HH:MM today (or tomorrow if passed)\n" +
  "/focus <minutes> [tag] [nophone] – start a pomodoro\n" +
  "/stats – this week's focus, calls and XP\n" +
  "/log_call <minutes> [tag] – log a finished call\n" +
  "/call_start [tag] – start timing a call\n" +
  "/call_end – stop the running call and log it\n" +
  "/leaderboard – pomodoros this week";

export function commandArgs(text: string): string[] {
  return text.trim().split(/\s+/).slice(1);
}

export function parseClockTime(value: string | undefined): ClockTime | null {
  const match = value?.match(/^(\d{1,2}):(\d{2})$/);
  if (!match) return null;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return null;
  return { hour, minute };
}

export function parseMinutes(value: string | undefined, min: number, max: number): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const minutes = Number(value);
  return minutes >= min && minutes <= max ? minutes : null;
}

export interface FocusArgs {
  durationMin: number;
  tag: string | null;
  commitPhone: boolean;
}

export function parseFocusArgs(args: string[]): FocusArgs | null {
  const durationMin = parseMinutes(args[0], MIN_FOCUS_MINUTES, MAX_FOCUS_MINUTES);
  if (durationMin === null) return null;
  const rest = args.slice(1);
  const commitPhone = !rest.some(word => word.toLowerCase() === 'nophone');
  const tag = rest.filter(word => word.toLowerCase() !== 'nophone').join(' ');
  return { durationMin, tag: tag || null, commitPhone };
}

export function formatLocalTime(now: Date, timezone: string): string {
  return DateTime.fromJSDate(now).setZone(timezone).toFormat('yyyy-MM-dd HH:mm:ss ZZZZ');
}

export function healthText(timezone: string, now: Date = new Date()): string {
  return `OK ✅\nTime: ${formatLocalTime(now, timezone)}`;
}

export function statusText(services: AppServices, now: Date = new Date()): string {
  const { config, scheduler } = services;
  const show = (value: number | null) => (value === null ? '<unset>' : String(value));
  return (
    "Status:\n" +
    `- BOT_TOKEN set: ${config.botToken ? 'yes' : 'no'}\n` +
    `- CHAT_ID: ${show(config.chatId)}\n` +
    `- CHAT_ID_PARTNER: ${show(config.partnerChatId)}\n` +
    `- Timezone: ${config.timezone}\n` +
    `- Server time: ${formatLocalTime(now, config.timezone)}\n` +
    `- Daily jobs: ${scheduler.names('daily').length}, one-off jobs: ${scheduler.names('once').length}\n` +
    "Use /test_in 1 or /test_at HH:MM to verify scheduler delivery."
  );
}

function xpText(change: XpChange): string {
  const levelUp = change.newLevel > change.oldLevel ? `\n🎉 Level up! You're now level ${change.newLevel}` : '';
  return `⭐ ${change.xp} XP • Level ${change.newLevel}${levelUp}`;
}

function roleFor(services: AppServices, chatId: number): Recipient | 'guest' {
  if (chatId === services.config.chatId) return 'self';
  if (chatId === services.config.partnerChatId) return 'partner';
  return 'guest';
}

interface Caller {
  userId: number;
  chatId: number;
  name: string | null;
}

function callerOf(ctx: BotContext): Caller | null {
  const chatId = ctx.chat?.id;
  if (chatId === undefined) return null;
  return { userId: ctx.from?.id ?? chatId, chatId, name: ctx.from?.first_name ?? null };
}

async function replyError(ctx: BotContext, command: string, error: unknown): Promise<void> {
  botLogger.error({ command, error: errorMessage(error) }, 'Command failed');
  await ctx.reply(`Error: ${errorMessage(error)}`);
}

export function registerCommands(bot: Telegraf<BotContext>, services: AppServices): void {
  const { config, manifestations, cards, scheduler, gamify, focus } = services;

  bot.command('start', async (ctx) => {
    const caller = callerOf(ctx);
    if (caller) {
      focus.upsertUser(caller.userId, caller.chatId, caller.name, roleFor(services, caller.chatId));
    }
    await ctx.reply(
      "Hi! I'm your growth assistant bot. 🌱\n" +
      "Try /help to see available commands."
    );
    botLogger.info({ chatId: caller?.chatId }, '/start served');
  });

  bot.command('help', async (ctx) => {
    await ctx.reply(HELP_TEXT);
  });

  bot.command('health', async (ctx) => {
    await ctx.reply(healthText(config.timezone));
  });

  bot.command('status', async (ctx) => {
    await ctx.reply(statusText(services));
  });

  const forceManifest = (recipient: Recipient) => async (ctx: BotContext) => {
    try {
      const sent = await manifestations.sendSet(recipient);
      const who = recipient === 'self' ? '' : ' (partner)';
      await ctx.reply(sent > 0 ? `Sent manifestation set${who} ✅ (${sent} lines)` : `Nothing sent${who}, check the logs.`);
    } catch (error) {
      await replyError(ctx, 'force_manifest', error);
    }
  };
  bot.command('force_manifest', forceManifest('self'));
  bot.command(['force_manifest_partner', 'force_manifest_her'], forceManifest('partner'));

  bot.command('force_card', async (ctx) => {
    try {
      const delivered = await cards.sendPrompt();
      await ctx.reply(`Sent card prompt ✅ (${delivered} recipient(s))`);
    } catch (error) {
      await replyError(ctx, 'force_card', error);
    }
  });

  bot.command('force_reveal', async (ctx) => {
    try {
      const delivered = await cards.sendReveal();
      await ctx.reply(`Sent card reveal ✅ (${delivered} recipient(s))`);
    } catch (error) {
      await replyError(ctx, 'force_reveal', error);
    }
  });

  bot.command('clear_cache', async (ctx) => {
    try {
      const removed = manifestations.clearUsed();
      if (commandArgs(ctx.message.text)[0]?.toLowerCase() === 'all') {
        removed.push(...manifestations.clearToday());
        if (cards.rotation.clearToday()) removed.push('today_cards.json');
      }
      await ctx.reply(removed.length ? `Cleared cache files: ${removed.join(', ')}` : 'No cache files found to clear.');
    } catch (error) {
      await replyError(ctx, 'clear_cache', error);
    }
  });

  bot.command('test_in', async (ctx) => {
    const arg = commandArgs(ctx.message.text)[0];
    const minutes = arg === undefined ? DEFAULT_TEST_DELAY_MIN : parseMinutes(arg, 0, MAX_TEST_DELAY_MIN);
    if (minutes === null) {
      await ctx.reply(`Usage: /test_in <minutes> (0-${MAX_TEST_DELAY_MIN})`);
      return;
    }
    try {
      scheduleTestIn(scheduler, manifestations, minutes);
      await ctx.reply(`Scheduled test jobs to start in ${minutes} minute(s).`);
    } catch (error) {
      await replyError(ctx, 'test_in', error);
    }
  });

  bot.command('test_at', async (ctx) => {
    const raw = commandArgs(ctx.message.text)[0];
    const time = parseClockTime(raw);
    if (!time) {
      await ctx.reply(`Usage: /test_at HH:MM (24h, ${config.timezone})`);
      return;
    }
    try {
      const start = scheduleTestAt(scheduler, manifestations, time, config.timezone);
      await ctx.reply(`Scheduled test jobs for ${formatLocalTime(start, config.timezone)}.`);
    } catch (error) {
      await replyError(ctx, 'test_at', error);
    }
  });

  bot.command('focus', async (ctx) => {
    const args = parseFocusArgs(commandArgs(ctx.message.text));
    if (!args) {
      await ctx.reply(`Usage: /focus <minutes ${MIN_FOCUS_MINUTES}-${MAX_FOCUS_MINUTES}> [tag] [nophone]`);
      return;
    }
    const caller = callerOf(ctx);
    if (!caller) return;
    try {
      focus.upsertUser(caller.userId, caller.chatId, caller.name, roleFor(services, caller.chatId));
      await focus.start({ userId: caller.userId, chatId: caller.chatId, ...args });
    } catch (error) {
      await replyError(ctx, 'focus', error);
    }
  });

  bot.action(PHONE_FREE_CALLBACK, async (ctx) => {
    const phoneFree = ctx.match[1] === '1';
    const sessionId = Number(ctx.match[2]);
    await ctx.answerCbQuery();
    try {
      const completion = focus.complete(sessionId, phoneFree);
      await ctx.editMessageText(focusLoggedText(phoneFree, completion));
    } catch (error) {
      if (!(error instanceof FocusError)) {
        botLogger.error({ sessionId, error: errorMessage(error) }, 'Failed to log focus session');
      }
      await ctx.editMessageText(`Error logging session: ${errorMessage(error)}`);
    }
  });

  bot.command('stats', async (ctx) => {
    const caller = callerOf(ctx);
    if (!caller) return;
    try {
      await ctx.reply(formatWeeklySummary(gamify.weeklySummary(caller.userId)));
    } catch (error) {
      await replyError(ctx, 'stats', error);
    }
  });

  bot.command('log_call', async (ctx) => {
    const [arg, ...tagWords] = commandArgs(ctx.message.text);
    const minutes = parseMinutes(arg, 1, 24 * 60);
    if (minutes === null) {
      await ctx.reply('Usage: /log_call <minutes> [tag]');
      return;
    }
    const caller = callerOf(ctx);
    if (!caller) return;
    try {
      const change = gamify.logCall(caller.userId, minutes, { tag: tagWords.join(' ') || null });
      await ctx.reply(`📞 Logged ${minutes} min call.\n${xpText(change)}`);
    } catch (error) {
      await replyError(ctx, 'log_call', error);
    }
  });

  bot.command('call_start', async (ctx) => {
    const caller = callerOf(ctx);
    if (!caller) return;
    const tag = commandArgs(ctx.message.text).join(' ') || null;
    if (!gamify.startCall(caller.userId, tag)) {
      await ctx.reply('A call is already running. Use /call_end to finish it.');
      return;
    }
    await ctx.reply(`📞 Call started${tag ? ` • ${tag}` : ''}. Use /call_end when done.`);
  });

  bot.command('call_end', async (ctx) => {
    const caller = callerOf(ctx);
    if (!caller) return;
    try {
      const result = gamify.endCall(caller.userId);
      if (!result) {
        await ctx.reply('No running call. Start one with /call_start.');
        return;
      }
      await ctx.reply(`📞 Call logged: ${result.minutes} min.\n${xpText(result.xp)}`);
    } catch (error) {
      await replyError(ctx, 'call_end', error);
    }
  });

  bot.command('leaderboard', async (ctx) => {
    try {
      const rows = gamify.leaderboard();
      if (rows.length === 0) {
        await ctx.reply('No pomodoros logged this week yet.');
        return;
      }
      await ctx.reply(
        '🏆 Pomodoros this week\n' + rows.map((row, i) => `${i + 1}. ${row.userId}: ${row.pomodoros}`).join('\n')
      );
    } catch (error) {
      await replyError(ctx, 'leaderboard', error);
    }
  });
}
