import { Context, Markup } from 'telegraf';

export interface BotContext extends Context {
  // Add any custom properties here if needed
}

export type Recipient = 'self' | 'partner';

export type ReflectionType = 'manifestation' | 'card';

export interface Manifestation {
  id: number;
  set: string[];
}

export interface Card {
  id: number | string;
  title: string;
  message: string;
  prompt: string;
}

export interface Reminder {
  name: string;
  hour: number;
  minute: number;
  /** 0 = Sunday; omitted means every day */
  days?: number[];
  text: string;
}

export type InlineKeyboard = ReturnType<typeof Markup.inlineKeyboard>['reply_markup'];

export interface SendExtra {
  parse_mode?: 'HTML' | 'Markdown';
  reply_markup?: InlineKeyboard;
}

/**
 * The slice of the Telegram API the services talk to. `bot.telegram` satisfies it,
 * tests pass an in-memory fake.
 */
export interface MessageSender {
  sendMessage(chatId: number, text: string, extra?: SendExtra): Promise<unknown>;
}

export interface ClockTime {
  hour: number;
  minute: number;
}

export interface TodayState {
  date: string;
  id: number | string;
}

export interface FocusCompletion {
  sessions: number;
  phoneFreeSessions: number;
  streakDays: number;
  xp: number;
  newBadges: string[];
}

export interface WeeklySummary {
  weekStart: string;
  weekEnd: string;
  pomodoros: number;
  pomodoroMinutes: number;
  calls: number;
  callMinutes: number;
  xp: number;
  level: number;
  badges: Array<{ key: string; label: string; awardedAt: string }>;
}
