import { DateTime } from 'luxon';
import { Markup } from 'telegraf';
import type { Db } from './database';
import type { GamifyService } from './gamifyService';
import type { JobScheduler } from './jobScheduler';
import { localDate } from './rotationService';
import { sendWithRetry, type RetryOptions } from './telegramService';
import { FocusError } from '../errors';
import { focusLogger } from '../logger';
import type { FocusCompletion, InlineKeyboard, MessageSender } from '../types';

export const MIN_FOCUS_MINUTES = 1;
export const MAX_FOCUS_MINUTES = 180;
export const MID_PING_MIN_DURATION = 20;

export const BADGES = {
  firstFocus: { key: 'first_focus', label: '🌱 First focus' },
  streak7: { key: 'streak_7', label: '🔥 7-day streak' },
} as const;

export interface StartFocusInput {
  userId: number;
  chatId: number;
  displayName?: string | null;
  durationMin: number;
  tag?: string | null;
  commitPhone: boolean;
  midPing?: boolean;
}

export interface FocusDeps {
  db: Db;
  gamify: GamifyService;
  scheduler: JobScheduler;
  sender: MessageSender;
  timezone: string;
  retry?: RetryOptions;
}

interface SessionRow {
  id: number;
  user_id: number;
  started_at_utc: string;
  duration_min: number;
  tag: string | null;
  completed: number;
}

interface DailyRow {
  sessions: number;
  phone_free_sessions: number;
}

interface StreakRow {
  target_per_day: number;
  last_date: string | null;
  streak_days: number;
}

export function phoneFreeKeyboard(sessionId: number): InlineKeyboard {
  return Markup.inlineKeyboard([
    Markup.button.callback('✅ Phone-free', `pfree:1:${sessionId}`),
    Markup.button.callback('❌ Slipped', `pfree:0:${sessionId}`),
  ]).reply_markup;
}

export const PHONE_FREE_CALLBACK = /^pfree:([01]):(\d+)$/;

export function parsePhoneFreeCallback(data: string): { phoneFree: boolean; sessionId: number } | null {
  const match = PHONE_FREE_CALLBACK.exec(data);
  if (!match) return null;
  return { phoneFree: match[1] === '1', sessionId: Number(match[2]) };
}

export function focusStartedText(durationMin: number, tag: string | null | undefined, commitPhone: boolean): string {
  let text = `🎯 Focus started (${durationMin}m)${tag ? ` • ${tag}` : ''}`;
  if (commitPhone) text += '\n📵 Phone away, please.';
  return text;
}

export class FocusService {
  constructor(private readonly deps: FocusDeps) {}

  upsertUser(userId: number, chatId: number, displayName: string | null = null, role: 'self' | 'partner' | 'guest' = 'guest'): void {
    this.deps.db
      .prepare(
        `INSERT INTO users (user_id, chat_id, display_name, role) VALUES (?, ?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET
           chat_id = excluded.chat_id,
           display_name = COALESCE(excluded.display_name, users.display_name),
           role = excluded.role`
      )
      .run(userId, chatId, displayName, role);
  }

  /** Starts a session, announces it and queues the halfway and end pings. Returns the session id. */
  async start(input: StartFocusInput, now: Date = new Date()): Promise<number> {
    const { durationMin } = input;
    if (!Number.isInteger(durationMin) || durationMin < MIN_FOCUS_MINUTES || durationMin > MAX_FOCUS_MINUTES) {
      throw new FocusError(`Duration must be between ${MIN_FOCUS_MINUTES} and ${MAX_FOCUS_MINUTES} minutes`);
    }
    const { db, scheduler, sender, retry } = this.deps;

    const result = db
      .prepare('INSERT INTO focus_sessions (user_id, started_at_utc, duration_min, tag, phone_commit) VALUES (?, ?, ?, ?, ?)')
      .run(input.userId, now.toISOString(), durationMin, input.tag ?? null, input.commitPhone ? 1 : 0);
    const sessionId = Number(result.lastInsertRowid);

    await sendWithRetry(sender, input.chatId, focusStartedText(durationMin, input.tag, input.commitPhone), undefined, retry);

    const startMs = now.getTime();
    if ((input.midPing ?? true) && durationMin >= MID_PING_MIN_DURATION) {
      scheduler.runOnce(
        `focus_mid_${sessionId}`,
        new Date(startMs + durationMin * 30_000),
        () => sendWithRetry(sender, input.chatId, '⏳ Halfway. Breathe. Stay with the task. 📵', undefined, retry),
        now
      );
    }
    scheduler.runOnce(
      `focus_end_${sessionId}`,
      new Date(startMs + durationMin * 60_000),
      () =>
        sendWithRetry(
          sender,
          input.chatId,
          '⏰ Pomodoro complete! Mark honesty for streak:',
          { reply_markup: phoneFreeKeyboard(sessionId) },
          retry
        ),
      now
    );

    focusLogger.info({ sessionId, userId: input.userId, durationMin }, 'Focus session started');
    return sessionId;
  }

  complete(sessionId: number, phoneFree: boolean, now: Date = new Date()): FocusCompletion {
    const { db, gamify, timezone } = this.deps;
    const session = db.prepare<[number], SessionRow>('SELECT * FROM focus_sessions WHERE id = ?').get(sessionId);
    if (!session) {
      throw new FocusError(`Unknown focus session ${sessionId}`);
    }
    if (session.completed) {
      throw new FocusError('Session already logged');
    }

    const today = localDate(now, timezone);
    const run = db.transaction((): FocusCompletion => {
      db.prepare('UPDATE focus_sessions SET completed = 1, phone_free = ? WHERE id = ?').run(phoneFree ? 1 : 0, sessionId);
      db.prepare(
        `INSERT INTO focus_daily (user_id, local_date, sessions, phone_free_sessions) VALUES (?, ?, 1, ?)
         ON CONFLICT(user_id, local_date) DO UPDATE SET
           sessions = sessions + 1,
           phone_free_sessions = phone_free_sessions + excluded.phone_free_sessions`
      ).run(session.user_id, today, phoneFree ? 1 : 0);
      const daily = db
        .prepare<[number, string], DailyRow>('SELECT sessions, phone_free_sessions FROM focus_daily WHERE user_id = ? AND local_date = ?')
        .get(session.user_id, today) ?? { sessions: 1, phone_free_sessions: phoneFree ? 1 : 0 };

      const streakDays = this.updateStreak(session.user_id, today, daily.sessions);
      const xp = gamify.recordPomodoro({
        userId: session.user_id,
        startedAt: new Date(session.started_at_utc),
        endedAt: now,
        durationMin: session.duration_min,
        phoneFree,
        tag: session.tag,
      });

      const newBadges: string[] = [];
      if (gamify.awardBadge(session.user_id, BADGES.firstFocus.key, BADGES.firstFocus.label, now)) {
        newBadges.push(BADGES.firstFocus.label);
      }
      if (streakDays >= 7 && gamify.awardBadge(session.user_id, BADGES.streak7.key, BADGES.streak7.label, now)) {
        newBadges.push(BADGES.streak7.label);
      }

      return {
        sessions: daily.sessions,
        phoneFreeSessions: daily.phone_free_sessions,
        streakDays,
        xp: xp.xp,
        newBadges,
      };
    });

    const completion = run();
    focusLogger.info({ sessionId, phoneFree, ...completion }, 'Focus session logged');
    return completion;
  }

  private updateStreak(userId: number, today: string, sessionsToday: number): number {
    const { db } = this.deps;
    const streak = db
      .prepare<[number], StreakRow>('SELECT target_per_day, last_date, streak_days FROM focus_streaks WHERE user_id = ?')
      .get(userId);
    const target = streak?.target_per_day ?? 1;
    const current = streak?.streak_days ?? 0;
    if (sessionsToday < target || streak?.last_date === today) {
      return current;
    }

    const yesterday = DateTime.fromISO(today).minus({ days: 1 }).toISODate();
    const days = streak?.last_date === yesterday ? current + 1 : 1;
    db.prepare(
      `INSERT INTO focus_streaks (user_id, target_per_day, last_date, streak_days) VALUES (?, ?, ?, ?)
       ON CONFLICT(user_id) DO UPDATE SET last_date = excluded.last_date, streak_days = excluded.streak_days`
    ).run(userId, target, today, days);
    return days;
  }
}

export function focusLoggedText(phoneFree: boolean, completion: FocusCompletion): string {
  const lines = [
    `Logged: ${phoneFree ? '✅ Phone-free' : '❌ Slipped'}`,
    `Today: ${completion.sessions} sessions • ${completion.phoneFreeSessions} phone-free`,
    `🔥 Streak: ${completion.streakDays} day(s) • ⭐ ${completion.xp} XP`,
  ];
  for (const badge of completion.newBadges) {
    lines.push(`🏅 New badge: ${badge}`);
  }
  return lines.join('\n');
}
