import { DateTime } from 'luxon';
import type { Db } from './database';
import { localDate } from './rotationService';
import type { WeeklySummary } from '../types';

export const XP_PER_LEVEL = 500;

export interface XpChange {
  xp: number;
  oldLevel: number;
  newLevel: number;
}

export interface PomodoroInput {
  userId: number;
  startedAt: Date;
  endedAt: Date;
  durationMin: number;
  phoneFree: boolean;
  tag?: string | null;
}

export interface CallResult {
  minutes: number;
  startedAt: string;
  endedAt: string;
  xp: XpChange;
}

interface CallSession {
  startedAt: Date;
  tag: string | null;
  notes: string | null;
}

interface XpRow {
  xp: number;
  level: number;
}

interface TotalsRow {
  count: number;
  minutes: number;
}

interface BadgeRow {
  key: string;
  label: string | null;
  awarded_at: string;
}

interface LeaderboardRow {
  user_id: number;
  pomodoros: number;
}

export function levelForXp(xp: number): number {
  return Math.floor(xp / XP_PER_LEVEL) + 1;
}

/** Monday..Sunday around the given local date, both ends inclusive. */
export function weekRange(date: string): { start: string; end: string } {
  const day = DateTime.fromISO(date);
  const start = day.minus({ days: day.weekday - 1 });
  return {
    start: start.toISODate() ?? date,
    end: start.plus({ days: 6 }).toISODate() ?? date,
  };
}

export class GamifyService {
  // Running calls only live in memory; a restart loses them, logged calls stay in the db.
  private readonly calls = new Map<number, CallSession>();

  constructor(private readonly db: Db, private readonly timezone: string) {}

  getProgress(userId: number): XpRow {
    const row = this.db.prepare<[number], XpRow>('SELECT xp, level FROM gamify_users WHERE user_id = ?').get(userId);
    return row ?? { xp: 0, level: 1 };
  }

  addXp(userId: number, amount: number): XpChange {
    const current = this.db.prepare<[number], XpRow>('SELECT xp, level FROM gamify_users WHERE user_id = ?').get(userId);
    const oldLevel = current?.level ?? 1;
    const xp = (current?.xp ?? 0) + amount;
    const newLevel = levelForXp(xp);
    this.db
      .prepare<[number, number, number]>(
        `INSERT INTO gamify_users (user_id, xp, level) VALUES (?, ?, ?)
         ON CONFLICT(user_id) DO UPDATE SET xp = excluded.xp, level = excluded.level`
      )
      .run(userId, xp, newLevel);
    return { xp, oldLevel, newLevel };
  }

  recordPomodoro(input: PomodoroInput): XpChange {
    const insert = this.db.transaction((): XpChange => {
      this.db
        .prepare(
          `INSERT INTO pomodoros (user_id, start_ts, end_ts, duration_min, phone_free, tag, local_date, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          input.userId,
          input.startedAt.toISOString(),
          input.endedAt.toISOString(),
          input.durationMin,
          input.phoneFree ? 1 : 0,
          input.tag ?? null,
          localDate(input.endedAt, this.timezone),
          input.endedAt.toISOString()
        );
      return this.addXp(input.userId, input.phoneFree ? 15 : 10);
    });
    return insert();
  }

  logCall(
    userId: number,
    minutes: number,
    options: { tag?: string | null; notes?: string | null; startedAt?: Date; endedAt?: Date } = {}
  ): XpChange {
    const endedAt = options.endedAt ?? new Date();
    const startedAt = options.startedAt ?? new Date(endedAt.getTime() - minutes * 60_000);
    const insert = this.db.transaction((): XpChange => {
      this.db
        .prepare(
          `INSERT INTO calls (user_id, start_ts, end_ts, duration_min, tag, notes, local_date, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          userId,
          startedAt.toISOString(),
          endedAt.toISOString(),
          minutes,
          options.tag ?? null,
          options.notes ?? null,
          localDate(endedAt, this.timezone),
          endedAt.toISOString()
        );
      return this.addXp(userId, minutes >= 10 ? 15 : 5);
    });
    return insert();
  }

  startCall(userId: number, tag: string | null = null, notes: string | null = null, now: Date = new Date()): boolean {
    if (this.calls.has(userId)) return false;
    this.calls.set(userId, { startedAt: now, tag, notes });
    return true;
  }

  endCall(userId: number, now: Date = new Date()): CallResult | null {
    const session = this.calls.get(userId);
    if (!session) return null;
    this.calls.delete(userId);
    const minutes = Math.max(0, Math.floor((now.getTime() - session.startedAt.getTime()) / 60_000));
    const xp = this.logCall(userId, minutes, {
      tag: session.tag,
      notes: session.notes,
      startedAt: session.startedAt,
      endedAt: now,
    });
    return { minutes, startedAt: session.startedAt.toISOString(), endedAt: now.toISOString(), xp };
  }

  awardBadge(userId: number, key: string, label: string, now: Date = new Date()): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO badges (user_id, key, label, local_date, awarded_at) VALUES (?, ?, ?, ?, ?)`
      )
      .run(userId, key, label, localDate(now, this.timezone), now.toISOString());
    return result.changes > 0;
  }

  hasBadge(userId: number, key: string): boolean {
    return this.db.prepare<[number, string]>('SELECT 1 FROM badges WHERE user_id = ? AND key = ?').get(userId, key) !== undefined;
  }

  weeklySummary(userId: number, ref: Date = new Date()): WeeklySummary {
    const { start, end } = weekRange(localDate(ref, this.timezone));
    const totals = (table: 'pomodoros' | 'calls'): TotalsRow =>
      this.db
        .prepare<[number, string, string], TotalsRow>(
          `SELECT COUNT(*) AS count, COALESCE(SUM(duration_min), 0) AS minutes
           FROM ${table} WHERE user_id = ? AND local_date BETWEEN ? AND ?`
        )
        .get(userId, start, end) ?? { count: 0, minutes: 0 };

    const pomodoros = totals('pomodoros');
    const calls = totals('calls');
    const progress = this.getProgress(userId);
    const badges = this.db
      .prepare<[number, string, string], BadgeRow>(
        `SELECT key, label, awarded_at FROM badges
         WHERE user_id = ? AND local_date BETWEEN ? AND ? ORDER BY awarded_at`
      )
      .all(userId, start, end);

    return {
      weekStart: start,
      weekEnd: end,
      pomodoros: pomodoros.count,
      pomodoroMinutes: pomodoros.minutes,
      calls: calls.count,
      callMinutes: calls.minutes,
      xp: progress.xp,
      level: progress.level,
      badges: badges.map(b => ({ key: b.key, label: b.label ?? b.key, awardedAt: b.awarded_at })),
    };
  }

  leaderboard(ref: Date = new Date(), limit = 10): Array<{ userId: number; pomodoros: number }> {
    const { start, end } = weekRange(localDate(ref, this.timezone));
    return this.db
      .prepare<[string, string, number], LeaderboardRow>(
        `SELECT user_id, COUNT(*) AS pomodoros FROM pomodoros
         WHERE local_date BETWEEN ? AND ?
         GROUP BY user_id ORDER BY pomodoros DESC, user_id ASC LIMIT ?`
      )
      .all(start, end, limit)
      .map(row => ({ userId: row.user_id, pomodoros: row.pomodoros }));
  }
}

export function formatWeeklySummary(summary: WeeklySummary): string {
  const lines = [
    `📊 Week ${summary.weekStart} → ${summary.weekEnd}`,
    `🍅 Pomodoros: ${summary.pomodoros} (${summary.pomodoroMinutes} min)`,
    `📞 Calls: ${summary.calls} (${summary.callMinutes} min)`,
    `⭐ XP: ${summary.xp} • Level ${summary.level}`,
  ];
  if (summary.badges.length) {
    lines.push(`🏅 Badges: ${summary.badges.map(b => b.label).join(', ')}`);
  }
  return lines.join('\n');
}
