import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { openDatabase, type Db } from './database';
import { FocusError } from '../errors';
import {
  FocusService,
  focusLoggedText,
  focusStartedText,
  parsePhoneFreeCallback,
  phoneFreeKeyboard,
} from './focusService';
import { GamifyService } from './gamifyService';
import { JobScheduler } from './jobScheduler';
import { FakeSender } from '../testing/fakeSender';

const START = new Date('2026-10-18T09:00:00Z');
const MINUTE = 60_000;

// lets the async job callbacks settle; setImmediate stays real
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

function dayAt(offset: number): Date {
  return new Date(START.getTime() + offset * 24 * 60 * MINUTE);
}

describe('focus helpers', () => {
  it('formats the start message', () => {
    expect(focusStartedText(25, 'deep work', true)).toBe('🎯 Focus started (25m) • deep work\n📵 Phone away, please.');
    expect(focusStartedText(10, null, false)).toBe('🎯 Focus started (10m)');
  });

  it('builds and parses the honesty buttons', () => {
    expect(phoneFreeKeyboard(7)).toMatchObject({
      inline_keyboard: [
        [
          { text: '✅ Phone-free', callback_data: 'pfree:1:7' },
          { text: '❌ Slipped', callback_data: 'pfree:0:7' },
        ],
      ],
    });
    expect(parsePhoneFreeCallback('pfree:1:7')).toEqual({ phoneFree: true, sessionId: 7 });
    expect(parsePhoneFreeCallback('pfree:0:12')).toEqual({ phoneFree: false, sessionId: 12 });
    expect(parsePhoneFreeCallback('pfree:2:7')).toBeNull();
  });

  it('formats the logged message with new badges', () => {
    expect(
      focusLoggedText(true, { sessions: 2, phoneFreeSessions: 1, streakDays: 3, xp: 40, newBadges: ['🌱 First focus'] })
    ).toBe('Logged: ✅ Phone-free\nToday: 2 sessions • 1 phone-free\n🔥 Streak: 3 day(s) • ⭐ 40 XP\n🏅 New badge: 🌱 First focus');
  });
});

describe('FocusService', () => {
  let db: Db;
  let sender: FakeSender;
  let scheduler: JobScheduler;
  let focus: FocusService;

  const start = (durationMin: number, now: Date = START, tag: string | null = null) =>
    focus.start({ userId: 1, chatId: 100, durationMin, tag, commitPhone: true }, now);

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(START);
    db = openDatabase(':memory:');
    sender = new FakeSender();
    scheduler = new JobScheduler('UTC');
    focus = new FocusService({ db, gamify: new GamifyService(db, 'UTC'), scheduler, sender, timezone: 'UTC' });
  });

  afterEach(() => {
    scheduler.stopAll();
    vi.useRealTimers();
  });

  it('announces the session and pings halfway and at the end', async () => {
    const id = await start(25, START, 'deep');

    expect(id).toBe(1);
    expect(sender.sent).toEqual([{ chatId: 100, text: '🎯 Focus started (25m) • deep\n📵 Phone away, please.' }]);
    expect(scheduler.names('once')).toEqual(['focus_mid_1', 'focus_end_1']);

    await vi.advanceTimersByTimeAsync(12.5 * MINUTE);
    await flush();
    expect(sender.sent[1]).toEqual({ chatId: 100, text: '⏳ Halfway. Breathe. Stay with the task. 📵' });

    await vi.advanceTimersByTimeAsync(12.5 * MINUTE);
    await flush();
    expect(sender.sent[2]).toMatchObject({
      chatId: 100,
      text: '⏰ Pomodoro complete! Mark honesty for streak:',
      extra: {
        reply_markup: {
          inline_keyboard: [[{ callback_data: 'pfree:1:1' }, { callback_data: 'pfree:0:1' }]],
        },
      },
    });
    expect(scheduler.names()).toEqual([]);
  });

  it('retries the end ping so the honesty buttons still arrive', async () => {
    focus = new FocusService({
      db,
      gamify: new GamifyService(db, 'UTC'),
      scheduler,
      sender,
      timezone: 'UTC',
      retry: { attempts: 2, delayMs: 0 },
    });
    await start(10);
    sender.failures = 1;

    await vi.advanceTimersByTimeAsync(10 * MINUTE);
    await flush();

    expect(sender.failures).toBe(0);
    expect(sender.sent).toHaveLength(2);
    expect(sender.sent[1]).toMatchObject({
      chatId: 100,
      text: '⏰ Pomodoro complete! Mark honesty for streak:',
      extra: { reply_markup: { inline_keyboard: [[{ callback_data: 'pfree:1:1' }, { callback_data: 'pfree:0:1' }]] } },
    });
  });

  it('skips the halfway ping for short sessions', async () => {
    await start(10);
    expect(scheduler.names()).toEqual(['focus_end_1']);
  });

  it('rejects durations out of range', async () => {
    await expect(start(0)).rejects.toBeInstanceOf(FocusError);
    await expect(start(181)).rejects.toThrow('Duration must be between 1 and 180 minutes');
    expect(sender.sent).toEqual([]);
  });

  it('logs a completed session once', async () => {
    const id = await start(25);

    expect(focus.complete(id, true, dayAt(0))).toEqual({
      sessions: 1,
      phoneFreeSessions: 1,
      streakDays: 1,
      xp: 15,
      newBadges: ['🌱 First focus'],
    });
    expect(() => focus.complete(id, true, dayAt(0))).toThrow('Session already logged');
    expect(() => focus.complete(99, true, dayAt(0))).toThrow('Unknown focus session 99');
  });

  it('counts sessions per day without growing the streak twice', async () => {
    focus.complete(await start(25), true, dayAt(0));

    expect(focus.complete(await start(25), false, dayAt(0))).toEqual({
      sessions: 2,
      phoneFreeSessions: 1,
      streakDays: 1,
      xp: 25,
      newBadges: [],
    });
  });

  it('grows the streak on consecutive days and awards the weekly badge', async () => {
    let last = focus.complete(await start(5, dayAt(0)), true, dayAt(0));
    for (let day = 1; day < 7; day++) {
      last = focus.complete(await start(5, dayAt(day)), true, dayAt(day));
    }

    expect(last).toEqual({
      sessions: 1,
      phoneFreeSessions: 1,
      streakDays: 7,
      xp: 105,
      newBadges: ['🔥 7-day streak'],
    });
  });

  it('restarts the streak after a missed day', async () => {
    focus.complete(await start(5, dayAt(0)), true, dayAt(0));
    focus.complete(await start(5, dayAt(1)), true, dayAt(1));

    expect(focus.complete(await start(5, dayAt(3)), true, dayAt(3)).streakDays).toBe(1);
  });
});
