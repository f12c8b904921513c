import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const cronMocks = vi.hoisted(() => ({
  schedule: vi.fn(),
  validate: vi.fn(),
}));

vi.mock('node-cron', () => ({
  schedule: cronMocks.schedule,
  validate: cronMocks.validate,
}));

import { CardService } from './cardService';
import { openDatabase } from './database';
import { JobScheduler } from './jobScheduler';
import { ManifestationService } from './manifestationService';
import { ReflectionLog } from './reflectionService';
import { nextClockTime, scheduleTestAt, scheduleTestIn, setupDailyJobs, setupReminders } from './schedulerService';
import { FakeSender, tempDir, writeJson } from '../testing/fakeSender';

const NOW = new Date('2026-10-18T10:00:00Z');
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('nextClockTime', () => {
  it('picks a later time today', () => {
    expect(nextClockTime({ hour: 21, minute: 35 }, 'Asia/Kolkata', NOW).toISOString()).toBe('2026-10-18T16:05:00.000Z');
  });

  it('moves a passed time to tomorrow', () => {
    expect(nextClockTime({ hour: 9, minute: 0 }, 'Asia/Kolkata', NOW).toISOString()).toBe('2026-10-19T03:30:00.000Z');
  });

  it('treats the current minute as passed', () => {
    expect(nextClockTime({ hour: 15, minute: 30 }, 'Asia/Kolkata', NOW).toISOString()).toBe('2026-10-19T10:00:00.000Z');
  });
});

describe('scheduling', () => {
  let sender: FakeSender;
  let scheduler: JobScheduler;
  let manifestations: ManifestationService;
  let cards: CardService;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(NOW);
    cronMocks.schedule.mockReset().mockImplementation(() => ({ stop: vi.fn() }));
    cronMocks.validate.mockReset().mockReturnValue(true);

    sender = new FakeSender();
    scheduler = new JobScheduler('UTC');
    const contentDir = tempDir();
    writeJson(contentDir, 'manifestations.json', [{ id: 1, set: ['a1', 'a2', 'a3'] }]);
    writeJson(contentDir, 'manifestations-partner.json', [{ id: 2, set: ['p1', 'p2', 'p3'] }]);
    writeJson(contentDir, 'cards.json', [{ id: 1, title: 'Calm', message: 'm', prompt: 'p' }]);
    const config = {
      chatId: 100,
      partnerChatId: 200,
      partnerLabel: 'Her',
      timezone: 'UTC',
      dataDir: tempDir(),
      contentDir,
    };
    const reflections = new ReflectionLog(openDatabase(':memory:'));
    manifestations = new ManifestationService({ sender, reflections, config });
    cards = new CardService({ sender, reflections, config });
  });

  afterEach(() => {
    scheduler.stopAll();
    vi.useRealTimers();
  });

  it('registers the daily manifestation and card jobs', () => {
    setupDailyJobs(scheduler, manifestations, cards);

    expect(scheduler.names('daily')).toEqual([
      'manifestation_0',
      'manifestation_1',
      'manifestation_2',
      'manifestation_partner_0',
      'manifestation_partner_1',
      'manifestation_partner_2',
      'card_prompt',
      'card_reveal',
    ]);
    expect(scheduler.describe('manifestation_1')).toBe('15 8 * * *');
    expect(scheduler.describe('manifestation_partner_2')).toBe('31 8 * * *');
    expect(scheduler.describe('card_prompt')).toBe('0 10 * * *');
    expect(scheduler.describe('card_reveal')).toBe('0 19 * * *');
  });

  it('sends the matching line when a daily job fires', async () => {
    setupDailyJobs(scheduler, manifestations, cards);
    const callback: unknown = cronMocks.schedule.mock.calls[4]?.[1];
    if (typeof callback !== 'function') throw new Error('missing callback');

    callback();
    await flush();

    expect(sender.sent).toEqual([{ chatId: 200, text: '🌅 Manifestation for Her:\n\np2' }]);
  });

  it('schedules a one-off test run of both sets', async () => {
    const start = scheduleTestIn(scheduler, manifestations, 2, NOW);

    expect(start.toISOString()).toBe('2026-10-18T10:02:00.000Z');
    expect(scheduler.describe('test_manifestation_0')).toBe('2026-10-18T10:02:00.000Z');
    expect(scheduler.describe('test_manifestation_2')).toBe('2026-10-18T10:04:00.000Z');
    expect(scheduler.describe('test_manifestation_partner_0')).toBe('2026-10-18T10:02:30.000Z');
    expect(scheduler.describe('test_manifestation_partner_2')).toBe('2026-10-18T10:04:30.000Z');

    await vi.advanceTimersByTimeAsync(2 * 60_000);
    await flush();
    expect(sender.sent).toEqual([{ chatId: 100, text: '🌅 Manifestation:\n\na1' }]);

    await vi.advanceTimersByTimeAsync(150_000);
    await flush();
    expect(sender.sent.map(m => m.text.split('\n\n')[1])).toEqual(['a1', 'p1', 'a2', 'p2', 'a3', 'p3']);
    expect(scheduler.names()).toEqual([]);
  });

  it('schedules a test run at the next clock time', () => {
    const start = scheduleTestAt(scheduler, manifestations, { hour: 9, minute: 0 }, 'UTC', NOW);

    expect(start.toISOString()).toBe('2026-10-19T09:00:00.000Z');
    expect(scheduler.describe('at_manifestation_0')).toBe('2026-10-19T09:00:00.000Z');
    expect(scheduler.names('once')).toHaveLength(6);
  });

  it('registers reminders for the owner chat', async () => {
    const count = setupReminders(
      scheduler,
      [
        { name: 'water', hour: 11, minute: 0, text: '*Drink* water' },
        { name: 'weekly', hour: 18, minute: 30, days: [0], text: 'Review the week' },
      ],
      sender,
      100
    );

    expect(count).toBe(2);
    expect(scheduler.describe('reminder_weekly')).toBe('30 18 * * 0');

    const callback: unknown = cronMocks.schedule.mock.calls[0]?.[1];
    if (typeof callback !== 'function') throw new Error('missing callback');
    callback();
    await flush();
    expect(sender.sent).toEqual([{ chatId: 100, text: '*Drink* water', extra: { parse_mode: 'Markdown' } }]);
  });

  it('skips reminders without an owner chat', () => {
    expect(setupReminders(scheduler, [{ name: 'water', hour: 11, minute: 0, text: 'x' }], sender, null)).toBe(0);
    expect(scheduler.names()).toEqual([]);
  });
});
