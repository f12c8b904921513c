import { DateTime } from 'luxon';
import type { CardService } from './cardService';
import type { JobScheduler } from './jobScheduler';
import type { ManifestationService } from './manifestationService';
import { sendWithRetry } from './telegramService';
import { schedulerLogger } from '../logger';
import type { ClockTime, MessageSender, Recipient, Reminder } from '../types';

interface ManifestationSlot extends ClockTime {
  recipient: Recipient;
  index: number;
}

export const MANIFESTATION_SLOTS: ManifestationSlot[] = [
  { recipient: 'self', index: 0, hour: 8, minute: 0 },
  { recipient: 'self', index: 1, hour: 8, minute: 15 },
  { recipient: 'self', index: 2, hour: 8, minute: 30 },
  // partner lines go out one minute after the owner's
  { recipient: 'partner', index: 0, hour: 8, minute: 1 },
  { recipient: 'partner', index: 1, hour: 8, minute: 16 },
  { recipient: 'partner', index: 2, hour: 8, minute: 31 },
];

export const CARD_PROMPT_TIME: ClockTime = { hour: 10, minute: 0 };
export const CARD_REVEAL_TIME: ClockTime = { hour: 19, minute: 0 };

const MINUTE_MS = 60_000;
// one-off test runs: owner lines a minute apart, partner lines 30s after each
const TEST_OFFSETS_MS: Record<Recipient, number[]> = {
  self: [0, MINUTE_MS, 2 * MINUTE_MS],
  partner: [30_000, MINUTE_MS + 30_000, 2 * MINUTE_MS + 30_000],
};

function jobName(recipient: Recipient, index: number): string {
  return recipient === 'self' ? `manifestation_${index}` : `manifestation_partner_${index}`;
}

export function setupDailyJobs(scheduler: JobScheduler, manifestations: ManifestationService, cards: CardService): void {
  for (const slot of MANIFESTATION_SLOTS) {
    scheduler.runDaily(jobName(slot.recipient, slot.index), slot, () =>
      manifestations.send(slot.recipient, slot.index)
    );
  }
  scheduler.runDaily('card_prompt', CARD_PROMPT_TIME, () => cards.sendPrompt());
  scheduler.runDaily('card_reveal', CARD_REVEAL_TIME, () => cards.sendReveal());
}

function scheduleTestRun(
  scheduler: JobScheduler,
  manifestations: ManifestationService,
  prefix: string,
  start: Date,
  now: Date
): void {
  for (const recipient of ['self', 'partner'] as const) {
    TEST_OFFSETS_MS[recipient].forEach((offset, index) => {
      scheduler.runOnce(
        `${prefix}_${jobName(recipient, index)}`,
        new Date(start.getTime() + offset),
        () => manifestations.send(recipient, index),
        now
      );
    });
  }
}

/** Runs both manifestation sets once, starting `minutes` from now. */
export function scheduleTestIn(
  scheduler: JobScheduler,
  manifestations: ManifestationService,
  minutes: number,
  now: Date = new Date()
): Date {
  const start = new Date(now.getTime() + minutes * MINUTE_MS);
  scheduleTestRun(scheduler, manifestations, 'test', start, now);
  return start;
}

/** Next occurrence of hh:mm in `timezone`: later today, else tomorrow. */
export function nextClockTime(time: ClockTime, timezone: string, now: Date = new Date()): Date {
  const local = DateTime.fromJSDate(now).setZone(timezone);
  let at = local.set({ hour: time.hour, minute: time.minute, second: 0, millisecond: 0 });
  if (at.toMillis() <= local.toMillis()) {
    at = at.plus({ days: 1 });
  }
  return at.toJSDate();
}

export function scheduleTestAt(
  scheduler: JobScheduler,
  manifestations: ManifestationService,
  time: ClockTime,
  timezone: string,
  now: Date = new Date()
): Date {
  const start = nextClockTime(time, timezone, now);
  scheduleTestRun(scheduler, manifestations, 'at', start, now);
  return start;
}

export function setupReminders(
  scheduler: JobScheduler,
  reminders: Reminder[],
  sender: MessageSender,
  chatId: number | null
): number {
  if (chatId === null) {
    schedulerLogger.warn('Reminders enabled but CHAT_ID is not set');
    return 0;
  }
  for (const reminder of reminders) {
    scheduler.runDaily(`reminder_${reminder.name}`, reminder, () =>
      sendWithRetry(sender, chatId, reminder.text, { parse_mode: 'Markdown' })
    );
  }
  return reminders.length;
}
