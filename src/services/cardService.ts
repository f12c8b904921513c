import * as path from 'path';
import { contentLogger } from '../logger';
import { errorMessage } from '../errors';
import type { AppConfig } from '../config';
import { loadCards } from './contentService';
import type { ReflectionLog } from './reflectionService';
import { RotationService } from './rotationService';
import { configuredRecipients, sendWithRetry, type RecipientChat, type RetryOptions } from './telegramService';
import type { Card, MessageSender, SendExtra } from '../types';

export const CARDS_FILE = 'cards.json';
export const CARD_WIDTH = 56;

export const CARD_ANNOUNCEMENT =
  "🃏 Card drawn — take a quiet moment to reflect on your day.\n\n" +
  "When it's time, you'll receive the full card reveal.";

type CardConfig = Pick<AppConfig, 'chatId' | 'partnerChatId' | 'timezone' | 'dataDir' | 'contentDir'>;

export interface CardDeps {
  sender: MessageSender;
  reflections: ReflectionLog;
  config: CardConfig;
  retry?: RetryOptions;
  random?: () => number;
}

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

/**
 * Greedy word wrap. Runs of whitespace collapse to one space; words longer than
 * `width` are cut into width-sized pieces. Always returns at least one line.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let line = '';
  for (let word of text.trim().split(/\s+/).filter(Boolean)) {
    while (word.length > width) {
      if (line) {
        lines.push(line);
        line = '';
      }
      lines.push(word.slice(0, width));
      word = word.slice(width);
    }
    if (!word) continue;
    if (!line) {
      line = word;
    } else if (line.length + 1 + word.length <= width) {
      line += ` ${word}`;
    } else {
      lines.push(line);
      line = word;
    }
  }
  if (line) lines.push(line);
  return lines.length ? lines : [''];
}

/** Centers within `width`; an odd leftover space goes to the right. */
export function centerText(text: string, width: number): string {
  const pad = Math.max(0, width - text.length);
  const left = Math.floor(pad / 2);
  return ' '.repeat(left) + text + ' '.repeat(pad - left);
}

export function renderBoxedCard(card: Pick<Card, 'title' | 'message' | 'prompt'>, innerWidth = CARD_WIDTH): string {
  const rule = (left: string, right: string) => left + '─'.repeat(innerWidth + 2) + right;
  const row = (content: string) => `│ ${content.padEnd(innerWidth)} │`;

  return [
    rule('┌', '┐'),
    ...wrapText(card.title || 'Your Card', innerWidth).map(line => row(centerText(line, innerWidth))),
    rule('├', '┤'),
    row(''),
    ...wrapText(card.message, innerWidth).map(row),
    rule('├', '┤'),
    ...wrapText(card.prompt, innerWidth).map(row),
    rule('└', '┘'),
  ].join('\n');
}

export function cardRevealHtml(card: Card): string {
  return `<pre>${escapeHtml(renderBoxedCard(card))}</pre>`;
}

/**
 * One card per day for both recipients: announced in the morning, revealed in the evening.
 */
export class CardService {
  readonly rotation: RotationService<Card>;

  constructor(private readonly deps: CardDeps) {
    const { config } = deps;
    this.rotation = new RotationService<Card>({
      pool: 'cards',
      dataDir: config.dataDir,
      timezone: config.timezone,
      load: () => loadCards(path.join(config.contentDir, CARDS_FILE)),
      idOf: card => card.id,
      salt: String(config.chatId ?? 'cards'),
      random: deps.random,
    });
  }

  today(now: Date = new Date()): Card | null {
    return this.rotation.pickToday(now);
  }

  /** Draws (or reuses) today's card and announces it without showing it. Returns recipients reached. */
  async sendPrompt(now: Date = new Date()): Promise<number> {
    const card = this.today(now);
    if (!card) {
      contentLogger.error('No card available to draw');
      return 0;
    }
    return this.broadcast(CARD_ANNOUNCEMENT, undefined, 'announce', () => undefined);
  }

  async sendReveal(now: Date = new Date()): Promise<number> {
    const card = this.today(now);
    if (!card) {
      contentLogger.error('No card available to reveal');
      return 0;
    }
    return this.broadcast(cardRevealHtml(card), { parse_mode: 'HTML' }, 'reveal', target =>
      this.deps.reflections.record('card', card.id, target.recipient, null, now)
    );
  }

  private async broadcast(
    text: string,
    extra: SendExtra | undefined,
    action: string,
    onDelivered: (target: RecipientChat) => void
  ): Promise<number> {
    const targets = configuredRecipients(this.deps.config);
    if (targets.length === 0) {
      contentLogger.error({ action }, 'No chat ids configured for cards');
      return 0;
    }

    let delivered = 0;
    for (const target of targets) {
      try {
        await sendWithRetry(this.deps.sender, target.chatId, text, extra, this.deps.retry);
        onDelivered(target);
        delivered++;
        contentLogger.info({ action, recipient: target.recipient, chatId: target.chatId }, 'Card message sent');
      } catch (error) {
        contentLogger.error(
          { action, recipient: target.recipient, chatId: target.chatId, error: errorMessage(error) },
          'Card message failed'
        );
      }
    }
    return delivered;
  }
}
