import * as path from 'path';
import { contentLogger } from '../logger';
import { errorMessage } from '../errors';
import type { AppConfig } from '../config';
import { loadManifestations } from './contentService';
import type { ReflectionLog } from './reflectionService';
import { RotationService } from './rotationService';
import { sendWithRetry, type RetryOptions } from './telegramService';
import type { Manifestation, MessageSender, Recipient } from '../types';

export const MANIFESTATION_FILES: Record<Recipient, string> = {
  self: 'manifestations.json',
  partner: 'manifestations-partner.json',
};

export const SET_SIZE = 3;

type ManifestationConfig = Pick<AppConfig, 'chatId' | 'partnerChatId' | 'partnerLabel' | 'timezone' | 'dataDir' | 'contentDir'>;

export interface ManifestationDeps {
  sender: MessageSender;
  reflections: ReflectionLog;
  config: ManifestationConfig;
  retry?: RetryOptions;
  random?: () => number;
}

export function manifestationHeader(recipient: Recipient, partnerLabel: string): string {
  return recipient === 'self' ? '🌅 Manifestation:' : `🌅 Manifestation for ${partnerLabel}:`;
}

export class ManifestationService {
  readonly pools: Record<Recipient, RotationService<Manifestation>>;

  constructor(private readonly deps: ManifestationDeps) {
    const { config } = deps;
    const pool = (recipient: Recipient, name: string): RotationService<Manifestation> =>
      new RotationService<Manifestation>({
        pool: name,
        dataDir: config.dataDir,
        timezone: config.timezone,
        load: () => loadManifestations(path.join(config.contentDir, MANIFESTATION_FILES[recipient])),
        idOf: item => item.id,
        salt: String((recipient === 'self' ? config.chatId : config.partnerChatId) ?? name),
        random: deps.random,
      });
    this.pools = {
      self: pool('self', 'manifestations'),
      partner: pool('partner', 'manifestations_partner'),
    };
  }

  chatIdFor(recipient: Recipient): number | null {
    return recipient === 'self' ? this.deps.config.chatId : this.deps.config.partnerChatId;
  }

  today(recipient: Recipient, now: Date = new Date()): Manifestation | null {
    return this.pools[recipient].pickToday(now);
  }

  /**
   * Sends line `index` of today's manifestation. Never throws: failures are logged and,
   * for the owner, reported to the owner chat.
   */
  async send(recipient: Recipient, index: number, now: Date = new Date()): Promise<boolean> {
    const chatId = this.chatIdFor(recipient);
    try {
      const manifestation = this.today(recipient, now);
      if (!manifestation) {
        throw new Error('No manifestation available.');
      }
      if (index < 0 || index >= manifestation.set.length) {
        throw new RangeError(`Index ${index} out of range for manifestation ${manifestation.id}`);
      }
      if (chatId === null) {
        contentLogger.warn({ recipient }, 'No chat id configured, skipping manifestation');
        return false;
      }

      const text = `${manifestationHeader(recipient, this.deps.config.partnerLabel)}\n\n${manifestation.set[index]}`;
      await sendWithRetry(this.deps.sender, chatId, text, undefined, this.deps.retry);
      this.deps.reflections.record('manifestation', manifestation.id, recipient, null, now);
      contentLogger.info({ recipient, index, id: manifestation.id }, 'Sent manifestation');
      return true;
    } catch (error) {
      contentLogger.error({ recipient, index, error: errorMessage(error) }, 'Failed to send manifestation');
      if (recipient === 'self' && chatId !== null) {
        await this.notifyFailure(chatId);
      }
      return false;
    }
  }

  async sendSet(recipient: Recipient, now: Date = new Date()): Promise<number> {
    let sent = 0;
    for (let index = 0; index < SET_SIZE; index++) {
      if (await this.send(recipient, index, now)) sent++;
    }
    return sent;
  }

  /** Forgets which manifestations were used; returns the removed file names. */
  clearUsed(): string[] {
    return Object.values(this.pools)
      .filter(pool => pool.clearUsed())
      .map(pool => path.basename(pool.usedFile));
  }

  clearToday(): string[] {
    return Object.values(this.pools)
      .filter(pool => pool.clearToday())
      .map(pool => path.basename(pool.todayFile));
  }

  private async notifyFailure(chatId: number): Promise<void> {
    try {
      await this.deps.sender.sendMessage(chatId, '❌ Failed to send manifestation.');
    } catch (error) {
      contentLogger.error({ chatId, error: errorMessage(error) }, 'Could not report manifestation failure');
    }
  }
}
