import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { MessageSender, SendExtra } from '../types';

export interface SentMessage {
  chatId: number;
  text: string;
  extra?: SendExtra;
}

/** In-memory stand-in for the Telegram API. */
export class FakeSender implements MessageSender {
  readonly sent: SentMessage[] = [];
  readonly unreachable = new Set<number>();
  failures = 0;

  async sendMessage(chatId: number, text: string, extra?: SendExtra): Promise<{ message_id: number }> {
    if (this.unreachable.has(chatId)) {
      throw new Error(`chat ${chatId} not found`);
    }
    if (this.failures > 0) {
      this.failures--;
      throw new Error('network down');
    }
    this.sent.push(extra === undefined ? { chatId, text } : { chatId, text, extra });
    return { message_id: this.sent.length };
  }
}

export function tempDir(prefix = 'manifest-bot-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function writeJson(dir: string, file: string, value: unknown): string {
  const target = path.join(dir, file);
  fs.writeFileSync(target, JSON.stringify(value), 'utf8');
  return target;
}
