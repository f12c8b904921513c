import { setTimeout as sleep } from 'timers/promises';
import { botLogger } from '../logger';
import { errorMessage } from '../errors';
import type { MessageSender, Recipient, SendExtra } from '../types';

export interface RetryOptions {
  attempts?: number;
  delayMs?: number;
}

export interface RecipientChat {
  recipient: Recipient;
  chatId: number;
}

/**
 * Sends a message, retrying a bounded number of times with a fixed delay.
 * The last error is rethrown so the caller decides how loud to be about it.
 */
export async function sendWithRetry(
  sender: MessageSender,
  chatId: number,
  text: string,
  extra?: SendExtra,
  { attempts = 3, delayMs = 1000 }: RetryOptions = {}
): Promise<void> {
  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      await sender.sendMessage(chatId, text, extra);
      return;
    } catch (error) {
      lastError = error;
      botLogger.warn({ chatId, attempt, attempts, error: errorMessage(error) }, 'sendMessage failed');
      if (attempt < attempts && delayMs > 0) {
        await sleep(delayMs);
      }
    }
  }
  throw lastError;
}

export function configuredRecipients(chats: { chatId: number | null; partnerChatId: number | null }): RecipientChat[] {
  const recipients: RecipientChat[] = [];
  if (chats.chatId !== null) recipients.push({ recipient: 'self', chatId: chats.chatId });
  if (chats.partnerChatId !== null) recipients.push({ recipient: 'partner', chatId: chats.partnerChatId });
  return recipients;
}
