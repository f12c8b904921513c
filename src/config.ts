import * as os from 'os';
import * as path from 'path';
import { DateTime } from 'luxon';
import { ConfigError } from './errors';

export interface AppConfig {
  botToken: string;
  chatId: number | null;
  partnerChatId: number | null;
  partnerLabel: string;
  timezone: string;
  dataDir: string;
  dbPath: string;
  contentDir: string;
  remindersEnabled: boolean;
}

export const DEFAULT_TIMEZONE = 'Asia/Kolkata';

type Env = Record<string, string | undefined>;

function read(env: Env, ...names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

/**
 * Parses a chat id the way it tends to show up in hand-edited .env files:
 * surrounding whitespace and quotes are dropped, negative (group) ids are allowed.
 */
export function parseChatId(raw: string | undefined, name = 'chat id'): number | null {
  if (!raw) return null;
  let value = raw.trim();
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    value = value.slice(1, -1).trim();
  }
  if (!value) return null;
  if (!/^-?\d+$/.test(value)) {
    throw new ConfigError(`${name} must be an integer, got "${raw}"`);
  }
  return Number(value);
}

function expandHome(p: string): string {
  return p === '~' || p.startsWith('~/') ? path.join(os.homedir(), p.slice(1)) : p;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const botToken = read(env, 'TELEGRAM_BOT_TOKEN', 'BOT_TOKEN');
  if (!botToken) {
    throw new ConfigError('TELEGRAM_BOT_TOKEN is not set');
  }

  const timezone = read(env, 'BOT_TIMEZONE') ?? DEFAULT_TIMEZONE;
  if (!DateTime.now().setZone(timezone).isValid) {
    throw new ConfigError(`Unknown time zone "${timezone}"`);
  }

  const dataDir = path.resolve(expandHome(read(env, 'DATA_DIR') ?? path.join(os.homedir(), '.manifest-bot')));

  return {
    botToken,
    chatId: parseChatId(read(env, 'CHAT_ID'), 'CHAT_ID'),
    partnerChatId: parseChatId(read(env, 'CHAT_ID_PARTNER', 'CHAT_ID_HER'), 'CHAT_ID_PARTNER'),
    partnerLabel: read(env, 'PARTNER_LABEL') ?? 'Her',
    timezone,
    dataDir,
    dbPath: path.resolve(expandHome(read(env, 'DB_PATH') ?? path.join(dataDir, 'manifest-bot.db'))),
    contentDir: path.resolve(expandHome(read(env, 'CONTENT_DIR') ?? path.join(__dirname, '../data'))),
    remindersEnabled: read(env, 'REMINDERS_ENABLED')?.toLowerCase() === 'true',
  };
}
