import * as fs from 'fs';
import * as path from 'path';
import { createHash } from 'crypto';
import { DateTime } from 'luxon';
import { PersistenceError, errorMessage } from '../errors';
import { contentLogger } from '../logger';
import { TodayStateSchema, UsedIdsSchema, describeIssue } from '../schemas';
import type { TodayState } from '../types';

export interface RotationOptions<T> {
  /** Pool name, used for state file names and log lines */
  pool: string;
  dataDir: string;
  timezone: string;
  load: () => T[];
  idOf: (item: T) => number | string;
  /** Mixed into the deterministic fallback so two pools don't land on the same index */
  salt?: string;
  random?: () => number;
}

export function localDate(now: Date, timezone: string): string {
  return DateTime.fromJSDate(now).setZone(timezone).toISODate() ?? now.toISOString().slice(0, 10);
}

/**
 * Stable per-day pick: first 8 bytes of sha256("<date>|<salt>") read big-endian, modulo the pool size.
 */
export function deterministicIndex(date: string, salt: string, size: number): number {
  if (size <= 0) {
    throw new RangeError('Cannot pick from an empty pool');
  }
  const digest = createHash('sha256').update(`${date}|${salt}`, 'utf8').digest();
  return Number(digest.readBigUInt64BE(0) % BigInt(size));
}

export function writeJsonAtomic(file: string, value: unknown): void {
  const tmp = `${file}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(value, null, 2), 'utf8');
  fs.renameSync(tmp, file);
}

function readJson(file: string): unknown {
  if (!fs.existsSync(file)) return undefined;
  return JSON.parse(fs.readFileSync(file, 'utf8'));
}

function sameId(a: number | string, b: number | string): boolean {
  return String(a) === String(b);
}

/**
 * Picks one item per calendar day from a finite pool without repeating until the pool is
 * exhausted. Today's pick and the used ids survive restarts through two JSON files.
 *
 * Everything here is synchronous: two sends scheduled in the same tick read the same state.
 */
export class RotationService<T> {
  readonly usedFile: string;
  readonly todayFile: string;
  private cached: { date: string; item: T } | null = null;
  private readonly random: () => number;

  constructor(private readonly options: RotationOptions<T>) {
    this.usedFile = path.join(options.dataDir, `used_${options.pool}.json`);
    this.todayFile = path.join(options.dataDir, `today_${options.pool}.json`);
    this.random = options.random ?? Math.random;
  }

  pickToday(now: Date = new Date()): T | null {
    const { pool, idOf } = this.options;
    const today = localDate(now, this.options.timezone);
    if (this.cached?.date === today) {
      return this.cached.item;
    }

    let items: T[];
    try {
      items = this.options.load();
    } catch (error) {
      contentLogger.error({ pool, error: errorMessage(error) }, 'Failed to load pool');
      return null;
    }
    if (items.length === 0) {
      contentLogger.error({ pool }, 'Pool is empty');
      return null;
    }

    const state = this.loadTodayState();
    if (state?.date === today) {
      const persisted = items.find(item => sameId(idOf(item), state.id));
      if (persisted) {
        contentLogger.info({ pool, id: state.id }, 'Reusing persisted pick for today');
        return this.remember(today, persisted);
      }
      contentLogger.warn({ pool, id: state.id }, 'Persisted pick is no longer in the pool');
    }

    let chosen = this.pickUnused(items);
    try {
      this.saveTodayState({ date: today, id: idOf(chosen) });
      contentLogger.info({ pool, id: idOf(chosen), date: today }, 'Picked new item for today');
    } catch (error) {
      chosen = items[deterministicIndex(today, this.options.salt ?? pool, items.length)];
      contentLogger.warn(
        { pool, id: idOf(chosen), error: errorMessage(error) },
        'Today state not writable, using deterministic pick'
      );
    }

    try {
      this.markUsed(chosen, items);
    } catch (error) {
      contentLogger.warn({ pool, id: idOf(chosen), error: errorMessage(error) }, 'Used ids not writable');
    }
    return this.remember(today, chosen);
  }

  clearUsed(): boolean {
    return this.remove(this.usedFile);
  }

  clearToday(): boolean {
    this.cached = null;
    return this.remove(this.todayFile);
  }

  loadUsedIds(): Set<string> {
    const result = UsedIdsSchema.safeParse(this.readState(this.usedFile) ?? []);
    if (!result.success) {
      contentLogger.warn({ pool: this.options.pool, issue: describeIssue(result.error) }, 'Ignoring malformed used ids');
      return new Set();
    }
    return new Set(result.data.map(String));
  }

  loadTodayState(): TodayState | null {
    const raw = this.readState(this.todayFile);
    if (raw === undefined) return null;
    const result = TodayStateSchema.safeParse(raw);
    if (!result.success) {
      contentLogger.warn({ pool: this.options.pool, issue: describeIssue(result.error) }, 'Ignoring malformed today state');
      return null;
    }
    return result.data;
  }

  private pickUnused(items: T[]): T {
    const used = this.loadUsedIds();
    let candidates = items.filter(item => !used.has(String(this.options.idOf(item))));
    if (candidates.length === 0) {
      contentLogger.info({ pool: this.options.pool }, 'Pool exhausted, resetting used ids');
      candidates = items;
    }
    return candidates[Math.min(Math.floor(this.random() * candidates.length), candidates.length - 1)];
  }

  /** Adds the delivered item to the used set, starting a new cycle once every id was used. */
  private markUsed(item: T, items: T[]): void {
    const used = this.loadUsedIds();
    if (items.every(candidate => used.has(String(this.options.idOf(candidate))))) {
      used.clear();
    }
    used.add(String(this.options.idOf(item)));
    this.saveUsedIds(used, items);
  }

  /** Parsed JSON of a state file; undefined when absent or unreadable. */
  private readState(file: string): unknown {
    try {
      return readJson(file);
    } catch (error) {
      contentLogger.warn({ pool: this.options.pool, file, error: errorMessage(error) }, 'Failed to read rotation state');
      return undefined;
    }
  }

  private saveUsedIds(used: Set<string>, items: T[]): void {
    // keep the ids' original JSON type
    const ids = items.map(this.options.idOf).filter(id => used.has(String(id)));
    const sorted = [...ids].sort((a, b) =>
      typeof a === 'number' && typeof b === 'number' ? a - b : String(a).localeCompare(String(b))
    );
    this.write(this.usedFile, sorted);
  }

  private saveTodayState(state: TodayState): void {
    this.write(this.todayFile, state);
  }

  private write(file: string, value: unknown): void {
    try {
      fs.mkdirSync(path.dirname(file), { recursive: true });
      writeJsonAtomic(file, value);
    } catch (error) {
      throw new PersistenceError(`Could not write ${file}`, error);
    }
  }

  private remove(file: string): boolean {
    if (!fs.existsSync(file)) return false;
    fs.unlinkSync(file);
    return true;
  }

  private remember(date: string, item: T): T {
    this.cached = { date, item };
    return item;
  }
}
