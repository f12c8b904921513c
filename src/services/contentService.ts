import * as fs from 'fs';
import { z } from 'zod';
import { ContentError } from '../errors';
import { contentLogger } from '../logger';
import { CardSchema, ManifestationSchema, ReminderSchema, describeIssue } from '../schemas';
import type { Card, Manifestation, Reminder } from '../types';

function readJson(file: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(file, 'utf8');
  } catch (error) {
    contentLogger.error({ file, error }, 'Failed to read content file');
    throw new ContentError('Content file is missing or unreadable', file);
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new ContentError('Content file is not valid JSON', file);
  }
}

function loadList<S extends z.ZodTypeAny>(file: string, schema: S): Array<z.output<S>> {
  const result = z.array(schema).safeParse(readJson(file));
  if (!result.success) {
    throw new ContentError(`Invalid content at ${describeIssue(result.error)}`, file);
  }
  return result.data;
}

export function loadManifestations(file: string): Manifestation[] {
  return loadList(file, ManifestationSchema);
}

export function loadCards(file: string): Card[] {
  return loadList(file, CardSchema);
}

export function loadReminders(file: string): Reminder[] {
  return loadList(file, ReminderSchema);
}
