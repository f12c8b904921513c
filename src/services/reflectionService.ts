import type { Db } from './database';
import type { Recipient, ReflectionType } from '../types';

export interface ReflectionArtifact {
  id: number;
  timestamp: string;
  type: ReflectionType;
  payloadId: string;
  recipient: Recipient;
  ack: string | null;
}

interface ArtifactRow {
  id: number;
  timestamp: string;
  type: string;
  payload_id: string;
  recipient: string;
  ack: string | null;
}

/**
 * Append-only log of reflective content delivered to each recipient.
 */
export class ReflectionLog {
  constructor(private readonly db: Db) {}

  record(type: ReflectionType, payloadId: string | number, recipient: Recipient, ack: string | null = null, now: Date = new Date()): void {
    this.db
      .prepare('INSERT INTO reflection_artifacts (timestamp, type, payload_id, recipient, ack) VALUES (?, ?, ?, ?, ?)')
      .run(now.toISOString(), type, String(payloadId), recipient, ack);
  }

  list(limit = 20): ReflectionArtifact[] {
    return this.db
      .prepare<[number], ArtifactRow>('SELECT * FROM reflection_artifacts ORDER BY id DESC LIMIT ?')
      .all(limit)
      .map(row => ({
        id: row.id,
        timestamp: row.timestamp,
        type: row.type === 'card' ? 'card' : 'manifestation',
        payloadId: row.payload_id,
        recipient: row.recipient === 'partner' ? 'partner' : 'self',
        ack: row.ack,
      }));
  }
}
