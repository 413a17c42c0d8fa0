import * as crypto from 'crypto';
import type {
  JournalEntry,
  JournalEventType,
  JournalVerification,
  LogicalTime
} from '../types';

export const GENESIS_HASH = '0'.repeat(64);

function hashEntry(entry: Omit<JournalEntry, 'hash'>): string {
  const body = JSON.stringify({
    seq: entry.seq,
    type: entry.type,
    at: entry.at,
    payload: entry.payload,
    prevHash: entry.prevHash
  });
  return crypto.createHash('sha256').update(body).digest('hex');
}

/**
 * Append-only, hash-chained record of everything that affects contributor
 * accounting. Each entry commits to its predecessor, so editing or dropping
 * any entry breaks verification from that point on.
 */
export class ContributionJournal {
  private entries: JournalEntry[] = [];

  append(type: JournalEventType, at: LogicalTime, payload: Record<string, unknown>): JournalEntry {
    const prevHash = this.head();
    const partial = { seq: this.entries.length + 1, type, at, payload, prevHash };
    const entry: JournalEntry = { ...partial, hash: hashEntry(partial) };
    this.entries.push(entry);
    return entry;
  }

  head(): string {
    const last = this.entries[this.entries.length - 1];
    return last ? last.hash : GENESIS_HASH;
  }

  get length(): number {
    return this.entries.length;
  }

  list(options: { type?: JournalEventType; since?: number; limit?: number } = {}): JournalEntry[] {
    const since = options.since ?? 0;
    let result = this.entries.filter(
      (entry) => entry.seq > since && (!options.type || entry.type === options.type)
    );
    if (options.limit !== undefined) {
      result = result.slice(0, options.limit);
    }
    return result.map((entry) => ({ ...entry }));
  }

  verify(): JournalVerification {
    return ContributionJournal.verifyEntries(this.entries);
  }

  static verifyEntries(entries: JournalEntry[]): JournalVerification {
    let prevHash = GENESIS_HASH;
    for (let i = 0; i < entries.length; i++) {
      const entry = entries[i];
      if (entry.seq !== i + 1 || entry.prevHash !== prevHash || hashEntry(entry) !== entry.hash) {
        return { valid: false, length: entries.length, head: prevHash, brokenAt: i + 1 };
      }
      prevHash = entry.hash;
    }
    return { valid: true, length: entries.length, head: prevHash };
  }

  snapshot(): JournalEntry[] {
    return this.entries.map((entry) => ({ ...entry }));
  }

  /** Refuses a chain that does not verify. */
  restore(entries: JournalEntry[]): void {
    const verification = ContributionJournal.verifyEntries(entries);
    if (!verification.valid) {
      throw new Error(`Journal chain broken at entry ${verification.brokenAt}`);
    }
    this.entries = entries.map((entry) => ({ ...entry }));
  }
}
