import { createHash } from 'crypto';
import { SESSION_DEFAULTS } from '../config/search/constants';
import { Logger } from '../types';

interface SessionEntry {
  payload: string;
  createdAt: number;
  lastReadAt: number;
}

export interface SessionStoreOptions {
  maxEntries?: number;
  ttlMs?: number;
  /** Derives the session key from a normalized payload. */
  fingerprint?: (normalized: string) => string;
  now?: () => number;
  log?: Logger;
  name?: string;
}

export function normalizePayload(payload: string): string {
  return payload.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function sha1Fingerprint(normalized: string): string {
  return createHash('sha1').update(normalized, 'utf8').digest('hex').slice(0, SESSION_DEFAULTS.keyLength);
}

/**
 * Short key → payload map backing paginated browsing. Entries expire after
 * `ttlMs` and the least recently used entry is evicted past `maxEntries`.
 *
 * Keys are 32-bit fingerprints: two payloads sharing one overwrite each other
 * and the older session starts paging through the newer payload.
 */
export class SessionStore {
  private readonly entries = new Map<string, SessionEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly fingerprint: (normalized: string) => string;
  private readonly now: () => number;

  constructor(private readonly options: SessionStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? SESSION_DEFAULTS.maxEntries;
    this.ttlMs = options.ttlMs ?? SESSION_DEFAULTS.ttlMs;
    this.fingerprint = options.fingerprint ?? sha1Fingerprint;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  keyFor(payload: string): string {
    return this.fingerprint(normalizePayload(payload));
  }

  put(payload: string): string {
    const key = this.keyFor(payload);
    const ts = this.now();

    const existing = this.entries.get(key);
    if (existing && normalizePayload(existing.payload) !== normalizePayload(payload)) {
      this.options.log?.warn({ store: this.options.name, key }, 'session key collision; replacing entry');
    }

    // Re-insert so iteration order tracks recency.
    this.entries.delete(key);
    this.entries.set(key, { payload, createdAt: ts, lastReadAt: ts });
    this.evictOverflow();
    return key;
  }

  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    const ts = this.now();
    if (this.isExpired(entry, ts)) {
      this.entries.delete(key);
      return undefined;
    }

    entry.lastReadAt = ts;
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.payload;
  }

  /** Drops every expired entry; returns how many were removed. */
  sweep(): number {
    const ts = this.now();
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry, ts)) {
        this.entries.delete(key);
        removed += 1;
      }
    }
    return removed;
  }

  private isExpired(entry: SessionEntry, ts: number): boolean {
    return ts - entry.lastReadAt > this.ttlMs;
  }

  private evictOverflow(): void {
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
