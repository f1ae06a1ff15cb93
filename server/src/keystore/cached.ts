import { log } from '../log';
import type { AuthorizationRecord } from '../types';
import type { KeyStore, LookupOptions } from './types';

interface CacheEntry {
  record: AuthorizationRecord;
  expiresAt: number;
}

export interface CachedKeyStoreOptions {
  ttlMs: number;
  /** ストア障害時に期限切れのエントリを返すか（既定: false） */
  serveStaleOnError?: boolean;
  now?: () => number;
}

/**
 * 有効期限付きのキーキャッシュ
 *
 * 成功した検索結果だけを保持する（未登録キーはキャッシュしない）。
 * 期限切れのエントリは参照時に削除する。
 */
export class CachedKeyStore implements KeyStore {
  private entries: Map<string, CacheEntry> = new Map();
  private readonly ttlMs: number;
  private readonly serveStaleOnError: boolean;
  private readonly now: () => number;

  constructor(
    private readonly inner: KeyStore,
    options: CachedKeyStoreOptions,
  ) {
    this.ttlMs = options.ttlMs;
    this.serveStaleOnError = options.serveStaleOnError ?? false;
    this.now = options.now ?? Date.now;
  }

  async lookup(credential: string, options?: LookupOptions): Promise<AuthorizationRecord | null> {
    const cached = this.entries.get(credential);
    if (cached && cached.expiresAt > this.now()) {
      return cached.record;
    }

    let record: AuthorizationRecord | null;
    try {
      record = await this.inner.lookup(credential, options);
    } catch (error) {
      if (cached && this.serveStaleOnError) {
        log().warn({ err: error }, 'key store lookup failed, serving stale cache entry');
        return cached.record;
      }
      this.entries.delete(credential);
      throw error;
    }

    if (record) {
      this.entries.set(credential, { record, expiresAt: this.now() + this.ttlMs });
    } else {
      this.entries.delete(credential);
    }

    return record;
  }

  get size(): number {
    return this.entries.size;
  }
}
