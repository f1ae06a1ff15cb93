import type { AuthorizationRecord } from '../types';

export interface LookupOptions {
  signal?: AbortSignal;
}

/**
 * API キーから認可情報を引く。未登録なら null。
 * ストアに到達できない場合は reject する。
 */
export interface KeyStore {
  lookup(credential: string, options?: LookupOptions): Promise<AuthorizationRecord | null>;
}
