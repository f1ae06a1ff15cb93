import type { AuthorizationRecord } from '../types';
import type { KeyStore } from './types';

export function parseKeyList(raw: string | undefined): string[] {
  if (!raw) return [];
  return raw
    .split(',')
    .map((key) => key.trim())
    .filter(Boolean);
}

export function findKey(keys: readonly string[], credential: string): AuthorizationRecord | null {
  const index = keys.indexOf(credential);
  return index === -1 ? null : { userId: index + 1 };
}

/**
 * 環境変数 SECRET_KEYS の許可リストを使うキーストア
 */
export class StaticKeyStore implements KeyStore {
  private readonly keys: readonly string[];

  constructor(keys: readonly string[]) {
    this.keys = [...keys];
  }

  async lookup(credential: string): Promise<AuthorizationRecord | null> {
    return findKey(this.keys, credential);
  }
}
