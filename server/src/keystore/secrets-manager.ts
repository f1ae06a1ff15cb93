import { KeyStoreError } from '../errors';
import type { SecretReader } from '../secrets';
import type { AuthorizationRecord } from '../types';
import { findKey, parseKeyList } from './static';
import type { KeyStore, LookupOptions } from './types';

/**
 * Secrets Manager のシークレット（SECRET_KEYS フィールド）を許可リストとして使う
 *
 * 毎回シークレットを読み直すので、キーの追加・削除はすぐに反映される。
 */
export class SecretsManagerKeyStore implements KeyStore {
  constructor(
    private readonly reader: SecretReader,
    private readonly secretName: string,
  ) {}

  async lookup(credential: string, { signal }: LookupOptions = {}): Promise<AuthorizationRecord | null> {
    const secret = await this.reader.read(this.secretName, { signal });
    const raw = secret.SECRET_KEYS;

    if (typeof raw !== 'string') {
      throw new KeyStoreError(`Secret '${this.secretName}' has no SECRET_KEYS string`);
    }

    return findKey(parseKeyList(raw), credential);
  }
}
