import type { KeyStoreConfig } from '../config';
import type { SecretReader } from '../secrets';
import { CachedKeyStore } from './cached';
import { SecretsManagerKeyStore } from './secrets-manager';
import { StaticKeyStore } from './static';
import type { KeyStore } from './types';

export { CachedKeyStore, type CachedKeyStoreOptions } from './cached';
export { SecretsManagerKeyStore } from './secrets-manager';
export { StaticKeyStore, parseKeyList } from './static';
export type { KeyStore, LookupOptions } from './types';

export function createKeyStore(config: KeyStoreConfig, reader: SecretReader): KeyStore {
  const store: KeyStore =
    config.kind === 'env'
      ? new StaticKeyStore(config.staticKeys)
      : new SecretsManagerKeyStore(reader, config.secretName);

  if (config.cacheTtlMs > 0) {
    return new CachedKeyStore(store, {
      ttlMs: config.cacheTtlMs,
      serveStaleOnError: config.serveStaleOnError,
    });
  }

  return store;
}
