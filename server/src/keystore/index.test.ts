import { describe, expect, it } from 'vitest';
import { FakeSecretReader } from '../__tests__/helpers/fakes';
import type { KeyStoreConfig } from '../config';
import { CachedKeyStore, SecretsManagerKeyStore, StaticKeyStore, createKeyStore } from './index';

const baseConfig: KeyStoreConfig = {
  kind: 'secrets-manager',
  secretName: 'token-server',
  staticKeys: ['abc123'],
  timeoutMs: 3000,
  cacheTtlMs: 0,
  serveStaleOnError: false,
};

describe('createKeyStore', () => {
  it('should read keys from Secrets Manager by default', () => {
    expect(createKeyStore(baseConfig, new FakeSecretReader())).toBeInstanceOf(SecretsManagerKeyStore);
  });

  it('should use the static list for the env store', async () => {
    const store = createKeyStore({ ...baseConfig, kind: 'env' }, new FakeSecretReader());

    expect(store).toBeInstanceOf(StaticKeyStore);
    await expect(store.lookup('abc123')).resolves.toEqual({ userId: 1 });
  });

  it('should wrap the store in a cache when a TTL is set', () => {
    const store = createKeyStore({ ...baseConfig, cacheTtlMs: 30_000 }, new FakeSecretReader());
    expect(store).toBeInstanceOf(CachedKeyStore);
  });
});
