import { describe, expect, it } from 'vitest';
import { StaticKeyStore, findKey, parseKeyList } from './static';

describe('parseKeyList', () => {
  it('should split, trim and drop empty entries', () => {
    expect(parseKeyList(' key-a, key-b ,,key-c ')).toEqual(['key-a', 'key-b', 'key-c']);
  });

  it('should return an empty list for missing input', () => {
    expect(parseKeyList(undefined)).toEqual([]);
    expect(parseKeyList('')).toEqual([]);
  });
});

describe('findKey', () => {
  it('should return the 1-based position as userId', () => {
    expect(findKey(['key-a', 'key-b'], 'key-b')).toEqual({ userId: 2 });
  });

  it('should compare keys verbatim', () => {
    expect(findKey(['key-a'], 'KEY-A')).toBeNull();
    expect(findKey(['key-a'], ' key-a')).toBeNull();
  });
});

describe('StaticKeyStore', () => {
  it('should resolve registered keys and reject unknown ones', async () => {
    const store = new StaticKeyStore(['abc123', 'def456']);

    await expect(store.lookup('abc123')).resolves.toEqual({ userId: 1 });
    await expect(store.lookup('def456')).resolves.toEqual({ userId: 2 });
    await expect(store.lookup('nope')).resolves.toBeNull();
  });

  it('should not be affected by later changes to the source list', async () => {
    const keys = ['abc123'];
    const store = new StaticKeyStore(keys);
    keys.length = 0;

    await expect(store.lookup('abc123')).resolves.toEqual({ userId: 1 });
  });
});
