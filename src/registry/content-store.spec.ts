/**
 * Content-Addressable Store Tests
 */

import { ContentAddressableStore, md5Hex } from './content-store';

describe('ContentAddressableStore', () => {
  const textStore = () =>
    new ContentAddressableStore<string>({ prefix: 'k-', normalize: value => value.trim() });

  it('should key by the first 12 hex chars of the md5 of the normalized value', () => {
    const store = textStore();
    // md5('hello') = 5d41402abc4b2a76b9719d911017c592
    expect(store.keyFor('  hello ')).toBe('k-5d41402abc4b');
  });

  it('should return the existing record for equal content', () => {
    // Arrange
    const store = textStore();
    const create = jest.fn((key: string) => `record:${key}`);

    // Act
    const first = store.putIfAbsent('hello', create);
    const second = store.putIfAbsent('hello  ', create);

    // Assert
    expect(first.created).toBe(true);
    expect(second.created).toBe(false);
    expect(second.record).toBe(first.record);
    expect(create).toHaveBeenCalledTimes(1);
    expect(store.size).toBe(1);
  });

  it('should keep different content under different keys', () => {
    const store = textStore();
    const a = store.putIfAbsent('a', key => key);
    const b = store.putIfAbsent('b', key => key);
    expect(a.key).not.toBe(b.key);
    expect(store.entries().map(([key]) => key)).toEqual([a.key, b.key]);
  });

  it('should honor a custom hash length', () => {
    const store = new ContentAddressableStore<Buffer>({
      prefix: '',
      normalize: bytes => bytes,
      hashLength: 32,
    });
    expect(store.keyFor(Buffer.from('hello'))).toBe(md5Hex('hello'));
  });

  it('should support delete and has', () => {
    const store = textStore();
    const { key } = store.putIfAbsent('x', k => k);
    expect(store.has(key)).toBe(true);
    expect(store.delete(key)).toBe(true);
    expect(store.get(key)).toBeUndefined();
  });
});
