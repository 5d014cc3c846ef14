import {
  assetKey,
  compareKeys,
  makeAssetId,
  parseAssetKey,
  toAssetKey,
} from './assetId';

describe('asset keys', () => {
  test('normalizes separators and a leading ./', () => {
    expect(assetKey('app', './lib\\a.ts')).toBe('app|lib/a.ts');
  });

  test('round-trips ids through keys', () => {
    const id = makeAssetId('app', 'lib/a.ts');
    expect(parseAssetKey(toAssetKey(id))).toEqual(id);
  });

  test('splits on the first separator only', () => {
    expect(parseAssetKey('app|lib/a|b.ts')).toEqual({
      package: 'app',
      path: 'lib/a|b.ts',
    });
  });

  test('rejects keys without a package or path', () => {
    expect(() => parseAssetKey('lib/a.ts')).toThrow(/Invalid asset key/);
    expect(() => parseAssetKey('|lib/a.ts')).toThrow(/Invalid asset key/);
    expect(() => parseAssetKey('app|')).toThrow(/Invalid asset key/);
  });

  test('compares keys by code unit', () => {
    expect(['app|b.ts', 'app|B.ts', 'app|.x', 'app|a.ts'].sort(compareKeys)).toEqual(
      ['app|.x', 'app|B.ts', 'app|a.ts', 'app|b.ts'],
    );
  });
});
