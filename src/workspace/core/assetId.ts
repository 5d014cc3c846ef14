/**
 * Requirements addressed:
 * - AssetKey normalization rules (`package|path`, POSIX separators, no
 *   leading `./`).
 * - Two ids are equal iff both components match exactly.
 */

import type { AssetId, AssetKey } from '../types';

export const toPosixPath = (p: string): string => p.replace(/\\/g, '/');

const stripLeadingDotSlash = (p: string): string =>
  p.startsWith('./') ? p.slice(2) : p;

export const makeAssetId = (pkg: string, p: string): AssetId => ({
  package: pkg,
  path: stripLeadingDotSlash(toPosixPath(p)),
});

export const toAssetKey = (id: AssetId): AssetKey => `${id.package}|${id.path}`;

export const assetKey = (pkg: string, p: string): AssetKey =>
  toAssetKey(makeAssetId(pkg, p));

export const parseAssetKey = (key: AssetKey): AssetId => {
  const sep = key.indexOf('|');
  if (sep <= 0 || sep === key.length - 1) {
    throw new Error(`Invalid asset key (expected "package|path"): ${key}`);
  }
  return makeAssetId(key.slice(0, sep), key.slice(sep + 1));
};

export const packageOf = (key: AssetKey): string => parseAssetKey(key).package;

/** Code-unit order, independent of the runtime locale. */
export const compareKeys = (a: AssetKey, b: AssetKey): number =>
  a < b ? -1 : a > b ? 1 : 0;
