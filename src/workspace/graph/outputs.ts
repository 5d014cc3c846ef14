import picomatch from 'picomatch';

import { assetKey, parseAssetKey } from '../core/assetId';
import type { AssetKey, BuildAction } from '../types';

const matchers = new WeakMap<BuildAction, (p: string) => boolean>();

const inputMatcher = (action: BuildAction): ((p: string) => boolean) => {
  const cached = matchers.get(action);
  if (cached) return cached;
  const pats = (action.inputs ?? []).filter(Boolean);
  const isMatch = pats.length ? picomatch(pats, { dot: true }) : () => true;
  matchers.set(action, isMatch);
  return isMatch;
};

/**
 * Outputs `action` declares for `input`: the input must live in the action's
 * package, match its input globs, and end with one of its build extensions.
 */
export const expectedOutputs = (
  action: BuildAction,
  input: AssetKey,
): AssetKey[] => {
  const id = parseAssetKey(input);
  if (id.package !== action.package) return [];
  if (!inputMatcher(action)(id.path)) return [];

  const out: AssetKey[] = [];
  const extensions = Object.keys(action.buildExtensions).sort();
  for (const ext of extensions) {
    if (!id.path.endsWith(ext)) continue;
    const stem = id.path.slice(0, id.path.length - ext.length);
    for (const outExt of action.buildExtensions[ext] ?? []) {
      out.push(assetKey(id.package, `${stem}${outExt}`));
    }
  }
  return out;
};
