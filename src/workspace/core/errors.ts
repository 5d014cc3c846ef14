/**
 * Requirements addressed:
 * - Fatal conditions report which identifiers are implicated.
 * - Configuration errors name the offending build action.
 * - Version mismatch is distinguishable from a generic parse failure.
 */

import type { AssetKey, BuildAction } from '../types';
import { compareKeys } from './assetId';

const PREVIEW_LIMIT = 10;

/**
 * Sorted, comma-separated preview of at most ten keys, with ` ...` appended
 * when truncated.
 */
export const previewKeys = (keys: Iterable<AssetKey>): string => {
  const ids = Array.from(keys).sort(compareKeys);
  const preview = ids.slice(0, PREVIEW_LIMIT).join(', ');
  return `${preview}${ids.length > PREVIEW_LIMIT ? ' ...' : ''}`;
};

export class InvalidBuildActionError extends Error {
  readonly action: BuildAction;

  private constructor(action: BuildAction, message: string) {
    super(message);
    this.name = 'InvalidBuildActionError';
    this.action = action;
  }

  static nonRootPackage(
    action: BuildAction,
    rootPackage: string,
  ): InvalidBuildActionError {
    return new InvalidBuildActionError(
      action,
      `Build action ${action.builderKey} on package ${action.package} writes visible outputs, ` +
        `but only the root package (${rootPackage}) may have visible outputs. ` +
        'Set hideOutput for actions on dependency packages.',
    );
  }
}

export class UnexpectedExistingOutputsError extends Error {
  readonly conflictingOutputs: ReadonlySet<AssetKey>;

  constructor(conflictingOutputs: Iterable<AssetKey>) {
    const ids = new Set(conflictingOutputs);
    super(
      `Found ${String(ids.size)} declared outputs which already exist on disk: ${previewKeys(ids)}`,
    );
    this.name = 'UnexpectedExistingOutputsError';
    this.conflictingOutputs = ids;
  }
}

export class AssetGraphVersionError extends Error {
  readonly found: unknown;
  readonly expected: number;

  constructor(found: unknown, expected: number) {
    super(
      `Asset graph version mismatch: found ${String(found)}, expected ${String(expected)}`,
    );
    this.name = 'AssetGraphVersionError';
    this.found = found;
    this.expected = expected;
  }
}

export class MissingGraphNodeError extends Error {
  readonly id: AssetKey;

  constructor(id: AssetKey, detail: string) {
    super(`Asset graph has no usable node for ${id}: ${detail}`);
    this.name = 'MissingGraphNodeError';
    this.id = id;
  }
}
