/**
 * Requirements addressed:
 * - Tagged node variants; `wasOutput` exists only on generated nodes.
 * - `lastKnownDigest` is optional: absence means the node was never hashed.
 * - Readability and valid-input flags derive from the node kind.
 */

import type { AssetKey } from '../types';

export type SourceAssetNode = {
  kind: 'source';
  id: AssetKey;
  lastKnownDigest?: string;
};

export type InternalAssetNode = {
  kind: 'internal';
  id: AssetKey;
  lastKnownDigest?: string;
};

export type GeneratedAssetNode = {
  kind: 'generated';
  id: AssetKey;
  primaryInput: AssetKey;
  phase: number;
  isHidden: boolean;
  wasOutput: boolean;
  isFailure: boolean;
  needsUpdate: boolean;
  lastKnownDigest?: string;
};

export type BuilderOptionsAssetNode = {
  kind: 'builderOptions';
  id: AssetKey;
  lastKnownDigest?: string;
};

export type AssetNode =
  | SourceAssetNode
  | InternalAssetNode
  | GeneratedAssetNode
  | BuilderOptionsAssetNode;

export type AssetNodeKind = AssetNode['kind'];

export const isReadable = (n: AssetNode): boolean => {
  switch (n.kind) {
    case 'source':
    case 'internal':
    case 'generated':
      return true;
    case 'builderOptions':
      return false;
    default: {
      const _exhaustive: never = n;
      return _exhaustive;
    }
  }
};

export const isValidInput = (n: AssetNode): boolean => {
  switch (n.kind) {
    case 'source':
      return true;
    case 'generated':
      return n.wasOutput && !n.isFailure;
    case 'internal':
    case 'builderOptions':
      return false;
    default: {
      const _exhaustive: never = n;
      return _exhaustive;
    }
  }
};

export const makeSourceNode = (
  id: AssetKey,
  lastKnownDigest?: string,
): SourceAssetNode => ({
  kind: 'source',
  id,
  ...(lastKnownDigest ? { lastKnownDigest } : {}),
});

export const makeInternalNode = (
  id: AssetKey,
  lastKnownDigest?: string,
): InternalAssetNode => ({
  kind: 'internal',
  id,
  ...(lastKnownDigest ? { lastKnownDigest } : {}),
});

export const makeGeneratedNode = (args: {
  id: AssetKey;
  primaryInput: AssetKey;
  phase: number;
  isHidden: boolean;
}): GeneratedAssetNode => ({
  kind: 'generated',
  id: args.id,
  primaryInput: args.primaryInput,
  phase: args.phase,
  isHidden: args.isHidden,
  wasOutput: false,
  isFailure: false,
  needsUpdate: true,
});

export const makeBuilderOptionsNode = (
  id: AssetKey,
  lastKnownDigest: string,
): BuilderOptionsAssetNode => ({
  kind: 'builderOptions',
  id,
  lastKnownDigest,
});
