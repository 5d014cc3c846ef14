/**
 * Requirements addressed:
 * - Persisted graph is one JSON document: version, build-action fingerprint,
 *   node records (digests and output flags included).
 * - A different version fails with AssetGraphVersionError; anything else that
 *   is malformed fails with a plain Error carrying the cause.
 * - Deterministic output: nodes sorted by id, fixed key order per record.
 */

import { z } from 'zod';

import { compareKeys } from '../core/assetId';
import { AssetGraphVersionError } from '../core/errors';
import type { AssetNode } from './nodes';

export const ASSET_GRAPH_VERSION = 1;

const digest = z.string().optional();

const nodeSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('source'),
    id: z.string(),
    lastKnownDigest: digest,
  }),
  z.object({
    kind: z.literal('internal'),
    id: z.string(),
    lastKnownDigest: digest,
  }),
  z.object({
    kind: z.literal('generated'),
    id: z.string(),
    primaryInput: z.string(),
    phase: z.number().int().nonnegative(),
    isHidden: z.boolean(),
    wasOutput: z.boolean(),
    isFailure: z.boolean(),
    needsUpdate: z.boolean(),
    lastKnownDigest: digest,
  }),
  z.object({
    kind: z.literal('builderOptions'),
    id: z.string(),
    lastKnownDigest: digest,
  }),
]);

const graphSchema = z.object({
  version: z.literal(ASSET_GRAPH_VERSION),
  buildActionsDigest: z.string(),
  nodes: z.array(nodeSchema),
});

export type SerializedAssetGraph = z.infer<typeof graphSchema>;

const withDigest = (n: AssetNode) =>
  n.lastKnownDigest === undefined ? {} : { lastKnownDigest: n.lastKnownDigest };

const toRecord = (n: AssetNode): AssetNode => {
  switch (n.kind) {
    case 'generated':
      return {
        kind: 'generated',
        id: n.id,
        primaryInput: n.primaryInput,
        phase: n.phase,
        isHidden: n.isHidden,
        wasOutput: n.wasOutput,
        isFailure: n.isFailure,
        needsUpdate: n.needsUpdate,
        ...withDigest(n),
      };
    case 'source':
      return { kind: 'source', id: n.id, ...withDigest(n) };
    case 'internal':
      return { kind: 'internal', id: n.id, ...withDigest(n) };
    case 'builderOptions':
      return { kind: 'builderOptions', id: n.id, ...withDigest(n) };
    default: {
      const _exhaustive: never = n;
      return _exhaustive;
    }
  }
};

export const encodeAssetGraph = (args: {
  buildActionsDigest: string;
  nodes: Iterable<AssetNode>;
}): string => {
  const nodes = Array.from(args.nodes, toRecord).sort((a, b) =>
    compareKeys(a.id, b.id),
  );
  const doc: SerializedAssetGraph = {
    version: ASSET_GRAPH_VERSION,
    buildActionsDigest: args.buildActionsDigest,
    nodes,
  };
  return JSON.stringify(doc);
};

export const decodeAssetGraph = (text: string): SerializedAssetGraph => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new Error('Failed to parse asset graph JSON', { cause: err });
  }

  const version =
    typeof raw === 'object' && raw !== null && 'version' in raw
      ? raw.version
      : undefined;
  if (version !== ASSET_GRAPH_VERSION) {
    throw new AssetGraphVersionError(version, ASSET_GRAPH_VERSION);
  }

  const parsed = graphSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid asset graph: ${parsed.error.message}`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
};
