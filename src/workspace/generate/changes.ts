/**
 * Requirements addressed:
 * - Source diff: added (input sources with no valid-input node), removed
 *   (readable nodes, generated only when actually output, absent from every
 *   current population), modified (digest mismatch on previously known
 *   sources and tracked internal sources; nodes never hashed are skipped).
 * - Digest comparisons fan out concurrently and join before returning.
 * - Builder-options diff refreshes each phase's stored digest in place and
 *   reports a mismatch as modified; a missing node fails fast.
 * - Builder-options changes are merged over source changes.
 */

import { builderOptionsIdForPhase } from '../core/constants';
import { MissingGraphNodeError } from '../core/errors';
import { computeBuilderOptionsDigest } from '../graph/digests';
import type { AssetGraph, DeleteAsset } from '../graph/graph';
import { isReadable, isValidInput } from '../graph/nodes';
import type { AssetReader } from '../io/reader';
import type {
  AssetKey,
  BuildAction,
  ChangeMap,
  SourcePopulation,
} from '../types';

export const findSourceUpdates = async (
  graph: AssetGraph,
  sources: SourcePopulation,
  reader: AssetReader,
): Promise<ChangeMap> => {
  const { inputSources, cacheDirSources, internalSources } = sources;
  const updates: ChangeMap = new Map();

  const validInputs = new Set(
    graph.allNodes.filter(isValidInput).map((n) => n.id),
  );
  for (const id of inputSources) {
    if (!validInputs.has(id)) updates.set(id, 'added');
  }

  const present = (id: AssetKey): boolean =>
    inputSources.has(id) || cacheDirSources.has(id) || internalSources.has(id);
  for (const n of graph.allNodes) {
    if (!isReadable(n)) continue;
    if (n.kind === 'generated' && !n.wasOutput) continue;
    if (!present(n.id)) updates.set(n.id, 'removed');
  }

  const candidates = new Set(graph.sources.filter((id) => inputSources.has(id)));
  for (const id of internalSources) {
    if (graph.contains(id)) candidates.add(id);
  }

  const modified = await Promise.all(
    Array.from(candidates, async (id): Promise<AssetKey | undefined> => {
      const node = graph.get(id);
      if (!node) throw new MissingGraphNodeError(id, 'node disappeared');
      const original = node.lastKnownDigest;
      if (original === undefined) return undefined;
      const current = await reader.digest(id);
      return current === original ? undefined : id;
    }),
  );
  for (const id of modified) if (id) updates.set(id, 'modified');

  return updates;
};

export const computeBuilderOptionsUpdates = (
  graph: AssetGraph,
  buildActions: BuildAction[],
): ChangeMap => {
  const result: ChangeMap = new Map();
  buildActions.forEach((action, phase) => {
    const id = builderOptionsIdForPhase(action.package, phase);
    const node = graph.get(id);
    if (!node) {
      throw new MissingGraphNodeError(id, `no node for build phase ${String(phase)}`);
    }
    if (node.kind !== 'builderOptions') {
      throw new MissingGraphNodeError(
        id,
        `expected a builder options node, found ${node.kind}`,
      );
    }
    const oldDigest = node.lastKnownDigest;
    node.lastKnownDigest = computeBuilderOptionsDigest(action.builderOptions);
    if (node.lastKnownDigest !== oldDigest) result.set(id, 'modified');
  });
  return result;
};

/**
 * Computes every change since the graph was persisted, applies it to the
 * graph, and returns the merged change map.
 */
export const updateAssetGraph = async (args: {
  graph: AssetGraph;
  buildActions: BuildAction[];
  sources: SourcePopulation;
  rootPackage: string;
  reader: AssetReader;
  deleteAsset: DeleteAsset;
}): Promise<ChangeMap> => {
  const { graph, buildActions } = args;
  const updates = await findSourceUpdates(graph, args.sources, args.reader);
  for (const [id, change] of computeBuilderOptionsUpdates(graph, buildActions)) {
    updates.set(id, change);
  }
  await graph.updateAndInvalidate(
    buildActions,
    updates,
    args.rootPackage,
    args.deleteAsset,
    args.reader,
  );
  return updates;
};
