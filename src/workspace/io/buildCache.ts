/**
 * Requirements addressed:
 * - Hidden generated outputs live in the flat cache namespace
 *   `<generated dir>/<package>/<path>` of the root package; reads and writes
 *   for them are redirected there, everything else passes through.
 * - Adapters are keyed by (graph, root package name).
 */

import { assetKey, parseAssetKey } from '../core/assetId';
import { GENERATED_OUTPUT_DIRECTORY } from '../core/constants';
import type { AssetGraph } from '../graph/graph';
import type { AssetKey } from '../types';
import type { AssetReader } from './reader';
import type { AssetWriter } from './writer';

export const cacheLocation = (
  id: AssetKey,
  graph: AssetGraph,
  rootPackage: string,
): AssetKey => {
  const node = graph.get(id);
  if (node?.kind !== 'generated' || !node.isHidden) return id;
  const { package: pkg, path } = parseAssetKey(id);
  return assetKey(rootPackage, `${GENERATED_OUTPUT_DIRECTORY}/${pkg}/${path}`);
};

export const createBuildCacheReader = (
  delegate: AssetReader,
  graph: AssetGraph,
  rootPackage: string,
): AssetReader => {
  const loc = (id: AssetKey) => cacheLocation(id, graph, rootPackage);
  return {
    canRead: (id) => delegate.canRead(loc(id)),
    readAsBytes: (id) => delegate.readAsBytes(loc(id)),
    readAsString: (id) => delegate.readAsString(loc(id)),
    digest: (id) => delegate.digest(loc(id)),
    findAssets: (glob, opts) => delegate.findAssets(glob, opts),
  };
};

export const createBuildCacheWriter = (
  delegate: AssetWriter,
  graph: AssetGraph,
  rootPackage: string,
): AssetWriter => {
  const loc = (id: AssetKey) => cacheLocation(id, graph, rootPackage);
  return {
    writeAsBytes: (id, bytes) => delegate.writeAsBytes(loc(id), bytes),
    writeAsString: (id, contents) => delegate.writeAsString(loc(id), contents),
    delete: (id) => delegate.delete(loc(id)),
  };
};
