/**
 * Requirements addressed:
 * - Return the persisted graph, or the reason there is none; ordinary
 *   absence or corruption never throws.
 * - Version mismatch discards the generated-output area.
 * - A graph built for different build actions is discarded whole; the caller
 *   also discards generated output in that case.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import { assetKey } from '../core/assetId';
import { ASSET_GRAPH_PATH, GENERATED_OUTPUT_DIRECTORY } from '../core/constants';
import { AssetGraphVersionError } from '../core/errors';
import { logTimedAsync } from '../core/logger';
import { computeBuildActionsDigest } from '../graph/digests';
import { AssetGraph } from '../graph/graph';
import type { BuildOptions } from '../options';
import type { BuildAction } from '../types';

export type CachedGraphMissReason =
  | 'absent'
  | 'versionMismatch'
  | 'buildActionsChanged'
  | 'unreadable';

export type CachedGraphResult =
  | { kind: 'loaded'; graph: AssetGraph }
  | { kind: 'missing'; reason: CachedGraphMissReason };

const miss = (reason: CachedGraphMissReason): CachedGraphResult => ({
  kind: 'missing',
  reason,
});

/** Deletes the generated output directory, whenever a graph is thrown away. */
export const deleteGeneratedDir = async (
  options: Pick<BuildOptions, 'packageGraph'>,
): Promise<void> => {
  await fs.rm(
    path.join(options.packageGraph.root.path, GENERATED_OUTPUT_DIRECTORY),
    { recursive: true, force: true },
  );
};

export const tryReadCachedAssetGraph = async (
  options: Pick<BuildOptions, 'packageGraph' | 'reader' | 'logger'>,
  buildActions: BuildAction[],
): Promise<CachedGraphResult> => {
  const { logger, reader } = options;
  const graphId = assetKey(options.packageGraph.root.name, ASSET_GRAPH_PATH);
  if (!(await reader.canRead(graphId))) return miss('absent');

  return logTimedAsync(
    logger,
    'Reading cached asset graph',
    async (): Promise<CachedGraphResult> => {
      try {
        const text = await reader.readAsString(graphId);
        const cached = AssetGraph.deserialize(text);
        if (
          computeBuildActionsDigest(buildActions) !== cached.buildActionsDigest
        ) {
          logger.warn(
            'Throwing away cached asset graph because the build actions have ' +
              'changed. This can happen after adding a dependency, or when ' +
              'the build configuration depends on command line flags.',
          );
          return miss('buildActionsChanged');
        }
        return { kind: 'loaded', graph: cached };
      } catch (err) {
        if (err instanceof AssetGraphVersionError) {
          logger.warn(
            'Throwing away cached asset graph due to version mismatch.',
          );
          await deleteGeneratedDir(options);
          return miss('versionMismatch');
        }
        const msg = err instanceof Error ? err.message : String(err);
        logger.warn(`Throwing away unreadable cached asset graph: ${msg}`);
        return miss('unreadable');
      }
    },
  );
};
