/**
 * Requirements addressed:
 * - Tracks the build configuration: root-package files matching the
 *   build-script patterns plus everything under the entry-point directory.
 * - The tracked set is taken from the graph before changes are applied:
 *   modified or removed configuration is tracked, added configuration is
 *   recognized by pattern.
 */

import picomatch from 'picomatch';

import { compareKeys, parseAssetKey } from '../core/assetId';
import { ENTRY_POINT_DIR } from '../core/constants';
import type { AssetGraph } from '../graph/graph';
import type { BuildOptions } from '../options';
import type { AssetKey, ChangeMap } from '../types';

export class BuildScriptUpdates {
  private readonly tracked: ReadonlySet<AssetKey>;

  private constructor(
    private readonly rootPackage: string,
    private readonly isMatch: (p: string) => boolean,
    readonly trackedIds: AssetKey[],
  ) {
    this.tracked = new Set(trackedIds);
  }

  static create(
    options: Pick<BuildOptions, 'packageGraph' | 'buildScriptPatterns'>,
    graph: AssetGraph,
  ): BuildScriptUpdates {
    const root = options.packageGraph.root.name;
    const pats = options.buildScriptPatterns.filter(Boolean);
    const matchPattern = pats.length
      ? picomatch(pats, { dot: true })
      : () => false;
    const isMatch = (p: string) =>
      p.startsWith(`${ENTRY_POINT_DIR}/`) || matchPattern(p);

    const tracked = graph
      .packageNodes(root)
      .filter((n) => n.kind === 'source' || n.kind === 'internal')
      .map((n) => n.id)
      .filter((id) => isMatch(parseAssetKey(id).path))
      .sort(compareKeys);

    return new BuildScriptUpdates(root, isMatch, tracked);
  }

  /**
   * True when a change touches a tracked asset, or adds a new root-package
   * asset that matches the build-script patterns.
   */
  hasBeenUpdated(updates: ChangeMap): boolean {
    for (const [key, change] of updates) {
      if (this.tracked.has(key)) return true;
      if (change !== 'added') continue;
      const id = parseAssetKey(key);
      if (id.package === this.rootPackage && this.isMatch(id.path)) return true;
    }
    return false;
  }
}
