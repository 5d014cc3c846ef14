/**
 * Requirements addressed:
 * - Validate build actions before any I/O: only root-package actions may have
 *   visible outputs.
 * - Enumerate sources, load the cached graph, diff and apply updates; discard
 *   everything when the build configuration changed (unless the check is
 *   skipped) or the cached graph is unusable.
 * - Without a usable graph: build a fresh one, fail on pre-existing outputs in
 *   dependency packages, resolve root-package conflicts by policy.
 * - Return the graph with cache-aware reader/writer and a resource manager.
 * - onDelete is notified once per asset this module deletes.
 */

import { packageOf } from '../core/assetId';
import { InvalidBuildActionError, UnexpectedExistingOutputsError } from '../core/errors';
import { logTimedAsync } from '../core/logger';
import { ResourceManager } from '../core/resources';
import { BuildScriptUpdates } from '../changes/buildScriptUpdates';
import { AssetGraph } from '../graph/graph';
import { createBuildCacheReader, createBuildCacheWriter } from '../io/buildCache';
import type { AssetReader } from '../io/reader';
import type { AssetWriter } from '../io/writer';
import {
  type BuildOptions,
  type BuildOptionsInput,
  resolveBuildOptions,
} from '../options';
import type {
  AssetKey,
  BuildAction,
  ChangeMap,
  OnDelete,
  PackageGraph,
  SourcePopulation,
} from '../types';
import { deleteGeneratedDir, tryReadCachedAssetGraph } from './cachedGraph';
import { updateAssetGraph } from './changes';
import { initialBuildCleanup } from './conflicts';
import { findAllSources } from './sources';

export type BuildDefinition = {
  assetGraph: AssetGraph;
  reader: AssetReader;
  writer: AssetWriter;
  packageGraph: PackageGraph;
  deleteFilesByDefault: boolean;
  resourceManager: ResourceManager;
  buildScriptUpdates: BuildScriptUpdates;
  enableLowResourcesMode: boolean;
  onDelete?: OnDelete;
  /** Changes applied to the cached graph; undefined when built fresh. */
  updates?: ChangeMap;
};

export const checkBuildActions = (
  buildActions: BuildAction[],
  rootPackage: string,
): void => {
  for (const action of buildActions) {
    if (!action.hideOutput && action.package !== rootPackage) {
      throw InvalidBuildActionError.nonRootPackage(action, rootPackage);
    }
  }
};

/**
 * Declared outputs that already exist as input sources, split into the root
 * package's (resolvable) and dependency packages' (always fatal).
 */
export const findConflictingOutputs = (
  graph: AssetGraph,
  inputSources: ReadonlySet<AssetKey>,
  rootPackage: string,
): { conflictingOutputs: Set<AssetKey>; conflictsInDeps: Set<AssetKey> } => {
  const conflictingOutputs = new Set<AssetKey>();
  const conflictsInDeps = new Set<AssetKey>();
  for (const id of graph.outputs) {
    if (!inputSources.has(id)) continue;
    if (packageOf(id) === rootPackage) conflictingOutputs.add(id);
    else conflictsInDeps.add(id);
  }
  return { conflictingOutputs, conflictsInDeps };
};

class Loader {
  private readonly rootPackage: string;

  constructor(
    private readonly options: BuildOptions,
    private readonly buildActions: BuildAction[],
    private readonly onDelete: OnDelete | undefined,
  ) {
    this.rootPackage = options.packageGraph.root.name;
  }

  async prepareWorkspace(): Promise<BuildDefinition> {
    const { options, buildActions } = this;
    const { logger } = options;
    checkBuildActions(buildActions, this.rootPackage);

    logger.info('Initializing inputs');
    const sources = await findAllSources(options.reader, options.packageGraph);

    const cached = await tryReadCachedAssetGraph(options, buildActions);
    if (cached.kind === 'missing' && cached.reason === 'buildActionsChanged') {
      await deleteGeneratedDir(options);
    }

    let reused: { graph: AssetGraph; updates: ChangeMap } | undefined;
    if (cached.kind === 'loaded') {
      reused = await this.reuseCachedGraph(cached.graph, sources);
    }

    const assetGraph = reused?.graph ?? (await this.buildFreshGraph(sources));

    return {
      assetGraph,
      reader: this.wrapReader(assetGraph),
      writer: this.wrapWriter(assetGraph),
      packageGraph: options.packageGraph,
      deleteFilesByDefault: options.deleteFilesByDefault,
      resourceManager: new ResourceManager(),
      buildScriptUpdates: BuildScriptUpdates.create(options, assetGraph),
      enableLowResourcesMode: options.enableLowResourcesMode,
      ...(this.onDelete ? { onDelete: this.onDelete } : {}),
      ...(reused ? { updates: reused.updates } : {}),
    };
  }

  /**
   * Applies changes since the last build to `graph`. Returns undefined when
   * the build configuration itself changed and the graph was thrown away.
   */
  private async reuseCachedGraph(
    graph: AssetGraph,
    sources: SourcePopulation,
  ): Promise<{ graph: AssetGraph; updates: ChangeMap } | undefined> {
    const { options } = this;
    const buildScriptUpdates = BuildScriptUpdates.create(options, graph);
    const updates = await logTimedAsync(
      options.logger,
      'Checking for updates since last build',
      () =>
        updateAssetGraph({
          graph,
          buildActions: this.buildActions,
          sources,
          rootPackage: this.rootPackage,
          reader: this.wrapReader(graph),
          deleteAsset: (id) => this.delete(id, this.wrapWriter(graph)),
        }),
    );

    if (options.skipBuildScriptCheck) return { graph, updates };

    if (!buildScriptUpdates.hasBeenUpdated(updates)) {
      return { graph, updates };
    }

    options.logger.warn('Invalidating asset graph due to build script update');
    await deleteGeneratedDir(options);
    return undefined;
  }

  private async buildFreshGraph(sources: SourcePopulation): Promise<AssetGraph> {
    const { options } = this;

    const { graph, conflictingOutputs } = await logTimedAsync(
      options.logger,
      'Building new asset graph',
      async () => {
        const built = await AssetGraph.build(
          this.buildActions,
          sources.inputSources,
          sources.internalSources,
          options.packageGraph,
          options.reader,
        );
        const conflicts = findConflictingOutputs(
          built,
          sources.inputSources,
          this.rootPackage,
        );
        if (conflicts.conflictsInDeps.size) {
          throw new UnexpectedExistingOutputsError(conflicts.conflictsInDeps);
        }
        return { graph: built, conflictingOutputs: conflicts.conflictingOutputs };
      },
    );

    // Conflicts live at their package location, not in the cache directory.
    const writer = options.writer;
    await logTimedAsync(
      options.logger,
      'Checking for unexpected pre-existing outputs',
      () =>
        initialBuildCleanup(conflictingOutputs, {
          deleteAsset: (id) => this.delete(id, writer),
          logger: options.logger,
          deleteFilesByDefault: options.deleteFilesByDefault,
          assumeTty: options.assumeTty,
          isInteractive: options.isInteractive,
          input: options.input,
          output: options.output,
        }),
    );

    return graph;
  }

  private wrapReader(graph: AssetGraph): AssetReader {
    return createBuildCacheReader(this.options.reader, graph, this.rootPackage);
  }

  private wrapWriter(graph: AssetGraph): AssetWriter {
    return createBuildCacheWriter(this.options.writer, graph, this.rootPackage);
  }

  private async delete(id: AssetKey, writer: AssetWriter): Promise<void> {
    this.onDelete?.(id);
    await writer.delete(id);
  }
}

export const prepareWorkspace = (
  options: BuildOptionsInput,
  buildActions: BuildAction[],
  opts: { onDelete?: OnDelete } = {},
): Promise<BuildDefinition> =>
  new Loader(resolveBuildOptions(options), buildActions, opts.onDelete)
    .prepareWorkspace();
