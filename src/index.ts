export {
  assetKey,
  makeAssetId,
  parseAssetKey,
  toAssetKey,
} from './workspace/core/assetId';
export {
  ASSET_GRAPH_PATH,
  builderOptionsIdForPhase,
  CACHE_DIR,
  ENTRY_POINT_DIR,
  GENERATED_OUTPUT_DIRECTORY,
  PLATFORM_PACKAGE,
} from './workspace/core/constants';
export {
  AssetGraphVersionError,
  InvalidBuildActionError,
  MissingGraphNodeError,
  UnexpectedExistingOutputsError,
} from './workspace/core/errors';
export {
  normalizeBuilderKeyDefinition,
  normalizeBuilderKeyUsage,
  normalizeTargetKeyDefinition,
  normalizeTargetKeyUsage,
} from './workspace/core/keys';
export {
  createLogger,
  type LogEntry,
  type Logger,
  type LogLevel,
  type LogSink,
  logTimedAsync,
} from './workspace/core/logger';
export {
  createPackageGraph,
  type PackageSpec,
} from './workspace/core/packageGraph';
export { Resource, ResourceManager } from './workspace/core/resources';
export { BuildScriptUpdates } from './workspace/changes/buildScriptUpdates';
export {
  type BuildDefinition,
  prepareWorkspace,
} from './workspace/generate/buildDefinition';
export {
  type CachedGraphResult,
  tryReadCachedAssetGraph,
} from './workspace/generate/cachedGraph';
export {
  computeBuilderOptionsUpdates,
  findSourceUpdates,
} from './workspace/generate/changes';
export { findAllSources } from './workspace/generate/sources';
export {
  computeBuildActionsDigest,
  computeBuilderOptionsDigest,
} from './workspace/graph/digests';
export { AssetGraph, type DeleteAsset } from './workspace/graph/graph';
export type {
  AssetNode,
  AssetNodeKind,
  BuilderOptionsAssetNode,
  GeneratedAssetNode,
  InternalAssetNode,
  SourceAssetNode,
} from './workspace/graph/nodes';
export {
  createBuildCacheReader,
  createBuildCacheWriter,
} from './workspace/io/buildCache';
export {
  type AssetReader,
  createFileAssetReader,
  type FindAssetsOptions,
} from './workspace/io/reader';
export { type AssetWriter, createFileAssetWriter } from './workspace/io/writer';
export type { BuildOptions, BuildOptionsInput } from './workspace/options';
export type {
  AssetId,
  AssetKey,
  BuildAction,
  BuilderOptions,
  ChangeMap,
  ChangeType,
  JsonValue,
  OnDelete,
  PackageGraph,
  PackageNode,
  SourcePopulation,
} from './workspace/types';
