/**
 * Requirements addressed:
 * - Asset identity is a (package, path) pair with a canonical `package|path`
 *   string key used for every map and set.
 * - Exactly one change classification per key per detection pass.
 * - Build actions are ordered; the phase index is part of the builder-options
 *   node id.
 */

export type AssetKey = string;

export type AssetId = {
  readonly package: string;
  readonly path: string;
};

export type ChangeType = 'added' | 'removed' | 'modified';

export type ChangeMap = Map<AssetKey, ChangeType>;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

export type BuilderOptions = { [key: string]: JsonValue };

export type BuildAction = {
  package: string;
  builderKey: string;
  /** Input extension to output extensions, e.g. `{ '.ts': ['.g.ts'] }`. */
  buildExtensions: Record<string, string[]>;
  /** Globs (package-relative) restricting which inputs the builder sees. */
  inputs?: string[];
  hideOutput: boolean;
  builderOptions: BuilderOptions;
};

export type PackageNode = {
  name: string;
  /** Absolute directory of the package. */
  path: string;
  isRoot: boolean;
  dependencies: string[];
};

export type PackageGraph = {
  root: PackageNode;
  allPackages: Record<string, PackageNode>;
};

export type SourcePopulation = {
  inputSources: Set<AssetKey>;
  cacheDirSources: Set<AssetKey>;
  internalSources: Set<AssetKey>;
};

export type OnDelete = (id: AssetKey) => void;
