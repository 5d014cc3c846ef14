/**
 * Requirements addressed:
 * - Three source populations: package inputs (per-package include patterns),
 *   cache-directory outputs re-mapped to canonical keys, internal entry-point
 *   assets.
 * - Packages are enumerated concurrently; results are unioned into sets.
 * - Any enumeration failure propagates (no partial source list).
 */

import { assetKey, parseAssetKey } from '../core/assetId';
import {
  DEPENDENCY_PACKAGE_INCLUDES,
  ENTRY_POINT_DIR,
  GENERATED_OUTPUT_DIRECTORY,
  PLATFORM_PACKAGE,
  PLATFORM_PACKAGE_INCLUDES,
  ROOT_PACKAGE_FILES_WHITELIST,
} from '../core/constants';
import type { AssetReader } from '../io/reader';
import type {
  AssetKey,
  PackageGraph,
  PackageNode,
  SourcePopulation,
} from '../types';

export const packageIncludes = (pkg: PackageNode): readonly string[] => {
  if (pkg.isRoot) return ROOT_PACKAGE_FILES_WHITELIST;
  if (pkg.name === PLATFORM_PACKAGE) return PLATFORM_PACKAGE_INCLUDES;
  return DEPENDENCY_PACKAGE_INCLUDES;
};

const listPackageAssets = async (
  reader: AssetReader,
  pkg: PackageNode,
): Promise<AssetKey[]> => {
  const perGlob = await Promise.all(
    packageIncludes(pkg).map((glob) =>
      reader.findAssets(glob, { package: pkg.name }),
    ),
  );
  return perGlob.flat();
};

export const findInputSources = async (
  reader: AssetReader,
  packageGraph: PackageGraph,
): Promise<Set<AssetKey>> => {
  const perPackage = await Promise.all(
    Object.values(packageGraph.allPackages).map((pkg) =>
      listPackageAssets(reader, pkg),
    ),
  );
  return new Set(perPackage.flat());
};

/**
 * Maps `<root>|<generated dir>/<package>/<path>` back to `<package>|<path>`.
 * Files directly under the generated directory (no package segment) are not
 * outputs and are skipped.
 */
export const cacheDirAssetToSource = (key: AssetKey): AssetKey | undefined => {
  const prefix = `${GENERATED_OUTPUT_DIRECTORY}/`;
  const { path } = parseAssetKey(key);
  if (!path.startsWith(prefix)) return undefined;
  const packagePath = path.slice(prefix.length);
  const firstSlash = packagePath.indexOf('/');
  if (firstSlash <= 0 || firstSlash === packagePath.length - 1) return undefined;
  return assetKey(
    packagePath.slice(0, firstSlash),
    packagePath.slice(firstSlash + 1),
  );
};

export const findCacheDirSources = async (
  reader: AssetReader,
): Promise<Set<AssetKey>> => {
  const found = await reader.findAssets(`${GENERATED_OUTPUT_DIRECTORY}/**`);
  const out = new Set<AssetKey>();
  for (const key of found) {
    const mapped = cacheDirAssetToSource(key);
    if (mapped) out.add(mapped);
  }
  return out;
};

export const findInternalSources = async (
  reader: AssetReader,
): Promise<Set<AssetKey>> =>
  new Set(await reader.findAssets(`${ENTRY_POINT_DIR}/**`));

export const findAllSources = async (
  reader: AssetReader,
  packageGraph: PackageGraph,
): Promise<SourcePopulation> => {
  const [inputSources, cacheDirSources, internalSources] = await Promise.all([
    findInputSources(reader, packageGraph),
    findCacheDirSources(reader),
    findInternalSources(reader),
  ]);
  return { inputSources, cacheDirSources, internalSources };
};
