/**
 * Requirements addressed:
 * - Content-addressable read interface: canRead, readAsBytes/readAsString,
 *   digest (SHA-256 hex), glob enumeration scoped optionally to one package
 *   (default: root package).
 * - Asset keys resolve to files through the package graph.
 */

import fs from 'node:fs/promises';
import path from 'node:path';

import fg from 'fast-glob';

import { assetKey, parseAssetKey, toPosixPath } from '../core/assetId';
import { hashFileSha256 } from '../core/hash';
import type { AssetKey, PackageGraph } from '../types';

export type FindAssetsOptions = { package?: string };

export type AssetReader = {
  canRead: (id: AssetKey) => Promise<boolean>;
  readAsBytes: (id: AssetKey) => Promise<Uint8Array>;
  readAsString: (id: AssetKey) => Promise<string>;
  digest: (id: AssetKey) => Promise<string>;
  findAssets: (glob: string, opts?: FindAssetsOptions) => Promise<AssetKey[]>;
};

export const packageDir = (packageGraph: PackageGraph, name: string): string => {
  const pkg = packageGraph.allPackages[name];
  if (!pkg) throw new Error(`Unknown package: ${name}`);
  return pkg.path;
};

export const resolveAssetPath = (
  packageGraph: PackageGraph,
  id: AssetKey,
): string => {
  const { package: pkg, path: rel } = parseAssetKey(id);
  return path.join(packageDir(packageGraph, pkg), rel);
};

const isNotFound = (err: unknown): boolean =>
  err instanceof Error && 'code' in err && err.code === 'ENOENT';

/** False for a missing path; every other stat failure propagates. */
const isDirectory = async (abs: string): Promise<boolean> => {
  try {
    return (await fs.stat(abs)).isDirectory();
  } catch (err) {
    if (isNotFound(err)) return false;
    throw err;
  }
};

export const createFileAssetReader = (
  packageGraph: PackageGraph,
): AssetReader => ({
  canRead: async (id) => {
    try {
      return (await fs.stat(resolveAssetPath(packageGraph, id))).isFile();
    } catch {
      return false;
    }
  },
  readAsBytes: async (id) => fs.readFile(resolveAssetPath(packageGraph, id)),
  readAsString: async (id) =>
    fs.readFile(resolveAssetPath(packageGraph, id), 'utf8'),
  digest: async (id) => hashFileSha256(resolveAssetPath(packageGraph, id)),
  findAssets: async (glob, opts = {}) => {
    const name = opts.package ?? packageGraph.root.name;
    const cwd = packageDir(packageGraph, name);
    // Virtual packages (the platform package) may have no directory on disk.
    if (!(await isDirectory(cwd))) return [];
    const files = await fg(glob, {
      cwd,
      dot: true,
      onlyFiles: true,
      unique: true,
      followSymbolicLinks: true,
    });
    return files.map((f) => assetKey(name, toPosixPath(f)));
  },
});
