import path from 'node:path';

import type { PackageGraph, PackageNode } from '../types';

export type PackageSpec = {
  name: string;
  path: string;
  dependencies?: string[];
};

/**
 * Package graph with `root` first; package directories are resolved to
 * absolute paths.
 */
export const createPackageGraph = (
  root: PackageSpec,
  dependencies: PackageSpec[] = [],
): PackageGraph => {
  const toNode = (p: PackageSpec, isRoot: boolean): PackageNode => ({
    name: p.name,
    path: path.resolve(p.path),
    isRoot,
    dependencies: p.dependencies ?? [],
  });

  const rootNode = toNode(
    {
      ...root,
      dependencies: root.dependencies ?? dependencies.map((d) => d.name),
    },
    true,
  );
  const allPackages: Record<string, PackageNode> = { [root.name]: rootNode };
  for (const dep of dependencies) {
    if (allPackages[dep.name]) {
      throw new Error(`Duplicate package in package graph: ${dep.name}`);
    }
    allPackages[dep.name] = toNode(dep, false);
  }
  return { root: rootNode, allPackages };
};
