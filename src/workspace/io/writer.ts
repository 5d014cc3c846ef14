import fs from 'node:fs/promises';
import path from 'node:path';

import type { AssetKey, PackageGraph } from '../types';
import { resolveAssetPath } from './reader';

export type AssetWriter = {
  writeAsBytes: (id: AssetKey, bytes: Uint8Array) => Promise<void>;
  writeAsString: (id: AssetKey, contents: string) => Promise<void>;
  delete: (id: AssetKey) => Promise<void>;
};

export const createFileAssetWriter = (
  packageGraph: PackageGraph,
): AssetWriter => {
  const write = async (id: AssetKey, data: Uint8Array | string) => {
    const abs = resolveAssetPath(packageGraph, id);
    await fs.mkdir(path.dirname(abs), { recursive: true });
    await fs.writeFile(abs, data);
  };

  return {
    writeAsBytes: write,
    writeAsString: write,
    delete: async (id) => {
      await fs.rm(resolveAssetPath(packageGraph, id), { force: true });
    },
  };
};
