/**
 * Reserved layout of the build cache, relative to the root package.
 */

import type { AssetKey } from '../types';

export const CACHE_DIR = '.build';
export const GENERATED_OUTPUT_DIRECTORY = `${CACHE_DIR}/generated`;
export const ENTRY_POINT_DIR = `${CACHE_DIR}/entrypoint`;
export const ASSET_GRAPH_PATH = `${CACHE_DIR}/asset_graph.json`;

export const PLATFORM_PACKAGE = '$sdk';

export const ROOT_PACKAGE_FILES_WHITELIST = [
  'benchmark/**',
  'bin/**',
  'example/**',
  'lib/**',
  'src/**',
  'test/**',
  'tool/**',
  'web/**',
  'build.yaml',
  'package.json',
] as const;

export const PLATFORM_PACKAGE_INCLUDES = ['lib/dev_compiler/**/*.js'] as const;
export const DEPENDENCY_PACKAGE_INCLUDES = ['lib/**'] as const;

export const builderOptionsIdForPhase = (pkg: string, phase: number): AssetKey =>
  `${pkg}|Phase${String(phase)}.builderOptions`;
