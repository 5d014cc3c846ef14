/**
 * Requirements addressed:
 * - One resolved options object per invocation, with documented defaults.
 * - Interactive prompting only when input is a terminal and no test harness
 *   or CI environment is detected, unless `assumeTty` is set.
 */

import type { Readable, Writable } from 'node:stream';

import { createLogger, type Logger } from './core/logger';
import { type AssetReader, createFileAssetReader } from './io/reader';
import { type AssetWriter, createFileAssetWriter } from './io/writer';
import type { PackageGraph } from './types';

const DEFAULT_BUILD_SCRIPT_PATTERNS = ['build.yaml', 'tool/build.ts'] as const;
const HARNESS_ENV_VARS = [
  'CI',
  'VITEST',
  'JEST_WORKER_ID',
  'NODE_TEST_CONTEXT',
] as const;

export type BuildOptionsInput = {
  packageGraph: PackageGraph;
  reader?: AssetReader;
  writer?: AssetWriter;
  logger?: Logger;
  /** Delete pre-existing declared outputs without prompting. Default: false. */
  deleteFilesByDefault?: boolean;
  /** Prompt even when no terminal is detected. Default: false. */
  assumeTty?: boolean;
  /** Never discard the cache because build configuration changed. */
  skipBuildScriptCheck?: boolean;
  enableLowResourcesMode?: boolean;
  /**
   * Root-package globs whose changes invalidate the whole cache. Defaults to
   * `build.yaml` and `tool/build.ts`.
   */
  buildScriptPatterns?: string[];
  input?: Readable;
  output?: Writable;
  isInteractive?: () => boolean;
  env?: NodeJS.ProcessEnv;
};

export type BuildOptions = Required<Omit<BuildOptionsInput, 'env'>>;

export const isTestHarness = (env: NodeJS.ProcessEnv): boolean =>
  HARNESS_ENV_VARS.some((k) => {
    const v = env[k];
    return typeof v === 'string' && v !== '' && v !== 'false' && v !== '0';
  });

const isTerminal = (s: Readable): boolean =>
  'isTTY' in s && s.isTTY === true;

export const resolveBuildOptions = (opts: BuildOptionsInput): BuildOptions => {
  const input = opts.input ?? process.stdin;
  const env = opts.env ?? process.env;
  return {
    packageGraph: opts.packageGraph,
    reader: opts.reader ?? createFileAssetReader(opts.packageGraph),
    writer: opts.writer ?? createFileAssetWriter(opts.packageGraph),
    logger: opts.logger ?? createLogger('workspace'),
    deleteFilesByDefault: opts.deleteFilesByDefault ?? false,
    assumeTty: opts.assumeTty ?? false,
    skipBuildScriptCheck: opts.skipBuildScriptCheck ?? false,
    enableLowResourcesMode: opts.enableLowResourcesMode ?? false,
    buildScriptPatterns:
      opts.buildScriptPatterns ?? Array.from(DEFAULT_BUILD_SCRIPT_PATTERNS),
    input,
    output: opts.output ?? process.stdout,
    isInteractive:
      opts.isInteractive ?? (() => isTerminal(input) && !isTestHarness(env)),
  };
};
