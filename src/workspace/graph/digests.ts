/**
 * Requirements addressed:
 * - The build-action fingerprint is a digest over the ordered actions and
 *   their structure (package, builder, extensions, inputs, visibility).
 * - Builder options are fingerprinted per phase so an options change is a
 *   `modified` update on that phase's builder-options node instead of a
 *   whole-graph discard.
 */

import { digestJson } from '../core/hash';
import { normalizeBuilderKeyUsage } from '../core/keys';
import type { BuildAction, BuilderOptions } from '../types';

export const computeBuildActionsDigest = (actions: BuildAction[]): string =>
  digestJson(
    actions.map((a) => ({
      package: a.package,
      builderKey: normalizeBuilderKeyUsage(a.builderKey, a.package),
      buildExtensions: a.buildExtensions,
      inputs: a.inputs ?? [],
      hideOutput: a.hideOutput,
    })),
  );

export const computeBuilderOptionsDigest = (options: BuilderOptions): string =>
  digestJson(options);
