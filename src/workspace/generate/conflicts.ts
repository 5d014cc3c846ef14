/**
 * Requirements addressed:
 * - Declared outputs that already exist before the first build are deleted
 *   without prompting when deleteFilesByDefault is set.
 * - Without a terminal (or under a detected test/CI harness) and without
 *   assumeTty, pre-existing outputs are fatal; nothing is silently deleted or
 *   kept.
 * - Interactive loop: y deletes and resolves, n aborts, l lists and re-prompts,
 *   anything else is reported and re-prompts. No iteration limit; end of input
 *   aborts.
 */

import readline from 'node:readline';
import type { Readable, Writable } from 'node:stream';

import { CACHE_DIR } from '../core/constants';
import { UnexpectedExistingOutputsError } from '../core/errors';
import type { Logger } from '../core/logger';
import type { DeleteAsset } from '../graph/graph';
import type { AssetKey } from '../types';

export type PromptState = 'prompting' | 'resolvedDelete' | 'resolvedAbort';

const PROMPT = '\nDelete these files (y/n) (or list them (l))?: ';

export type CleanupOptions = {
  deleteAsset: DeleteAsset;
  logger: Logger;
  deleteFilesByDefault: boolean;
  assumeTty: boolean;
  isInteractive: () => boolean;
  input: Readable;
  output: Writable;
};

const deleteAll = async (
  ids: ReadonlySet<AssetKey>,
  deleteAsset: DeleteAsset,
): Promise<void> => {
  await Promise.all(Array.from(ids, (id) => deleteAsset(id)));
};

/**
 * Runs the prompt until it resolves. Returns the final state; listing and
 * unrecognized answers keep the loop in `prompting`.
 */
export const promptForConflicts = async (
  conflicting: ReadonlySet<AssetKey>,
  io: Pick<CleanupOptions, 'input' | 'output'>,
): Promise<Exclude<PromptState, 'prompting'>> => {
  const { output } = io;
  const rl = readline.createInterface({ input: io.input, terminal: false });
  const lines = rl[Symbol.asyncIterator]();

  try {
    output.write('\n');
    let state: PromptState = 'prompting';
    while (state === 'prompting') {
      output.write(PROMPT);
      const next = await lines.next();
      if (next.done) {
        state = 'resolvedAbort';
        break;
      }
      const answer = next.value.trim();
      switch (answer.toLowerCase()) {
        case 'y':
          output.write('Deleting files...\n');
          state = 'resolvedDelete';
          break;
        case 'n':
          state = 'resolvedAbort';
          break;
        case 'l':
          for (const id of conflicting) output.write(`${id}\n`);
          break;
        default:
          output.write(`Unrecognized option ${answer}, (y/n/l) expected.\n`);
      }
    }
    return state;
  } finally {
    rl.close();
  }
};

/** Handles pre-existing declared outputs when there is no cached graph. */
export const initialBuildCleanup = async (
  conflicting: ReadonlySet<AssetKey>,
  opts: CleanupOptions,
): Promise<void> => {
  if (!conflicting.size) return;
  const { logger } = opts;

  if (opts.deleteFilesByDefault) {
    logger.info(
      `Deleting ${String(conflicting.size)} declared outputs which already existed on disk.`,
    );
    await deleteAll(conflicting, opts.deleteAsset);
    return;
  }

  logger.info(
    `Found ${String(conflicting.size)} declared outputs which already exist on disk. ` +
      `This is likely because the \`${CACHE_DIR}\` folder was deleted, or you ` +
      'are committing generated files to your source repository.',
  );

  if (!opts.assumeTty && !opts.isInteractive()) {
    throw new UnexpectedExistingOutputsError(conflicting);
  }

  const state = await promptForConflicts(conflicting, opts);
  if (state === 'resolvedAbort') {
    throw new UnexpectedExistingOutputsError(conflicting);
  }
  await deleteAll(conflicting, opts.deleteAsset);
};
