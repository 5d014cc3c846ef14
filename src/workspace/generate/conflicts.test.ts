import { PassThrough } from 'node:stream';

import { captureLogger, messages } from '../../test/logger';
import { collectOutput } from '../../test/workspace';
import { UnexpectedExistingOutputsError } from '../core/errors';
import type { AssetKey } from '../types';
import { type CleanupOptions, initialBuildCleanup } from './conflicts';

const conflicts = new Set(['app|lib/a.g.ts', 'app|lib/b.g.ts']);

const setup = (
  answers: string[] | undefined,
  overrides: Partial<CleanupOptions> = {},
) => {
  const deleted: AssetKey[] = [];
  const { logger, entries } = captureLogger();
  const input = new PassThrough();
  if (answers) input.end(answers.map((a) => `${a}\n`).join(''));
  const output = collectOutput();
  const opts: CleanupOptions = {
    deleteAsset: async (id) => {
      deleted.push(id);
    },
    logger,
    deleteFilesByDefault: false,
    assumeTty: false,
    isInteractive: () => true,
    input,
    output: output.stream,
    ...overrides,
  };
  return { opts, deleted, entries, output };
};

describe('initialBuildCleanup', () => {
  test('does nothing without conflicts', async () => {
    const { opts, deleted, entries } = setup(undefined, {
      isInteractive: () => false,
    });
    await initialBuildCleanup(new Set(), opts);
    expect(deleted).toEqual([]);
    expect(entries).toEqual([]);
  });

  test('deletes without prompting when configured to', async () => {
    const { opts, deleted, entries, output } = setup(undefined, {
      deleteFilesByDefault: true,
      isInteractive: () => false,
    });

    await initialBuildCleanup(conflicts, opts);

    expect(deleted.sort()).toEqual(['app|lib/a.g.ts', 'app|lib/b.g.ts']);
    expect(messages(entries, 'info')).toEqual([
      'Deleting 2 declared outputs which already existed on disk.',
    ]);
    expect(output.text()).toBe('');
  });

  test('fails without a terminal', async () => {
    const { opts, deleted } = setup(undefined, { isInteractive: () => false });

    await expect(initialBuildCleanup(conflicts, opts)).rejects.toBeInstanceOf(
      UnexpectedExistingOutputsError,
    );
    expect(deleted).toEqual([]);
  });

  test('assumeTty prompts even without a terminal', async () => {
    const { opts, deleted } = setup(['y'], {
      assumeTty: true,
      isInteractive: () => false,
    });

    await initialBuildCleanup(conflicts, opts);
    expect(deleted).toHaveLength(2);
  });

  test('lists, rejects unknown answers, then deletes on confirmation', async () => {
    const { opts, deleted, output } = setup(['l', 'maybe', 'Y']);

    await initialBuildCleanup(conflicts, opts);

    const prompt = '\nDelete these files (y/n) (or list them (l))?: ';
    expect(output.text()).toBe(
      [
        '\n',
        prompt,
        'app|lib/a.g.ts\n',
        'app|lib/b.g.ts\n',
        prompt,
        'Unrecognized option maybe, (y/n/l) expected.\n',
        prompt,
        'Deleting files...\n',
      ].join(''),
    );
    expect(deleted.sort()).toEqual(['app|lib/a.g.ts', 'app|lib/b.g.ts']);
  });

  test('aborting reports the conflicting outputs', async () => {
    const { opts, deleted } = setup(['n']);

    const err = await initialBuildCleanup(conflicts, opts).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(UnexpectedExistingOutputsError);
    expect(String(err)).toContain('app|lib/a.g.ts, app|lib/b.g.ts');
    expect(deleted).toEqual([]);
  });

  test('end of input aborts', async () => {
    const { opts } = setup([]);
    await expect(initialBuildCleanup(conflicts, opts)).rejects.toBeInstanceOf(
      UnexpectedExistingOutputsError,
    );
  });
});
