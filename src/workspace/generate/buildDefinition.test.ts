import { rm } from 'node:fs/promises';
import path from 'node:path';

import { messages } from '../../test/logger';
import { exists, withTempDir, writeFile } from '../../test/temp';
import {
  codegenAction,
  testOptions,
  twoPackageGraph,
} from '../../test/workspace';
import {
  InvalidBuildActionError,
  UnexpectedExistingOutputsError,
} from '../core/errors';
import type { AssetReader } from '../io/reader';
import type { AssetKey, BuildAction } from '../types';
import { type BuildDefinition, prepareWorkspace } from './buildDefinition';

const persist = async (cwd: string, def: BuildDefinition): Promise<void> =>
  writeFile(cwd, 'app/.build/asset_graph.json', def.assetGraph.serialize());

const changes = (def: BuildDefinition): Array<[AssetKey, string]> | undefined =>
  def.updates ? Array.from(def.updates) : undefined;

describe('prepareWorkspace', () => {
  test('rejects visible outputs outside the root package before any I/O', async () => {
    await withTempDir(async (cwd) => {
      const noIo = async (): Promise<never> => {
        throw new Error('unexpected I/O');
      };
      const reader: AssetReader = {
        canRead: noIo,
        readAsBytes: noIo,
        readAsString: noIo,
        digest: noIo,
        findAssets: noIo,
      };
      const { options } = testOptions(twoPackageGraph(cwd), { reader });

      const err = await prepareWorkspace(options, [
        codegenAction({ package: 'dep', hideOutput: false }),
      ]).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidBuildActionError);
      expect(String(err)).toContain('package dep');
    });
  });

  test('detects a modified source and nothing on an unchanged re-run', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      const { options } = testOptions(twoPackageGraph(cwd));
      const actions = [codegenAction()];

      const first = await prepareWorkspace(options, actions);
      expect(first.updates).toBeUndefined();
      await persist(cwd, first);

      const second = await prepareWorkspace(options, actions);
      expect(changes(second)).toEqual([]);
      await persist(cwd, second);

      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 2;\n');
      const third = await prepareWorkspace(options, actions);
      expect(changes(third)).toEqual([['app|lib/a.ts', 'modified']]);
    });
  });

  test('deletes pre-existing root outputs by default without prompting', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      await writeFile(cwd, 'app/lib/a.g.ts', '// stale output\n');
      const { options, output } = testOptions(twoPackageGraph(cwd), {
        deleteFilesByDefault: true,
      });
      const deleted: AssetKey[] = [];

      const def = await prepareWorkspace(options, [codegenAction()], {
        onDelete: (id) => deleted.push(id),
      });

      expect(deleted).toEqual(['app|lib/a.g.ts']);
      expect(await exists(cwd, 'app/lib/a.g.ts')).toBe(false);
      expect(def.assetGraph.get('app|lib/a.g.ts')?.kind).toBe('generated');
      expect(output.text()).toBe('');
    });
  });

  test('pre-existing outputs of a hidden root action are deleted in place', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      await writeFile(cwd, 'app/lib/a.g.ts', '// stale output\n');
      const { options } = testOptions(twoPackageGraph(cwd), {
        deleteFilesByDefault: true,
      });
      const actions = [codegenAction({ hideOutput: true })];
      const deleted: AssetKey[] = [];

      const first = await prepareWorkspace(options, actions, {
        onDelete: (id) => deleted.push(id),
      });

      expect(deleted).toEqual(['app|lib/a.g.ts']);
      expect(await exists(cwd, 'app/lib/a.g.ts')).toBe(false);
      await persist(cwd, first);

      const second = await prepareWorkspace(options, actions);
      expect(changes(second)).toEqual([]);
    });
  });

  test('pre-existing root outputs are fatal without a terminal', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      await writeFile(cwd, 'app/lib/a.g.ts', '// stale output\n');
      const { options } = testOptions(twoPackageGraph(cwd));

      await expect(
        prepareWorkspace(options, [codegenAction()]),
      ).rejects.toBeInstanceOf(UnexpectedExistingOutputsError);
      expect(await exists(cwd, 'app/lib/a.g.ts')).toBe(true);
    });
  });

  test('conflicts in dependency packages are fatal regardless of policy', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'dep/lib/b.ts', 'export const b = 1;\n');
      await writeFile(cwd, 'dep/lib/b.g.ts', '// stale output\n');
      const { options } = testOptions(twoPackageGraph(cwd), {
        deleteFilesByDefault: true,
      });

      const err = await prepareWorkspace(options, [
        codegenAction(),
        codegenAction({ package: 'dep', hideOutput: true }),
      ]).catch((e: unknown) => e);

      if (!(err instanceof UnexpectedExistingOutputsError)) {
        throw new Error(`expected UnexpectedExistingOutputsError: ${String(err)}`);
      }
      expect(Array.from(err.conflictingOutputs)).toEqual(['dep|lib/b.g.ts']);
      expect(await exists(cwd, 'dep/lib/b.g.ts')).toBe(true);
    });
  });

  test('changed build actions discard the cache and generated output', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      const { options, entries } = testOptions(twoPackageGraph(cwd));

      await persist(cwd, await prepareWorkspace(options, [codegenAction()]));
      await writeFile(cwd, 'app/.build/generated/app/lib/a.g.md', 'old');

      const def = await prepareWorkspace(options, [
        codegenAction({ builderKey: 'renamed' }),
      ]);

      expect(def.updates).toBeUndefined();
      expect(await exists(cwd, 'app/.build/generated')).toBe(false);
      expect(
        messages(entries, 'warn').some((m) =>
          m.includes('because the build actions have changed'),
        ),
      ).toBe(true);
    });
  });

  test('a build script change invalidates the cached graph', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/build.yaml', 'targets: {}\n');
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      const { options, entries } = testOptions(twoPackageGraph(cwd));
      const actions = [codegenAction()];

      await persist(cwd, await prepareWorkspace(options, actions));
      await writeFile(cwd, 'app/build.yaml', 'targets: { app: {} }\n');

      const def = await prepareWorkspace(options, actions);

      expect(def.updates).toBeUndefined();
      expect(messages(entries, 'warn')).toEqual([
        'Invalidating asset graph due to build script update',
      ]);
    });
  });

  test('the build script check can be skipped', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/build.yaml', 'targets: {}\n');
      const { options } = testOptions(twoPackageGraph(cwd), {
        skipBuildScriptCheck: true,
      });

      await persist(cwd, await prepareWorkspace(options, []));
      await writeFile(cwd, 'app/build.yaml', 'targets: { app: {} }\n');

      const def = await prepareWorkspace(options, []);
      expect(changes(def)).toEqual([['app|build.yaml', 'modified']]);
    });
  });

  test('removing a source deletes its hidden outputs and notifies onDelete', async () => {
    await withTempDir(async (cwd) => {
      await writeFile(cwd, 'app/lib/a.ts', 'export const a = 1;\n');
      const { options } = testOptions(twoPackageGraph(cwd));
      const actions: BuildAction[] = [codegenAction({ hideOutput: true })];

      const first = await prepareWorkspace(options, actions);
      await first.writer.writeAsString('app|lib/a.g.ts', '// generated\n');
      const output = first.assetGraph.get('app|lib/a.g.ts');
      if (output?.kind !== 'generated') throw new Error('expected output');
      output.wasOutput = true;
      output.needsUpdate = false;
      await persist(cwd, first);
      expect(await exists(cwd, 'app/.build/generated/app/lib/a.g.ts')).toBe(
        true,
      );

      await writeFile(cwd, 'app/lib/keep.txt', '');
      await rm(path.join(cwd, 'app/lib/a.ts'));

      const deleted: AssetKey[] = [];
      const second = await prepareWorkspace(options, actions, {
        onDelete: (id) => deleted.push(id),
      });

      expect(changes(second)).toEqual([
        ['app|lib/keep.txt', 'added'],
        ['app|lib/a.ts', 'removed'],
      ]);
      expect(deleted).toEqual(['app|lib/a.g.ts']);
      expect(await exists(cwd, 'app/.build/generated/app/lib/a.g.ts')).toBe(
        false,
      );
      expect(second.assetGraph.contains('app|lib/a.g.ts')).toBe(false);
    });
  });
});
