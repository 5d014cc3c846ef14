import path from 'node:path';

import { createPackageGraph } from './packageGraph';

describe('createPackageGraph', () => {
  test('marks the root and resolves package directories', () => {
    const graph = createPackageGraph({ name: 'app', path: 'work/app' }, [
      { name: 'dep', path: 'work/dep' },
    ]);

    expect(graph.root.isRoot).toBe(true);
    expect(graph.root.path).toBe(path.resolve('work/app'));
    expect(graph.root.dependencies).toEqual(['dep']);
    expect(graph.allPackages['dep']?.isRoot).toBe(false);
    expect(Object.keys(graph.allPackages)).toEqual(['app', 'dep']);
  });

  test('rejects duplicate package names', () => {
    expect(() =>
      createPackageGraph({ name: 'app', path: 'app' }, [
        { name: 'dep', path: 'a' },
        { name: 'dep', path: 'b' },
      ]),
    ).toThrow('Duplicate package in package graph: dep');
  });
});
