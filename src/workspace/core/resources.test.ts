import { Resource, ResourceManager } from './resources';

describe('ResourceManager', () => {
  test('reuses an instance until disposed', async () => {
    let created = 0;
    const disposed: number[] = [];
    const resource = new Resource(
      () => {
        created += 1;
        return created;
      },
      { dispose: (n) => void disposed.push(n) },
    );
    const manager = new ResourceManager();

    expect(await manager.fetch(resource)).toBe(1);
    expect(await manager.fetch(resource)).toBe(1);

    await manager.disposeAll();
    expect(disposed).toEqual([1]);
    expect(await manager.fetch(resource)).toBe(2);
  });

  test('beforeExit disposes and runs exit hooks once', async () => {
    const calls: string[] = [];
    const resource = new Resource(() => 'x', {
      dispose: () => void calls.push('dispose'),
      beforeExit: () => void calls.push('exit'),
    });
    const manager = new ResourceManager();
    await manager.fetch(resource);

    await manager.beforeExit();
    await manager.beforeExit();
    expect(calls).toEqual(['dispose', 'exit']);
  });
});
