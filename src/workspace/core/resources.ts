/**
 * Shared resources for the build phase. An instance is created lazily on first
 * fetch and reused until the manager disposes it.
 */

type Disposable = {
  dispose: () => Promise<void>;
  runBeforeExit: () => Promise<void>;
};

export class Resource<T> {
  private instance: Promise<T> | undefined;

  constructor(
    private readonly create: () => T | Promise<T>,
    private readonly hooks: {
      dispose?: (instance: T) => void | Promise<void>;
      beforeExit?: () => void | Promise<void>;
    } = {},
  ) {}

  obtain(): Promise<T> {
    this.instance ??= Promise.resolve().then(() => this.create());
    return this.instance;
  }

  async dispose(): Promise<void> {
    const current = this.instance;
    if (!current) return;
    this.instance = undefined;
    if (this.hooks.dispose) await this.hooks.dispose(await current);
  }

  async runBeforeExit(): Promise<void> {
    if (this.hooks.beforeExit) await this.hooks.beforeExit();
  }
}

export class ResourceManager {
  private readonly fetched = new Set<Disposable>();

  fetch<T>(resource: Resource<T>): Promise<T> {
    this.fetched.add(resource);
    return resource.obtain();
  }

  /** Disposes every fetched instance; later fetches create new ones. */
  async disposeAll(): Promise<void> {
    await Promise.all(Array.from(this.fetched, (r) => r.dispose()));
  }

  /** Disposes everything, then runs each resource's `beforeExit` once. */
  async beforeExit(): Promise<void> {
    await this.disposeAll();
    const all = Array.from(this.fetched);
    this.fetched.clear();
    await Promise.all(all.map((r) => r.runBeforeExit()));
  }
}
