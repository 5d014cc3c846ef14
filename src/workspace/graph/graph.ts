/**
 * Requirements addressed:
 * - Build a graph from build actions, input sources, internal sources and
 *   package metadata: source/internal nodes carry digests, one
 *   builder-options node per phase, one generated node per declared output
 *   (outputs of phase n feed phases after n).
 * - Lookup, containment, all-nodes, sources and outputs queries.
 * - updateAndInvalidate applies a change map: invalidated outputs that were
 *   emitted are deleted through the callback, removed sources drop out with
 *   their outputs, added sources get nodes and declared outputs.
 * - Versioned JSON serialization (see ./serialization).
 */

import { packageOf } from '../core/assetId';
import { builderOptionsIdForPhase } from '../core/constants';
import type { AssetReader } from '../io/reader';
import type {
  AssetKey,
  BuildAction,
  ChangeMap,
  PackageGraph,
} from '../types';
import {
  computeBuildActionsDigest,
  computeBuilderOptionsDigest,
} from './digests';
import {
  type AssetNode,
  type GeneratedAssetNode,
  makeBuilderOptionsNode,
  makeGeneratedNode,
  makeInternalNode,
  makeSourceNode,
} from './nodes';
import { expectedOutputs } from './outputs';
import { decodeAssetGraph, encodeAssetGraph } from './serialization';

export type DeleteAsset = (id: AssetKey) => Promise<void>;

const digestAll = async (
  ids: Iterable<AssetKey>,
  reader: AssetReader,
): Promise<Map<AssetKey, string>> =>
  new Map(
    await Promise.all(
      Array.from(ids, async (id) => [id, await reader.digest(id)] as const),
    ),
  );

export class AssetGraph {
  private readonly nodes = new Map<AssetKey, AssetNode>();

  private constructor(readonly buildActionsDigest: string) {}

  static async build(
    buildActions: BuildAction[],
    inputSources: Set<AssetKey>,
    internalSources: Set<AssetKey>,
    packageGraph: PackageGraph,
    reader: AssetReader,
  ): Promise<AssetGraph> {
    const graph = new AssetGraph(computeBuildActionsDigest(buildActions));

    const [sourceDigests, internalDigests] = await Promise.all([
      digestAll(inputSources, reader),
      digestAll(internalSources, reader),
    ]);
    for (const [id, d] of sourceDigests) graph.add(makeSourceNode(id, d));
    for (const [id, d] of internalDigests) graph.add(makeInternalNode(id, d));

    buildActions.forEach((action, phase) => {
      graph.add(
        makeBuilderOptionsNode(
          builderOptionsIdForPhase(action.package, phase),
          computeBuilderOptionsDigest(action.builderOptions),
        ),
      );
    });

    graph.addOutputs(buildActions, packageGraph.root.name, inputSources);
    return graph;
  }

  static deserialize(text: string): AssetGraph {
    const doc = decodeAssetGraph(text);
    const graph = new AssetGraph(doc.buildActionsDigest);
    for (const n of doc.nodes) graph.add(n);
    return graph;
  }

  serialize(): string {
    return encodeAssetGraph({
      buildActionsDigest: this.buildActionsDigest,
      nodes: this.nodes.values(),
    });
  }

  get(id: AssetKey): AssetNode | undefined {
    return this.nodes.get(id);
  }

  contains(id: AssetKey): boolean {
    return this.nodes.has(id);
  }

  get allNodes(): AssetNode[] {
    return Array.from(this.nodes.values());
  }

  /** Keys of all source nodes. */
  get sources(): AssetKey[] {
    return this.allNodes.filter((n) => n.kind === 'source').map((n) => n.id);
  }

  /** Keys of all generated (declared output) nodes. */
  get outputs(): AssetKey[] {
    return this.generatedNodes().map((n) => n.id);
  }

  /** Generated nodes whose primary input is `id`. */
  outputsOf(id: AssetKey): GeneratedAssetNode[] {
    return this.generatedNodes().filter((n) => n.primaryInput === id);
  }

  packageNodes(pkg: string): AssetNode[] {
    return this.allNodes.filter((n) => packageOf(n.id) === pkg);
  }

  async updateAndInvalidate(
    buildActions: BuildAction[],
    updates: ChangeMap,
    rootPackage: string,
    deleteAsset: DeleteAsset,
    reader: AssetReader,
  ): Promise<Set<AssetKey>> {
    const seeds: AssetKey[] = [];
    const added: AssetKey[] = [];
    const removedSources: AssetKey[] = [];
    const refresh: AssetKey[] = [];
    const invalidated = new Set<AssetKey>();

    for (const [id, change] of updates) {
      const node = this.nodes.get(id);
      if (change === 'added' && !node) {
        added.push(id);
        continue;
      }
      seeds.push(id);
      if (!node) continue;
      if (change === 'removed') {
        if (node.kind === 'generated') {
          node.wasOutput = false;
          node.needsUpdate = true;
          delete node.lastKnownDigest;
          invalidated.add(id);
        } else if (node.kind === 'source' || node.kind === 'internal') {
          removedSources.push(id);
        }
      } else if (node.kind === 'source' || node.kind === 'internal') {
        refresh.push(id);
      }
    }

    const stale = this.transitiveOutputs(
      seeds.flatMap((id) => this.directDependents(id, buildActions)),
    );
    await Promise.all(
      stale.map(async (n) => {
        invalidated.add(n.id);
        if (n.wasOutput) await deleteAsset(n.id);
        n.wasOutput = false;
        n.needsUpdate = true;
        delete n.lastKnownDigest;
      }),
    );

    for (const id of removedSources) {
      for (const n of this.transitiveOutputs(this.outputsOf(id))) {
        this.nodes.delete(n.id);
      }
      this.nodes.delete(id);
      invalidated.add(id);
    }

    const digests = await digestAll([...refresh, ...added], reader);
    for (const id of refresh) {
      const node = this.nodes.get(id);
      const d = digests.get(id);
      if (node && d) node.lastKnownDigest = d;
    }
    for (const id of added) {
      this.add(makeSourceNode(id, digests.get(id)));
      invalidated.add(id);
    }
    for (const id of this.addOutputs(buildActions, rootPackage, added)) {
      invalidated.add(id);
    }

    return invalidated;
  }

  private add(node: AssetNode): void {
    this.nodes.set(node.id, node);
  }

  private generatedNodes(): GeneratedAssetNode[] {
    const out: GeneratedAssetNode[] = [];
    for (const n of this.nodes.values()) if (n.kind === 'generated') out.push(n);
    return out;
  }

  /**
   * Generated nodes directly affected by a change to `id`: every output of the
   * phase for a builder-options node, otherwise the outputs of `id` itself.
   */
  private directDependents(
    id: AssetKey,
    buildActions: BuildAction[],
  ): GeneratedAssetNode[] {
    if (this.nodes.get(id)?.kind !== 'builderOptions') return this.outputsOf(id);
    const phase = buildActions.findIndex(
      (a, i) => builderOptionsIdForPhase(a.package, i) === id,
    );
    return this.generatedNodes().filter((n) => n.phase === phase);
  }

  private transitiveOutputs(
    start: GeneratedAssetNode[],
  ): GeneratedAssetNode[] {
    const seen = new Map<AssetKey, GeneratedAssetNode>();
    const queue = [...start];
    while (queue.length) {
      const n = queue.shift();
      if (!n || seen.has(n.id)) continue;
      seen.set(n.id, n);
      queue.push(...this.outputsOf(n.id));
    }
    return Array.from(seen.values());
  }

  /**
   * Adds generated nodes for everything `primaryInputs` (and, phase by phase,
   * their new outputs) declare. A declared output replaces a source node with
   * the same key (it is then a conflicting output, not an input); other
   * existing nodes are kept.
   */
  private addOutputs(
    buildActions: BuildAction[],
    rootPackage: string,
    primaryInputs: Iterable<AssetKey>,
  ): AssetKey[] {
    const available = new Set(primaryInputs);
    const created: AssetKey[] = [];

    buildActions.forEach((action, phase) => {
      const isHidden = action.hideOutput || action.package !== rootPackage;
      const candidates = Array.from(available);
      const declared = new Set(
        candidates.flatMap((input) => expectedOutputs(action, input)),
      );

      for (const input of candidates) {
        if (declared.has(input)) continue;
        for (const out of expectedOutputs(action, input)) {
          const existing = this.nodes.get(out);
          if (existing && existing.kind !== 'source') continue;
          this.add(
            makeGeneratedNode({ id: out, primaryInput: input, phase, isHidden }),
          );
          created.push(out);
        }
      }
      for (const out of declared) {
        if (this.nodes.get(out)?.kind === 'generated') available.add(out);
      }
    });

    return created;
  }
}
