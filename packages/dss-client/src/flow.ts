/**
 * Project flow graph.
 *
 * The platform returns `{ nodes: { <ref>: { ref, type, predecessors,
 * successors, ... } } }`. Traversal order lists every node after all of
 * its predecessors, walking depth-first from the source nodes so that the
 * flow reads left to right.
 */

import { z } from 'zod';
import type { DSSHttp } from './http.js';
import { asObject, parseResponse, segment } from './responses.js';
import type { JsonObject } from './types.js';

const nodeLinksSchema = z.object({
  ref: z.string(),
  predecessors: z.array(z.string()).default([]),
  successors: z.array(z.string()).default([]),
});

type NodeLinks = z.infer<typeof nodeLinksSchema>;

export class DSSFlowGraph {
  readonly nodes: Map<string, JsonObject>;
  private readonly links = new Map<string, NodeLinks>();

  constructor(readonly data: JsonObject) {
    const raw = asObject(data.nodes ?? {}, 'flow graph nodes');
    this.nodes = new Map();
    for (const [ref, value] of Object.entries(raw)) {
      const node = asObject(value, `flow node ${ref}`);
      this.nodes.set(ref, node);
      this.links.set(ref, parseResponse(nodeLinksSchema, { ref, ...node }, `flow node ${ref}`));
    }
  }

  /** Nodes without predecessors, in graph order. */
  getSourceRefs(): string[] {
    return [...this.links.values()]
      .filter((links) => links.predecessors.length === 0)
      .map((links) => links.ref);
  }

  getItemsInTraversalOrder(): JsonObject[] {
    const ordered: JsonObject[] = [];
    const visited = new Set<string>();
    const entered = new Set<string>();

    const visit = (ref: string): void => {
      const node = this.nodes.get(ref);
      const links = this.links.get(ref);
      if (!node || !links || visited.has(ref) || entered.has(ref)) return;
      entered.add(ref);
      for (const pred of links.predecessors) visit(pred);
      visited.add(ref);
      ordered.push(node);
      for (const succ of links.successors) visit(succ);
    };

    for (const ref of this.getSourceRefs()) visit(ref);
    // Anything only reachable through a cycle
    for (const ref of this.nodes.keys()) visit(ref);
    return ordered;
  }
}

export class DSSProjectFlow {
  constructor(
    private readonly http: DSSHttp,
    readonly projectKey: string,
  ) {}

  async getGraph(): Promise<DSSFlowGraph> {
    const data = await this.http.json('GET', `/projects/${segment(this.projectKey)}/flow/graph/`);
    return new DSSFlowGraph(asObject(data, `flow graph of ${this.projectKey}`));
  }
}
