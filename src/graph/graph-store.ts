/**
 * Canonical in-memory concept graph
 *
 * Nodes are keyed by label, edges by endpoint pair. Adding something that
 * already exists merges attributes instead of duplicating, which is what makes
 * re-running an expansion safe.
 */

import { MissingEndpointError } from '../errors.js';
import type {
  ConceptEdge, ConceptNode, EdgeAttributes, GraphStats, NodeAttributes
} from '../types/graph.js';

export type NodesRemovedListener = (labels: string[]) => void;

export interface GraphStoreOptions {
  /** Directed tree variant: (a, b) and (b, a) are different edges. */
  directed?: boolean;
}

export class GraphStore {
  private nodeMap: Map<string, NodeAttributes> = new Map();
  private edgeMap: Map<string, ConceptEdge> = new Map();
  private removalListeners: NodesRemovedListener[] = [];
  readonly directed: boolean;

  constructor(options: GraphStoreOptions = {}) {
    this.directed = options.directed ?? false;
  }

  /**
   * Insert a node, or merge `attrs` into the existing one (last write wins per key).
   * A new node needs at least `node_id`, `type` and `level`; the rest default.
   */
  addNode(label: string, attrs: Partial<NodeAttributes>): NodeAttributes {
    const existing = this.nodeMap.get(label);

    if (existing) {
      const merged = mergeAttributes(existing, attrs);
      this.nodeMap.set(label, merged);
      return merged;
    }

    const { node_id, type, level } = attrs;
    if (node_id === undefined || type === undefined || level === undefined) {
      throw new TypeError(`New node "${label}" needs node_id, type and level`);
    }

    const created = mergeAttributes<NodeAttributes>(
      { node_id, type, level, size: 15, color: '#7C4DFF', title: '', summary: '' },
      attrs
    );
    this.nodeMap.set(label, created);
    return created;
  }

  /**
   * Both endpoints must exist. Re-adding merges attributes; weight is
   * overwritten, never summed.
   */
  addEdge(source: string, target: string, attrs: Partial<EdgeAttributes> = {}): ConceptEdge {
    const missing = [source, target].filter((label, i, all) => !this.nodeMap.has(label) && all.indexOf(label) === i);
    if (missing.length > 0) {
      throw new MissingEndpointError(source, target, missing);
    }

    const key = this.edgeKey(source, target);
    const existing = this.edgeMap.get(key);

    if (existing) {
      const attributes = mergeAttributes(existing.attributes, attrs);
      attributes.weight = normalizeWeight(attributes.weight);
      const updated: ConceptEdge = { ...existing, attributes };
      this.edgeMap.set(key, updated);
      return updated;
    }

    const attributes = mergeAttributes<EdgeAttributes>({ title: '', weight: 1 }, attrs);
    attributes.weight = normalizeWeight(attributes.weight);
    const edge: ConceptEdge = { source, target, attributes };
    this.edgeMap.set(key, edge);
    return edge;
  }

  /**
   * Remove a node together with every descendant reached through `parent`
   * links, and all incident edges. Returns the removed labels; empty if the
   * label was absent.
   */
  removeNode(label: string): string[] {
    if (!this.nodeMap.has(label)) return [];

    const doomed = new Set<string>();
    const queue = [label];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined || doomed.has(current)) continue;
      doomed.add(current);
      for (const child of this.children(current)) {
        if (!doomed.has(child)) queue.push(child);
      }
    }

    for (const [key, edge] of this.edgeMap) {
      if (doomed.has(edge.source) || doomed.has(edge.target)) {
        this.edgeMap.delete(key);
      }
    }
    for (const removed of doomed) {
      this.nodeMap.delete(removed);
    }

    const removed = Array.from(doomed);
    for (const listener of this.removalListeners) {
      listener(removed);
    }
    return removed;
  }

  /** Called after every cascade removal with the labels that went away. */
  onNodesRemoved(listener: NodesRemovedListener): () => void {
    this.removalListeners.push(listener);
    return () => {
      this.removalListeners = this.removalListeners.filter(l => l !== listener);
    };
  }

  hasNode(label: string): boolean {
    return this.nodeMap.has(label);
  }

  getNode(label: string): NodeAttributes | undefined {
    const attrs = this.nodeMap.get(label);
    return attrs ? { ...attrs } : undefined;
  }

  hasEdge(source: string, target: string): boolean {
    return this.edgeMap.has(this.edgeKey(source, target));
  }

  getEdge(source: string, target: string): ConceptEdge | undefined {
    const edge = this.edgeMap.get(this.edgeKey(source, target));
    return edge ? { ...edge, attributes: { ...edge.attributes } } : undefined;
  }

  /**
   * Labels sharing an edge with `label`. In the directed variant only
   * outgoing edges count.
   */
  neighbors(label: string): string[] {
    const result: string[] = [];
    for (const edge of this.edgeMap.values()) {
      if (edge.source === label && !result.includes(edge.target)) {
        result.push(edge.target);
      } else if (!this.directed && edge.target === label && !result.includes(edge.source)) {
        result.push(edge.source);
      }
    }
    return result;
  }

  /** Nodes whose `parent` attribute is `label`. */
  children(label: string): string[] {
    const result: string[] = [];
    for (const [candidate, attrs] of this.nodeMap) {
      if (attrs.parent === label) result.push(candidate);
    }
    return result;
  }

  /** The level-0 node, if one exists. */
  root(): ConceptNode | undefined {
    for (const [label, attrs] of this.nodeMap) {
      if (attrs.type === 'root') return { label, attributes: { ...attrs } };
    }
    return undefined;
  }

  nodes(): ConceptNode[] {
    return Array.from(this.nodeMap, ([label, attrs]) => ({ label, attributes: { ...attrs } }));
  }

  edges(): ConceptEdge[] {
    return Array.from(this.edgeMap.values(), edge => ({ ...edge, attributes: { ...edge.attributes } }));
  }

  labels(): string[] {
    return Array.from(this.nodeMap.keys());
  }

  get nodeCount(): number {
    return this.nodeMap.size;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  getStats(): GraphStats {
    const nodesByType: Record<string, number> = {};
    let maxLevel = 0;
    for (const attrs of this.nodeMap.values()) {
      nodesByType[attrs.type] = (nodesByType[attrs.type] || 0) + 1;
      maxLevel = Math.max(maxLevel, attrs.level);
    }
    return {
      nodeCount: this.nodeMap.size,
      edgeCount: this.edgeMap.size,
      nodesByType,
      maxLevel,
    };
  }

  private edgeKey(source: string, target: string): string {
    if (this.directed || source <= target) {
      return JSON.stringify([source, target]);
    }
    return JSON.stringify([target, source]);
  }
}

function normalizeWeight(weight: unknown): number {
  if (typeof weight !== 'number' || !Number.isFinite(weight)) return 1;
  return Math.max(1, Math.round(weight));
}

// Undefined in a patch means "not provided", not "erase".
function mergeAttributes<T extends NodeAttributes | EdgeAttributes>(base: T, patch: Partial<T>): T {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(patch)) {
    if (value !== undefined) merged[key] = value;
  }
  return { ...base, ...merged };
}
