/**
 * Graph <-> flat document reconciliation
 *
 * Storage keeps a tree as two label-keyed maps. Edge keys are
 * `${source}_${target}`, which cannot be split reliably when a label itself
 * contains an underscore, so every stored edge also carries its endpoints.
 * Documents written without them fall back to splitting the key on its
 * first underscore.
 */

import { PersistenceError } from '../errors.js';
import { GraphStore, type GraphStoreOptions } from '../graph/graph-store.js';
import type { EdgeAttributes, NodeAttributes, NodeType, TreeDocument } from '../types/graph.js';
import { edgeDocumentKey, generateNodeId, splitEdgeDocumentKey } from '../utils/ids.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { EdgeMap, NodeMap, TreeStorage } from './storage.js';

const NODE_TYPES: readonly NodeType[] = ['root', 'concept', 'subtopic', 'sub-concept'];

export type TreeDraft = Omit<TreeDocument, 'id' | 'created_at' | 'updated_at'>;

export interface SaveOutcome {
  treeId: string;
  action: 'inserted' | 'updated' | 'unchanged';
}

export function toDocument(graph: GraphStore, userId: string, topic: string): TreeDraft {
  // fromEntries defines own keys, so a label such as `__proto__` survives.
  const nodes: NodeMap = Object.fromEntries(
    graph.nodes().map((node): [string, Record<string, unknown>] => [node.label, { ...node.attributes }])
  );
  const edges: EdgeMap = Object.fromEntries(
    graph.edges().map((edge): [string, Record<string, unknown>] => [
      edgeDocumentKey(edge.source, edge.target),
      { ...edge.attributes, source: edge.source, target: edge.target },
    ])
  );

  return { user_id: userId, topic, nodes, edges };
}

/**
 * Rebuild a graph from stored maps. Edges whose endpoints are not stored
 * nodes are skipped.
 */
export function fromDocument(
  doc: Pick<TreeDocument, 'topic' | 'nodes' | 'edges'>,
  options: GraphStoreOptions = {},
  logger: Logger = createLogger('TreeDocument')
): GraphStore {
  const graph = new GraphStore(options);

  for (const [label, raw] of Object.entries(doc.nodes)) {
    graph.addNode(label, normalizeNode(label, raw, doc.topic));
  }

  let skipped = 0;
  for (const [key, raw] of Object.entries(doc.edges)) {
    const { source: storedSource, target: storedTarget, ...rest } = raw;
    const endpoints: [string, string] | null =
      typeof storedSource === 'string' && typeof storedTarget === 'string'
        ? [storedSource, storedTarget]
        : splitEdgeDocumentKey(key);

    if (!endpoints || !graph.hasNode(endpoints[0]) || !graph.hasNode(endpoints[1])) {
      skipped++;
      continue;
    }
    graph.addEdge(endpoints[0], endpoints[1], normalizeEdge(rest));
  }

  if (skipped > 0) {
    logger.warn(`Skipped ${skipped} edge(s) with unknown endpoints in "${doc.topic}"`);
  }
  return graph;
}

export interface PersistenceAdapterOptions {
  logger?: Logger;
  correlationId?: string;
}

/**
 * Query-then-upsert. No document: insert. Document and `update`: full
 * replace of nodes and edges. Document without `update`: left alone.
 * Storage failures become PersistenceError; the graph is never touched.
 */
export class PersistenceAdapter {
  private readonly storage: TreeStorage;
  private readonly log: Logger;
  private readonly correlationId: string;

  constructor(storage: TreeStorage, options: PersistenceAdapterOptions = {}) {
    this.storage = storage;
    this.log = options.logger ?? createLogger('Persistence');
    this.correlationId = options.correlationId ?? 'local';
  }

  async save(graph: GraphStore, userId: string, topic: string, update: boolean): Promise<SaveOutcome> {
    const existing = await this.guard('getTree', () => this.storage.getTree(userId, topic));

    let outcome: SaveOutcome;
    if (existing && !update) {
      outcome = { treeId: existing.id, action: 'unchanged' };
    } else {
      const draft = toDocument(graph, userId, topic);
      const treeId = await this.guard('saveTree', () =>
        this.storage.saveTree(userId, topic, draft.nodes, draft.edges, existing !== null)
      );
      outcome = { treeId, action: existing ? 'updated' : 'inserted' };
    }

    this.log.event('tree.saved', this.correlationId, {
      userId,
      topic,
      treeId: outcome.treeId,
      action: outcome.action,
      nodes: graph.nodeCount,
      edges: graph.edgeCount,
    });
    return outcome;
  }

  async load(treeId: string, options?: GraphStoreOptions): Promise<{ doc: TreeDocument; graph: GraphStore } | null> {
    const doc = await this.guard('getTreeById', () => this.storage.getTreeById(treeId));
    return doc ? { doc, graph: fromDocument(doc, options, this.log) } : null;
  }

  async loadByTopic(userId: string, topic: string, options?: GraphStoreOptions): Promise<{ doc: TreeDocument; graph: GraphStore } | null> {
    const doc = await this.guard('getTree', () => this.storage.getTree(userId, topic));
    return doc ? { doc, graph: fromDocument(doc, options, this.log) } : null;
  }

  private async guard<T>(operation: 'getTree' | 'getTreeById' | 'saveTree', call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      const failure = new PersistenceError(operation, err);
      this.log.error(failure.message);
      throw failure;
    }
  }
}

function normalizeNode(label: string, raw: Record<string, unknown>, topic: string): Partial<NodeAttributes> {
  const isRoot = label === topic;
  const type = NODE_TYPES.find(t => t === raw.type) ?? (isRoot ? 'root' : 'concept');
  const level = typeof raw.level === 'number' && Number.isInteger(raw.level) && raw.level >= 0
    ? raw.level
    : type === 'root' ? 0 : 1;

  return {
    ...raw,
    node_id: typeof raw.node_id === 'string' && raw.node_id ? raw.node_id : generateNodeId(),
    type,
    level,
    parent: typeof raw.parent === 'string' ? raw.parent : undefined,
    size: typeof raw.size === 'number' ? raw.size : undefined,
    color: typeof raw.color === 'string' ? raw.color : undefined,
    title: typeof raw.title === 'string' ? raw.title : undefined,
    summary: typeof raw.summary === 'string'
      ? raw.summary
      : typeof raw.title === 'string' ? raw.title : undefined,
  };
}

function normalizeEdge(raw: Record<string, unknown>): Partial<EdgeAttributes> {
  return {
    ...raw,
    title: typeof raw.title === 'string' ? raw.title : '',
    weight: typeof raw.weight === 'number' ? raw.weight : 1,
  };
}
