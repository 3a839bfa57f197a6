import { beforeAll, describe, expect, it } from 'vitest';
import { PersistenceError } from '../errors.js';
import { GraphStore } from '../graph/graph-store.js';
import type { TreeDocument } from '../types/graph.js';
import { setQuiet } from '../utils/logger.js';
import { InMemoryTreeStorage } from './memory-storage.js';
import { AttributeMapSchema } from './storage.js';
import { PersistenceAdapter, fromDocument, toDocument } from './tree-document.js';

function underscoredGraph(): GraphStore {
  const graph = new GraphStore();
  graph.addNode('graph_theory', { node_id: 'n0', type: 'root', level: 0, summary: 'Root.' });
  graph.addNode('euler_path', { node_id: 'n1', type: 'concept', level: 1, parent: 'graph_theory', color: '#7C4DFF' });
  graph.addEdge('graph_theory', 'euler_path', { title: 'classic problem', weight: 2 });
  return graph;
}

class UnreachableStorage extends InMemoryTreeStorage {
  async getTree(): Promise<TreeDocument | null> {
    throw new Error('connection refused');
  }
}

describe('toDocument / fromDocument', () => {
  beforeAll(() => setQuiet(true));

  it('writes edges under the wire key with their endpoints', () => {
    const draft = toDocument(underscoredGraph(), 'user-1', 'graph_theory');

    expect(draft.user_id).toBe('user-1');
    expect(Object.keys(draft.nodes)).toEqual(['graph_theory', 'euler_path']);
    expect(draft.edges).toEqual({
      graph_theory_euler_path: {
        title: 'classic problem',
        weight: 2,
        source: 'graph_theory',
        target: 'euler_path',
      },
    });
  });

  it('restores labels that contain underscores', () => {
    const original = underscoredGraph();
    const draft = toDocument(original, 'user-1', 'graph_theory');
    const restored = fromDocument({ topic: draft.topic, nodes: draft.nodes, edges: draft.edges });

    expect(restored.labels()).toEqual(['graph_theory', 'euler_path']);
    expect(restored.getNode('euler_path')).toEqual(original.getNode('euler_path'));
    expect(restored.getEdge('graph_theory', 'euler_path')).toEqual({
      source: 'graph_theory',
      target: 'euler_path',
      attributes: { title: 'classic problem', weight: 2 },
    });
  });

  it('keeps a label named like an object prototype key', () => {
    const original = new GraphStore();
    original.addNode('Root', { node_id: 'n0', type: 'root', level: 0 });
    original.addNode('__proto__', { node_id: 'n1', type: 'concept', level: 1, parent: 'Root' });
    original.addEdge('Root', '__proto__', { title: 'odd name' });

    const draft = toDocument(original, 'user-1', 'Root');
    expect(Object.keys(draft.nodes)).toEqual(['Root', '__proto__']);
    expect(Object.keys(draft.edges)).toEqual(['Root___proto__']);

    const restored = fromDocument({
      topic: 'Root',
      nodes: AttributeMapSchema.parse(JSON.parse(JSON.stringify(draft.nodes))),
      edges: AttributeMapSchema.parse(JSON.parse(JSON.stringify(draft.edges))),
    });

    expect(restored.labels()).toEqual(['Root', '__proto__']);
    expect(restored.getNode('__proto__')).toEqual(original.getNode('__proto__'));
    expect(restored.getEdge('Root', '__proto__')?.attributes).toEqual({ title: 'odd name', weight: 1 });
  });

  it('rejects stored maps that are not objects of attribute objects', () => {
    expect(AttributeMapSchema.safeParse([]).success).toBe(false);
    expect(AttributeMapSchema.safeParse(null).success).toBe(false);
    expect(AttributeMapSchema.safeParse({ Vertex: 1 }).success).toBe(false);
    expect(AttributeMapSchema.parse({ Vertex: { level: 1 } })).toEqual({ Vertex: { level: 1 } });
  });

  it('splits legacy edge keys on the first underscore', () => {
    const restored = fromDocument({
      topic: 'Sorting',
      nodes: {
        Sorting: { title: 'Ordering things' },
        Quicksort: { level: 1, parent: 'Sorting' },
        merge_sort: { level: 1 },
      },
      edges: {
        Sorting_Quicksort: { title: 'algorithm', weight: 4 },
        merge_sort_Sorting: { title: 'algorithm' },
      },
    });

    expect(restored.edgeCount).toBe(1);
    expect(restored.getEdge('Sorting', 'Quicksort')?.attributes).toEqual({ title: 'algorithm', weight: 4 });
    expect(restored.hasEdge('Sorting', 'merge_sort')).toBe(false);
  });

  it('fills missing node attributes', () => {
    const restored = fromDocument({
      topic: 'Sorting',
      nodes: { Sorting: { title: 'Ordering things' }, Quicksort: {} },
      edges: {},
    });

    expect(restored.getNode('Sorting')).toMatchObject({
      type: 'root',
      level: 0,
      title: 'Ordering things',
      summary: 'Ordering things',
    });
    expect(restored.getNode('Quicksort')).toMatchObject({ type: 'concept', level: 1, title: '', summary: '' });
    expect(restored.getNode('Quicksort')?.node_id).toMatch(/^node_/);
  });
});

describe('PersistenceAdapter', () => {
  beforeAll(() => setQuiet(true));

  it('inserts once and updates afterwards', async () => {
    const storage = new InMemoryTreeStorage();
    const adapter = new PersistenceAdapter(storage);
    const graph = underscoredGraph();

    const first = await adapter.save(graph, 'user-1', 'graph_theory', false);
    expect(first.action).toBe('inserted');

    graph.addNode('planar_graph', { node_id: 'n2', type: 'concept', level: 1, parent: 'graph_theory' });
    const second = await adapter.save(graph, 'user-1', 'graph_theory', true);

    expect(second).toEqual({ treeId: first.treeId, action: 'updated' });
    expect(storage.treeCount).toBe(1);
    expect(Object.keys((await storage.getTreeById(first.treeId))?.nodes ?? {})).toHaveLength(3);
  });

  it('leaves an existing document alone without update', async () => {
    const storage = new InMemoryTreeStorage();
    const adapter = new PersistenceAdapter(storage);
    const graph = underscoredGraph();

    const first = await adapter.save(graph, 'user-1', 'graph_theory', true);
    graph.removeNode('euler_path');
    const second = await adapter.save(graph, 'user-1', 'graph_theory', false);

    expect(second).toEqual({ treeId: first.treeId, action: 'unchanged' });
    expect(Object.keys((await storage.getTreeById(first.treeId))?.nodes ?? {})).toEqual(['graph_theory', 'euler_path']);
  });

  it('loads a saved tree back into a graph', async () => {
    const storage = new InMemoryTreeStorage();
    const adapter = new PersistenceAdapter(storage);
    const { treeId } = await adapter.save(underscoredGraph(), 'user-1', 'graph_theory', false);

    const byId = await adapter.load(treeId);
    const byTopic = await adapter.loadByTopic('user-1', 'graph_theory');

    expect(byId?.graph.nodeCount).toBe(2);
    expect(byTopic?.doc.id).toBe(treeId);
    expect(await adapter.load('tree_missing')).toBeNull();
    expect(await adapter.loadByTopic('user-2', 'graph_theory')).toBeNull();
  });

  it('wraps storage failures without touching the graph', async () => {
    const adapter = new PersistenceAdapter(new UnreachableStorage());
    const graph = underscoredGraph();

    const attempt = adapter.save(graph, 'user-1', 'graph_theory', true);
    await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
    await expect(attempt).rejects.toThrow('Storage getTree failed: connection refused');
    expect(graph.nodeCount).toBe(2);
  });
});
