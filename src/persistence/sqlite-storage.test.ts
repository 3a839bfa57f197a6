import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import { GraphStore } from '../graph/graph-store.js';
import { setQuiet } from '../utils/logger.js';
import { SqliteTreeStorage } from './sqlite-storage.js';
import { PersistenceAdapter } from './tree-document.js';

describe('SqliteTreeStorage', () => {
  let tick: number;
  let storage: SqliteTreeStorage;

  beforeAll(() => setQuiet(true));

  beforeEach(() => {
    tick = 0;
    storage = new SqliteTreeStorage(':memory:', () => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)));
  });

  afterEach(() => {
    storage.close();
  });

  it('inserts, then replaces on update', async () => {
    const id = await storage.saveTree('user-1', 'Graph Theory', { 'Graph Theory': { type: 'root', level: 0 } }, {}, false);
    const again = await storage.saveTree(
      'user-1',
      'Graph Theory',
      { Vertex: { type: 'concept', level: 1 } },
      { 'Graph Theory_Vertex': { title: 'building block', weight: 1 } },
      true
    );

    const doc = await storage.getTreeById(id);
    expect(again).toBe(id);
    expect(doc).toEqual({
      id,
      user_id: 'user-1',
      topic: 'Graph Theory',
      nodes: { Vertex: { type: 'concept', level: 1 } },
      edges: { 'Graph Theory_Vertex': { title: 'building block', weight: 1 } },
      created_at: new Date('2024-01-01T00:00:00.000Z'),
      updated_at: new Date('2024-01-01T00:00:01.000Z'),
    });
    expect(await storage.listTrees('user-1')).toHaveLength(1);
  });

  it('returns null for unknown trees', async () => {
    expect(await storage.getTree('user-1', 'Nothing')).toBeNull();
    expect(await storage.getTreeById('tree_missing')).toBeNull();
  });

  it('lists newest first and searches literally', async () => {
    await storage.saveTree('user-1', 'Graph Theory', {}, {}, false);
    await storage.saveTree('user-1', 'C++ Templates', {}, {}, false);
    await storage.saveTree('user-2', 'Graph Coloring', {}, {}, false);

    expect((await storage.listTrees('user-1')).map(t => t.topic)).toEqual(['C++ Templates', 'Graph Theory']);
    expect((await storage.searchTopics('user-1', 'c++')).map(t => t.topic)).toEqual(['C++ Templates']);
    expect((await storage.searchTopics('user-1', 'graph')).map(t => t.topic)).toEqual(['Graph Theory']);
  });

  it('keeps learning history newest first', async () => {
    for (const [topic, day] of [['Graph Theory', 3], ['Cell Biology', 5], ['Sorting', 4]] as const) {
      await storage.logSession({
        user_id: 'user-1',
        topic,
        tree_id: `tree_${day}`,
        nodes_explored: [topic],
        time_spent: 40 + day,
        timestamp: new Date(Date.UTC(2024, 1, day)),
      });
    }

    const history = await storage.getLearningHistory('user-1', 2);
    expect(history.map(r => r.topic)).toEqual(['Cell Biology', 'Sorting']);
    expect(history[0]).toMatchObject({
      tree_id: 'tree_5',
      nodes_explored: ['Cell Biology'],
      time_spent: 45,
      timestamp: new Date(Date.UTC(2024, 1, 5)),
    });
  });

  it('backs the persistence adapter end to end', async () => {
    const graph = new GraphStore();
    graph.addNode('graph_theory', { node_id: 'n0', type: 'root', level: 0 });
    graph.addNode('euler_path', { node_id: 'n1', type: 'concept', level: 1, parent: 'graph_theory' });
    graph.addEdge('graph_theory', 'euler_path', { title: 'classic problem' });

    const adapter = new PersistenceAdapter(storage);
    const { treeId } = await adapter.save(graph, 'user-1', 'graph_theory', true);
    const loaded = await adapter.load(treeId);

    expect(loaded?.graph.getEdge('graph_theory', 'euler_path')?.attributes).toEqual({ title: 'classic problem', weight: 1 });
    expect(loaded?.graph.getNode('euler_path')).toEqual(graph.getNode('euler_path'));
  });

  it('round-trips a label named like an object prototype key', async () => {
    const graph = new GraphStore();
    graph.addNode('Root', { node_id: 'n0', type: 'root', level: 0 });
    graph.addNode('__proto__', { node_id: 'n1', type: 'concept', level: 1, parent: 'Root' });
    graph.addEdge('Root', '__proto__', { title: 'odd name' });

    const adapter = new PersistenceAdapter(storage);
    const { treeId } = await adapter.save(graph, 'user-1', 'Root', false);
    const loaded = await adapter.load(treeId);

    expect(loaded?.graph.labels()).toEqual(['Root', '__proto__']);
    expect(loaded?.graph.hasEdge('Root', '__proto__')).toBe(true);
  });
});
