import { describe, expect, it } from 'vitest';
import type { SessionRecord } from '../types/graph.js';
import { InMemoryTreeStorage } from './memory-storage.js';

function session(topic: string, day: number, userId = 'user-1'): SessionRecord {
  return {
    user_id: userId,
    topic,
    tree_id: `tree_${topic}`,
    nodes_explored: [topic],
    time_spent: 45,
    timestamp: new Date(Date.UTC(2024, 0, day)),
  };
}

describe('InMemoryTreeStorage', () => {
  it('replaces the matching document on update', async () => {
    let tick = 0;
    const storage = new InMemoryTreeStorage(() => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)));

    const id = await storage.saveTree('user-1', 'Graph Theory', { 'Graph Theory': { type: 'root' } }, {}, false);
    const sameId = await storage.saveTree('user-1', 'Graph Theory', { Vertex: { type: 'concept' } }, {}, true);

    const doc = await storage.getTree('user-1', 'Graph Theory');
    expect(sameId).toBe(id);
    expect(doc?.nodes).toEqual({ Vertex: { type: 'concept' } });
    expect(doc?.created_at.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(doc?.updated_at.toISOString()).toBe('2024-01-01T00:00:01.000Z');
  });

  it('inserts when update finds nothing, and always without update', async () => {
    const storage = new InMemoryTreeStorage();

    await storage.saveTree('user-1', 'Graph Theory', {}, {}, true);
    await storage.saveTree('user-1', 'Graph Theory', {}, {}, false);
    expect(storage.treeCount).toBe(2);
  });

  it('hands out copies', async () => {
    const storage = new InMemoryTreeStorage();
    const id = await storage.saveTree('user-1', 'Graph Theory', { Vertex: { summary: 'A point.' } }, {}, false);

    const copy = await storage.getTreeById(id);
    if (copy) copy.nodes.Vertex.summary = 'changed';
    expect((await storage.getTreeById(id))?.nodes.Vertex.summary).toBe('A point.');
  });

  it('lists and searches one user at a time', async () => {
    const storage = new InMemoryTreeStorage();
    await storage.saveTree('user-1', 'Graph Theory', {}, {}, false);
    await storage.saveTree('user-1', 'Cell Biology', {}, {}, false);
    await storage.saveTree('user-2', 'Graph Coloring', {}, {}, false);

    expect((await storage.listTrees('user-1')).map(t => t.topic)).toEqual(['Graph Theory', 'Cell Biology']);
    expect((await storage.searchTopics('user-1', ' GRAPH ')).map(t => t.topic)).toEqual(['Graph Theory']);
    expect(await storage.searchTopics('user-1', 'chemistry')).toEqual([]);
  });

  it('returns learning history newest first, capped at the limit', async () => {
    const storage = new InMemoryTreeStorage();
    for (let day = 1; day <= 12; day++) {
      await storage.logSession(session(`topic-${day}`, day));
    }
    await storage.logSession(session('elsewhere', 20, 'user-2'));

    const history = await storage.getLearningHistory('user-1');
    expect(history).toHaveLength(10);
    expect(history[0].topic).toBe('topic-12');
    expect(history[9].topic).toBe('topic-3');
    expect((await storage.getLearningHistory('user-1', 2)).map(r => r.topic)).toEqual(['topic-12', 'topic-11']);
    expect(history[0].id).toMatch(/^session_/);
  });
});
