import { join } from 'path';
import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { DEFAULT_NODE_SIZES, DEFAULT_PALETTE, loadConfig } from './config.js';

describe('loadConfig', () => {
  it('falls back to defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      anthropicApiKey: undefined,
      model: 'claude-sonnet-4-20250514',
      dataDir: join(process.cwd(), 'data'),
      storage: 'sqlite',
      eventLogPath: undefined,
      palette: DEFAULT_PALETTE,
      nodeSizes: DEFAULT_NODE_SIZES,
      explorationDepth: 1,
      autoExpandCount: 3,
      maxAutoLevel: 3,
      expansionTimeoutMs: 30_000,
      minDwellSeconds: 30,
      removedTime: 'discard',
    });
  });

  it('reads overrides', () => {
    const config = loadConfig({
      ANTHROPIC_API_KEY: 'test-secret',
      KNOWLEDGE_TREE_DATA_DIR: '/tmp/trees',
      KNOWLEDGE_TREE_STORAGE: 'json',
      KNOWLEDGE_TREE_PALETTE: ' #111111, #222222 ,',
      KNOWLEDGE_TREE_DEPTH: '2',
      KNOWLEDGE_TREE_MAX_LEVEL: '5',
      KNOWLEDGE_TREE_EXPANSION_TIMEOUT_MS: '0',
      KNOWLEDGE_TREE_REMOVED_TIME: 'retain',
    });

    expect(config).toMatchObject({
      anthropicApiKey: 'test-secret',
      dataDir: '/tmp/trees',
      storage: 'json',
      palette: ['#111111', '#222222'],
      explorationDepth: 2,
      maxAutoLevel: 5,
      expansionTimeoutMs: 0,
      removedTime: 'retain',
    });
  });

  it('treats empty strings as unset', () => {
    expect(loadConfig({ KNOWLEDGE_TREE_DEPTH: '', KNOWLEDGE_TREE_MODEL: '' })).toMatchObject({
      explorationDepth: 1,
      model: 'claude-sonnet-4-20250514',
    });
  });

  it('rejects values out of range', () => {
    expect(() => loadConfig({ KNOWLEDGE_TREE_DEPTH: '5' })).toThrow(ZodError);
    expect(() => loadConfig({ KNOWLEDGE_TREE_AUTO_COUNT: 'many' })).toThrow(ZodError);
    expect(() => loadConfig({ KNOWLEDGE_TREE_REMOVED_TIME: 'keep' })).toThrow(ZodError);
    expect(() => loadConfig({ KNOWLEDGE_TREE_STORAGE: 'mongo' })).toThrow(ZodError);
  });
});
