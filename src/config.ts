/**
 * Runtime configuration, read from the environment.
 *
 * Every knob has a default so an empty environment yields a working
 * (in-memory, no AI key) setup.
 */

import { join } from 'path';
import { z } from 'zod';
import type { NodeType } from './types/graph.js';

export const DEFAULT_PALETTE = ['#6200EA', '#7C4DFF', '#3949AB', '#1E88E5', '#00897B', '#43A047'];

export const DEFAULT_NODE_SIZES: Record<NodeType, number> = {
  root: 25,
  subtopic: 20,
  concept: 15,
  'sub-concept': 12,
};

export type RemovedTimePolicy = 'discard' | 'retain';

export type StorageBackend = 'sqlite' | 'json';

const intFromEnv = (fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const EnvSchema = z.object({
  ANTHROPIC_API_KEY: z.string().optional(),
  KNOWLEDGE_TREE_MODEL: z.string().min(1).default('claude-sonnet-4-20250514'),
  KNOWLEDGE_TREE_DATA_DIR: z.string().min(1).default(join(process.cwd(), 'data')),
  KNOWLEDGE_TREE_STORAGE: z.enum(['sqlite', 'json']).default('sqlite'),
  KNOWLEDGE_TREE_EVENT_LOG: z.string().optional(),
  KNOWLEDGE_TREE_PALETTE: z
    .string()
    .optional()
    .transform((raw) => {
      const colors = (raw ?? '').split(',').map((c) => c.trim()).filter(Boolean);
      return colors.length > 0 ? colors : DEFAULT_PALETTE;
    }),
  KNOWLEDGE_TREE_DEPTH: intFromEnv(1, 1, 3),
  KNOWLEDGE_TREE_AUTO_COUNT: intFromEnv(3, 1),
  KNOWLEDGE_TREE_MAX_LEVEL: intFromEnv(3, 1),
  KNOWLEDGE_TREE_EXPANSION_TIMEOUT_MS: intFromEnv(30_000, 0),
  KNOWLEDGE_TREE_MIN_DWELL_SECONDS: intFromEnv(30, 0),
  KNOWLEDGE_TREE_REMOVED_TIME: z.enum(['discard', 'retain']).default('discard'),
});

export interface EngineConfig {
  anthropicApiKey?: string;
  model: string;
  dataDir: string;
  storage: StorageBackend;
  eventLogPath?: string;
  palette: string[];
  nodeSizes: Record<NodeType, number>;
  explorationDepth: number;
  autoExpandCount: number;
  maxAutoLevel: number;
  expansionTimeoutMs: number;
  minDwellSeconds: number;
  removedTime: RemovedTimePolicy;
}

/** Throws a ZodError naming the offending variables when a value is malformed. */
export function loadConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
  // Empty strings count as unset
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );
  const parsed = EnvSchema.parse(cleaned);

  return {
    anthropicApiKey: parsed.ANTHROPIC_API_KEY,
    model: parsed.KNOWLEDGE_TREE_MODEL,
    dataDir: parsed.KNOWLEDGE_TREE_DATA_DIR,
    storage: parsed.KNOWLEDGE_TREE_STORAGE,
    eventLogPath: parsed.KNOWLEDGE_TREE_EVENT_LOG,
    palette: parsed.KNOWLEDGE_TREE_PALETTE,
    nodeSizes: { ...DEFAULT_NODE_SIZES },
    explorationDepth: parsed.KNOWLEDGE_TREE_DEPTH,
    autoExpandCount: parsed.KNOWLEDGE_TREE_AUTO_COUNT,
    maxAutoLevel: parsed.KNOWLEDGE_TREE_MAX_LEVEL,
    expansionTimeoutMs: parsed.KNOWLEDGE_TREE_EXPANSION_TIMEOUT_MS,
    minDwellSeconds: parsed.KNOWLEDGE_TREE_MIN_DWELL_SECONDS,
    removedTime: parsed.KNOWLEDGE_TREE_REMOVED_TIME,
  };
}
