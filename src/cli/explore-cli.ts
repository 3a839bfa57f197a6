#!/usr/bin/env node
/**
 * Knowledge Tree CLI
 *
 * Explore a topic as a growing concept graph, saved under the data directory
 * (SQLite by default, JSON files with KNOWLEDGE_TREE_STORAGE=json).
 *
 * Usage:
 *   npm run explore -- explore "<topic>" [--depth 1-3] [--auto <steps>] [--user <id>]
 *   npm run explore -- expand "<topic>" "<node>" [--user <id>]
 *   npm run explore -- show "<topic>" [--user <id>]
 *   npm run explore -- explain "<topic>" "<node>" [--user <id>]
 *   npm run explore -- history [--limit <n>] [--user <id>]
 *   npm run explore -- search <query> [--user <id>]
 */

import { join } from 'path';
import { loadConfig, type EngineConfig } from '../config.js';
import { ExpansionFailedError, describeError } from '../errors.js';
import { AnthropicExplorer } from '../explorers/anthropic-explorer.js';
import { JsonFileTreeStorage } from '../persistence/json-file-storage.js';
import { SqliteTreeStorage } from '../persistence/sqlite-storage.js';
import type { TreeStorage } from '../persistence/storage.js';
import { ExplorationSession } from '../session/exploration-session.js';
import { setEventLogPath } from '../utils/logger.js';
import { formatSeconds, renderTree } from './render.js';

function printUsage() {
  console.log(`
Knowledge Tree CLI - Explore topics as a concept graph

Commands:
  explore "<topic>"           Start a new exploration of a topic
    --depth <1-3>             Exploration depth for the root (default from config)
    --auto <steps>            Auto-expand breadth-first for up to <steps> nodes
  expand "<topic>" "<node>"   Expand one node of a saved topic
  show "<topic>"              Print a saved topic as a tree
  explain "<topic>" "<node>"  Print a detailed markdown explanation of a node
  history                     Recent learning sessions
    --limit <n>               How many (default 10)
  search <query>              Saved topics matching the query

Options:
  --user <id>                 User the trees belong to (default: local)

Examples:
  npm run explore -- explore "Graph Theory"
  npm run explore -- explore "Graph Theory" --depth 2 --auto 5
  npm run explore -- expand "Graph Theory" "Euler Path"
  npm run explore -- history --limit 5
`);
}

function readOption(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  return idx !== -1 ? args[idx + 1] : undefined;
}

function readIntOption(args: string[], name: string): number | undefined {
  const raw = readOption(args, name);
  if (raw === undefined) return undefined;
  const value = Number.parseInt(raw, 10);
  if (!Number.isInteger(value) || value < 0) {
    throw new Error(`${name} expects a non-negative integer, got "${raw}"`);
  }
  return value;
}

function positional(args: string[]): string[] {
  const result: string[] = [];
  for (let i = 1; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      i++;
      continue;
    }
    result.push(args[i]);
  }
  return result;
}

function openStorage(config: EngineConfig): TreeStorage {
  return config.storage === 'json'
    ? new JsonFileTreeStorage(config.dataDir)
    : new SqliteTreeStorage(join(config.dataDir, 'knowledge-tree.db'));
}

function openSession(config: EngineConfig, userId: string, depth?: number): ExplorationSession {
  return new ExplorationSession({
    userId,
    explorer: new AnthropicExplorer(config.anthropicApiKey, config.model),
    storage: openStorage(config),
    settings: {
      palette: config.palette,
      nodeSizes: config.nodeSizes,
      explorationDepth: depth ?? config.explorationDepth,
      autoExpandCount: config.autoExpandCount,
      maxAutoLevel: config.maxAutoLevel,
      expansionTimeoutMs: config.expansionTimeoutMs,
      minDwellSeconds: config.minDwellSeconds,
      removedTime: config.removedTime,
    },
  });
}

function printTree(session: ExplorationSession) {
  console.log('');
  for (const line of renderTree(session.getGraph(), session.getTracker())) {
    console.log(`  ${line}`);
  }
  const stats = session.getGraph().getStats();
  console.log(`\n  ${stats.nodeCount} nodes, ${stats.edgeCount} edges, depth ${stats.maxLevel}\n`);
}

async function main() {
  const args = process.argv.slice(2);

  if (args.length === 0 || args[0] === 'help' || args[0] === '--help') {
    printUsage();
    return;
  }

  const config = loadConfig();
  if (config.eventLogPath) setEventLogPath(config.eventLogPath);

  const command = args[0];
  const userId = readOption(args, '--user') ?? 'local';
  const [first, second] = positional(args);

  switch (command) {
    case 'explore': {
      if (!first) {
        console.error('❌ Usage: explore "<topic>"');
        return;
      }
      const depth = readIntOption(args, '--depth');
      const autoSteps = readIntOption(args, '--auto');
      const session = openSession(config, userId, depth);

      console.log(`🔍 Exploring ${first}...`);
      const { delta, saveError } = await session.startTopic(first);
      console.log(`✅ ${delta.addedNodes.length} concepts added`);
      if (saveError) console.error(`⚠️  ${saveError.message}`);

      if (autoSteps && autoSteps > 0) {
        session.setAutoExpand(true);
        const report = await session.runAutoExpand(autoSteps);
        const added = report.deltas.reduce((sum, d) => sum + d.addedNodes.length, 0);
        console.log(`🔄 Auto-expanded ${report.deltas.length} node(s), ${added} new concepts, ${report.remaining} still queued`);
        for (const failure of report.failed) {
          console.error(`  ⚠️  ${failure.message}`);
        }
      }

      printTree(session);
      await session.end();
      break;
    }

    case 'expand': {
      if (!first || !second) {
        console.error('❌ Usage: expand "<topic>" "<node>"');
        return;
      }
      const session = openSession(config, userId);
      if (!(await session.reopenTopic(first))) {
        console.error(`❌ No saved tree for "${first}"`);
        return;
      }
      session.select(second);
      const { delta } = await session.expand(second);
      if (delta.addedNodes.length === 0 && delta.addedEdges.length === 0) {
        console.log(`ℹ️  "${second}" was already expanded`);
      } else {
        console.log(`✅ Added ${delta.addedNodes.join(', ') || 'no new nodes'}`);
      }
      printTree(session);
      await session.end();
      break;
    }

    case 'show': {
      if (!first) {
        console.error('❌ Usage: show "<topic>"');
        return;
      }
      const session = openSession(config, userId);
      if (!(await session.reopenTopic(first))) {
        console.error(`❌ No saved tree for "${first}"`);
        return;
      }
      printTree(session);
      break;
    }

    case 'explain': {
      if (!first || !second) {
        console.error('❌ Usage: explain "<topic>" "<node>"');
        return;
      }
      const session = openSession(config, userId);
      if (!(await session.reopenTopic(first))) {
        console.error(`❌ No saved tree for "${first}"`);
        return;
      }
      console.log(await session.explain(second));
      await session.end();
      break;
    }

    case 'history': {
      const limit = readIntOption(args, '--limit');
      const storage = openStorage(config);
      const sessions = await storage.getLearningHistory(userId, limit);

      console.log(`\n📚 Recent sessions (${sessions.length}):\n`);
      for (const record of sessions) {
        console.log(`  ${record.timestamp.toISOString()}  ${record.topic}`);
        console.log(`    └─ ${formatSeconds(record.time_spent)}, ${record.nodes_explored.length} node(s): ${record.nodes_explored.join(', ')}`);
      }
      console.log('');
      break;
    }

    case 'search': {
      if (!first) {
        console.error('❌ Usage: search <query>');
        return;
      }
      const storage = openStorage(config);
      const trees = await storage.searchTopics(userId, first);

      console.log(`\n🔍 Search results for "${first}":\n`);
      for (const tree of trees) {
        console.log(`  - ${tree.topic} (${Object.keys(tree.nodes).length} nodes, updated ${tree.updated_at.toISOString()})`);
      }
      if (trees.length === 0) {
        console.log('  No matching topics found');
      }
      console.log('');
      break;
    }

    default:
      console.error(`❌ Unknown command: ${command}`);
      printUsage();
  }
}

main().catch((err: unknown) => {
  if (err instanceof ExpansionFailedError) {
    console.error(`❌ ${err.message} (the node stays collapsed; try again)`);
  } else {
    console.error(`❌ ${describeError(err)}`);
  }
  process.exitCode = 1;
});
