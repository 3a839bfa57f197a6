import type { GraphStore } from '../graph/graph-store.js';
import type { TimeTracker } from '../graph/time-tracker.js';

/**
 * Indented outline of the tree, following `parent` links from the root.
 * Cross-links show up as `↔ label` under the node that links out.
 */
export function renderTree(graph: GraphStore, tracker?: TimeTracker): string[] {
  const root = graph.root();
  if (!root) return ['(empty)'];

  const lines: string[] = [];
  const visited = new Set<string>();

  const visit = (label: string, depth: number) => {
    if (visited.has(label)) return;
    visited.add(label);

    const indent = '  '.repeat(depth);
    const marker = depth === 0 ? '🌳' : '└─';
    const seconds = tracker ? tracker.elapsed(label) : 0;
    const time = seconds > 0 ? ` (${formatSeconds(seconds)})` : '';
    lines.push(`${indent}${marker} ${label}${time}`);

    const children = graph.children(label);
    const parent = graph.getNode(label)?.parent;
    for (const edge of graph.edges()) {
      if (edge.source === label && edge.target !== parent && !children.includes(edge.target)) {
        lines.push(`${indent}  ↔ ${edge.target}`);
      }
    }
    for (const child of children) {
      visit(child, depth + 1);
    }
  };

  visit(root.label, 0);
  return lines;
}

export function formatSeconds(seconds: number): string {
  const whole = Math.floor(seconds);
  if (whole < 60) return `${whole}s`;
  const minutes = Math.floor(whole / 60);
  const rest = whole % 60;
  return rest === 0 ? `${minutes}m` : `${minutes}m ${rest}s`;
}
