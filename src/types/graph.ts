/**
 * Core types for the knowledge tree
 *
 * A topic exploration is a graph of named concepts:
 * - one root node (the topic the user typed)
 * - concept / subtopic nodes produced by expanding the root
 * - sub-concept nodes produced by expanding anything deeper
 *
 * Labels are the identity key. Everything else is an attribute.
 */

export type NodeType =
  | 'root'          // The topic the exploration started from
  | 'concept'       // Related concept of the root
  | 'subtopic'      // Subtopic of the root (deeper exploration only)
  | 'sub-concept';  // Anything produced by expanding a non-root node

export interface NodeAttributes {
  node_id: string;
  type: NodeType;
  level: number;           // root = 0, child = parent + 1
  parent?: string;         // Label of the node that produced this one
  size: number;
  color: string;
  title: string;           // Hover text
  summary: string;
  relation?: string;       // How it relates to its parent, as the AI phrased it
  [extra: string]: unknown;
}

export interface EdgeAttributes {
  title: string;
  weight: number;          // >= 1
  [extra: string]: unknown;
}

export interface ConceptNode {
  label: string;
  attributes: NodeAttributes;
}

export interface ConceptEdge {
  source: string;
  target: string;
  attributes: EdgeAttributes;
}

/** Result of one expansion call. `addedNodes` is the delta. */
export interface ExpansionDelta {
  label: string;
  addedNodes: string[];
  addedEdges: Array<{ source: string; target: string }>;
}

export interface GraphStats {
  nodeCount: number;
  edgeCount: number;
  nodesByType: Record<string, number>;
  maxLevel: number;
}

/**
 * Flat storage shape, one per (user_id, topic).
 * Edge keys are `${source}_${target}`.
 */
export interface TreeDocument {
  id: string;
  user_id: string;
  topic: string;
  nodes: Record<string, Record<string, unknown>>;
  edges: Record<string, Record<string, unknown>>;
  created_at: Date;
  updated_at: Date;
}

export interface SessionRecord {
  id?: string;
  user_id: string;
  topic: string;
  tree_id: string;
  nodes_explored: string[];
  time_spent: number;      // whole seconds
  timestamp: Date;
}
