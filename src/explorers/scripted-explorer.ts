import type { AIExplorer } from '../types/explorer.js';

export interface ExplorerScript {
  /** exploreTopic responses by topic. */
  topics?: Record<string, unknown>;
  /** exploreSubtopic responses by subtopic. */
  subtopics?: Record<string, unknown>;
  /** getRelatedConcepts responses by topic. */
  related?: Record<string, unknown>;
  explanations?: Record<string, string>;
}

export interface ExplorerCall {
  method: keyof AIExplorer;
  args: Array<string | number>;
}

/**
 * Canned AIExplorer for offline runs and tests. Responses are returned as
 * given (the scheduler validates them); an Error value is thrown instead,
 * and a missing entry throws too.
 */
export class ScriptedExplorer implements AIExplorer {
  readonly calls: ExplorerCall[] = [];

  constructor(private readonly script: ExplorerScript) {}

  async exploreTopic(topic: string, depth: number): Promise<unknown> {
    this.calls.push({ method: 'exploreTopic', args: [topic, depth] });
    return respond(this.script.topics, topic, 'exploreTopic');
  }

  async exploreSubtopic(mainTopic: string, subtopic: string): Promise<unknown> {
    this.calls.push({ method: 'exploreSubtopic', args: [mainTopic, subtopic] });
    return respond(this.script.subtopics, subtopic, 'exploreSubtopic');
  }

  async getRelatedConcepts(topic: string, count: number): Promise<unknown> {
    this.calls.push({ method: 'getRelatedConcepts', args: [topic, count] });
    return respond(this.script.related, topic, 'getRelatedConcepts');
  }

  async getDetailedExplanation(topic: string): Promise<string> {
    this.calls.push({ method: 'getDetailedExplanation', args: [topic] });
    const text = this.script.explanations?.[topic];
    if (text === undefined) {
      throw new Error(`No scripted getDetailedExplanation for "${topic}"`);
    }
    return text;
  }
}

function respond(table: Record<string, unknown> | undefined, key: string, method: string): unknown {
  if (!table || !Object.hasOwn(table, key)) {
    throw new Error(`No scripted ${method} for "${key}"`);
  }
  const entry = table[key];
  if (entry instanceof Error) throw entry;
  return entry;
}
