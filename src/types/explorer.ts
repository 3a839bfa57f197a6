/**
 * AI collaborator contract
 *
 * The engine never trusts free-form JSON from a model. Every response goes
 * through one of the schemas below; anything that does not fit is rejected
 * before the graph is touched.
 */

import { z } from 'zod';

export const ConceptSchema = z.object({
  name: z.string().trim().min(1),
  relation: z.string().default(''),
  summary: z.string().default(''),
});

export const SubtopicSummarySchema = z.object({
  name: z.string().trim().min(1),
  summary: z.string().default(''),
});

export const TopicExplorationSchema = z.object({
  topic: z.string(),
  summary: z.string(),
  key_points: z.array(z.string()).optional(),
  related_concepts: z.array(ConceptSchema),
  subtopics: z.array(SubtopicSummarySchema).optional(),
});

export const SubtopicExplorationSchema = z.object({
  subtopic: z.string(),
  main_topic: z.string(),
  summary: z.string(),
  key_points: z.array(z.string()).default([]),
  related_concepts: z.array(ConceptSchema),
});

export const ConceptListSchema = z.array(ConceptSchema);

export type Concept = z.infer<typeof ConceptSchema>;
export type SubtopicSummary = z.infer<typeof SubtopicSummarySchema>;
export type TopicExploration = z.infer<typeof TopicExplorationSchema>;
export type SubtopicExploration = z.infer<typeof SubtopicExplorationSchema>;
export type ConceptList = z.infer<typeof ConceptListSchema>;

/**
 * Capability set the scheduler consumes. Implementations may throw; they may
 * also return unvalidated data, which the scheduler parses itself.
 */
export interface AIExplorer {
  exploreTopic(topic: string, depth: number): Promise<unknown>;
  exploreSubtopic(mainTopic: string, subtopic: string): Promise<unknown>;
  getRelatedConcepts(topic: string, count: number): Promise<unknown>;
  getDetailedExplanation(topic: string): Promise<string>;
}
