/**
 * Claude-backed AIExplorer
 *
 * Asks for strict JSON and validates it before handing it back. Any failure
 * (network, refusal, bad JSON, schema mismatch) is thrown; the scheduler turns
 * it into an ExpansionFailedError.
 */

import Anthropic from '@anthropic-ai/sdk';
import {
  ConceptListSchema, SubtopicExplorationSchema, TopicExplorationSchema,
  type AIExplorer, type ConceptList, type SubtopicExploration, type TopicExploration
} from '../types/explorer.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('AnthropicExplorer');

const JSON_ONLY = 'Only return the JSON data with no additional text or explanation.';

function topicPrompt(topic: string, depth: number): string {
  if (depth <= 1) {
    return `Create a precise, to-the-point structured exploration of the topic "${topic}". No historical context.
Return a JSON object with the following structure:
{
  "topic": "${topic}",
  "summary": "A 2-3 sentence summary of the topic",
  "related_concepts": [
    { "name": "Related concept", "relation": "How it relates to the main topic", "summary": "Brief 1-sentence explanation" }
  ]
}
Include up to 3 related concepts.
${JSON_ONLY}`;
  }

  return `Create a detailed exploration of the topic "${topic}". No historical context.
Return a JSON object with the following structure:
{
  "topic": "${topic}",
  "summary": "A 4-5 sentence detailed explanation of the topic",
  "key_points": ["Point 1", "Point 2", "Point 3"],
  "related_concepts": [
    { "name": "Related concept", "relation": "How it relates to the main topic", "summary": "2-3 sentence explanation" }
  ],
  "subtopics": [
    { "name": "Subtopic", "summary": "Brief explanation" }
  ]
}
Include up to 7 related concepts and up to 5 subtopics.
${JSON_ONLY}`;
}

function subtopicPrompt(mainTopic: string, subtopic: string): string {
  return `Create a detailed exploration of the subtopic "${subtopic}" related to "${mainTopic}".
Return a JSON object with the following structure:
{
  "subtopic": "${subtopic}",
  "main_topic": "${mainTopic}",
  "summary": "A 3-4 sentence explanation of how this subtopic relates to the main topic",
  "key_points": ["Point 1", "Point 2", "Point 3"],
  "related_concepts": [
    { "name": "Related concept", "relation": "How it relates to this subtopic", "summary": "Brief explanation" }
  ]
}
Include up to 4 related concepts.
${JSON_ONLY}`;
}

function relatedPrompt(topic: string, count: number): string {
  return `List ${count} concepts closely related to "${topic}".
Return a JSON array where each element has the structure:
{ "name": "Concept", "relation": "How it relates to ${topic}", "summary": "Brief 1-sentence explanation" }
${JSON_ONLY}`;
}

function explanationPrompt(topic: string): string {
  return `Provide a detailed explanation of the topic "${topic}".
Include:
- A clear definition or introduction
- Key concepts and principles
- Important applications or examples
- Historical context if relevant

Format your response in markdown for readability.`;
}

/** Strips a ```json fence if the model added one. */
export function extractJson(text: string): unknown {
  let jsonStr = text;
  const jsonMatch = jsonStr.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (jsonMatch) jsonStr = jsonMatch[1];
  return JSON.parse(jsonStr.trim());
}

export class AnthropicExplorer implements AIExplorer {
  private client: Anthropic;
  private model: string;
  private totalTokensUsed: number = 0;

  constructor(apiKey?: string, model: string = 'claude-sonnet-4-20250514') {
    this.client = new Anthropic({
      apiKey: apiKey || process.env.ANTHROPIC_API_KEY
    });
    this.model = model;
  }

  async exploreTopic(topic: string, depth: number): Promise<TopicExploration> {
    const text = await this.ask(topicPrompt(topic, depth), 2048);
    return TopicExplorationSchema.parse(extractJson(text));
  }

  async exploreSubtopic(mainTopic: string, subtopic: string): Promise<SubtopicExploration> {
    const text = await this.ask(subtopicPrompt(mainTopic, subtopic), 2048);
    return SubtopicExplorationSchema.parse(extractJson(text));
  }

  async getRelatedConcepts(topic: string, count: number): Promise<ConceptList> {
    const text = await this.ask(relatedPrompt(topic, count), 1024);
    return ConceptListSchema.parse(extractJson(text)).slice(0, count);
  }

  async getDetailedExplanation(topic: string): Promise<string> {
    return this.ask(explanationPrompt(topic), 4096);
  }

  getUsageStats() {
    return { totalTokens: this.totalTokensUsed };
  }

  private async ask(prompt: string, maxTokens: number): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: maxTokens,
      messages: [{ role: 'user', content: prompt }]
    });

    this.totalTokensUsed += response.usage.input_tokens + response.usage.output_tokens;

    const content = response.content[0];
    if (!content || content.type !== 'text') {
      log.warn(`Unexpected response block for model ${this.model}`);
      throw new Error('Unexpected response type');
    }
    return content.text;
  }
}
