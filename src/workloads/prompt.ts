import { uniform } from '../timing.js';
import type { RandomFn } from '../timing.js';
import { agenticTemplates, mcpTemplates } from './catalog.js';
import type { PromptTemplate } from './catalog.js';

const CHARS_PER_TOKEN = 4;
const PADDING_WORD = 'detail ';

export interface PromptProvider {
  createPrompt(template: PromptTemplate, targetTokens: number): string;
}

export interface WorkloadCatalog {
  mcp: readonly PromptTemplate[];
  agentic: readonly PromptTemplate[];
}

export const defaultCatalog: WorkloadCatalog = { mcp: mcpTemplates, agentic: agenticTemplates };

/** Rough token count at ~4 characters per token; not a real tokenizer. */
export function estimateTokens(text: string): number {
  return Math.floor(text.length / CHARS_PER_TOKEN);
}

/**
 * Renders the template and pads it with filler until the estimate reaches
 * `targetTokens`. Prompts already larger than the target are left alone.
 */
export function createPrompt(template: PromptTemplate, targetTokens: number): string {
  const prompt = template.render({ context: template.context });
  const current = estimateTokens(prompt);
  if (current >= targetTokens) {
    return prompt;
  }

  const charsNeeded = (targetTokens - current) * CHARS_PER_TOKEN;
  const padding = 'Additional context: ' + PADDING_WORD.repeat(Math.floor(charsNeeded / PADDING_WORD.length));
  return `${prompt}\n\n${padding}`;
}

export const paddedPromptProvider: PromptProvider = { createPrompt };

/** Picks a family with equal weight, then a template uniformly within it. */
export function selectTemplate(random: RandomFn, catalog: WorkloadCatalog = defaultCatalog): PromptTemplate {
  const family = random() < 0.5 ? catalog.mcp : catalog.agentic;
  const index = Math.min(Math.floor(random() * family.length), family.length - 1);
  return family[index];
}

export function targetTokensFor(template: PromptTemplate, maxContextTokens: number, random: RandomFn): number {
  return Math.floor(template.contextFraction * maxContextTokens * uniform(random, 0.7, 1.0));
}
