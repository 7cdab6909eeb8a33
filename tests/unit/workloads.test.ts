/**
 * Unit Tests: prompt catalog, sizing and selection.
 */
import { describe, it, expect } from 'vitest';
import {
  agenticTemplates,
  allTemplates,
  createPrompt,
  estimateTokens,
  mcpTemplates,
  selectTemplate,
  targetTokensFor,
  workloadTag,
} from '../../src/workloads/index.js';

function sequence(...values: number[]): () => number {
  let i = 0;
  return () => values[i++ % values.length];
}

describe('catalog', () => {
  it('has two families of three templates', () => {
    expect(mcpTemplates.map(t => t.name)).toEqual(['file_search', 'data_analysis', 'code_review']);
    expect(agenticTemplates.map(t => t.name)).toEqual(['research_task', 'planning_task', 'problem_solving']);
  });

  it('keeps every context fraction within (0, 1]', () => {
    for (const template of allTemplates) {
      expect(template.contextFraction).toBeGreaterThan(0);
      expect(template.contextFraction).toBeLessThanOrEqual(1);
    }
  });

  it('freezes templates', () => {
    expect(Object.isFrozen(mcpTemplates[0])).toBe(true);
  });

  it('substitutes the context into the rendered prompt', () => {
    const template = mcpTemplates[0];
    const rendered = template.render({ context: 'src/only_file.py' });
    expect(rendered).toContain('src/only_file.py');
    expect(rendered).toContain('User request: Find all Python files');
  });

  it('tags workloads with their family', () => {
    expect(workloadTag(agenticTemplates[1])).toBe('Agentic_planning_task');
  });
});

describe('estimateTokens', () => {
  it('counts four characters per token, rounding down', () => {
    expect(estimateTokens('')).toBe(0);
    expect(estimateTokens('abc')).toBe(0);
    expect(estimateTokens('abcdefgh')).toBe(2);
    expect(estimateTokens('x'.repeat(401))).toBe(100);
  });
});

describe('createPrompt', () => {
  it('pads short prompts up to roughly the target', () => {
    const template = mcpTemplates[0];
    const base = template.render({ context: template.context });
    const target = estimateTokens(base) + 500;

    const prompt = createPrompt(template, target);

    expect(prompt.startsWith(`${base}\n\nAdditional context: detail `)).toBe(true);
    const tokens = estimateTokens(prompt);
    expect(tokens).toBeGreaterThan(target - 5);
    expect(tokens).toBeLessThan(target + 10);
  });

  it('leaves prompts already over the target untouched', () => {
    const template = agenticTemplates[2];
    expect(createPrompt(template, 1)).toBe(template.render({ context: template.context }));
  });
});

describe('selectTemplate', () => {
  it('uses the first draw for the family and the second for the template', () => {
    expect(selectTemplate(sequence(0.1, 0.0)).name).toBe('file_search');
    expect(selectTemplate(sequence(0.49, 0.5)).name).toBe('data_analysis');
    expect(selectTemplate(sequence(0.5, 0.0)).name).toBe('research_task');
    expect(selectTemplate(sequence(0.9, 0.99)).name).toBe('problem_solving');
  });

  it('spreads selections across both families', () => {
    const draws = sequence(0.1, 0.3, 0.7, 0.6, 0.45, 0.9);
    const families = new Set(Array.from({ length: 20 }, () => selectTemplate(draws).family));
    expect(families).toEqual(new Set(['MCP', 'Agentic']));
  });
});

describe('targetTokensFor', () => {
  it('scales the context fraction by a U(0.7, 1.0) factor', () => {
    const fileSearch = mcpTemplates[0];
    expect(targetTokensFor(fileSearch, 1000, () => 0)).toBe(210);
    expect(targetTokensFor(agenticTemplates[2], 1000, () => 0.99)).toBe(797);
  });

  it('stays within the documented bounds', () => {
    const template = agenticTemplates[0];
    for (const r of [0, 0.25, 0.5, 0.75, 0.999]) {
      const target = targetTokensFor(template, 6000, () => r);
      expect(target).toBeGreaterThanOrEqual(Math.floor(0.6 * 6000 * 0.7));
      expect(target).toBeLessThanOrEqual(0.6 * 6000);
    }
  });
});
