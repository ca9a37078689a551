/**
 * Extraction prompts
 *
 * @module services/llm/prompts
 */

import type { ExtractionType } from '../../models/extraction.js';
import type { TextUnit } from '../../models/document.js';

export const MONEY_SYSTEM_PROMPT = [
  'You extract monetary amounts from excerpts of a call for proposals document.',
  'For every amount of money mentioned in the text, return one item with:',
  '- value: the amount as a plain number (e.g. "EUR 1.5 million" -> 1500000, "EUR 500,000" -> 500000)',
  '- currency: the currency token as written (e.g. "EUR", "euro", "€")',
  '- context: a short phrase saying what the amount refers to (budget, grant size, co-financing...)',
  '- original_sentence: the exact sentence the amount appears in, copied verbatim',
  'Return an empty items list when the text mentions no amount. Do not invent amounts.',
].join('\n');

export const ENTITY_SYSTEM_PROMPT = [
  'You read the consortium composition section of a call for proposals document.',
  'For every rule on the minimum number of participating entities, return one item with:',
  '- organization_type: the kinds of organisation the rule applies to (e.g. "coordinator", "beneficiaries")',
  '- min_entities: the minimum number(s) of entities required, as integers',
  'Return an empty items list when the text states no such rule.',
].join('\n');

export const DEFAULT_SYSTEM_PROMPTS: Record<ExtractionType, string> = {
  money: MONEY_SYSTEM_PROMPT,
  entity: ENTITY_SYSTEM_PROMPT,
};

/**
 * Render the prompt for one batch: instructions followed by the units,
 * numbered from 1 in batch order.
 */
export function renderBatchPrompt(systemPrompt: string, units: readonly TextUnit[]): string {
  const body = units.map((unit, i) => `[${i + 1}] ${unit.text}`).join('\n\n');
  return `${systemPrompt}\n\nRespond with JSON only.\n\nTEXT:\n${body}`;
}
