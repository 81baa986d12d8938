/**
 * Prompt Classifier
 *
 * Pure keyword classification of a prompt into (category, urgency).
 * Matching is case-insensitive substring matching on the normalized prompt.
 */

import { PromptClassification } from './types';
import { ResponseCatalog, DEFAULT_RESPONSE_CATALOG } from './ResponseCatalog';

/**
 * Normalize a prompt for matching and cache keys:
 * typographic apostrophes folded, whitespace collapsed, lowercased.
 */
export function normalizePrompt(prompt: string): string {
  return prompt
    .replace(/[‘’ʼ]/g, "'")
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

export function findCrisisKeyword(
  prompt: string,
  catalog: ResponseCatalog = DEFAULT_RESPONSE_CATALOG
): string | undefined {
  const normalized = normalizePrompt(prompt);
  return catalog.crisisKeywords.find((keyword) => normalized.includes(keyword));
}

export function classifyPrompt(
  prompt: string,
  catalog: ResponseCatalog = DEFAULT_RESPONSE_CATALOG
): PromptClassification {
  const normalized = normalizePrompt(prompt);

  let category: PromptClassification['category'] = 'general';
  let categoryKeyword: string | undefined;
  for (const entry of catalog.categories) {
    const keyword = entry.keywords.find((candidate) => normalized.includes(candidate));
    if (keyword) {
      category = entry.category;
      categoryKeyword = keyword;
      break;
    }
  }

  const crisisKeyword = catalog.crisisKeywords.find((keyword) => normalized.includes(keyword));
  if (crisisKeyword) {
    return { category, urgency: 'crisis', matchedKeyword: crisisKeyword };
  }

  return { category, urgency: 'normal', matchedKeyword: categoryKeyword };
}

export class PromptClassifier {
  constructor(private catalog: ResponseCatalog = DEFAULT_RESPONSE_CATALOG) { }

  classify(prompt: string): PromptClassification {
    return classifyPrompt(prompt, this.catalog);
  }

  isCrisis(prompt: string): boolean {
    return findCrisisKeyword(prompt, this.catalog) !== undefined;
  }
}
