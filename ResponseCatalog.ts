/**
 * Response Catalog
 *
 * Keyword sets, templates and fixed texts the worker pipeline draws on.
 * Loaded from data/response-catalog.json.
 */

import catalogData from './data/response-catalog.json';
import { PROMPT_CATEGORIES, PromptCategory } from './types';

export interface ResponseTemplate {
  validation: string;
  techniques: string[];       // Ranked, most relevant first
  encouragement: string;
}

export interface CategoryKeywords {
  category: PromptCategory;
  keywords: string[];
}

export interface QualityMarkers {
  empathyMarkers: string[];
  actionMarkers: string[];
  denylist: string[];
  sentenceTerminators: string[];
}

export interface ResponseCatalog {
  crisisKeywords: string[];
  categories: CategoryKeywords[];   // Classification order; first match wins
  templates: Record<PromptCategory, ResponseTemplate>;
  strategiesHeading: string;
  quality: QualityMarkers;
  crisisResponse: string;
  fallbackResponse: string;
  systemInstruction: string;
  shortResponseSuffix: string;
  empathyOpener: string;
  rolePrefixes: string[];
}

function toCategory(name: string): PromptCategory {
  const category = PROMPT_CATEGORIES.find((candidate) => candidate === name);
  if (!category || category === 'general') {
    throw new Error(`Unknown keyword category in response catalog: ${name}`);
  }
  return category;
}

export function loadResponseCatalog(): ResponseCatalog {
  return {
    ...catalogData,
    categories: catalogData.categories.map((entry) => ({
      category: toCategory(entry.category),
      keywords: entry.keywords.map((keyword) => keyword.toLowerCase()),
    })),
    crisisKeywords: catalogData.crisisKeywords.map((keyword) => keyword.toLowerCase()),
  };
}

export const DEFAULT_RESPONSE_CATALOG: ResponseCatalog = loadResponseCatalog();
