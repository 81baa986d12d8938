/**
 * Response Template Service
 *
 * Assembles the fast templated answer for a category:
 * validation statement, ranked coping techniques, encouragement.
 */

import { PromptCategory } from './types';
import { ResponseCatalog, DEFAULT_RESPONSE_CATALOG } from './ResponseCatalog';

export class ResponseTemplateService {
  private readonly TECHNIQUES_PER_RESPONSE = 2;

  constructor(private catalog: ResponseCatalog = DEFAULT_RESPONSE_CATALOG) { }

  /**
   * Build the structured response for a category
   */
  build(category: PromptCategory): string {
    const template = this.catalog.templates[category];
    const techniques = template.techniques
      .slice(0, this.TECHNIQUES_PER_RESPONSE)
      .map((technique, index) => `${index + 1}. ${technique}`);

    return [
      template.validation,
      '',
      this.catalog.strategiesHeading,
      ...techniques,
      '',
      template.encouragement,
    ].join('\n');
  }
}
