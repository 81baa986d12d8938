/**
 * Synthetic Prompt Source
 *
 * Draws one evaluation prompt per round from a fixed pool
 * (data/synthetic-prompts.json by default).
 */

import promptData from './data/synthetic-prompts.json';
import { IPromptSource } from './interfaces/IPromptSource';

export class SyntheticPromptSource implements IPromptSource {
  private prompts: string[];

  constructor(
    prompts: string[] = promptData.prompts,
    private random: () => number = Math.random
  ) {
    this.prompts = prompts.filter((prompt) => prompt.trim().length > 0);
    if (this.prompts.length === 0) {
      throw new Error('Synthetic prompt source needs at least one prompt');
    }
  }

  async next(): Promise<string> {
    const index = Math.min(this.prompts.length - 1, Math.floor(this.random() * this.prompts.length));
    return this.prompts[index];
  }
}
