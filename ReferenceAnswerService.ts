/**
 * Reference Answer Service
 *
 * Baseline answer generator for the evaluator. Candidates are judged against it.
 */

import { ILogger, ConsoleLogger } from './utils/ILogger';
import { IInferenceEngine, IReferenceGenerator } from './interfaces/IInferenceEngine';

export class ReferenceAnswerService implements IReferenceGenerator {
  private logger: ILogger;

  constructor(
    private engine: IInferenceEngine,
    private maxNewTokens: number = 1000,
    logger?: ILogger
  ) {
    this.logger = logger || new ConsoleLogger('ReferenceAnswerService');
  }

  async generate(prompt: string): Promise<string> {
    const result = await this.engine.generate({ input: prompt, maxNewTokens: this.maxNewTokens });
    const text = result.text.startsWith(prompt) ? result.text.slice(prompt.length) : result.text;
    const reference = text.trim();

    if (!reference) {
      throw new Error('Reference generator returned an empty answer');
    }

    this.logger.debug('Reference answer generated', { chars: reference.length });
    return reference;
  }
}
