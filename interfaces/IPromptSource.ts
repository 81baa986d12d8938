/**
 * Prompt Source Interface
 */

export interface IPromptSource {
    next(): Promise<string>;
}
