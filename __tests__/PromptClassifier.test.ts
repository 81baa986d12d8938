/**
 * PromptClassifier Tests
 */

import { describe, it, expect } from '@jest/globals';
import { PromptClassifier, classifyPrompt, normalizePrompt } from '../PromptClassifier';
import { RequestPriorityService } from '../RequestPriorityService';

describe('PromptClassifier', () => {
  const classifier = new PromptClassifier();

  describe('normalizePrompt', () => {
    it('should fold apostrophes, collapse whitespace and lowercase', () => {
      expect(normalizePrompt('  I Don’t   KNOW\n')).toBe("i don't know");
    });
  });

  describe('classify', () => {
    it('should match categories by keyword', () => {
      expect(classifier.classify('How can I manage my anxiety?')).toEqual({
        category: 'anxiety',
        urgency: 'normal',
        matchedKeyword: 'anxiety',
      });
      expect(classifier.classify('I feel so STRESSED at work').category).toBe('stress');
      expect(classifier.classify('My partner and I keep fighting').category).toBe('relationship');
      expect(classifier.classify('I lie awake and cannot sleep at night').category).toBe('sleep');
    });

    it('should take the first matching category in catalog order', () => {
      // "worried" (anxiety) is checked before "sleep"
      expect(classifier.classify('I am worried I will never sleep again').category).toBe('anxiety');
    });

    it('should default to general', () => {
      expect(classifier.classify('Tell me about the weather')).toEqual({
        category: 'general',
        urgency: 'normal',
        matchedKeyword: undefined,
      });
    });

    it('should flag crisis keywords regardless of category', () => {
      expect(classifier.classify('I want to die')).toEqual({
        category: 'general',
        urgency: 'crisis',
        matchedKeyword: 'want to die',
      });
    });

    it('should detect crisis phrases written with typographic apostrophes', () => {
      const result = classifyPrompt('I don’t want to live anymore');
      expect(result.urgency).toBe('crisis');
      expect(result.matchedKeyword).toBe("don't want to live");
    });

    it('should be deterministic', () => {
      const prompt = 'Work pressure keeps me up';
      expect(classifier.classify(prompt)).toEqual(classifier.classify(prompt));
    });
  });

  describe('isCrisis', () => {
    it('should match case-insensitively', () => {
      expect(classifier.isCrisis('Thinking about SELF-HARM lately')).toBe(true);
      expect(classifier.isCrisis('Thinking about my exams')).toBe(false);
    });
  });
});

describe('RequestPriorityService', () => {
  const service = new RequestPriorityService();

  it('should use the requester stake as priority', () => {
    expect(service.priority('How do I relax?', 3)).toBe(3);
  });

  it('should double the priority of crisis prompts', () => {
    expect(service.priority('I want to die', 3)).toBe(6);
  });

  it('should treat missing, negative and non-finite stake as zero', () => {
    expect(service.priority('How do I relax?')).toBe(0);
    expect(service.priority('How do I relax?', -5)).toBe(0);
    expect(service.priority('How do I relax?', Number.NaN)).toBe(0);
    expect(service.priority('I want to die', null)).toBe(0);
  });
});
