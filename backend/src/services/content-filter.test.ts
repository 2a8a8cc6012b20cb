import { describe, it, expect } from 'vitest';
import {
  buildRefusalMessage,
  isContentFilterBody,
  parseFlaggedCategories,
  pickCategory,
  DEFAULT_SAFETY,
  type FlaggedCategory,
} from './content-filter.js';

// Helper to build an Azure content filter error body
function filterBody(results: Record<string, unknown>) {
  return {
    error: {
      code: 'content_filter',
      message: 'The response was filtered',
      innererror: {
        code: 'ResponsibleAIPolicyViolation',
        content_filter_result: results,
      },
    },
  };
}

const growthRay = {
  safety: {
    role: 'support you in nurturing your child\'s emotional development',
    suggestion: 'For example, I can help you with strategies to handle tantrums.',
  },
};

describe('isContentFilterBody', () => {
  it('recognises a content_filter error', () => {
    expect(isContentFilterBody(filterBody({}))).toBe(true);
  });

  it('recognises the inner policy violation code alone', () => {
    expect(isContentFilterBody({ error: { innererror: { code: 'ResponsibleAIPolicyViolation' } } })).toBe(true);
  });

  it('ignores other errors', () => {
    expect(isContentFilterBody({ error: { code: 'rate_limit_exceeded' } })).toBe(false);
    expect(isContentFilterBody('Bad Request')).toBe(false);
  });
});

describe('parseFlaggedCategories', () => {
  it('collects filtered categories with their severity', () => {
    const body = filterBody({
      hate: { filtered: false, severity: 'safe' },
      violence: { filtered: true, severity: 'medium' },
      sexual: { filtered: false, severity: 'low' },
    });
    expect(parseFlaggedCategories(body)).toEqual([
      { category: 'violence', severity: 'medium' },
      { category: 'sexual', severity: 'low' },
    ]);
  });

  it('treats a filtered category without severity as safe-severity', () => {
    const body = filterBody({ jailbreak: { filtered: true, detected: true } });
    expect(parseFlaggedCategories(body)).toEqual([{ category: 'jailbreak', severity: 'safe' }]);
  });

  it('skips entries it cannot read', () => {
    const body = filterBody({ custom: 'nope', violence: { filtered: true, severity: 'high' } });
    expect(parseFlaggedCategories(body)).toEqual([{ category: 'violence', severity: 'high' }]);
  });

  it('reports drug-related rejections as illegal_activity', () => {
    const body = filterBody({ violence: { filtered: true, severity: 'high' } });
    expect(parseFlaggedCategories(body, 'request about DRUGS was filtered')).toEqual([
      { category: 'illegal_activity', severity: 'high' },
    ]);
  });

  it('returns nothing for a body without filter results', () => {
    expect(parseFlaggedCategories({ error: { code: 'content_filter' } })).toEqual([]);
  });
});

describe('pickCategory', () => {
  it('picks the highest severity', () => {
    const flagged: FlaggedCategory[] = [
      { category: 'sexual', severity: 'low' },
      { category: 'hate', severity: 'high' },
      { category: 'violence', severity: 'medium' },
    ];
    expect(pickCategory(flagged)).toBe('hate');
  });

  it('keeps the first category on a tie', () => {
    expect(pickCategory([
      { category: 'violence', severity: 'medium' },
      { category: 'hate', severity: 'medium' },
    ])).toBe('violence');
  });

  it('falls back to illegal_activity when nothing is flagged', () => {
    expect(pickCategory([])).toBe('illegal_activity');
  });
});

describe('buildRefusalMessage', () => {
  it('combines the category explanation with the persona wording', () => {
    const message = buildRefusalMessage(growthRay, [{ category: 'violence', severity: 'high' }]);
    expect(message).toBe(
      'I\'m sorry, but I can\'t assist with requests that involve content that may involve violence or harm. ' +
      'My role is to support you in nurturing your child\'s emotional development. ' +
      'For example, I can help you with strategies to handle tantrums. ' +
      'What would you like to explore instead?'
    );
  });

  it('uses the default wording for personas without safety text', () => {
    const message = buildRefusalMessage({}, []);
    expect(message).toContain(`My role is to ${DEFAULT_SAFETY.role}.`);
    expect(message).toContain('illegal or unethical activities, such as drug-related requests');
  });

  it('uses the generic explanation for an unmapped category', () => {
    const message = buildRefusalMessage({}, [{ category: 'protected_material_code', severity: 'high' }]);
    expect(message.startsWith(
      'I\'m sorry, but I can\'t assist with requests that involve content that violates our safety guidelines.'
    )).toBe(true);
  });
});
