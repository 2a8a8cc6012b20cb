/**
 * Content Filter
 *
 * Turns an upstream content-policy rejection into a persona-specific refusal
 * that is streamed and stored like any other reply.
 *
 * Azure OpenAI reports the triggering categories in
 * error.innererror.content_filter_result, each with a severity.
 */

import { z } from 'zod';
import type { PersonaConfig, PersonaSafety } from '@persona-chat/shared';

export type Severity = 'safe' | 'low' | 'medium' | 'high';

export interface FlaggedCategory {
  category: string;
  severity: Severity;
}

const SEVERITY_ORDER: Record<Severity, number> = { high: 3, medium: 2, low: 1, safe: 0 };

const DEFAULT_CATEGORY = 'illegal_activity';

const CATEGORY_EXPLANATIONS: Record<string, string> = {
  hate: 'content that promotes hate speech or discrimination',
  self_harm: 'content related to self-harm or unsafe behaviors',
  sexual: 'inappropriate or sexual content',
  violence: 'content that may involve violence or harm',
  jailbreak: 'attempts to bypass safety measures',
  illegal_activity: 'illegal or unethical activities, such as drug-related requests',
};

const GENERIC_EXPLANATION = 'content that violates our safety guidelines';

export const DEFAULT_SAFETY: PersonaSafety = {
  role: 'assist you with parenting in a positive and ethical way',
  suggestion: 'For example, I can provide tips on creating a safe and supportive environment for your family.',
};

const FilterDetailSchema = z.object({
  filtered: z.boolean().optional(),
  severity: z.enum(['safe', 'low', 'medium', 'high']).optional(),
});

const ContentFilterBodySchema = z.object({
  error: z.object({
    code: z.string().optional(),
    innererror: z.object({
      code: z.string().optional(),
      content_filter_result: z.record(z.string(), z.unknown()).optional(),
    }).optional(),
  }),
});

/**
 * True when an upstream error body is a content-policy rejection.
 */
export function isContentFilterBody(body: unknown): boolean {
  const parsed = ContentFilterBodySchema.safeParse(body);
  if (!parsed.success) return false;
  const { error } = parsed.data;
  return error.code === 'content_filter' || error.innererror?.code === 'ResponsibleAIPolicyViolation';
}

/**
 * Extract the flagged categories from an upstream error body.
 * `rawText` is the undecoded body; drug-related rejections are reported
 * under illegal_activity whatever category the filter chose.
 */
export function parseFlaggedCategories(body: unknown, rawText = ''): FlaggedCategory[] {
  if (rawText.toLowerCase().includes('drugs')) {
    return [{ category: DEFAULT_CATEGORY, severity: 'high' }];
  }

  const parsed = ContentFilterBodySchema.safeParse(body);
  const results = parsed.success ? parsed.data.error.innererror?.content_filter_result : undefined;
  if (!results) return [];

  const flagged: FlaggedCategory[] = [];
  for (const [category, value] of Object.entries(results)) {
    const detail = FilterDetailSchema.safeParse(value);
    if (!detail.success) continue;
    const severity = detail.data.severity ?? 'safe';
    if (detail.data.filtered || severity !== 'safe') {
      flagged.push({ category, severity });
    }
  }
  return flagged;
}

// Highest severity wins; ties keep the first reported
export function pickCategory(flagged: FlaggedCategory[]): string {
  let best: FlaggedCategory | undefined;
  for (const candidate of flagged) {
    if (!best || SEVERITY_ORDER[candidate.severity] > SEVERITY_ORDER[best.severity]) {
      best = candidate;
    }
  }
  return best?.category ?? DEFAULT_CATEGORY;
}

export function buildRefusalMessage(persona: Pick<PersonaConfig, 'safety'>, flagged: FlaggedCategory[]): string {
  const explanation = CATEGORY_EXPLANATIONS[pickCategory(flagged)] ?? GENERIC_EXPLANATION;
  const safety = persona.safety ?? DEFAULT_SAFETY;

  return (
    `I'm sorry, but I can't assist with requests that involve ${explanation}. ` +
    `My role is to ${safety.role}. ` +
    `${safety.suggestion} ` +
    'What would you like to explore instead?'
  );
}
