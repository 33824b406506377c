/**
 * Task classifier: maps a request's shape to a task category.
 * Pure and deterministic; rules are evaluated in order and the first match wins.
 *
 * 1. Token-intensive (total length over highVolumeChars, or a fenced code
 *    block anywhere) -> fast, 0.7. Throughput-optimized backends take these.
 * 2. Complexity signals (a system message, a message over longMessageChars,
 *    or a complexity keyword) -> powerful, 0.7.
 * 3. Otherwise -> fast, 0.5.
 *
 * Rule 1 is checked before rule 2, so a request with both a code block and a
 * system prompt is classified fast.
 */

import { DEFAULT_COMPLEXITY_KEYWORDS } from '../config/schema.js';
import type { ClassifierSettings } from '../config/types.js';
import type { Category, ChatCompletionRequest } from '../shared/types.js';
import type { ClassificationFactors, TaskClassification } from './types.js';

const CODE_FENCE = '```';

export const DEFAULT_CLASSIFIER_SETTINGS: ClassifierSettings = {
  highVolumeChars: 5000,
  longMessageChars: 2000,
  complexityKeywords: DEFAULT_COMPLEXITY_KEYWORDS,
};

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Whole-word, case-insensitive matcher for the keyword list. */
export function buildKeywordPattern(keywords: readonly string[]): RegExp {
  return new RegExp(`\\b(?:${keywords.map(escapeRegExp).join('|')})\\b`, 'i');
}

const patternCache = new Map<string, RegExp>();

function keywordPattern(keywords: readonly string[]): RegExp {
  const key = keywords.join('\u0000');
  let pattern = patternCache.get(key);
  if (!pattern) {
    pattern = buildKeywordPattern(keywords);
    patternCache.set(key, pattern);
  }
  return pattern;
}

/** Length in code points, so astral characters count once. */
export function charLength(text: string): number {
  let count = 0;
  for (const _ of text) count += 1;
  return count;
}

/** Measure the classification signals of a request. */
export function measureFactors(
  request: Pick<ChatCompletionRequest, 'messages'>,
  settings: ClassifierSettings = DEFAULT_CLASSIFIER_SETTINGS,
): ClassificationFactors {
  const pattern = keywordPattern(settings.complexityKeywords);
  const contents = request.messages.map((message) => message.content ?? '');
  const lengths = contents.map(charLength);

  return {
    totalLength: lengths.reduce((sum, length) => sum + length, 0),
    messageCount: request.messages.length,
    hasSystemMessage: request.messages.some((message) => message.role === 'system'),
    hasLongMessage: lengths.some((length) => length > settings.longMessageChars),
    hasCodeBlock: contents.some((content) => content.includes(CODE_FENCE)),
    hasComplexityKeywords: contents.some((content) => pattern.test(content)),
  };
}

/** Classify a request into a task category. */
export function classify(
  request: Pick<ChatCompletionRequest, 'messages'>,
  settings: ClassifierSettings = DEFAULT_CLASSIFIER_SETTINGS,
): TaskClassification {
  const factors = measureFactors(request, settings);

  if (factors.totalLength > settings.highVolumeChars || factors.hasCodeBlock) {
    return { category: 'fast', confidence: 0.7, rule: 'token_intensive', factors };
  }

  if (factors.hasSystemMessage || factors.hasLongMessage || factors.hasComplexityKeywords) {
    return { category: 'powerful', confidence: 0.7, rule: 'complexity', factors };
  }

  return { category: 'fast', confidence: 0.5, rule: 'default', factors };
}

/**
 * Resolve the category for a request: an explicit `category` wins with full
 * confidence, `auto` or absence runs the classifier.
 */
export function resolveCategory(
  request: ChatCompletionRequest,
  settings: ClassifierSettings = DEFAULT_CLASSIFIER_SETTINGS,
): TaskClassification {
  const pinned: Category | undefined =
    request.category === 'fast' || request.category === 'powerful' ? request.category : undefined;

  if (pinned) {
    return {
      category: pinned,
      confidence: 1,
      rule: 'override',
      factors: measureFactors(request, settings),
    };
  }

  return classify(request, settings);
}
