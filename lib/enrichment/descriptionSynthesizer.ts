/**
 * Description Synthesizer - rule-based sentence extraction, no network calls
 *
 * Picks the most "business voice" sentences out of homepage prose and builds
 * a one-sentence short description and a three-sentence long description.
 * Never returns an empty string: weak input gets the generic fallback text.
 */

import type { Descriptions } from './schemas';

// =============================================================================
// Constants
// =============================================================================

const MIN_SENTENCE_LENGTH = 20;
const MAX_SENTENCE_LENGTH = 200;
const MAX_SPECIAL_CHAR_RATIO = 0.3;
const LONG_DESCRIPTION_SENTENCES = 3;

const MIN_SHORT_LENGTH = 20;
const MIN_LONG_LENGTH = 40;

export const FALLBACK_SHORT_DESCRIPTION = 'Company providing business services and solutions.';
export const FALLBACK_LONG_DESCRIPTION =
  'Company providing business services and solutions. Committed to delivering quality products and professional support to customers.';
const LONG_DESCRIPTION_PADDING = ' Committed to delivering quality products and professional support.';

// Cookie/privacy/social boilerplate stripped before sentence splitting
const NOISE_PATTERNS = [
  /(home|about|contact|privacy|terms|cookies?|login|sign up|subscribe)\s*\|/gi,
  /copyright\s+©?\s*\d{4}/gi,
  /all rights reserved/gi,
  /follow us on/gi,
  /(facebook|twitter|linkedin|instagram|youtube)\s*:?/gi,
  /skip to (main )?content/gi,
];

const BOILERPLATE_KEYWORDS = [
  'cookie',
  'privacy policy',
  'terms of service',
  'login',
  'sign up',
  'subscribe',
  'newsletter',
  'click here',
  'read more',
];

export const SENTENCE_WEIGHTS = {
  business_phrase: 15,
  industry_term: 5,
  call_to_action: -20,
} as const;

const BUSINESS_PHRASES = [
  'we provide',
  'we offer',
  'we help',
  'we are',
  'we specialize',
  'our company',
  'our mission',
  'our service',
  'our product',
  'leading provider',
  'established',
  'founded',
  'specializes in',
  'delivers',
  'creates',
  'develops',
  'builds',
  'designs',
  'trusted by',
  'serving',
  'dedicated to',
];

const INDUSTRY_TERMS = [
  'software',
  'technology',
  'services',
  'solutions',
  'platform',
  'healthcare',
  'financial',
  'consulting',
  'manufacturing',
  'retail',
  'education',
  'enterprise',
  'business',
  'professional',
  'digital',
  'innovative',
  'comprehensive',
  'quality',
  'expert',
];

// Plain substrings: 'here' also hits 'there', 'where' and 'sphere'
const CALL_TO_ACTION_PHRASES = ['click', 'here', 'more info', 'learn more', 'contact us'];

// =============================================================================
// Sentence Handling
// =============================================================================

export function stripNoise(text: string): string {
  let cleaned = text;
  for (const pattern of NOISE_PATTERNS) {
    cleaned = cleaned.replace(pattern, '');
  }
  return cleaned.replace(/\s+/g, ' ').trim();
}

function specialCharRatio(sentence: string): number {
  const specials = sentence.match(/[^a-zA-Z0-9\s]/g);
  return (specials ? specials.length : 0) / sentence.length;
}

/**
 * Split prose into candidate sentences, dropping ones that are too short,
 * too long, boilerplate, or mostly punctuation.
 */
export function extractSentences(text: string): string[] {
  if (!text) return [];

  return text
    .split(/[.!?]+/)
    .map((sentence) => sentence.trim())
    .filter((sentence) => {
      if (sentence.length < MIN_SENTENCE_LENGTH || sentence.length > MAX_SENTENCE_LENGTH) {
        return false;
      }

      const lower = sentence.toLowerCase();
      if (BOILERPLATE_KEYWORDS.some((keyword) => lower.includes(keyword))) {
        return false;
      }

      return specialCharRatio(sentence) <= MAX_SPECIAL_CHAR_RATIO;
    });
}

/**
 * Score a sentence for how well it describes the business.
 * Each listed phrase contributes its weight once when present; the result may be negative.
 */
export function scoreSentence(sentence: string): number {
  const lower = sentence.toLowerCase();
  let score = 0;

  for (const phrase of BUSINESS_PHRASES) {
    if (lower.includes(phrase)) score += SENTENCE_WEIGHTS.business_phrase;
  }
  for (const term of INDUSTRY_TERMS) {
    if (lower.includes(term)) score += SENTENCE_WEIGHTS.industry_term;
  }
  for (const phrase of CALL_TO_ACTION_PHRASES) {
    if (lower.includes(phrase)) score += SENTENCE_WEIGHTS.call_to_action;
  }

  return score;
}

function withPeriod(text: string): string {
  const collapsed = text.replace(/\s+/g, ' ').trim();
  return collapsed.endsWith('.') ? collapsed : `${collapsed}.`;
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Build short and long descriptions from website text.
 */
export function synthesizeDescriptions(text: string): Descriptions {
  const sentences = extractSentences(stripNoise(text));

  if (sentences.length === 0) {
    return {
      short_description: FALLBACK_SHORT_DESCRIPTION,
      long_description: FALLBACK_LONG_DESCRIPTION,
    };
  }

  // Array.prototype.sort is stable, so equal scores keep document order
  const ranked = sentences
    .map((sentence) => ({ sentence, score: scoreSentence(sentence) }))
    .sort((a, b) => b.score - a.score);

  const positive = ranked.filter((entry) => entry.score > 0).map((entry) => entry.sentence);
  const best = positive.length > 0 ? positive : sentences.slice(0, LONG_DESCRIPTION_SENTENCES);

  let shortDescription = withPeriod(best[0]);
  let longDescription = withPeriod(best.slice(0, LONG_DESCRIPTION_SENTENCES).join('. '));

  if (shortDescription.length < MIN_SHORT_LENGTH) {
    shortDescription = FALLBACK_SHORT_DESCRIPTION;
  }

  if (longDescription.length < MIN_LONG_LENGTH) {
    longDescription = shortDescription + LONG_DESCRIPTION_PADDING;
  }

  return {
    short_description: shortDescription,
    long_description: longDescription,
  };
}
