/**
 * Business Classifier - deterministic, offline keyword scoring
 *
 * Maps homepage prose to sector / industry / SIC code using the ordered rule
 * table in data/classificationRulesV1.json. Keywords match as plain substrings
 * of the lowercased text ("bank" matches "bankingcorp"), so outcomes stay
 * compatible with previously generated directories.
 */

import rulesJson from './data/classificationRulesV1.json';
import {
  ClassificationRuleTableSchema,
  type Classification,
  type IndustryRule,
  type SectorRule,
} from './schemas';

// =============================================================================
// Constants
// =============================================================================

const MIN_CLASSIFIABLE_LENGTH = 20;

export const CLASSIFICATION_RULES: readonly SectorRule[] = ClassificationRuleTableSchema.parse(rulesJson);

export const DEFAULT_CLASSIFICATION: Readonly<Classification> = Object.freeze({
  sector: 'Technology',
  industry: 'Software',
  sub_industry: 'Software',
  sic_code: '7372',
  sic_text: 'Prepackaged Software',
  tags: 'Technology, Software',
});

// =============================================================================
// Scoring
// =============================================================================

/**
 * Number of keywords contained in the text. Each keyword counts once.
 */
export function scoreKeywords(normalizedText: string, keywords: readonly string[]): number {
  return keywords.reduce((score, keyword) => (normalizedText.includes(keyword) ? score + 1 : score), 0);
}

/**
 * Highest-scoring entry, or null when nothing scores above zero.
 * Ties keep the earliest entry (declaration order is the priority order).
 */
function pickBest<T extends { keywords: readonly string[] }>(
  normalizedText: string,
  entries: readonly T[]
): T | null {
  let best: T | null = null;
  let bestScore = 0;

  for (const entry of entries) {
    const score = scoreKeywords(normalizedText, entry.keywords);
    if (score > bestScore) {
      best = entry;
      bestScore = score;
    }
  }

  return best;
}

function toClassification(sector: SectorRule, industry: IndustryRule): Classification {
  return {
    sector: sector.name,
    industry: industry.name,
    sub_industry: industry.name,
    sic_code: industry.sic_code,
    sic_text: industry.sic_text,
    tags: `${sector.name}, ${industry.name}`,
  };
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Classify a business from its website text.
 *
 * Short or keyword-free text returns DEFAULT_CLASSIFICATION. When a sector
 * matches but none of its industries do, the sector's first industry is used.
 */
export function classify(text: string, rules: readonly SectorRule[] = CLASSIFICATION_RULES): Classification {
  const normalized = text.toLowerCase().trim();

  if (normalized.length < MIN_CLASSIFIABLE_LENGTH) {
    return { ...DEFAULT_CLASSIFICATION };
  }

  const sector = pickBest(normalized, rules);
  if (!sector) {
    return { ...DEFAULT_CLASSIFICATION };
  }

  const industry = pickBest(normalized, sector.industries) ?? sector.industries[0];

  return toClassification(sector, industry);
}
