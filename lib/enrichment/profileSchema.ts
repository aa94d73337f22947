import { PROFILE_FIELDS, type CompanyProfile, type ProfileField } from './schemas';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPresent(value: unknown): boolean {
  return (
    value !== null &&
    value !== undefined &&
    value !== '' &&
    value !== 0 &&
    value !== false &&
    !(typeof value === 'number' && Number.isNaN(value))
  );
}

function stringifyValue(value: unknown): string {
  if (value === null || value === undefined) {
    return '';
  }

  if (typeof value === 'string') {
    return value;
  }

  if (Array.isArray(value)) {
    return value
      .filter(isPresent)
      .map((item) => stringifyValue(item).trim())
      .join(', ');
  }

  if (typeof value === 'object') {
    return JSON.stringify(value);
  }

  return String(value);
}

/**
 * Coerce any loosely-typed profile into the strict output schema.
 *
 * Missing keys become "", null/undefined and empty arrays become "",
 * non-empty arrays are comma-joined, other scalars are stringified and
 * every value is trimmed. Keys outside the schema are dropped.
 *
 * Pure and idempotent: coerceProfile(coerceProfile(x)) deep-equals coerceProfile(x).
 */
export function coerceProfile(raw: unknown): CompanyProfile {
  const source: Record<string, unknown> = isRecord(raw) ? raw : {};

  return {
    domain: stringifyValue(source.domain).trim(),
    company_name: stringifyValue(source.company_name).trim(),
    logo: stringifyValue(source.logo).trim(),
    short_description: stringifyValue(source.short_description).trim(),
    long_description: stringifyValue(source.long_description).trim(),
    sector: stringifyValue(source.sector).trim(),
    industry: stringifyValue(source.industry).trim(),
    sub_industry: stringifyValue(source.sub_industry).trim(),
    sic_code: stringifyValue(source.sic_code).trim(),
    sic_text: stringifyValue(source.sic_text).trim(),
    tags: stringifyValue(source.tags).trim(),
  };
}

/**
 * Count non-empty values per schema field.
 */
export function countFieldCoverage(profiles: CompanyProfile[]): Record<ProfileField, number> {
  const counts: Record<ProfileField, number> = {
    domain: 0,
    company_name: 0,
    logo: 0,
    short_description: 0,
    long_description: 0,
    sector: 0,
    industry: 0,
    sub_industry: 0,
    sic_code: 0,
    sic_text: 0,
    tags: 0,
  };

  for (const profile of profiles) {
    for (const field of PROFILE_FIELDS) {
      if (profile[field]) {
        counts[field]++;
      }
    }
  }

  return counts;
}
