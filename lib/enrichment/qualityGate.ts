import { companyNameFromDomain } from '../utils';
import { coerceProfile } from './profileSchema';
import type { CompanyProfile, RejectionReason, RepairAction, ValidationOutcome } from './schemas';

// =============================================================================
// Rejection Rules
// =============================================================================

function findRejection(profile: CompanyProfile): RejectionReason | null {
  if (!profile.short_description) {
    return 'missing_short_description';
  }

  if (!profile.industry || profile.industry.toLowerCase() === 'unknown') {
    return 'unknown_industry';
  }

  if (!profile.sector) {
    return 'missing_sector';
  }

  return null;
}

// =============================================================================
// Repair Rules
// =============================================================================

function applyRepairs(profile: CompanyProfile): { profile: CompanyProfile; repairs: RepairAction[] } {
  const repaired = { ...profile };
  const repairs: RepairAction[] = [];

  if (!repaired.company_name) {
    repaired.company_name = companyNameFromDomain(repaired.domain);
    repairs.push('company_name_from_domain');
  }

  if (!repaired.long_description) {
    repaired.long_description = repaired.short_description;
    repairs.push('long_description_from_short');
  }

  // An empty logo is allowed past the gate; a scheme-less one is not.
  if (repaired.logo && !(repaired.logo.startsWith('http://') || repaired.logo.startsWith('https://'))) {
    repaired.logo = '';
    repairs.push('invalid_logo_cleared');
  }

  return { profile: repaired, repairs };
}

// =============================================================================
// Main Entry Points
// =============================================================================

/**
 * Coerce a candidate profile to the output schema, then accept (with repairs)
 * or reject it. Rejection is a normal outcome and never throws.
 */
export function validateProfile(raw: unknown): ValidationOutcome {
  const profile = coerceProfile(raw);
  const label = profile.domain || 'unknown';

  const reason = findRejection(profile);
  if (reason) {
    console.warn(`[QualityGate] Rejected ${label}: ${reason}`);
    return { status: 'rejected', domain: profile.domain, reason };
  }

  const { profile: repaired, repairs } = applyRepairs(profile);
  if (repairs.length > 0) {
    console.log(`[QualityGate] Repaired ${label}: ${repairs.join(', ')}`);
  }

  return { status: 'accepted', profile: repaired, repairs };
}
