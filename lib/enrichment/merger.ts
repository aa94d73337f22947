import { coerceProfile, countFieldCoverage } from './profileSchema';
import type { CompanyProfile, CoverageStats, MergeResult } from './schemas';

// =============================================================================
// Helpers
// =============================================================================

function compareCompanyNames(a: CompanyProfile, b: CompanyProfile): number {
  const nameA = a.company_name.toLowerCase();
  const nameB = b.company_name.toLowerCase();
  if (nameA < nameB) return -1;
  if (nameA > nameB) return 1;
  return 0;
}

export function computeCoverageStats(profiles: CompanyProfile[]): CoverageStats {
  const sectorCounts = new Map<string, number>();
  for (const profile of profiles) {
    const sector = profile.sector || 'Unknown';
    sectorCounts.set(sector, (sectorCounts.get(sector) ?? 0) + 1);
  }

  const sectorDistribution = Array.from(sectorCounts, ([sector, count]) => ({ sector, count })).sort(
    (a, b) => b.count - a.count || (a.sector < b.sector ? -1 : a.sector > b.sector ? 1 : 0)
  );

  return {
    total: profiles.length,
    fieldCoverage: countFieldCoverage(profiles),
    sectorDistribution,
  };
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Produce the final artifact from the raw batch: enforce the schema,
 * drop later duplicates of a domain, sort by company name (case-insensitive).
 */
export function mergeProfiles(rawProfiles: unknown[]): MergeResult {
  const seenDomains = new Set<string>();
  const duplicateDomains: string[] = [];
  const profiles: CompanyProfile[] = [];

  for (const raw of rawProfiles) {
    const profile = coerceProfile(raw);

    if (seenDomains.has(profile.domain)) {
      console.warn(`[Merger] Duplicate domain: ${profile.domain}`);
      duplicateDomains.push(profile.domain);
      continue;
    }

    seenDomains.add(profile.domain);
    profiles.push(profile);
  }

  profiles.sort(compareCompanyNames);

  const stats = computeCoverageStats(profiles);

  console.log(`[Merger] Total profiles: ${profiles.length}, duplicates removed: ${duplicateDomains.length}`);
  for (const [field, count] of Object.entries(stats.fieldCoverage)) {
    const percentage = stats.total > 0 ? ((count / stats.total) * 100).toFixed(1) : '0.0';
    console.log(`[Merger]   ${field}: ${count}/${stats.total} (${percentage}%)`);
  }

  return {
    profiles,
    duplicates: duplicateDomains.length,
    duplicateDomains,
    stats,
  };
}
