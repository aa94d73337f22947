import { z } from 'zod';

// =============================================================================
// Company Profile (final output schema)
// =============================================================================

export const PROFILE_FIELDS = [
  'domain',
  'company_name',
  'logo',
  'short_description',
  'long_description',
  'sector',
  'industry',
  'sub_industry',
  'sic_code',
  'sic_text',
  'tags',
] as const;

export type ProfileField = (typeof PROFILE_FIELDS)[number];

export const CompanyProfileSchema = z.object({
  domain: z.string(),
  company_name: z.string(),
  logo: z.string(),
  short_description: z.string(),
  long_description: z.string(),
  sector: z.string(),
  industry: z.string(),
  sub_industry: z.string(),
  sic_code: z.string(),
  sic_text: z.string(),
  tags: z.string(),
});

export type CompanyProfile = z.infer<typeof CompanyProfileSchema>;

// =============================================================================
// Extraction & Classification
// =============================================================================

export interface ExtractedText {
  text: string;
  title: string;
}

export interface Classification {
  sector: string;
  industry: string;
  sub_industry: string;
  sic_code: string;
  sic_text: string;
  tags: string;
}

export const IndustryRuleSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  sic_code: z.string(),
  sic_text: z.string(),
});

export type IndustryRule = z.infer<typeof IndustryRuleSchema>;

// Ordered: declaration order is the tie-break priority for sectors and industries.
export const SectorRuleSchema = z.object({
  name: z.string().min(1),
  keywords: z.array(z.string().min(1)),
  industries: z.array(IndustryRuleSchema).min(1),
});

export type SectorRule = z.infer<typeof SectorRuleSchema>;

export const ClassificationRuleTableSchema = z.array(SectorRuleSchema).min(1);

export interface Descriptions {
  short_description: string;
  long_description: string;
}

// =============================================================================
// Logo Resolution
// =============================================================================

export type LogoTier =
  | 'html_link'
  | 'og_image'
  | 'common_path'
  | 'logo_service'
  | 'favicon_service';

export interface LogoResolution {
  url: string;
  tier: LogoTier;
}

/** HEAD-style existence check. Must resolve to false rather than reject. */
export type UrlProbe = (url: string, timeoutMs: number) => Promise<boolean>;

// =============================================================================
// Quality Gate Outcomes
// =============================================================================

export type RejectionReason =
  | 'missing_short_description'
  | 'unknown_industry'
  | 'missing_sector';

export type RepairAction =
  | 'company_name_from_domain'
  | 'long_description_from_short'
  | 'invalid_logo_cleared';

export type ValidationOutcome =
  | { status: 'accepted'; profile: CompanyProfile; repairs: RepairAction[] }
  | { status: 'rejected'; domain: string; reason: RejectionReason };

// =============================================================================
// Pipeline Outcomes
// =============================================================================

export type DocumentFailureReason =
  | 'missing_index'
  | 'unreadable_file'
  | 'insufficient_text'
  | 'rejected'
  | 'processing_error';

export interface DocumentFailure {
  domain: string;
  reason: DocumentFailureReason;
  detail: string | null;
}

export type DocumentOutcome =
  | { status: 'accepted'; profile: CompanyProfile; contacts: CompanyContacts; logoTier: LogoTier }
  | ({ status: 'failed' } & DocumentFailure);

// =============================================================================
// Contacts Sidecar
// =============================================================================

export interface ContactAddress {
  full: string | null;
  city: string | null;
  country: string | null;
}

export interface SocialLinks {
  linkedin: string | null;
  twitter: string | null;
  github: string | null;
  facebook: string | null;
}

export interface CompanyContacts {
  email: string | null;
  phone: string | null;
  address: ContactAddress;
  social_links: SocialLinks;
  technologies: string[];
}

// =============================================================================
// Merge Statistics
// =============================================================================

export interface CoverageStats {
  total: number;
  fieldCoverage: Record<ProfileField, number>;
  sectorDistribution: Array<{ sector: string; count: number }>;
}

export interface MergeResult {
  profiles: CompanyProfile[];
  duplicates: number;
  duplicateDomains: string[];
  stats: CoverageStats;
}
