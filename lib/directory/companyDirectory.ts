import { readFile } from 'fs/promises';
import { z } from 'zod';
import { coerceProfile } from '../enrichment/profileSchema';
import { CompanyProfileSchema, type CompanyProfile } from '../enrichment/schemas';
import { extractDomainFromInput } from '../utils';

export class DirectoryNotLoadedError extends Error {
  constructor() {
    super('Company directory has not been loaded; call load() first');
    this.name = 'DirectoryNotLoadedError';
  }
}

export type LookupResult =
  | { found: true; profile: CompanyProfile }
  | { found: false; status: 404; domain: string };

export interface CompanySummary {
  domain: string;
  company_name: string;
  logo: string;
  sector: string;
  short_description: string;
}

/**
 * Read-only, in-memory view of the final companies.json keyed by domain.
 *
 * Nothing is loaded at construction; the owner calls load() once at process
 * start and reload() to pick up a regenerated file.
 */
export class CompanyDirectory {
  private profiles = new Map<string, CompanyProfile>();
  private sourcePath: string | null = null;

  get size(): number {
    return this.profiles.size;
  }

  get loadedFrom(): string | null {
    return this.sourcePath;
  }

  /**
   * Load the final artifact. Returns the number of indexed companies.
   */
  async load(filePath: string): Promise<number> {
    const content = await readFile(filePath, 'utf-8');
    const entries = z.array(z.unknown()).parse(JSON.parse(content));

    const next = new Map<string, CompanyProfile>();
    for (const entry of entries) {
      const profile = CompanyProfileSchema.parse(coerceProfile(entry));
      const key = extractDomainFromInput(profile.domain);
      if (key && !next.has(key)) {
        next.set(key, profile);
      }
    }

    this.profiles = next;
    this.sourcePath = filePath;

    console.log(`[CompanyDirectory] Loaded ${next.size} companies from ${filePath}`);
    return next.size;
  }

  async reload(): Promise<number> {
    if (!this.sourcePath) {
      throw new DirectoryNotLoadedError();
    }
    return this.load(this.sourcePath);
  }

  /**
   * Look a company up by domain. Scheme, leading "www." and any path are ignored.
   */
  lookup(input: string): LookupResult {
    const domain = extractDomainFromInput(input);
    const profile = this.profiles.get(domain);

    if (!profile) {
      return { found: false, status: 404, domain };
    }

    return { found: true, profile };
  }

  list(): CompanySummary[] {
    return Array.from(this.profiles.values(), (profile) => ({
      domain: profile.domain,
      company_name: profile.company_name,
      logo: profile.logo,
      sector: profile.sector,
      short_description: profile.short_description,
    }));
  }
}
