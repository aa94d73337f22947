import { mkdir, readFile, writeFile } from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { z } from 'zod';
import { mergeProfiles } from './merger';
import type { PipelineRunResult } from './pipeline';
import type { CompanyContacts, CompanyProfile, MergeResult } from './schemas';

// =============================================================================
// Output Layout
// =============================================================================

export const RAW_PROFILES_FILE = 'companies_raw.json';
export const FINAL_PROFILES_FILE = 'companies.json';
export const FAILED_DOMAINS_FILE = 'failed_companies.txt';
export const CONTACTS_FILE = 'company_contacts.json';
export const PER_DOMAIN_DIR = 'json';
export const PER_DOMAIN_WRITE_CONCURRENCY = 16;

export class MergeInputError extends Error {
  constructor(public readonly filePath: string, reason: string) {
    super(`Cannot read raw profiles from ${filePath}: ${reason}`);
    this.name = 'MergeInputError';
  }
}

export interface WriteArtifactsOptions {
  writePerDomainJson?: boolean;
}

async function writeJson(filePath: string, data: unknown): Promise<void> {
  await writeFile(filePath, `${JSON.stringify(data, null, 2)}\n`, 'utf-8');
}

function perDomainFileName(domain: string): string {
  return `${domain.replace(/[\/\\:]/g, '_')}.json`;
}

// =============================================================================
// Pipeline Artifacts
// =============================================================================

/**
 * Write the raw batch result, the failure list and the contacts sidecar.
 * Returns the path of the raw profiles file.
 */
export async function writePipelineArtifacts(
  outputDir: string,
  run: PipelineRunResult,
  options: WriteArtifactsOptions = {}
): Promise<string> {
  await mkdir(outputDir, { recursive: true });

  const rawPath = path.join(outputDir, RAW_PROFILES_FILE);
  await writeJson(
    rawPath,
    run.accepted.map((doc) => doc.profile)
  );

  const failedDomains = run.failures.map((failure) => failure.domain);
  await writeFile(path.join(outputDir, FAILED_DOMAINS_FILE), failedDomains.join('\n'), 'utf-8');

  const contacts: Record<string, CompanyContacts> = {};
  for (const doc of run.accepted) {
    contacts[doc.profile.domain] = doc.contacts;
  }
  await writeJson(path.join(outputDir, CONTACTS_FILE), contacts);

  if (options.writePerDomainJson !== false) {
    const perDomainDir = path.join(outputDir, PER_DOMAIN_DIR);
    await mkdir(perDomainDir, { recursive: true });
    const limit = pLimit(PER_DOMAIN_WRITE_CONCURRENCY);
    await Promise.all(
      run.accepted.map((doc) =>
        limit(() => writeJson(path.join(perDomainDir, perDomainFileName(doc.profile.domain)), doc.profile))
      )
    );
  }

  console.log(`[Pipeline] Wrote ${run.accepted.length} raw profiles to ${rawPath}`);
  if (failedDomains.length > 0) {
    console.log(`[Pipeline] Failed companies saved to ${path.join(outputDir, FAILED_DOMAINS_FILE)}`);
  }

  return rawPath;
}

// =============================================================================
// Merge Step
// =============================================================================

export async function readRawProfiles(filePath: string): Promise<unknown[]> {
  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    throw new MergeInputError(filePath, error instanceof Error ? error.message : 'Unknown error');
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    throw new MergeInputError(filePath, error instanceof Error ? error.message : 'invalid JSON');
  }

  const parsed = z.array(z.unknown()).safeParse(data);
  if (!parsed.success) {
    throw new MergeInputError(filePath, 'expected a JSON array of profiles');
  }

  return parsed.data;
}

export async function writeFinalProfiles(filePath: string, profiles: CompanyProfile[]): Promise<void> {
  await mkdir(path.dirname(filePath), { recursive: true });
  await writeJson(filePath, profiles);
}

/**
 * Merge <outputDir>/companies_raw.json into <outputDir>/companies.json.
 */
export async function runMergeStep(outputDir: string): Promise<MergeResult> {
  const rawPath = path.join(outputDir, RAW_PROFILES_FILE);
  const finalPath = path.join(outputDir, FINAL_PROFILES_FILE);

  console.log(`[Merger] Loading ${rawPath}`);
  const rawProfiles = await readRawProfiles(rawPath);

  const result = mergeProfiles(rawProfiles);
  await writeFinalProfiles(finalPath, result.profiles);

  console.log(`[Merger] Saved ${result.profiles.length} profiles to ${finalPath}`);
  return result;
}
