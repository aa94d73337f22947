/**
 * Enrichment Pipeline - archived homepage HTML in, candidate profiles out
 *
 * Per document: TextExtractor -> Classifier + DescriptionSynthesizer +
 * LogoResolver -> QualityGate. Documents are independent and run through a
 * bounded worker pool; one document failing never aborts the batch.
 */

import { readdir, stat } from 'fs/promises';
import * as path from 'path';
import pLimit from 'p-limit';
import { companyNameFromDomain } from '../utils';
import { classify } from './classifier';
import { extractContacts } from './contactExtractor';
import { synthesizeDescriptions } from './descriptionSynthesizer';
import { resolveLogo, type LogoResolverOptions } from './logoResolver';
import { validateProfile } from './qualityGate';
import { extractText, readDocument } from './textExtractor';
import type {
  CompanyContacts,
  CompanyProfile,
  DocumentFailure,
  DocumentOutcome,
  LogoTier,
} from './schemas';

// =============================================================================
// Constants
// =============================================================================

export const MIN_TEXT_LENGTH = 50;
export const DOCUMENT_FILE_NAME = 'index.html';
const DEFAULT_CONCURRENCY = 8;

export class InputDirectoryError extends Error {
  constructor(public readonly inputDir: string, reason: string) {
    super(`Input directory not usable: ${inputDir} (${reason})`);
    this.name = 'InputDirectoryError';
  }
}

// =============================================================================
// Types
// =============================================================================

export interface DocumentInput {
  domain: string;
  htmlPath: string;
}

export interface ProcessDocumentOptions {
  logo?: LogoResolverOptions;
}

export interface PipelineOptions extends ProcessDocumentOptions {
  concurrency?: number;
}

export interface AcceptedDocument {
  profile: CompanyProfile;
  contacts: CompanyContacts;
  logoTier: LogoTier;
}

export interface PipelineRunResult {
  documents: number;
  accepted: AcceptedDocument[];
  failures: DocumentFailure[];
}

// =============================================================================
// Discovery
// =============================================================================

/**
 * List one document per domain subdirectory, sorted by domain.
 * A missing input directory is the only fatal condition of a run.
 */
export async function discoverDocuments(inputDir: string): Promise<DocumentInput[]> {
  try {
    const info = await stat(inputDir);
    if (!info.isDirectory()) {
      throw new InputDirectoryError(inputDir, 'not a directory');
    }
  } catch (error) {
    if (error instanceof InputDirectoryError) throw error;
    throw new InputDirectoryError(inputDir, error instanceof Error ? error.message : 'Unknown error');
  }

  const entries = await readdir(inputDir, { withFileTypes: true });

  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort()
    .map((domain) => ({
      domain,
      htmlPath: path.join(inputDir, domain, DOCUMENT_FILE_NAME),
    }));
}

// =============================================================================
// Per-Document Processing
// =============================================================================

function failed(domain: string, reason: DocumentFailure['reason'], detail: string | null): DocumentOutcome {
  return { status: 'failed', domain, reason, detail };
}

/**
 * Run one document through extraction, enrichment and the quality gate.
 */
export async function processDocument(
  input: DocumentInput,
  options: ProcessDocumentOptions = {}
): Promise<DocumentOutcome> {
  const { domain } = input;

  const document = await readDocument(input.htmlPath);
  if (!document.ok) {
    return failed(domain, document.reason, document.detail);
  }

  const { text, title } = extractText(document.html);
  if (text.length < MIN_TEXT_LENGTH) {
    return failed(domain, 'insufficient_text', `${text.length} characters extracted`);
  }

  // Logo probes are the only I/O; start them before the CPU-bound steps
  const logoPromise = resolveLogo(domain, document.html, options.logo);
  const classification = classify(text);
  const descriptions = synthesizeDescriptions(text);
  const contacts = extractContacts(document.html);
  const logo = await logoPromise;

  const outcome = validateProfile({
    domain,
    company_name: title || companyNameFromDomain(domain),
    logo: logo.url,
    ...descriptions,
    ...classification,
  });

  if (outcome.status === 'rejected') {
    return failed(domain, 'rejected', outcome.reason);
  }

  return { status: 'accepted', profile: outcome.profile, contacts, logoTier: logo.tier };
}

// =============================================================================
// Main Entry Point
// =============================================================================

/**
 * Process every document under inputDir with bounded concurrency.
 * Results keep discovery order; accepted profiles are not yet deduplicated or sorted.
 */
export async function runEnrichmentPipeline(
  inputDir: string,
  options: PipelineOptions = {}
): Promise<PipelineRunResult> {
  const documents = await discoverDocuments(inputDir);
  const total = documents.length;
  const limit = pLimit(options.concurrency ?? DEFAULT_CONCURRENCY);

  console.log(`[Pipeline] Found ${total} companies to process in ${inputDir}`);

  let completed = 0;
  const outcomes = await Promise.all(
    documents.map((input) =>
      limit(async (): Promise<DocumentOutcome> => {
        let outcome: DocumentOutcome;
        try {
          outcome = await processDocument(input, options);
        } catch (error) {
          const detail = error instanceof Error ? error.message : 'Unknown error';
          outcome = failed(input.domain, 'processing_error', detail);
        }

        completed++;
        if (outcome.status === 'accepted') {
          console.log(
            `[Pipeline] [${completed}/${total}] ${input.domain}: ${outcome.profile.sector} > ${outcome.profile.industry}`
          );
        } else {
          console.warn(
            `[Pipeline] [${completed}/${total}] ${input.domain}: failed (${outcome.reason}${outcome.detail ? `: ${outcome.detail}` : ''})`
          );
        }

        return outcome;
      })
    )
  );

  const result: PipelineRunResult = { documents: total, accepted: [], failures: [] };
  for (const outcome of outcomes) {
    if (outcome.status === 'accepted') {
      result.accepted.push({ profile: outcome.profile, contacts: outcome.contacts, logoTier: outcome.logoTier });
    } else {
      result.failures.push({ domain: outcome.domain, reason: outcome.reason, detail: outcome.detail });
    }
  }

  console.log(
    `[Pipeline] Completed. Successful: ${result.accepted.length}/${total}, Failed: ${result.failures.length}/${total}`
  );

  return result;
}
