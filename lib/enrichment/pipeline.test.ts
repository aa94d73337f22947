import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterAll, beforeAll, describe, expect, it, vi } from 'vitest';
import { FAILED_DOMAINS_FILE, FINAL_PROFILES_FILE, runMergeStep, writePipelineArtifacts } from './artifacts';
import { InputDirectoryError, discoverDocuments, processDocument, runEnrichmentPipeline } from './pipeline';

// Documents carrying these markers take the gate-rejection and crash paths
const { UNCLASSIFIED_MARKER, CRASH_MARKER } = vi.hoisted(() => ({
  UNCLASSIFIED_MARKER: 'UNCLASSIFIED',
  CRASH_MARKER: 'data-contact-crash',
}));

vi.mock('./classifier', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./classifier')>();
  return {
    ...actual,
    classify: (text: string) =>
      text.includes(UNCLASSIFIED_MARKER) ? { ...actual.classify(text), industry: 'Unknown' } : actual.classify(text),
  };
});

vi.mock('./contactExtractor', async (importOriginal) => {
  const actual = await importOriginal<typeof import('./contactExtractor')>();
  return {
    ...actual,
    extractContacts: (html: string) => {
      if (html.includes(CRASH_MARKER)) {
        throw new Error('contact parser crashed');
      }
      return actual.extractContacts(html);
    },
  };
});

const ACME_HTML = `<!DOCTYPE html>
<html>
  <head>
    <title>Acme Analytics | Home</title>
    <link rel="apple-touch-icon" href="/apple-touch-icon.png">
  </head>
  <body>
    <nav><a href="/">Home</a><a href="/about">About</a></nav>
    <main>
      <p>Acme Analytics builds data software for hospitals. We provide a cloud platform that helps clinics track patient outcomes.</p>
    </main>
    <footer><a href="mailto:hello@acme.com">hello@acme.com</a></footer>
  </body>
</html>`;

const OFFLINE = { logo: { networkProbes: false } };

describe('enrichment pipeline', () => {
  let inputDir: string;

  beforeAll(async () => {
    inputDir = await mkdtemp(path.join(tmpdir(), 'pipeline-input-'));

    await mkdir(path.join(inputDir, 'acme.com'));
    await writeFile(path.join(inputDir, 'acme.com', 'index.html'), ACME_HTML);

    await mkdir(path.join(inputDir, 'empty.com'));
    await writeFile(path.join(inputDir, 'empty.com', 'index.html'), '<html><body><p>Coming soon</p></body></html>');

    await mkdir(path.join(inputDir, 'missing.com'));

    await writeFile(path.join(inputDir, 'notes.txt'), 'not a domain');
  });

  afterAll(async () => {
    await rm(inputDir, { recursive: true, force: true });
  });

  it('discovers one document per domain directory, sorted', async () => {
    const documents = await discoverDocuments(inputDir);
    expect(documents.map((doc) => doc.domain)).toEqual(['acme.com', 'empty.com', 'missing.com']);
    expect(documents[0].htmlPath).toBe(path.join(inputDir, 'acme.com', 'index.html'));
  });

  it('builds an accepted profile from a homepage', async () => {
    const outcome = await processDocument(
      { domain: 'acme.com', htmlPath: path.join(inputDir, 'acme.com', 'index.html') },
      OFFLINE
    );

    expect(outcome.status).toBe('accepted');
    if (outcome.status !== 'accepted') return;

    expect(outcome.profile).toEqual({
      domain: 'acme.com',
      company_name: 'Acme Analytics',
      logo: 'https://acme.com/apple-touch-icon.png',
      short_description: 'Acme Analytics builds data software for hospitals.',
      long_description:
        'Acme Analytics builds data software for hospitals. We provide a cloud platform that helps clinics track patient outcomes.',
      sector: 'Technology',
      industry: 'Software',
      sub_industry: 'Software',
      sic_code: '7372',
      sic_text: 'Prepackaged Software',
      tags: 'Technology, Software',
    });
    expect(outcome.logoTier).toBe('html_link');
    expect(outcome.contacts.email).toBe('hello@acme.com');
  });

  it('reports short text as insufficient', async () => {
    const outcome = await processDocument(
      { domain: 'empty.com', htmlPath: path.join(inputDir, 'empty.com', 'index.html') },
      OFFLINE
    );

    expect(outcome).toEqual({
      status: 'failed',
      domain: 'empty.com',
      reason: 'insufficient_text',
      detail: '11 characters extracted',
    });
  });

  it('runs the whole batch and keeps failures alongside successes', async () => {
    const run = await runEnrichmentPipeline(inputDir, { concurrency: 2, ...OFFLINE });

    expect(run.documents).toBe(3);
    expect(run.accepted.map((doc) => doc.profile.domain)).toEqual(['acme.com']);
    expect(run.failures.map((failure) => [failure.domain, failure.reason])).toEqual([
      ['empty.com', 'insufficient_text'],
      ['missing.com', 'missing_index'],
    ]);
  });

  it('fails the run when the input directory does not exist', async () => {
    await expect(runEnrichmentPipeline(path.join(inputDir, 'does-not-exist'))).rejects.toBeInstanceOf(
      InputDirectoryError
    );
  });

  it('fails the run when the input path is a file', async () => {
    await expect(discoverDocuments(path.join(inputDir, 'notes.txt'))).rejects.toBeInstanceOf(InputDirectoryError);
  });
});

describe('enrichment pipeline failure paths', () => {
  let inputDir: string;
  let outputDir: string;

  beforeAll(async () => {
    inputDir = await mkdtemp(path.join(tmpdir(), 'pipeline-failures-input-'));
    outputDir = await mkdtemp(path.join(tmpdir(), 'pipeline-failures-output-'));

    await mkdir(path.join(inputDir, 'acme.com'));
    await writeFile(path.join(inputDir, 'acme.com', 'index.html'), ACME_HTML);

    await mkdir(path.join(inputDir, 'bad.com'));
    await writeFile(
      path.join(inputDir, 'bad.com', 'index.html'),
      `<html><body><p>Bad Corp sells assorted goods to whoever asks for them. ${UNCLASSIFIED_MARKER} holding company with no listed trade.</p></body></html>`
    );

    await mkdir(path.join(inputDir, 'broken.com'));
    await writeFile(
      path.join(inputDir, 'broken.com', 'index.html'),
      `<html><body><main ${CRASH_MARKER}><p>Broken Ltd builds furniture for offices and schools across the region.</p></main></body></html>`
    );
  });

  afterAll(async () => {
    await rm(inputDir, { recursive: true, force: true });
    await rm(outputDir, { recursive: true, force: true });
  });

  it('returns a rejected outcome when the quality gate refuses the profile', async () => {
    const outcome = await processDocument(
      { domain: 'bad.com', htmlPath: path.join(inputDir, 'bad.com', 'index.html') },
      OFFLINE
    );

    expect(outcome).toEqual({ status: 'failed', domain: 'bad.com', reason: 'rejected', detail: 'unknown_industry' });
  });

  it('turns an exception in one document into processing_error and keeps the rest', async () => {
    const run = await runEnrichmentPipeline(inputDir, OFFLINE);

    expect(run.documents).toBe(3);
    expect(run.accepted.map((doc) => doc.profile.domain)).toEqual(['acme.com']);
    expect(run.failures).toEqual([
      { domain: 'bad.com', reason: 'rejected', detail: 'unknown_industry' },
      { domain: 'broken.com', reason: 'processing_error', detail: 'contact parser crashed' },
    ]);
  });

  it('lists failed domains and keeps them out of the final directory', async () => {
    const run = await runEnrichmentPipeline(inputDir, OFFLINE);
    await writePipelineArtifacts(outputDir, run, { writePerDomainJson: false });
    await runMergeStep(outputDir);

    expect(await readFile(path.join(outputDir, FAILED_DOMAINS_FILE), 'utf-8')).toBe('bad.com\nbroken.com');

    const final: unknown = JSON.parse(await readFile(path.join(outputDir, FINAL_PROFILES_FILE), 'utf-8'));
    expect(final).toEqual([expect.objectContaining({ domain: 'acme.com' })]);
  });
});
