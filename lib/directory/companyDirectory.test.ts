import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CompanyDirectory, DirectoryNotLoadedError } from './companyDirectory';

const PROFILES = [
  {
    domain: 'acme.com',
    company_name: 'Acme',
    logo: 'https://acme.com/favicon.ico',
    short_description: 'Acme builds rockets.',
    long_description: 'Acme builds rockets. It has for decades.',
    sector: 'Manufacturing',
    industry: 'Aerospace',
    sub_industry: 'Aerospace',
    sic_code: '3721',
    sic_text: 'Aircraft',
    tags: 'Manufacturing, Aerospace',
  },
  { domain: 'globex.com', company_name: 'Globex', sector: 'Technology' },
];

describe('CompanyDirectory', () => {
  let dir: string;
  let filePath: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'company-directory-'));
    filePath = path.join(dir, 'companies.json');
    await writeFile(filePath, JSON.stringify(PROFILES));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('looks companies up by normalized domain', async () => {
    const directory = new CompanyDirectory();
    expect(await directory.load(filePath)).toBe(2);

    const result = directory.lookup('https://www.Acme.com/about');
    expect(result).toEqual({ found: true, profile: PROFILES[0] });
  });

  it('returns a 404 result for unknown domains', async () => {
    const directory = new CompanyDirectory();
    await directory.load(filePath);

    expect(directory.lookup('initech.com')).toEqual({ found: false, status: 404, domain: 'initech.com' });
  });

  it('lists summaries with missing fields filled in', async () => {
    const directory = new CompanyDirectory();
    await directory.load(filePath);

    expect(directory.list()).toEqual([
      {
        domain: 'acme.com',
        company_name: 'Acme',
        logo: 'https://acme.com/favicon.ico',
        sector: 'Manufacturing',
        short_description: 'Acme builds rockets.',
      },
      { domain: 'globex.com', company_name: 'Globex', logo: '', sector: 'Technology', short_description: '' },
    ]);
  });

  it('refuses to reload before the first load', async () => {
    await expect(new CompanyDirectory().reload()).rejects.toBeInstanceOf(DirectoryNotLoadedError);
  });

  it('reload picks up a rewritten file', async () => {
    const directory = new CompanyDirectory();
    await directory.load(filePath);

    await writeFile(filePath, JSON.stringify([PROFILES[1]]));
    expect(await directory.reload()).toBe(1);
    expect(directory.lookup('acme.com').found).toBe(false);
    expect(directory.loadedFrom).toBe(filePath);
  });
});
