import { describe, expect, it } from 'vitest';
import { ZodError } from 'zod';
import { loadConfig } from './config';

describe('loadConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual({
      inputDir: 'data/input/website_dumps',
      outputDir: 'data/output',
      concurrency: 8,
      probeTimeoutMs: 3000,
      networkProbes: true,
      writePerDomainJson: true,
    });
  });

  it('parses numbers and boolean flags from strings', () => {
    const config = loadConfig({
      COMPANY_INPUT_DIR: '/srv/dumps',
      PIPELINE_CONCURRENCY: '4',
      LOGO_PROBE_TIMEOUT_MS: '1500',
      LOGO_NETWORK_PROBES: '0',
      WRITE_PER_DOMAIN_JSON: 'false',
    });

    expect(config.inputDir).toBe('/srv/dumps');
    expect(config.concurrency).toBe(4);
    expect(config.probeTimeoutMs).toBe(1500);
    expect(config.networkProbes).toBe(false);
    expect(config.writePerDomainJson).toBe(false);
  });

  it('rejects out-of-range or malformed values', () => {
    expect(() => loadConfig({ PIPELINE_CONCURRENCY: '0' })).toThrow(ZodError);
    expect(() => loadConfig({ LOGO_PROBE_TIMEOUT_MS: '50' })).toThrow(ZodError);
    expect(() => loadConfig({ LOGO_NETWORK_PROBES: 'yes' })).toThrow(ZodError);
  });
});
