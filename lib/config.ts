import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const PipelineConfigSchema = z.object({
  COMPANY_INPUT_DIR: z.string().min(1).default('data/input/website_dumps'),
  COMPANY_OUTPUT_DIR: z.string().min(1).default('data/output'),
  PIPELINE_CONCURRENCY: z.coerce.number().int().min(1).max(64).default(8),
  LOGO_PROBE_TIMEOUT_MS: z.coerce.number().int().min(500).max(10000).default(3000),
  LOGO_NETWORK_PROBES: booleanFlag.default('true'),
  WRITE_PER_DOMAIN_JSON: booleanFlag.default('true'),
});

export interface PipelineConfig {
  inputDir: string;
  outputDir: string;
  concurrency: number;
  probeTimeoutMs: number;
  networkProbes: boolean;
  writePerDomainJson: boolean;
}

/**
 * Read pipeline settings from environment variables.
 * Throws a ZodError naming every invalid key.
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PipelineConfig {
  const parsed = PipelineConfigSchema.parse(env);

  return {
    inputDir: parsed.COMPANY_INPUT_DIR,
    outputDir: parsed.COMPANY_OUTPUT_DIR,
    concurrency: parsed.PIPELINE_CONCURRENCY,
    probeTimeoutMs: parsed.LOGO_PROBE_TIMEOUT_MS,
    networkProbes: parsed.LOGO_NETWORK_PROBES,
    writePerDomainJson: parsed.WRITE_PER_DOMAIN_JSON,
  };
}
