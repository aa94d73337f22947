import 'dotenv/config';
import { loadConfig } from '../lib/config';
import { runEnrichmentPipeline, runMergeStep, writePipelineArtifacts } from '../lib/enrichment';

async function main() {
  const config = loadConfig();

  const run = await runEnrichmentPipeline(config.inputDir, {
    concurrency: config.concurrency,
    logo: {
      timeoutMs: config.probeTimeoutMs,
      networkProbes: config.networkProbes,
    },
  });

  await writePipelineArtifacts(config.outputDir, run, {
    writePerDomainJson: config.writePerDomainJson,
  });

  const merged = await runMergeStep(config.outputDir);

  console.log('Sector distribution:');
  for (const { sector, count } of merged.stats.sectorDistribution.slice(0, 10)) {
    console.log(`  ${sector}: ${count}`);
  }
}

main()
  .then(() => process.exit(0))
  .catch(e => {
    console.error(e);
    process.exit(1);
  });
