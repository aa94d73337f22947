import 'dotenv/config';
import { loadConfig } from '../lib/config';
import { runMergeStep } from '../lib/enrichment';

async function main() {
  const { outputDir } = loadConfig();
  const result = await runMergeStep(outputDir);

  if (result.duplicates > 0) {
    console.log(`Duplicates removed: ${result.duplicateDomains.join(', ')}`);
  }
}

main()
  .then(() => process.exit(0))
  .catch(e => {
    console.error(e);
    process.exit(1);
  });
