import 'dotenv/config';
import * as path from 'path';
import { loadConfig } from '../lib/config';
import { CompanyDirectory } from '../lib/directory/companyDirectory';
import { FINAL_PROFILES_FILE } from '../lib/enrichment';

const domainToFind = process.argv[2];

if (!domainToFind) {
  console.error('Usage: npx tsx scripts/lookup-company.ts <domain>');
  process.exit(1);
}

async function main(): Promise<number> {
  const { outputDir } = loadConfig();
  const directory = new CompanyDirectory();
  await directory.load(path.join(outputDir, FINAL_PROFILES_FILE));

  const result = directory.lookup(domainToFind);
  if (!result.found) {
    console.log(`Company not found: ${result.domain}`);
    return 1;
  }

  console.log(JSON.stringify(result.profile, null, 2));
  return 0;
}

main()
  .then(code => process.exit(code))
  .catch(e => {
    console.error(e);
    process.exit(1);
  });
