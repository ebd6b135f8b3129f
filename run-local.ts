import 'dotenv/config';
import { loadConfig } from './lambda/cost-reporter/config';
import { createCostExplorerSource } from './lambda/cost-reporter/cost-fetcher';
import { describeError } from './lambda/cost-reporter/errors';
import { runReport } from './lambda/cost-reporter/index';
import { formatCostLine } from './lambda/cost-reporter/report-formatter';
import { createKmsDecrypter } from './lambda/cost-reporter/secrets';

async function runLocal(): Promise<void> {
  const config = await loadConfig(process.env, createKmsDecrypter());
  const entries = await runReport(config, {
    costSource: createCostExplorerSource(config.costExplorerRegion),
  });

  console.log('\nCost report:');
  entries.forEach((entry) => console.log(`  ${formatCostLine(entry)}`));
}

runLocal()
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('Cost report failed:', describeError(error));
    process.exit(1);
  });
