import { join, resolve } from 'node:path';
import { loadRuntimeOptions } from '@autoreg/schemas/src/config-loader.js';
import { QUERY_LOG_FILE } from '@autoreg/core/src/infrastructure/advisor-dependencies.js';
import { createCsvQueryLogRepository } from '@autoreg/core/src/infrastructure/csv-query-log.repository.js';

async function main(): Promise<void> {
  const runtime = loadRuntimeOptions(process.env);
  const dataDir = resolve(runtime.dataDir);
  const outputPath = resolve(process.argv[2] ?? join(dataDir, 'query-log-anonymized.csv'));

  const repository = createCsvQueryLogRepository(join(dataDir, QUERY_LOG_FILE));
  const rows = await repository.exportAnonymized(outputPath);

  if (rows === 0) {
    console.log('Query log is empty, nothing exported.');
    process.exitCode = 1;
    return;
  }
  console.log(`Exported ${String(rows)} anonymized rows to ${outputPath}`);
}

main().catch((error: unknown) => {
  console.error('Export failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
