import { resolve } from 'node:path';
import {
  loadConfig,
  loadCredentials,
  loadRuntimeOptions,
} from '@autoreg/schemas/src/config-loader.js';
import { createAdvisorDependencies } from '@autoreg/core/src/infrastructure/advisor-dependencies.js';

const DEFAULT_QUERY = 'What are the NOx emissions limits for diesel passenger cars in the EU?';

async function main(): Promise<void> {
  const query = process.argv.slice(2).join(' ').trim() || DEFAULT_QUERY;
  const runtime = loadRuntimeOptions(process.env);
  const credentials = loadCredentials(process.env);

  console.log('=== Automotive Regulation Advisor ===\n');
  console.log(`Config directory: ${resolve(runtime.configDir)}`);
  console.log(`Data directory: ${resolve(runtime.dataDir)}`);
  console.log(`Mock services: ${credentials.mode === 'mock' ? 'yes' : 'no'}`);
  console.log(`Question: ${query}\n`);

  const config = await loadConfig(resolve(runtime.configDir));
  const { advisor } = await createAdvisorDependencies({
    config,
    credentials,
    dataDir: resolve(runtime.dataDir),
  });

  const session = advisor.startSession();
  const response = await advisor.ask(session, query);

  if (response.status === 'answered') {
    console.log('--- Answer ---');
    console.log(response.answer);

    console.log('\n--- Sources ---');
    for (const citation of response.citations) {
      console.log(`  [Source ${String(citation.index)}] ${citation.title}`);
      console.log(`    ${citation.url}`);
    }
    if (response.usedSecondary) {
      console.log('  (includes results from the licensed regulation database)');
    }
    if (response.usedStaticFallback) {
      console.log('  (general guidance only: no live source returned content)');
    }

    const { regulationNumbers, limits, complianceDates } = response.highlights;
    if (regulationNumbers.length + limits.length + complianceDates.length > 0) {
      console.log('\n--- Highlights ---');
      if (regulationNumbers.length > 0) console.log(`  Regulations: ${regulationNumbers.join(', ')}`);
      if (limits.length > 0) console.log(`  Limits: ${limits.join(', ')}`);
      if (complianceDates.length > 0) console.log(`  Dates: ${complianceDates.join(', ')}`);
    }
  } else {
    console.log(`--- ${response.status === 'no_data' ? 'No data found' : 'Service unavailable'} ---`);
    console.log(response.message);
    if (response.suggestions.length > 0) {
      console.log('\nTry searching for:');
      for (const suggestion of response.suggestions) {
        console.log(`  - ${suggestion}`);
      }
    }
  }

  console.log(`\nTopic: ${response.topic}`);
  console.log(`Response time: ${response.responseTimeSeconds.toFixed(2)}s`);
  console.log(`Session: ${session.sessionId}`);

  if (response.status !== 'answered') {
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  console.error('Query failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
