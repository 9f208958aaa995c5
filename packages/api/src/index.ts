import { resolve } from 'node:path';
import { serve } from '@hono/node-server';
import {
  loadConfig,
  loadCredentials,
  loadRuntimeOptions,
} from '@autoreg/schemas/src/config-loader.js';
import { createAdvisorDependencies } from '@autoreg/core/src/infrastructure/advisor-dependencies.js';
import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const runtime = loadRuntimeOptions(process.env);
  const credentials = loadCredentials(process.env);
  const config = await loadConfig(resolve(runtime.configDir));

  const deps = await createAdvisorDependencies({
    config,
    credentials,
    dataDir: resolve(runtime.dataDir),
  });

  const app = createApp(deps);

  log.info({ port: runtime.port, mode: credentials.mode }, 'Starting regulation advisor API server');

  serve({ fetch: app.fetch, port: runtime.port }, (info) => {
    log.info({ port: info.port }, 'Regulation advisor API server running');
  });
}

main().catch((error: unknown) => {
  log.error({ error: errorMessage(error) }, 'Failed to start API server');
  process.exit(1);
});
