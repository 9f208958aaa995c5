import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { ConfigurationError } from '@autoreg/shared/src/utils/errors.js';
import { validateCatalogConfig, validateSettings } from './validators.js';
import type { CatalogConfig } from './catalog.schema.js';
import type { Settings } from './settings.schema.js';

export interface AppConfig {
  readonly catalog: CatalogConfig;
  readonly settings: Settings;
}

export interface RegulationDatabaseCredentials {
  readonly email: string;
  readonly password: string;
  readonly baseUrl: string;
}

export type ServiceCredentials =
  | { readonly mode: 'mock' }
  | {
      readonly mode: 'live';
      readonly scrapeApiKey: string;
      readonly scrapeBaseUrl: string;
      readonly gcpProjectId: string;
      readonly vertexLocation: string;
      readonly llmModel: string;
      /** Absent when the licensed database is not configured. */
      readonly regulationDatabase?: RegulationDatabaseCredentials;
    };

export interface RuntimeOptions {
  readonly configDir: string;
  readonly dataDir: string;
  readonly port: number;
}

export type Environment = Readonly<Record<string, string | undefined>>;

const DEFAULT_SCRAPE_BASE_URL = 'https://api.firecrawl.dev/v1';
const DEFAULT_REGULATION_DATABASE_URL = 'https://www.interregs.net';
const DEFAULT_VERTEX_LOCATION = 'europe-west1';
const DEFAULT_LLM_MODEL = 'gemini-2.0-flash';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function readJsonFile(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return JSON.parse(content) as unknown;
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ConfigurationError(`Invalid JSON in ${filePath}: ${error.message}`);
    }
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    const message = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${message}`);
  }
}

export async function loadConfig(configDir: string): Promise<AppConfig> {
  const catalogPath = join(configDir, 'catalog.json');
  const settingsPath = join(configDir, 'settings.json');

  const [catalogRaw, settingsRaw] = await Promise.all([
    readJsonFile(catalogPath),
    readJsonFile(settingsPath),
  ]);

  const catalog = validateCatalogConfig(catalogRaw);
  const settings = validateSettings(settingsRaw);

  return { catalog, settings };
}

/** Values copied from a sample env file, e.g. `your_firecrawl_api_key_here`. */
export function isPlaceholderValue(value: string | undefined): boolean {
  if (value === undefined || value.trim() === '') {
    return true;
  }
  const normalized = value.trim().toLowerCase();
  return (
    normalized.startsWith('your_') ||
    normalized.startsWith('your-') ||
    normalized.includes('placeholder') ||
    normalized === 'changeme'
  );
}

function requireValue(env: Environment, name: string, description: string): string {
  const value = env[name];
  if (value === undefined || isPlaceholderValue(value)) {
    throw new ConfigurationError(`${name} environment variable is required for ${description}`);
  }
  return value.trim();
}

function readRegulationDatabase(env: Environment): RegulationDatabaseCredentials | undefined {
  const email = env['INTERREGS_EMAIL'];
  const password = env['INTERREGS_PASSWORD'];

  if (isPlaceholderValue(email) || isPlaceholderValue(password) || !email || !password) {
    return undefined;
  }

  return {
    email: email.trim(),
    password,
    baseUrl: env['INTERREGS_BASE_URL']?.trim() || DEFAULT_REGULATION_DATABASE_URL,
  };
}

export function loadCredentials(env: Environment): ServiceCredentials {
  if (env['AUTOREG_MOCK_SERVICES'] === 'true') {
    return { mode: 'mock' };
  }

  const scrapeApiKey = requireValue(env, 'FIRECRAWL_API_KEY', 'website scraping');
  const projectIdName =
    env['AUTOREG_GCP_PROJECT_ID'] !== undefined ? 'AUTOREG_GCP_PROJECT_ID' : 'GCP_PROJECT_ID';
  const gcpProjectId = requireValue(env, projectIdName, 'the Vertex AI language model');

  return {
    mode: 'live',
    scrapeApiKey,
    scrapeBaseUrl: env['FIRECRAWL_BASE_URL']?.trim() || DEFAULT_SCRAPE_BASE_URL,
    gcpProjectId,
    vertexLocation: env['VERTEX_AI_LOCATION']?.trim() || DEFAULT_VERTEX_LOCATION,
    llmModel: env['AUTOREG_LLM_MODEL']?.trim() || DEFAULT_LLM_MODEL,
    regulationDatabase: readRegulationDatabase(env),
  };
}

export function loadRuntimeOptions(env: Environment): RuntimeOptions {
  const rawPort = env['PORT'] ?? '3000';
  const port = Number(rawPort);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 1 and 65535, got: ${rawPort}`);
  }

  return {
    configDir: env['AUTOREG_CONFIG_DIR'] ?? './config',
    dataDir: env['AUTOREG_DATA_DIR'] ?? './data',
    port,
  };
}
