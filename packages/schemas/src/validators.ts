import type { ZodError } from 'zod';
import { SchemaValidationError } from '@autoreg/shared/src/utils/errors.js';
import { CatalogSchema } from './catalog.schema.js';
import type { CatalogConfig } from './catalog.schema.js';
import { SettingsSchema } from './settings.schema.js';
import type { Settings } from './settings.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateCatalogConfig(data: unknown): CatalogConfig {
  const result = CatalogSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid catalog configuration', formatZodErrors(result.error));
  }

  return result.data;
}

export function validateSettings(data: unknown): Settings {
  const result = SettingsSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid settings configuration', formatZodErrors(result.error));
  }

  return result.data;
}
