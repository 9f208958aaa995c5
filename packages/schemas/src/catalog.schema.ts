import { z } from 'zod';
import type { WebsiteCatalogEntry } from '@autoreg/shared/src/types/regulation.types.js';

const CatalogKeySchema = z.string().regex(/^[A-Z][A-Z0-9_]*$/, 'Catalog keys are UPPER_SNAKE_CASE');

const KeywordTableSchema = z.record(z.string().min(1), z.array(CatalogKeySchema).min(1));

export const CatalogSchema = z
  .object({
    $schema: z.string().optional(),
    websites: z.record(CatalogKeySchema, z.string().url()),
    regionWebsites: KeywordTableSchema,
    categoryWebsites: KeywordTableSchema,
    globalDefaults: z.array(CatalogKeySchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const known = new Set(Object.keys(catalog.websites));
    if (known.size === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['websites'],
        message: 'At least one website is required',
      });
    }

    const tables = [
      ['regionWebsites', catalog.regionWebsites],
      ['categoryWebsites', catalog.categoryWebsites],
    ] as const;
    for (const [tableName, table] of tables) {
      for (const [keyword, keys] of Object.entries(table)) {
        for (const key of keys) {
          if (!known.has(key)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [tableName, keyword],
              message: `Unknown catalog key: ${key}`,
            });
          }
        }
      }
    }

    for (const key of catalog.globalDefaults) {
      if (!known.has(key)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['globalDefaults'],
          message: `Unknown catalog key: ${key}`,
        });
      }
    }
  });

export type CatalogConfig = z.infer<typeof CatalogSchema>;

export function toCatalogEntries(catalog: CatalogConfig): readonly WebsiteCatalogEntry[] {
  return Object.entries(catalog.websites).map(([key, url]) => ({ key, url }));
}
