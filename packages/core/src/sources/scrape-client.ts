import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { ConfigurationError, SiteFetchError, toError } from '@autoreg/shared/src/utils/errors.js';
import type { ScrapeClient, ScrapedPage } from './types.js';

const log = createChildLogger('sources:scrape-client');

export interface ScrapeClientConfig {
  readonly apiKey: string;
  readonly baseUrl: string;
}

const ScrapePayloadSchema = z.object({
  markdown: z.string().optional(),
  metadata: z
    .object({
      title: z.string().optional(),
      statusCode: z.number().optional(),
    })
    .passthrough()
    .optional(),
});

const ScrapeResponseSchema = z.union([
  z.object({ success: z.boolean().optional(), data: ScrapePayloadSchema }),
  ScrapePayloadSchema,
]);

type ScrapePayload = z.infer<typeof ScrapePayloadSchema>;

export function parseScrapeResponse(body: unknown): ScrapedPage | null {
  const result = ScrapeResponseSchema.safeParse(body);
  if (!result.success) {
    return null;
  }

  const payload: ScrapePayload = 'data' in result.data ? result.data.data : result.data;
  const markdown = payload.markdown?.trim() ?? '';
  if (markdown === '') {
    return null;
  }

  const title = payload.metadata?.title?.trim();
  return { markdown, title: title === '' ? undefined : title };
}

function describeFailure(error: unknown): { message: string; status?: number } {
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return {
      message: status !== undefined ? `HTTP ${String(status)}` : error.code ?? error.message,
      status,
    };
  }
  return { message: toError(error).message };
}

/** Client for a Firecrawl-compatible `/scrape` endpoint. */
export function createScrapeClient(config: ScrapeClientConfig): ScrapeClient {
  if (!config.apiKey) {
    throw new ConfigurationError('API key is required for the scrape client');
  }

  const http: AxiosInstance = axios.create({
    baseURL: config.baseUrl,
    headers: {
      Authorization: `Bearer ${config.apiKey}`,
      'Content-Type': 'application/json',
    },
  });

  log.info({ baseUrl: config.baseUrl }, 'Creating scrape client');

  return {
    async scrape(url: string, timeoutMs: number): Promise<ScrapedPage | null> {
      log.debug({ url, timeoutMs }, 'Scraping site');

      try {
        const response = await http.post<unknown>(
          '/scrape',
          { url, formats: ['markdown'], timeout: timeoutMs },
          { timeout: timeoutMs },
        );
        return parseScrapeResponse(response.data);
      } catch (error) {
        const { message, status } = describeFailure(error);
        throw new SiteFetchError(`Scrape failed for ${url}: ${message}`, url, status, toError(error));
      }
    },
  };
}
