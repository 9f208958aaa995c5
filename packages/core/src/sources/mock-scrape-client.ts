import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { SiteFetchError } from '@autoreg/shared/src/utils/errors.js';
import type { ScrapeClient, ScrapedPage } from './types.js';

const log = createChildLogger('sources:mock-scrape');

/** `null` simulates a page without body, an Error a failed request. */
export type MockScrapeResponse = ScrapedPage | null | Error;

function defaultPage(url: string): ScrapedPage {
  const host = new URL(url).hostname;
  return {
    title: `Vehicle regulations (${host})`,
    markdown: [
      '# Vehicle regulations',
      '',
      '## Emission and safety requirements',
      '',
      `Vehicles placed on the market shall comply with the applicable emission standard and safety regulation published by ${host}. ` +
        'Manufacturers must demonstrate compliance during type approval, including exhaust limits such as 60 mg/km NOx for petrol passenger cars ' +
        'and the occupant protection requirement of Regulation No 94.',
    ].join('\n'),
  };
}

export function createMockScrapeClient(
  responses?: ReadonlyMap<string, MockScrapeResponse>,
): ScrapeClient {
  log.info('Using mock scrape client');

  return {
    scrape(url: string): Promise<ScrapedPage | null> {
      log.debug({ url }, 'Mock scrape');

      const response = responses === undefined ? defaultPage(url) : responses.get(url);
      if (response instanceof Error) {
        return Promise.reject(new SiteFetchError(`Scrape failed for ${url}: ${response.message}`, url, undefined, response));
      }
      return Promise.resolve(response ?? null);
    },
  };
}
