import { describe, it, expect, vi, beforeEach } from 'vitest';
import { SiteFetchError } from '@autoreg/shared/src/utils/errors.js';
import { createScrapeClient, parseScrapeResponse } from './scrape-client.js';
import { createMockScrapeClient } from './mock-scrape-client.js';
import type { MockScrapeResponse } from './mock-scrape-client.js';

const { postMock, createMock } = vi.hoisted(() => ({
  postMock: vi.fn(),
  createMock: vi.fn(),
}));

vi.mock('axios', () => ({
  default: {
    create: (config: unknown) => {
      createMock(config);
      return { post: postMock };
    },
    isAxiosError: (error: unknown) => error instanceof Error && 'isAxiosError' in error,
  },
}));

describe('parseScrapeResponse', () => {
  it('should read the wrapped response shape', () => {
    expect(
      parseScrapeResponse({
        success: true,
        data: { markdown: '# Rules\n\nText', metadata: { title: 'Rules page', statusCode: 200 } },
      }),
    ).toEqual({ markdown: '# Rules\n\nText', title: 'Rules page' });
  });

  it('should read the bare response shape', () => {
    expect(parseScrapeResponse({ markdown: 'Body' })).toEqual({ markdown: 'Body', title: undefined });
  });

  it('should return null without a body', () => {
    expect(parseScrapeResponse({ data: { markdown: '   ' } })).toBeNull();
    expect(parseScrapeResponse({ data: { metadata: { title: 'Empty' } } })).toBeNull();
  });

  it('should return null for an unexpected payload', () => {
    expect(parseScrapeResponse('not json')).toBeNull();
  });
});

describe('createScrapeClient', () => {
  beforeEach(() => {
    postMock.mockReset();
    createMock.mockReset();
  });

  it('should post the scrape request with bearer auth and timeout', async () => {
    postMock.mockResolvedValue({ data: { data: { markdown: 'Body', metadata: { title: 'T' } } } });

    const client = createScrapeClient({ apiKey: 'test-secret', baseUrl: 'https://scrape.test/v1' });
    const page = await client.scrape('https://unece.org/', 30_000);

    expect(page).toEqual({ markdown: 'Body', title: 'T' });
    expect(createMock).toHaveBeenCalledWith(
      expect.objectContaining({
        baseURL: 'https://scrape.test/v1',
        headers: expect.objectContaining({ Authorization: 'Bearer test-secret' }),
      }),
    );
    expect(postMock).toHaveBeenCalledWith(
      '/scrape',
      { url: 'https://unece.org/', formats: ['markdown'], timeout: 30_000 },
      { timeout: 30_000 },
    );
  });

  it('should wrap HTTP failures in SiteFetchError with the status', async () => {
    postMock.mockRejectedValue(
      Object.assign(new Error('Request failed'), { isAxiosError: true, response: { status: 502 } }),
    );

    const client = createScrapeClient({ apiKey: 'test-secret', baseUrl: 'https://scrape.test/v1' });

    await expect(client.scrape('https://unece.org/', 1000)).rejects.toMatchObject({
      name: 'SiteFetchError',
      url: 'https://unece.org/',
      status: 502,
      message: 'Scrape failed for https://unece.org/: HTTP 502',
    });
  });

  it('should wrap timeouts', async () => {
    postMock.mockRejectedValue(
      Object.assign(new Error('timeout of 1000ms exceeded'), { isAxiosError: true, code: 'ECONNABORTED' }),
    );

    const client = createScrapeClient({ apiKey: 'test-secret', baseUrl: 'https://scrape.test/v1' });

    await expect(client.scrape('https://unece.org/', 1000)).rejects.toThrow(
      'Scrape failed for https://unece.org/: ECONNABORTED',
    );
  });

  it('should require an API key', () => {
    expect(() => createScrapeClient({ apiKey: '', baseUrl: 'https://scrape.test/v1' })).toThrow(
      'API key is required',
    );
  });
});

describe('createMockScrapeClient', () => {
  it('should return a default regulatory page', async () => {
    const page = await createMockScrapeClient().scrape('https://unece.org/transport', 1000);

    expect(page?.title).toBe('Vehicle regulations (unece.org)');
    expect(page?.markdown).toContain('60 mg/km');
  });

  it('should replay configured responses', async () => {
    const client = createMockScrapeClient(
      new Map<string, MockScrapeResponse>([
        ['https://a.test/', { markdown: 'A' }],
        ['https://b.test/', new Error('down')],
      ]),
    );

    await expect(client.scrape('https://a.test/', 1000)).resolves.toEqual({ markdown: 'A' });
    await expect(client.scrape('https://b.test/', 1000)).rejects.toThrow(SiteFetchError);
    await expect(client.scrape('https://c.test/', 1000)).resolves.toBeNull();
  });
});
