import { describe, it, expect } from 'vitest';
import { SecondarySourceError } from '@autoreg/shared/src/utils/errors.js';
import {
  createRegulationDatabaseClient,
  extractDocumentText,
  findLoginFormFields,
  parseSearchResults,
  resolveEntryUrl,
} from './regulation-database-client.js';
import type { HttpPage, HttpSession } from './regulation-database-client.js';
import { createMockRegulationDatabaseClient } from './mock-regulation-database-client.js';

const BASE_URL = 'https://regdb.test';

const LONG_SUMMARY =
  'Type approval of light passenger and commercial vehicles with respect to emissions, including NOx and particulate limits for Euro 6.';

const LOGIN_PAGE =
  '<html><body><form id="login" action="/login.php"><input type="hidden" name="csrf" value="tok-1"><input type="email" name="email"></form></body></html>';

const SEARCH_PAGE = `
  <div class="search-result"><h3>Euro 6 light-duty emissions</h3><a href="/db/doc.php?id=1">Open</a><p class="summary">${LONG_SUMMARY}</p></div>
  <div class="search-result"><h4>Short entry</h4><a href="doc.php?id=2">Open</a><p class="summary">Too short.</p></div>
`;

const DOCUMENT_PAGE =
  '<html><body><nav>Menu</nav><div class="regulation-content"><h1>Euro 6</h1><p>NOx limit: 80 mg/km.</p><p>Applies from 2014.</p></div></body></html>';

const SEARCH_URL = `${BASE_URL}/db/search.php?search=NOx+limits&region=EU&category=Emissions&action=search`;

interface RecordedCall {
  readonly method: 'GET' | 'POST';
  readonly url: string;
  readonly fields?: Readonly<Record<string, string>>;
}

function createFakeSession(routes: Record<string, HttpPage | Error>): {
  session: HttpSession;
  calls: RecordedCall[];
} {
  const calls: RecordedCall[] = [];

  function respond(key: string): Promise<HttpPage> {
    const route = routes[key] ?? { status: 404, body: 'Not found' };
    return route instanceof Error ? Promise.reject(route) : Promise.resolve(route);
  }

  return {
    calls,
    session: {
      get(url: string): Promise<HttpPage> {
        calls.push({ method: 'GET', url });
        return respond(`GET ${url}`);
      },
      postForm(url: string, fields: Readonly<Record<string, string>>): Promise<HttpPage> {
        calls.push({ method: 'POST', url, fields });
        return respond(`POST ${url}`);
      },
    },
  };
}

const credentials = { email: 'user@example.com', password: 'test-password', baseUrl: BASE_URL };

const searchRequest = {
  query: 'NOx limits',
  region: 'EU',
  category: 'Emissions',
  maxResults: 5,
  timeoutMs: 15_000,
};

describe('findLoginFormFields', () => {
  it('should collect hidden inputs of the login form', () => {
    expect(findLoginFormFields(LOGIN_PAGE)).toEqual({ csrf: 'tok-1' });
  });

  it('should return null when there is no form', () => {
    expect(findLoginFormFields('<html><body>No form here</body></html>')).toBeNull();
  });
});

describe('resolveEntryUrl', () => {
  it.each([
    ['https://other.test/r10', 'https://other.test/r10'],
    ['/db/doc.php?id=1', 'https://regdb.test/db/doc.php?id=1'],
    ['doc.php?id=2', 'https://regdb.test/db/doc.php?id=2'],
  ])('should resolve %s', (href, expected) => {
    expect(resolveEntryUrl(href, BASE_URL)).toBe(expected);
  });
});

describe('parseSearchResults', () => {
  it('should read title, link and summary of each entry', () => {
    expect(parseSearchResults(SEARCH_PAGE, BASE_URL)).toEqual([
      {
        title: 'Euro 6 light-duty emissions',
        documentUrl: 'https://regdb.test/db/doc.php?id=1',
        summary: LONG_SUMMARY,
      },
      {
        title: 'Short entry',
        documentUrl: 'https://regdb.test/db/doc.php?id=2',
        summary: 'Too short.',
      },
    ]);
  });

  it('should fall back to table rows with a matching class', () => {
    const html =
      '<table><tr class="regulation-row"><td><strong>ECE R10</strong> <a href="https://other.test/r10">doc</a></td></tr><tr><td>ignored</td></tr></table>';

    expect(parseSearchResults(html, BASE_URL)).toEqual([
      { title: 'ECE R10', documentUrl: 'https://other.test/r10', summary: undefined },
    ]);
  });
});

describe('extractDocumentText', () => {
  it('should keep the main content, one block per line', () => {
    expect(extractDocumentText(DOCUMENT_PAGE)).toBe('Euro 6\nNOx limit: 80 mg/km.\nApplies from 2014.');
  });
});

describe('createRegulationDatabaseClient', () => {
  const happyRoutes: Record<string, HttpPage | Error> = {
    [`GET ${BASE_URL}/db/index.php`]: { status: 200, body: LOGIN_PAGE },
    [`POST ${BASE_URL}/login.php`]: { status: 200, body: '<p>Welcome back</p>' },
    [`GET ${SEARCH_URL}`]: { status: 200, body: SEARCH_PAGE },
    [`GET ${BASE_URL}/db/doc.php?id=1`]: { status: 200, body: DOCUMENT_PAGE },
  };

  it('should log in, search and collect documents and long summaries', async () => {
    const { session, calls } = createFakeSession(happyRoutes);
    const client = createRegulationDatabaseClient({ credentials, session });

    const hits = await client.search(searchRequest);

    expect(hits).toEqual([
      {
        text: 'Euro 6\nNOx limit: 80 mg/km.\nApplies from 2014.',
        url: 'https://regdb.test/db/doc.php?id=1',
        title: 'Euro 6 light-duty emissions',
      },
      {
        text: `Summary: ${LONG_SUMMARY}`,
        url: SEARCH_URL,
        title: 'Euro 6 light-duty emissions - Summary',
      },
    ]);

    const login = calls.find((call) => call.method === 'POST');
    expect(login?.fields).toMatchObject({
      email: 'user@example.com',
      password: 'test-password',
      csrf: 'tok-1',
    });
  });

  it('should log in only once across searches', async () => {
    const { session, calls } = createFakeSession(happyRoutes);
    const client = createRegulationDatabaseClient({ credentials, session });

    await client.search(searchRequest);
    await client.search(searchRequest);

    expect(calls.filter((call) => call.method === 'POST')).toHaveLength(1);
  });

  it('should skip the form when the session is already active', async () => {
    const { session, calls } = createFakeSession({
      ...happyRoutes,
      [`GET ${BASE_URL}/db/index.php`]: { status: 200, body: '<p>Welcome, user</p>' },
    });
    const client = createRegulationDatabaseClient({ credentials, session });

    await client.search(searchRequest);

    expect(calls.some((call) => call.method === 'POST')).toBe(false);
  });

  it('should try every login endpoint before giving up', async () => {
    const rejected = { status: 200, body: '<p>Invalid password</p>' };
    const { session, calls } = createFakeSession({
      [`GET ${BASE_URL}/db/index.php`]: { status: 200, body: LOGIN_PAGE },
      [`POST ${BASE_URL}/login.php`]: rejected,
      [`POST ${BASE_URL}/db/login.php`]: rejected,
      [`POST ${BASE_URL}/auth/login.php`]: new Error('ECONNRESET'),
      [`POST ${BASE_URL}/user/login.php`]: rejected,
    });
    const client = createRegulationDatabaseClient({ credentials, session });

    await expect(client.search(searchRequest)).rejects.toThrow(SecondarySourceError);
    expect(calls.filter((call) => call.method === 'POST')).toHaveLength(4);
  });

  it('should fail when the main page is unavailable', async () => {
    const { session } = createFakeSession({
      [`GET ${BASE_URL}/db/index.php`]: { status: 503, body: '' },
    });
    const client = createRegulationDatabaseClient({ credentials, session });

    await expect(client.search(searchRequest)).rejects.toThrow('Regulation database login failed');
  });

  it('should fail on a search error status', async () => {
    const { session } = createFakeSession({
      ...happyRoutes,
      [`GET ${SEARCH_URL}`]: { status: 500, body: '' },
    });
    const client = createRegulationDatabaseClient({ credentials, session });

    await expect(client.search(searchRequest)).rejects.toThrow(
      'Regulation database search failed with HTTP 500',
    );
  });
});

describe('createRegulationDatabaseClient getById', () => {
  const loginRoutes: Record<string, HttpPage | Error> = {
    [`GET ${BASE_URL}/db/index.php`]: { status: 200, body: LOGIN_PAGE },
    [`POST ${BASE_URL}/login.php`]: { status: 200, body: '<p>Welcome back</p>' },
  };

  it('should log in and return the regulation text and heading', async () => {
    const { session, calls } = createFakeSession({
      ...loginRoutes,
      [`GET ${BASE_URL}/db/index.php?id=ATO-01`]: { status: 200, body: DOCUMENT_PAGE },
    });
    const client = createRegulationDatabaseClient({ credentials, session });

    await expect(client.getById('ATO-01', 15_000)).resolves.toEqual({
      text: 'Euro 6\nNOx limit: 80 mg/km.\nApplies from 2014.',
      url: 'https://regdb.test/db/index.php?id=ATO-01',
      title: 'Euro 6',
    });
    expect(calls.filter((call) => call.method === 'POST')).toHaveLength(1);
  });

  it('should name the regulation by id when the page has no heading', async () => {
    const { session } = createFakeSession({
      ...loginRoutes,
      [`GET ${BASE_URL}/db/index.php?id=ATO-02`]: {
        status: 200,
        body: '<html><body><div class="regulation-content"><p>Lighting devices.</p></div></body></html>',
      },
    });
    const client = createRegulationDatabaseClient({ credentials, session });

    const hit = await client.getById('ATO-02', 15_000);

    expect(hit.title).toBe('Regulation ATO-02');
    expect(hit.text).toBe('Lighting devices.');
  });

  it('should reject when the regulation page is unavailable', async () => {
    const { session } = createFakeSession(loginRoutes);
    const client = createRegulationDatabaseClient({ credentials, session });

    await expect(client.getById('ATO-03', 15_000)).rejects.toThrow(
      'Failed to fetch regulation ATO-03: HTTP 404',
    );
  });
});

describe('createMockRegulationDatabaseClient', () => {
  it('should look up a configured hit by its id', async () => {
    const hit = { text: 'Text', url: 'https://regdb.test/db/doc.php?id=7', title: 'Seven' };
    const client = createMockRegulationDatabaseClient([hit]);

    await expect(client.getById('7', 1_000)).resolves.toEqual(hit);
    await expect(client.getById('8', 1_000)).rejects.toThrow(SecondarySourceError);
  });

  it('should return configured hits up to the limit', async () => {
    const hit = { text: 'Text', url: 'https://regdb.test/1', title: 'One' };
    const client = createMockRegulationDatabaseClient([hit, hit, hit]);

    await expect(client.search({ ...searchRequest, maxResults: 2 })).resolves.toEqual([hit, hit]);
  });

  it('should reject with SecondarySourceError for a configured error', async () => {
    const client = createMockRegulationDatabaseClient(new Error('offline'));

    await expect(client.search(searchRequest)).rejects.toThrow(SecondarySourceError);
  });
});
