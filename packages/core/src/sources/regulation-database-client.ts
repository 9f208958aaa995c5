import axios from 'axios';
import { load } from 'cheerio';
import type { Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { RegulationDatabaseCredentials } from '@autoreg/schemas/src/config-loader.js';
import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import { SecondarySourceError, toError } from '@autoreg/shared/src/utils/errors.js';
import type {
  RegulationDatabaseClient,
  SecondaryHit,
  SecondarySearchRequest,
} from './types.js';

const log = createChildLogger('sources:regulation-database');

const LOGIN_PATHS = ['/login.php', '/db/login.php', '/auth/login.php', '/user/login.php'];
const LOGGED_IN_MARKERS = ['welcome', 'dashboard'];
const LOGIN_SUCCESS_MARKERS = ['welcome', 'dashboard', 'logout', 'profile'];
const MIN_SUMMARY_LENGTH = 100;
const USER_AGENT = 'Mozilla/5.0 (compatible; autoreg-advisor)';

export interface HttpPage {
  readonly status: number;
  readonly body: string;
}

/** Cookie-keeping HTTP session; non-2xx statuses resolve, transport errors reject. */
export interface HttpSession {
  get(url: string, timeoutMs: number): Promise<HttpPage>;
  postForm(
    url: string,
    fields: Readonly<Record<string, string>>,
    timeoutMs: number,
    headers?: Readonly<Record<string, string>>,
  ): Promise<HttpPage>;
}

export interface SearchEntry {
  readonly title: string;
  readonly documentUrl?: string;
  readonly summary?: string;
}

export function createAxiosHttpSession(): HttpSession {
  const cookies = new Map<string, string>();
  const http = axios.create({
    responseType: 'text',
    validateStatus: () => true,
    maxRedirects: 5,
    headers: { 'User-Agent': USER_AGENT },
  });

  function cookieHeader(): Record<string, string> {
    if (cookies.size === 0) {
      return {};
    }
    return { Cookie: [...cookies].map(([name, value]) => `${name}=${value}`).join('; ') };
  }

  function storeCookies(setCookie: unknown): void {
    if (!Array.isArray(setCookie)) {
      return;
    }
    for (const header of setCookie) {
      if (typeof header !== 'string') {
        continue;
      }
      const pair = header.split(';')[0];
      const separator = pair.indexOf('=');
      if (separator > 0) {
        cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
      }
    }
  }

  function bodyOf(data: unknown): string {
    return typeof data === 'string' ? data : JSON.stringify(data);
  }

  return {
    async get(url: string, timeoutMs: number): Promise<HttpPage> {
      const response = await http.get<unknown>(url, { timeout: timeoutMs, headers: cookieHeader() });
      storeCookies(response.headers['set-cookie']);
      return { status: response.status, body: bodyOf(response.data) };
    },

    async postForm(url, fields, timeoutMs, headers = {}): Promise<HttpPage> {
      const response = await http.post<unknown>(url, new URLSearchParams(fields).toString(), {
        timeout: timeoutMs,
        headers: {
          ...cookieHeader(),
          ...headers,
          'Content-Type': 'application/x-www-form-urlencoded',
        },
      });
      storeCookies(response.headers['set-cookie']);
      return { status: response.status, body: bodyOf(response.data) };
    },
  };
}

function includesAny(text: string, markers: readonly string[]): boolean {
  const lower = text.toLowerCase();
  return markers.some((marker) => lower.includes(marker));
}

/** Hidden fields of the login form, or null when the page has no form. */
export function findLoginFormFields(html: string): Record<string, string> | null {
  const $ = load(html);
  let form: Cheerio<AnyNode> = $('form#login').first();
  if (form.length === 0) {
    form = $('form')
      .filter((_, el) => /login/i.test($(el).attr('class') ?? ''))
      .first();
  }
  if (form.length === 0) {
    form = $('form').first();
  }
  if (form.length === 0) {
    form = $('input[type="email"]').first().closest('form');
  }
  if (form.length === 0) {
    return null;
  }

  const fields: Record<string, string> = {};
  form.find('input[type="hidden"]').each((_, el) => {
    const name = $(el).attr('name');
    if (name) {
      fields[name] = $(el).attr('value') ?? '';
    }
  });
  return fields;
}

export function resolveEntryUrl(href: string, baseUrl: string): string {
  if (/^https?:\/\//i.test(href)) {
    return href;
  }
  return href.startsWith('/') ? `${baseUrl}${href}` : `${baseUrl}/db/${href}`;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

export function parseSearchResults(html: string, baseUrl: string): SearchEntry[] {
  const $ = load(html);
  let entries = $('div.regulation-entry, div.search-result');
  if (entries.length === 0) {
    entries = $('tr, li').filter((_, el) => /regulation|result/i.test($(el).attr('class') ?? ''));
  }

  return entries.toArray().map((el) => {
    const entry = $(el);
    const title = collapse(entry.find('h3, h4, a, strong').first().text()) || 'Regulation Document';
    const href = entry.find('a[href]').first().attr('href');
    const summary = collapse(
      entry
        .find('p, div')
        .filter((_, child) => /summary|description|content/i.test($(child).attr('class') ?? ''))
        .first()
        .text(),
    );

    return {
      title,
      documentUrl: href ? resolveEntryUrl(href, baseUrl) : undefined,
      summary: summary === '' ? undefined : summary,
    };
  });
}

const CONTENT_SELECTORS = [
  'div.regulation-content',
  'div.content',
  'main',
  'article',
  'div.document',
  'div.text-content',
];

export function extractDocumentText(html: string): string {
  const $ = load(html);
  $('nav, header, footer, aside, script, style').remove();

  let content: Cheerio<AnyNode> = $('body');
  for (const selector of CONTENT_SELECTORS) {
    const candidate = $(selector).first();
    if (candidate.length > 0) {
      content = candidate;
      break;
    }
  }
  if (content.length === 0) {
    return '';
  }

  content.find('br').replaceWith('\n');
  content.find('p, div, li, tr, h1, h2, h3, h4, h5, h6, section').after('\n');

  return content
    .text()
    .split('\n')
    .map((line) => line.replace(/[ \t]+/g, ' ').trim())
    .filter((line) => line !== '')
    .join('\n');
}

export function extractDocumentTitle(html: string): string | null {
  const $ = load(html);
  for (const selector of ['h1', 'h2', 'title']) {
    const title = $(selector).first().text().replace(/\s+/g, ' ').trim();
    if (title !== '') {
      return title;
    }
  }
  return null;
}

export interface RegulationDatabaseClientConfig {
  readonly credentials: RegulationDatabaseCredentials;
  readonly session?: HttpSession;
}

export function createRegulationDatabaseClient(
  config: RegulationDatabaseClientConfig,
): RegulationDatabaseClient {
  const { email, password, baseUrl } = config.credentials;
  const session = config.session ?? createAxiosHttpSession();
  let loggedIn = false;
  let pendingLogin: Promise<boolean> | undefined;

  async function attemptLogin(timeoutMs: number): Promise<boolean> {
    const mainPage = await session.get(`${baseUrl}/db/index.php`, timeoutMs);
    if (mainPage.status !== 200) {
      log.warn({ status: mainPage.status }, 'Regulation database main page unavailable');
      return false;
    }
    if (includesAny(mainPage.body, LOGGED_IN_MARKERS)) {
      log.info('Regulation database session already active');
      return true;
    }

    const hiddenFields = findLoginFormFields(mainPage.body);
    if (hiddenFields === null) {
      const searchPage = await session.get(`${baseUrl}/db/search.php`, timeoutMs);
      return searchPage.status === 200;
    }

    const fields: Record<string, string> = {
      email,
      password,
      username: email,
      login_email: email,
      login_password: password,
      ...hiddenFields,
    };

    for (const path of LOGIN_PATHS) {
      try {
        const response = await session.postForm(`${baseUrl}${path}`, fields, timeoutMs, {
          Referer: `${baseUrl}/db/index.php`,
        });
        if (response.status !== 200) {
          continue;
        }
        if (
          includesAny(response.body, LOGIN_SUCCESS_MARKERS) ||
          !includesAny(response.body, ['error', 'invalid'])
        ) {
          log.info({ path }, 'Logged into regulation database');
          return true;
        }
      } catch (error) {
        log.debug({ path, error: errorMessage(error) }, 'Login attempt failed');
      }
    }

    return false;
  }

  async function ensureLoggedIn(timeoutMs: number): Promise<void> {
    if (loggedIn) {
      return;
    }
    pendingLogin ??= attemptLogin(timeoutMs).finally(() => {
      pendingLogin = undefined;
    });

    let success: boolean;
    try {
      success = await pendingLogin;
    } catch (error) {
      throw new SecondarySourceError('Regulation database login failed', toError(error));
    }
    if (!success) {
      throw new SecondarySourceError('Regulation database login failed');
    }
    loggedIn = true;
  }

  async function fetchDocument(url: string, timeoutMs: number): Promise<string> {
    try {
      const page = await session.get(url, timeoutMs);
      if (page.status !== 200) {
        log.warn({ url, status: page.status }, 'Regulation document unavailable');
        return '';
      }
      return extractDocumentText(page.body);
    } catch (error) {
      log.warn({ url, error: errorMessage(error) }, 'Regulation document fetch failed');
      return '';
    }
  }

  return {
    async search(request: SecondarySearchRequest): Promise<readonly SecondaryHit[]> {
      await ensureLoggedIn(request.timeoutMs);

      const searchUrl = new URL(`${baseUrl}/db/search.php`);
      searchUrl.searchParams.set('search', request.query);
      searchUrl.searchParams.set('region', request.region);
      searchUrl.searchParams.set('category', request.category);
      searchUrl.searchParams.set('action', 'search');

      let page: HttpPage;
      try {
        page = await session.get(searchUrl.toString(), request.timeoutMs);
      } catch (error) {
        throw new SecondarySourceError('Regulation database search failed', toError(error));
      }
      if (page.status !== 200) {
        throw new SecondarySourceError(
          `Regulation database search failed with HTTP ${String(page.status)}`,
        );
      }

      const entries = parseSearchResults(page.body, baseUrl).slice(0, request.maxResults);
      const hits: SecondaryHit[] = [];

      for (const entry of entries) {
        if (entry.documentUrl) {
          const text = await fetchDocument(entry.documentUrl, request.timeoutMs);
          if (text !== '') {
            hits.push({ text, url: entry.documentUrl, title: entry.title });
          }
        }
        if (entry.summary && entry.summary.length > MIN_SUMMARY_LENGTH) {
          hits.push({
            text: `Summary: ${entry.summary}`,
            url: searchUrl.toString(),
            title: `${entry.title} - Summary`,
          });
        }
      }

      log.info(
        { query: request.query, region: request.region, category: request.category, hits: hits.length },
        'Regulation database search complete',
      );
      return hits;
    },

    async getById(regulationId: string, timeoutMs: number): Promise<SecondaryHit> {
      await ensureLoggedIn(timeoutMs);

      const url = new URL(`${baseUrl}/db/index.php`);
      url.searchParams.set('id', regulationId);

      let page: HttpPage;
      try {
        page = await session.get(url.toString(), timeoutMs);
      } catch (error) {
        throw new SecondarySourceError(`Failed to fetch regulation ${regulationId}`, toError(error));
      }
      if (page.status !== 200) {
        throw new SecondarySourceError(
          `Failed to fetch regulation ${regulationId}: HTTP ${String(page.status)}`,
        );
      }

      const text = extractDocumentText(page.body);
      if (text === '') {
        throw new SecondarySourceError(`Regulation ${regulationId} has no readable content`);
      }
      log.debug({ regulationId, length: text.length }, 'Regulation fetched by id');
      return {
        text,
        url: url.toString(),
        title: extractDocumentTitle(page.body) ?? `Regulation ${regulationId}`,
      };
    },
  };
}
