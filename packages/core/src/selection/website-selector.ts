import type { CatalogConfig } from '@autoreg/schemas/src/catalog.schema.js';
import type { WebsiteSelection } from '@autoreg/shared/src/types/regulation.types.js';
import type { SessionContext } from '@autoreg/shared/src/types/session.types.js';
import { createChildLogger, errorMessage } from '@autoreg/shared/src/logger.js';
import type { TextLlmClient } from '../llm/text-llm-client.js';
import { SELECTION_PROMPT_MARKER } from '../llm/text-llm-client.js';
import { mentionsKeyword } from '../retrieval/query-classifier.js';

const log = createChildLogger('selection:website-selector');

export type SelectionParseResult =
  | { readonly kind: 'parsed'; readonly keys: readonly string[] }
  | { readonly kind: 'failure'; readonly reason: string };

export interface WebsiteSelectorDeps {
  readonly llmClient: TextLlmClient;
  readonly catalog: CatalogConfig;
  readonly maxSites: number;
  readonly temperature: number;
  readonly maxOutputTokens: number;
}

export interface WebsiteSelector {
  select(query: string, session?: SessionContext): Promise<WebsiteSelection>;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Finds catalog keys quoted verbatim in a free-form model reply,
 * ordered by first appearance.
 */
export function parseSelectionResponse(
  text: string,
  keys: readonly string[],
): SelectionParseResult {
  if (text.trim() === '') {
    return { kind: 'failure', reason: 'empty response' };
  }

  const found = keys
    .map((key) => ({
      key,
      position: text.search(new RegExp(`(?<![A-Za-z0-9_])${escapeRegExp(key)}(?![A-Za-z0-9_])`)),
    }))
    .filter((entry) => entry.position >= 0)
    .sort((a, b) => a.position - b.position)
    .map((entry) => entry.key);

  if (found.length === 0) {
    return { kind: 'failure', reason: 'no catalog keys in response' };
  }
  return { kind: 'parsed', keys: found };
}

function keysToUrls(keys: Iterable<string>, catalog: CatalogConfig): string[] {
  const urls: string[] = [];
  for (const key of keys) {
    const url = catalog.websites[key];
    if (url !== undefined && !urls.includes(url)) {
      urls.push(url);
    }
  }
  return urls;
}

/** Region table first, then category table; global defaults when nothing matches. */
export function selectWebsitesHeuristically(
  query: string,
  catalog: CatalogConfig,
  maxSites: number,
): string[] {
  const matched = new Set<string>();
  for (const table of [catalog.regionWebsites, catalog.categoryWebsites]) {
    for (const [keyword, keys] of Object.entries(table)) {
      if (mentionsKeyword(query, keyword.replace(/_/g, ' '))) {
        for (const key of keys) {
          matched.add(key);
        }
      }
    }
  }

  const keys = matched.size > 0 ? matched : catalog.globalDefaults;
  return keysToUrls(keys, catalog).slice(0, maxSites);
}

function buildSelectionPrompt(query: string, catalog: CatalogConfig, maxSites: number): string {
  const entries = Object.entries(catalog.websites)
    .map(([key, url]) => `- ${key}: ${url}`)
    .join('\n');

  return [
    `Question: ${query}`,
    '',
    'Available sources:',
    entries,
    '',
    `Return exactly ${String(maxSites)} keys from the list above as a comma-separated list, most relevant first, with no other text.`,
  ].join('\n');
}

export function createWebsiteSelector(deps: WebsiteSelectorDeps): WebsiteSelector {
  const { llmClient, catalog, maxSites } = deps;
  const keys = Object.keys(catalog.websites);

  return {
    async select(query: string, session?: SessionContext): Promise<WebsiteSelection> {
      const sessionId = session?.sessionId;
      try {
        const response = await llmClient.invoke({
          systemPrompt: `You are a ${SELECTION_PROMPT_MARKER}. You pick the official websites most likely to answer an automotive regulation question. Reply only with catalog keys.`,
          userMessage: buildSelectionPrompt(query, catalog, maxSites),
          temperature: deps.temperature,
          maxOutputTokens: deps.maxOutputTokens,
        });

        const parsed = parseSelectionResponse(response.content, keys);
        if (parsed.kind === 'parsed') {
          const urls = keysToUrls(parsed.keys, catalog).slice(0, maxSites);
          log.info({ sessionId, keys: parsed.keys.slice(0, maxSites) }, 'Websites selected by model');
          return { urls, strategy: 'llm' };
        }

        log.warn({ sessionId, reason: parsed.reason }, 'Unusable selection response, using heuristic');
      } catch (error) {
        log.warn({ sessionId, error: errorMessage(error) }, 'Website selection failed, using heuristic');
      }

      const urls = selectWebsitesHeuristically(query, catalog, maxSites);
      log.info({ sessionId, count: urls.length }, 'Websites selected by heuristic');
      return { urls, strategy: 'heuristic' };
    },
  };
}
