import type { AnswerResult, Citation, Fragment } from '@autoreg/shared/src/types/regulation.types.js';
import type { SessionContext } from '@autoreg/shared/src/types/session.types.js';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { SynthesisError, toError } from '@autoreg/shared/src/utils/errors.js';
import type { TextLlmClient } from '../llm/text-llm-client.js';
import { SYNTHESIS_PROMPT_MARKER } from '../llm/text-llm-client.js';

const log = createChildLogger('synthesis:answer-synthesizer');

export interface AnswerSynthesizerDeps {
  readonly llmClient: TextLlmClient;
  readonly temperature: number;
  readonly maxOutputTokens: number;
}

export interface AnswerSynthesizer {
  synthesize(
    query: string,
    fragments: readonly Fragment[],
    session?: SessionContext,
  ): Promise<AnswerResult>;
}

const SYSTEM_PROMPT = `You are an ${SYNTHESIS_PROMPT_MARKER}. You answer questions about vehicle emissions, safety, homologation and type approval.

Rules:
- ONLY use information from the provided sources. If they do not answer the question, say so.
- Reference every statement with the label of the source it came from, for example [Source 0].
- Quote limits, dates and regulation numbers exactly as the sources give them.
- Be concise and structured. Your answer is advisory and not legal advice.`;

export function buildSourceContext(fragments: readonly Fragment[]): string {
  return fragments
    .map((fragment, index) => `[Source ${String(index)}] ${fragment.sourceTitle}\n${fragment.text}`)
    .join('\n\n');
}

function buildUserMessage(query: string, fragments: readonly Fragment[]): string {
  return [
    'Sources:',
    '',
    buildSourceContext(fragments),
    '',
    `Question: ${query}`,
    '',
    'Answer using only the sources above and cite them as [Source N].',
  ].join('\n');
}

/**
 * Source indices referenced as `[Source i]` or `[Source i, j]`,
 * deduplicated in order of first appearance.
 */
export function parseCitations(text: string): number[] {
  const indices: number[] = [];
  for (const match of text.matchAll(/\[Sources?\s+(\d+(?:\s*(?:,|and)\s*\d+)*)\]/gi)) {
    for (const digits of match[1].match(/\d+/g) ?? []) {
      const index = parseInt(digits, 10);
      if (!indices.includes(index)) {
        indices.push(index);
      }
    }
  }
  return indices;
}

/** Citations in first-appearance order; indices without a fragment are dropped. */
export function resolveCitations(
  result: AnswerResult,
  fragments: readonly Fragment[],
): Citation[] {
  const citations: Citation[] = [];
  for (const index of result.citedFragmentIndices) {
    const fragment = Number.isInteger(index) && index >= 0 ? fragments[index] : undefined;
    if (fragment) {
      citations.push({ index, url: fragment.sourceUrl, title: fragment.sourceTitle });
    }
  }
  return citations;
}

export function createAnswerSynthesizer(deps: AnswerSynthesizerDeps): AnswerSynthesizer {
  return {
    async synthesize(query, fragments, session) {
      const sessionId = session?.sessionId;
      if (fragments.length === 0) {
        throw new SynthesisError('Cannot synthesize an answer without source fragments');
      }

      log.info({ sessionId, fragments: fragments.length }, 'Synthesizing answer');

      let content: string;
      try {
        const response = await deps.llmClient.invoke({
          systemPrompt: SYSTEM_PROMPT,
          userMessage: buildUserMessage(query, fragments),
          temperature: deps.temperature,
          maxOutputTokens: deps.maxOutputTokens,
        });
        content = response.content.trim();
      } catch (error) {
        log.error({ sessionId, error: toError(error).message }, 'Answer synthesis failed');
        throw new SynthesisError('Language model unavailable', toError(error));
      }

      if (content === '') {
        throw new SynthesisError('Language model returned an empty answer');
      }

      const citedFragmentIndices = parseCitations(content);
      const outOfRange = citedFragmentIndices.filter((index) => index >= fragments.length);
      if (outOfRange.length > 0) {
        log.warn({ sessionId, outOfRange }, 'Answer cites sources that were not provided');
      }

      log.info({ sessionId, cited: citedFragmentIndices }, 'Answer synthesized');
      return { text: content, citedFragmentIndices };
    },
  };
}
