import type { ServiceCredentials } from '@autoreg/schemas/src/config-loader.js';
import { createChildLogger } from '@autoreg/shared/src/logger.js';
import { LlmError, toError } from '@autoreg/shared/src/utils/errors.js';

const log = createChildLogger('llm:text-client');

const MAX_TRANSIENT_RETRIES = 3;
const DEFAULT_BASE_DELAY_MS = 1000;

export interface TextLlmRequest {
  readonly systemPrompt: string;
  readonly userMessage: string;
  readonly temperature?: number;
  readonly maxOutputTokens?: number;
}

export interface TextLlmResponse {
  readonly content: string;
  readonly tokenUsage?: {
    readonly input: number;
    readonly output: number;
  };
}

export interface TextLlmClient {
  invoke(request: TextLlmRequest): Promise<TextLlmResponse>;
}

export interface TextLlmClientOptions {
  readonly baseDelayMs?: number;
}

/** Marker the selector prompt carries so the offline client can answer it. */
export const SELECTION_PROMPT_MARKER = 'regulatory source selector';
export const SYNTHESIS_PROMPT_MARKER = 'automotive regulation advisor';

function createMockSelection(userMessage: string): string {
  const keys = [...userMessage.matchAll(/^- ([A-Z][A-Z0-9_]*):/gm)].map((match) => match[1]);
  const requested = /exactly (\d+)/i.exec(userMessage);
  const count = requested ? parseInt(requested[1], 10) : 3;
  return keys.slice(0, count).join(', ');
}

function createMockAnswer(userMessage: string): string {
  const sourceCount = [...userMessage.matchAll(/^\[Source \d+\]/gm)].length;
  if (sourceCount === 0) {
    return 'The provided sources do not contain information on this question.';
  }
  const cited = sourceCount > 1 ? '[Source 0] [Source 1]' : '[Source 0]';
  return `This is an offline answer assembled from the retrieved regulatory material ${cited}. Verify the details with the cited authority before relying on them.`;
}

export function createMockTextLlmClient(): TextLlmClient {
  log.info('Using mock text LLM client');

  return {
    invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      log.debug({ systemPromptLength: request.systemPrompt.length }, 'Mock text LLM invocation');

      const prompt = request.systemPrompt.toLowerCase();
      let content = 'Mock LLM response';
      if (prompt.includes(SELECTION_PROMPT_MARKER)) {
        content = createMockSelection(request.userMessage);
      } else if (prompt.includes(SYNTHESIS_PROMPT_MARKER)) {
        content = createMockAnswer(request.userMessage);
      }

      return Promise.resolve({
        content,
        tokenUsage: { input: 100, output: 50 },
      });
    },
  };
}

function statusCodeOf(error: Error): number | undefined {
  for (const key of ['status', 'statusCode']) {
    if (key in error) {
      const value: unknown = Reflect.get(error, key);
      if (typeof value === 'number') {
        return value;
      }
    }
  }
  return undefined;
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const statusCode = statusCodeOf(error);
  if (statusCode !== undefined && (statusCode === 429 || statusCode >= 500)) {
    return true;
  }

  const message = error.message.toLowerCase();
  const transientPatterns = [
    '429',
    'rate limit',
    'too many requests',
    '500',
    '502',
    '503',
    'internal server error',
    'bad gateway',
    'service unavailable',
    'econnreset',
    'etimedout',
    'timeout',
    'network',
    'socket hang up',
    'econnrefused',
  ];

  return transientPatterns.some((pattern) => message.includes(pattern));
}

async function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function computeBackoffMs(attempt: number, baseDelayMs: number): number {
  const exponential = baseDelayMs * Math.pow(2, attempt);
  const jitter = Math.random() * baseDelayMs;
  return exponential + jitter;
}

export interface VertexTextClientConfig {
  readonly projectId: string;
  readonly location: string;
  readonly model: string;
}

export async function createVertexTextClient(
  config: VertexTextClientConfig,
  options: TextLlmClientOptions = {},
): Promise<TextLlmClient> {
  const { projectId, location, model: modelName } = config;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;

  const { ChatVertexAI } = await import('@langchain/google-vertexai');

  log.info({ projectId, location, model: modelName }, 'Using Vertex AI text LLM client');

  return {
    async invoke(request: TextLlmRequest): Promise<TextLlmResponse> {
      log.debug(
        { systemPromptLength: request.systemPrompt.length, temperature: request.temperature },
        'Vertex AI text LLM invocation',
      );

      const model = new ChatVertexAI({
        model: modelName,
        location,
        temperature: request.temperature ?? 0.1,
        maxOutputTokens: request.maxOutputTokens ?? 2048,
        authOptions: { projectId },
        responseMimeType: 'text/plain',
      });

      let lastError: Error | undefined;

      for (let attempt = 0; attempt < MAX_TRANSIENT_RETRIES; attempt++) {
        try {
          const response = await model.invoke([
            ['system', request.systemPrompt],
            ['human', request.userMessage],
          ]);

          const content =
            typeof response.content === 'string'
              ? response.content
              : JSON.stringify(response.content);

          return {
            content,
            tokenUsage: response.usage_metadata
              ? {
                  input: response.usage_metadata.input_tokens,
                  output: response.usage_metadata.output_tokens,
                }
              : undefined,
          };
        } catch (error) {
          lastError = toError(error);

          if (!isTransientError(error)) {
            throw new LlmError(
              `Vertex AI text invocation failed: ${lastError.message}`,
              false,
              lastError,
            );
          }

          log.warn(
            { attempt: attempt + 1, maxRetries: MAX_TRANSIENT_RETRIES, error: lastError.message },
            'Transient text LLM error, retrying',
          );

          if (attempt < MAX_TRANSIENT_RETRIES - 1) {
            await sleep(computeBackoffMs(attempt, baseDelayMs));
          }
        }
      }

      throw new LlmError(
        `Vertex AI text invocation failed after ${String(MAX_TRANSIENT_RETRIES)} retries: ${lastError?.message ?? 'unknown error'}`,
        true,
        lastError,
      );
    },
  };
}

export async function createTextLlmClient(
  credentials: ServiceCredentials,
  options: TextLlmClientOptions = {},
): Promise<TextLlmClient> {
  if (credentials.mode === 'mock') {
    return createMockTextLlmClient();
  }

  return createVertexTextClient(
    {
      projectId: credentials.gcpProjectId,
      location: credentials.vertexLocation,
      model: credentials.llmModel,
    },
    options,
  );
}
