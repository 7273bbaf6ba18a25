import OpenAI, {
  APIConnectionError as OpenAIConnectionError,
  APIConnectionTimeoutError as OpenAIConnectionTimeoutError,
  APIError as OpenAIAPIError,
} from 'openai';
import Anthropic, {
  APIConnectionError as AnthropicConnectionError,
  APIConnectionTimeoutError as AnthropicConnectionTimeoutError,
  APIError as AnthropicAPIError,
} from '@anthropic-ai/sdk';
import { z } from 'zod';
import { LLMConfig } from '../config';
import {
  CompletionRequest,
  GatewayError,
  GatewayResult,
  LLMGateway,
  LLMProvider,
} from '../types/llm.types';
import { createLogger } from '../utils/logger';

const logger = createLogger('llm-gateway');

export const PERPLEXITY_BASE_URL = 'https://api.perplexity.ai';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

/** The slice of an OpenAI-compatible SDK the gateway talks to. */
export interface ChatCompletionClient {
  create(body: {
    model: string;
    temperature: number;
    max_tokens: number;
    messages: ChatMessage[];
  }): Promise<unknown>;
}

/** The slice of the Anthropic SDK the gateway talks to. */
export interface MessagesClient {
  create(body: {
    model: string;
    temperature: number;
    max_tokens: number;
    system: string;
    messages: Array<{ role: 'user'; content: string }>;
  }): Promise<unknown>;
}

const chatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string() }) }))
    .min(1),
});

const anthropicMessageSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })),
});

/**
 * Maps a non-200 status onto the gateway taxonomy.
 */
export function errorFromStatus(status: number, message: string, body = ''): GatewayError {
  if (status === 401) {
    return { kind: 'AuthError', message: 'Unauthorized - invalid API key' };
  }
  if (status === 429) {
    return { kind: 'RateLimitError', message: 'Rate limit exceeded. Please try again later' };
  }
  if (status >= 500) {
    return { kind: 'ServerError', status, message: `Provider server error (${status})` };
  }
  return { kind: 'ApiError', status, body, message: `API Error ${status}: ${message}` };
}

function stringifyBody(body: unknown): string {
  if (body === undefined || body === null) return '';
  return typeof body === 'string' ? body : JSON.stringify(body);
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Shared request/response handling. A subclass sends one request through its
 * SDK, pulls the text out of a 200 body and classifies whatever the SDK threw.
 * No retries: a failure is surfaced once.
 */
abstract class BaseGateway implements LLMGateway {
  abstract readonly provider: LLMProvider;

  constructor(protected readonly config: LLMConfig) {}

  get isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  protected abstract send(request: CompletionRequest): Promise<unknown>;

  protected abstract extractText(body: unknown): string | null;

  protected abstract classifyThrown(error: unknown): GatewayError;

  async complete(request: CompletionRequest): Promise<GatewayResult> {
    if (!this.isConfigured) {
      return {
        ok: false,
        error: {
          kind: 'ConfigurationError',
          message: `API key not configured for provider "${this.config.provider}"`,
        },
      };
    }

    const startedAt = Date.now();
    let body: unknown;
    try {
      body = await this.send(request);
    } catch (error) {
      const gatewayError = this.classifyThrown(error);
      logger.debug('Completion failed', {
        provider: this.provider,
        kind: gatewayError.kind,
        durationMs: Date.now() - startedAt,
      });
      return { ok: false, error: gatewayError };
    }

    const text = this.extractText(body);
    if (text === null) {
      return {
        ok: false,
        error: { kind: 'ParseError', message: 'Unexpected response structure from provider' },
      };
    }

    logger.debug('Completion succeeded', {
      provider: this.provider,
      durationMs: Date.now() - startedAt,
    });
    return { ok: true, text };
  }

  testConnection(): Promise<GatewayResult> {
    return this.complete({
      systemPrompt: 'Reply with a single word.',
      userPrompt: 'Hello',
      temperature: 0.1,
      maxTokens: 5,
    });
  }
}

/**
 * Gateway for OpenAI-compatible chat-completion endpoints. Defaults to
 * Perplexity.
 */
export class OpenAICompatibleGateway extends BaseGateway {
  readonly provider = 'perplexity' as const;
  private client: ChatCompletionClient | null;

  constructor(config: LLMConfig, client?: ChatCompletionClient) {
    super(config);
    this.client = client ?? null;
  }

  private getClient(): ChatCompletionClient {
    if (!this.client) {
      const sdk = new OpenAI({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL ?? PERPLEXITY_BASE_URL,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
      this.client = { create: (body) => sdk.chat.completions.create(body) };
    }
    return this.client;
  }

  protected send(request: CompletionRequest): Promise<unknown> {
    return this.getClient().create({
      model: this.config.model,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      messages: [
        { role: 'system', content: request.systemPrompt },
        { role: 'user', content: request.userPrompt },
      ],
    });
  }

  protected extractText(body: unknown): string | null {
    const parsed = chatCompletionSchema.safeParse(body);
    return parsed.success ? parsed.data.choices[0].message.content : null;
  }

  protected classifyThrown(error: unknown): GatewayError {
    if (error instanceof OpenAIConnectionTimeoutError) {
      return { kind: 'TransportError', timedOut: true, message: 'API request timeout' };
    }
    if (error instanceof OpenAIConnectionError) {
      return { kind: 'TransportError', timedOut: false, message: `Connection error: ${error.message}` };
    }
    if (error instanceof OpenAIAPIError && error.status !== undefined) {
      return errorFromStatus(error.status, error.message, stringifyBody(error.error));
    }
    return { kind: 'TransportError', timedOut: false, message: `Unexpected error: ${describe(error)}` };
  }
}

/**
 * Gateway for the Anthropic Messages API, with the same contract as the
 * chat-completion gateway.
 */
export class AnthropicGateway extends BaseGateway {
  readonly provider = 'anthropic' as const;
  private client: MessagesClient | null;

  constructor(config: LLMConfig, client?: MessagesClient) {
    super(config);
    this.client = client ?? null;
  }

  private getClient(): MessagesClient {
    if (!this.client) {
      const sdk = new Anthropic({
        apiKey: this.config.apiKey,
        baseURL: this.config.baseURL,
        timeout: this.config.timeoutMs,
        maxRetries: 0,
      });
      this.client = { create: (body) => sdk.messages.create(body) };
    }
    return this.client;
  }

  protected send(request: CompletionRequest): Promise<unknown> {
    return this.getClient().create({
      model: this.config.model,
      temperature: request.temperature,
      max_tokens: request.maxTokens,
      system: request.systemPrompt,
      messages: [{ role: 'user', content: request.userPrompt }],
    });
  }

  protected extractText(body: unknown): string | null {
    const parsed = anthropicMessageSchema.safeParse(body);
    if (!parsed.success) return null;
    const block = parsed.data.content.find((item) => item.type === 'text');
    return block?.text ?? null;
  }

  protected classifyThrown(error: unknown): GatewayError {
    if (error instanceof AnthropicConnectionTimeoutError) {
      return { kind: 'TransportError', timedOut: true, message: 'API request timeout' };
    }
    if (error instanceof AnthropicConnectionError) {
      return { kind: 'TransportError', timedOut: false, message: `Connection error: ${error.message}` };
    }
    if (error instanceof AnthropicAPIError && error.status !== undefined) {
      return errorFromStatus(error.status, error.message, stringifyBody(error.error));
    }
    return { kind: 'TransportError', timedOut: false, message: `Unexpected error: ${describe(error)}` };
  }
}

export function createGateway(config: LLMConfig): LLMGateway {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicGateway(config);
    case 'perplexity':
      return new OpenAICompatibleGateway(config);
  }
}
