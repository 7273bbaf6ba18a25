export type LLMProvider = 'perplexity' | 'anthropic';

export interface CompletionRequest {
  systemPrompt: string;
  userPrompt: string;
  /** 0..1 */
  temperature: number;
  maxTokens: number;
}

export type GatewayError =
  | { kind: 'ConfigurationError'; message: string }
  | { kind: 'AuthError'; message: string }
  | { kind: 'RateLimitError'; message: string }
  | { kind: 'ServerError'; status: number; message: string }
  | { kind: 'ApiError'; status: number; body: string; message: string }
  | { kind: 'TransportError'; timedOut: boolean; message: string }
  | { kind: 'ParseError'; message: string };

export type GatewayErrorKind = GatewayError['kind'];

export type GatewayResult =
  | { ok: true; text: string }
  | { ok: false; error: GatewayError };

export interface LLMGateway {
  readonly provider: LLMProvider;
  /** False when no API key was configured at startup. */
  readonly isConfigured: boolean;
  complete(request: CompletionRequest): Promise<GatewayResult>;
  testConnection(): Promise<GatewayResult>;
}
