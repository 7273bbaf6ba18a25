import {
  CompletionRequest,
  GatewayError,
  GatewayErrorKind,
  GatewayResult,
  LLMGateway,
} from '../../types/llm.types';

export type Responder = (request: CompletionRequest) => GatewayResult;

export const ok = (text: string): GatewayResult => ({ ok: true, text });

export function gatewayError(kind: GatewayErrorKind): GatewayError {
  switch (kind) {
    case 'ServerError':
      return { kind, status: 503, message: 'Provider server error (503)' };
    case 'ApiError':
      return { kind, status: 400, body: '{}', message: 'API Error 400' };
    case 'TransportError':
      return { kind, timedOut: true, message: 'API request timeout' };
    default:
      return { kind, message: kind };
  }
}

export const fail = (kind: GatewayErrorKind): GatewayResult => ({ ok: false, error: gatewayError(kind) });

export const ALL_ERROR_KINDS: GatewayErrorKind[] = [
  'ConfigurationError',
  'AuthError',
  'RateLimitError',
  'ServerError',
  'ApiError',
  'TransportError',
  'ParseError',
];

export type PromptKind = 'sentiment' | 'response' | 'summary' | 'recommendation' | 'other';

export function promptKind(request: CompletionRequest): PromptKind {
  const prompt = request.userPrompt;
  if (prompt.startsWith('Analyze the sentiment')) return 'sentiment';
  if (prompt.startsWith('Generate a short, professional customer service response')) return 'response';
  if (prompt.startsWith('Summarize this feedback')) return 'summary';
  if (prompt.startsWith('Based on this customer feedback')) return 'recommendation';
  return 'other';
}

/**
 * Call-counting gateway. Answers per prompt kind, or with one result for all.
 */
export class FakeGateway implements LLMGateway {
  readonly provider = 'perplexity' as const;
  readonly calls: CompletionRequest[] = [];

  constructor(
    private readonly responder: Responder,
    readonly isConfigured = true
  ) {}

  static answering(answers: Partial<Record<PromptKind, string>>): FakeGateway {
    return new FakeGateway((request) => {
      const answer = answers[promptKind(request)];
      return answer === undefined ? fail('ServerError') : ok(answer);
    });
  }

  static failing(kind: GatewayErrorKind = 'TransportError'): FakeGateway {
    return new FakeGateway(() => fail(kind), kind !== 'ConfigurationError');
  }

  async complete(request: CompletionRequest): Promise<GatewayResult> {
    this.calls.push(request);
    return this.responder(request);
  }

  testConnection(): Promise<GatewayResult> {
    return this.complete({ systemPrompt: '', userPrompt: 'Hello', temperature: 0.1, maxTokens: 5 });
  }

  callKinds(): PromptKind[] {
    return this.calls.map(promptKind);
  }
}
