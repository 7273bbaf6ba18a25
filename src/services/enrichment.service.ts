import { v4 as uuidv4 } from 'uuid';
import { Enrichment, Sentiment } from '../types/feedback.types';
import { CompletionRequest, LLMGateway } from '../types/llm.types';
import { createLogger } from '../utils/logger';

const logger = createLogger('enrichment');

export const OUTPUT_LIMITS = {
  response: 200,
  summary: 100,
  recommendation: 150,
} as const;

const MIN_SENTIMENT_INPUT = 3;
const MIN_GENERATION_INPUT = 5;
const SUMMARY_FALLBACK_LENGTH = 50;

const SYSTEM_PROMPT =
  'You help a product team process customer feedback. Answer with the requested text only, without preamble or labels.';

const TONE_MAP: Record<Sentiment, string> = {
  positive: 'enthusiastic and grateful',
  negative: 'empathetic and solution-focused',
  neutral: 'professional and helpful',
};

const ACTION_PROMPTS: Record<Sentiment, string> = {
  negative: 'What specific action should the team take to address this issue?',
  positive: 'How can we replicate or build on this success?',
  neutral: 'How could we improve based on this feedback?',
};

const RECOMMENDATION_FALLBACKS: Record<Sentiment, string> = {
  negative: 'Investigate and resolve the reported issue',
  positive: 'Document and replicate this successful approach',
  neutral: 'Analyze feedback for potential improvements',
};

export const DEFAULT_RESPONSE = 'Thank you for your feedback!';
export const SHORT_SUMMARY = 'Short feedback received';
export const SHORT_RECOMMENDATION = 'Monitor feedback quality';
export const EMPTY_RECOMMENDATION = 'Review and act on feedback';

/**
 * Removes a label the model echoed back, e.g. a leading "Summary:".
 */
export function stripLabel(text: string, label: string): string {
  return text.replace(new RegExp(`^\\s*${label}\\s*:\\s*`, 'i'), '').trim();
}

export function fallbackResponse(category: string, sentiment: Sentiment): string {
  return `Thank you for your ${sentiment} feedback about ${category}. We appreciate your input!`;
}

/**
 * Derives sentiment, reply, summary and recommendation for a piece of
 * feedback. Gateway failures never escape: each operation substitutes a
 * deterministic default instead.
 */
export class EnrichmentService {
  constructor(private readonly gateway: LLMGateway) {}

  /**
   * Classify a review as positive, negative or neutral.
   */
  async classifySentiment(text: string): Promise<Sentiment> {
    if (!text || text.length < MIN_SENTIMENT_INPUT) {
      return 'neutral';
    }

    const content = await this.ask('sentiment', {
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: `Analyze the sentiment of this review and respond with ONLY one word.

Review: ${text}

Respond with ONLY: positive, negative, or neutral`,
      temperature: 0.1,
      maxTokens: 10,
    });
    if (content === null) return 'neutral';

    // The label may follow a lead-in such as "Sentiment:".
    const answer = content.toLowerCase().trim().replace(/[.!,]/g, '');

    if (answer.includes('positive')) return 'positive';
    if (answer.includes('negative')) return 'negative';
    return 'neutral';
  }

  /**
   * Returns the given sentiment, or classifies the text when none was given.
   */
  async resolveSentiment(text: string, sentiment?: Sentiment): Promise<Sentiment> {
    return sentiment ?? this.classifySentiment(text);
  }

  /**
   * Short customer-facing reply whose tone follows the sentiment.
   */
  async generateResponse(text: string, category: string, sentiment?: Sentiment): Promise<string> {
    if (!text || text.length < MIN_GENERATION_INPUT) {
      return DEFAULT_RESPONSE;
    }

    const resolved = await this.resolveSentiment(text, sentiment);
    const content = await this.ask('response', {
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: `Generate a short, professional customer service response (max 2 sentences) to this feedback.
Be ${TONE_MAP[resolved]}.

Category: ${category}
Customer Feedback: ${text}

Response:`,
      temperature: 0.5,
      maxTokens: 150,
    });
    if (content === null) return fallbackResponse(category, resolved);

    const cleaned = stripLabel(content, 'Response');
    return cleaned ? cleaned.slice(0, OUTPUT_LIMITS.response) : DEFAULT_RESPONSE;
  }

  async generateSummary(text: string): Promise<string> {
    if (!text || text.length < MIN_GENERATION_INPUT) {
      return SHORT_SUMMARY;
    }

    const content = await this.ask('summary', {
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: `Summarize this feedback in exactly one sentence (under 15 words).

Feedback: ${text}

Summary:`,
      temperature: 0.2,
      maxTokens: 50,
    });

    const cleaned = content === null ? '' : stripLabel(content, 'Summary');
    return cleaned
      ? cleaned.slice(0, OUTPUT_LIMITS.summary)
      : text.slice(0, SUMMARY_FALLBACK_LENGTH);
  }

  /**
   * One actionable recommendation for the team. The question put to the
   * model depends on the sentiment.
   */
  async generateRecommendation(
    text: string,
    category: string,
    sentiment?: Sentiment
  ): Promise<string> {
    if (!text || text.length < MIN_GENERATION_INPUT) {
      return SHORT_RECOMMENDATION;
    }

    const resolved = await this.resolveSentiment(text, sentiment);
    const content = await this.ask('recommendation', {
      systemPrompt: SYSTEM_PROMPT,
      userPrompt: `Based on this customer feedback, provide ONE actionable recommendation (max 1 sentence).

Category: ${category}
Sentiment: ${resolved}
Feedback: ${text}

${ACTION_PROMPTS[resolved]}

Recommendation:`,
      temperature: 0.4,
      maxTokens: 80,
    });
    if (content === null) return RECOMMENDATION_FALLBACKS[resolved];

    const cleaned = stripLabel(content, 'Recommendation');
    return cleaned ? cleaned.slice(0, OUTPUT_LIMITS.recommendation) : EMPTY_RECOMMENDATION;
  }

  /**
   * Full enrichment for a submission. Sentiment is classified once and
   * threaded into the dependent prompts, so this costs at most four
   * sequential gateway calls.
   */
  async enrich(message: string, category: string): Promise<Enrichment> {
    const requestId = uuidv4();
    const startedAt = Date.now();

    const sentiment = await this.classifySentiment(message);
    const aiResponse = await this.generateResponse(message, category, sentiment);
    const summary = await this.generateSummary(message);
    const recommendations = await this.generateRecommendation(message, category, sentiment);

    logger.info('Feedback enriched', {
      requestId,
      sentiment,
      aiEnabled: this.gateway.isConfigured,
      durationMs: Date.now() - startedAt,
    });

    return { sentiment, aiResponse, summary, recommendations };
  }

  private async ask(operation: string, request: CompletionRequest): Promise<string | null> {
    const result = await this.gateway.complete(request);
    if (result.ok) {
      return result.text;
    }

    logger.warn(`${operation} fell back to default`, {
      kind: result.error.kind,
      error: result.error.message,
    });
    return null;
  }
}
