import OpenAI from 'openai';
import Ajv, { JSONSchemaType } from 'ajv';
import { ScoreResult, SentimentScorer, ScorerUnavailableError } from './types';
import { CallLedger } from '../ledger/types';
import { customerUtterances } from '../ledger/transcript';
import { EMOTION_LABELS, clamp } from '../streaming/emotion';
import { EmotionLabel } from '../streaming/types';
import { logger } from '../observability/logger';

const MAX_RETRIES = 1;
/** Customer turns sent to the model per tick */
const WINDOW_SIZE = 3;

interface ScorerReply {
  sentiment_score: number;
  confidence: number;
  emotion?: EmotionLabel;
}

const REPLY_SCHEMA: JSONSchemaType<ScorerReply> = {
  type: 'object',
  properties: {
    sentiment_score: { type: 'number', minimum: -1, maximum: 1 },
    confidence: { type: 'number', minimum: 0, maximum: 1 },
    emotion: { type: 'string', enum: [...EMOTION_LABELS], nullable: true },
  },
  required: ['sentiment_score', 'confidence'],
  additionalProperties: true,
};

const ajv = new Ajv({ allErrors: true });
const validateReply = ajv.compile(REPLY_SCHEMA);

const SYSTEM_PROMPT = [
  'You score the sentiment of a customer on a live sales call.',
  'Reply with JSON only: {"sentiment_score": number in [-1, 1], "confidence": number in [0, 1],',
  `"emotion": one of ${EMOTION_LABELS.join(', ')}}.`,
].join(' ');

export interface OpenAIScorerConfig {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

/**
 * Scores the customer side of a call with an OpenAI chat model.
 *
 * Live audio is not available to this service, so each tick scores a
 * sliding window over the customer's turns in the stored transcript.
 */
export class OpenAISentimentScorer implements SentimentScorer {
  readonly name = 'openai';
  private readonly client: OpenAI;
  private readonly log = logger.child({ component: 'openai-scorer' });

  constructor(
    private readonly config: OpenAIScorerConfig,
    private readonly ledger: CallLedger,
    client?: OpenAI,
  ) {
    this.client = client ?? new OpenAI({
      apiKey: config.apiKey,
      timeout: config.timeoutMs,
      maxRetries: MAX_RETRIES,
    });
  }

  async score(callId: string, tick: number): Promise<ScoreResult> {
    const call = await this.ledger.getCall(callId);
    if (!call) {
      throw new ScorerUnavailableError(`No transcript for call ${callId}`);
    }

    const turns = customerUtterances(call.transcript);
    if (turns.length === 0) {
      return { sentiment_score: 0, confidence: 0, emotion: 'neutral' };
    }

    const end = ((tick - 1) % turns.length) + 1;
    const window = turns.slice(Math.max(0, end - WINDOW_SIZE), end);

    let content: string | null | undefined;
    try {
      const completion = await this.client.chat.completions.create({
        model: this.config.model,
        temperature: 0,
        response_format: { type: 'json_object' },
        messages: [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: window.join('\n') },
        ],
      });
      content = completion.choices[0]?.message?.content;
    } catch (err) {
      this.log.warn({ err, callId }, 'Sentiment scorer request failed');
      throw new ScorerUnavailableError('AI scorer unavailable', err);
    }

    if (!content) {
      throw new ScorerUnavailableError('AI scorer returned an empty reply');
    }
    return this.parseReply(content, callId);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.models.list();
      return true;
    } catch (err) {
      this.log.warn({ err }, 'OpenAI health check failed');
      return false;
    }
  }

  private parseReply(content: string, callId: string): ScoreResult {
    let reply: unknown;
    try {
      reply = JSON.parse(content);
    } catch (err) {
      throw new ScorerUnavailableError('AI scorer returned malformed JSON', err);
    }

    if (!validateReply(reply)) {
      this.log.warn({ callId, errors: validateReply.errors }, 'AI scorer reply failed validation');
      throw new ScorerUnavailableError('AI scorer reply failed validation');
    }

    return {
      sentiment_score: clamp(reply.sentiment_score, -1, 1),
      confidence: clamp(reply.confidence, 0, 1),
      emotion: reply.emotion ?? undefined,
    };
  }
}
