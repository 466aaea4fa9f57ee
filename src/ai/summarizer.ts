/**
 * Summarizer gateway: turns a notification's title and body into a short
 * summary through an external model.
 *
 * Gateways never throw from `summarize`; failures come back as an outcome the
 * caller can show and retry. Availability is settled at construction from the
 * configured credential and does not depend on any particular call.
 *
 * @module ai/summarizer
 */

import { z } from 'zod';
import type { AppConfig } from '../config/env';
import { logger } from '../utils/logger';

export type SummaryFailureReason = 'unavailable' | 'failed' | 'empty';

export type SummaryOutcome =
  | { ok: true; summary: string }
  | { ok: false; reason: SummaryFailureReason; message: string };

export interface SummarizerGateway {
  readonly provider: string;
  isAvailable(): boolean;
  summarize(text: string, title?: string): Promise<SummaryOutcome>;
}

export const DEFAULT_MAX_INPUT_CHARS = 4000;

/**
 * Fixed prompt for regulatory notifications. The body is cut to
 * `maxInputChars` characters.
 */
export function buildSummaryPrompt(text: string, title = '', maxInputChars = DEFAULT_MAX_INPUT_CHARS): string {
  return `Please provide a concise summary of the following regulatory notification:

Title: ${title}

Content: ${text.slice(0, maxInputChars)}

Requirements:
- Summarize in 2-3 sentences
- Focus on key regulatory changes or requirements
- Use clear, professional language
- Highlight important dates or deadlines if mentioned`;
}

// ---------------------------------------------------------------------------
// Gemini
// ---------------------------------------------------------------------------

const geminiResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).optional()
    }).optional(),
    finishReason: z.string().optional()
  })).optional(),
  promptFeedback: z.object({
    blockReason: z.string().optional()
  }).optional()
});

export interface GeminiSummarizerOptions {
  apiKey?: string;
  model: string;
  baseUrl: string;
  timeoutMs: number;
  maxInputChars?: number;
}

export class GeminiSummarizer implements SummarizerGateway {
  readonly provider = 'gemini';

  private readonly apiKey: string | null;
  private readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxInputChars: number;

  constructor(options: GeminiSummarizerOptions) {
    this.apiKey = options.apiKey?.trim() || null;
    this.model = options.model;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.maxInputChars = options.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;

    if (!this.apiKey) {
      logger.error('Gemini API key not found; summary generation disabled. Set GOOGLE_API_KEY to enable it.');
    }
  }

  isAvailable(): boolean {
    return this.apiKey !== null;
  }

  async summarize(text: string, title = ''): Promise<SummaryOutcome> {
    if (!this.apiKey) {
      return { ok: false, reason: 'unavailable', message: 'Summarizer is not configured' };
    }

    const startTime = Date.now();
    const url = `${this.baseUrl}/v1beta/models/${encodeURIComponent(this.model)}:generateContent`;

    try {
      const response = await fetch(url, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'x-goog-api-key': this.apiKey
        },
        body: JSON.stringify({
          contents: [{ role: 'user', parts: [{ text: buildSummaryPrompt(text, title, this.maxInputChars) }] }]
        }),
        signal: AbortSignal.timeout(this.timeoutMs)
      });

      if (!response.ok) {
        logger.error('Gemini request failed', { status: response.status, model: this.model });
        return { ok: false, reason: 'failed', message: `Summarizer returned HTTP ${response.status}` };
      }

      const parsed = geminiResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        logger.error('Gemini response did not match the expected shape', { model: this.model });
        return { ok: false, reason: 'failed', message: 'Summarizer returned an unexpected response' };
      }

      const summary = (parsed.data.candidates?.[0]?.content?.parts ?? [])
        .map((part) => part.text ?? '')
        .join('')
        .trim();

      const durationMs = Date.now() - startTime;
      if (!summary) {
        logger.warn('Gemini returned no text', {
          model: this.model,
          durationMs,
          blockReason: parsed.data.promptFeedback?.blockReason
        });
        return { ok: false, reason: 'empty', message: 'Summarizer returned no text' };
      }

      logger.info('Gemini summary generated', { model: this.model, durationMs, summaryLengthChars: summary.length });
      return { ok: true, summary };
    } catch (error) {
      logger.error('Gemini summarization error', {
        model: this.model,
        error: error instanceof Error ? error.message : 'unknown',
        durationMs: Date.now() - startTime
      });
      return { ok: false, reason: 'failed', message: 'Summarizer request failed' };
    }
  }
}

// ---------------------------------------------------------------------------
// Heuristic
// ---------------------------------------------------------------------------

/**
 * Offline summarizer for development and tests. Takes the leading sentences
 * of the body without calling an external model.
 */
export class HeuristicSummarizer implements SummarizerGateway {
  readonly provider = 'heuristic';

  constructor(private readonly sentenceCount = 3) {}

  isAvailable(): boolean {
    return true;
  }

  async summarize(text: string): Promise<SummaryOutcome> {
    const summary = this.splitSentences(text).slice(0, this.sentenceCount).join(' ');
    if (!summary) {
      return { ok: false, reason: 'empty', message: 'Notification has no text to summarize' };
    }
    return { ok: true, summary };
  }

  private splitSentences(text: string): string[] {
    return text
      .replace(/\s+/g, ' ')
      .trim()
      .split(/(?<=[.!?])\s+/)
      .filter((sentence) => sentence.trim().length > 0);
  }
}

export function createSummarizer(appConfig: Pick<AppConfig, 'summarizer'>): SummarizerGateway {
  const settings = appConfig.summarizer;
  if (settings.provider === 'heuristic') {
    logger.info('Summarizer: using heuristic provider');
    return new HeuristicSummarizer();
  }

  return new GeminiSummarizer({
    apiKey: settings.apiKey,
    model: settings.model,
    baseUrl: settings.baseUrl,
    timeoutMs: settings.timeoutMs,
    maxInputChars: settings.maxInputChars
  });
}
