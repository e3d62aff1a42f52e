/**
 * HTTP Suggestion Service
 *
 * Client for a classifier exposed over HTTP. POSTs the text with its context
 * and validates the JSON reply.
 */

import { z } from 'zod';
import { SuggestionServiceError, formatZodError } from '@causeway/core';
import type { Suggestion, SuggestionContext, SuggestionService } from '../interfaces/index.js';

export interface HttpSuggestionServiceConfig {
  /** Full URL of the suggest endpoint */
  endpoint: string;
  /** Model version pinned for the run */
  modelVersion: string;
  /** Sent as a bearer token when set */
  apiKey?: string;
  /** Candidates requested per call (default: 3) */
  topK?: number;
  headers?: Record<string, string>;
}

const responseSchema = z.object({
  modelVersion: z.string().optional(),
  suggestions: z.array(
    z.object({
      canonicalCode: z.string(),
      confidence: z.number(),
    })
  ),
});

export class HttpSuggestionService implements SuggestionService {
  readonly modelVersion: string;

  constructor(private readonly config: HttpSuggestionServiceConfig) {
    this.modelVersion = config.modelVersion;
  }

  async suggest(
    text: string,
    context: SuggestionContext,
    signal: AbortSignal
  ): Promise<Suggestion[]> {
    let response: Response;
    try {
      response = await fetch(this.config.endpoint, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
          ...(this.config.apiKey ? { Authorization: `Bearer ${this.config.apiKey}` } : {}),
          ...this.config.headers,
        },
        body: JSON.stringify({
          text,
          context: {
            recordId: context.recordId,
            sourceField: context.sourceField,
            description: context.description,
          },
          topK: this.config.topK ?? 3,
          modelVersion: this.modelVersion,
        }),
        signal,
      });
    } catch (err) {
      if (signal.aborted) {
        throw new SuggestionServiceError({
          kind: 'timeout',
          message: 'Suggestion request aborted',
          cause: err instanceof Error ? err : undefined,
        });
      }
      throw new SuggestionServiceError({
        kind: 'transport',
        message: `Failed to reach suggestion service: ${err instanceof Error ? err.message : String(err)}`,
        cause: err instanceof Error ? err : undefined,
        suggestion: 'Check the endpoint URL and network connectivity.',
      });
    }

    if (!response.ok) {
      throw new SuggestionServiceError({
        kind: 'transport',
        message: `Suggestion service responded with HTTP ${response.status}`,
        suggestion:
          response.status === 401 || response.status === 403
            ? 'Check the API key.'
            : response.status === 429
              ? 'Lower strategies.suggested.maxConcurrency.'
              : undefined,
        context: { status: response.status },
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      throw new SuggestionServiceError({
        kind: 'transport',
        message: 'Suggestion service returned invalid JSON',
        cause: err instanceof Error ? err : undefined,
      });
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new SuggestionServiceError({
        kind: 'transport',
        message: formatZodError('Unexpected suggestion response', parsed.error),
      });
    }

    const reported = parsed.data.modelVersion;
    if (reported !== undefined && reported !== this.modelVersion) {
      throw new SuggestionServiceError({
        kind: 'transport',
        message: `Suggestion service answered with model ${reported}, expected ${this.modelVersion}`,
        suggestion: 'Pin the deployed model version in the run configuration.',
      });
    }

    return parsed.data.suggestions;
  }
}
