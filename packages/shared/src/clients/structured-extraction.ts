/**
 * Structured Extraction Client (OpenAI)
 *
 * One chat completion per template call. The model is asked for a single JSON
 * object; the reply is unwrapped from any markdown fence and parsed here.
 * Schema checks happen in the caller.
 */

import OpenAI from 'openai';
import { logger } from '../logger';
import { config } from '../config';
import { StructuredExtractionError, describeError } from '../errors';
import { isRecord, type JsonObject } from '../guards';
import { llmRequestsCounter, llmRequestDurationHistogram } from '../metrics';
import { renderUserPrompt } from '../templates';
import type { ExtractionTemplate } from '../templates/types';

export interface StructuredExtractionClient {
  extract(input: string, template: ExtractionTemplate): Promise<JsonObject>;
}

export type ChatCompletionCreate = (
  params: OpenAI.Chat.Completions.ChatCompletionCreateParamsNonStreaming
) => Promise<OpenAI.Chat.Completions.ChatCompletion>;

export interface OpenAiClientOptions {
  apiKey?: string;
  model?: string;
  timeoutMs?: number;
  /** Replaces the SDK call, mainly for tests. */
  create?: ChatCompletionCreate;
}

const FENCE_PATTERN = /^```(?:json)?\s*([\s\S]*?)\s*```$/i;

/**
 * Parse a model reply into a JSON object, dropping a surrounding
 * ```json fence when present.
 */
export function parseJsonPayload(content: string): JsonObject {
  const trimmed = content.trim();
  const fenced = FENCE_PATTERN.exec(trimmed);
  const body = fenced ? fenced[1] : trimmed;

  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new StructuredExtractionError('invalid_json', `Reply is not valid JSON: ${describeError(err)}`);
  }

  if (!isRecord(parsed)) {
    throw new StructuredExtractionError('invalid_json', 'Reply is not a JSON object');
  }
  return parsed;
}

export class OpenAiStructuredExtractionClient implements StructuredExtractionClient {
  private readonly model: string;
  private readonly create: ChatCompletionCreate;

  constructor(options: OpenAiClientOptions = {}) {
    this.model = options.model ?? config.llmModelText;

    if (options.create) {
      this.create = options.create;
    } else {
      const openai = new OpenAI({
        apiKey: options.apiKey ?? config.openaiApiKey,
        timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
        maxRetries: 0,
      });
      this.create = (params) => openai.chat.completions.create(params);
    }
  }

  async extract(input: string, template: ExtractionTemplate): Promise<JsonObject> {
    const userPrompt = renderUserPrompt(template, input);

    logger.info('Requesting structured extraction', {
      model: this.model,
      section: template.stage,
      prompt_length: userPrompt.length,
    });

    const startTime = Date.now();

    try {
      let response: OpenAI.Chat.Completions.ChatCompletion;
      try {
        response = await this.create({
          model: this.model,
          messages: [
            { role: 'system', content: template.systemPrompt },
            { role: 'user', content: userPrompt },
          ],
          response_format: { type: 'json_object' },
          max_tokens: template.maxOutputTokens,
          temperature: 0,
        });
      } catch (err) {
        throw new StructuredExtractionError('transport', `LLM request failed: ${describeError(err)}`);
      }

      const content = response.choices[0]?.message?.content;
      if (!content) {
        throw new StructuredExtractionError('empty', 'Empty response from OpenAI');
      }

      const payload = parseJsonPayload(content);

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'success' });

      logger.info('Structured extraction complete', {
        model: this.model,
        section: template.stage,
        request_id: response.id,
        duration_seconds: duration,
        tokens_used: response.usage?.total_tokens,
      });

      return payload;
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: this.model }, duration);
      llmRequestsCounter.inc({ model: this.model, status: 'error' });

      logger.error('Structured extraction failed', error, {
        model: this.model,
        section: template.stage,
      });

      throw error;
    }
  }
}
