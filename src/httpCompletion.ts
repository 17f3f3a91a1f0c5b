/**
 * Completion service for OpenAI-compatible HTTP endpoints
 * (local model servers, gateways) using axios
 */

import axios from 'axios';
import { StringDecoder } from 'string_decoder';
import { CompletionOptions, HttpCompletionConfig, TextCompletionService } from './types';
import { buildMessages, stripCodeFence } from './completion';
import { logger } from './logger';

interface ChatCompletionResponse {
  choices: Array<{
    message?: { content?: string | null };
  }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Pull the delta text out of one server-sent `data:` payload
 */
export function parseStreamDelta(payload: string): string | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    logger.debug(`Skipping malformed stream payload: ${payload.slice(0, 80)}`);
    return null;
  }

  if (!isRecord(parsed) || !Array.isArray(parsed.choices)) return null;

  const first: unknown = parsed.choices[0];
  if (!isRecord(first) || !isRecord(first.delta)) return null;

  const content = first.delta.content;
  return typeof content === 'string' && content.length > 0 ? content : null;
}

export class HttpCompletionService implements TextCompletionService {
  private readonly config: HttpCompletionConfig;

  constructor(config: HttpCompletionConfig) {
    this.config = config;
  }

  private url(): string {
    return `${this.config.baseUrl.replace(/\/+$/, '')}/chat/completions`;
  }

  private headers(): Record<string, string> {
    return this.config.apiKey
      ? { Authorization: `Bearer ${this.config.apiKey}` }
      : {};
  }

  private body(prompt: string, options: CompletionOptions, stream: boolean): Record<string, unknown> {
    return {
      model: this.config.model,
      messages: buildMessages(prompt, options),
      temperature: options.temperature ?? this.config.temperature,
      max_tokens: options.maxTokens,
      stream,
      ...(options.jsonMode ? { response_format: { type: 'json_object' } } : {})
    };
  }

  async complete(prompt: string, options: CompletionOptions = {}, signal?: AbortSignal): Promise<string> {
    try {
      const response = await axios.post<ChatCompletionResponse>(
        this.url(),
        this.body(prompt, options, false),
        { headers: this.headers(), timeout: this.config.timeoutMs, signal }
      );

      const result = response.data.choices[0]?.message?.content || '';
      return options.jsonMode ? stripCodeFence(result) : result;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        logger.error('Completion endpoint error:', error.response?.data ?? error.message);
      } else {
        logger.error('Unexpected error during completion', error);
      }
      throw error;
    }
  }

  async *completeStream(
    prompt: string,
    options: CompletionOptions = {},
    signal?: AbortSignal
  ): AsyncIterable<string> {
    const response = await axios.post<NodeJS.ReadableStream>(
      this.url(),
      this.body(prompt, options, true),
      { headers: this.headers(), timeout: this.config.timeoutMs, signal, responseType: 'stream' }
    );

    // Multi-byte characters may straddle network chunks
    const decoder = new StringDecoder('utf8');
    let buffer = '';

    for await (const part of response.data) {
      buffer += typeof part === 'string' ? part : decoder.write(part);

      const lines = buffer.split('\n');
      buffer = lines.pop() ?? '';

      for (const line of lines) {
        const event = readEventLine(line);
        if (!event) continue;
        if (event.done) return;
        yield event.text;
      }
    }

    buffer += decoder.end();
    const last = readEventLine(buffer);
    if (last && !last.done) yield last.text;
  }
}

type StreamEvent = { done: true } | { done: false; text: string };

/**
 * One SSE line: the terminator, a delta, or null for anything else
 */
function readEventLine(line: string): StreamEvent | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('data:')) return null;

  const payload = trimmed.slice('data:'.length).trim();
  if (payload === '[DONE]') return { done: true };

  const text = parseStreamDelta(payload);
  return text === null ? null : { done: false, text };
}
