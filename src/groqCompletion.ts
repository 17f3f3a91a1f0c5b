/**
 * Groq-backed completion service
 */

import Groq from 'groq-sdk';
import { CompletionOptions, GroqConfig, TextCompletionService } from './types';
import { buildMessages, stripCodeFence } from './completion';
import { logger } from './logger';

export class GroqCompletionService implements TextCompletionService {
  private readonly client: Groq;
  private readonly config: GroqConfig;

  constructor(config: GroqConfig) {
    this.config = config;
    this.client = new Groq({ apiKey: config.apiKey });
  }

  async complete(prompt: string, options: CompletionOptions = {}, signal?: AbortSignal): Promise<string> {
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          messages: buildMessages(prompt, options),
          temperature: options.temperature ?? this.config.temperature,
          max_tokens: options.maxTokens ?? this.config.maxTokens,
          ...(options.jsonMode ? { response_format: { type: 'json_object' as const } } : {})
        },
        { signal }
      );

      const result = response.choices[0]?.message?.content || '';
      logger.debug(`Groq completion: ${result.slice(0, 100)}`);

      return options.jsonMode ? stripCodeFence(result) : result;
    } catch (error) {
      logger.error('Groq completion failed', error);
      throw error;
    }
  }

  async *completeStream(
    prompt: string,
    options: CompletionOptions = {},
    signal?: AbortSignal
  ): AsyncIterable<string> {
    const stream = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: buildMessages(prompt, options),
        temperature: options.temperature ?? this.config.temperature,
        max_tokens: options.maxTokens ?? this.config.maxTokens,
        stream: true
      },
      { signal }
    );

    for await (const part of stream) {
      const content = part.choices[0]?.delta?.content;
      if (content) {
        yield content;
      }
    }
  }
}
