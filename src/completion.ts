/**
 * Shared pieces of the chat-style completion providers
 */

import { CompletionOptions } from './types';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string };

export const JSON_SYSTEM_PROMPT = 'You are a JSON generator. Always return valid JSON objects only, no other text.';

export function buildMessages(prompt: string, options: CompletionOptions = {}): ChatMessage[] {
  const systemPrompt = options.systemPrompt ?? (options.jsonMode ? JSON_SYSTEM_PROMPT : undefined);
  const messages: ChatMessage[] = [];

  if (systemPrompt) {
    messages.push({ role: 'system', content: systemPrompt });
  }
  messages.push({ role: 'user', content: prompt });

  return messages;
}

/**
 * Strip a markdown code fence some models wrap around JSON answers
 */
export function stripCodeFence(text: string): string {
  let cleaned = text.trim();
  cleaned = cleaned.replace(/^```(?:json)?\s*\n?/i, '');
  cleaned = cleaned.replace(/\n?```\s*$/i, '');
  return cleaned;
}
