import { ConfigurationError } from '@docsum/core';
import type { Document, InlineSummarizationState, PromptMessage } from './state.js';

export const DEFAULT_SYSTEM_PROMPT =
  'You are a helpful assistant that summarizes text. ' +
  'Please provide a concise summary of the documents provided by the user.';

export const DOCUMENT_SEPARATOR = '---\n\n';

export type PromptBuilder = (state: InlineSummarizationState) => PromptMessage[];

/**
 * `undefined` and `null` select the default instruction; a string, even an
 * empty one, is used verbatim.
 */
export function resolveSystemPrompt(prompt: unknown): string {
  if (prompt === undefined || prompt === null) return DEFAULT_SYSTEM_PROMPT;
  if (typeof prompt === 'string') return prompt;
  throw new ConfigurationError(`Invalid prompt type: ${typeof prompt}. Expected string or undefined.`);
}

export function inlineDocuments(documents: readonly Document[]): string {
  return documents.map((doc) => doc.content).join(DOCUMENT_SEPARATOR);
}

export function buildPrompt(state: InlineSummarizationState, systemPrompt: string): PromptMessage[] {
  return [
    { role: 'system', content: systemPrompt },
    { role: 'user', content: inlineDocuments(state.documents) },
  ];
}

export function createPromptBuilder(configuredPrompt: unknown): PromptBuilder {
  const systemPrompt = resolveSystemPrompt(configuredPrompt);
  return (state) => buildPrompt(state, systemPrompt);
}
