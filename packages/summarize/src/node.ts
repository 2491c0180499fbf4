import { AIMessage, ChatModel, ChatResponse, Ctx, Node, TokenUsage, defineNode, errorMessage } from '@docsum/core';
import { createPromptBuilder } from './prompt.js';
import type { InlineSummarizationState, PromptMessage, SummarizationNodeUpdate } from './state.js';

export const SUMMARIZE_NODE = 'summarize';

export interface SummarizationNodeOptions {
  model: ChatModel;
  /** Custom system instruction. Validated here, before any model call. */
  prompt?: unknown;
  name?: string;
}

export type SummarizationNode = Node<InlineSummarizationState, SummarizationNodeUpdate>;

function recordCall(
  ctx: Ctx | undefined,
  model: ChatModel,
  messages: PromptMessage[],
  startedAt: number,
  outcome: { raw: string; tokens?: TokenUsage } | { error: unknown }
): void {
  if (!ctx) return;
  ctx.trace.emit({
    type: 'llm_call',
    timestamp: new Date().toISOString(),
    runId: ctx.runId,
    spanId: ctx.spanId,
    model: model.name,
    messages: messages.length,
    durationMs: Date.now() - startedAt,
    ...('error' in outcome ? { error: errorMessage(outcome.error) } : outcome),
  });
}

function tokensOf(response: ChatResponse): TokenUsage | undefined {
  return response instanceof AIMessage ? response.tokens : undefined;
}

/**
 * One model call per invocation, folded into `{ summary }`. Model errors are
 * re-thrown as they are; nothing is retried.
 */
export function createSummarizationNode(options: SummarizationNodeOptions): SummarizationNode {
  const { model } = options;
  const buildPrompt = createPromptBuilder(options.prompt);

  return defineNode<InlineSummarizationState, SummarizationNodeUpdate>({
    name: options.name ?? SUMMARIZE_NODE,
    run(state, ctx) {
      const messages = buildPrompt(state);
      const startedAt = Date.now();
      let response: ChatResponse;
      let summary: string;
      try {
        response = model.invoke(messages);
        summary = response.text();
      } catch (err) {
        recordCall(ctx, model, messages, startedAt, { error: err });
        throw err;
      }
      recordCall(ctx, model, messages, startedAt, { raw: summary, tokens: tokensOf(response) });
      return { summary };
    },
    async runAsync(state, ctx) {
      const messages = buildPrompt(state);
      const startedAt = Date.now();
      let response: ChatResponse;
      let summary: string;
      try {
        response = await model.invokeAsync(messages);
        summary = response.text();
      } catch (err) {
        recordCall(ctx, model, messages, startedAt, { error: err });
        throw err;
      }
      recordCall(ctx, model, messages, startedAt, { raw: summary, tokens: tokensOf(response) });
      return { summary };
    },
  });
}
