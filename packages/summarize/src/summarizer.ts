import { ChatModel, Workflow, defineWorkflow } from '@docsum/core';
import { SummarizationNode, createSummarizationNode } from './node.js';
import { InlineSummarizationState, InputSchema, OutputSchema } from './state.js';

export const INLINE_SUMMARIZATION_WORKFLOW = 'inline_summarization';

/**
 * Assembles the one-node summarization workflow:
 * entry → summarize → end, with input restricted to `documents` and output
 * to `summary`.
 */
export class InlineSummarizer {
  private readonly node: SummarizationNode;

  constructor(
    readonly model: ChatModel,
    prompt?: string | null
  ) {
    this.node = createSummarizationNode({ model, prompt });
  }

  createSummarizationNode(): SummarizationNode {
    return this.node;
  }

  build(): Workflow<InputSchema, OutputSchema> {
    return defineWorkflow({
      name: INLINE_SUMMARIZATION_WORKFLOW,
      state: InlineSummarizationState,
      input: InputSchema,
      output: OutputSchema,
      node: this.node,
    });
  }
}

export function createInlineSummarizer(model: ChatModel, prompt?: string | null): Workflow<InputSchema, OutputSchema> {
  return new InlineSummarizer(model, prompt).build();
}
