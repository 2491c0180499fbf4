import { z } from 'zod';

/** Text plus caller-owned metadata. Only `content` is read. */
export const Document = z.object({
  content: z.string(),
  metadata: z.record(z.unknown()).optional(),
});
export type Document = z.infer<typeof Document>;

export const InlineSummarizationState = z.object({
  documents: z.array(Document),
  /** Present once the summarize node has run. */
  summary: z.string().optional(),
});
export type InlineSummarizationState = z.infer<typeof InlineSummarizationState>;

export const InputSchema = InlineSummarizationState.pick({ documents: true });
export type InputSchema = z.infer<typeof InputSchema>;

export const OutputSchema = z.object({
  summary: z.string(),
});
export type OutputSchema = z.infer<typeof OutputSchema>;

export const SummarizationNodeUpdate = OutputSchema;
export type SummarizationNodeUpdate = z.infer<typeof SummarizationNodeUpdate>;

export const PromptMessage = z.object({
  role: z.enum(['system', 'user']),
  content: z.string(),
});
export type PromptMessage = z.infer<typeof PromptMessage>;
