import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { AIMessage, ChatMessage, ChatModel, UnsupportedInvocationError } from "@docsum/core";

/** The slice of the OpenAI SDK this model talks to. */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion>;
    };
  };
}

export interface OpenAIChatModelOptions {
  model: string;
  apiKey?: string;
  temperature?: number;
  maxTokens?: number;
  client?: ChatCompletionsClient;
}

/**
 * OpenAI chat completions. The SDK is promise-based only, so the blocking
 * path is refused.
 */
export class OpenAIChatModel implements ChatModel {
  readonly name: string;
  private readonly client: ChatCompletionsClient;

  constructor(private readonly options: OpenAIChatModelOptions) {
    this.name = options.model;
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey });
  }

  invoke(_messages: ChatMessage[]): AIMessage {
    throw new UnsupportedInvocationError(this.name, "blocking");
  }

  async invokeAsync(messages: ChatMessage[]): Promise<AIMessage> {
    const completion = await this.client.chat.completions.create({
      model: this.options.model,
      messages,
      ...(this.options.temperature !== undefined && { temperature: this.options.temperature }),
      ...(this.options.maxTokens !== undefined && { max_tokens: this.options.maxTokens }),
    });

    const content = completion.choices[0]?.message?.content ?? "";
    return new AIMessage(content, {
      in: completion.usage?.prompt_tokens ?? undefined,
      out: completion.usage?.completion_tokens ?? undefined,
    });
  }
}

export function createOpenAIChatModel(options: OpenAIChatModelOptions): OpenAIChatModel {
  return new OpenAIChatModel(options);
}
