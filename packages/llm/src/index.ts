import { AIMessage, ChatContent, ChatMessage, ChatModel, TokenUsage } from "@docsum/core";

export type ResponderResult = { content: ChatContent; tokens?: TokenUsage };

export type ChatResponder = (messages: ChatMessage[]) => ResponderResult;
export type AsyncChatResponder = (messages: ChatMessage[]) => Promise<ResponderResult>;

export interface ProgrammableChatModelOptions {
  name?: string;
  responder: ChatResponder;
  /** Serves `invokeAsync`. Falls back to `responder` when omitted. */
  asyncResponder?: AsyncChatResponder;
}

/**
 * Chat model driven by plain functions. Every message list it receives is kept
 * in `calls`, in arrival order.
 */
export class ProgrammableChatModel implements ChatModel {
  readonly name: string;
  readonly calls: ChatMessage[][] = [];

  constructor(private readonly options: ProgrammableChatModelOptions) {
    this.name = options.name ?? "programmable";
  }

  invoke(messages: ChatMessage[]): AIMessage {
    this.calls.push(messages);
    const response = this.options.responder(messages);
    return new AIMessage(response.content, response.tokens);
  }

  async invokeAsync(messages: ChatMessage[]): Promise<AIMessage> {
    this.calls.push(messages);
    const response = this.options.asyncResponder
      ? await this.options.asyncResponder(messages)
      : this.options.responder(messages);
    return new AIMessage(response.content, response.tokens);
  }
}

export function createEchoChatModel(): ProgrammableChatModel {
  return new ProgrammableChatModel({
    name: "echo",
    responder: (messages) => {
      const lastUser = [...messages].reverse().find((m) => m.role === "user");
      return { content: lastUser?.content ?? "" };
    },
  });
}

export function createStaticChatModel(response: string): ProgrammableChatModel {
  return new ProgrammableChatModel({ name: "static", responder: () => ({ content: response }) });
}

export { createOpenAIChatModel, OpenAIChatModel } from "./openai.js";
export type { OpenAIChatModelOptions, ChatCompletionsClient } from "./openai.js";
