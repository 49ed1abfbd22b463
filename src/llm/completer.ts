import Anthropic from "@anthropic-ai/sdk";

export interface ChatTurn {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  model?: string;
  system?: string;
  messages: ChatTurn[];
  maxTokens: number;
  timeoutMs?: number;
}

/**
 * The slice of a chat model the pipeline depends on. Strategies take this
 * instead of the SDK client so they can be driven by scripted replies.
 */
export interface TextCompleter {
  complete(request: CompletionRequest): Promise<string>;
}

export class AnthropicCompleter implements TextCompleter {
  private readonly client: Anthropic;

  constructor(
    apiKey: string,
    private readonly defaultModel: string
  ) {
    // The fallback chains move on after a failure instead of retrying.
    this.client = new Anthropic({ apiKey, maxRetries: 0 });
  }

  async complete(request: CompletionRequest): Promise<string> {
    const response = await this.client.messages.create(
      {
        model: request.model ?? this.defaultModel,
        max_tokens: request.maxTokens,
        ...(request.system ? { system: request.system } : {}),
        messages: request.messages,
      },
      request.timeoutMs ? { timeout: request.timeoutMs } : undefined
    );

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();
  }
}
