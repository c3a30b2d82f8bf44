/**
 * Chat-completion types shared by the adapter and the tasks that call it
 */

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  /** Sampling temperature (0-2, default 0.7) */
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

/**
 * Anything that turns a conversation into a reply. Raises ProviderError
 * on failure.
 */
export interface Completer {
  complete(
    messages: ChatMessage[],
    model: string,
    options?: CompletionOptions,
  ): Promise<string>;
}
