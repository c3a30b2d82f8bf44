/**
 * Chat Client
 * Minimal OpenAI-compatible chat-completions adapter over fetch
 */

import { errorMessage, ProviderError } from "../errors";
import { resolveProviderConfig, type Env, type ProviderConfig } from "./config";
import type {
  ChatMessage,
  Completer,
  CompletionOptions,
} from "./types";

export interface ChatClientOptions {
  /** Provider name (default "openrouter") */
  provider?: string;
  /** Environment to read keys from (default process.env) */
  env?: Env;
  /** Skip env resolution entirely */
  config?: ProviderConfig;
  fetch?: typeof fetch;
}

/**
 * First choice's message content, or "" when the reply has none
 */
function replyContent(data: unknown): string {
  if (
    typeof data !== "object" ||
    data === null ||
    !("choices" in data) ||
    !Array.isArray(data.choices)
  ) {
    return "";
  }
  const content = data.choices[0]?.message?.content;
  return typeof content === "string" ? content : "";
}

/**
 * Read a response body, reporting unreadable or malformed bodies as
 * provider failures
 */
async function readBody<T>(
  response: Response,
  provider: string,
  read: () => Promise<T>,
): Promise<T> {
  try {
    return await read();
  } catch (e) {
    throw new ProviderError(
      `${provider} returned an unreadable response (${response.status}): ${errorMessage(e)}`,
      provider,
      response.status,
    );
  }
}

export class ChatClient implements Completer {
  readonly config: ProviderConfig;
  private readonly fetchImpl: typeof fetch;

  constructor(options: ChatClientOptions = {}) {
    this.config =
      options.config ?? resolveProviderConfig(options.provider, options.env);
    this.fetchImpl = options.fetch ?? fetch;
  }

  async complete(
    messages: ChatMessage[],
    model: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    const { provider, baseUrl, apiKey, headers } = this.config;

    let response: Response;
    try {
      response = await this.fetchImpl(`${baseUrl}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${apiKey}`,
          ...headers,
        },
        body: JSON.stringify({
          model,
          messages,
          temperature: options.temperature ?? 0.7,
          ...(options.maxTokens !== undefined
            ? { max_tokens: options.maxTokens }
            : {}),
        }),
        signal: options.signal,
      });
    } catch (e) {
      throw new ProviderError(
        `${provider} request failed: ${errorMessage(e)}`,
        provider,
      );
    }

    if (!response.ok) {
      const body = await readBody(response, provider, () => response.text());
      throw new ProviderError(
        `${provider} API error ${response.status}: ${body}`,
        provider,
        response.status,
      );
    }

    return replyContent(
      await readBody(response, provider, () => response.json()),
    );
  }
}
