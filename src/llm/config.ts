/**
 * Provider Configuration
 * Resolves endpoints and keys from an environment record
 */

import { ConfigurationError } from "../errors";

export type Env = Record<string, string | undefined>;

export type KnownProvider = "openrouter" | "openai" | "ollama";

export interface ProviderConfig {
  provider: string;
  baseUrl: string;
  apiKey: string;
  headers: Record<string, string>;
}

const BASE_URLS: Record<KnownProvider, string> = {
  openrouter: "https://openrouter.ai/api/v1",
  openai: "https://api.openai.com/v1",
  ollama: "http://localhost:11434/v1",
};

function isKnownProvider(provider: string): provider is KnownProvider {
  return provider in BASE_URLS;
}

function apiKeyVariable(provider: string): string {
  return `${provider.toUpperCase().replace(/[^A-Z0-9]/g, "_")}_API_KEY`;
}

/**
 * Resolve where and how to reach a provider.
 * Unknown providers read CUSTOM_LLM_URL and <NAME>_API_KEY.
 */
export function resolveProviderConfig(
  provider: string = "openrouter",
  env: Env = process.env,
): ProviderConfig {
  const baseUrl = isKnownProvider(provider)
    ? BASE_URLS[provider]
    : env.CUSTOM_LLM_URL;
  if (!baseUrl) {
    throw new ConfigurationError(
      `No base URL for provider "${provider}": set CUSTOM_LLM_URL`,
      { provider },
    );
  }

  const keyVariable = apiKeyVariable(provider);
  const apiKey = provider === "ollama" ? "ollama" : env[keyVariable];
  if (!apiKey) {
    throw new ConfigurationError(
      `${keyVariable} not found in environment`,
      { provider },
    );
  }

  const headers: Record<string, string> =
    provider === "openrouter"
      ? { "HTTP-Referer": "https://localhost", "X-Title": "Hustleflow" }
      : {};

  return { provider, baseUrl: baseUrl.replace(/\/+$/, ""), apiKey, headers };
}

/**
 * Model used when a task does not name one
 */
export function resolveDefaultModel(env: Env = process.env): string {
  const model = env.DEFAULT_MODEL;
  if (!model) {
    throw new ConfigurationError("DEFAULT_MODEL not found in environment");
  }
  return model;
}
