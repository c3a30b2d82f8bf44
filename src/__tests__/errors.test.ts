/**
 * Error Taxonomy Tests
 */

import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  errorMessage,
  ExecutionError,
  HustleError,
  isRetryableError,
  ProviderError,
  RoutingError,
  ValidationError,
} from "../errors";

describe("Error taxonomy", () => {
  it("should give each error kind its code and retry hint", () => {
    const cases: Array<[HustleError, string, string, boolean]> = [
      [new ValidationError("v"), "ValidationError", "VALIDATION_ERROR", false],
      [
        new ExecutionError("e", "Task"),
        "ExecutionError",
        "EXECUTION_ERROR",
        true,
      ],
      [new RoutingError("r"), "RoutingError", "ROUTING_ERROR", false],
      [
        new ConfigurationError("c"),
        "ConfigurationError",
        "CONFIGURATION_ERROR",
        false,
      ],
      [
        new ProviderError("p", "openai", 503),
        "ProviderError",
        "PROVIDER_ERROR",
        true,
      ],
    ];

    for (const [error, name, code, retryable] of cases) {
      expect(error).toBeInstanceOf(HustleError);
      expect(error).toBeInstanceOf(Error);
      expect(error.name).toBe(name);
      expect(error.code).toBe(code);
      expect(error.retryable).toBe(retryable);
    }
  });

  it("should carry context", () => {
    const error = new ExecutionError("failed", "Analyst", 3, { model: "m" });

    expect(error.context).toEqual({
      taskName: "Analyst",
      attempts: 3,
      model: "m",
    });
  });

  it("should treat provider client errors as permanent", () => {
    expect(new ProviderError("x", "openai", 400).retryable).toBe(false);
    expect(new ProviderError("x", "openai", 401).retryable).toBe(false);
    expect(new ProviderError("x", "openai", 408).retryable).toBe(true);
    expect(new ProviderError("x", "openai", 429).retryable).toBe(true);
    expect(new ProviderError("x", "openai", 500).retryable).toBe(true);
    expect(new ProviderError("x", "openai").retryable).toBe(true);
    expect(new ProviderError("x", "openai")).toBeInstanceOf(ExecutionError);
  });

  it("should retry foreign errors by default", () => {
    expect(isRetryableError(new Error("socket hang up"))).toBe(true);
    expect(isRetryableError("plain string")).toBe(true);
    expect(isRetryableError(new RoutingError("no"))).toBe(false);
  });

  it("should read messages from any thrown value", () => {
    expect(errorMessage(new Error("boom"))).toBe("boom");
    expect(errorMessage(404)).toBe("404");
  });
});
