/**
 * Hustleflow - a small resilient workflow engine for chaining async steps
 *
 * Tasks validate, execute (with retry and backoff) and deliver; the Hustle
 * walks them breadth-first, forking branch state along every route.
 */

// Errors
export * from "../errors";

// Engine
export * from "../flow";

// Retry policies & events
export * from "../runtime";

// Input contracts
export * from "../schema";

// LLM adapter
export * from "../llm";

// Testing utilities
export * from "../testing";
