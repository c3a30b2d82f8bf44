/**
 * Testing Harness
 * Utilities for testing hustles without a network
 */

import { ProviderError } from "../errors";
import type { Hustle, HustleReport, StartOptions } from "../flow/hustle";
import type { ChatMessage, Completer, CompletionOptions } from "../llm/types";
import { composeSinks, createEventLog, type HustleEvent } from "../runtime/events";

// ============================================================================
// Scripted Completer
// ============================================================================

/** A canned reply, or an error to raise in its place */
export type ScriptedReply = string | Error;

export interface RecordedCompletion {
  messages: ChatMessage[];
  model: string;
  options: CompletionOptions;
}

/**
 * Completer that replays replies in order and records every call
 */
export class ScriptedCompleter implements Completer {
  readonly calls: RecordedCompletion[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[] = []) {
    this.replies = [...replies];
  }

  enqueue(...replies: ScriptedReply[]): this {
    this.replies.push(...replies);
    return this;
  }

  get remaining(): number {
    return this.replies.length;
  }

  async complete(
    messages: ChatMessage[],
    model: string,
    options: CompletionOptions = {},
  ): Promise<string> {
    this.calls.push({ messages, model, options });
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new ProviderError("No scripted reply left", "scripted");
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return reply;
  }
}

// ============================================================================
// Hustle Harness
// ============================================================================

export interface TestHustleResult<TCapital> {
  capital: TCapital;
  report: HustleReport;
  events: HustleEvent[];
  lines: string[];
}

/**
 * Run a hustle while collecting every event it emits
 */
export async function testHustle<TCapital, TChange>(
  hustle: Hustle<TCapital, TChange>,
  capital: TCapital,
  change: TChange,
  options: StartOptions = {},
): Promise<TestHustleResult<TCapital>> {
  const log = createEventLog();
  const sink = options.sink ? composeSinks(log.sink, options.sink) : log.sink;
  const report = await hustle.start(capital, change, { ...options, sink });
  return { capital, report, events: log.events(), lines: log.lines() };
}
