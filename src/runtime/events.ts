/**
 * Hustle Events
 *
 * The engine reports what it does as structured events delivered to an
 * injectable sink. Rendering is left to the sink: console lines, an
 * in-memory log, or anything a caller plugs in.
 */

import type { Move } from "../flow/types";

// ============================================================================
// Event Types
// ============================================================================

export interface RunStartEvent {
  type: "run:start";
  task: string;
  tag: string;
}

export interface RunCompleteEvent {
  type: "run:complete";
  steps: number;
  branchesEnded: number;
  failures: number;
}

export interface TaskStartEvent {
  type: "task:start";
  task: string;
  tag: string;
}

export interface TaskCompleteEvent {
  type: "task:complete";
  task: string;
  tag: string;
  moves: Move[];
  durationMs: number;
}

export interface RetryEvent {
  type: "retry";
  source: string;
  tag?: string;
  /** The attempt that just failed (1-indexed) */
  attempt: number;
  maxAttempts: number;
  delayMs: number;
  error: string;
}

export interface FailureEvent {
  type: "failure";
  source: string;
  tag?: string;
  attempts: number;
  error: string;
}

export interface BranchEndEvent {
  type: "branch:end";
  task: string;
  tag: string;
  route: string;
}

export interface BranchFailedEvent {
  type: "branch:failed";
  task: string;
  tag: string;
  error: string;
}

export type HustleEvent =
  | RunStartEvent
  | RunCompleteEvent
  | TaskStartEvent
  | TaskCompleteEvent
  | RetryEvent
  | FailureEvent
  | BranchEndEvent
  | BranchFailedEvent;

export type HustleEventType = HustleEvent["type"];

export type EventSink = (event: HustleEvent) => void;

// ============================================================================
// Sinks
// ============================================================================

export const noopSink: EventSink = () => {};

function prefix(source: string, tag?: string): string {
  return tag ? `[${source} ${tag}]` : `[${source}]`;
}

/**
 * Render an event as a single log line
 */
export function formatEvent(event: HustleEvent): string {
  switch (event.type) {
    case "run:start":
      return `${prefix(event.task, event.tag)} run started`;
    case "run:complete":
      return `[hustle] run complete: ${event.steps} steps, ${event.branchesEnded} branches ended, ${event.failures} failures`;
    case "task:start":
      return `${prefix(event.task, event.tag)} started`;
    case "task:complete": {
      const routes = event.moves.map((m) => m.route).join(", ");
      return `[✓] ${event.task} ${event.tag}: completed in ${Math.round(event.durationMs)}ms -> ${routes}`;
    }
    case "retry":
      return `${prefix(event.source, event.tag)} attempt ${event.attempt}/${event.maxAttempts} failed, retrying in ${Math.round(event.delayMs)}ms: ${event.error}`;
    case "failure":
      return `${prefix(event.source, event.tag)} failed after ${event.attempts} attempt(s): ${event.error}`;
    case "branch:end":
      return `${prefix(event.task, event.tag)} branch ended: no route "${event.route}"`;
    case "branch:failed":
      return `[✗] ${event.task} ${event.tag}: ${event.error}`;
  }
}

export interface ConsoleSinkOptions {
  /** Also print task starts and silent branch ends */
  verbose?: boolean;
}

/**
 * Print events to the console, one line each
 */
export function consoleSink(options: ConsoleSinkOptions = {}): EventSink {
  return (event) => {
    if (
      !options.verbose &&
      (event.type === "task:start" || event.type === "branch:end")
    ) {
      return;
    }

    const line = formatEvent(event);
    if (event.type === "retry") {
      console.warn(line);
    } else if (event.type === "failure" || event.type === "branch:failed") {
      console.error(line);
    } else {
      console.log(line);
    }
  };
}

/**
 * Deliver every event to each sink in order
 */
export function composeSinks(...sinks: EventSink[]): EventSink {
  return (event) => {
    for (const sink of sinks) {
      sink(event);
    }
  };
}

// ============================================================================
// Event Log
// ============================================================================

export interface EventLogOptions {
  /** Oldest entries are dropped past this many (default 1000) */
  maxEntries?: number;
}

export interface EventLog {
  sink: EventSink;
  events(): HustleEvent[];
  lines(): string[];
  ofType<T extends HustleEventType>(
    type: T,
  ): Array<Extract<HustleEvent, { type: T }>>;
  clear(): void;
}

const DEFAULT_MAX_ENTRIES = 1000;

/**
 * Collect events in memory, bounded
 */
export function createEventLog(options: EventLogOptions = {}): EventLog {
  const maxEntries = options.maxEntries ?? DEFAULT_MAX_ENTRIES;
  let events: HustleEvent[] = [];
  let lines: string[] = [];
  let dropped = 0;

  const sink: EventSink = (event) => {
    events.push(event);
    lines.push(formatEvent(event));

    if (events.length > maxEntries) {
      const excess = events.length - maxEntries;
      dropped += excess;
      events.splice(0, excess);
      lines.splice(0, excess);
    }
  };

  return {
    sink,
    events: () => [...events],
    lines: () =>
      dropped > 0
        ? [`[SYSTEM] Log truncated: removed ${dropped} old entries`, ...lines]
        : [...lines],
    ofType: <T extends HustleEventType>(type: T) =>
      events.filter(
        (e): e is Extract<HustleEvent, { type: T }> => e.type === type,
      ),
    clear: () => {
      events = [];
      lines = [];
      dropped = 0;
    },
  };
}
