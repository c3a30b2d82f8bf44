/**
 * Hustleflow Task
 *
 * A task is a PocketFlow Node whose prep → exec → post lifecycle is
 * validate → execute → deliver:
 *
 * - validate checks the branch's change against the task's contract
 * - execute does the work, retried with backoff by the task's policy
 * - deliver applies side effects and emits moves naming the routes to follow
 *
 * PocketFlow's own retry loop is pinned to a single attempt; the task's
 * RetryPolicy does the backing off. Successors live in the task's link
 * table and are resolved by the Hustle, not by PocketFlow's Flow.
 */

import { AsyncLocalStorage } from "node:async_hooks";
import { Node, type BaseNode } from "pocketflow";
import { RoutingError } from "../errors";
import type { Contract } from "../schema/contract";
import { noopSink, type EventSink } from "../runtime/events";
import {
  createRetryPolicy,
  DEFAULT_RETRY_POLICY,
  withRetry,
  type RetryPolicy,
} from "../runtime/retry";
import { cloneDeep, isPlainRecord } from "./clone";
import type { DockingStation } from "./station";
import { FORWARD, type Move, type MovePayload } from "./types";

// ============================================================================
// Step Frame
// ============================================================================

type Phase = "validate" | "execute" | "deliver" | "closed";

interface StepFrame {
  task: object;
  phase: Phase;
  tag: string;
  moves: Move[];
  sink: EventSink;
  signal?: AbortSignal;
}

// One frame per step in flight, so a task shared by concurrent runs keeps
// their moves apart.
const frames = new AsyncLocalStorage<StepFrame>();

const DEFAULT_MOVE: Move = Object.freeze({ route: FORWARD, payload: null });

// ============================================================================
// Task
// ============================================================================

export interface TaskOptions<TChange> {
  /** Name used in events and errors (default: the class name) */
  name?: string;
  /** Contract the change must satisfy when it is a plain mapping */
  requirements?: Contract<TChange>;
  /** Retry policy for execute; partial policies are filled from the default */
  retry?: Partial<RetryPolicy>;
  /** Fixed set of routes this task may link and emit ("forward" is implied) */
  routes?: readonly string[];
}

export interface StepOptions {
  sink?: EventSink;
  signal?: AbortSignal;
}

export abstract class Task<
  TCapital = unknown,
  TChange = unknown,
  TOutput = unknown,
> extends Node<DockingStation<TCapital, TChange>> {
  readonly name: string;
  protected readonly requirements?: Contract<TChange>;
  protected readonly retryPolicy: RetryPolicy;
  private readonly routes?: ReadonlySet<string>;
  private readonly links = new Map<string, Task<TCapital, unknown, unknown>>();

  constructor(options: TaskOptions<TChange> = {}) {
    super(1, 0);
    this.name = options.name ?? this.constructor.name;
    this.requirements = options.requirements;
    this.retryPolicy = options.retry
      ? createRetryPolicy(options.retry)
      : DEFAULT_RETRY_POLICY;
    this.routes = options.routes ? new Set(options.routes) : undefined;
  }

  // --------------------------------------------------------------------------
  // What subclasses implement
  // --------------------------------------------------------------------------

  /** The core operation. Retried per the task's policy. */
  protected abstract execute(input: TChange): Promise<TOutput>;

  /**
   * Side effects after a successful execute. Mutate capital here and call
   * emitMove()/forward() to pick routes; emitting nothing moves forward.
   */
  protected deliver(
    _station: DockingStation<TCapital, TChange>,
    _input: TChange,
    _output: TOutput,
  ): void | Promise<void> {}

  /**
   * Coerce and check the change against the contract. A change that is not
   * a plain mapping (a class instance, an array, a primitive) is passed
   * through unchecked, as already-structured input.
   */
  protected async validate(
    station: DockingStation<TCapital, TChange>,
  ): Promise<TChange> {
    if (this.requirements && isPlainRecord(station.change)) {
      return this.requirements.parse(station.change, this.name);
    }
    return station.change;
  }

  // --------------------------------------------------------------------------
  // Routing
  // --------------------------------------------------------------------------

  /**
   * Register a named outgoing edge
   */
  link(route: string, next: BaseNode): this {
    if (!(next instanceof Task)) {
      throw new RoutingError(
        `${this.name}: successor for route "${route}" must be a Task`,
        { task: this.name, route },
      );
    }
    this.assertRoute(route);
    this.links.set(route, next);
    return this;
  }

  /**
   * Link on the default route and return the successor, so chains read
   * left to right: a.chain(b).chain(c)
   */
  chain<T extends BaseNode>(next: T): T {
    this.link(FORWARD, next);
    return next;
  }

  on(action: string, node: BaseNode): this {
    return this.link(action, node);
  }

  next<T extends BaseNode>(node: T): T {
    return this.chain(node);
  }

  successor(route: string): Task<TCapital, unknown, unknown> | undefined {
    return this.links.get(route);
  }

  linkedRoutes(): string[] {
    return [...this.links.keys()];
  }

  /**
   * Declare routing intent. Only valid while this task is delivering.
   */
  protected emitMove(route: string, payload: MovePayload | null = null): void {
    const frame = this.frame();
    if (frame.phase !== "deliver") {
      throw new RoutingError(
        `${this.name}: moves can only be emitted while delivering`,
        { task: this.name, route },
      );
    }
    this.assertRoute(route);
    frame.moves.push(
      Object.freeze({ route, payload: payload ? cloneDeep(payload) : null }),
    );
  }

  protected forward(payload: MovePayload | null = null): void {
    this.emitMove(FORWARD, payload);
  }

  private assertRoute(route: string): void {
    if (this.routes && route !== FORWARD && !this.routes.has(route)) {
      throw new RoutingError(
        `${this.name}: undeclared route "${route}" (declared: ${[...this.routes].join(", ")})`,
        { task: this.name, route },
      );
    }
  }

  // --------------------------------------------------------------------------
  // Execution
  // --------------------------------------------------------------------------

  /**
   * Run validate → execute → deliver once and return the moves, never empty
   */
  async step(
    station: DockingStation<TCapital, TChange>,
    options: StepOptions = {},
  ): Promise<Move[]> {
    options.signal?.throwIfAborted();
    const sink = options.sink ?? noopSink;
    const frame: StepFrame = {
      task: this,
      phase: "validate",
      tag: station.tag,
      moves: [],
      sink,
      signal: options.signal,
    };

    sink({ type: "task:start", task: this.name, tag: station.tag });
    const started = performance.now();

    try {
      await frames.run(frame, () => this._run(station));
    } finally {
      // Late emits from work spawned during delivery must not reach the run
      frame.phase = "closed";
    }

    const moves = frame.moves.length > 0 ? [...frame.moves] : [DEFAULT_MOVE];
    sink({
      type: "task:complete",
      task: this.name,
      tag: station.tag,
      moves,
      durationMs: performance.now() - started,
    });
    return moves;
  }

  /**
   * Step outside a Hustle; resolves to the first route taken
   */
  async run(
    station: DockingStation<TCapital, TChange>,
  ): Promise<string | undefined> {
    const [first] = await this.step(station);
    return first?.route;
  }

  async prep(station: DockingStation<TCapital, TChange>): Promise<TChange> {
    this.frame().phase = "validate";
    return this.validate(station);
  }

  async exec(input: TChange): Promise<TOutput> {
    const frame = this.frame();
    frame.phase = "execute";
    return withRetry(() => this.execute(input), this.retryPolicy, {
      source: this.name,
      tag: frame.tag,
      sink: frame.sink,
      signal: frame.signal,
    });
  }

  async post(
    station: DockingStation<TCapital, TChange>,
    input: TChange,
    output: TOutput,
  ): Promise<string | undefined> {
    this.frame().phase = "deliver";
    await this.deliver(station, input, output);
    return undefined;
  }

  private frame(): StepFrame {
    const frame = frames.getStore();
    if (!frame || frame.task !== this) {
      throw new RoutingError(`${this.name}: not inside a step`, {
        task: this.name,
      });
    }
    return frame;
  }
}

// ============================================================================
// Function Tasks
// ============================================================================

export interface MoveEmitter {
  move(route: string, payload?: MovePayload | null): void;
  forward(payload?: MovePayload | null): void;
}

export interface TaskDefinition<TCapital, TChange, TOutput>
  extends TaskOptions<TChange> {
  name: string;
  execute: (input: TChange) => Promise<TOutput>;
  deliver?: (
    station: DockingStation<TCapital, TChange>,
    input: TChange,
    output: TOutput,
    emit: MoveEmitter,
  ) => void | Promise<void>;
}

class FunctionTask<TCapital, TChange, TOutput> extends Task<
  TCapital,
  TChange,
  TOutput
> {
  constructor(
    private readonly definition: TaskDefinition<TCapital, TChange, TOutput>,
  ) {
    super(definition);
  }

  protected execute(input: TChange): Promise<TOutput> {
    return this.definition.execute(input);
  }

  protected async deliver(
    station: DockingStation<TCapital, TChange>,
    input: TChange,
    output: TOutput,
  ): Promise<void> {
    await this.definition.deliver?.(station, input, output, {
      move: (route, payload) => this.emitMove(route, payload),
      forward: (payload) => this.forward(payload),
    });
  }
}

/**
 * Build a task from plain functions instead of a subclass
 */
export function createTask<TCapital, TChange, TOutput>(
  definition: TaskDefinition<TCapital, TChange, TOutput>,
): Task<TCapital, TChange, TOutput> {
  return new FunctionTask(definition);
}
