/**
 * Hustle
 *
 * Walks a task graph breadth-first from an entry task. Every move a task
 * emits forks the station onto the linked successor; moves on unlinked
 * routes end their branch. A run finishes when the queue is empty, and its
 * result is whatever the tasks did to capital.
 */

import { ConfigurationError, errorMessage, RoutingError } from "../errors";
import { noopSink, type EventSink } from "../runtime/events";
import { DockingStation } from "./station";
import { Task } from "./task";
import type { BranchErrorMode, Move } from "./types";

export interface HustleOptions {
  sink?: EventSink;
  /** Default "abort": the first unrecovered error ends the whole run */
  onBranchError?: BranchErrorMode;
  /** Stop runaway cyclic graphs after this many steps */
  maxSteps?: number;
}

export interface StartOptions extends HustleOptions {
  signal?: AbortSignal;
  /** Lineage tag of the root station (default "root") */
  tag?: string;
}

export interface BranchFailure {
  task: string;
  tag: string;
  error: unknown;
}

export interface HustleReport {
  /** Number of task steps executed */
  steps: number;
  /** Branches that ended on an unlinked route or a contained failure */
  branchesEnded: number;
  /** Contained failures, always empty in abort mode */
  failures: BranchFailure[];
}

type QueueEntry<TCapital> = {
  task: Task<TCapital, unknown, unknown>;
  station: DockingStation<TCapital, unknown>;
};

function assertMaxSteps(maxSteps: number | undefined): void {
  if (
    maxSteps !== undefined &&
    maxSteps !== Number.POSITIVE_INFINITY &&
    !(Number.isInteger(maxSteps) && maxSteps >= 1)
  ) {
    throw new ConfigurationError(
      `maxSteps must be an integer >= 1, got ${maxSteps}`,
      { field: "maxSteps" },
    );
  }
}

export class Hustle<TCapital = unknown, TChange = unknown> {
  constructor(
    private readonly startTask: Task<TCapital, TChange, unknown>,
    private readonly options: HustleOptions = {},
  ) {
    if (!(startTask instanceof Task)) {
      throw new RoutingError("A Hustle needs a Task to start from");
    }
    assertMaxSteps(options.maxSteps);
  }

  /**
   * Chain tasks on the default route and hustle from the first one
   */
  static sequence<TCapital, TChange>(
    first: Task<TCapital, TChange, unknown>,
    ...rest: Array<Task<TCapital, unknown, unknown>>
  ): Hustle<TCapital, TChange> {
    let tail: Task<TCapital, unknown, unknown> = first;
    for (const task of rest) {
      tail = tail.chain(task);
    }
    return new Hustle(first);
  }

  get entry(): Task<TCapital, TChange, unknown> {
    return this.startTask;
  }

  /**
   * Run the graph once over the given capital and initial change
   */
  async start(
    capital: TCapital,
    change: TChange,
    options: StartOptions = {},
  ): Promise<HustleReport> {
    assertMaxSteps(options.maxSteps);
    const sink = options.sink ?? this.options.sink ?? noopSink;
    const mode = options.onBranchError ?? this.options.onBranchError ?? "abort";
    const maxSteps =
      options.maxSteps ?? this.options.maxSteps ?? Number.POSITIVE_INFINITY;
    const { signal } = options;

    const root = DockingStation.create(capital, change, options.tag);
    const queue: Array<QueueEntry<TCapital>> = [
      { task: this.startTask, station: root },
    ];
    const report: HustleReport = { steps: 0, branchesEnded: 0, failures: [] };

    sink({ type: "run:start", task: this.startTask.name, tag: root.tag });

    for (let entry = queue.shift(); entry; entry = queue.shift()) {
      signal?.throwIfAborted();
      const { task, station } = entry;

      if (report.steps >= maxSteps) {
        throw new RoutingError(
          `Run exceeded ${maxSteps} steps at ${task.name} (${station.tag})`,
          { task: task.name, tag: station.tag },
        );
      }
      report.steps++;

      let moves: Move[];
      try {
        moves = await task.step(station, { sink, signal });
      } catch (error) {
        if (mode === "abort" || signal?.aborted) {
          throw error;
        }
        report.failures.push({ task: task.name, tag: station.tag, error });
        report.branchesEnded++;
        sink({
          type: "branch:failed",
          task: task.name,
          tag: station.tag,
          error: errorMessage(error),
        });
        continue;
      }

      for (const move of moves) {
        const next = task.successor(move.route);
        if (!next) {
          report.branchesEnded++;
          sink({
            type: "branch:end",
            task: task.name,
            tag: station.tag,
            route: move.route,
          });
          continue;
        }
        queue.push({ task: next, station: station.undock(move.payload) });
      }
    }

    sink({
      type: "run:complete",
      steps: report.steps,
      branchesEnded: report.branchesEnded,
      failures: report.failures.length,
    });
    return report;
  }
}
