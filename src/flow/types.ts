/**
 * Hustleflow Type Definitions
 */

/** Route a task follows when it emits no move of its own */
export const FORWARD = "forward";

export type MovePayload = Record<string, unknown>;

/**
 * Routing intent declared by a task during delivery
 */
export interface Move {
  readonly route: string;
  /** Merged into the next station's change */
  readonly payload: MovePayload | null;
}

/**
 * Values that know how to copy themselves. Used on undock instead of the
 * generic deep copy.
 */
export interface Cloneable {
  /** An independent copy of this value */
  clone(): unknown;
}

/**
 * How a run reacts to a branch that raises:
 * - abort: the error leaves start() and nothing else runs
 * - contain: the branch ends, the failure is recorded, the run continues
 */
export type BranchErrorMode = "abort" | "contain";
