/**
 * Docking Station
 *
 * The state a task receives. `capital` is shared by every station of a run;
 * `change` belongs to one branch and is copied whenever the branch forks.
 */

import { cloneDeep, isMergeable, mergeFields } from "./clone";
import type { MovePayload } from "./types";

/** Fork counter shared by all stations descending from one root */
interface Lineage {
  forks: number;
}

export class DockingStation<TCapital, TChange> {
  private constructor(
    readonly capital: TCapital,
    readonly change: TChange,
    readonly tag: string,
    private readonly lineage: Lineage,
  ) {
    Object.freeze(this);
  }

  /**
   * Dock the root station of a run. Change is copied field by field on
   * every fork, so a change holding class instances with `#private` fields
   * must implement Cloneable; a field-by-field copy of those is unusable.
   */
  static create<TCapital, TChange>(
    capital: TCapital,
    change: TChange,
    tag = "root",
  ): DockingStation<TCapital, TChange> {
    return new DockingStation(capital, change, tag, { forks: 0 });
  }

  /**
   * Fork into an independent station. Capital is carried by reference,
   * change is deep-copied and the patch (if any) merged onto the copy.
   * Patches are ignored when change is not an object with fields.
   */
  undock(patch?: MovePayload | null): DockingStation<TCapital, TChange> {
    const change = cloneDeep(this.change);
    if (patch && isMergeable(change)) {
      mergeFields(change, patch);
    }

    this.lineage.forks += 1;
    return new DockingStation(
      this.capital,
      change,
      `${this.tag}/${this.lineage.forks}`,
      this.lineage,
    );
  }
}
