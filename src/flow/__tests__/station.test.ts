/**
 * Docking Station Tests
 */

import { describe, it, expect } from "vitest";
import { RoutingError } from "../../errors";
import { DockingStation } from "../station";
import type { Cloneable } from "../types";

interface Capital {
  portfolio: string[];
}

interface Deck {
  name: string;
  meta: { reviewers: string[]; scores: Map<string, number> };
}

function createDeck(): Deck {
  return {
    name: "Foo",
    meta: { reviewers: ["ana"], scores: new Map([["ana", 3]]) },
  };
}

class Pitch {
  constructor(
    public name: string,
    public notes: string[] = [],
  ) {}

  summary(): string {
    return `${this.name} (${this.notes.length} notes)`;
  }
}

class Ledger implements Cloneable {
  static clones = 0;

  constructor(public readonly entries: number[]) {}

  clone(): Ledger {
    Ledger.clones++;
    return new Ledger([...this.entries]);
  }
}

describe("DockingStation", () => {
  it("should start with the root tag", () => {
    const station = DockingStation.create({ portfolio: [] }, createDeck());
    expect(station.tag).toBe("root");
  });

  it("should share capital and copy change on undock", () => {
    const capital: Capital = { portfolio: [] };
    const root = DockingStation.create(capital, createDeck());
    const forked = root.undock();

    expect(forked.capital).toBe(root.capital);
    expect(forked.capital).toBe(capital);
    expect(forked.change).not.toBe(root.change);
    expect(forked.change).toEqual(root.change);
  });

  it("should keep nested change independent in both directions", () => {
    const root = DockingStation.create({ portfolio: [] }, createDeck());
    const forked = root.undock();

    forked.change.meta.reviewers.push("ben");
    forked.change.meta.scores.set("ben", 5);
    root.change.meta.reviewers.push("cy");

    expect(root.change.meta.reviewers).toEqual(["ana", "cy"]);
    expect(root.change.meta.scores.has("ben")).toBe(false);
    expect(forked.change.meta.reviewers).toEqual(["ana", "ben"]);
  });

  it("should merge patch fields onto the copy only", () => {
    const root = DockingStation.create({}, { name: "Foo", idea: "cats" });
    const forked = root.undock({ idea: "dogs", analysis: "weak moat" });

    expect(forked.change).toEqual({
      name: "Foo",
      idea: "dogs",
      analysis: "weak moat",
    });
    expect(root.change).toEqual({ name: "Foo", idea: "cats" });
  });

  it("should not alias patch values into the new change", () => {
    const patch = { tags: ["seed"] };
    const forked = DockingStation.create({}, { name: "Foo" }).undock(patch);

    patch.tags.push("series-a");
    expect(forked.change).toEqual({ name: "Foo", tags: ["seed"] });
  });

  it("should keep class instances as class instances", () => {
    const root = DockingStation.create({}, new Pitch("CureAI", ["bold"]));
    const forked = root.undock({ name: "CureAI v2" });

    expect(forked.change).toBeInstanceOf(Pitch);
    expect(forked.change.summary()).toBe("CureAI v2 (1 notes)");
    expect(forked.change.notes).not.toBe(root.change.notes);
    expect(root.change.name).toBe("CureAI");
  });

  it("should copy through clone() when the change provides it", () => {
    const before = Ledger.clones;
    const root = DockingStation.create({}, new Ledger([1, 2]));
    const forked = root.undock();

    expect(Ledger.clones).toBe(before + 1);
    expect(forked.change.entries).toEqual([1, 2]);
    expect(forked.change.entries).not.toBe(root.change.entries);
  });

  it("should ignore patches when change has no fields to merge", () => {
    const root = DockingStation.create({}, [1, 2, 3]);
    const forked = root.undock({ extra: true });

    expect(forked.change).toEqual([1, 2, 3]);
  });

  it("should keep cyclic change cyclic", () => {
    const change: { name: string; self?: unknown } = { name: "loop" };
    change.self = change;

    const forked = DockingStation.create({}, change).undock();

    expect(forked.change.self).toBe(forked.change);
    expect(forked.change).not.toBe(change);
  });

  it("should extend lineage tags with unique suffixes", () => {
    const root = DockingStation.create({}, {});
    const a = root.undock();
    const b = root.undock();
    const c = a.undock();
    const d = b.undock();

    expect([a.tag, b.tag, c.tag, d.tag]).toEqual([
      "root/1",
      "root/2",
      "root/1/3",
      "root/2/4",
    ]);
  });

  it("should never mutate the original station", () => {
    const change = createDeck();
    const root = DockingStation.create({ portfolio: [] }, change, "pitch");

    root.undock({ name: "Bar" });

    expect(Object.isFrozen(root)).toBe(true);
    expect(root.change).toBe(change);
    expect(root.change.name).toBe("Foo");
    expect(root.tag).toBe("pitch");
  });

  it("should merge patches onto a copy of frozen change", () => {
    const root = DockingStation.create({}, Object.freeze({ name: "Foo" }));

    const forked = root.undock({ name: "Bar", extra: 1 });

    expect(forked.change).toEqual({ name: "Bar", extra: 1 });
    expect(root.change).toEqual({ name: "Foo" });
  });

  it("should refuse to merge onto a getter-only field", () => {
    const root = DockingStation.create(
      {},
      {
        get name() {
          return "Foo";
        },
      },
    );

    expect(() => root.undock({ name: "Bar" })).toThrow(RoutingError);
    expect(() => root.undock({ name: "Bar" })).toThrow(
      'Cannot merge patch field "name" into change',
    );
  });

  it("should fork change with private fields through Cloneable", () => {
    class Vault implements Cloneable {
      #secret: string;

      constructor(secret: string) {
        this.#secret = secret;
      }

      reveal(): string {
        return this.#secret;
      }

      clone(): Vault {
        return new Vault(this.#secret);
      }
    }
    const root = DockingStation.create({}, new Vault("test-secret"));

    const forked = root.undock();

    expect(forked.change).not.toBe(root.change);
    expect(forked.change.reveal()).toBe("test-secret");
  });
});
