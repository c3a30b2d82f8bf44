/**
 * Contract Tests
 */

import { describe, it, expect } from "vitest";
import { ValidationError } from "../../errors";
import { defineContract } from "../contract";

interface Deck {
  startupName: string;
  idea: string;
  analysis: string;
  contact?: string;
}

const deckContract = defineContract<Deck>({
  type: "object",
  required: ["startupName", "idea"],
  properties: {
    startupName: { type: "string", minLength: 1 },
    idea: { type: "string" },
    analysis: { type: "string", default: "" },
    contact: { type: "string", format: "email" },
  },
});

describe("defineContract", () => {
  it("should fill defaults on a copy of the value", () => {
    const raw = { startupName: "CureAI", idea: "hair" };

    const deck = deckContract.parse(raw);

    expect(deck).toEqual({ startupName: "CureAI", idea: "hair", analysis: "" });
    expect(raw).toEqual({ startupName: "CureAI", idea: "hair" });
  });

  it("should coerce scalar types", () => {
    const contract = defineContract<{ rounds: number; active: boolean }>({
      type: "object",
      properties: {
        rounds: { type: "integer" },
        active: { type: "boolean" },
      },
    });

    expect(contract.parse({ rounds: "2", active: "true" })).toEqual({
      rounds: 2,
      active: true,
    });
  });

  it("should list every issue in the ValidationError", () => {
    let caught: unknown;
    try {
      deckContract.parse({ startupName: "", contact: "nope" }, "Analyst");
    } catch (e) {
      caught = e;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.code).toBe("VALIDATION_ERROR");
      expect(caught.retryable).toBe(false);
      expect(caught.issues).toEqual(
        expect.arrayContaining([
          { path: "/", message: "must have required property 'idea'" },
          {
            path: "/startupName",
            message: "must NOT have fewer than 1 characters",
          },
          { path: "/contact", message: 'must match format "email"' },
        ]),
      );
      expect(caught.message).toMatch(/^Analyst does not match contract: /);
    }
  });

  it("should report issues without throwing from check", () => {
    expect(deckContract.check({ startupName: "A", idea: "b" })).toEqual([]);
    expect(deckContract.check({ idea: "b" })).toEqual([
      { path: "/", message: "must have required property 'startupName'" },
    ]);
  });
});
