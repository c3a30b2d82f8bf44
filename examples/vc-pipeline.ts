/**
 * Example: a two-step venture pipeline
 *
 * An analyst writes up each pitch, an investor reads the write-up and
 * decides. Decisions land in the firm's portfolio or rejected list.
 *
 * Usage:
 *   OPENROUTER_API_KEY=... DEFAULT_MODEL=... npm run example:vc -- "idea one" "idea two"
 */

import {
  ChatClient,
  consoleSink,
  defineContract,
  Hustle,
  RETRY_POLICIES,
  resolveDefaultModel,
  Task,
  type Completer,
  type DockingStation,
} from "../src/lib";

interface Firm {
  portfolio: string[];
  rejected: string[];
}

interface Pitch {
  idea: string;
  analysis?: string;
}

const pitchContract = defineContract<Pitch>({
  type: "object",
  required: ["idea"],
  properties: {
    idea: { type: "string", minLength: 1 },
    analysis: { type: "string" },
  },
});

class Analyst extends Task<Firm, Pitch, string> {
  constructor(
    private readonly llm: Completer,
    private readonly model: string,
  ) {
    super({
      name: "Analyst",
      requirements: pitchContract,
      retry: RETRY_POLICIES.fast,
    });
  }

  protected execute(input: Pitch): Promise<string> {
    return this.llm.complete(
      [
        {
          role: "system",
          content:
            "You are a startup analyst. Summarize the market, risks and upside of a pitch in three sentences.",
        },
        { role: "user", content: input.idea },
      ],
      this.model,
      { temperature: 0.3 },
    );
  }

  protected deliver(
    _station: DockingStation<Firm, Pitch>,
    _input: Pitch,
    analysis: string,
  ): void {
    this.forward({ analysis });
  }
}

class Investor extends Task<Firm, Pitch, boolean> {
  constructor(
    private readonly llm: Completer,
    private readonly model: string,
  ) {
    super({ name: "Investor", requirements: pitchContract });
  }

  protected async execute(input: Pitch): Promise<boolean> {
    const verdict = await this.llm.complete(
      [
        {
          role: "system",
          content: "You are a venture capitalist. Answer FUND or PASS only.",
        },
        {
          role: "user",
          content: `Pitch: ${input.idea}\n\nAnalysis: ${input.analysis ?? "none"}`,
        },
      ],
      this.model,
      { temperature: 0, maxTokens: 5 },
    );
    return verdict.trim().toUpperCase().startsWith("FUND");
  }

  protected deliver(
    station: DockingStation<Firm, Pitch>,
    input: Pitch,
    funded: boolean,
  ): void {
    (funded ? station.capital.portfolio : station.capital.rejected).push(
      input.idea,
    );
  }
}

async function main() {
  const ideas = process.argv.slice(2);
  if (ideas.length === 0) {
    ideas.push("A subscription service for houseplant sitters");
  }

  const llm = new ChatClient();
  const model = resolveDefaultModel();
  const hustle = Hustle.sequence(
    new Analyst(llm, model),
    new Investor(llm, model),
  );
  const firm: Firm = { portfolio: [], rejected: [] };

  console.log("💼 Venture pipeline\n");

  for (const idea of ideas) {
    await hustle.start(firm, { idea }, { sink: consoleSink() });
  }

  console.log(`\n✓ Funded: ${firm.portfolio.join(", ") || "nothing"}`);
  console.log(`✗ Passed: ${firm.rejected.join(", ") || "nothing"}`);
}

main().catch((error) => {
  console.error("❌ Error:", error);
  process.exit(1);
});
