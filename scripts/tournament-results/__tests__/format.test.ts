import { describe, it } from "node:test";
import assert from "node:assert";

import {
  formatEntrantName,
  formatPlacementLine,
  formatPlacements,
  renderResults,
} from "../format";
import type { PlacementRecord } from "../types";

function record(
  rank: number,
  entrantName: string,
  extra: Partial<PlacementRecord> = {}
): PlacementRecord {
  return {
    rank,
    entrantId: String(rank),
    entrantName,
    socialHandles: [],
    characters: [],
    ...extra,
  };
}

const twenty = Array.from({ length: 20 }, (_, index) =>
  record(index + 1, `Player ${index + 1}`)
);

describe("formatPlacements", () => {
  it("stops after the requested number of places", () => {
    const lines = formatPlacements(twenty, { limit: 16 });
    assert.strictEqual(lines.length, 16);
    assert.strictEqual(lines[0], "1. Player 1");
    assert.strictEqual(lines[15], "16. Player 16");
  });

  it("prints the whole list without a limit", () => {
    const lines = formatPlacements(twenty);
    assert.strictEqual(lines.length, 20);
    assert.strictEqual(lines[19], "20. Player 20");
  });

  it("keeps shared ranks as given", () => {
    const lines = formatPlacements([
      record(1, "A"),
      record(2, "B"),
      record(3, "C"),
      record(3, "D"),
      record(5, "E"),
    ]);
    assert.deepStrictEqual(lines, ["1. A", "2. B", "3. C", "3. D", "5. E"]);
  });
});

describe("formatEntrantName", () => {
  it("puts the sponsor prefix before the tag", () => {
    assert.strictEqual(
      formatEntrantName([{ prefix: "TSM", gamerTag: "Leffen" }], "x"),
      "TSM | Leffen"
    );
  });

  it("drops empty prefixes", () => {
    assert.strictEqual(
      formatEntrantName([{ prefix: " ", gamerTag: "Mang0" }], "x"),
      "Mang0"
    );
    assert.strictEqual(
      formatEntrantName([{ prefix: null, gamerTag: "Mang0" }], "x"),
      "Mang0"
    );
  });

  it("joins team members and falls back to the entrant name", () => {
    assert.strictEqual(
      formatEntrantName(
        [{ gamerTag: "Alpha" }, { prefix: "Team", gamerTag: "Beta" }],
        "x"
      ),
      "Alpha / Team | Beta"
    );
    assert.strictEqual(formatEntrantName([], "Entrant Name"), "Entrant Name");
  });
});

describe("formatPlacementLine", () => {
  const leffen = record(1, "TSM | Leffen", {
    socialHandles: ["TSM_Leffen"],
    characters: ["Fox", "Falco"],
  });

  it("appends characters", () => {
    assert.strictEqual(
      formatPlacementLine(leffen),
      "1. TSM | Leffen - Fox, Falco"
    );
  });

  it("adds handles when asked", () => {
    assert.strictEqual(
      formatPlacementLine(leffen, { twitter: true }),
      "1. TSM | Leffen (@TSM_Leffen) - Fox, Falco"
    );
    assert.strictEqual(
      formatPlacementLine(record(2, "Solo"), { twitter: true }),
      "2. Solo"
    );
  });
});

describe("renderResults", () => {
  it("separates headed results with blank lines", () => {
    const results = [
      {
        heading: "Melee - Singles",
        placements: [record(1, "A"), record(2, "B")],
      },
      { heading: "Ultimate - Singles", placements: [record(1, "C")] },
    ];
    assert.deepStrictEqual(renderResults(results, { limit: 1 }), [
      "Melee - Singles",
      "1. A",
      "",
      "Ultimate - Singles",
      "1. C",
    ]);
  });

  it("prints bare lines for a result without a heading", () => {
    const results = [{ placements: [record(1, "A"), record(2, "B")] }];
    assert.deepStrictEqual(renderResults(results), ["1. A", "2. B"]);
  });
});
