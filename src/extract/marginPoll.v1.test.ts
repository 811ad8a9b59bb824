import { describe, expect, it } from "vitest";

import { TEST_TEAMS } from "../testing/leagueFixtures";
import { extractMarginPoll, MarginParseError } from "./marginPoll.v1";
import { MarginPollSchema } from "./rawPoll.v1";

const ctx = {
  matchId: "9-rcb-vs-pbks",
  matchNumber: 9,
  teams: TEST_TEAMS,
  defaultMatchPoints: 1,
  unmatchedMarginPolicy: "NO_CORRECT_ANSWER" as const,
};

function poll(margin: string) {
  return MarginPollSchema.parse({
    margin,
    answers: [
      { id: 1, name: "Win by 1-10 runs OR by 9-10 wickets" },
      { id: 2, name: "Win by 11-20 runs OR by 7-8 wickets" },
      { id: 3, name: "Win by Super Over" },
    ],
    votes: [
      { answerId: 2, user: { id: "u1", username: "amy", globalName: "Amy" } },
      { answerId: 1, user: { id: "u2", username: "bob", globalName: "Bob" } },
      { answerId: 3, user: { id: "u3", username: "cat", globalName: "Cat" } },
    ],
  });
}

describe("extractMarginPoll", () => {
  it("scores the answer whose range covers the margin", () => {
    const { match, diagnostics } = extractMarginPoll(poll("14 runs"), ctx);

    expect(diagnostics).toEqual([]);
    expect(match.status).toBe("SCORED");
    expect(match.records).toEqual([
      { username: "amy", displayName: "Amy", choiceShort: "11-20R", choiceFull: "Win by 11-20 runs OR by 7-8 wickets", points: 1 },
      { username: "bob", displayName: "Bob", choiceShort: "1-10R", choiceFull: "Win by 1-10 runs OR by 9-10 wickets", points: 0 },
      { username: "cat", displayName: "Cat", choiceShort: "SO", choiceFull: "Win by Super Over", points: 0 },
    ]);
  });

  it("scores a super over", () => {
    const { match } = extractMarginPoll(poll("Super Over"), ctx);
    expect(match.records.map((r) => [r.username, r.points])).toEqual([
      ["amy", 0],
      ["bob", 0],
      ["cat", 1],
    ]);
  });

  it("keeps an unmatched margin as a match nobody called by default", () => {
    const { match } = extractMarginPoll(poll("2 wickets"), ctx);
    expect(match.status).toBe("NO_CORRECT_ANSWER");
    expect(match.records.map((r) => [r.choiceShort, r.points])).toEqual([
      ["7-8W", 0],
      ["9-10W", 0],
      ["SO", 0],
    ]);
  });

  it("voids an unmatched margin under the VOID policy", () => {
    const { match } = extractMarginPoll(poll("2 wickets"), { ...ctx, unmatchedMarginPolicy: "VOID" });
    expect(match.status).toBe("VOID");
  });

  it("rejects an unparseable margin", () => {
    expect(() => extractMarginPoll(poll("by a lot"), ctx)).toThrow(MarginParseError);
    expect(() => extractMarginPoll(poll("by a lot"), ctx)).toThrow('MARGIN_INVALID: 9-rcb-vs-pbks: "by a lot"');
  });
});
