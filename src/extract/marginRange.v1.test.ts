import { describe, expect, it } from "vitest";

import { answerShortName, findWinningAnswer, parseAnswerRange, parseMargin, rangeContains } from "./marginRange.v1";

const answers = [
  { id: 1, name: "Win by 1-10 runs OR by 9-10 wickets" },
  { id: 2, name: "Win by 11-20 runs OR by 7-8 wickets" },
  { id: 3, name: "Win by 61+ runs OR by 1 wicket" },
  { id: 4, name: "Win by Super Over" },
];

describe("parseMargin", () => {
  it("parses runs, wickets and super over", () => {
    expect(parseMargin("14 runs")).toEqual({ unit: "runs", value: 14 });
    expect(parseMargin("3 Wickets")).toEqual({ unit: "wickets", value: 3 });
    expect(parseMargin("1 wicket")).toEqual({ unit: "wickets", value: 1 });
    expect(parseMargin("  Super Over ")).toEqual({ unit: "super_over" });
  });

  it("rejects anything else", () => {
    expect(parseMargin("by 14 runs")).toBeNull();
    expect(parseMargin("lots")).toBeNull();
    expect(parseMargin("")).toBeNull();
    expect(parseMargin(null)).toBeNull();
  });
});

describe("parseAnswerRange", () => {
  it("reads both unit ranges from a combined option", () => {
    expect(parseAnswerRange(answers[0].name)).toEqual({
      runs: { min: 1, max: 10, openEnded: false },
      wickets: { min: 9, max: 10, openEnded: false },
      superOver: false,
    });
  });

  it("reads open-ended and single values", () => {
    expect(parseAnswerRange(answers[2].name)).toEqual({
      runs: { min: 61, max: null, openEnded: true },
      wickets: { min: 1, max: null, openEnded: false },
      superOver: false,
    });
    expect(parseAnswerRange(answers[3].name)).toEqual({ runs: null, wickets: null, superOver: true });
  });
});

describe("answerShortName", () => {
  it("labels by the unit the match was won by", () => {
    expect(answerShortName(answers[1].name, "runs")).toBe("11-20R");
    expect(answerShortName(answers[1].name, "wickets")).toBe("7-8W");
    expect(answerShortName(answers[2].name, "runs")).toBe("61+R");
    expect(answerShortName(answers[2].name, "wickets")).toBe("1W");
    expect(answerShortName(answers[3].name, "runs")).toBe("SO");
    expect(answerShortName("Win by 1-10 runs", "wickets")).toBe("Unknown");
  });
});

describe("rangeContains", () => {
  it("is inclusive, open-ended means at least, single values match exactly", () => {
    expect(rangeContains({ min: 11, max: 20, openEnded: false }, 11)).toBe(true);
    expect(rangeContains({ min: 11, max: 20, openEnded: false }, 20)).toBe(true);
    expect(rangeContains({ min: 11, max: 20, openEnded: false }, 21)).toBe(false);
    expect(rangeContains({ min: 61, max: null, openEnded: true }, 140)).toBe(true);
    expect(rangeContains({ min: 1, max: null, openEnded: false }, 2)).toBe(false);
  });
});

describe("findWinningAnswer", () => {
  it("picks the first option covering the margin", () => {
    expect(findWinningAnswer({ unit: "runs", value: 14 }, answers)?.id).toBe(2);
    expect(findWinningAnswer({ unit: "runs", value: 61 }, answers)?.id).toBe(3);
    expect(findWinningAnswer({ unit: "runs", value: 75 }, answers)?.id).toBe(3);
    expect(findWinningAnswer({ unit: "wickets", value: 9 }, answers)?.id).toBe(1);
    expect(findWinningAnswer({ unit: "wickets", value: 1 }, answers)?.id).toBe(3);
    expect(findWinningAnswer({ unit: "super_over" }, answers)?.id).toBe(4);
  });

  it("returns null when no option covers it", () => {
    expect(findWinningAnswer({ unit: "wickets", value: 2 }, answers)).toBeNull();
    expect(findWinningAnswer({ unit: "runs", value: 30 }, answers)).toBeNull();
  });
});
