// src/extract/marginRange.v1.ts
// Winning-margin lookup: "14 runs" / "3 wickets" / "Super Over" against answer options
// such as "Win by 11-20 runs OR by 9-10 wickets", "61+ runs", "1 wicket", "Win by Super Over".

export type MarginUnitV1 = "runs" | "wickets" | "super_over";

export type MarginV1 =
  | { unit: "runs" | "wickets"; value: number }
  | { unit: "super_over" };

export type RangeV1 = {
  min: number;
  /** null for single values and open-ended ranges */
  max: number | null;
  openEnded: boolean;
};

export type AnswerRangeV1 = {
  runs: RangeV1 | null;
  wickets: RangeV1 | null;
  superOver: boolean;
};

const MARGIN_RE = /^(\d+)\s*(runs?|wickets?)\b/;
const RUN_RANGE_RE = /(\d+)(?:-(\d+)|(\+))?\s*runs?/;
const WICKET_RANGE_RE = /(\d+)(?:-(\d+)|(\+))?\s*wickets?/;

export function parseMargin(raw: string | null | undefined): MarginV1 | null {
  if (!raw) return null;
  const s = raw.toLowerCase().trim();
  if (s === "super over") return { unit: "super_over" };
  const m = MARGIN_RE.exec(s);
  if (!m) return null;
  return { unit: m[2].startsWith("run") ? "runs" : "wickets", value: Number.parseInt(m[1], 10) };
}

function toRange(m: RegExpExecArray | null): RangeV1 | null {
  if (!m) return null;
  return {
    min: Number.parseInt(m[1], 10),
    max: m[2] !== undefined ? Number.parseInt(m[2], 10) : null,
    openEnded: m[3] !== undefined,
  };
}

export function parseAnswerRange(answerName: string): AnswerRangeV1 {
  const s = answerName.toLowerCase();
  return {
    runs: toRange(RUN_RANGE_RE.exec(s)),
    wickets: toRange(WICKET_RANGE_RE.exec(s)),
    superOver: s.includes("super over"),
  };
}

function rangeLabel(range: RangeV1, suffix: "R" | "W"): string {
  if (range.max !== null) return `${range.min}-${range.max}${suffix}`;
  if (range.openEnded) return `${range.min}+${suffix}`;
  return `${range.min}${suffix}`;
}

/** Short label for an answer, picked by the unit the match was actually won by. */
export function answerShortName(answerName: string, unit: MarginUnitV1): string {
  const parsed = parseAnswerRange(answerName);
  if (parsed.superOver) return "SO";
  if (unit === "runs" && parsed.runs) return rangeLabel(parsed.runs, "R");
  if (unit === "wickets" && parsed.wickets) return rangeLabel(parsed.wickets, "W");
  return "Unknown";
}

export function rangeContains(range: RangeV1, value: number): boolean {
  if (range.max !== null) return range.min <= value && value <= range.max;
  if (range.openEnded) return value >= range.min;
  return value === range.min;
}

/** First answer whose option covers the margin, or null when none does. */
export function findWinningAnswer<A extends { name: string }>(margin: MarginV1, answers: readonly A[]): A | null {
  for (const answer of answers) {
    const parsed = parseAnswerRange(answer.name);
    if (margin.unit === "super_over") {
      if (parsed.superOver) return answer;
      continue;
    }
    const range = margin.unit === "runs" ? parsed.runs : parsed.wickets;
    if (range && rangeContains(range, margin.value)) return answer;
  }
  return null;
}
