// src/leaderboard/points.v1.ts
// Point values: coercion on the way in, float formatting on the way out.

export type CoercedPointsV1 = { points: number; malformed: boolean };

/**
 * Accepts numbers and numeric strings. Anything else (empty, NaN, Infinity,
 * negative, non-numeric) becomes 0.0 and is flagged malformed.
 */
export function coercePoints(raw: unknown): CoercedPointsV1 {
  if (raw === undefined || raw === null) return { points: 0, malformed: true };

  let n: number;
  if (typeof raw === "number") {
    n = raw;
  } else if (typeof raw === "string") {
    const s = raw.trim();
    if (!s) return { points: 0, malformed: true };
    n = Number(s);
  } else {
    return { points: 0, malformed: true };
  }

  if (!Number.isFinite(n) || n < 0) return { points: 0, malformed: true };
  // normalize -0
  return { points: n === 0 ? 0 : n, malformed: false };
}

/** Points are always emitted as floats: 1 -> "1.0", 2.25 -> "2.25". */
export function formatPoints(points: number): string {
  return Number.isInteger(points) ? points.toFixed(1) : String(points);
}

export function sumPoints(values: number[]): number {
  let total = 0;
  for (const v of values) total += v;
  return total;
}
