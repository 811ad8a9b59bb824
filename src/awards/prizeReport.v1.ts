// src/awards/prizeReport.v1.ts
// Plain-text prize report. One block per award, blank line between blocks.

import type { StreakResultV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import { formatPoints } from "../leaderboard/points.v1";
import type { AwardsV1 } from "./awards.v1";

/** 1st, 2nd, 3rd, 4th ... 11th, 12th, 13th ... 21st */
export function ordinal(n: number): string {
  const mod100 = n % 100;
  if (mod100 >= 11 && mod100 <= 13) return `${n}th`;
  switch (n % 10) {
    case 1:
      return `${n}st`;
    case 2:
      return `${n}nd`;
    case 3:
      return `${n}rd`;
    default:
      return `${n}th`;
  }
}

function block(title: string, who: { username: string; displayName: string }, details: string): string[] {
  return [`${title}:`, `  Username: ${who.username}`, `  Display Name: ${who.displayName}`, `  Details: ${details}`, ""];
}

function streakDetails(kind: "Winning" | "Losing", s: StreakResultV1): string {
  return `${kind} Streak: ${s.length} matches, Starting from Match #${s.startMatchNumber} to Match #${s.endMatchNumber}`;
}

export function renderPrizeReport(awards: AwardsV1): string {
  const lines: string[] = ["Prize Winners:"];

  awards.topFinishers.forEach((f, i) => {
    lines.push(...block(`Predict the Winner - ${ordinal(i + 1)} Place`, f, `Total Points: ${formatPoints(f.total)}`));
  });

  if (awards.marginChampion) {
    const c = awards.marginChampion;
    lines.push(...block("Predict the Winning Margin - 1st Place", c, `Total Points: ${formatPoints(c.total)}`));
  }

  awards.winningStreaks.forEach((s, i) => {
    lines.push(...block(`Longest Winning Streak - ${ordinal(i + 1)}`, s, streakDetails("Winning", s)));
  });
  if (awards.overallWinningStreak) {
    const s = awards.overallWinningStreak;
    lines.push(...block("Overall Longest Winning Streak", s, streakDetails("Winning", s)));
  }

  awards.losingStreaks.forEach((s, i) => {
    lines.push(...block(`Longest Losing Streak - ${ordinal(i + 1)}`, s, streakDetails("Losing", s)));
  });
  if (awards.overallLosingStreak) {
    const s = awards.overallLosingStreak;
    lines.push(...block("Overall Longest Losing Streak", s, streakDetails("Losing", s)));
  }

  if (awards.teamVoters) {
    const { team, voters } = awards.teamVoters;
    voters.forEach((v, i) => {
      const matches = v.matchNumbers.map((m) => `Match #${m}`).join(", ");
      lines.push(...block(`Top ${team} Voter - ${ordinal(i + 1)}`, v, `Voted for ${team} ${v.count} times: ${matches}`));
    });
  }

  return lines.join("\n");
}
