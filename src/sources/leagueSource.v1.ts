// src/sources/leagueSource.v1.ts
// Where match results come from. null always means "that source does not exist",
// which the season stages turn into MISSING_* diagnostics.

import type { MatchResultV1, PollKindV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import type { DiagnosticV1 } from "../contracts/leaderboard/v1/DiagnosticsV1";
import type { PlayoffExtractionV1 } from "../extract/playoffPoll.v1";

export type LoadedMatchesV1 = {
  /** Chronological (league match number ascending). */
  matches: MatchResultV1[];
  diagnostics: DiagnosticV1[];
};

export interface LeagueSourceV1 {
  /** Weeks with any data, ascending. */
  listWeeks(): number[];
  loadMatches(week: number, poll: PollKindV1): LoadedMatchesV1 | null;
  loadPlayoffs(): PlayoffExtractionV1 | null;
}
