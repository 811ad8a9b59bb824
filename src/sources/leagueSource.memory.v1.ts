// src/sources/leagueSource.memory.v1.ts
// In-memory league source (tests, API fixtures). Stores frozen clones like the other memory stores.

import type { MatchResultV1, PollKindV1 } from "../contracts/leaderboard/v1/LeaderboardV1";
import type { PlayoffExtractionV1 } from "../extract/playoffPoll.v1";
import type { LeagueSourceV1, LoadedMatchesV1 } from "./leagueSource.v1";

function deepFreeze<T>(obj: T): T {
  if (obj && typeof obj === "object") {
    Object.freeze(obj);
    for (const v of Object.values(obj)) deepFreeze(v);
  }
  return obj;
}

export class LeagueSourceMemoryV1 implements LeagueSourceV1 {
  private readonly weeks = new Map<number, Map<PollKindV1, MatchResultV1[]>>();
  private playoffs: PlayoffExtractionV1 | null = null;

  putWeek(week: number, poll: PollKindV1, matches: readonly MatchResultV1[]): this {
    let byPoll = this.weeks.get(week);
    if (!byPoll) {
      byPoll = new Map();
      this.weeks.set(week, byPoll);
    }
    byPoll.set(poll, deepFreeze(structuredClone(matches.slice())));
    return this;
  }

  putPlayoffs(playoffs: PlayoffExtractionV1): this {
    this.playoffs = deepFreeze(structuredClone(playoffs));
    return this;
  }

  listWeeks(): number[] {
    return Array.from(this.weeks.keys()).sort((a, b) => a - b);
  }

  loadMatches(week: number, poll: PollKindV1): LoadedMatchesV1 | null {
    const matches = this.weeks.get(week)?.get(poll);
    if (!matches) return null;
    return { matches: matches.slice().sort((a, b) => a.matchNumber - b.matchNumber), diagnostics: [] };
  }

  loadPlayoffs(): PlayoffExtractionV1 | null {
    return this.playoffs;
  }
}
