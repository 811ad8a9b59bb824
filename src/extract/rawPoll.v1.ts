// src/extract/rawPoll.v1.ts
// Raw poll export shapes (JSON as exported from the chat poll bot).
// Lenient: unknown keys pass through, optional identity fields fall back to "Unknown".

import { z } from "zod";

export const PollAnswerSchema = z.object({
  id: z.union([z.number(), z.string()]),
  name: z.string(),
});

export const PollVoteSchema = z.object({
  answerId: z.union([z.number(), z.string()]).nullish(),
  user: z
    .object({
      id: z.union([z.number(), z.string()]).nullish(),
      username: z.string().nullish(),
      globalName: z.string().nullish(),
    })
    .passthrough()
    .nullish(),
});

const PointsFieldSchema = z.union([z.number(), z.string()]).nullish();

export const WinnerPollSchema = z
  .object({
    messageId: z.union([z.number(), z.string()]).nullish(),
    winner: z.string().nullable(),
    points: PointsFieldSchema,
    answers: z.array(PollAnswerSchema),
    votes: z.array(PollVoteSchema),
  })
  .passthrough();

export const MarginPollSchema = z
  .object({
    messageId: z.union([z.number(), z.string()]).nullish(),
    margin: z.string(),
    points: PointsFieldSchema,
    answers: z.array(PollAnswerSchema),
    votes: z.array(PollVoteSchema),
  })
  .passthrough();

export const PlayoffPollSchema = z
  .object({
    messageId: z.union([z.number(), z.string()]).nullish(),
    points: PointsFieldSchema,
    answers: z.array(PollAnswerSchema),
    votes: z.array(PollVoteSchema),
    qualifiedTeams: z.array(z.string()).optional(),
    // older exports
    qualifiedteams: z.array(z.string()).optional(),
    playoffteams: z.array(z.string()).optional(),
  })
  .passthrough();

export type PollAnswer = z.infer<typeof PollAnswerSchema>;
export type PollVote = z.infer<typeof PollVoteSchema>;
export type WinnerPoll = z.infer<typeof WinnerPollSchema>;
export type MarginPoll = z.infer<typeof MarginPollSchema>;
export type PlayoffPoll = z.infer<typeof PlayoffPollSchema>;

export const UNKNOWN = "Unknown";

export function voterIdentity(vote: PollVote): { username: string; displayName: string } {
  const username = vote.user?.username || UNKNOWN;
  const displayName = vote.user?.globalName || username;
  return { username, displayName };
}

export function answerKey(id: PollAnswer["id"] | null | undefined): string | null {
  return id === null || id === undefined ? null : String(id);
}

/** "14-rcb-vs-pbks.json" -> 14; files without a numeric prefix -> null. */
export function matchNumberFromFileName(fileName: string): number | null {
  const m = /^(\d+)-/.exec(fileName);
  return m ? Number.parseInt(m[1], 10) : null;
}
