import { BallotRecord, OptionRecord, VoteRecord } from "../types/voting";
import { BallotValidationError, parseBallotSubmission } from "../utils/ballotValidation";
import { resolveVoteState, VoteState } from "../utils/resolveVoteState";
import { BallotStore } from "./ballotStore";

export type SubmissionError =
  | BallotValidationError
  | { kind: "DUPLICATE"; message: string }
  | { kind: "VOTE_NOT_OPEN"; state: Exclude<VoteState, "OPEN">; message: string };

export type SubmissionResult =
  | { success: true; ballot: BallotRecord }
  | { success: false; error: SubmissionError };

export type SubmitBallotInput = {
  vote: VoteRecord;
  options: readonly OptionRecord[];
  payload: unknown;
  voterKey: string;
  userId: string | null;
  store: BallotStore;
  now?: Date;
};

/**
 * Accepts one ballot for an open vote. Duplicate prevention is left to the
 * store's atomic insert, so there is no "already voted?" read beforehand
 * that a concurrent request could slip past.
 */
export async function submitBallot(input: SubmitBallotInput): Promise<SubmissionResult> {
  const { vote, options, payload, voterKey, userId, store, now } = input;

  const resolved = resolveVoteState(vote, now);
  if (resolved.state !== "OPEN") {
    return {
      success: false,
      error: { kind: "VOTE_NOT_OPEN", state: resolved.state, message: resolved.message },
    };
  }

  const parsed = parseBallotSubmission(payload, options);
  if (!parsed.success) {
    return parsed;
  }

  const inserted = await store.insertIfAbsent(vote.voteId, voterKey, {
    ...parsed.ballot,
    userId,
  });
  if (!inserted.success) {
    return {
      success: false,
      error: { kind: "DUPLICATE", message: "You have already voted in this vote." },
    };
  }

  return { success: true, ballot: inserted.ballot };
}

export function submissionErrorStatus(error: SubmissionError): number {
  switch (error.kind) {
    case "DUPLICATE":
      return 409;
    default:
      return 400;
  }
}
