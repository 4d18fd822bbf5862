import { VoteStatus } from "../types/voting";

export type VoteState = "NOT_ACTIVE" | "NOT_STARTED" | "OPEN" | "ENDED";

export function resolveVoteState(
  vote: { status: VoteStatus; startsAt: Date | string | null; endsAt: Date | string | null },
  now: Date = new Date()
) {
  let state: VoteState = "OPEN";
  let message = "Voting is open";

  if (vote.status !== "active") {
    state = "NOT_ACTIVE";
    message = "Vote not found or not active";
  } else if (vote.startsAt && now < new Date(vote.startsAt)) {
    state = "NOT_STARTED";
    message = "Voting has not started yet";
  } else if (vote.endsAt && now > new Date(vote.endsAt)) {
    state = "ENDED";
    message = "Voting has ended";
  }

  return {
    state,
    message,
    serverTime: now.toISOString(),
  };
}
