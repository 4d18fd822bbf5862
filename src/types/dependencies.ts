import { BallotStore } from "../services/ballotStore";
import { FlagStore } from "../services/flagStore";
import { VoteStore } from "../services/voteStore";

export type AppDependencies = {
  voteStore: VoteStore;
  ballotStore: BallotStore;
  flagStore: FlagStore;
};
