export type Rating = -2 | -1 | 0 | 1 | 2;

export type VoteStatus = "draft" | "active" | "closed";

export type OptionType = "text" | "image";

export type VoteRecord = {
  voteId: string;
  creatorId: string;
  title: string;
  description: string;
  slug: string;
  status: VoteStatus;
  startsAt: Date | null;
  endsAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
};

export type OptionRecord = {
  optionId: string;
  voteId: string;
  optionType: OptionType;
  title: string;
  content: string;
  displayOrder: number;
  createdAt: Date;
};

/**
 * A ballot as read back from storage. Ratings are plain numbers here because
 * persisted data is not trusted by the aggregation engine.
 */
export type BallotRecord = {
  ballotId: string;
  voteId: string;
  voterKey: string;
  voterFirstName: string;
  voterLastName: string;
  userId: string | null;
  submittedAt: Date;
  ratings: Record<string, number>;
};

/** A ballot that passed submission validation and may be persisted. */
export type NewBallot = {
  voterFirstName: string;
  voterLastName: string;
  userId: string | null;
  ratings: Record<string, Rating>;
};

export type NewVote = {
  creatorId: string;
  title: string;
  description: string;
  slug: string;
  startsAt: Date | null;
  endsAt: Date | null;
};

export type NewOption = {
  optionType: OptionType;
  title: string;
  content: string;
  displayOrder: number;
};

export type RatingDistribution = Record<"-2" | "-1" | "0" | "1" | "2", number>;

export type OptionResult = {
  optionId: string;
  count: number;
  sum: number;
  /** null when nobody rated the option; never 0 for "no data" */
  average: number | null;
  rank: number;
  distribution: RatingDistribution;
};

export type ResultSummary = {
  totalBallots: number;
  /** ratings that named an option the vote does not have */
  unknownOptionEntries: number;
  /** in rank order */
  options: OptionResult[];
};
