export type FlagType = "inappropriate_content" | "spam" | "harassment" | "copyright" | "other";

export type FlagStatus = "pending" | "approved" | "rejected" | "resolved";

export type ReviewStatus = Exclude<FlagStatus, "pending">;

export type FlagRecord = {
  flagId: string;
  voteId: string;
  flagType: FlagType;
  reason: string;
  status: FlagStatus;
  /** null for anonymous flags */
  flaggerId: string | null;
  reviewedBy: string | null;
  reviewedAt: Date | null;
  reviewNotes: string | null;
  createdAt: Date;
};

export type NewFlag = {
  voteId: string;
  flagType: FlagType;
  reason: string;
  flaggerId: string | null;
};

export type FlagReview = {
  status: ReviewStatus;
  reviewNotes: string;
  reviewedBy: string;
};
