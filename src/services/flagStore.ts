import mongoose, { FilterQuery } from "mongoose";
import VoteFlag, { IVoteFlag } from "../models/VoteFlag";
import { FlagRecord, FlagReview, FlagStatus, FlagType, NewFlag } from "../types/moderation";

export type CreateFlagResult =
  | { success: true; flag: FlagRecord }
  | { success: false; reason: "DUPLICATE_PENDING" };

export type ReviewFlagResult =
  | { success: true; flag: FlagRecord }
  | { success: false; reason: "NOT_FOUND" | "ALREADY_REVIEWED" };

export type FlagListFilter = {
  status?: FlagStatus;
  skip: number;
  limit: number;
};

export interface FlagStore {
  /**
   * A signed-in flagger may hold one pending flag per (vote, flag type).
   * Anonymous flags are never deduplicated.
   */
  createFlag(flag: NewFlag): Promise<CreateFlagResult>;
  /** Newest first. */
  listFlags(filter: FlagListFilter): Promise<{ flags: FlagRecord[]; total: number }>;
  /** Only a pending flag can be reviewed, and only once. */
  reviewFlag(flagId: string, review: FlagReview): Promise<ReviewFlagResult>;
  deleteByVote(voteId: string): Promise<number>;
}

type FlagLean = {
  _id: mongoose.Types.ObjectId;
  voteId: mongoose.Types.ObjectId;
  flagType: FlagType;
  reason: string;
  status?: FlagStatus;
  flaggerId?: string | null;
  reviewedBy?: string | null;
  reviewedAt?: Date | null;
  reviewNotes?: string | null;
  createdAt: Date;
};

const toFlagRecord = (doc: FlagLean): FlagRecord => ({
  flagId: String(doc._id),
  voteId: String(doc.voteId),
  flagType: doc.flagType,
  reason: doc.reason,
  status: doc.status || "pending",
  flaggerId: doc.flaggerId ?? null,
  reviewedBy: doc.reviewedBy ?? null,
  reviewedAt: doc.reviewedAt ?? null,
  reviewNotes: doc.reviewNotes ?? null,
  createdAt: doc.createdAt,
});

export class MongoFlagStore implements FlagStore {
  async createFlag(flag: NewFlag): Promise<CreateFlagResult> {
    if (flag.flaggerId) {
      const existing = await VoteFlag.exists({
        voteId: flag.voteId,
        flaggerId: flag.flaggerId,
        flagType: flag.flagType,
        status: "pending",
      }).exec();
      if (existing) return { success: false, reason: "DUPLICATE_PENDING" };
    }

    const created = await VoteFlag.create({ ...flag, status: "pending" });
    return { success: true, flag: toFlagRecord(created.toObject<FlagLean>()) };
  }

  async listFlags(filter: FlagListFilter): Promise<{ flags: FlagRecord[]; total: number }> {
    const query: FilterQuery<IVoteFlag> = {};
    if (filter.status) query.status = filter.status;

    const [docs, total] = await Promise.all([
      VoteFlag.find(query)
        .sort({ createdAt: -1 })
        .skip(filter.skip)
        .limit(filter.limit)
        .lean<FlagLean[]>()
        .exec(),
      VoteFlag.countDocuments(query).exec(),
    ]);

    return { flags: docs.map(toFlagRecord), total };
  }

  async reviewFlag(flagId: string, review: FlagReview): Promise<ReviewFlagResult> {
    const doc = await VoteFlag.findOneAndUpdate(
      { _id: flagId, status: "pending" },
      {
        $set: {
          status: review.status,
          reviewNotes: review.reviewNotes,
          reviewedBy: review.reviewedBy,
          reviewedAt: new Date(),
        },
      },
      { new: true, runValidators: true }
    )
      .lean<FlagLean>()
      .exec();
    if (doc) return { success: true, flag: toFlagRecord(doc) };

    const exists = await VoteFlag.exists({ _id: flagId }).exec();
    return { success: false, reason: exists ? "ALREADY_REVIEWED" : "NOT_FOUND" };
  }

  async deleteByVote(voteId: string): Promise<number> {
    const result = await VoteFlag.deleteMany({ voteId }).exec();
    return result.deletedCount;
  }
}
