import mongoose, { Schema } from "mongoose";
import { FLAG_STATUSES, FLAG_TYPES, MAX_FLAG_REASON_LENGTH, MAX_REVIEW_NOTES_LENGTH } from "../constants/moderation";
import { FlagStatus, FlagType } from "../types/moderation";

export interface IVoteFlag {
  voteId: mongoose.Types.ObjectId;
  flagType: FlagType;
  reason: string;
  status: FlagStatus;
  flaggerId: string | null;
  reviewedBy: string | null;
  reviewedAt: Date | null;
  reviewNotes: string | null;
  createdAt: Date;
  updatedAt: Date;
}

const voteFlagSchema = new Schema<IVoteFlag>(
  {
    voteId: { type: Schema.Types.ObjectId, ref: "Vote", required: true, index: true },
    flagType: { type: String, enum: FLAG_TYPES, required: true },
    reason: { type: String, required: true, trim: true, maxlength: MAX_FLAG_REASON_LENGTH },
    status: { type: String, enum: FLAG_STATUSES, default: "pending", index: true },
    flaggerId: { type: String, default: null },
    reviewedBy: { type: String, default: null },
    reviewedAt: { type: Date, default: null },
    reviewNotes: { type: String, default: null, maxlength: MAX_REVIEW_NOTES_LENGTH },
  },
  { timestamps: true }
);

voteFlagSchema.index({ status: 1, createdAt: -1 });
voteFlagSchema.index({ voteId: 1, flaggerId: 1, flagType: 1, status: 1 });

export const VoteFlag = mongoose.model<IVoteFlag>("VoteFlag", voteFlagSchema);
export default VoteFlag;
