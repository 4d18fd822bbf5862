import mongoose, { Schema } from "mongoose";
import { VOTE_STATUSES } from "../constants/voting";
import { VoteStatus } from "../types/voting";

export interface IVote {
  creatorId: string;
  title: string;
  description: string;
  slug: string;
  status: VoteStatus;
  startsAt: Date | null;
  endsAt: Date | null;
  // bumped by every option write and status change
  optionRevision: number;
  createdAt: Date;
  updatedAt: Date;
}

const voteSchema = new Schema<IVote>(
  {
    creatorId: { type: String, required: true, index: true },
    title: { type: String, required: true, trim: true, maxlength: 200 },
    description: { type: String, default: "" },
    slug: { type: String, required: true, unique: true, trim: true },
    status: {
      type: String,
      enum: VOTE_STATUSES,
      default: "draft",
      index: true,
    },
    startsAt: { type: Date, default: null },
    endsAt: { type: Date, default: null },
    optionRevision: { type: Number, default: 0 },
  },
  { timestamps: true }
);

voteSchema.index({ creatorId: 1, createdAt: -1 });

export const Vote = mongoose.model<IVote>("Vote", voteSchema);
export default Vote;
