import mongoose, { Schema } from "mongoose";
import { OPTION_TYPES } from "../constants/voting";
import { OptionType } from "../types/voting";

export interface IVoteOption {
  voteId: mongoose.Types.ObjectId;
  optionType: OptionType;
  title: string;
  content: string;
  displayOrder: number;
  createdAt: Date;
  updatedAt: Date;
}

const voteOptionSchema = new Schema<IVoteOption>(
  {
    voteId: { type: Schema.Types.ObjectId, ref: "Vote", required: true, index: true },
    optionType: { type: String, enum: OPTION_TYPES, default: "text" },
    title: { type: String, required: true, trim: true, maxlength: 200 },
    content: { type: String, default: "" },
    // presentation only; ranking never looks at it
    displayOrder: { type: Number, required: true, min: 0 },
  },
  { timestamps: true }
);

voteOptionSchema.index({ voteId: 1, displayOrder: 1 });

export const VoteOption = mongoose.model<IVoteOption>("VoteOption", voteOptionSchema);
export default VoteOption;
