import mongoose, { Schema } from "mongoose";
import { MAX_RATING, MIN_RATING } from "../constants/voting";

/**
 * One voter's complete submission for a vote. Ballots are written once and
 * never updated; only an administrative purge or the vote's deletion
 * removes them.
 */
export interface IBallot {
  voteId: mongoose.Types.ObjectId;
  voterKey: string;
  voterFirstName: string;
  voterLastName: string;
  userId: string | null;
  ratings: Map<string, number>;
  submittedAt: Date;
}

const ballotSchema = new Schema<IBallot>({
  voteId: { type: Schema.Types.ObjectId, ref: "Vote", required: true, index: true },
  // "user:<id>" or "device:<hash>"; used for duplicate prevention only
  voterKey: { type: String, required: true, trim: true },
  voterFirstName: { type: String, required: true, trim: true, maxlength: 50 },
  voterLastName: { type: String, required: true, trim: true, maxlength: 50 },
  userId: { type: String, default: null, index: true },
  ratings: {
    type: Map,
    of: { type: Number, min: MIN_RATING, max: MAX_RATING },
    required: true,
  },
  submittedAt: { type: Date, default: Date.now, immutable: true },
});

// insert-or-reject: a second ballot for the same voter fails with E11000
ballotSchema.index({ voteId: 1, voterKey: 1 }, { unique: true });
ballotSchema.index({ voteId: 1, submittedAt: 1 });

export const Ballot = mongoose.model<IBallot>("Ballot", ballotSchema);
export default Ballot;
