import mongoose from "mongoose";
import Ballot from "../models/Ballot";
import { BallotRecord, NewBallot } from "../types/voting";
import { isDuplicateKeyError } from "../utils/errors";

export type InsertBallotResult =
  | { success: true; ballot: BallotRecord }
  | { success: false; reason: "DUPLICATE" };

/**
 * Storage collaborator for ballots.
 *
 * `insertIfAbsent` must check and insert in one atomic step so that two
 * concurrent submissions for the same (vote, voterKey) cannot both land.
 */
export interface BallotStore {
  insertIfAbsent(voteId: string, voterKey: string, ballot: NewBallot): Promise<InsertBallotResult>;
  /** Snapshot of every ballot of a vote, oldest first. */
  listByVote(voteId: string): Promise<BallotRecord[]>;
  countByVote(voteId: string): Promise<number>;
  /** Ballot count per vote id; ids without ballots map to 0. */
  countByVotes(voteIds: string[]): Promise<Record<string, number>>;
  /** Administrative purge. Returns the number of ballots removed. */
  purgeByVote(voteId: string): Promise<number>;
}

type BallotLean = {
  _id: mongoose.Types.ObjectId;
  voteId: mongoose.Types.ObjectId;
  voterKey: string;
  voterFirstName: string;
  voterLastName: string;
  userId?: string | null;
  ratings?: Record<string, number> | null;
  submittedAt: Date;
};

const toBallotRecord = (doc: BallotLean): BallotRecord => ({
  ballotId: String(doc._id),
  voteId: String(doc.voteId),
  voterKey: doc.voterKey,
  voterFirstName: doc.voterFirstName,
  voterLastName: doc.voterLastName,
  userId: doc.userId ?? null,
  submittedAt: doc.submittedAt,
  ratings: { ...(doc.ratings ?? {}) },
});

export class MongoBallotStore implements BallotStore {
  async insertIfAbsent(voteId: string, voterKey: string, ballot: NewBallot): Promise<InsertBallotResult> {
    try {
      const created = await Ballot.create({
        voteId,
        voterKey,
        voterFirstName: ballot.voterFirstName,
        voterLastName: ballot.voterLastName,
        userId: ballot.userId,
        ratings: ballot.ratings,
      });
      return {
        success: true,
        ballot: {
          ballotId: String(created._id),
          voteId,
          voterKey,
          voterFirstName: created.voterFirstName,
          voterLastName: created.voterLastName,
          userId: created.userId ?? null,
          submittedAt: created.submittedAt,
          ratings: { ...ballot.ratings },
        },
      };
    } catch (err: unknown) {
      if (isDuplicateKeyError(err)) {
        return { success: false, reason: "DUPLICATE" };
      }
      throw err;
    }
  }

  async listByVote(voteId: string): Promise<BallotRecord[]> {
    const docs = await Ballot.find({ voteId })
      .sort({ submittedAt: 1, _id: 1 })
      .lean<BallotLean[]>()
      .exec();
    return docs.map(toBallotRecord);
  }

  async countByVote(voteId: string): Promise<number> {
    return Ballot.countDocuments({ voteId }).exec();
  }

  async countByVotes(voteIds: string[]): Promise<Record<string, number>> {
    const counts: Record<string, number> = {};
    for (const voteId of voteIds) counts[voteId] = 0;
    if (voteIds.length === 0) return counts;

    // aggregate() does not cast, so match on ObjectIds
    const rows = await Ballot.aggregate<{ _id: mongoose.Types.ObjectId; count: number }>([
      { $match: { voteId: { $in: voteIds.map((id) => new mongoose.Types.ObjectId(id)) } } },
      { $group: { _id: "$voteId", count: { $sum: 1 } } },
    ]).exec();
    for (const row of rows) counts[String(row._id)] = row.count;
    return counts;
  }

  async purgeByVote(voteId: string): Promise<number> {
    const result = await Ballot.deleteMany({ voteId }).exec();
    return result.deletedCount;
  }
}
