import { Request, Response } from "express";
import mongoose from "mongoose";
import { canManage } from "../middleware/auth";
import { VoteStore } from "../services/voteStore";
import { VoteRecord } from "../types/voting";

/**
 * Loads the vote named by :voteId and checks the caller may manage it.
 * Sends the error response itself and returns null when it may not.
 */
export async function loadManagedVote(
  voteStore: VoteStore,
  req: Request,
  res: Response
): Promise<VoteRecord | null> {
  const { voteId } = req.params;
  if (!mongoose.isObjectIdOrHexString(voteId)) {
    res.status(400).json({ success: false, message: "Invalid vote ID format" });
    return null;
  }
  const vote = await voteStore.findVoteById(voteId);
  if (!vote) {
    res.status(404).json({ success: false, message: "Vote not found" });
    return null;
  }
  if (!canManage(req.user, vote.creatorId)) {
    res.status(403).json({ success: false, message: "Not authorized to manage this vote" });
    return null;
  }
  return vote;
}
