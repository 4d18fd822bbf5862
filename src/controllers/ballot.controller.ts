import { Request, Response } from "express";
import mongoose from "mongoose";
import { AppDependencies } from "../types/dependencies";
import { OptionRecord, VoteRecord } from "../types/voting";
import { serializeVote } from "../utils/serializeVote";
import { resolveVoteState } from "../utils/resolveVoteState";
import { anonymousVoterKey, getClientIp, userVoterKey } from "../utils/voterKey";
import { submissionErrorStatus, submitBallot } from "../services/ballotSubmission.service";

export function createBallotController({ voteStore, ballotStore }: AppDependencies) {
  async function record(
    vote: VoteRecord,
    options: OptionRecord[],
    voterKey: string,
    userId: string | null,
    req: Request,
    res: Response
  ) {
    const result = await submitBallot({
      vote,
      options,
      payload: req.body,
      voterKey,
      userId,
      store: ballotStore,
    });

    if (!result.success) {
      const { error } = result;
      if (error.kind === "DUPLICATE") {
        console.warn("[Ballots] Duplicate submission rejected for vote", vote.voteId);
      }
      return res.status(submissionErrorStatus(error)).json({
        success: false,
        message: error.message,
        code: error.kind,
        ...(error.kind === "VOTE_NOT_OPEN" ? { state: error.state } : {}),
        ...(error.kind === "UNKNOWN_OPTION" ? { optionIds: error.optionIds } : {}),
        ...(error.kind === "INCOMPLETE_RATINGS" ? { missingOptionIds: error.missingOptionIds } : {}),
      });
    }

    console.log("[Ballots] Ballot", result.ballot.ballotId, "recorded for vote", vote.voteId);
    return res.status(201).json({
      success: true,
      message: "Your vote has been recorded",
      ballotId: result.ballot.ballotId,
      submittedAt: result.ballot.submittedAt,
    });
  }

  /** Active votes only; the creator is not disclosed. */
  const getPublicVote = async (req: Request, res: Response) => {
    try {
      const vote = await voteStore.findVoteBySlug(req.params.slug);
      if (!vote || vote.status !== "active") {
        return res.status(404).json({ success: false, message: "Vote not found or not active" });
      }
      const options = await voteStore.listOptions(vote.voteId);
      const { state, message, serverTime } = resolveVoteState(vote);
      return res.json({
        success: true,
        vote: serializeVote(vote, options, { includeCreator: false }),
        state,
        message,
        serverTime,
      });
    } catch (error: unknown) {
      console.error("[Ballots] Failed to load public vote:", error);
      return res.status(500).json({ success: false, message: "Failed to load vote" });
    }
  };

  const submitPublic = async (req: Request, res: Response) => {
    try {
      const vote = await voteStore.findVoteBySlug(req.params.slug);
      if (!vote) {
        return res.status(404).json({ success: false, message: "Vote not found" });
      }
      const options = await voteStore.listOptions(vote.voteId);
      return await record(vote, options, anonymousVoterKey(getClientIp(req)), null, req, res);
    } catch (error: unknown) {
      console.error("[Ballots] Failed to submit ballot:", error);
      return res.status(500).json({ success: false, message: "Failed to submit vote" });
    }
  };

  const submitAuthenticated = async (req: Request, res: Response) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ success: false, message: "Authentication required" });
      }
      const { voteId } = req.params;
      if (!mongoose.isObjectIdOrHexString(voteId)) {
        return res.status(400).json({ success: false, message: "Invalid vote ID format" });
      }
      const vote = await voteStore.findVoteById(voteId);
      if (!vote) {
        return res.status(404).json({ success: false, message: "Vote not found" });
      }
      const options = await voteStore.listOptions(vote.voteId);
      return await record(vote, options, userVoterKey(user.id), user.id, req, res);
    } catch (error: unknown) {
      console.error("[Ballots] Failed to submit ballot:", error);
      return res.status(500).json({ success: false, message: "Failed to submit vote" });
    }
  };

  return { getPublicVote, submitPublic, submitAuthenticated };
}
