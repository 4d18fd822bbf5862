import { Request, Response } from "express";
import mongoose from "mongoose";
import { FLAG_STATUSES } from "../constants/moderation";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../constants/voting";
import { AppDependencies } from "../types/dependencies";
import { FlagRecord, FlagStatus } from "../types/moderation";
import { parseFlag, parseFlagReview } from "../utils/flagInput";
import { parsePage, queryString } from "../utils/voteInput";

const isFlagStatus = (value: unknown): value is FlagStatus =>
  FLAG_STATUSES.some((status) => status === value);

const serializeFlag = (flag: FlagRecord) => ({
  flagId: flag.flagId,
  voteId: flag.voteId,
  flagType: flag.flagType,
  reason: flag.reason,
  status: flag.status,
  flaggerId: flag.flaggerId,
  reviewedBy: flag.reviewedBy,
  reviewedAt: flag.reviewedAt,
  reviewNotes: flag.reviewNotes,
  createdAt: flag.createdAt,
});

export function createModerationController({ voteStore, flagStore }: AppDependencies) {
  // Public: anyone may flag a vote; signed-in callers are recorded as the flagger
  const flagVote = async (req: Request, res: Response) => {
    try {
      const { voteId } = req.params;
      if (!mongoose.isObjectIdOrHexString(voteId)) {
        return res.status(400).json({ success: false, message: "Invalid vote ID format" });
      }

      const parsed = parseFlag(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, message: parsed.message });
      }

      const vote = await voteStore.findVoteById(voteId);
      if (!vote) {
        return res.status(404).json({ success: false, message: "Vote not found" });
      }

      const flaggerId = req.user?.id ?? null;
      const created = await flagStore.createFlag({ voteId, ...parsed.value, flaggerId });
      if (!created.success) {
        return res.status(409).json({
          success: false,
          message: "You have already flagged this vote for the same reason",
          code: "DUPLICATE_FLAG",
        });
      }

      console.log("[Moderation] Vote", voteId, "flagged for", parsed.value.flagType, "by", flaggerId ?? "anonymous");
      return res.status(201).json({
        success: true,
        message: "Vote flagged successfully",
        flagId: created.flag.flagId,
      });
    } catch (error: unknown) {
      console.error("[Moderation] Failed to flag vote:", error);
      return res.status(500).json({ success: false, message: "Failed to flag vote" });
    }
  };

  const listFlags = async (req: Request, res: Response) => {
    try {
      const requested = queryString(req.query.status) ?? "pending";
      if (requested !== "all" && !isFlagStatus(requested)) {
        return res.status(400).json({
          success: false,
          message: `Status must be one of: all, ${FLAG_STATUSES.join(", ")}`,
        });
      }
      const status = isFlagStatus(requested) ? requested : undefined;

      const page = parsePage(req.query.page, 1);
      const pageSize = parsePage(req.query.pageSize, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
      const skip = (page - 1) * pageSize;
      const { flags, total } = await flagStore.listFlags({ status, skip, limit: pageSize });

      return res.json({
        success: true,
        flags: flags.map(serializeFlag),
        total,
        page,
        pageSize,
        hasMore: skip + pageSize < total,
      });
    } catch (error: unknown) {
      console.error("[Moderation] Failed to list flags:", error);
      return res.status(500).json({ success: false, message: "Failed to fetch flags" });
    }
  };

  const reviewFlag = async (req: Request, res: Response) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ success: false, message: "Authentication required" });
      }
      const { flagId } = req.params;
      if (!mongoose.isObjectIdOrHexString(flagId)) {
        return res.status(400).json({ success: false, message: "Invalid flag ID format" });
      }

      const parsed = parseFlagReview(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, message: parsed.message });
      }

      const reviewed = await flagStore.reviewFlag(flagId, { ...parsed.value, reviewedBy: user.id });
      if (!reviewed.success) {
        if (reviewed.reason === "NOT_FOUND") {
          return res.status(404).json({ success: false, message: "Flag not found" });
        }
        return res.status(409).json({
          success: false,
          message: "Flag has already been reviewed",
          code: "FLAG_ALREADY_REVIEWED",
        });
      }

      console.log("[Moderation] Flag", flagId, "reviewed by", user.id, "with status", parsed.value.status);
      return res.json({
        success: true,
        message: `Flag ${parsed.value.status} successfully`,
        flag: serializeFlag(reviewed.flag),
      });
    } catch (error: unknown) {
      console.error("[Moderation] Failed to review flag:", error);
      return res.status(500).json({ success: false, message: "Failed to review flag" });
    }
  };

  return { flagVote, listFlags, reviewFlag };
}
