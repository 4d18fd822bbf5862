import { Request, Response } from "express";
import mongoose from "mongoose";
import {
  DEFAULT_OPTIONS,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  MIN_OPTIONS_TO_ACTIVATE,
  RECENT_VOTES_ON_DASHBOARD,
  STATUS_TRANSITIONS,
  VOTE_STATUSES,
} from "../constants/voting";
import { OptionWriteFailure, StatusChangeFailure, VotePatch } from "../services/voteStore";
import { AppDependencies } from "../types/dependencies";
import { NewOption, VoteStatus } from "../types/voting";
import { loadManagedVote as loadVote } from "../utils/loadManagedVote";
import { generateSlug, slugify, SLUG_PATTERN } from "../utils/slug";
import { serializeOption, serializeVote } from "../utils/serializeVote";
import {
  isPlainObject,
  isValidWindow,
  parseNewOption,
  parseOptionalDate,
  parseOptionPatch,
  parsePage,
  parseTitle,
  queryString,
} from "../utils/voteInput";

const isVoteStatus = (value: unknown): value is VoteStatus =>
  VOTE_STATUSES.some((status) => status === value);

const rejectOptionWrite = (res: Response, reason: OptionWriteFailure) => {
  switch (reason) {
    case "VOTE_NOT_FOUND":
      return res.status(404).json({ success: false, message: "Vote not found" });
    case "OPTION_NOT_FOUND":
      return res.status(404).json({ success: false, message: "Option not found" });
    case "VOTE_NOT_DRAFT":
      return res.status(409).json({
        success: false,
        message: "Options can only be changed while the vote is a draft",
        code: "OPTIONS_LOCKED",
      });
  }
};

const rejectStatusChange = (res: Response, reason: StatusChangeFailure) => {
  switch (reason) {
    case "VOTE_NOT_FOUND":
      return res.status(404).json({ success: false, message: "Vote not found" });
    case "TOO_FEW_OPTIONS":
      return res.status(400).json({
        success: false,
        message: `A vote needs at least ${MIN_OPTIONS_TO_ACTIVATE} options to be activated`,
      });
    case "STATUS_CHANGED":
      return res.status(409).json({
        success: false,
        message: "The vote status was changed by another request, reload and try again",
        code: "STATUS_CONFLICT",
      });
  }
};

export function createVoteController({ voteStore, ballotStore, flagStore }: AppDependencies) {
  const loadManagedVote = (req: Request, res: Response) => loadVote(voteStore, req, res);

  const createVote = async (req: Request, res: Response) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ success: false, message: "Authentication required" });
      }
      const body: Record<string, unknown> = isPlainObject(req.body) ? req.body : {};

      const title = parseTitle(body.title);
      if (!title.success) {
        return res.status(400).json({ success: false, message: title.message });
      }

      const startsAt = parseOptionalDate(body.startsAt, "startsAt");
      if (!startsAt.success) return res.status(400).json({ success: false, message: startsAt.message });
      const endsAt = parseOptionalDate(body.endsAt, "endsAt");
      if (!endsAt.success) return res.status(400).json({ success: false, message: endsAt.message });
      if (!isValidWindow(startsAt.value ?? null, endsAt.value ?? null)) {
        return res.status(400).json({ success: false, message: "End date must be after start date" });
      }

      let options: NewOption[] = DEFAULT_OPTIONS.map((option) => ({ ...option }));
      if (body.options !== undefined) {
        if (!Array.isArray(body.options)) {
          return res.status(400).json({ success: false, message: "Options must be an array" });
        }
        const parsedOptions: NewOption[] = [];
        for (const [index, raw] of body.options.entries()) {
          const option = parseNewOption(raw, index);
          if (!option.success) {
            return res.status(400).json({ success: false, message: option.message });
          }
          parsedOptions.push(option.value);
        }
        options = parsedOptions;
      }

      let slug: string;
      const slugWasGenerated = body.slug === undefined || body.slug === null || body.slug === "";
      if (!slugWasGenerated) {
        if (typeof body.slug !== "string" || !SLUG_PATTERN.test(body.slug)) {
          return res.status(400).json({
            success: false,
            message: "Slug must be 3-50 characters of lowercase letters, numbers and hyphens",
          });
        }
        if (await voteStore.findVoteBySlug(body.slug)) {
          return res.status(400).json({ success: false, message: "A vote with this slug already exists" });
        }
        slug = body.slug;
      } else {
        const taken = await voteStore.listSlugsLike(slugify(title.value));
        slug = generateSlug(title.value, taken);
      }

      const draft = {
        creatorId: user.id,
        title: title.value,
        description: typeof body.description === "string" ? body.description.trim() : "",
        startsAt: startsAt.value ?? null,
        endsAt: endsAt.value ?? null,
      };
      let created = await voteStore.createVote({ ...draft, slug }, options);

      if (!created.success && slugWasGenerated) {
        // another vote took the generated slug in the meantime; pick again once
        const taken = await voteStore.listSlugsLike(slugify(title.value));
        const retrySlug = generateSlug(title.value, taken);
        console.warn("[Votes] Generated slug", slug, "was taken, retrying with", retrySlug);
        created = await voteStore.createVote({ ...draft, slug: retrySlug }, options);
        if (!created.success) {
          return res.status(409).json({
            success: false,
            message: "Could not reserve a slug for this vote, please try again",
            code: "SLUG_CONFLICT",
          });
        }
      }

      if (!created.success) {
        return res.status(400).json({ success: false, message: "A vote with this slug already exists" });
      }

      console.log("[Votes] Created vote", created.vote.voteId, "slug", created.vote.slug);
      return res.status(201).json({
        success: true,
        vote: serializeVote(created.vote, created.options),
      });
    } catch (error: unknown) {
      console.error("[Votes] Failed to create vote:", error);
      return res.status(500).json({ success: false, message: "Failed to create vote" });
    }
  };

  const listVotes = async (req: Request, res: Response) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ success: false, message: "Authentication required" });
      }

      const page = parsePage(req.query.page, 1);
      const pageSize = parsePage(req.query.pageSize, DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE);
      const status = queryString(req.query.status);
      if (status !== undefined && !isVoteStatus(status)) {
        return res.status(400).json({
          success: false,
          message: `Status must be one of: ${VOTE_STATUSES.join(", ")}`,
        });
      }

      const { votes, total } = await voteStore.listVotes({
        creatorId: user.id,
        status,
        search: queryString(req.query.search),
        skip: (page - 1) * pageSize,
        limit: pageSize,
      });

      return res.json({
        success: true,
        votes: votes.map((vote) => serializeVote(vote)),
        total,
        page,
        pageSize,
        totalPages: Math.ceil(total / pageSize),
      });
    } catch (error: unknown) {
      console.error("[Votes] Failed to list votes:", error);
      return res.status(500).json({ success: false, message: "Failed to load votes" });
    }
  };

  const getDashboardStats = async (req: Request, res: Response) => {
    try {
      const user = req.user;
      if (!user) {
        return res.status(401).json({ success: false, message: "Authentication required" });
      }

      const [byStatus, voteIds, recent] = await Promise.all([
        voteStore.countByStatus(user.id),
        voteStore.listVoteIds(user.id),
        voteStore.listVotes({ creatorId: user.id, skip: 0, limit: RECENT_VOTES_ON_DASHBOARD }),
      ]);
      const responseCounts = await ballotStore.countByVotes(voteIds);

      const totalVotes = byStatus.draft + byStatus.active + byStatus.closed;
      const totalResponses = Object.values(responseCounts).reduce((sum, count) => sum + count, 0);

      return res.json({
        success: true,
        stats: {
          votes: { total: totalVotes, byStatus },
          responses: {
            total: totalResponses,
            averagePerVote: Math.round((totalResponses / Math.max(totalVotes, 1)) * 10) / 10,
          },
          recentVotes: recent.votes.map((vote) => ({
            voteId: vote.voteId,
            title: vote.title,
            slug: vote.slug,
            status: vote.status,
            createdAt: vote.createdAt,
            responseCount: responseCounts[vote.voteId] ?? 0,
          })),
        },
      });
    } catch (error: unknown) {
      console.error("[Votes] Failed to load dashboard stats:", error);
      return res.status(500).json({ success: false, message: "Failed to get dashboard statistics" });
    }
  };

  const getVote = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;
      const options = await voteStore.listOptions(vote.voteId);
      return res.json({ success: true, vote: serializeVote(vote, options) });
    } catch (error: unknown) {
      console.error("[Votes] Failed to load vote:", error);
      return res.status(500).json({ success: false, message: "Failed to load vote" });
    }
  };

  const updateVote = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;
      const body: Record<string, unknown> = isPlainObject(req.body) ? req.body : {};

      const patch: VotePatch = {};
      if (body.title !== undefined) {
        const title = parseTitle(body.title);
        if (!title.success) return res.status(400).json({ success: false, message: title.message });
        patch.title = title.value;
      }
      if (body.description !== undefined) {
        if (typeof body.description !== "string") {
          return res.status(400).json({ success: false, message: "Description must be a string" });
        }
        patch.description = body.description.trim();
      }
      const startsAt = parseOptionalDate(body.startsAt, "startsAt");
      if (!startsAt.success) return res.status(400).json({ success: false, message: startsAt.message });
      if (startsAt.value !== undefined) patch.startsAt = startsAt.value;
      const endsAt = parseOptionalDate(body.endsAt, "endsAt");
      if (!endsAt.success) return res.status(400).json({ success: false, message: endsAt.message });
      if (endsAt.value !== undefined) patch.endsAt = endsAt.value;

      const nextStartsAt = patch.startsAt !== undefined ? patch.startsAt : vote.startsAt;
      const nextEndsAt = patch.endsAt !== undefined ? patch.endsAt : vote.endsAt;
      if (!isValidWindow(nextStartsAt, nextEndsAt)) {
        return res.status(400).json({ success: false, message: "End date must be after start date" });
      }

      const updated = await voteStore.updateVote(vote.voteId, patch);
      if (!updated) {
        return res.status(404).json({ success: false, message: "Vote not found" });
      }
      return res.json({ success: true, vote: serializeVote(updated) });
    } catch (error: unknown) {
      console.error("[Votes] Failed to update vote:", error);
      return res.status(500).json({ success: false, message: "Failed to update vote" });
    }
  };

  const updateVoteStatus = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;

      const status: unknown = isPlainObject(req.body) ? req.body.status : undefined;
      if (!isVoteStatus(status)) {
        return res.status(400).json({
          success: false,
          message: `Status must be one of: ${VOTE_STATUSES.join(", ")}`,
        });
      }
      if (!STATUS_TRANSITIONS[vote.status].includes(status)) {
        return res.status(400).json({
          success: false,
          message: `Cannot change status from ${vote.status} to ${status}`,
        });
      }
      const changed = await voteStore.changeStatus(vote.voteId, vote.status, status);
      if (!changed.success) return rejectStatusChange(res, changed.reason);
      console.log("[Votes] Status of", vote.voteId, "changed from", vote.status, "to", status);
      return res.json({ success: true, vote: serializeVote(changed.vote) });
    } catch (error: unknown) {
      console.error("[Votes] Failed to update vote status:", error);
      return res.status(500).json({ success: false, message: "Failed to update vote status" });
    }
  };

  const deleteVote = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;
      await voteStore.deleteVote(vote.voteId);
      const flags = await flagStore.deleteByVote(vote.voteId);
      console.log("[Votes] Deleted vote", vote.voteId, "with", flags, "flags");
      return res.status(204).send();
    } catch (error: unknown) {
      console.error("[Votes] Failed to delete vote:", error);
      return res.status(500).json({ success: false, message: "Failed to delete vote" });
    }
  };

  const addOption = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;

      const existing = await voteStore.listOptions(vote.voteId);
      const nextOrder = existing.reduce((max, option) => Math.max(max, option.displayOrder + 1), 0);
      const parsed = parseNewOption(req.body, nextOrder);
      if (!parsed.success) {
        return res.status(400).json({ success: false, message: parsed.message });
      }

      const written = await voteStore.addOption(vote.voteId, parsed.value);
      if (!written.success) return rejectOptionWrite(res, written.reason);
      return res.status(201).json({ success: true, option: serializeOption(written.option) });
    } catch (error: unknown) {
      console.error("[Votes] Failed to add option:", error);
      return res.status(500).json({ success: false, message: "Failed to add option" });
    }
  };

  const updateOption = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;
      if (!mongoose.isObjectIdOrHexString(req.params.optionId)) {
        return res.status(400).json({ success: false, message: "Invalid option ID format" });
      }

      const parsed = parseOptionPatch(req.body);
      if (!parsed.success) {
        return res.status(400).json({ success: false, message: parsed.message });
      }

      const written = await voteStore.updateOption(vote.voteId, req.params.optionId, parsed.value);
      if (!written.success) return rejectOptionWrite(res, written.reason);
      return res.json({ success: true, option: serializeOption(written.option) });
    } catch (error: unknown) {
      console.error("[Votes] Failed to update option:", error);
      return res.status(500).json({ success: false, message: "Failed to update option" });
    }
  };

  const deleteOption = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(req, res);
      if (!vote) return;
      if (!mongoose.isObjectIdOrHexString(req.params.optionId)) {
        return res.status(400).json({ success: false, message: "Invalid option ID format" });
      }

      const deleted = await voteStore.deleteOption(vote.voteId, req.params.optionId);
      if (!deleted.success) return rejectOptionWrite(res, deleted.reason);
      return res.status(204).send();
    } catch (error: unknown) {
      console.error("[Votes] Failed to delete option:", error);
      return res.status(500).json({ success: false, message: "Failed to delete option" });
    }
  };

  return {
    createVote,
    listVotes,
    getDashboardStats,
    getVote,
    updateVote,
    updateVoteStatus,
    deleteVote,
    addOption,
    updateOption,
    deleteOption,
  };
}
