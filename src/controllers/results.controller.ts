import { Request, Response } from "express";
import mongoose from "mongoose";
import { computeResults } from "../services/resultsAggregation.service";
import { buildExport, EXPORT_FORMATS, ExportFormat } from "../services/voteExport.service";
import { AppDependencies } from "../types/dependencies";
import { DataIntegrityError } from "../utils/errors";
import { loadManagedVote } from "../utils/loadManagedVote";
import { queryString } from "../utils/voteInput";

const isExportFormat = (value: unknown): value is ExportFormat =>
  EXPORT_FORMATS.some((format) => format === value);

export function createResultsController({ voteStore, ballotStore }: AppDependencies) {
  const getResults = async (req: Request, res: Response) => {
    try {
      const vote = await loadManagedVote(voteStore, req, res);
      if (!vote) return;

      const [options, ballots] = await Promise.all([
        voteStore.listOptions(vote.voteId),
        ballotStore.listByVote(vote.voteId),
      ]);

      const summary = computeResults(
        ballots,
        options.map((option) => option.optionId)
      );
      if (summary.unknownOptionEntries > 0) {
        console.warn(
          "[Results] Vote",
          vote.voteId,
          "has",
          summary.unknownOptionEntries,
          "ratings for options that no longer exist"
        );
      }

      const titles = new Map(options.map((option) => [option.optionId, option.title]));
      return res.json({
        success: true,
        voteId: vote.voteId,
        title: vote.title,
        status: vote.status,
        totalBallots: summary.totalBallots,
        unknownOptionEntries: summary.unknownOptionEntries,
        results: summary.options.map((result) => ({
          ...result,
          title: titles.get(result.optionId) ?? "",
        })),
      });
    } catch (error: unknown) {
      if (error instanceof DataIntegrityError) {
        console.error("[Results] Stored ballot data is invalid:", error.message);
        return res.status(500).json({
          success: false,
          message: "Results unavailable",
          code: "RESULTS_UNAVAILABLE",
        });
      }
      console.error("[Results] Failed to compute results:", error);
      return res.status(500).json({ success: false, message: "Failed to load results" });
    }
  };

  const exportBallots = async (req: Request, res: Response) => {
    try {
      const format = queryString(req.query.format) ?? "csv";
      if (!isExportFormat(format)) {
        return res.status(400).json({
          success: false,
          message: `Format must be one of: ${EXPORT_FORMATS.join(", ")}`,
        });
      }

      const vote = await loadManagedVote(voteStore, req, res);
      if (!vote) return;

      const [options, ballots] = await Promise.all([
        voteStore.listOptions(vote.voteId),
        ballotStore.listByVote(vote.voteId),
      ]);
      const file = buildExport(format, vote, options, ballots);

      console.log("[Results] Exported", ballots.length, "ballots of vote", vote.voteId, "as", format);
      res.setHeader("Content-Type", `${file.mimeType}; charset=utf-8`);
      res.setHeader("Content-Disposition", `attachment; filename="${file.filename}"`);
      return res.send(file.content);
    } catch (error: unknown) {
      console.error("[Results] Failed to export ballots:", error);
      return res.status(500).json({ success: false, message: "Failed to export ballots" });
    }
  };

  /** Admin only: removes every ballot of a vote. */
  const purgeBallots = async (req: Request, res: Response) => {
    try {
      const { voteId } = req.params;
      if (!mongoose.isObjectIdOrHexString(voteId)) {
        return res.status(400).json({ success: false, message: "Invalid vote ID format" });
      }
      const vote = await voteStore.findVoteById(voteId);
      if (!vote) {
        return res.status(404).json({ success: false, message: "Vote not found" });
      }

      const deleted = await ballotStore.purgeByVote(vote.voteId);
      console.warn("[Results] Purged", deleted, "ballots of vote", vote.voteId, "by", req.user?.id);
      return res.json({ success: true, deleted });
    } catch (error: unknown) {
      console.error("[Results] Failed to purge ballots:", error);
      return res.status(500).json({ success: false, message: "Failed to purge ballots" });
    }
  };

  return { getResults, exportBallots, purgeBallots };
}
