import express, { RequestHandler } from "express";
import { protect, adminOnly, optionalAuth } from "../middleware/auth";
import { createBallotController } from "../controllers/ballot.controller";
import { createModerationController } from "../controllers/moderation.controller";
import { createResultsController } from "../controllers/results.controller";
import { createVoteController } from "../controllers/vote.controller";
import { AppDependencies } from "../types/dependencies";

export type VoteRouterLimiters = {
  ballotLimiter: RequestHandler;
  flagLimiter: RequestHandler;
};

export function buildVoteRouter(deps: AppDependencies, { ballotLimiter, flagLimiter }: VoteRouterLimiters) {
  const votes = createVoteController(deps);
  const ballots = createBallotController(deps);
  const results = createResultsController(deps);
  const moderation = createModerationController(deps);

  const router = express.Router();

  // fixed paths come before /:voteId
  router.get("/public/:slug", ballots.getPublicVote);
  router.post("/public/:slug/submit", ballotLimiter, ballots.submitPublic);

  router.get("/dashboard/stats", protect, votes.getDashboardStats);

  router.get("/moderation/flags", protect, adminOnly, moderation.listFlags);
  router.post("/moderation/flags/:flagId/review", protect, adminOnly, moderation.reviewFlag);

  router.post("/", protect, votes.createVote);
  router.get("/", protect, votes.listVotes);
  router.get("/:voteId", protect, votes.getVote);
  router.put("/:voteId", protect, votes.updateVote);
  router.patch("/:voteId/status", protect, votes.updateVoteStatus);
  router.delete("/:voteId", protect, votes.deleteVote);

  router.post("/:voteId/options", protect, votes.addOption);
  router.put("/:voteId/options/:optionId", protect, votes.updateOption);
  router.delete("/:voteId/options/:optionId", protect, votes.deleteOption);

  router.post("/:voteId/submit", ballotLimiter, protect, ballots.submitAuthenticated);
  router.post("/:voteId/flag", flagLimiter, optionalAuth, moderation.flagVote);

  router.get("/:voteId/results", protect, results.getResults);
  router.get("/:voteId/export", protect, results.exportBallots);
  router.delete("/:voteId/ballots", protect, adminOnly, results.purgeBallots);

  return router;
}
