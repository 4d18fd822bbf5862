import { OptionType, VoteStatus } from "../types/voting";

export const MIN_RATING = -2;
export const MAX_RATING = 2;

export const MAX_VOTER_NAME_LENGTH = 50;
export const MAX_TITLE_LENGTH = 200;

export const VOTE_STATUSES: readonly VoteStatus[] = ["draft", "active", "closed"];
export const OPTION_TYPES: readonly OptionType[] = ["text", "image"];

// closed is final
export const STATUS_TRANSITIONS: Record<VoteStatus, readonly VoteStatus[]> = {
  draft: ["active", "closed"],
  active: ["closed"],
  closed: [],
};

export const MIN_OPTIONS_TO_ACTIVATE = 2;

export const DEFAULT_OPTIONS = [
  { optionType: "text", title: "Option A", content: "Option A", displayOrder: 0 },
  { optionType: "text", title: "Option B", content: "Option B", displayOrder: 1 },
] as const;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;

export const RECENT_VOTES_ON_DASHBOARD = 5;
