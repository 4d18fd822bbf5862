import { FlagStatus, FlagType, ReviewStatus } from "../types/moderation";

export const FLAG_TYPES: readonly FlagType[] = [
  "inappropriate_content",
  "spam",
  "harassment",
  "copyright",
  "other",
];

export const FLAG_STATUSES: readonly FlagStatus[] = ["pending", "approved", "rejected", "resolved"];
export const REVIEW_STATUSES: readonly ReviewStatus[] = ["approved", "rejected", "resolved"];

export const MIN_FLAG_REASON_LENGTH = 10;
export const MAX_FLAG_REASON_LENGTH = 1000;
export const MIN_REVIEW_NOTES_LENGTH = 5;
export const MAX_REVIEW_NOTES_LENGTH = 1000;

export const FLAGS_PER_IP_PER_MINUTE = 5;
