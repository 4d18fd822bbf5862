import {
  FLAG_TYPES,
  MAX_FLAG_REASON_LENGTH,
  MAX_REVIEW_NOTES_LENGTH,
  MIN_FLAG_REASON_LENGTH,
  MIN_REVIEW_NOTES_LENGTH,
  REVIEW_STATUSES,
} from "../constants/moderation";
import { FlagType, ReviewStatus } from "../types/moderation";
import { isPlainObject, ParseResult } from "./voteInput";

const isFlagType = (value: unknown): value is FlagType => FLAG_TYPES.some((type) => type === value);

const isReviewStatus = (value: unknown): value is ReviewStatus =>
  REVIEW_STATUSES.some((status) => status === value);

function parseBoundedText(
  value: unknown,
  { label, required, min, max }: { label: string; required: string; min: number; max: number }
): ParseResult<string> {
  const text = typeof value === "string" ? value.trim() : "";
  if (!text) return { success: false, message: required };
  if (text.length < min || text.length > max) {
    return { success: false, message: `${label} must be between ${min} and ${max} characters` };
  }
  return { success: true, value: text };
}

export function parseFlag(body: unknown): ParseResult<{ flagType: FlagType; reason: string }> {
  const input: Record<string, unknown> = isPlainObject(body) ? body : {};
  const flagType = input.flagType;
  if (!isFlagType(flagType)) {
    return { success: false, message: `Flag type must be one of: ${FLAG_TYPES.join(", ")}` };
  }
  const reason = parseBoundedText(input.reason, {
    label: "Reason",
    required: "Reason is required",
    min: MIN_FLAG_REASON_LENGTH,
    max: MAX_FLAG_REASON_LENGTH,
  });
  if (!reason.success) return reason;
  return { success: true, value: { flagType, reason: reason.value } };
}

export function parseFlagReview(body: unknown): ParseResult<{ status: ReviewStatus; reviewNotes: string }> {
  const input: Record<string, unknown> = isPlainObject(body) ? body : {};
  const status = input.status;
  if (!isReviewStatus(status)) {
    return { success: false, message: `Review status must be one of: ${REVIEW_STATUSES.join(", ")}` };
  }
  const notes = parseBoundedText(input.reviewNotes, {
    label: "Review notes",
    required: "Review notes are required",
    min: MIN_REVIEW_NOTES_LENGTH,
    max: MAX_REVIEW_NOTES_LENGTH,
  });
  if (!notes.success) return notes;
  return { success: true, value: { status, reviewNotes: notes.value } };
}
