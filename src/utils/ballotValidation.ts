import { MAX_RATING, MAX_VOTER_NAME_LENGTH, MIN_RATING } from "../constants/voting";
import { OptionRecord, Rating } from "../types/voting";
import { isPlainObject } from "./voteInput";

export type BallotValidationError =
  | { kind: "INVALID_VOTER"; field: "voterFirstName" | "voterLastName"; message: string }
  | { kind: "INVALID_RATINGS"; message: string }
  | { kind: "OUT_OF_RANGE_RATING"; optionId: string; rating: unknown; message: string }
  | { kind: "UNKNOWN_OPTION"; optionIds: string[]; message: string }
  | { kind: "INCOMPLETE_RATINGS"; missingOptionIds: string[]; message: string };

export type ParsedBallot = {
  voterFirstName: string;
  voterLastName: string;
  ratings: Record<string, Rating>;
};

export type ParseBallotResult =
  | { success: true; ballot: ParsedBallot }
  | { success: false; error: BallotValidationError };

const SCALE: readonly Rating[] = [-2, -1, 0, 1, 2];

export function toRating(value: unknown): Rating | null {
  return SCALE.find((rating) => rating === value) ?? null;
}

function parseVoterName(
  value: unknown,
  field: "voterFirstName" | "voterLastName"
): { success: true; name: string } | { success: false; error: BallotValidationError } {
  const label = field === "voterFirstName" ? "First name" : "Last name";
  const name = typeof value === "string" ? value.trim() : "";
  if (!name) {
    return { success: false, error: { kind: "INVALID_VOTER", field, message: `${label} is required` } };
  }
  if (name.length > MAX_VOTER_NAME_LENGTH) {
    return {
      success: false,
      error: {
        kind: "INVALID_VOTER",
        field,
        message: `${label} must be at most ${MAX_VOTER_NAME_LENGTH} characters`,
      },
    };
  }
  return { success: true, name };
}

/**
 * Validates a submission body against the vote's options. Every option must
 * be rated exactly once on the -2..2 scale; anything else is rejected here so
 * that only well-formed ballots reach storage.
 *
 * Expected body: `{ voterFirstName, voterLastName, ratings: { [optionId]: rating } }`
 */
export function parseBallotSubmission(
  payload: unknown,
  options: readonly OptionRecord[]
): ParseBallotResult {
  const body: Record<string, unknown> = isPlainObject(payload) ? payload : {};

  const firstName = parseVoterName(body.voterFirstName, "voterFirstName");
  if (!firstName.success) return firstName;
  const lastName = parseVoterName(body.voterLastName, "voterLastName");
  if (!lastName.success) return lastName;

  const submitted = body.ratings;
  if (!isPlainObject(submitted) || Object.keys(submitted).length === 0) {
    return {
      success: false,
      error: { kind: "INVALID_RATINGS", message: "Ratings must be a non-empty object of option ratings" },
    };
  }

  const entries: Array<[string, Rating]> = [];
  for (const [optionId, value] of Object.entries(submitted)) {
    const rating = toRating(value);
    if (rating === null) {
      return {
        success: false,
        error: {
          kind: "OUT_OF_RANGE_RATING",
          optionId,
          rating: value,
          message: `Invalid rating ${JSON.stringify(value)} for option ${optionId}. Must be an integer between ${MIN_RATING} and ${MAX_RATING}`,
        },
      };
    }
    entries.push([optionId, rating]);
  }

  const known = new Set(options.map((option) => option.optionId));
  const unknown = entries.map(([optionId]) => optionId).filter((optionId) => !known.has(optionId));
  if (unknown.length > 0) {
    return {
      success: false,
      error: { kind: "UNKNOWN_OPTION", optionIds: unknown, message: "Invalid option IDs provided" },
    };
  }

  const rated = new Set(entries.map(([optionId]) => optionId));
  const missing = options.map((option) => option.optionId).filter((optionId) => !rated.has(optionId));
  if (missing.length > 0) {
    return {
      success: false,
      error: {
        kind: "INCOMPLETE_RATINGS",
        missingOptionIds: missing,
        message: "Every option must be rated",
      },
    };
  }

  return {
    success: true,
    ballot: {
      voterFirstName: firstName.name,
      voterLastName: lastName.name,
      ratings: Object.fromEntries(entries),
    },
  };
}
