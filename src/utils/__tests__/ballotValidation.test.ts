import { parseBallotSubmission, toRating } from "../ballotValidation";
import { OptionRecord } from "../../types/voting";

const option = (optionId: string, displayOrder: number): OptionRecord => ({
  optionId,
  voteId: "vote-1",
  optionType: "text",
  title: `Option ${optionId}`,
  content: `Option ${optionId}`,
  displayOrder,
  createdAt: new Date("2026-01-01T00:00:00Z"),
});

const options = [option("a", 0), option("b", 1)];

const body = (overrides: Record<string, unknown> = {}) => ({
  voterFirstName: "Ada",
  voterLastName: "Byron",
  ratings: { a: 2, b: -1 },
  ...overrides,
});

describe("toRating", () => {
  it.each([-2, -1, 0, 1, 2])("accepts %d", (value) => {
    expect(toRating(value)).toBe(value);
  });

  it.each([3, -3, 0.5, "1", null, undefined, Number.NaN])("rejects %p", (value) => {
    expect(toRating(value)).toBeNull();
  });
});

describe("parseBallotSubmission", () => {
  it("returns the trimmed names and the ratings", () => {
    const result = parseBallotSubmission(
      body({ voterFirstName: "  Ada ", voterLastName: " Byron" }),
      options
    );

    expect(result).toEqual({
      success: true,
      ballot: { voterFirstName: "Ada", voterLastName: "Byron", ratings: { a: 2, b: -1 } },
    });
  });

  it("requires a first name", () => {
    const result = parseBallotSubmission(body({ voterFirstName: "   " }), options);

    expect(result).toEqual({
      success: false,
      error: { kind: "INVALID_VOTER", field: "voterFirstName", message: "First name is required" },
    });
  });

  it("limits the last name to 50 characters", () => {
    const result = parseBallotSubmission(body({ voterLastName: "x".repeat(51) }), options);

    expect(result).toEqual({
      success: false,
      error: {
        kind: "INVALID_VOTER",
        field: "voterLastName",
        message: "Last name must be at most 50 characters",
      },
    });
  });

  it.each([undefined, {}, [], "a=1"])("rejects ratings of %p", (ratings) => {
    const result = parseBallotSubmission(body({ ratings }), options);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("INVALID_RATINGS");
  });

  it("rejects a rating outside the scale", () => {
    const result = parseBallotSubmission(body({ ratings: { a: 3, b: 0 } }), options);

    expect(result).toEqual({
      success: false,
      error: {
        kind: "OUT_OF_RANGE_RATING",
        optionId: "a",
        rating: 3,
        message: "Invalid rating 3 for option a. Must be an integer between -2 and 2",
      },
    });
  });

  it("rejects a rating sent as a string", () => {
    const result = parseBallotSubmission(body({ ratings: { a: "2", b: 0 } }), options);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("OUT_OF_RANGE_RATING");
      expect(result.error.message).toBe('Invalid rating "2" for option a. Must be an integer between -2 and 2');
    }
  });

  it("rejects ratings for options the vote does not have", () => {
    const result = parseBallotSubmission(body({ ratings: { a: 1, b: 1, z: 0 } }), options);

    expect(result).toEqual({
      success: false,
      error: { kind: "UNKNOWN_OPTION", optionIds: ["z"], message: "Invalid option IDs provided" },
    });
  });

  it("requires every option to be rated", () => {
    const result = parseBallotSubmission(body({ ratings: { b: 0 } }), options);

    expect(result).toEqual({
      success: false,
      error: { kind: "INCOMPLETE_RATINGS", missingOptionIds: ["a"], message: "Every option must be rated" },
    });
  });

  it("treats a non-object payload as missing every field", () => {
    const result = parseBallotSubmission("nope", options);

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("INVALID_VOTER");
  });
});
