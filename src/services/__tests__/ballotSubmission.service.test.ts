import { submissionErrorStatus, submitBallot } from "../ballotSubmission.service";
import { OptionRecord, VoteRecord } from "../../types/voting";
import { InMemoryBallotStore } from "../../../test/helpers/inMemoryStores";

const created = new Date("2026-03-01T00:00:00Z");
const now = new Date("2026-03-15T12:00:00Z");

const vote = (overrides: Partial<VoteRecord> = {}): VoteRecord => ({
  voteId: "vote-1",
  creatorId: "creator-1",
  title: "Logo",
  description: "",
  slug: "logo",
  status: "active",
  startsAt: null,
  endsAt: null,
  createdAt: created,
  updatedAt: created,
  ...overrides,
});

const options: OptionRecord[] = ["a", "b"].map((optionId, displayOrder) => ({
  optionId,
  voteId: "vote-1",
  optionType: "text",
  title: optionId.toUpperCase(),
  content: optionId.toUpperCase(),
  displayOrder,
  createdAt: created,
}));

const payload = { voterFirstName: "Ada", voterLastName: "Byron", ratings: { a: 1, b: -2 } };

describe("submitBallot", () => {
  let store: InMemoryBallotStore;

  beforeEach(() => {
    store = new InMemoryBallotStore();
  });

  it("stores a valid ballot under the voter key", async () => {
    const result = await submitBallot({
      vote: vote(),
      options,
      payload,
      voterKey: "user:u1",
      userId: "u1",
      store,
      now,
    });

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.ballot).toMatchObject({
        voteId: "vote-1",
        voterKey: "user:u1",
        userId: "u1",
        voterFirstName: "Ada",
        voterLastName: "Byron",
        ratings: { a: 1, b: -2 },
      });
    }
    expect(store.ballots).toHaveLength(1);
  });

  it("rejects a second ballot from the same voter", async () => {
    const input = { vote: vote(), options, payload, voterKey: "device:abc", userId: null, store, now };

    await submitBallot(input);
    const second = await submitBallot({ ...input, payload: { ...payload, ratings: { a: 2, b: 2 } } });

    expect(second).toEqual({
      success: false,
      error: { kind: "DUPLICATE", message: "You have already voted in this vote." },
    });
    expect(store.ballots).toHaveLength(1);
    expect(store.ballots[0].ratings).toEqual({ a: 1, b: -2 });
  });

  it("lets exactly one of several concurrent submissions through", async () => {
    const input = { vote: vote(), options, payload, voterKey: "device:abc", userId: null, store, now };

    const results = await Promise.all(Array.from({ length: 5 }, () => submitBallot(input)));

    expect(results.filter((result) => result.success)).toHaveLength(1);
    expect(store.ballots).toHaveLength(1);
  });

  it("accepts ballots from different voters", async () => {
    const input = { vote: vote(), options, payload, userId: null, store, now };

    await submitBallot({ ...input, voterKey: "device:one" });
    await submitBallot({ ...input, voterKey: "device:two" });

    expect(store.ballots).toHaveLength(2);
  });

  it.each([
    [{ status: "draft" as const }, "NOT_ACTIVE"],
    [{ startsAt: new Date("2026-04-01T00:00:00Z") }, "NOT_STARTED"],
    [{ endsAt: new Date("2026-03-10T00:00:00Z") }, "ENDED"],
  ])("refuses ballots when the vote is %p", async (overrides, state) => {
    const result = await submitBallot({
      vote: vote(overrides),
      options,
      payload,
      voterKey: "device:abc",
      userId: null,
      store,
      now,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.kind).toBe("VOTE_NOT_OPEN");
      if (result.error.kind === "VOTE_NOT_OPEN") expect(result.error.state).toBe(state);
    }
    expect(store.ballots).toHaveLength(0);
  });

  it("does not store an invalid ballot", async () => {
    const result = await submitBallot({
      vote: vote(),
      options,
      payload: { ...payload, ratings: { a: 1 } },
      voterKey: "device:abc",
      userId: null,
      store,
      now,
    });

    expect(result.success).toBe(false);
    if (!result.success) expect(result.error.kind).toBe("INCOMPLETE_RATINGS");
    expect(store.ballots).toHaveLength(0);
  });
});

describe("submissionErrorStatus", () => {
  it("maps duplicates to 409 and everything else to 400", () => {
    expect(submissionErrorStatus({ kind: "DUPLICATE", message: "" })).toBe(409);
    expect(submissionErrorStatus({ kind: "INVALID_RATINGS", message: "" })).toBe(400);
    expect(submissionErrorStatus({ kind: "VOTE_NOT_OPEN", state: "ENDED", message: "" })).toBe(400);
  });
});
