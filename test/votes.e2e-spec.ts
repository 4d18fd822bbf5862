import request from "supertest";
import { Express } from "express";
import { NewBallot } from "../src/types/voting";
import { ADMIN_ID, bearer, createActiveVote, createTestApp, CREATOR_ID, OTHER_USER_ID } from "./helpers/testApp";
import {
  createInMemoryStores,
  InMemoryBallotStore,
  InMemoryFlagStore,
  InMemoryVoteStore,
} from "./helpers/inMemoryStores";

describe("Votes API (e2e)", () => {
  let app: Express;
  let ballotStore: InMemoryBallotStore;
  let flagStore: InMemoryFlagStore;

  beforeEach(() => {
    ({ app, ballotStore, flagStore } = createTestApp());
  });

  const createVote = (body: Record<string, unknown>, userId = CREATOR_ID) =>
    request(app).post("/api/votes").set("Authorization", bearer(userId)).send(body);

  it("answers the health check", async () => {
    const res = await request(app).get("/").expect(200);

    expect(res.body.success).toBe(true);
  });

  it("requires a token to create a vote", async () => {
    const res = await request(app).post("/api/votes").send({ title: "Lunch poll" }).expect(401);

    expect(res.body).toEqual({ success: false, message: "No token provided" });
  });

  it("rejects a malformed token", async () => {
    await request(app)
      .get("/api/votes")
      .set("Authorization", "Bearer not-a-real-token")
      .expect(401);
  });

  it("creates a draft vote with two default options", async () => {
    const res = await createVote({ title: "Lunch Poll", description: " Where to eat " }).expect(201);

    expect(res.body.success).toBe(true);
    expect(res.body.vote).toMatchObject({
      creatorId: CREATOR_ID,
      title: "Lunch Poll",
      description: "Where to eat",
      slug: "lunch-poll",
      status: "draft",
      startsAt: null,
      endsAt: null,
    });
    expect(res.body.vote.options.map((option: { title: string }) => option.title)).toEqual([
      "Option A",
      "Option B",
    ]);
  });

  it("numbers the slug of a vote with a taken title", async () => {
    await createVote({ title: "Lunch Poll" }).expect(201);
    const second = await createVote({ title: "Lunch poll!" }).expect(201);

    expect(second.body.vote.slug).toBe("lunch-poll-1");
  });

  it("creates the options given in the body", async () => {
    const res = await createVote({
      title: "Logo",
      options: [
        { title: "Circle" },
        { title: "Square", optionType: "image", content: "https://cdn.test/square.png" },
      ],
    }).expect(201);

    expect(res.body.vote.options).toEqual([
      expect.objectContaining({ title: "Circle", content: "Circle", optionType: "text", displayOrder: 0 }),
      expect.objectContaining({
        title: "Square",
        content: "https://cdn.test/square.png",
        optionType: "image",
        displayOrder: 1,
      }),
    ]);
  });

  it.each([
    [{ title: "" }, "Title is required"],
    [{ title: "x".repeat(201) }, "Title must be at most 200 characters"],
    [{ title: "Ok", slug: "No Spaces" }, "Slug must be 3-50 characters of lowercase letters, numbers and hyphens"],
    [{ title: "Ok", startsAt: "not a date" }, "startsAt must be a date"],
    [
      { title: "Ok", startsAt: "2026-06-02T00:00:00Z", endsAt: "2026-06-01T00:00:00Z" },
      "End date must be after start date",
    ],
    [{ title: "Ok", options: "A,B" }, "Options must be an array"],
    [{ title: "Ok", options: [{ title: "A", optionType: "video" }] }, "Option type must be one of: text, image"],
  ])("rejects %p", async (body, message) => {
    const res = await createVote(body).expect(400);

    expect(res.body).toEqual({ success: false, message });
  });

  describe("when the generated slug is taken before the vote is stored", () => {
    // listSlugsLike misses the competing vote, as when two creates interleave
    class StaleSlugVoteStore extends InMemoryVoteStore {
      staleReads = 0;

      async listSlugsLike(base: string) {
        if (this.staleReads > 0) {
          this.staleReads -= 1;
          return new Set<string>();
        }
        return super.listSlugsLike(base);
      }
    }

    let voteStore: StaleSlugVoteStore;

    beforeEach(() => {
      const stores = createInMemoryStores();
      voteStore = new StaleSlugVoteStore(stores.ballotStore);
      ({ app } = createTestApp({ ...stores, voteStore }));
    });

    it("picks a fresh slug and stores the vote", async () => {
      await createVote({ title: "Lunch Poll" }).expect(201);
      voteStore.staleReads = 1;

      const res = await createVote({ title: "Lunch poll!" }).expect(201);

      expect(res.body.vote.slug).toBe("lunch-poll-1");
      expect(voteStore.votes.size).toBe(2);
    });

    it("gives up after one retry", async () => {
      await createVote({ title: "Lunch Poll" }).expect(201);
      voteStore.staleReads = 2;

      const res = await createVote({ title: "Lunch poll!" }).expect(409);

      expect(res.body.code).toBe("SLUG_CONFLICT");
      expect(voteStore.votes.size).toBe(1);
    });
  });

  it("rejects a slug that is already used", async () => {
    await createVote({ title: "First", slug: "team-vote" }).expect(201);
    const res = await createVote({ title: "Second", slug: "team-vote" }).expect(400);

    expect(res.body.message).toBe("A vote with this slug already exists");
  });

  it("lists only the caller's votes, newest first, with paging", async () => {
    await createVote({ title: "One" });
    await createVote({ title: "Two" });
    await createVote({ title: "Three" });
    await createVote({ title: "Someone else's" }, OTHER_USER_ID);

    const res = await request(app)
      .get("/api/votes?page=1&pageSize=2")
      .set("Authorization", bearer(CREATOR_ID))
      .expect(200);

    expect(res.body).toMatchObject({ success: true, total: 3, page: 1, pageSize: 2, totalPages: 2 });
    expect(res.body.votes.map((vote: { title: string }) => vote.title)).toEqual(["Three", "Two"]);
  });

  it("filters the list by search text and status", async () => {
    await createVote({ title: "Team lunch" });
    await createVote({ title: "Offsite" });

    const res = await request(app)
      .get("/api/votes?search=LUNCH&status=draft")
      .set("Authorization", bearer(CREATOR_ID))
      .expect(200);

    expect(res.body.total).toBe(1);
    expect(res.body.votes[0].title).toBe("Team lunch");

    await request(app).get("/api/votes?status=archived").set("Authorization", bearer(CREATOR_ID)).expect(400);
  });

  describe("a single vote", () => {
    let voteId: string;

    beforeEach(async () => {
      const res = await createVote({ title: "Office plants" });
      voteId = res.body.vote.voteId;
    });

    it("is returned to its creator with options", async () => {
      const res = await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID)).expect(200);

      expect(res.body.vote.voteId).toBe(voteId);
      expect(res.body.vote.options).toHaveLength(2);
    });

    it("rejects a malformed id", async () => {
      const res = await request(app).get("/api/votes/not-an-id").set("Authorization", bearer(CREATOR_ID)).expect(400);

      expect(res.body).toEqual({ success: false, message: "Invalid vote ID format" });
    });

    it("answers 404 for an unknown id", async () => {
      await request(app)
        .get("/api/votes/64b0000000000000000000ff")
        .set("Authorization", bearer(CREATOR_ID))
        .expect(404);
    });

    it("is hidden from other users but not from admins", async () => {
      await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(OTHER_USER_ID)).expect(403);
      await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(ADMIN_ID, "admin")).expect(200);
    });

    it("updates title and window", async () => {
      const res = await request(app)
        .put(`/api/votes/${voteId}`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ title: "Desk plants", endsAt: "2026-12-31T00:00:00.000Z" })
        .expect(200);

      expect(res.body.vote).toMatchObject({ title: "Desk plants", endsAt: "2026-12-31T00:00:00.000Z" });
    });

    it("follows the status transitions", async () => {
      const patchStatus = (status: string) =>
        request(app).patch(`/api/votes/${voteId}/status`).set("Authorization", bearer(CREATOR_ID)).send({ status });

      await patchStatus("active").expect(200);
      const back = await patchStatus("draft").expect(400);
      expect(back.body.message).toBe("Cannot change status from active to draft");
      await patchStatus("closed").expect(200);
      await patchStatus("active").expect(400);
    });

    it("needs two options before it can be activated", async () => {
      const vote = await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID));
      await request(app)
        .delete(`/api/votes/${voteId}/options/${vote.body.vote.options[0].optionId}`)
        .set("Authorization", bearer(CREATOR_ID))
        .expect(204);

      const res = await request(app)
        .patch(`/api/votes/${voteId}/status`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ status: "active" })
        .expect(400);

      expect(res.body.message).toBe("A vote needs at least 2 options to be activated");
    });

    it("adds an option after the existing ones", async () => {
      const res = await request(app)
        .post(`/api/votes/${voteId}/options`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ title: "Cactus" })
        .expect(201);

      expect(res.body.option).toMatchObject({ title: "Cactus", content: "Cactus", displayOrder: 2 });
    });

    it("edits an option", async () => {
      const vote = await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID));
      const optionId: string = vote.body.vote.options[1].optionId;

      const res = await request(app)
        .put(`/api/votes/${voteId}/options/${optionId}`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ title: "Fern", displayOrder: 5 })
        .expect(200);

      expect(res.body.option).toMatchObject({ optionId, title: "Fern", displayOrder: 5 });
    });

    it("locks options once the vote leaves draft", async () => {
      const vote = await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID));
      const optionId: string = vote.body.vote.options[0].optionId;
      await request(app)
        .patch(`/api/votes/${voteId}/status`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ status: "active" })
        .expect(200);

      const add = await request(app)
        .post(`/api/votes/${voteId}/options`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ title: "Late" })
        .expect(409);
      expect(add.body).toEqual({
        success: false,
        message: "Options can only be changed while the vote is a draft",
        code: "OPTIONS_LOCKED",
      });

      await request(app)
        .put(`/api/votes/${voteId}/options/${optionId}`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ title: "Renamed" })
        .expect(409);
      await request(app)
        .delete(`/api/votes/${voteId}/options/${optionId}`)
        .set("Authorization", bearer(CREATOR_ID))
        .expect(409);

      const after = await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID));
      expect(after.body.vote.options.map((option: { title: string }) => option.title)).toEqual([
        "Option A",
        "Option B",
      ]);
    });

    it("answers 404 for an unknown option", async () => {
      const res = await request(app)
        .put(`/api/votes/${voteId}/options/64b0000000000000000000ee`)
        .set("Authorization", bearer(CREATOR_ID))
        .send({ title: "Ghost" })
        .expect(404);

      expect(res.body).toEqual({ success: false, message: "Option not found" });
    });

    it("is deleted together with its ballots and flags", async () => {
      await ballotStore.insertIfAbsent(voteId, "device:x", {
        voterFirstName: "Ada",
        voterLastName: "Byron",
        userId: null,
        ratings: {},
      });
      await flagStore.createFlag({ voteId, flagType: "spam", reason: "Links to a shop", flaggerId: null });

      await request(app).delete(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID)).expect(204);
      await request(app).get(`/api/votes/${voteId}`).set("Authorization", bearer(CREATOR_ID)).expect(404);
      expect(ballotStore.ballots).toHaveLength(0);
      expect(flagStore.flags).toHaveLength(0);
    });
  });

  describe("option changes during a submission", () => {
    class DelayedBallotStore extends InMemoryBallotStore {
      constructor(private readonly delayMs: number) {
        super();
      }

      async insertIfAbsent(voteId: string, voterKey: string, ballot: NewBallot) {
        await new Promise((resolve) => setTimeout(resolve, this.delayMs));
        return super.insertIfAbsent(voteId, voterKey, ballot);
      }
    }

    it("rejects an option added while a ballot is being stored", async () => {
      const slowBallots = new DelayedBallotStore(100);
      const { app: slowApp } = createTestApp({
        ballotStore: slowBallots,
        voteStore: new InMemoryVoteStore(slowBallots),
        flagStore: new InMemoryFlagStore(),
      });
      const vote = await createActiveVote(slowApp, { title: "Snack shelf", options: [{ title: "A" }, { title: "B" }] });
      const [a, b] = vote.options.map((option) => option.optionId);

      const [submitted, added] = await Promise.all([
        request(slowApp)
          .post(`/api/votes/public/${vote.slug}/submit`)
          .set("X-Forwarded-For", "192.0.2.10")
          .send({ voterFirstName: "Ada", voterLastName: "Byron", ratings: { [a]: 1, [b]: -1 } }),
        new Promise((resolve) => setTimeout(resolve, 30)).then(() =>
          request(slowApp)
            .post(`/api/votes/${vote.voteId}/options`)
            .set("Authorization", bearer(CREATOR_ID))
            .send({ title: "C" })
        ),
      ]);

      expect(submitted.status).toBe(201);
      expect(added.status).toBe(409);
      expect(added.body.code).toBe("OPTIONS_LOCKED");

      const results = await request(slowApp)
        .get(`/api/votes/${vote.voteId}/results`)
        .set("Authorization", bearer(CREATOR_ID))
        .expect(200);
      expect(results.body.totalBallots).toBe(1);
      expect(
        results.body.results.map((row: { title: string; count: number }) => [row.title, row.count])
      ).toEqual([
        ["A", 1],
        ["B", 1],
      ]);
    });
  });

  it("answers unknown routes with JSON", async () => {
    const res = await request(app).get("/api/nothing-here").expect(404);

    expect(res.body).toEqual({ success: false, message: "Route not found", code: "NOT_FOUND" });
  });

  it("answers malformed JSON bodies with 400", async () => {
    const res = await request(app)
      .post("/api/votes")
      .set("Authorization", bearer(CREATOR_ID))
      .set("Content-Type", "application/json")
      .send('{"title": ')
      .expect(400);

    expect(res.body.code).toBe("INVALID_JSON");
  });
});
