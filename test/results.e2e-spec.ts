import request from "supertest";
import { Express } from "express";
import { ADMIN_ID, bearer, createActiveVote, createTestApp, CREATOR_ID, OTHER_USER_ID } from "./helpers/testApp";
import { InMemoryBallotStore } from "./helpers/inMemoryStores";

describe("Results API (e2e)", () => {
  let app: Express;
  let ballotStore: InMemoryBallotStore;
  let voteId: string;
  let red: string;
  let green: string;
  let blue: string;

  beforeEach(async () => {
    ({ app, ballotStore } = createTestApp());
    const vote = await createActiveVote(app, {
      title: "Theme colour",
      options: [{ title: "Red" }, { title: "Green" }, { title: "Blue" }],
    });
    voteId = vote.voteId;
    [red, green, blue] = vote.options.map((option) => option.optionId);

    const cast = (ip: string, firstName: string, ratings: Record<string, number>) =>
      request(app)
        .post(`/api/votes/public/${vote.slug}/submit`)
        .set("X-Forwarded-For", ip)
        .send({ voterFirstName: firstName, voterLastName: "Tester", ratings })
        .expect(201);

    await cast("192.0.2.1", "Ann", { [red]: 2, [green]: 0, [blue]: -2 });
    await cast("192.0.2.2", "Ben", { [red]: 2, [green]: 1, [blue]: -1 });
  });

  const asCreator = (path: string) => request(app).get(path).set("Authorization", bearer(CREATOR_ID));

  it("ranks the options by average rating", async () => {
    const res = await asCreator(`/api/votes/${voteId}/results`).expect(200);

    expect(res.body).toMatchObject({
      success: true,
      voteId,
      title: "Theme colour",
      status: "active",
      totalBallots: 2,
      unknownOptionEntries: 0,
    });
    expect(res.body.results).toEqual([
      {
        optionId: red,
        title: "Red",
        count: 2,
        sum: 4,
        average: 2,
        rank: 1,
        distribution: { "-2": 0, "-1": 0, "0": 0, "1": 0, "2": 2 },
      },
      {
        optionId: green,
        title: "Green",
        count: 2,
        sum: 1,
        average: 0.5,
        rank: 2,
        distribution: { "-2": 0, "-1": 0, "0": 1, "1": 1, "2": 0 },
      },
      {
        optionId: blue,
        title: "Blue",
        count: 2,
        sum: -3,
        average: -1.5,
        rank: 3,
        distribution: { "-2": 1, "-1": 1, "0": 0, "1": 0, "2": 0 },
      },
    ]);
  });

  it("is only shown to the creator and admins", async () => {
    await request(app).get(`/api/votes/${voteId}/results`).set("Authorization", bearer(OTHER_USER_ID)).expect(403);
    await request(app)
      .get(`/api/votes/${voteId}/results`)
      .set("Authorization", bearer(ADMIN_ID, "admin"))
      .expect(200);
  });

  it("refuses to compute results from corrupted ballots", async () => {
    ballotStore.ballots[1].ratings[green] = 7;

    const res = await asCreator(`/api/votes/${voteId}/results`).expect(500);

    expect(res.body).toEqual({ success: false, message: "Results unavailable", code: "RESULTS_UNAVAILABLE" });
  });

  it("counts ratings for options that no longer exist", async () => {
    ballotStore.ballots[0].ratings["64b0000000000000000000aa"] = 1;

    const res = await asCreator(`/api/votes/${voteId}/results`).expect(200);

    expect(res.body.unknownOptionEntries).toBe(1);
    expect(res.body.totalBallots).toBe(2);
  });

  it("exports ballots as CSV", async () => {
    const res = await asCreator(`/api/votes/${voteId}/export?format=csv`).expect(200);

    expect(res.headers["content-type"]).toBe("text/csv; charset=utf-8");
    expect(res.headers["content-disposition"]).toBe('attachment; filename="vote_theme-colour_export.csv"');
    const lines = res.text.trim().split("\n");
    expect(lines[0]).toBe("Voter First Name,Voter Last Name,Submitted At,Rating: Red,Rating: Green,Rating: Blue");
    expect(lines).toHaveLength(3);
    expect(lines[1]).toMatch(/^Ann,Tester,[^,]+,2,0,-2$/);
    expect(lines[2]).toMatch(/^Ben,Tester,[^,]+,2,1,-1$/);
  });

  it("exports ballots as JSON without voter keys", async () => {
    const res = await asCreator(`/api/votes/${voteId}/export?format=json`).expect(200);
    const data = JSON.parse(res.text);

    expect(data.export_metadata).toMatchObject({ total_responses: 2, total_options: 3 });
    expect(data.responses.map((response: { voter_first_name: string }) => response.voter_first_name)).toEqual([
      "Ann",
      "Ben",
    ]);
    expect(res.text).not.toContain("device:");
  });

  it("rejects unknown export formats", async () => {
    const res = await asCreator(`/api/votes/${voteId}/export?format=xml`).expect(400);

    expect(res.body).toEqual({ success: false, message: "Format must be one of: csv, json" });
  });

  it("lets only admins purge ballots", async () => {
    const denied = await request(app)
      .delete(`/api/votes/${voteId}/ballots`)
      .set("Authorization", bearer(CREATOR_ID))
      .expect(403);
    expect(denied.body).toEqual({ success: false, message: "Admin access only" });

    const res = await request(app)
      .delete(`/api/votes/${voteId}/ballots`)
      .set("Authorization", bearer(ADMIN_ID, "admin"))
      .expect(200);

    expect(res.body).toEqual({ success: true, deleted: 2 });
    expect(ballotStore.ballots).toHaveLength(0);
  });
});
