import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { buildTestApp, type TestApp } from "./helpers/buildTestApp.js";
import { TEST_HEADERS, TEST_USER_ID, seedOwnKey, seedUser } from "./helpers/testData.js";

describe("credits routes", () => {
  let ctx: TestApp;

  beforeEach(async () => {
    ctx = await buildTestApp();
    await seedUser(ctx.store, { credits: 2 });
  });

  afterEach(async () => {
    await ctx.app.close();
  });

  it("GET /credits/balance returns the balance and charging flags", async () => {
    const res = await ctx.app.inject({ method: "GET", url: "/credits/balance", headers: TEST_HEADERS });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toEqual({ credits: 2, credits_enabled: true, should_charge: true, own_key: false });
  });

  it("GET /credits/balance rejects unknown users", async () => {
    const res = await ctx.app.inject({
      method: "GET",
      url: "/credits/balance",
      headers: { "x-user-id": "44444444-4444-4444-8444-444444444444" },
    });
    expect(res.statusCode).toBe(401);
    expect(res.json().error).toBe("Unknown user");
  });

  it("GET /credits/history pages newest first", async () => {
    await ctx.services.ledger.addCredits(TEST_USER_ID, 1, "Top-up");
    await ctx.services.ledger.deductCredits(TEST_USER_ID, 0.5, "Task: Step 1");

    const res = await ctx.app.inject({ method: "GET", url: "/credits/history?limit=1", headers: TEST_HEADERS });
    expect(res.statusCode).toBe(200);
    expect(res.json().data).toHaveLength(1);
    expect(res.json().meta).toEqual({ per_page: 1, total: 1 });

    const all = await ctx.app.inject({ method: "GET", url: "/credits/history", headers: TEST_HEADERS });
    const deltas = all.json().data.map((e: { delta: number }) => e.delta).sort((a: number, b: number) => a - b);
    expect(deltas).toEqual([-0.5, 1]);
  });

  it("POST /credits/estimate prices tasks at the project rate", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/credits/estimate",
      headers: TEST_HEADERS,
      payload: {
        tasks: [
          { title: "Research", agent_type: "researcher", estimated_tokens: 800 },
          { title: "Build", agent_type: "developer" },
        ],
      },
    });
    expect(res.statusCode).toBe(200);
    const data = res.json().data;
    expect(data.total_estimated_credits).toBe(1.3);
    expect(data.total_estimated_tokens).toBe(1300);
    expect(data.sufficient_credits).toBe(true);
    expect(data.breakdown.map((b: { estimated_credits: number }) => b.estimated_credits)).toEqual([0.8, 0.5]);
  });

  it("POST /credits/estimate is free for own-key users", async () => {
    await seedOwnKey(ctx.store);
    const res = await ctx.app.inject({
      method: "POST",
      url: "/credits/estimate",
      headers: TEST_HEADERS,
      payload: { tasks: [{ title: "Build", estimated_tokens: 5000 }] },
    });
    expect(res.json().data).toMatchObject({ total_estimated_credits: 0, free_usage: true, breakdown: [] });
  });

  it("POST /credits/estimate rejects an empty task list", async () => {
    const res = await ctx.app.inject({
      method: "POST",
      url: "/credits/estimate",
      headers: TEST_HEADERS,
      payload: { tasks: [] },
    });
    expect(res.statusCode).toBe(400);
  });
});
