import { describe, it, expect, beforeAll, afterAll } from "vitest";
import Fastify from "fastify";
import { createAuthHook } from "../auth.js";

function buildApp(token: string | undefined) {
  const app = Fastify();
  app.addHook("onRequest", createAuthHook(token));
  app.get("/public", async () => ({ ok: true, data: "public" }));
  app.post("/protected", async () => ({ ok: true, data: "secret" }));
  app.get("/jobs/:id/execute", async () => ({ ok: true, data: "stream" }));
  return app;
}

describe("createAuthHook", () => {
  describe("without API_TOKEN (dev mode)", () => {
    const app = buildApp(undefined);

    beforeAll(async () => {
      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("allows mutating requests without token", async () => {
      const res = await app.inject({ method: "POST", url: "/protected" });
      expect(res.statusCode).toBe(200);
      expect(res.json().ok).toBe(true);
    });
  });

  describe("with API_TOKEN", () => {
    const TOKEN = "test-secret-token";
    const app = buildApp(TOKEN);

    beforeAll(async () => {
      await app.ready();
    });

    afterAll(async () => {
      await app.close();
    });

    it("allows GET without token", async () => {
      const res = await app.inject({ method: "GET", url: "/public" });
      expect(res.statusCode).toBe(200);
    });

    it("rejects POST without Authorization header", async () => {
      const res = await app.inject({ method: "POST", url: "/protected" });
      expect(res.statusCode).toBe(401);
      expect(res.json()).toEqual({ ok: false, error: "Authorization header required" });
    });

    it("rejects a wrong token", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/protected",
        headers: { authorization: "Bearer nope" },
      });
      expect(res.statusCode).toBe(401);
      expect(res.json().error).toBe("Invalid token");
    });

    it("accepts the right token", async () => {
      const res = await app.inject({
        method: "POST",
        url: "/protected",
        headers: { authorization: `Bearer ${TOKEN}` },
      });
      expect(res.statusCode).toBe(200);
      expect(res.json().data).toBe("secret");
    });

    it("protects the execute stream even though it is a GET", async () => {
      const res = await app.inject({ method: "GET", url: "/jobs/abc/execute?x=1" });
      expect(res.statusCode).toBe(401);

      const ok = await app.inject({
        method: "GET",
        url: "/jobs/abc/execute",
        headers: { authorization: `Bearer ${TOKEN}` },
      });
      expect(ok.statusCode).toBe(200);
    });
  });
});
