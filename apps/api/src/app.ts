import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import type { ApiResponse } from "@crewforge/types";
import { createAuthHook } from "./auth.js";
import type { AppConfig } from "./config.js";
import { agentsRoutes } from "./routes/agents.js";
import { creditsRoutes } from "./routes/credits.js";
import { jobsRoutes } from "./routes/jobs.js";
import type { ServiceOverrides, Services } from "./services.js";
import { createServices } from "./services.js";

export const SERVICE_NAME = "crewforge-api";
export const SERVICE_VERSION = "0.1.0";

export interface BuiltApp {
  app: FastifyInstance;
  services: Services;
}

export async function buildApp(config: AppConfig, overrides: ServiceOverrides = {}): Promise<BuiltApp> {
  const app = Fastify({ logger: config.LOG_LEVEL === "silent" ? false : { level: config.LOG_LEVEL } });
  const services = createServices(config, app.log, overrides);

  await app.register(cors, { origin: true });

  // ─── Auth: rutas mutantes + execute ─────────────────────────────────
  app.addHook("onRequest", createAuthHook(config.API_TOKEN));

  app.setErrorHandler((error, request, reply) => {
    const statusCode = error.statusCode && error.statusCode >= 400 ? error.statusCode : 500;
    if (statusCode >= 500) request.log.error(error, "Unhandled error");
    reply.code(statusCode).send({ ok: false, error: statusCode >= 500 ? "Internal server error" : error.message });
  });

  app.get("/health", async (): Promise<ApiResponse<{ status: string }>> => {
    return { ok: true, data: { status: "healthy" } };
  });

  app.get("/", async (): Promise<ApiResponse<{ service: string; version: string }>> => {
    return { ok: true, data: { service: SERVICE_NAME, version: SERVICE_VERSION } };
  });

  // ─── Routes ──────────────────────────────────────────────────────────
  await app.register(agentsRoutes, { services });
  await app.register(jobsRoutes, { services });
  await app.register(creditsRoutes, { services });

  return { app, services };
}
