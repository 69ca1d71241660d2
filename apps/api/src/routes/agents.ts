import type { FastifyPluginAsync } from "fastify";
import type { AgentInfo, ApiResponse } from "@crewforge/types";
import type { RouteOptions } from "./respond.js";

export const agentsRoutes: FastifyPluginAsync<RouteOptions> = async (app, { services }) => {
  // GET /agents: metadata de display de los agentes registrados
  app.get("/agents", async (): Promise<ApiResponse<AgentInfo[]>> => {
    return { ok: true, data: services.registry.list() };
  });
};
