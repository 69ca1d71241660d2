import type { FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { ApiResponse, CreditLedgerEntry } from "@crewforge/types";
import { buildTask } from "../agents/taskFactory.js";
import type { BalanceInfo, JobCostEstimate } from "../credits/creditLedger.js";
import { requireUser } from "../userScope.js";
import type { RouteOptions } from "./respond.js";
import { errorResponse } from "./respond.js";

const HistoryQuery = z.object({
  limit: z.coerce.number().int().min(1).max(200).optional().default(50),
  skip: z.coerce.number().int().min(0).optional().default(0),
});

const EstimateBody = z.object({
  tasks: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        title: z.string().max(200).optional(),
        description: z.string().max(4000).optional(),
        agent_type: z.string().optional(),
        estimated_tokens: z.number().nonnegative().optional(),
      }),
    )
    .min(1),
});

export const creditsRoutes: FastifyPluginAsync<RouteOptions> = async (app, { services }) => {
  const { ledger, store } = services;

  // GET /credits/balance
  app.get("/credits/balance", async (request, reply): Promise<ApiResponse<BalanceInfo>> => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    try {
      return { ok: true, data: await ledger.getBalance(caller.user.id) };
    } catch (err) {
      return errorResponse(request, reply, err);
    }
  });

  // GET /credits/history: asientos del ledger, mas nuevos primero
  app.get("/credits/history", async (request, reply): Promise<ApiResponse<CreditLedgerEntry[]>> => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    const query = HistoryQuery.safeParse(request.query);
    if (!query.success) {
      reply.code(400);
      return { ok: false, error: query.error.issues.map((i) => i.message).join("; ") };
    }

    const entries = await ledger.getHistory(caller.user.id, query.data);
    return { ok: true, data: entries, meta: { per_page: query.data.limit, total: entries.length } };
  });

  // POST /credits/estimate: costo de una lista de tasks para el usuario
  app.post("/credits/estimate", async (request, reply): Promise<ApiResponse<JobCostEstimate>> => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    const body = EstimateBody.safeParse(request.body);
    if (!body.success) {
      reply.code(400);
      return { ok: false, error: body.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ") };
    }

    try {
      const tasks = body.data.tasks.map((draft, index) => buildTask(draft, index + 1));
      return { ok: true, data: await ledger.estimateJobCost(tasks, caller.user.id) };
    } catch (err) {
      return errorResponse(request, reply, err);
    }
  });
};
