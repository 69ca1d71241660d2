import { Readable } from "node:stream";
import type { FastifyBaseLogger, FastifyPluginAsync } from "fastify";
import { z } from "zod";
import type { ApiResponse, Job, JobEvent } from "@crewforge/types";
import { InsufficientCreditsError, errorMessage } from "../errors.js";
import { requireUser } from "../userScope.js";
import type { CreditShortfall, RouteOptions } from "./respond.js";
import { errorResponse, shortfallResponse } from "./respond.js";

// ─── Schemas de request ────────────────────────────────────────────

const CreateJobBody = z.object({
  project_id: z.string().min(1),
  prompt: z.string().min(1).max(20_000),
  multi_agent_mode: z.boolean().optional().default(true),
});

const TaskDraftBody = z.object({
  id: z.string().min(1).optional(),
  title: z.string().max(200).optional(),
  description: z.string().max(4000).optional(),
  agent_type: z.string().optional(),
  estimated_tokens: z.number().nonnegative().optional(),
  dependencies: z.array(z.string()).optional(),
  deliverables: z.array(z.string()).optional(),
});

const ApproveJobBody = z
  .object({ modified_tasks: z.array(TaskDraftBody).optional() })
  .optional()
  .default({});

const ContinueJobBody = z.object({ approved: z.boolean() });

const ListJobsQuery = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(20),
});

function issues(err: z.ZodError): string {
  return err.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
}

/** Frames SSE `data: <json>\n\n`. Un error del generador se emite como evento `error`. */
async function* toSse(events: AsyncIterable<JobEvent>, log: FastifyBaseLogger): AsyncGenerator<string> {
  try {
    for await (const event of events) {
      yield `data: ${JSON.stringify(event)}\n\n`;
    }
  } catch (err) {
    log.error(err, "job execution stream failed");
    const event: JobEvent = { type: "error", message: errorMessage(err) };
    yield `data: ${JSON.stringify(event)}\n\n`;
  }
}

export const jobsRoutes: FastifyPluginAsync<RouteOptions> = async (app, { services }) => {
  const { orchestrator, store } = services;

  // POST /jobs: crea el job y corre el Planner
  app.post("/jobs", async (request, reply): Promise<ApiResponse<Job>> => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    const body = CreateJobBody.safeParse(request.body);
    if (!body.success) {
      reply.code(400);
      return { ok: false, error: issues(body.error) };
    }

    try {
      const job = await orchestrator.createJob({
        userId: caller.user.id,
        projectId: body.data.project_id,
        prompt: body.data.prompt,
        multiAgentMode: body.data.multi_agent_mode,
      });
      reply.code(201);
      return { ok: true, data: job };
    } catch (err) {
      return errorResponse(request, reply, err);
    }
  });

  // GET /jobs: jobs del usuario, mas nuevos primero
  app.get("/jobs", async (request, reply): Promise<ApiResponse<Job[]>> => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    const query = ListJobsQuery.safeParse(request.query);
    if (!query.success) {
      reply.code(400);
      return { ok: false, error: issues(query.error) };
    }

    const jobs = await orchestrator.listJobs(caller.user.id, query.data.limit);
    return { ok: true, data: jobs, meta: { per_page: query.data.limit, total: jobs.length } };
  });

  // GET /jobs/:id
  app.get<{ Params: { id: string } }>("/jobs/:id", async (request, reply): Promise<ApiResponse<Job>> => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    try {
      return { ok: true, data: await orchestrator.getJob(request.params.id, caller.user.id) };
    } catch (err) {
      return errorResponse(request, reply, err);
    }
  });

  // POST /jobs/:id/approve: re-estima y aprueba (402 si no alcanzan los creditos)
  app.post<{ Params: { id: string } }>(
    "/jobs/:id/approve",
    async (request, reply): Promise<ApiResponse<Job | CreditShortfall>> => {
      const caller = await requireUser(request, reply, store);
      if (!caller.ok) return { ok: false, error: caller.error };

      const body = ApproveJobBody.safeParse(request.body ?? undefined);
      if (!body.success) {
        reply.code(400);
        return { ok: false, error: issues(body.error) };
      }

      try {
        const job = await orchestrator.approveJob(request.params.id, caller.user.id, body.data.modified_tasks);
        return { ok: true, data: job };
      } catch (err) {
        if (err instanceof InsufficientCreditsError) return shortfallResponse(reply, err);
        return errorResponse(request, reply, err);
      }
    },
  );

  // POST /jobs/:id/continue: retomar (approved=true) o cancelar un job pausado
  app.post<{ Params: { id: string } }>(
    "/jobs/:id/continue",
    async (request, reply): Promise<ApiResponse<Job | CreditShortfall>> => {
      const caller = await requireUser(request, reply, store);
      if (!caller.ok) return { ok: false, error: caller.error };

      const body = ContinueJobBody.safeParse(request.body);
      if (!body.success) {
        reply.code(400);
        return { ok: false, error: issues(body.error) };
      }

      try {
        const job = await orchestrator.continueJob(request.params.id, caller.user.id, body.data.approved);
        return { ok: true, data: job };
      } catch (err) {
        if (err instanceof InsufficientCreditsError) return shortfallResponse(reply, err);
        return errorResponse(request, reply, err);
      }
    },
  );

  // GET /jobs/:id/execute: progreso como text/event-stream
  app.get<{ Params: { id: string } }>("/jobs/:id/execute", async (request, reply) => {
    const caller = await requireUser(request, reply, store);
    if (!caller.ok) return { ok: false, error: caller.error };

    const events = orchestrator.executeJob(request.params.id, caller.user.id);
    reply
      .header("Content-Type", "text/event-stream")
      .header("Cache-Control", "no-cache")
      .header("X-Accel-Buffering", "no");
    return reply.send(Readable.from(toSse(events, request.log)));
  });
};
