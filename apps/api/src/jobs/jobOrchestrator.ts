import { randomUUID } from "node:crypto";
import type { FastifyBaseLogger } from "fastify";
import type { GeneratedFile, Job, JobEvent, Project, Task } from "@crewforge/types";
import type { ProviderFactory } from "../ai/provider.js";
import type { AgentRegistry } from "../agents/registry.js";
import { buildTask } from "../agents/taskFactory.js";
import type { TaskDraft } from "../agents/taskFactory.js";
import type { AgentDeps, AgentResult, PreviousOutput } from "../agents/types.js";
import type { CreditLedger } from "../credits/creditLedger.js";
import { roundCredits } from "../credits/creditLedger.js";
import { AppError, InsufficientCreditsError, JobStateError, NotFoundError, errorMessage } from "../errors.js";
import { findSecrets, redact } from "../redact.js";
import type { Store } from "../store/types.js";

const CONTEXT_OUTPUTS = 3;
const SUMMARY_CHARS = 500;
const PREVIEW_CHARS = 200;

export interface JobOrchestratorOptions {
  maxTokens: number;
  timeoutMs: number;
  maxErrors: number;
  /** Valores de la plataforma que nunca deben quedar persistidos. */
  secrets?: string[];
}

export interface CreateJobInput {
  userId: string;
  projectId: string;
  prompt: string;
  multiAgentMode?: boolean;
}

/** Contexto de ejecucion de un job: agentes del usuario + copia de trabajo de archivos. */
interface ExecutionContext {
  project: Project;
  deps: AgentDeps;
  secrets: string[];
  files: Map<string, GeneratedFile>;
  previous: PreviousOutput[];
  charging: boolean;
}

function now(): string {
  return new Date().toISOString();
}

// ─── Orchestrator ──────────────────────────────────────────────────

export class JobOrchestrator {
  constructor(
    private readonly store: Store,
    private readonly ledger: CreditLedger,
    private readonly registry: AgentRegistry,
    private readonly providerFactory: ProviderFactory,
    private readonly logger: FastifyBaseLogger,
    private readonly options: JobOrchestratorOptions,
  ) {}

  /** Jobs con un executeJob en curso en este proceso. */
  private readonly running = new Set<string>();

  // ─── Lectura ──────────────────────────────────────────────────────

  async getJob(jobId: string, userId: string): Promise<Job> {
    const job = await this.store.jobs.findOne({ id: jobId, user_id: userId });
    if (!job) throw new NotFoundError("Job");
    return job;
  }

  async listJobs(userId: string, limit = 20): Promise<Job[]> {
    return this.store.jobs.findMany(
      { user_id: userId },
      { sort: { field: "created_at", direction: "desc" }, limit },
    );
  }

  // ─── create_job ───────────────────────────────────────────────────

  /** Crea el job en `analyzing`, corre el Planner y deja el job esperando aprobacion o fallido. */
  async createJob(input: CreateJobInput): Promise<Job> {
    const project = await this.store.projects.findOne({ id: input.projectId, user_id: input.userId });
    if (!project) throw new NotFoundError("Project");

    const createdAt = now();
    const job: Job = {
      id: randomUUID(),
      project_id: project.id,
      user_id: input.userId,
      prompt: input.prompt,
      status: "analyzing",
      multi_agent_mode: input.multiAgentMode ?? true,
      tasks: [],
      total_estimated_credits: 0,
      credits_used: 0,
      credits_approved: 0,
      credits_needed: null,
      credits_unpaid: 0,
      current_task_index: -1,
      error_count: 0,
      max_errors: this.options.maxErrors,
      error: null,
      planner_output: null,
      planner_metadata: null,
      execution_id: null,
      created_at: createdAt,
      updated_at: createdAt,
      started_at: null,
      completed_at: null,
    };
    await this.store.jobs.insertOne(job);
    const log = this.logger.child({ jobId: job.id });

    try {
      const { deps, secrets } = await this.agentDeps(input.userId, project);
      const planner = this.registry.create("planner", deps);
      const result = await planner.execute(input.prompt);

      if (!result.success || result.tasks_generated.length === 0) {
        const detail = result.errors.length > 0 ? `: ${result.errors.join("; ")}` : "";
        log.warn({ errors: result.errors }, "planner produced no tasks");
        return this.save(job, {
          status: "failed",
          error: redact(`Failed to analyze requirements${detail}`, secrets),
          planner_output: redact(result.content, secrets),
          completed_at: now(),
        });
      }

      const estimate = await this.ledger.estimateJobCost(result.tasks_generated, input.userId);
      log.info({ tasks: estimate.tasks.length, credits: estimate.total_estimated_credits }, "job planned");

      return this.save(job, {
        status: "awaiting_approval",
        tasks: estimate.tasks,
        total_estimated_credits: estimate.total_estimated_credits,
        planner_output: redact(result.content, secrets),
        planner_metadata: result.metadata,
      });
    } catch (err) {
      log.error({ err }, "job analysis failed");
      return this.save(job, {
        status: "failed",
        error: redact(`Failed to analyze requirements: ${errorMessage(err)}`, this.options.secrets),
        completed_at: now(),
      });
    }
  }

  // ─── approve_job / continue_job ───────────────────────────────────

  /**
   * Re-estima siempre el costo (de las tasks restantes si el job venia pausado)
   * y rechaza con InsufficientCreditsError si el balance no alcanza.
   */
  async approveJob(jobId: string, userId: string, modifiedTasks?: TaskDraft[]): Promise<Job> {
    const job = await this.getJob(jobId, userId);
    if (job.status !== "awaiting_approval" && job.status !== "needs_more_credits") {
      throw new JobStateError(`Job cannot be approved in status: ${job.status}`, job.status);
    }

    const cursor = job.status === "needs_more_credits" ? Math.max(job.current_task_index, 0) : 0;
    const done = job.tasks.slice(0, cursor);
    const pending = modifiedTasks
      ? modifiedTasks.map((draft, index) => buildTask(draft, cursor + index + 1))
      : job.tasks.slice(cursor);

    if (pending.length === 0 && job.credits_unpaid === 0) {
      throw new AppError("invalid_tasks", "Job has no tasks left to approve", 400);
    }

    // Lo que quedo sin cobrar de tasks ya ejecutadas se suma a lo que falta
    const estimate = await this.ledger.estimateJobCost(pending, userId);
    const required = roundCredits(estimate.total_estimated_credits + job.credits_unpaid);
    if (!estimate.free_usage && estimate.user_credits < required) {
      throw new InsufficientCreditsError(required, estimate.user_credits);
    }

    const spent = done.reduce((sum, task) => sum + task.actual_credits, 0);
    return this.save(job, {
      status: "approved",
      tasks: [...done, ...estimate.tasks],
      total_estimated_credits: estimate.free_usage ? 0 : roundCredits(spent + estimate.total_estimated_credits),
      credits_approved: estimate.free_usage ? 0 : required,
      credits_needed: null,
      current_task_index: cursor,
    });
  }

  /** Solo desde `needs_more_credits`: aprobar vuelve a `approved` con el cursor guardado. */
  async continueJob(jobId: string, userId: string, approved: boolean): Promise<Job> {
    const job = await this.getJob(jobId, userId);
    if (job.status !== "needs_more_credits") {
      throw new JobStateError(`Job cannot be continued in status: ${job.status}`, job.status);
    }

    if (!approved) {
      return this.save(job, { status: "cancelled", completed_at: now() });
    }
    return this.approveJob(jobId, userId);
  }

  // ─── execute_job ──────────────────────────────────────────────────

  /**
   * Ejecuta las tasks en orden desde el cursor persistido. Cada cambio se
   * persiste antes de emitir su evento, asi un consumidor que corta puede
   * volver a llamar y seguir desde donde quedo. Un job tiene un solo flujo
   * a la vez: un segundo execute recibe un evento `error`.
   */
  async *executeJob(jobId: string, userId: string): AsyncGenerator<JobEvent> {
    const job = await this.store.jobs.findOne({ id: jobId, user_id: userId });
    if (!job) {
      yield { type: "error", message: "Job not found" };
      return;
    }
    // in_progress: el consumidor anterior corto; se sigue desde el cursor persistido
    if (job.status !== "approved" && job.status !== "in_progress") {
      yield { type: "error", message: `Job cannot be executed in status: ${job.status}` };
      return;
    }
    // Chequeo y add sin await en el medio: un solo flujo por job en el proceso
    if (this.running.has(job.id)) {
      yield { type: "error", message: "Job is already running" };
      return;
    }

    this.running.add(job.id);
    try {
      yield* this.runJob(job, userId);
    } finally {
      this.running.delete(job.id);
    }
  }

  private async *runJob(job: Job, userId: string): AsyncGenerator<JobEvent> {
    const project = await this.store.projects.findOne({ id: job.project_id });
    if (!project) {
      yield { type: "error", message: "Project not found" };
      return;
    }
    if (!(await this.claim(job))) {
      yield { type: "error", message: "Job is already running" };
      return;
    }

    const log = this.logger.child({ jobId: job.id, executionId: job.execution_id });
    const ctx = await this.executionContext(job, project);
    const start = Math.max(job.current_task_index, 0);

    await this.save(job, { started_at: job.started_at ?? now(), current_task_index: start });
    log.info({ resumedFrom: start, tasks: job.tasks.length }, "job execution started");
    yield { type: "job_started", job_id: job.id, total_tasks: job.tasks.length, resumed_from: start };

    if (job.credits_unpaid > 0 && !(await this.settleUnpaid(job, userId, log))) {
      yield* this.pauseForCredits(job, start, log);
      return;
    }

    // job.tasks puede crecer con fix tasks del ErrorAnalyzer
    for (let i = start; i < job.tasks.length; i++) {
      const task = job.tasks[i];

      if (task.status === "completed") {
        await this.save(job, { current_task_index: i + 1 });
        continue;
      }

      ctx.charging = await this.ledger.shouldCharge(userId);
      if (ctx.charging) {
        const { credits } = await this.ledger.getBalance(userId);
        if (credits < task.estimated_credits) {
          yield* this.pauseForCredits(job, i, log);
          return;
        }
      }

      try {
        task.status = "running";
        task.error = null;
        await this.save(job, { tasks: job.tasks, current_task_index: i });
        yield { type: "task_started", task_index: i, task_id: task.id, title: task.title, agent: task.agent_type };

        const result = await this.runTask(task, ctx, job.prompt);
        if (ctx.charging && task.actual_credits > 0) {
          await this.chargeTask(job, task, userId, log);
        }

        await this.save(job, {
          tasks: job.tasks,
          current_task_index: i + 1,
          credits_used: job.credits_used,
          credits_unpaid: job.credits_unpaid,
        });
        ctx.previous.push({ agent: task.agent_type, summary: (task.output ?? "").slice(0, SUMMARY_CHARS) });
        yield {
          type: "task_completed",
          task_index: i,
          task_id: task.id,
          success: result.success,
          files_created: task.files_created,
          credits_used: task.actual_credits,
          output_preview: (task.output ?? "").slice(0, PREVIEW_CHARS),
        };

        if (task.agent_type === "error_analyzer" && result.success && result.tasks_generated.length > 0) {
          await this.appendFixTasks(job, result.tasks_generated);
        }

        if (!result.success && result.errors.length > 0) {
          job.error_count += 1;
          if (job.error_count >= job.max_errors) {
            yield* this.failJob(job, "Too many errors");
            return;
          }
          await this.save(job, { error_count: job.error_count });

          const fixed = await this.attemptAutoFix(result.errors, ctx, log);
          if (fixed.length > 0) {
            yield {
              type: "auto_fix_applied",
              task_id: task.id,
              fix_description: "Applied automatic fixes",
              files_fixed: fixed,
            };
          }
        }
      } catch (err) {
        const message = redact(errorMessage(err), ctx.secrets);
        log.error({ err, taskIndex: i }, "task execution error");

        task.status = "failed";
        task.error = message;
        job.error_count += 1;
        await this.save(job, { tasks: job.tasks, error_count: job.error_count, current_task_index: i + 1 });
        yield { type: "task_error", task_index: i, task_id: task.id, error: message };

        if (job.error_count >= job.max_errors) {
          yield* this.failJob(job, "Too many errors");
          return;
        }
      }

      // La task ya quedo hecha; lo que no se pudo cobrar pausa el job antes de la siguiente
      if (job.credits_unpaid > 0) {
        yield* this.pauseForCredits(job, i + 1, log);
        return;
      }
    }

    await this.save(job, {
      status: "completed",
      credits_used: job.credits_used,
      current_task_index: job.tasks.length,
      completed_at: now(),
    });
    log.info({ creditsUsed: job.credits_used }, "job completed");

    yield {
      type: "job_completed",
      job_id: job.id,
      total_credits_used: job.credits_used,
      files_created: job.tasks.reduce((sum, t) => sum + t.files_created.length, 0),
      tasks_completed: job.tasks.filter((t) => t.status === "completed").length,
      tasks_failed: job.tasks.filter((t) => t.status === "failed").length,
    };
  }

  // ─── Ejecucion: claim y creditos ──────────────────────────────────

  /**
   * Toma el job con compare-and-set sobre el estado leido. Si otro proceso lo
   * tomo o lo modifico en el medio, no matchea y devuelve false.
   */
  private async claim(job: Job): Promise<boolean> {
    const guard: Partial<Job> = { id: job.id, status: job.status, updated_at: job.updated_at };
    if (job.execution_id) guard.execution_id = job.execution_id;

    const changes: Partial<Job> = { status: "in_progress", execution_id: randomUUID(), updated_at: now() };
    const matched = await this.store.jobs.updateOne(guard, changes);
    if (matched === 0) return false;

    Object.assign(job, changes);
    return true;
  }

  /** Cobra la task. Si el balance no alcanza el costo queda como deuda del job. */
  private async chargeTask(job: Job, task: Task, userId: string, log: FastifyBaseLogger): Promise<void> {
    try {
      const change = await this.ledger.deductCredits(userId, task.actual_credits, `Task: ${task.title}`, {
        type: "job_task",
        id: task.id,
      });
      job.credits_used = roundCredits(job.credits_used + change.charged);
    } catch (err) {
      if (!(err instanceof InsufficientCreditsError)) throw err;
      job.credits_unpaid = roundCredits(job.credits_unpaid + task.actual_credits);
      log.warn({ taskId: task.id, unpaid: job.credits_unpaid }, "task cost exceeds balance, left unpaid");
    }
  }

  /** Cobra la deuda de una ejecucion anterior. false si todavia no alcanza. */
  private async settleUnpaid(job: Job, userId: string, log: FastifyBaseLogger): Promise<boolean> {
    try {
      const change = await this.ledger.deductCredits(userId, job.credits_unpaid, "Unpaid task credits", {
        type: "job",
        id: job.id,
      });
      log.info({ settled: job.credits_unpaid, charged: change.charged }, "unpaid credits settled");
      await this.save(job, { credits_unpaid: 0, credits_used: roundCredits(job.credits_used + change.charged) });
      return true;
    } catch (err) {
      if (err instanceof InsufficientCreditsError) return false;
      throw err;
    }
  }

  /** Pausa en `cursor` pidiendo la deuda mas el estimado de lo que falta. */
  private async *pauseForCredits(job: Job, cursor: number, log: FastifyBaseLogger): AsyncGenerator<JobEvent> {
    const { credits } = await this.ledger.getBalance(job.user_id);
    const remaining = await this.ledger.estimateRemainingCost(job.tasks.slice(cursor));
    const needed = roundCredits(job.credits_unpaid + remaining);

    await this.save(job, {
      status: "needs_more_credits",
      credits_needed: needed,
      credits_unpaid: job.credits_unpaid,
      credits_used: job.credits_used,
      current_task_index: cursor,
    });
    log.info({ taskIndex: cursor, credits, needed, unpaid: job.credits_unpaid }, "job paused for credits");

    yield {
      type: "needs_credits",
      message: `Need ${needed.toFixed(2)} more credits to continue`,
      credits_needed: needed,
      current_credits: credits,
      completed_tasks: job.tasks.filter((t) => t.status === "completed").length,
      remaining_tasks: job.tasks.length - cursor,
    };
  }

  // ─── Helpers ──────────────────────────────────────────────────────

  /** Corre el agente de la task y copia el resultado en la task (mutandola). */
  private async runTask(task: Task, ctx: ExecutionContext, prompt: string): Promise<AgentResult> {
    const agent = this.registry.create(task.agent_type, ctx.deps);
    const result = await agent.execute(task.description || task.title, {
      previous_outputs: ctx.previous.slice(-CONTEXT_OUTPUTS),
      existing_files: [...ctx.files.values()],
      original_requirements: prompt,
    });

    if (findSecrets(result.content).length > 0) {
      this.logger.warn({ taskId: task.id }, "agent output contained secrets, redacting");
    }

    task.actual_tokens = result.tokens_used;
    task.actual_credits = await this.ledger.calculateCredits(result.tokens_used, "project");
    task.files_created = await this.saveFiles(ctx, result.files_created);
    task.output = redact(result.content, ctx.secrets);
    task.status = result.success ? "completed" : "failed";
    task.error = result.errors.length > 0 ? redact(result.errors.join("; "), ctx.secrets) : null;
    return result;
  }

  /** Una pasada del Debugger. Sus fallas se loguean y no cuentan como error del job. */
  private async attemptAutoFix(errors: string[], ctx: ExecutionContext, log: FastifyBaseLogger): Promise<string[]> {
    try {
      const debuggerAgent = this.registry.create("debugger", ctx.deps);
      const fix = await debuggerAgent.execute(`Fix the following errors: ${errors.join("; ")}`, {
        errors,
        existing_files: [...ctx.files.values()],
      });
      if (!fix.success || fix.files_created.length === 0) return [];
      return await this.saveFiles(ctx, fix.files_created);
    } catch (err) {
      log.warn({ err }, "auto-fix failed");
      return [];
    }
  }

  private async appendFixTasks(job: Job, generated: Task[]): Promise<void> {
    const estimate = await this.ledger.estimateJobCost(generated, job.user_id);
    const base = job.tasks.length;
    const appended = estimate.tasks.map((task, index) => ({ ...task, order: base + index + 1 }));

    job.tasks.push(...appended);
    await this.save(job, {
      tasks: job.tasks,
      total_estimated_credits: roundCredits(job.total_estimated_credits + estimate.total_estimated_credits),
    });
  }

  private async *failJob(job: Job, reason: string): AsyncGenerator<JobEvent> {
    await this.save(job, { status: "failed", error: reason, error_count: job.error_count, completed_at: now() });
    this.logger.warn({ jobId: job.id, errorCount: job.error_count }, "job failed");
    yield { type: "job_failed", job_id: job.id, reason };
  }

  /** Upsert por (project_id, path); actualiza la copia de trabajo. */
  private async saveFiles(ctx: ExecutionContext, files: GeneratedFile[]): Promise<string[]> {
    const projectId = ctx.project.id;
    const saved: string[] = [];

    for (const file of files) {
      const content = redact(file.content, ctx.secrets);
      const updatedAt = now();
      const matched = await this.store.projectFiles.updateOne(
        { project_id: projectId, path: file.path },
        { content, updated_at: updatedAt },
      );
      if (matched === 0) {
        await this.store.projectFiles.insertOne({
          id: randomUUID(),
          project_id: projectId,
          path: file.path,
          content,
          updated_at: updatedAt,
        });
      }
      ctx.files.set(file.path, { path: file.path, content });
      saved.push(file.path);
    }
    return saved;
  }

  /** Agentes sobre la own-key del usuario si tiene una, si no sobre el proveedor de la plataforma. */
  private async agentDeps(userId: string, project: Project): Promise<{ deps: AgentDeps; secrets: string[] }> {
    const ownKey = await this.ledger.getOwnKey(userId);
    const apiKey = ownKey?.api_key ?? null;
    const provider = apiKey
      ? this.providerFactory({ apiKey, model: ownKey?.model_preference })
      : this.providerFactory();

    const secrets = [...(this.options.secrets ?? [])];
    if (apiKey) secrets.push(apiKey);

    return {
      secrets,
      deps: {
        provider,
        projectContext: { name: project.name, language: project.language, description: project.description },
        logger: this.logger,
        maxTokens: this.options.maxTokens,
        timeoutMs: this.options.timeoutMs,
      },
    };
  }

  private async executionContext(job: Job, project: Project): Promise<ExecutionContext> {
    const { deps, secrets } = await this.agentDeps(job.user_id, project);
    const existing = await this.store.projectFiles.findMany({ project_id: project.id });
    const start = Math.max(job.current_task_index, 0);

    return {
      project,
      deps,
      secrets,
      files: new Map(existing.map((f) => [f.path, { path: f.path, content: f.content }])),
      previous: job.tasks
        .slice(0, start)
        .filter((t) => t.status === "completed" && t.output)
        .map((t) => ({ agent: t.agent_type, summary: (t.output ?? "").slice(0, SUMMARY_CHARS) })),
      charging: await this.ledger.shouldCharge(job.user_id),
    };
  }

  /** Persiste el patch y lo aplica sobre el objeto en memoria. */
  private async save(job: Job, patch: Partial<Job>): Promise<Job> {
    const changes: Partial<Job> = { ...patch, updated_at: now() };
    const filter: Partial<Job> = { id: job.id };
    if (job.execution_id) filter.execution_id = job.execution_id;

    const matched = await this.store.jobs.updateOne(filter, changes);
    if (matched === 0) {
      if (job.execution_id) throw new JobStateError("Job was claimed by another execution", job.status);
      throw new NotFoundError("Job");
    }
    Object.assign(job, changes);
    return job;
  }
}
