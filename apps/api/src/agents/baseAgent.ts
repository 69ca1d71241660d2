import type { FastifyBaseLogger } from "fastify";
import type { AgentInfo, AgentType } from "@crewforge/types";
import type { GenerateResult, GenerationProvider } from "../ai/provider.js";
import { ProviderError, errorMessage } from "../errors.js";
import { AGENT_INFO } from "./info.js";
import type { AgentContext, AgentDeps, AgentResult, ProjectContext } from "./types.js";
import { failureResult } from "./types.js";

const MAX_PREVIOUS_OUTPUTS = 3;
const PREVIOUS_OUTPUT_CHARS = 500;
const MAX_EXISTING_FILES = 10;

/**
 * Base de todos los agentes. Arma el prompt con el contexto del proyecto,
 * llama al proveedor con timeout y convierte cualquier falla en un
 * AgentResult con success=false: execute() nunca tira.
 */
export abstract class BaseAgent {
  abstract readonly type: AgentType;

  protected readonly provider: GenerationProvider;
  protected readonly projectContext: ProjectContext;
  protected readonly logger: FastifyBaseLogger;
  protected readonly maxTokens: number;
  protected readonly timeoutMs: number;

  constructor(deps: AgentDeps) {
    this.provider = deps.provider;
    this.projectContext = deps.projectContext;
    this.logger = deps.logger;
    this.maxTokens = deps.maxTokens;
    this.timeoutMs = deps.timeoutMs;
  }

  get info(): AgentInfo {
    return AGENT_INFO[this.type];
  }

  /** Prompt de sistema fijo por variante. */
  protected abstract buildSystemPrompt(): string;

  /** Convierte la respuesta cruda del modelo en un resultado. */
  protected abstract parseResponse(
    content: string,
    tokensUsed: number,
    task: string,
    context: AgentContext,
  ): AgentResult;

  async execute(task: string, context: AgentContext = {}): Promise<AgentResult> {
    try {
      const prompt = this.buildPrompt(task, context);
      const { content, tokensUsed } = await this.generate(prompt);
      return this.parseResponse(content, tokensUsed, task, context);
    } catch (err) {
      const message = errorMessage(err);
      this.logger.warn({ agent: this.type, err: message }, "agent execution failed");
      return failureResult(message);
    }
  }

  /** Chunks del proveedor en orden. Cerrar el iterador cancela el request. */
  async *executeStreaming(task: string, context: AgentContext = {}): AsyncGenerator<string> {
    const prompt = this.buildPrompt(task, context);
    yield* this.provider.generateStream({
      prompt,
      systemPrompt: this.buildSystemPrompt(),
      maxTokens: this.maxTokens,
      signal: AbortSignal.timeout(this.timeoutMs),
    });
  }

  protected buildPrompt(task: string, context: AgentContext): string {
    const parts: string[] = [];
    const project = this.projectContext;

    parts.push("## Project Context");
    parts.push(`Name: ${project.name}`);
    parts.push(`Language: ${project.language}`);
    if (project.description) parts.push(`Description: ${project.description}`);

    const previous = (context.previous_outputs ?? []).slice(-MAX_PREVIOUS_OUTPUTS);
    if (previous.length > 0) {
      parts.push("\n## Previous Agent Outputs");
      for (const output of previous) {
        parts.push(`### ${output.agent}\n${output.summary.slice(0, PREVIOUS_OUTPUT_CHARS)}`);
      }
    }

    const files = (context.existing_files ?? []).slice(0, MAX_EXISTING_FILES);
    if (files.length > 0) {
      parts.push("\n## Existing Files");
      for (const file of files) parts.push(`- ${file.path}`);
    }

    if (context.errors && context.errors.length > 0) {
      parts.push("\n## Errors to Address");
      for (const error of context.errors) parts.push(`- ${error}`);
    }

    parts.push(`\n## Task\n${task}`);
    return parts.join("\n");
  }

  protected async generate(prompt: string): Promise<GenerateResult> {
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        // Rechazar antes de abortar: el error del abort del proveedor no debe ganar la carrera
        reject(new ProviderError(`${this.info.name} timed out after ${this.timeoutMs}ms`));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.provider.generate({
          prompt,
          systemPrompt: this.buildSystemPrompt(),
          maxTokens: this.maxTokens,
          signal: controller.signal,
        }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
    }
  }
}
