import type { FastifyBaseLogger } from "fastify";
import type { AgentType, GeneratedFile, Task } from "@crewforge/types";
import type { GenerationProvider } from "../ai/provider.js";

export interface ProjectContext {
  name: string;
  language: string;
  description?: string | null;
}

export interface PreviousOutput {
  agent: AgentType;
  summary: string;
}

/** Contexto opcional que el caller le pasa a execute(). */
export interface AgentContext {
  previous_outputs?: PreviousOutput[];
  existing_files?: GeneratedFile[];
  errors?: string[];
  build_logs?: string;
  original_requirements?: string;
}

export interface AgentResult {
  success: boolean;
  content: string;
  tokens_used: number;
  files_created: GeneratedFile[];
  /** Solo Planner y ErrorAnalyzer los llenan. */
  tasks_generated: Task[];
  errors: string[];
  metadata: Record<string, unknown>;
}

export interface AgentDeps {
  provider: GenerationProvider;
  projectContext: ProjectContext;
  logger: FastifyBaseLogger;
  maxTokens: number;
  timeoutMs: number;
}

export function successResult(partial: Partial<AgentResult> & { content: string }): AgentResult {
  return {
    success: true,
    tokens_used: 0,
    files_created: [],
    tasks_generated: [],
    errors: [],
    metadata: {},
    ...partial,
  };
}

export function failureResult(error: string, partial: Partial<AgentResult> = {}): AgentResult {
  return {
    success: false,
    content: error,
    tokens_used: 0,
    files_created: [],
    tasks_generated: [],
    errors: [error],
    metadata: {},
    ...partial,
  };
}
