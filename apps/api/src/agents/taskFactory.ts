import { randomBytes } from "node:crypto";
import type { AgentType, Task } from "@crewforge/types";
import { isAgentType } from "./info.js";

export const DEFAULT_ESTIMATED_TOKENS = 500;

export function newTaskId(): string {
  return `task-${randomBytes(4).toString("hex")}`;
}

/** Tipos desconocidos caen en developer. */
export function normalizeAgentType(value: unknown): AgentType {
  return isAgentType(value) ? value : "developer";
}

/** Campos que un plan (o un usuario editando tasks) puede traer. */
export interface TaskDraft {
  id?: string;
  title?: string;
  description?: string;
  agent_type?: string;
  estimated_tokens?: number;
  dependencies?: string[];
  deliverables?: string[];
}

/** Arma una Task pendiente a partir de un draft. `order` es 1-based. */
export function buildTask(draft: TaskDraft, order: number): Task {
  const estimated = draft.estimated_tokens;
  return {
    id: draft.id && draft.id.length > 0 ? draft.id : newTaskId(),
    title: draft.title && draft.title.length > 0 ? draft.title : `Task ${order}`,
    description: draft.description ?? "",
    agent_type: normalizeAgentType(draft.agent_type),
    order,
    status: "pending",
    estimated_tokens:
      typeof estimated === "number" && Number.isFinite(estimated) && estimated >= 0
        ? Math.floor(estimated)
        : DEFAULT_ESTIMATED_TOKENS,
    estimated_credits: 0,
    actual_tokens: 0,
    actual_credits: 0,
    dependencies: draft.dependencies ?? [],
    deliverables: draft.deliverables ?? [],
    output: null,
    files_created: [],
    error: null,
  };
}

/** Plan por defecto cuando el Planner no devuelve estructura parseable. */
export function fallbackPlan(prompt: string): Task[] {
  const drafts: TaskDraft[] = [
    {
      title: "Research requirements",
      description: `Research best practices and approach for: ${prompt}`,
      agent_type: "researcher",
      estimated_tokens: 800,
      deliverables: ["Research notes"],
    },
    {
      title: "Create project structure",
      description: "Set up the project skeleton and configuration files",
      agent_type: "developer",
      estimated_tokens: 1500,
      deliverables: ["Project skeleton"],
    },
    {
      title: "Implement core functionality",
      description: `Implement the main features for: ${prompt}`,
      agent_type: "developer",
      estimated_tokens: 2000,
      deliverables: ["Source files"],
    },
    {
      title: "Write tests",
      description: "Create tests for the implemented functionality",
      agent_type: "test_designer",
      estimated_tokens: 1000,
      deliverables: ["Test files"],
    },
    {
      title: "Verify implementation",
      description: "Review the implementation against the original requirements",
      agent_type: "verifier",
      estimated_tokens: 500,
      deliverables: ["Verification report"],
    },
  ];

  const tasks = drafts.map((draft, index) => buildTask(draft, index + 1));
  for (let i = 1; i < tasks.length; i++) {
    tasks[i].dependencies = [tasks[i - 1].id];
  }
  return tasks;
}
