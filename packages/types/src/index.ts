// ─── Agents ──────────────────────────────────────────────────────────
export type AgentType =
  | "planner"
  | "researcher"
  | "developer"
  | "test_designer"
  | "executor"
  | "debugger"
  | "verifier"
  | "error_analyzer";

export interface AgentInfo {
  id: AgentType;
  name: string;
  color: string;
  icon: string;
  description: string;
}

export interface GeneratedFile {
  path: string;
  content: string;
}

// ─── Jobs / Tasks ────────────────────────────────────────────────────
export type JobStatus =
  | "analyzing"
  | "awaiting_approval"
  | "approved"
  | "in_progress"
  | "needs_more_credits"
  | "completed"
  | "failed"
  | "cancelled";

export type TaskStatus = "pending" | "running" | "completed" | "failed";

export interface Task {
  id: string;
  title: string;
  description: string;
  agent_type: AgentType;
  order: number;
  status: TaskStatus;
  estimated_tokens: number;
  estimated_credits: number;
  actual_tokens: number;
  actual_credits: number;
  dependencies: string[];
  deliverables: string[];
  output: string | null;
  files_created: string[];
  error: string | null;
}

export interface Job {
  id: string;
  project_id: string;
  user_id: string;
  prompt: string;
  status: JobStatus;
  multi_agent_mode: boolean;
  tasks: Task[];
  total_estimated_credits: number;
  credits_used: number;
  credits_approved: number;
  credits_needed: number | null;
  /** Creditos de tasks ya ejecutadas que no se pudieron cobrar (se cobran al retomar). */
  credits_unpaid: number;
  current_task_index: number;
  error_count: number;
  max_errors: number;
  error: string | null;
  planner_output: string | null;
  planner_metadata: Record<string, unknown> | null;
  /** Token de la ejecucion que tiene tomado el job. */
  execution_id: string | null;
  created_at: string;
  updated_at: string;
  started_at: string | null;
  completed_at: string | null;
}

// ─── Progress events (SSE) ──────────────────────────────────────────
export type JobEvent =
  | { type: "job_started"; job_id: string; total_tasks: number; resumed_from: number }
  | { type: "task_started"; task_index: number; task_id: string; title: string; agent: AgentType }
  | {
      type: "task_completed";
      task_index: number;
      task_id: string;
      success: boolean;
      files_created: string[];
      credits_used: number;
      output_preview: string;
    }
  | { type: "auto_fix_applied"; task_id: string; fix_description: string; files_fixed: string[] }
  | { type: "task_error"; task_index: number; task_id: string; error: string }
  | {
      type: "needs_credits";
      message: string;
      credits_needed: number;
      current_credits: number;
      completed_tasks: number;
      remaining_tasks: number;
    }
  | {
      type: "job_completed";
      job_id: string;
      total_credits_used: number;
      files_created: number;
      tasks_completed: number;
      tasks_failed: number;
    }
  | { type: "job_failed"; job_id: string; reason: string }
  | { type: "error"; message: string };

export type JobEventType = JobEvent["type"];

// ─── Credits ────────────────────────────────────────────────────────
export interface CreditLedgerEntry {
  id: string;
  user_id: string;
  delta: number;
  reason: string;
  reference_type: string | null;
  reference_id: string | null;
  balance_after: number;
  created_at: string;
}

export interface CostBreakdownItem {
  task_id: string;
  title: string;
  agent: AgentType;
  estimated_tokens: number;
  estimated_credits: number;
}

export interface CostEstimate {
  total_estimated_credits: number;
  total_estimated_tokens: number;
  breakdown: CostBreakdownItem[];
  user_credits: number;
  sufficient_credits: boolean;
  free_usage: boolean;
  message?: string;
}

// ─── Colaboradores externos (solo lectura desde el core) ───────────
export interface User {
  id: string;
  email: string;
  credits: number;
  credits_enabled: boolean;
  created_at: string;
}

export interface UserAiProvider {
  id: string;
  user_id: string;
  provider: string;
  api_key: string | null;
  model_preference: string | null;
  is_active: boolean;
  is_default: boolean;
}

export interface Project {
  id: string;
  user_id: string;
  name: string;
  language: string;
  description: string | null;
}

export interface ProjectFile {
  id: string;
  project_id: string;
  path: string;
  content: string;
  updated_at: string;
}

export type SettingType = "string" | "number" | "boolean";

export interface SystemSetting {
  setting_key: string;
  setting_value: string;
  setting_type: SettingType;
}

// ─── API responses ───────────────────────────────────────────────────
export interface ApiResponse<T = unknown> {
  ok: boolean;
  data?: T;
  error?: string;
  meta?: {
    page?: number;
    per_page?: number;
    total?: number;
  };
}
