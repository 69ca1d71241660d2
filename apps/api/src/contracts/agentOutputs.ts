import { z } from "zod";

// ─── Contratos de salida estructurada de los agentes ──────────────

export const PlanTaskSchema = z.object({
  id: z.string().min(1).optional(),
  title: z.string().max(200).optional(),
  description: z.string().max(4000).optional().default(""),
  agent_type: z.string().optional().default("developer"),
  estimated_tokens: z.number().nonnegative().optional(),
  dependencies: z.array(z.string()).optional().default([]),
  deliverables: z.array(z.string()).optional().default([]),
});

export const PlanV1Schema = z.object({
  analysis: z.string().optional().default(""),
  tasks: z.array(PlanTaskSchema).min(1, "tasks no puede estar vacio"),
});

export const FixTaskSchema = z.object({
  agent: z.string().optional().default("debugger"),
  priority: z.number().int().min(1).optional().default(1),
  description: z.string().min(1),
  files_affected: z.array(z.string()).optional().default([]),
});

export const ErrorFoundSchema = z.object({
  category: z.string().optional().default("UNKNOWN"),
  severity: z.string().optional().default("medium"),
  file: z.string().nullish(),
  line: z.number().nullish(),
  message: z.string().optional().default(""),
  root_cause: z.string().optional().default(""),
  fix_description: z.string().optional().default(""),
});

export const ErrorAnalysisV1Schema = z.object({
  errors_found: z.array(ErrorFoundSchema).optional().default([]),
  fix_tasks: z.array(FixTaskSchema).optional().default([]),
  can_auto_fix: z.boolean().optional().default(false),
  requires_user_input: z.boolean().optional().default(false),
});

export const ExecutionPlanV1Schema = z.object({
  language: z.string().optional().default(""),
  main_file: z.string().nullish(),
  dependencies: z.array(z.string()).optional().default([]),
  setup_commands: z.array(z.string()).optional().default([]),
  run_command: z.string().nullish(),
  expected_behavior: z.string().optional().default(""),
});

export type PlanV1 = z.infer<typeof PlanV1Schema>;
export type PlanTask = z.infer<typeof PlanTaskSchema>;
export type FixTask = z.infer<typeof FixTaskSchema>;
export type ErrorAnalysisV1 = z.infer<typeof ErrorAnalysisV1Schema>;
export type ExecutionPlanV1 = z.infer<typeof ExecutionPlanV1Schema>;

export type ValidationResult<T> = { ok: true; data: T } | { ok: false; error: string };

// ─── Extraccion de JSON desde texto del modelo ────────────────────

/** Prueba: texto entero → bloque ```json``` → primer span {...}. */
export function extractJsonObject(text: string): unknown {
  const candidates: string[] = [text.trim()];

  const fenced = text.match(/```(?:json)?\s*\n([\s\S]*?)```/);
  if (fenced?.[1]) candidates.push(fenced[1].trim());

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start >= 0 && end > start) candidates.push(text.slice(start, end + 1));

  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }
  return null;
}

function validateWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, label: string, text: string): ValidationResult<T> {
  const raw = extractJsonObject(text);
  if (raw === null) {
    return { ok: false, error: `${label}: no JSON object found` };
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    return { ok: false, error: `${label} validation failed: ${issues}` };
  }
  return { ok: true, data: result.data };
}

export function validatePlan(text: string): ValidationResult<PlanV1> {
  return validateWith(PlanV1Schema, "plan_v1", text);
}

export function validateErrorAnalysis(text: string): ValidationResult<ErrorAnalysisV1> {
  return validateWith(ErrorAnalysisV1Schema, "error_analysis_v1", text);
}

export function validateExecutionPlan(text: string): ValidationResult<ExecutionPlanV1> {
  return validateWith(ExecutionPlanV1Schema, "execution_plan_v1", text);
}
