import { describe, it, expect } from "vitest";
import {
  extractJsonObject,
  validateErrorAnalysis,
  validateExecutionPlan,
  validatePlan,
} from "../contracts/agentOutputs.js";

describe("extractJsonObject", () => {
  it("parses raw JSON", () => {
    expect(extractJsonObject('{"a": 1}')).toEqual({ a: 1 });
  });

  it("parses a fenced json block", () => {
    expect(extractJsonObject('Plan below\n```json\n{"a": 2}\n```\nthanks')).toEqual({ a: 2 });
  });

  it("parses the first brace span inside prose", () => {
    expect(extractJsonObject('Sure: {"a": 3} done')).toEqual({ a: 3 });
  });

  it("returns null when nothing parses", () => {
    expect(extractJsonObject("no json {here")).toBeNull();
  });
});

describe("validatePlan", () => {
  it("accepts a plan and applies defaults", () => {
    const result = validatePlan(JSON.stringify({ tasks: [{ title: "Build", agent_type: "developer" }] }));
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.tasks[0]).toEqual({
        title: "Build",
        agent_type: "developer",
        description: "",
        dependencies: [],
        deliverables: [],
      });
    }
  });

  it("rejects an empty task list", () => {
    const result = validatePlan('{"tasks": []}');
    expect(result).toEqual({ ok: false, error: "plan_v1 validation failed: tasks: tasks no puede estar vacio" });
  });

  it("rejects text without JSON", () => {
    expect(validatePlan("I will build it")).toEqual({ ok: false, error: "plan_v1: no JSON object found" });
  });
});

describe("validateErrorAnalysis", () => {
  it("fills defaults for missing fields", () => {
    const result = validateErrorAnalysis('{"fix_tasks": [{"description": "Fix import"}]}');
    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.data.fix_tasks).toEqual([
        { agent: "debugger", priority: 1, description: "Fix import", files_affected: [] },
      ]);
      expect(result.data.can_auto_fix).toBe(false);
      expect(result.data.errors_found).toEqual([]);
    }
  });
});

describe("validateExecutionPlan", () => {
  it("accepts a minimal plan", () => {
    const result = validateExecutionPlan('{"language": "python", "run_command": "python main.py"}');
    expect(result.ok).toBe(true);
    if (result.ok) expect(result.data.run_command).toBe("python main.py");
  });
});
