import type { AgentInfo, AgentType } from "@crewforge/types";

export const AGENT_TYPES = [
  "planner",
  "researcher",
  "developer",
  "test_designer",
  "executor",
  "debugger",
  "verifier",
  "error_analyzer",
] as const satisfies readonly AgentType[];

export function isAgentType(value: unknown): value is AgentType {
  return typeof value === "string" && (AGENT_TYPES as readonly string[]).includes(value);
}

// ─── Metadata de display (GET /agents) ──────────────────────────────
export const AGENT_INFO: Record<AgentType, AgentInfo> = {
  planner: {
    id: "planner",
    name: "Planner",
    color: "#D946EF",
    icon: "LayoutGrid",
    description: "Analyzes requirements and creates detailed execution plans with job breakdown",
  },
  researcher: {
    id: "researcher",
    name: "Researcher",
    color: "#06B6D4",
    icon: "Search",
    description: "Gathers relevant knowledge, documentation, and best practices",
  },
  developer: {
    id: "developer",
    name: "Developer",
    color: "#10B981",
    icon: "Code",
    description: "Writes code and creates project files",
  },
  test_designer: {
    id: "test_designer",
    name: "Test Designer",
    color: "#F59E0B",
    icon: "TestTube",
    description: "Creates test cases and test files",
  },
  executor: {
    id: "executor",
    name: "Executor",
    color: "#3B82F6",
    icon: "Play",
    description: "Works out how to run the generated code and what output to expect",
  },
  debugger: {
    id: "debugger",
    name: "Debugger",
    color: "#EF4444",
    icon: "Bug",
    description: "Identifies and fixes errors",
  },
  verifier: {
    id: "verifier",
    name: "Verifier",
    color: "#8B5CF6",
    icon: "CheckCircle",
    description: "Validates output against requirements",
  },
  error_analyzer: {
    id: "error_analyzer",
    name: "Error Analyzer",
    color: "#EC4899",
    icon: "AlertTriangle",
    description: "Analyzes build/runtime errors and dispatches fixes",
  },
};
