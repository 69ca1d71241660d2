import type { AgentInfo, AgentType } from "@crewforge/types";
import type { BaseAgent } from "./baseAgent.js";
import { DebuggerAgent } from "./debugger.js";
import { DeveloperAgent } from "./developer.js";
import { ErrorAnalyzerAgent } from "./errorAnalyzer.js";
import { ExecutorAgent } from "./executor.js";
import { AGENT_INFO, AGENT_TYPES } from "./info.js";
import { PlannerAgent } from "./planner.js";
import { ResearcherAgent } from "./researcher.js";
import { TestDesignerAgent } from "./testDesigner.js";
import type { AgentDeps } from "./types.js";
import { VerifierAgent } from "./verifier.js";

export type AgentConstructor = new (deps: AgentDeps) => BaseAgent;

// ─── Registro agent_type → clase ───────────────────────────────────

export class AgentRegistry {
  private readonly agents = new Map<AgentType, AgentConstructor>();

  register(type: AgentType, ctor: AgentConstructor): this {
    this.agents.set(type, ctor);
    return this;
  }

  /** Tipos no registrados caen en developer. */
  create(type: AgentType, deps: AgentDeps): BaseAgent {
    const ctor = this.agents.get(type) ?? this.agents.get("developer");
    if (!ctor) {
      throw new Error(`No agent registered for '${type}' and no developer fallback`);
    }
    return new ctor(deps);
  }

  list(): AgentInfo[] {
    return AGENT_TYPES.filter((type) => this.agents.has(type)).map((type) => AGENT_INFO[type]);
  }
}

export function createDefaultAgentRegistry(): AgentRegistry {
  return new AgentRegistry()
    .register("planner", PlannerAgent)
    .register("researcher", ResearcherAgent)
    .register("developer", DeveloperAgent)
    .register("test_designer", TestDesignerAgent)
    .register("executor", ExecutorAgent)
    .register("debugger", DebuggerAgent)
    .register("verifier", VerifierAgent)
    .register("error_analyzer", ErrorAnalyzerAgent);
}
