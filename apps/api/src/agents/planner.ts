import { validatePlan } from "../contracts/agentOutputs.js";
import { BaseAgent } from "./baseAgent.js";
import { buildTask, fallbackPlan } from "./taskFactory.js";
import type { AgentResult } from "./types.js";
import { successResult } from "./types.js";

export class PlannerAgent extends BaseAgent {
  readonly type = "planner" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert project planner. Break the user's request into an ordered list of tasks, each handled by one specialist agent.

Available agents: researcher, developer, test_designer, executor, debugger, verifier.

Respond ONLY with JSON:
{
  "analysis": "short analysis of the request",
  "tasks": [
    {
      "title": "Short title",
      "description": "What the agent must do",
      "agent_type": "developer",
      "estimated_tokens": 1500,
      "dependencies": [],
      "deliverables": ["src/main.ts"]
    }
  ]
}`;
  }

  protected parseResponse(content: string, tokensUsed: number, task: string): AgentResult {
    const plan = validatePlan(content);

    if (!plan.ok) {
      this.logger.warn({ agent: this.type, err: plan.error }, "plan not parseable, using fallback plan");
      return successResult({
        content,
        tokens_used: tokensUsed,
        tasks_generated: fallbackPlan(task),
        metadata: { fallback_used: true, parse_error: plan.error },
      });
    }

    const tasks = plan.data.tasks.map((draft, index) => buildTask(draft, index + 1));
    return successResult({
      content,
      tokens_used: tokensUsed,
      tasks_generated: tasks,
      metadata: { fallback_used: false, analysis: plan.data.analysis, task_count: tasks.length },
    });
  }
}
