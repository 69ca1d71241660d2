import { validateExecutionPlan } from "../contracts/agentOutputs.js";
import { BaseAgent } from "./baseAgent.js";
import type { AgentResult } from "./types.js";
import { successResult } from "./types.js";

/** No ejecuta codigo: pide un plan de ejecucion y lo valida. */
export class ExecutorAgent extends BaseAgent {
  readonly type = "executor" as const;

  protected buildSystemPrompt(): string {
    return `You are a code execution specialist. Given the project files, work out how to run them.

Respond with JSON:
{
  "language": "python",
  "main_file": "main.py",
  "dependencies": ["requests"],
  "setup_commands": ["pip install requests"],
  "run_command": "python main.py",
  "expected_behavior": "what the program should print or do"
}`;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const plan = validateExecutionPlan(content);
    return successResult({
      content,
      tokens_used: tokensUsed,
      metadata: plan.ok
        ? { execution_plan: plan.data, plan_parsed: true }
        : { plan_parsed: false, parse_error: plan.error },
    });
  }
}
