import type { AgentType } from "@crewforge/types";
import { validateErrorAnalysis } from "../contracts/agentOutputs.js";
import { BaseAgent } from "./baseAgent.js";
import { buildTask, normalizeAgentType } from "./taskFactory.js";
import type { AgentContext, AgentResult } from "./types.js";
import { successResult } from "./types.js";

/** Los fixes no pueden volver a planificar ni analizar. */
function fixAgent(value: string): AgentType {
  const agent = normalizeAgentType(value);
  return agent === "planner" || agent === "error_analyzer" ? "debugger" : agent;
}

export class ErrorAnalyzerAgent extends BaseAgent {
  readonly type = "error_analyzer" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert error analyst. Parse the errors and logs, categorize them
(SYNTAX, IMPORT, RUNTIME, LOGIC, DEPENDENCY, CONFIG), find root causes and create fix tasks.

Respond with JSON:
{
  "errors_found": [
    { "category": "SYNTAX", "severity": "high", "file": "main.py", "line": 42,
      "message": "original error", "root_cause": "why", "fix_description": "how" }
  ],
  "fix_tasks": [
    { "agent": "debugger", "priority": 1, "description": "Fix syntax error in main.py",
      "files_affected": ["main.py"] }
  ],
  "can_auto_fix": true,
  "requires_user_input": false
}`;
  }

  protected buildPrompt(task: string, context: AgentContext): string {
    let prompt = super.buildPrompt(task, context);
    if (context.build_logs) {
      prompt += `\n\n## Build Logs\n\`\`\`\n${context.build_logs}\n\`\`\``;
    }
    return `${prompt}\n\nAnalyze all errors and respond with JSON containing error analysis and fix tasks.`;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const analysis = validateErrorAnalysis(content);
    if (!analysis.ok) {
      return successResult({
        content,
        tokens_used: tokensUsed,
        metadata: { analysis_complete: true, parse_error: analysis.error },
      });
    }

    const { errors_found, fix_tasks, can_auto_fix, requires_user_input } = analysis.data;
    const ordered = [...fix_tasks].sort((a, b) => a.priority - b.priority);
    const tasks = ordered.map((fix, index) =>
      buildTask(
        {
          title: fix.description.slice(0, 200),
          description: fix.description,
          agent_type: fixAgent(fix.agent),
          deliverables: fix.files_affected,
        },
        index + 1,
      ),
    );

    return successResult({
      content,
      tokens_used: tokensUsed,
      tasks_generated: tasks,
      metadata: {
        errors_found: errors_found.length,
        can_auto_fix,
        requires_user_input,
        error_categories: [...new Set(errors_found.map((e) => e.category))],
        fix_priorities: ordered.map((fix) => fix.priority),
      },
    });
  }
}
