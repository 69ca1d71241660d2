import { BaseAgent } from "./baseAgent.js";
import type { AgentContext, AgentResult } from "./types.js";
import { successResult } from "./types.js";
import { detectVerdict } from "./verdict.js";

export class VerifierAgent extends BaseAgent {
  readonly type = "verifier" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert code reviewer. Check the implementation against the requirements:
completeness, correctness and code quality.

End your review with exactly one verdict line:
VERDICT: PASS
or
VERDICT: FAIL`;
  }

  protected buildPrompt(task: string, context: AgentContext): string {
    const base = super.buildPrompt(task, context);
    if (!context.original_requirements) return base;
    return `${base}\n\n## Original Requirements\n${context.original_requirements}`;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const verdict = detectVerdict(content);
    return successResult({
      content,
      tokens_used: tokensUsed,
      metadata: { verification_passed: verdict === "PASS", verdict },
    });
  }
}
