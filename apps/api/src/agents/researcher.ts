import { BaseAgent } from "./baseAgent.js";
import type { AgentResult } from "./types.js";
import { successResult } from "./types.js";

export class ResearcherAgent extends BaseAgent {
  readonly type = "researcher" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert technical researcher. Gather what the team needs before building:
relevant libraries, documentation, patterns, pitfalls and recommended approach.
Organize the answer in markdown sections that start with "## ".`;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const sections = content.match(/^## /gm) ?? [];
    return successResult({
      content,
      tokens_used: tokensUsed,
      metadata: { sections_found: sections.length },
    });
  }
}
