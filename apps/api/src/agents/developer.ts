import { BaseAgent } from "./baseAgent.js";
import { extractFiles } from "./fileExtraction.js";
import type { AgentResult } from "./types.js";
import { successResult } from "./types.js";

export class DeveloperAgent extends BaseAgent {
  readonly type = "developer" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert ${this.projectContext.language} developer. Write complete, working code for the task.

For every file, use this format:
### path/to/file.ext
\`\`\`${this.projectContext.language}
file content
\`\`\``;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const files = extractFiles(content);
    return successResult({
      content,
      tokens_used: tokensUsed,
      files_created: files,
      metadata: { files: files.map((f) => f.path) },
    });
  }
}
