import { BaseAgent } from "./baseAgent.js";
import { extractFiles } from "./fileExtraction.js";
import type { AgentResult } from "./types.js";
import { successResult } from "./types.js";

export class DebuggerAgent extends BaseAgent {
  readonly type = "debugger" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert debugger. Find the root cause of the reported errors and fix them.
Explain the fix briefly, then give every corrected file in full:
### path/to/file.ext
\`\`\`
fixed content
\`\`\``;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const files = extractFiles(content);
    return successResult({
      content,
      tokens_used: tokensUsed,
      files_created: files,
      metadata: { fixed_files: files.map((f) => f.path) },
    });
  }
}
