import { BaseAgent } from "./baseAgent.js";
import { TEST_FILE_STRATEGIES, extractFiles } from "./fileExtraction.js";
import type { AgentResult } from "./types.js";
import { successResult } from "./types.js";

export class TestDesignerAgent extends BaseAgent {
  readonly type = "test_designer" as const;

  protected buildSystemPrompt(): string {
    return `You are an expert test engineer. Write thorough tests for the existing code:
happy paths, edge cases and error handling.

For every test file, use this format:
### tests/test_name.ext
\`\`\`
test content
\`\`\``;
  }

  protected parseResponse(content: string, tokensUsed: number): AgentResult {
    const files = extractFiles(content, TEST_FILE_STRATEGIES);
    return successResult({
      content,
      tokens_used: tokensUsed,
      files_created: files,
      metadata: { test_files: files.map((f) => f.path) },
    });
  }
}
